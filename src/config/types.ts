/**
 * Launcher Configuration Types
 *
 * Type definitions for the settings that drive a launch: where the project
 * lives, which interpreter to use, and how the API server is started and
 * probed.
 */

/**
 * Server process settings
 */
export interface ServerConfig {
  /** Entry script passed to the interpreter */
  entry: string;
  /** Port the API server binds */
  port: number;
  /** Host used for the base URL and health probe */
  host: string;
  /** Window/process title label */
  title: string;
  /** PID file, relative to the project root */
  pidFile: string;
  /** Server output log, relative to the project root */
  logFile: string;
}

/**
 * Readiness probe settings
 */
export interface HealthConfig {
  /** Route polled after launch */
  path: string;
  /** Wait before the first probe (ms) */
  graceMs: number;
  /** Maximum number of probes */
  attempts: number;
  /** Delay between probes (ms) */
  intervalMs: number;
  /** Per-request timeout (ms) */
  timeoutMs: number;
}

/**
 * Python environment settings
 */
export interface PythonConfig {
  /** Interpreter commands tried in order */
  candidates: string[];
  /** Module whose import proves the dependencies are installed */
  requiredModule: string;
  /** Requirements manifest, relative to the project root */
  manifest: string;
}

export interface LauncherSettings {
  /** Project root; every relative path resolves against it */
  root: string;
  /** Configuration file, relative to the root */
  envFile: string;
  /** Directories provisioned before launch, relative to the root */
  directories: string[];
  /** Static test page shipped with the server */
  testPage: string;
  /** Wait for a key press before fatal exits and at the end */
  pause: boolean;
  server: ServerConfig;
  health: HealthConfig;
  python: PythonConfig;
}

/**
 * Overrides accepted from the CLI or tests
 */
export type LauncherOverrides = Partial<Omit<LauncherSettings, 'server' | 'health' | 'python'>> & {
  server?: Partial<ServerConfig>;
  health?: Partial<HealthConfig>;
  python?: Partial<PythonConfig>;
};

export const DEFAULT_LAUNCHER_SETTINGS: LauncherSettings = {
  root: '.',
  envFile: '.env',
  directories: ['backend/vector_store', 'backend/history', 'data/uploaded_files'],
  testPage: 'test_api.html',
  pause: true,
  server: {
    entry: 'api_server.py',
    port: 5000,
    host: 'localhost',
    title: 'UniMate API Server',
    pidFile: 'unimate-server.pid',
    logFile: 'unimate-server.log'
  },
  health: {
    path: '/api/health',
    graceMs: 3000,
    attempts: 10,
    intervalMs: 1000,
    timeoutMs: 2000
  },
  python: {
    candidates: process.platform === 'win32' ? ['python', 'py', 'python3'] : ['python', 'python3'],
    requiredModule: 'flask',
    manifest: 'requirements.txt'
  }
};
