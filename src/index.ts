/**
 * UniMate Launcher
 *
 * Library entry: the launch sequence, its steps and the settings they share.
 */

export * from './launch/index.js';
export {
  loadSettings,
  settingsFromEnv,
  baseUrl,
  DEFAULT_LAUNCHER_SETTINGS
} from './config/index.js';
export type {
  LauncherSettings,
  LauncherOverrides,
  ServerConfig,
  HealthConfig,
  PythonConfig
} from './config/index.js';
export {
  LauncherError,
  InterpreterNotFoundError,
  PlaceholderCredentialError,
  ManifestNotFoundError,
  CredentialCheckError
} from './core/errors.js';
export { NodeProcessRunner } from './services/ProcessRunner.js';
export type {
  ProcessRunner,
  CommandResult,
  RunOptions,
  DetachedOptions
} from './services/ProcessRunner.js';
export {
  ServerDetector,
  checkHealthEndpoint,
  waitForHealthy,
  readPidFile
} from './utils/ServerDetector.js';
export type { ServerStatus, HealthProbe, ReadinessResult } from './utils/ServerDetector.js';
