/**
 * Launcher
 *
 * Prepares the local environment and supervises one API server process
 * for an interactive session:
 *
 * 1. Interpreter check
 * 2. Configuration bootstrap
 * 3. Configuration validation
 * 4. Dependency check / install
 * 5. Directory provisioning
 * 6. Process launch + readiness wait
 * 7. Summary, then wait for a key
 * 8. Shutdown
 *
 * Fatal conditions surface as LauncherError and end the run with its exit code.
 */

import { join } from 'path';
import { baseUrl, type LauncherSettings } from '../config/index.js';
import { LauncherError, PlaceholderCredentialError } from '../core/errors.js';
import type { ProcessRunner } from '../services/ProcessRunner.js';
import {
  sleep as defaultSleep,
  waitForHealthy,
  type HealthProbe,
  type ReadinessResult
} from '../utils/ServerDetector.js';
import { ensureDirectories, type DirectoryResult } from './directories.js';
import {
  API_KEY_VAR,
  ensureEnvFile,
  isConfigured,
  loadEnvironment,
  mask,
  type LauncherEnvironment
} from './env.js';
import type { KeyWaiter } from './prompt.js';
import { ensureDependencies, findInterpreter, type DependencyResult, type Interpreter } from './python.js';
import type { LaunchReporter } from './reporter.js';
import { ServerProcess, type StopResult } from './server.js';
import { buildSummary } from './summary.js';

export interface LauncherDeps {
  runner: ProcessRunner;
  reporter: LaunchReporter;
  waitForKey: KeyWaiter;
  /** Health probe used by the readiness wait */
  probe?: HealthProbe;
  sleep?: (ms: number) => Promise<void>;
}

export interface LaunchedServer {
  /** Undefined when the process could not be started */
  pid: number | undefined;
  readiness: ReadinessResult | undefined;
}

export class Launcher {
  private readonly settings: LauncherSettings;
  private readonly deps: LauncherDeps;
  private readonly server: ServerProcess;
  private readonly sleep: (ms: number) => Promise<void>;
  private stopping: Promise<StopResult> | undefined;

  constructor(settings: LauncherSettings, deps: LauncherDeps) {
    this.settings = settings;
    this.deps = deps;
    this.server = new ServerProcess(deps.runner, settings.server, settings.root);
    this.sleep = deps.sleep ?? defaultSleep;
  }

  get envPath(): string {
    return join(this.settings.root, this.settings.envFile);
  }

  /**
   * Run the whole sequence. Resolves with the process exit code.
   */
  async run(): Promise<number> {
    const { reporter } = this.deps;

    try {
      const interpreter = await this.checkInterpreter();
      await this.bootstrapConfig();
      const env = this.validateConfig();
      await this.checkDependencies(interpreter);
      this.provisionDirectories();
      const launched = await this.launch(interpreter);

      this.printSummary(launched, env);
      await this.deps.waitForKey('');

      const stopped = await this.shutdown();
      if (stopped.stopped) {
        reporter.success('Shutdown', 'Server stopped');
      } else {
        reporter.info('Shutdown', 'No server was running');
      }
      await this.pause('Press any key to exit...');
      return 0;
    } catch (error) {
      if (error instanceof LauncherError) {
        return this.fail(error);
      }
      throw error;
    }
  }

  async checkInterpreter(): Promise<Interpreter> {
    this.deps.reporter.step('Python', 'Checking for a Python interpreter...');
    const interpreter = await findInterpreter(this.deps.runner, this.settings.python.candidates);
    this.deps.reporter.success('Python', `${interpreter.version} (${interpreter.command})`);
    return interpreter;
  }

  /**
   * Create the configuration template if absent and give the operator a
   * chance to edit it. Returns true when the file was created.
   */
  async bootstrapConfig(): Promise<boolean> {
    if (!ensureEnvFile(this.envPath)) {
      return false;
    }
    this.deps.reporter.warn('Config', `Created ${this.settings.envFile} from template`);
    this.deps.reporter.info('Config', `Set ${API_KEY_VAR} in ${this.settings.envFile} before continuing`);
    await this.pause('Edit the file, then press any key to continue...');
    return true;
  }

  /**
   * Load the configuration once and reject a placeholder API key
   */
  validateConfig(): LauncherEnvironment {
    const env = loadEnvironment(this.envPath);
    if (!isConfigured(env.apiKey)) {
      throw new PlaceholderCredentialError(this.settings.envFile, API_KEY_VAR);
    }
    this.deps.reporter.success('Config', `${API_KEY_VAR} ${mask(env.apiKey)}, model ${env.model}`);
    return env;
  }

  async checkDependencies(interpreter: Interpreter): Promise<DependencyResult> {
    const { reporter } = this.deps;
    const { requiredModule, manifest } = this.settings.python;
    reporter.step('Deps', `Checking for ${requiredModule}...`);

    const result = await ensureDependencies(this.deps.runner, interpreter, this.settings.python, this.settings.root);
    switch (result.status) {
      case 'present':
        reporter.success('Deps', `${requiredModule} is installed`);
        break;
      case 'installed':
        reporter.success('Deps', `Installed dependencies from ${manifest}`);
        break;
      case 'install_failed':
        reporter.warn('Deps', `pip exited with code ${result.installExitCode ?? 'unknown'}; continuing`);
        break;
    }
    return result;
  }

  provisionDirectories(): DirectoryResult[] {
    const results = ensureDirectories(this.settings.root, this.settings.directories);
    const created = results.filter(r => r.created).map(r => r.path);
    this.deps.reporter.success(
      'Dirs',
      created.length > 0 ? `Created ${created.join(', ')}` : 'Data directories present'
    );
    return results;
  }

  /**
   * Start the server and wait for its health endpoint. Neither a spawn
   * failure nor a readiness timeout is fatal.
   */
  async launch(interpreter: Interpreter): Promise<LaunchedServer> {
    const { reporter } = this.deps;
    const { server, health } = this.settings;
    reporter.step('Server', `Starting ${server.title} on port ${server.port}...`);

    let pid: number;
    try {
      pid = await this.server.start(interpreter);
    } catch (error) {
      reporter.warn('Server', `Failed to start: ${error instanceof Error ? error.message : String(error)}`);
      return { pid: undefined, readiness: undefined };
    }
    reporter.info('Server', `PID ${pid} written to ${server.pidFile}`);

    await this.sleep(health.graceMs);

    const readiness = await waitForHealthy({
      url: `${baseUrl(this.settings)}${health.path}`,
      timeoutMs: health.timeoutMs,
      attempts: health.attempts,
      intervalMs: health.intervalMs,
      onAttempt: (attempt) => reporter.info('Server', `Health check ${attempt}/${health.attempts}...`),
      probe: this.deps.probe,
      sleep: this.sleep
    });

    if (readiness.ready) {
      reporter.success('Server', `Healthy after ${readiness.attempts} check(s)`);
    } else {
      reporter.warn(
        'Server',
        `No healthy response after ${readiness.attempts} check(s): ${readiness.last.details ?? 'unknown'}`
      );
      reporter.info('Server', `See ${server.logFile} for server output`);
    }

    return { pid, readiness };
  }

  printSummary(launched: LaunchedServer, env?: LauncherEnvironment): void {
    const lines = buildSummary({
      baseUrl: baseUrl(this.settings),
      testPage: this.settings.testPage,
      model: env?.model,
      ready: launched.readiness?.ready ?? false,
      pid: launched.pid,
      logFile: launched.pid === undefined ? undefined : this.settings.server.logFile
    });
    this.deps.reporter.line();
    for (const line of lines) {
      this.deps.reporter.line(line);
    }
    this.deps.reporter.line();
  }

  /**
   * Stop the server. Safe to call more than once (keypress and signal).
   */
  shutdown(): Promise<StopResult> {
    if (!this.stopping) {
      this.deps.reporter.step('Shutdown', 'Stopping server...');
      this.stopping = this.server.stop();
    }
    return this.stopping;
  }

  private async fail(error: LauncherError): Promise<number> {
    this.deps.reporter.error('Launcher', error.message);
    if (error.hint) {
      this.deps.reporter.info('Launcher', error.hint);
    }
    await this.pause('Press any key to exit...');
    return error.exitCode;
  }

  private pause(message: string): Promise<void> {
    return this.settings.pause ? this.deps.waitForKey(message) : Promise.resolve();
  }
}
