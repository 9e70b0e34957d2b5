/**
 * API Server Process
 *
 * Starts the API server as a detached child, records its PID, and stops
 * it again. The PID is the primary handle; the window title is only used
 * on Windows when no PID is known.
 */

import { existsSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import type { ProcessRunner } from '../services/ProcessRunner.js';
import type { ServerConfig } from '../config/types.js';
import { readPidFile } from '../utils/ServerDetector.js';
import type { Interpreter } from './python.js';

export type StopMethod = 'pid' | 'title' | 'none';

/** Where stop() may look for a PID */
export type StopSource = 'retained' | 'pidFile';

export interface StopResult {
  method: StopMethod;
  /** Whether a running process was signalled */
  stopped: boolean;
  pid?: number;
}

export class ServerProcess {
  private readonly runner: ProcessRunner;
  private readonly config: ServerConfig;
  private readonly root: string;
  private pid: number | undefined;

  constructor(runner: ProcessRunner, config: ServerConfig, root: string) {
    this.runner = runner;
    this.config = config;
    this.root = root;
  }

  get pidPath(): string {
    return join(this.root, this.config.pidFile);
  }

  get logPath(): string {
    return join(this.root, this.config.logFile);
  }

  get currentPid(): number | undefined {
    return this.pid;
  }

  /**
   * Spawn the server entry and persist its PID. Rejects when the process
   * could not be started at all.
   */
  async start(interpreter: Interpreter): Promise<number> {
    const pid = await this.runner.spawnDetached(interpreter.command, [this.config.entry], {
      cwd: this.root,
      title: this.config.title,
      logFile: this.logPath
    });
    this.pid = pid;
    writeFileSync(this.pidPath, `${pid}\n`, 'utf-8');
    return pid;
  }

  /**
   * Stop the server.
   *
   * 'retained' only uses the PID this instance spawned, then the window
   * title; a PID file left by another session is never trusted. 'pidFile'
   * also reads the PID file and is meant for stopping an earlier session.
   */
  async stop(source: StopSource = 'retained'): Promise<StopResult> {
    const owned = this.pid;
    const pid = owned ?? (source === 'pidFile' ? readPidFile(this.pidPath) : undefined);

    try {
      if (pid !== undefined) {
        const stopped = await this.runner.kill(pid);
        return { method: 'pid', stopped, pid };
      }

      const stopped = await this.runner.killByTitle(this.config.title);
      return { method: stopped ? 'title' : 'none', stopped };
    } finally {
      this.pid = undefined;
      if ((owned !== undefined || source === 'pidFile') && existsSync(this.pidPath)) {
        rmSync(this.pidPath, { force: true });
      }
    }
  }
}

/**
 * One-line outcome of a stop, for the stop command
 */
export function describeStopResult(result: StopResult, title: string): { level: 'success' | 'warn' | 'info'; message: string } {
  if (result.stopped) {
    const via = result.method === 'pid' ? `PID ${result.pid}` : `title "${title}"`;
    return { level: 'success', message: `Stopped server (${via})` };
  }
  if (result.pid !== undefined) {
    return { level: 'warn', message: `Process ${result.pid} was not running; removed stale PID file` };
  }
  return { level: 'info', message: 'No running server found' };
}
