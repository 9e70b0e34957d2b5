/**
 * ProcessRunner
 *
 * Thin layer over child_process used by the launch steps. Everything that
 * touches the OS process table goes through this interface.
 */

import { spawn } from 'child_process';
import { closeSync, openSync } from 'fs';

export interface CommandResult {
  /** Exit code, or null when the command could not be started */
  code: number | null;
  stdout: string;
  stderr: string;
  /** Spawn error message (ENOENT and friends) */
  error?: string;
}

export interface RunOptions {
  cwd?: string;
  /** 'inherit' streams output to the terminal (used for pip) */
  stdio?: 'pipe' | 'inherit';
}

export interface DetachedOptions {
  cwd: string;
  /** Console window title (Windows) */
  title: string;
  /** File receiving stdout/stderr; output is discarded when omitted */
  logFile?: string;
}

export interface ProcessRunner {
  run(command: string, args: string[], options?: RunOptions): Promise<CommandResult>;
  /** Start a process that outlives the launcher; resolves with its PID */
  spawnDetached(command: string, args: string[], options: DetachedOptions): Promise<number>;
  isAlive(pid: number): boolean;
  /** Terminate a process and its children. False when nothing was running. */
  kill(pid: number): Promise<boolean>;
  /** Terminate by window title (Windows only) */
  killByTitle(title: string): Promise<boolean>;
}

const isWindows = process.platform === 'win32';

export class NodeProcessRunner implements ProcessRunner {
  run(command: string, args: string[], options: RunOptions = {}): Promise<CommandResult> {
    return new Promise<CommandResult>((resolve) => {
      const stdio = options.stdio ?? 'pipe';
      const proc = spawn(command, args, {
        cwd: options.cwd,
        stdio: stdio === 'inherit' ? 'inherit' : ['ignore', 'pipe', 'pipe']
      });
      let stdout = '';
      let stderr = '';
      let settled = false;

      proc.stdout?.on('data', (data: Buffer) => {
        stdout += data.toString();
      });

      proc.stderr?.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      proc.on('error', (err) => {
        if (settled) return;
        settled = true;
        resolve({ code: null, stdout, stderr, error: err.message });
      });

      proc.on('close', (code) => {
        if (settled) return;
        settled = true;
        resolve({ code, stdout, stderr });
      });
    });
  }

  spawnDetached(command: string, args: string[], options: DetachedOptions): Promise<number> {
    return new Promise<number>((resolve, reject) => {
      const fd = options.logFile ? openSync(options.logFile, 'a') : undefined;
      const output = fd === undefined ? 'ignore' : fd;

      // On Windows the server runs inside its own titled console so the
      // title-based fallback in kill() keeps working.
      const child = isWindows
        ? spawn('cmd.exe', ['/c', `title ${options.title} && ${[command, ...args].join(' ')}`], {
            cwd: options.cwd,
            detached: true,
            stdio: ['ignore', output, output]
          })
        : spawn(command, args, {
            cwd: options.cwd,
            detached: true,
            stdio: ['ignore', output, output]
          });

      const release = () => {
        if (fd !== undefined) closeSync(fd);
      };

      child.once('error', (err) => {
        release();
        reject(err);
      });

      child.once('spawn', () => {
        release();
        child.unref();
        if (child.pid === undefined) {
          reject(new Error(`${command} started without a PID`));
          return;
        }
        resolve(child.pid);
      });
    });
  }

  isAlive(pid: number): boolean {
    try {
      process.kill(pid, 0); // Signal 0 = existence check
      return true;
    } catch {
      return false;
    }
  }

  async kill(pid: number): Promise<boolean> {
    if (!this.isAlive(pid)) return false;

    if (isWindows) {
      const result = await this.run('taskkill', ['/PID', String(pid), '/T', '/F']);
      return result.code === 0;
    }

    try {
      // Detached children lead their own process group
      process.kill(-pid, 'SIGTERM');
      return true;
    } catch {
      try {
        process.kill(pid, 'SIGTERM');
        return true;
      } catch {
        return false;
      }
    }
  }

  async killByTitle(title: string): Promise<boolean> {
    if (!isWindows) return false;
    const result = await this.run('taskkill', ['/FI', `WINDOWTITLE eq ${title}`, '/T', '/F']);
    return result.code === 0;
  }
}
