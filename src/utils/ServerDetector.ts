/**
 * ServerDetector
 *
 * Detects whether the UniMate API server is running and waits for it to
 * become ready after a launch. Uses the health endpoint first and falls
 * back to the PID file.
 */

import * as fs from 'fs';
import * as http from 'http';
import type { ProcessRunner } from '../services/ProcessRunner.js';

export interface ServerStatus {
  /** Whether the server is detected as running */
  running: boolean;
  /** Detection method used */
  method: 'health_check' | 'pid_file' | 'none';
  /** Additional details about the detection */
  details?: string;
  /** PID read from the PID file, when one was found */
  pid?: number;
  /** Timestamp when detection was performed */
  timestamp: Date;
}

export interface HealthProbeOptions {
  url: string;
  timeoutMs: number;
}

export type HealthProbe = (options: HealthProbeOptions) => Promise<ServerStatus>;

export interface WaitForHealthyOptions extends HealthProbeOptions {
  attempts: number;
  intervalMs: number;
  /** Called before each probe with its 1-based number */
  onAttempt?: (attempt: number) => void;
  probe?: HealthProbe;
  sleep?: (ms: number) => Promise<void>;
}

export interface ReadinessResult {
  ready: boolean;
  attempts: number;
  last: ServerStatus;
}

export const sleep = (ms: number): Promise<void> =>
  new Promise(resolve => setTimeout(resolve, ms));

/**
 * Check if the health endpoint responds with 200
 */
export function checkHealthEndpoint(options: HealthProbeOptions): Promise<ServerStatus> {
  return new Promise<ServerStatus>((resolve) => {
    const timeout = setTimeout(() => {
      req.destroy();
      resolve({
        running: false,
        method: 'health_check',
        details: 'Health check timeout',
        timestamp: new Date()
      });
    }, options.timeoutMs);

    const req = http.get(options.url, (res) => {
      clearTimeout(timeout);

      resolve({
        running: res.statusCode === 200,
        method: 'health_check',
        details: res.statusCode === 200
          ? `Health endpoint responded with status ${res.statusCode}`
          : `Health endpoint returned status ${res.statusCode}`,
        timestamp: new Date()
      });

      // Consume response data to free up memory
      res.resume();
    });

    req.on('error', (err) => {
      clearTimeout(timeout);
      resolve({
        running: false,
        method: 'health_check',
        details: `Health check failed: ${err.message}`,
        timestamp: new Date()
      });
    });
  });
}

/**
 * Poll the health endpoint until it answers or the attempts run out
 */
export async function waitForHealthy(options: WaitForHealthyOptions): Promise<ReadinessResult> {
  const probe = options.probe ?? checkHealthEndpoint;
  const wait = options.sleep ?? sleep;
  let last: ServerStatus = {
    running: false,
    method: 'none',
    details: 'No probe performed',
    timestamp: new Date()
  };

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    options.onAttempt?.(attempt);
    last = await probe({ url: options.url, timeoutMs: options.timeoutMs });
    if (last.running) {
      return { ready: true, attempts: attempt, last };
    }
    if (attempt < options.attempts) {
      await wait(options.intervalMs);
    }
  }

  return { ready: false, attempts: options.attempts, last };
}

/**
 * Read a PID file; undefined when absent or unparsable
 */
export function readPidFile(pidPath: string): number | undefined {
  if (!fs.existsSync(pidPath)) return undefined;
  const pid = parseInt(fs.readFileSync(pidPath, 'utf-8').trim(), 10);
  return isNaN(pid) ? undefined : pid;
}

export class ServerDetector {
  private readonly runner: ProcessRunner;
  private readonly probe: HealthProbe;

  constructor(runner: ProcessRunner, probe: HealthProbe = checkHealthEndpoint) {
    this.runner = runner;
    this.probe = probe;
  }

  /**
   * Detect the server: health endpoint first, then the PID file
   */
  async detect(healthUrl: string, pidPath: string, timeoutMs: number = 2000): Promise<ServerStatus> {
    const health = await this.probe({ url: healthUrl, timeoutMs });
    if (health.running) {
      return { ...health, pid: readPidFile(pidPath) };
    }

    const pid = readPidFile(pidPath);
    if (pid === undefined) {
      return {
        running: false,
        method: 'none',
        details: health.details,
        timestamp: new Date()
      };
    }

    if (this.runner.isAlive(pid)) {
      return {
        running: true,
        method: 'pid_file',
        details: `Process ${pid} is running but ${health.details ?? 'the health check failed'}`,
        pid,
        timestamp: new Date()
      };
    }

    return {
      running: false,
      method: 'pid_file',
      details: `Stale PID file (process ${pid} not found)`,
      pid,
      timestamp: new Date()
    };
  }
}
