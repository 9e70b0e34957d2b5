import { describe, it, expect, beforeAll, afterAll, beforeEach, afterEach } from 'vitest';
import { createServer, type Server } from 'http';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import {
  ServerDetector,
  checkHealthEndpoint,
  readPidFile,
  waitForHealthy,
  type HealthProbe,
  type ServerStatus
} from './ServerDetector.js';
import { FakeProcessRunner } from '../test/FakeProcessRunner.js';

const status = (running: boolean, details: string): ServerStatus => ({
  running,
  method: 'health_check',
  details,
  timestamp: new Date()
});

async function listen(server: Server): Promise<number> {
  await new Promise<void>(resolve => server.listen(0, '127.0.0.1', resolve));
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('Expected a TCP address');
  }
  return address.port;
}

/** Probe that becomes healthy on the given attempt (never when 0) */
function probeHealthyOn(attempt: number): { probe: HealthProbe; urls: string[] } {
  const urls: string[] = [];
  const probe: HealthProbe = async ({ url }) => {
    urls.push(url);
    return urls.length === attempt
      ? status(true, 'Health endpoint responded with status 200')
      : status(false, 'Health check failed: connect ECONNREFUSED');
  };
  return { probe, urls };
}

describe('waitForHealthy', () => {
  it('should stop polling once the endpoint answers', async () => {
    const { probe, urls } = probeHealthyOn(3);
    const sleeps: number[] = [];
    const seen: number[] = [];

    const result = await waitForHealthy({
      url: 'http://localhost:5000/api/health',
      timeoutMs: 2000,
      attempts: 10,
      intervalMs: 1000,
      probe,
      sleep: async (ms) => { sleeps.push(ms); },
      onAttempt: (n) => seen.push(n)
    });

    expect(result.ready).toBe(true);
    expect(result.attempts).toBe(3);
    expect(urls).toEqual([
      'http://localhost:5000/api/health',
      'http://localhost:5000/api/health',
      'http://localhost:5000/api/health'
    ]);
    expect(sleeps).toEqual([1000, 1000]);
    expect(seen).toEqual([1, 2, 3]);
  });

  it('should give up after the configured attempts', async () => {
    const { probe, urls } = probeHealthyOn(0);
    const sleeps: number[] = [];

    const result = await waitForHealthy({
      url: 'http://localhost:5000/api/health',
      timeoutMs: 2000,
      attempts: 2,
      intervalMs: 500,
      probe,
      sleep: async (ms) => { sleeps.push(ms); }
    });

    expect(result.ready).toBe(false);
    expect(result.attempts).toBe(2);
    expect(result.last.details).toBe('Health check failed: connect ECONNREFUSED');
    expect(urls).toHaveLength(2);
    expect(sleeps).toEqual([500]);
  });
});

describe('checkHealthEndpoint', () => {
  let server: Server;
  let port: number;

  beforeAll(async () => {
    server = createServer((req, res) => {
      if (req.url === '/api/health') {
        res.writeHead(200, { 'Content-Type': 'application/json' });
        res.end(JSON.stringify({ status: 'ok', message: 'UniMate API is running' }));
      } else {
        res.writeHead(404);
        res.end();
      }
    });
    port = await listen(server);
  });

  afterAll(async () => {
    await new Promise<void>(resolve => server.close(() => resolve()));
  });

  it('should report running on a 200 response', async () => {
    const result = await checkHealthEndpoint({ url: `http://127.0.0.1:${port}/api/health`, timeoutMs: 2000 });

    expect(result.running).toBe(true);
    expect(result.method).toBe('health_check');
    expect(result.details).toBe('Health endpoint responded with status 200');
  });

  it('should report not running on other status codes', async () => {
    const result = await checkHealthEndpoint({ url: `http://127.0.0.1:${port}/missing`, timeoutMs: 2000 });

    expect(result.running).toBe(false);
    expect(result.details).toBe('Health endpoint returned status 404');
  });

  it('should report a refused connection', async () => {
    const closed = createServer();
    const closedPort = await listen(closed);
    await new Promise<void>(resolve => closed.close(() => resolve()));

    const result = await checkHealthEndpoint({ url: `http://127.0.0.1:${closedPort}/api/health`, timeoutMs: 2000 });

    expect(result.running).toBe(false);
    expect(result.details).toMatch(/^Health check failed: /);
  });
});

describe('ServerDetector', () => {
  let dir: string;
  let pidPath: string;
  let runner: FakeProcessRunner;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'unimate-detect-'));
    pidPath = join(dir, 'unimate-server.pid');
    runner = new FakeProcessRunner();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  const down: HealthProbe = async () => status(false, 'Health check failed: connect ECONNREFUSED');
  const up: HealthProbe = async () => status(true, 'Health endpoint responded with status 200');

  it('should prefer the health endpoint', async () => {
    writeFileSync(pidPath, '99\n');
    const detector = new ServerDetector(runner, up);

    const result = await detector.detect('http://localhost:5000/api/health', pidPath);

    expect(result).toMatchObject({ running: true, method: 'health_check', pid: 99 });
  });

  it('should fall back to a live PID from the PID file', async () => {
    writeFileSync(pidPath, '99\n');
    runner.alive.add(99);
    const detector = new ServerDetector(runner, down);

    const result = await detector.detect('http://localhost:5000/api/health', pidPath);

    expect(result).toMatchObject({ running: true, method: 'pid_file', pid: 99 });
    expect(result.details).toBe('Process 99 is running but Health check failed: connect ECONNREFUSED');
  });

  it('should flag a stale PID file', async () => {
    writeFileSync(pidPath, '99\n');
    const detector = new ServerDetector(runner, down);

    const result = await detector.detect('http://localhost:5000/api/health', pidPath);

    expect(result).toMatchObject({ running: false, method: 'pid_file', pid: 99 });
    expect(result.details).toBe('Stale PID file (process 99 not found)');
  });

  it('should report nothing when there is no PID file', async () => {
    const detector = new ServerDetector(runner, down);

    const result = await detector.detect('http://localhost:5000/api/health', pidPath);

    expect(result.running).toBe(false);
    expect(result.method).toBe('none');
  });
});

describe('readPidFile', () => {
  it('should ignore missing and unparsable files', () => {
    const dir = mkdtempSync(join(tmpdir(), 'unimate-pid-'));
    try {
      expect(readPidFile(join(dir, 'absent.pid'))).toBeUndefined();
      writeFileSync(join(dir, 'bad.pid'), 'not-a-pid');
      expect(readPidFile(join(dir, 'bad.pid'))).toBeUndefined();
      writeFileSync(join(dir, 'good.pid'), ' 1234 \n');
      expect(readPidFile(join(dir, 'good.pid'))).toBe(1234);
    } finally {
      rmSync(dir, { recursive: true, force: true });
    }
  });
});
