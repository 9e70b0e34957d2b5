import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { checkExitCode, runChecks } from './checks.js';
import { loadSettings } from '../config/index.js';
import type { LauncherSettings } from '../config/types.js';
import { FakeProcessRunner, failed, notFound, ok } from '../test/FakeProcessRunner.js';

describe('runChecks', () => {
  let root: string;
  let settings: LauncherSettings;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'unimate-check-'));
    settings = loadSettings({ root, python: { candidates: ['python'] } }, {});
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should pass when everything is in place', async () => {
    writeFileSync(join(root, '.env'), 'GOOGLE_API_KEY=test-secret\n');
    const runner = new FakeProcessRunner((_command, args) => (args[0] === '--version' ? ok('Python 3.12.1\n') : ok()));
    const steps: string[] = [];

    const outcomes = await runChecks(settings, runner, (text) => steps.push(text));

    expect(outcomes).toEqual([
      { name: 'Python', ok: true, detail: 'Python 3.12.1 (python)' },
      { name: 'Config', ok: true, detail: 'GOOGLE_API_KEY test-sec...cret, model gemini-2.5-flash' },
      { name: 'Deps', ok: true, detail: 'flask is installed' }
    ]);
    expect(steps).toEqual(['Looking for Python...', 'Reading configuration...', 'Importing flask...']);
    expect(checkExitCode(outcomes)).toBe(0);
  });

  it('should fail every check when Python and .env are missing', async () => {
    const runner = new FakeProcessRunner((command) => notFound(command));

    const outcomes = await runChecks(settings, runner);

    expect(outcomes).toEqual([
      { name: 'Python', ok: false, detail: 'Python is not installed or not on PATH (tried: python)' },
      { name: 'Config', ok: false, detail: '.env not found (run: unimate init)' },
      { name: 'Deps', ok: false, detail: 'skipped (no Python)' }
    ]);
    expect(checkExitCode(outcomes)).toBe(1);
  });

  it('should fail on the placeholder key', async () => {
    writeFileSync(join(root, '.env'), 'GOOGLE_API_KEY=your_gemini_api_key_here\n');
    const runner = new FakeProcessRunner(() => ok('Python 3.12.1\n'));

    const outcomes = await runChecks(settings, runner);

    expect(outcomes[1]).toEqual({ name: 'Config', ok: false, detail: 'GOOGLE_API_KEY is still the placeholder' });
    expect(checkExitCode(outcomes)).toBe(1);
  });

  it('should accept a missing module when the manifest can install it', async () => {
    writeFileSync(join(root, '.env'), 'GOOGLE_API_KEY=test-secret\n');
    writeFileSync(join(root, 'requirements.txt'), 'flask\n');
    const runner = new FakeProcessRunner((_command, args) => (args[0] === '-c' ? failed(1) : ok('Python 3.12.1\n')));

    const outcomes = await runChecks(settings, runner);

    expect(outcomes[2]).toEqual({ name: 'Deps', ok: true, detail: 'flask missing, will install from requirements.txt on start' });
    expect(runner.callsWith('pip')).toHaveLength(0);
    expect(checkExitCode(outcomes)).toBe(0);
  });

  it('should fail a missing module without a manifest', async () => {
    writeFileSync(join(root, '.env'), 'GOOGLE_API_KEY=test-secret\n');
    const runner = new FakeProcessRunner((_command, args) => (args[0] === '-c' ? failed(1) : ok('Python 3.12.1\n')));

    const outcomes = await runChecks(settings, runner);

    expect(outcomes[2]).toEqual({ name: 'Deps', ok: false, detail: 'flask missing and requirements.txt not found' });
    expect(checkExitCode(outcomes)).toBe(1);
  });
});
