import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { ensureDependencies, findInterpreter } from './python.js';
import { InterpreterNotFoundError, ManifestNotFoundError } from '../core/errors.js';
import { DEFAULT_LAUNCHER_SETTINGS } from '../config/types.js';
import { FakeProcessRunner, failed, notFound, ok } from '../test/FakeProcessRunner.js';

const python = { command: 'python', version: 'Python 3.12.1' };
const config = DEFAULT_LAUNCHER_SETTINGS.python;

describe('findInterpreter', () => {
  it('should return the first candidate that answers', async () => {
    const runner = new FakeProcessRunner((command) =>
      command === 'python3' ? ok('Python 3.11.4\n') : notFound(command)
    );

    const interpreter = await findInterpreter(runner, ['python', 'python3']);

    expect(interpreter).toEqual({ command: 'python3', version: 'Python 3.11.4' });
    expect(runner.calls.map(c => [c.command, ...c.args])).toEqual([
      ['python', '--version'],
      ['python3', '--version']
    ]);
  });

  it('should read a version printed on stderr', async () => {
    const runner = new FakeProcessRunner(() => ({ code: 0, stdout: '', stderr: 'Python 2.7.18\n' }));

    const interpreter = await findInterpreter(runner, ['python']);

    expect(interpreter.version).toBe('Python 2.7.18');
  });

  it('should treat a non-zero exit as not installed', async () => {
    const runner = new FakeProcessRunner(() => failed(9009));

    const error = await findInterpreter(runner, ['python', 'py']).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(InterpreterNotFoundError);
    expect(error).toMatchObject({
      candidates: ['python', 'py'],
      exitCode: 1,
      message: 'Python is not installed or not on PATH (tried: python, py)'
    });
  });
});

describe('ensureDependencies', () => {
  let root: string;

  beforeEach(() => {
    root = mkdtempSync(join(tmpdir(), 'unimate-deps-'));
  });

  afterEach(() => {
    rmSync(root, { recursive: true, force: true });
  });

  it('should not install when the module imports', async () => {
    const runner = new FakeProcessRunner(() => ok());

    const result = await ensureDependencies(runner, python, config, root);

    expect(result).toEqual({ status: 'present', module: 'flask' });
    expect(runner.calls).toHaveLength(1);
    expect(runner.calls[0].args).toEqual(['-c', 'import flask']);
    expect(runner.calls[0].options?.cwd).toBe(root);
  });

  it('should install from the manifest exactly once when the module is missing', async () => {
    writeFileSync(join(root, 'requirements.txt'), 'flask\nflask-cors\n');
    const runner = new FakeProcessRunner((_command, args) => (args[0] === '-c' ? failed(1) : ok()));

    const result = await ensureDependencies(runner, python, config, root);

    expect(result).toEqual({ status: 'installed', module: 'flask', installExitCode: 0 });
    const installs = runner.callsWith('pip');
    expect(installs).toHaveLength(1);
    expect(installs[0]).toEqual({
      command: 'python',
      args: ['-m', 'pip', 'install', '-r', 'requirements.txt'],
      options: { cwd: root, stdio: 'inherit' }
    });
  });

  it('should report a failed install without throwing', async () => {
    writeFileSync(join(root, 'requirements.txt'), 'flask\n');
    const runner = new FakeProcessRunner(() => failed(1));

    const result = await ensureDependencies(runner, python, config, root);

    expect(result.status).toBe('install_failed');
    expect(result.installExitCode).toBe(1);
  });

  it('should fail when the module is missing and there is no manifest', async () => {
    const runner = new FakeProcessRunner(() => failed(1));

    const error = await ensureDependencies(runner, python, config, root).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ManifestNotFoundError);
    expect(error).toMatchObject({ manifestPath: 'requirements.txt' });
    expect(runner.callsWith('pip')).toHaveLength(0);
  });
});
