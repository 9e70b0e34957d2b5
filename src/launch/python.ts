/**
 * Python Environment
 *
 * Locates an interpreter and makes sure the server's dependencies are
 * importable, installing them from the requirements manifest when not.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import type { ProcessRunner } from '../services/ProcessRunner.js';
import type { PythonConfig } from '../config/types.js';
import { InterpreterNotFoundError, ManifestNotFoundError } from '../core/errors.js';

export interface Interpreter {
  command: string;
  /** e.g. "Python 3.12.1" */
  version: string;
}

export type DependencyStatus = 'present' | 'installed' | 'install_failed';

export interface DependencyResult {
  status: DependencyStatus;
  module: string;
  /** Installer exit code when an install ran */
  installExitCode?: number | null;
}

/**
 * Probe each candidate with --version and return the first that answers
 */
export async function findInterpreter(
  runner: ProcessRunner,
  candidates: string[]
): Promise<Interpreter> {
  for (const command of candidates) {
    const result = await runner.run(command, ['--version']);
    if (result.code === 0) {
      // Python 2 printed its version on stderr
      const version = (result.stdout.trim() || result.stderr.trim()) || 'Python (unknown version)';
      return { command, version };
    }
  }
  throw new InterpreterNotFoundError(candidates);
}

export async function isModuleImportable(
  runner: ProcessRunner,
  interpreter: Interpreter,
  module: string,
  cwd: string
): Promise<boolean> {
  const result = await runner.run(interpreter.command, ['-c', `import ${module}`], { cwd });
  return result.code === 0;
}

/**
 * Check the required module and install from the manifest when it is missing.
 * The install result is reported, not re-verified.
 */
export async function ensureDependencies(
  runner: ProcessRunner,
  interpreter: Interpreter,
  config: PythonConfig,
  root: string
): Promise<DependencyResult> {
  if (await isModuleImportable(runner, interpreter, config.requiredModule, root)) {
    return { status: 'present', module: config.requiredModule };
  }

  const manifestPath = join(root, config.manifest);
  if (!existsSync(manifestPath)) {
    throw new ManifestNotFoundError(config.manifest);
  }

  const install = await runner.run(
    interpreter.command,
    ['-m', 'pip', 'install', '-r', config.manifest],
    { cwd: root, stdio: 'inherit' }
  );

  return {
    status: install.code === 0 ? 'installed' : 'install_failed',
    module: config.requiredModule,
    installExitCode: install.code
  };
}
