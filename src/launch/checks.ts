/**
 * Pre-launch Checks
 *
 * Looks at Python, .env and dependencies without installing or starting
 * anything. Used by `unimate check`.
 */

import { existsSync } from 'fs';
import { join } from 'path';
import type { LauncherSettings } from '../config/types.js';
import type { ProcessRunner } from '../services/ProcessRunner.js';
import { API_KEY_VAR, isConfigured, loadEnvironment, mask } from './env.js';
import { findInterpreter, isModuleImportable, type Interpreter } from './python.js';

export interface CheckOutcome {
  name: 'Python' | 'Config' | 'Deps';
  ok: boolean;
  detail: string;
}

export async function runChecks(
  settings: LauncherSettings,
  runner: ProcessRunner,
  onStep: (text: string) => void = () => {}
): Promise<CheckOutcome[]> {
  const outcomes: CheckOutcome[] = [];

  onStep('Looking for Python...');
  let interpreter: Interpreter | undefined;
  try {
    interpreter = await findInterpreter(runner, settings.python.candidates);
    outcomes.push({ name: 'Python', ok: true, detail: `${interpreter.version} (${interpreter.command})` });
  } catch (error) {
    outcomes.push({ name: 'Python', ok: false, detail: error instanceof Error ? error.message : String(error) });
  }

  onStep('Reading configuration...');
  const envPath = join(settings.root, settings.envFile);
  if (!existsSync(envPath)) {
    outcomes.push({ name: 'Config', ok: false, detail: `${settings.envFile} not found (run: unimate init)` });
  } else {
    const env = loadEnvironment(envPath);
    outcomes.push(isConfigured(env.apiKey)
      ? { name: 'Config', ok: true, detail: `${API_KEY_VAR} ${mask(env.apiKey)}, model ${env.model}` }
      : { name: 'Config', ok: false, detail: `${API_KEY_VAR} is still the placeholder` });
  }

  const { requiredModule, manifest } = settings.python;
  if (!interpreter) {
    outcomes.push({ name: 'Deps', ok: false, detail: 'skipped (no Python)' });
    return outcomes;
  }

  onStep(`Importing ${requiredModule}...`);
  if (await isModuleImportable(runner, interpreter, requiredModule, settings.root)) {
    outcomes.push({ name: 'Deps', ok: true, detail: `${requiredModule} is installed` });
  } else if (existsSync(join(settings.root, manifest))) {
    outcomes.push({ name: 'Deps', ok: true, detail: `${requiredModule} missing, will install from ${manifest} on start` });
  } else {
    outcomes.push({ name: 'Deps', ok: false, detail: `${requiredModule} missing and ${manifest} not found` });
  }

  return outcomes;
}

/**
 * Exit code for `unimate check`
 */
export function checkExitCode(outcomes: CheckOutcome[]): 0 | 1 {
  return outcomes.every(o => o.ok) ? 0 : 1;
}
