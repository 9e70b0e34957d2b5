/**
 * Configuration Module
 *
 * Resolves launcher settings from defaults, UNIMATE_* environment
 * variables and explicit overrides, in that order.
 */

import { resolve } from 'path';
import {
  DEFAULT_LAUNCHER_SETTINGS,
  type LauncherOverrides,
  type LauncherSettings
} from './types.js';

export { DEFAULT_LAUNCHER_SETTINGS } from './types.js';
export type {
  LauncherSettings,
  LauncherOverrides,
  ServerConfig,
  HealthConfig,
  PythonConfig
} from './types.js';

const MAX_PORT = 65535;

function parseDigits(value: string): number {
  const trimmed = value.trim();
  return /^\d+$/.test(trimmed) ? Number(trimmed) : NaN;
}

function parsePositiveInt(value: string | undefined, name: string): number | undefined {
  if (value === undefined || value.trim() === '') return undefined;
  const parsed = parseDigits(value);
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new Error(`${name} must be a positive integer, got "${value}"`);
  }
  return parsed;
}

/**
 * Parse a TCP port given as text. Used for UNIMATE_PORT and --port.
 */
export function parsePort(value: string, name: string): number {
  const port = parseDigits(value);
  if (!Number.isInteger(port) || port <= 0 || port > MAX_PORT) {
    throw new Error(`${name} must be a port between 1 and ${MAX_PORT}, got "${value}"`);
  }
  return port;
}

/**
 * Read launcher overrides from environment variables
 */
export function settingsFromEnv(env: NodeJS.ProcessEnv = process.env): LauncherOverrides {
  const overrides: LauncherOverrides = {};

  if (env.UNIMATE_ROOT) {
    overrides.root = env.UNIMATE_ROOT;
  }

  if (env.UNIMATE_PORT !== undefined && env.UNIMATE_PORT.trim() !== '') {
    overrides.server = { port: parsePort(env.UNIMATE_PORT, 'UNIMATE_PORT') };
  }

  const attempts = parsePositiveInt(env.UNIMATE_HEALTH_ATTEMPTS, 'UNIMATE_HEALTH_ATTEMPTS');
  if (attempts !== undefined) {
    overrides.health = { attempts };
  }

  if (env.UNIMATE_PYTHON) {
    overrides.python = { candidates: [env.UNIMATE_PYTHON] };
  }

  return overrides;
}

function merge(base: LauncherSettings, overrides: LauncherOverrides): LauncherSettings {
  return {
    ...base,
    ...overrides,
    server: { ...base.server, ...overrides.server },
    health: { ...base.health, ...overrides.health },
    python: { ...base.python, ...overrides.python }
  };
}

/**
 * Build the settings for one launch. The returned root is absolute.
 */
export function loadSettings(
  overrides: LauncherOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): LauncherSettings {
  const settings = merge(merge(DEFAULT_LAUNCHER_SETTINGS, settingsFromEnv(env)), overrides);
  return { ...settings, root: resolve(settings.root) };
}

export function baseUrl(settings: LauncherSettings): string {
  return `http://${settings.server.host}:${settings.server.port}`;
}
