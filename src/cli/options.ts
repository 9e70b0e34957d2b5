/**
 * Options shared by the CLI commands
 */

import { loadSettings, parsePort, type LauncherOverrides, type LauncherSettings } from '../config/index.js';

export interface CommonOptions {
  /** Project root */
  cwd?: string;
  port?: string;
  /** false when --no-pause is given */
  pause?: boolean;
}

export function resolveSettings(options: CommonOptions, env: NodeJS.ProcessEnv = process.env): LauncherSettings {
  const overrides: LauncherOverrides = {};

  if (options.cwd !== undefined) {
    overrides.root = options.cwd;
  }
  if (options.pause !== undefined) {
    overrides.pause = options.pause;
  }
  if (options.port !== undefined) {
    overrides.server = { port: parsePort(options.port, '--port') };
  }

  return loadSettings(overrides, env);
}
