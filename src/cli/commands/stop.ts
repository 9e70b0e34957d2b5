/**
 * Stop Command
 *
 * Stop a server left running by an earlier start, using its PID file.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ServerProcess, describeStopResult } from '../../launch/index.js';
import { NodeProcessRunner } from '../../services/ProcessRunner.js';
import { resolveSettings, type CommonOptions } from '../options.js';

const ICONS = {
  success: chalk.green('✓'),
  warn: chalk.yellow('⚠'),
  info: chalk.dim('·')
};

export const stopCommand = new Command('stop')
  .description('Stop the API server recorded in the PID file')
  .option('-C, --cwd <dir>', 'Project root (default: current directory)')
  .action(async (options: CommonOptions) => {
    const settings = resolveSettings(options);
    const server = new ServerProcess(new NodeProcessRunner(), settings.server, settings.root);
    const { level, message } = describeStopResult(await server.stop('pidFile'), settings.server.title);
    console.log(ICONS[level], message);
  });
