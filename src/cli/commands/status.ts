/**
 * Status Command
 */

import { Command } from 'commander';
import { join } from 'path';
import chalk from 'chalk';
import { baseUrl } from '../../config/index.js';
import { NodeProcessRunner } from '../../services/ProcessRunner.js';
import { ServerDetector } from '../../utils/ServerDetector.js';
import { resolveSettings, type CommonOptions } from '../options.js';

export const statusCommand = new Command('status')
  .description('Report whether the API server is running')
  .option('-C, --cwd <dir>', 'Project root (default: current directory)')
  .option('-p, --port <number>', 'API server port (default 5000)')
  .action(async (options: CommonOptions) => {
    const settings = resolveSettings(options);
    const detector = new ServerDetector(new NodeProcessRunner());
    const status = await detector.detect(
      `${baseUrl(settings)}${settings.health.path}`,
      join(settings.root, settings.server.pidFile),
      settings.health.timeoutMs
    );

    if (status.running) {
      console.log(chalk.green('● running'), chalk.dim(`(${status.method})`));
    } else {
      console.log(chalk.red('○ stopped'));
    }
    if (status.pid !== undefined) {
      console.log(chalk.dim('PID:'), status.pid);
    }
    if (status.details) {
      console.log(chalk.dim(status.details));
    }
  });
