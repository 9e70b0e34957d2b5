/**
 * Start Command
 *
 * Prepare the environment, run the API server, and stop it on a key press.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { Launcher, printBanner, setupShutdown, ConsoleReporter, waitForKeypress } from '../../launch/index.js';
import { NodeProcessRunner } from '../../services/ProcessRunner.js';
import { resolveSettings, type CommonOptions } from '../options.js';

export const startCommand = new Command('start')
  .description('Check the environment, start the API server, and stop it on any key')
  .option('-C, --cwd <dir>', 'Project root containing api_server.py (default: current directory)')
  .option('-p, --port <number>', 'API server port (default 5000)')
  .option('--no-pause', 'Do not wait for a key before exiting')
  .action(async (options: CommonOptions) => {
    printBanner('API Launcher');

    try {
      const settings = resolveSettings(options);
      const launcher = new Launcher(settings, {
        runner: new NodeProcessRunner(),
        reporter: new ConsoleReporter(),
        waitForKey: waitForKeypress
      });

      // Ctrl+C while the server runs still stops it
      const removeHandlers = setupShutdown(async () => {
        await launcher.shutdown();
      });

      const exitCode = await launcher.run();
      removeHandlers();
      process.exit(exitCode);
    } catch (error) {
      console.error(chalk.red('[Fatal] Startup failed:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
