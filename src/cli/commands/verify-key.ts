/**
 * Verify Key Command
 *
 * Send a short prompt to Gemini with the configured key and model.
 */

import { Command } from 'commander';
import { join } from 'path';
import chalk from 'chalk';
import ora from 'ora';
import { getEnvSummary, loadEnvironment, verifyApiKey, type LauncherEnvironment } from '../../launch/index.js';
import { LauncherError } from '../../core/errors.js';
import { resolveSettings, type CommonOptions } from '../options.js';

export const verifyKeyCommand = new Command('verify-key')
  .description('Check that GOOGLE_API_KEY can reach the configured Gemini model')
  .option('-C, --cwd <dir>', 'Project root (default: current directory)')
  .action(async (options: CommonOptions) => {
    const settings = resolveSettings(options);
    let env: LauncherEnvironment;
    try {
      env = loadEnvironment(join(settings.root, settings.envFile));
    } catch (error) {
      console.error(chalk.red(error instanceof Error ? error.message : String(error)));
      process.exit(1);
    }
    console.log(getEnvSummary(env));

    const spinner = ora(`Contacting ${env.model}...`).start();
    try {
      const result = await verifyApiKey(env);
      spinner.succeed(chalk.green(`${result.model} answered`));
      console.log(chalk.dim('Response:'), result.reply);
    } catch (error) {
      spinner.fail(chalk.red('API key check failed'));
      console.error(error instanceof Error ? error.message : error);
      if (error instanceof LauncherError && error.hint) {
        console.error(chalk.dim(error.hint));
      }
      process.exit(1);
    }
  });
