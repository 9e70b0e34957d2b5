/**
 * Check Command
 *
 * Run the pre-launch checks without installing or starting anything.
 */

import { Command } from 'commander';
import chalk from 'chalk';
import ora from 'ora';
import { runChecks, checkExitCode } from '../../launch/index.js';
import { NodeProcessRunner } from '../../services/ProcessRunner.js';
import { resolveSettings, type CommonOptions } from '../options.js';

export const checkCommand = new Command('check')
  .description('Check Python, .env and dependencies without launching the server')
  .option('-C, --cwd <dir>', 'Project root (default: current directory)')
  .action(async (options: CommonOptions) => {
    const settings = resolveSettings(options);
    const spinner = ora().start();
    const outcomes = await runChecks(settings, new NodeProcessRunner(), (text) => {
      spinner.text = text;
    });

    const failed = outcomes.filter(o => !o.ok);
    if (failed.length === 0) {
      spinner.succeed(chalk.green('All checks passed'));
    } else {
      spinner.fail(chalk.red(`${failed.length} check(s) failed`));
    }

    console.log();
    for (const outcome of outcomes) {
      const icon = outcome.ok ? chalk.green('✓') : chalk.red('✗');
      console.log(`  ${icon} ${outcome.name.padEnd(8)}${outcome.detail}`);
    }
    console.log();

    process.exitCode = checkExitCode(outcomes);
  });
