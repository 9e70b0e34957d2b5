/**
 * Init Command
 *
 * Create the .env template and the data directories without starting anything.
 */

import { Command } from 'commander';
import { join } from 'path';
import chalk from 'chalk';
import { ensureDirectories, ensureEnvFile, API_KEY_VAR } from '../../launch/index.js';
import { resolveSettings, type CommonOptions } from '../options.js';

export const initCommand = new Command('init')
  .description('Create .env from the template and provision the data directories')
  .option('-C, --cwd <dir>', 'Project root (default: current directory)')
  .action((options: CommonOptions) => {
    try {
      const settings = resolveSettings(options);
      const created = ensureEnvFile(join(settings.root, settings.envFile));

      if (created) {
        console.log(chalk.green('✓'), `Created ${settings.envFile}`);
      } else {
        console.log(chalk.dim('•'), `${settings.envFile} already exists, left unchanged`);
      }

      for (const dir of ensureDirectories(settings.root, settings.directories)) {
        console.log(dir.created ? chalk.green('✓') : chalk.dim('•'), dir.path, dir.created ? '' : chalk.dim('(exists)'));
      }

      console.log();
      console.log(chalk.cyan('Next steps:'));
      console.log(`  Set ${API_KEY_VAR} in ${settings.envFile}`);
      console.log('  unimate start');
    } catch (error) {
      console.error(chalk.red('Initialization failed:'), error instanceof Error ? error.message : error);
      process.exit(1);
    }
  });
