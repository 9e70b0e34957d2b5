#!/usr/bin/env node
/**
 * UniMate CLI
 *
 * Command-line launcher for the UniMate chatbot API server.
 */

import { Command } from 'commander';
import { startCommand } from './commands/start.js';
import { initCommand } from './commands/init.js';
import { checkCommand } from './commands/check.js';
import { statusCommand } from './commands/status.js';
import { stopCommand } from './commands/stop.js';
import { verifyKeyCommand } from './commands/verify-key.js';
import { endpointsCommand } from './commands/endpoints.js';

const program = new Command();

program
  .name('unimate')
  .description('UniMate - Launcher for the UniMate chatbot API server')
  .version('0.1.0');

program.addCommand(startCommand, { isDefault: true });
program.addCommand(initCommand);
program.addCommand(checkCommand);
program.addCommand(statusCommand);
program.addCommand(stopCommand);
program.addCommand(verifyKeyCommand);
program.addCommand(endpointsCommand);

program.parseAsync().catch((error: unknown) => {
  console.error('[Fatal]', error instanceof Error ? error.message : error);
  process.exit(1);
});
