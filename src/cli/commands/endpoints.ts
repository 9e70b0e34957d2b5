import { Command } from 'commander';
import chalk from 'chalk';
import { API_ENDPOINTS, formatEndpoint } from '../../launch/index.js';
import { baseUrl } from '../../config/index.js';
import { resolveSettings, type CommonOptions } from '../options.js';

export const endpointsCommand = new Command('endpoints')
  .description('List the routes the API server exposes')
  .option('-p, --port <number>', 'API server port (default 5000)')
  .action((options: CommonOptions) => {
    const settings = resolveSettings(options);
    console.log(chalk.cyan(`UniMate API at ${baseUrl(settings)}`));
    console.log(chalk.dim('─'.repeat(40)));
    for (const endpoint of API_ENDPOINTS) {
      console.log(formatEndpoint(endpoint));
    }
  });
