import { Command } from 'commander';
import type { CliOptions } from './types.js';

export type CliAction = (options: CliOptions) => Promise<void>;

export function createProgram(action: CliAction): Command {
  const program = new Command();

  program
    .name('x-month-export')
    .description('Save all X posts for specific account(s) for a given month to JSON')
    .version('0.1.0')
    .option('--bearer-token <token>', 'OAuth 2.0 app-only Bearer token (default: $X_BEARER_TOKEN)')
    .requiredOption('--usernames <names...>', 'One or more X usernames without @')
    .requiredOption('--month <YYYY-MM>', 'Target month in YYYY-MM (UTC)')
    .option('--include-replies', 'Include replies')
    .option('--include-retweets', 'Include Retweets')
    .option('--outdir <dir>', 'Output directory', '.')
    .option('--per-page <number>', 'max_results per page (10-100)', '100')
    .option('--max-throttle-retries <number>', 'Give up after this many consecutive 429/503 responses (default: retry forever)')
    .option('--timeout-ms <number>', 'Per-request timeout in milliseconds (default: 60000, max: 300000)')
    .option('--verbose', 'Enable verbose logging')
    .action(async (options: CliOptions) => {
      await action(options);
    });

  return program;
}
