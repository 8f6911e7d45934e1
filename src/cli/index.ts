#!/usr/bin/env node
import { orchestrateExport } from '../core/index.js';
import { handleError } from '../utils/errors.js';
import { getLogger } from '../utils/logger.js';
import { XApiClient } from '../x/client.js';
import { resolveCliConfig } from './config.js';
import { createProgram } from './program.js';

async function run(argv: string[] = process.argv): Promise<void> {
  const program = createProgram(async (options) => {
    const config = resolveCliConfig(options);
    const logger = getLogger({ verbose: config.verbose });

    if (config.verbose) {
      logger.debug('Parsed CLI arguments:');
      logger.debug(`  Usernames: ${config.usernames.join(', ')}`);
      logger.debug(`  Month: ${config.month}`);
      logger.debug(`  Output dir: ${config.outDir}`);
      logger.debug(`  Per page: ${config.perPage}`);
      logger.debug(`  Replies: ${config.includeReplies ? 'included' : 'excluded'}`);
      logger.debug(`  Retweets: ${config.includeRetweets ? 'included' : 'excluded'}`);
      if (config.maxThrottleRetries !== undefined) {
        logger.debug(`  Max throttle retries: ${config.maxThrottleRetries}`);
      }
    }

    const client = new XApiClient({
      bearerToken: config.bearerToken,
      baseUrl: config.baseUrl,
      timeoutMs: config.timeoutMs,
      maxThrottleRetries: config.maxThrottleRetries,
    });

    await orchestrateExport(client, {
      usernames: config.usernames,
      month: config.month,
      window: config.window,
      outDir: config.outDir,
      includeReplies: config.includeReplies,
      includeRetweets: config.includeRetweets,
      perPage: config.perPage,
    });
  });

  if (!argv.slice(2).length) {
    program.outputHelp();
    return;
  }

  await program.parseAsync(argv);
}

run().catch(handleError);
