#!/usr/bin/env node
import { loadConfig } from './utils/validators';
import { createLogger } from './utils/logger';
import { FeedCatalog } from './catalog/FeedCatalog';
import { parseArgs } from './cli/args';
import { runCommand } from './cli/commands';

/**
 * Main entry point for the feed analyzer CLI
 */
function main(): number {
  const options = parseArgs(process.argv.slice(2));
  const config = loadConfig(options.feedsDir ? { feedsDir: options.feedsDir } : {});
  const logger = createLogger('feed-analyzer', {
    level: config.logLevel,
    logDir: config.logDir,
  });

  try {
    logger.debug('Configuration', {
      feedsDir: config.feedsDir,
      feedExtension: config.feedExtension,
    });

    const catalog = new FeedCatalog(
      { feedsDir: config.feedsDir, feedExtension: config.feedExtension },
      logger
    );

    return runCommand(options.command, catalog, (line) => console.log(line), options.json);
  } catch (error) {
    logger.error('Feed analyzer failed', {
      error: error instanceof Error ? error.message : String(error),
    });
    return 1;
  }
}

try {
  process.exitCode = main();
} catch (error) {
  console.error('Fatal error:', error);
  process.exitCode = 1;
}
