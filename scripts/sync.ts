#!/usr/bin/env node

/**
 * CLI entry point
 * Usage:
 *   npm run sync -- [options]        # Fetch the catalog and replace the list
 *   npm run sync -- show [options]   # Print the current list
 */

import { SyncEngine } from '../src/engines/sync-engine.js';
import { LogRunReporter, openRunLog } from '../src/drivers/run-report.js';
import { resolveSyncConfig } from '../src/drivers/sync-config.js';
import { DesktopNotifier, SilentNotifier } from '../src/providers/desktop-notifier.js';
import { HttpFetcher } from '../src/providers/http-fetcher.js';
import { readPackageList } from '../src/services/commit-manager.js';
import type { SyncConfig } from '../src/types/sync-config.js';
import { USAGE, parseArgs, type ParsedArgs } from '../src/utils/cli-args.js';
import { errorMessage, installGlobalErrorHandlers } from '../src/utils/error-handlers.js';
import { logger } from '../src/utils/logger.js';

// Exit codes outside the run status range
const EXIT_USAGE = 64;
const EXIT_CONFIG = 78;

installGlobalErrorHandlers();

const log = logger.createContext('sync-cli');

async function runSync(config: SyncConfig): Promise<number> {
  const opened = openRunLog(config.logFile);
  if (!opened.success) {
    console.error(`Cannot initialize logging: ${opened.error}`);
    return opened.status;
  }

  const notifier = config.notify ? new DesktopNotifier() : new SilentNotifier();
  const engine = new SyncEngine(config, {
    fetcher: new HttpFetcher({ userAgent: config.userAgent }),
    reporter: new LogRunReporter(notifier)
  });

  try {
    const result = await engine.run();
    log.verbose(`Stats: ${JSON.stringify(result.stats)}`);
    return result.status;
  } finally {
    logger.detachFile();
  }
}

async function runShow(config: SyncConfig): Promise<number> {
  const packages = await readPackageList(config.listFile);
  for (const name of packages) {
    console.log(name);
  }
  return 0;
}

async function main(): Promise<number> {
  let parsed: ParsedArgs;
  try {
    parsed = parseArgs(process.argv.slice(2));
  } catch (error) {
    console.error(errorMessage(error));
    console.error(USAGE);
    return EXIT_USAGE;
  }

  if (parsed.command === 'help') {
    console.log(USAGE);
    return 0;
  }

  let config: SyncConfig;
  try {
    config = resolveSyncConfig(parsed.options);
  } catch (error) {
    console.error(errorMessage(error));
    return EXIT_CONFIG;
  }
  logger.setLevel(config.logLevel);

  return parsed.command === 'show' ? runShow(config) : runSync(config);
}

main()
  .then(code => {
    process.exitCode = code;
  })
  .catch(error => {
    log.error('Sync script failed:', error);
    process.exitCode = 1;
  });
