#!/usr/bin/env node
import path from 'path';
import { createDiscovery } from './app.js';
import { loadConfig } from './config.js';
import { createLogger } from './logger.js';
import { transferAll } from './services/scanTransfer.js';

/**
 * One pass over every scanner on the network: download all scans into the
 * given directory (default: the working directory) and clear the devices.
 * Scheduling repeated passes is left to cron or a process supervisor.
 */
async function main(argv: string[]): Promise<number> {
  const config = loadConfig();
  const logger = createLogger(config.logLevel);
  const destinationDir = path.resolve(argv[0] ?? process.cwd());

  const discovery = createDiscovery(config, logger);
  const { clients, failures } = await discovery.discoverClients();
  for (const client of clients) {
    logger.info(`Discovered ${client.describe()}`);
  }

  const outcomes = await transferAll(clients, { destinationDir, logger });
  for (const outcome of outcomes) {
    if (outcome.status === 'fulfilled') {
      for (const delivery of outcome.result.delivered) {
        logger.info(`Saved ${delivery.path}`);
      }
      logger.info(`Deleted ${outcome.result.deleted.length} scans from ${outcome.device.description}`);
    }
  }

  const failed = failures.length + outcomes.filter((o) => o.status === 'rejected').length;
  return failed === 0 ? 0 : 1;
}

main(process.argv.slice(2)).then(
  (code) => {
    process.exitCode = code;
  },
  (err: unknown) => {
    console.error('Grab failed:', err);
    process.exitCode = 1;
  }
);
