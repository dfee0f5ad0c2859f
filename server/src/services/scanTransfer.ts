import fs from 'fs/promises';
import { renamedScanName, scanLabel } from '../../../shared/endpoints.js';
import type { ScanDelivery, TransferOutcome, TransferResult } from '../../../shared/types.js';
import { silentLogger, type Logger } from '../logger.js';
import type { DeviceClient } from './deviceClient.js';
import { ScanUnavailableError, describeError } from './errors.js';

/**
 * Receives each downloaded scan. Resolve `true` once the file has been taken
 * over (mailed, archived, ...) and the working copy may be removed.
 */
export type ScanHandoff = (delivery: ScanDelivery) => Promise<boolean>;

export interface TransferOptions {
  destinationDir: string;
  handoff?: ScanHandoff;
  logger?: Logger;
}

/**
 * One grab cycle for one scanner: download every listed scan, hand each one
 * off, then clear the device's backlog with a single delete.
 *
 * The delete names every record of the listing, including scans that turned
 * out to be unavailable: the device keeps reporting records whose files are
 * gone, and deleting them is how that backlog gets cleared. Any failure other
 * than an unavailable scan aborts the cycle before the delete, so nothing is
 * removed from the device that was not handed off.
 */
export async function transferScans(
  client: DeviceClient,
  options: TransferOptions
): Promise<TransferResult> {
  const logger = options.logger ?? silentLogger;
  const result: TransferResult = { delivered: [], unavailable: [], deleted: [] };

  const scans = await client.listScans();
  if (scans.length === 0) {
    logger.debug({ device: client.describe() }, 'No scans waiting');
    return result;
  }

  await fs.mkdir(options.destinationDir, { recursive: true });
  const { name: deviceName } = client.identity();
  const description = client.describe();

  for (const scan of scans) {
    let localPath: string;
    try {
      localPath = await client.downloadScan(
        scan,
        options.destinationDir,
        renamedScanName(deviceName, scan.name)
      );
    } catch (error) {
      if (error instanceof ScanUnavailableError) {
        logger.warn({ scan: scan.name, status: error.status }, 'Listed scan is no longer on the device, skipping');
        result.unavailable.push(scan.name);
        continue;
      }
      throw error;
    }

    const delivery: ScanDelivery = {
      name: scan.name,
      path: localPath,
      label: scanLabel(scan.name, description),
    };
    logger.info({ scan: scan.name, path: localPath }, 'Saved scan');

    if (options.handoff && (await options.handoff(delivery))) {
      await fs.rm(localPath, { force: true });
      logger.debug({ path: localPath }, 'Removed working copy after handoff');
    }
    result.delivered.push(delivery);
  }

  const names = scans.map((scan) => scan.name);
  await client.deleteScans(names);
  result.deleted = names;
  logger.info({ device: description, count: names.length }, 'Deleted scans from device');

  return result;
}

/**
 * Run a cycle on every client at once. One scanner failing never affects the
 * others; each outcome carries either the result or the error kind.
 */
export async function transferAll(
  clients: readonly DeviceClient[],
  options: TransferOptions
): Promise<TransferOutcome[]> {
  const logger = options.logger ?? silentLogger;
  const settled = await Promise.allSettled(clients.map((client) => transferScans(client, options)));

  return settled.map((outcome, i): TransferOutcome => {
    const device = clients[i].summary();
    if (outcome.status === 'fulfilled') {
      return { device, status: 'fulfilled', result: outcome.value };
    }
    const { kind, message } = describeError(outcome.reason);
    logger.error({ device: device.description, kind, err: outcome.reason }, 'Grab cycle failed');
    return { device, status: 'rejected', kind, message };
  });
}
