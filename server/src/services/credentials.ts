import fs from 'fs/promises';
import { normalizeMac } from '../../../shared/endpoints.js';
import { silentLogger, type Logger } from '../logger.js';
import { CredentialNotFoundError } from './errors.js';

export interface CredentialResolver {
  /** Resolve the scanner password for a MAC address, or throw CredentialNotFoundError. */
  resolve(deviceId: string): Promise<string>;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Passwords kept in a JSON file keyed by MAC address:
 *
 * ```json
 * { "00:11:E5:AA:BB:CC": { "password": "..." } }
 * ```
 *
 * The file is read once per instance; lookups after that share the parsed
 * map and never touch the disk again.
 */
export class FileCredentialStore implements CredentialResolver {
  private entries: Promise<Map<string, string>> | null = null;

  constructor(
    readonly filePath: string,
    private readonly logger: Logger = silentLogger
  ) {}

  async resolve(deviceId: string): Promise<string> {
    const entries = await this.load();
    const password = entries.get(normalizeMac(deviceId));
    if (password === undefined) {
      throw new CredentialNotFoundError(deviceId, this.filePath);
    }
    return password;
  }

  private load(): Promise<Map<string, string>> {
    if (!this.entries) {
      this.entries = this.read();
    }
    return this.entries;
  }

  private async read(): Promise<Map<string, string>> {
    const entries = new Map<string, string>();

    let content: string;
    try {
      content = await fs.readFile(this.filePath, 'utf-8');
    } catch (err) {
      this.logger.warn({ err, path: this.filePath }, 'Credential store unreadable, treating as empty');
      return entries;
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(content);
    } catch (err) {
      this.logger.warn({ err, path: this.filePath }, 'Credential store is not valid JSON');
      return entries;
    }

    if (!isRecord(parsed)) {
      this.logger.warn({ path: this.filePath }, 'Credential store must be a JSON object');
      return entries;
    }

    for (const [mac, entry] of Object.entries(parsed)) {
      if (isRecord(entry) && typeof entry.password === 'string') {
        entries.set(normalizeMac(mac), entry.password);
      }
    }
    return entries;
  }
}
