import fs from 'fs/promises';
import { createWriteStream } from 'fs';
import path from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import {
  DEVICE_USERNAME,
  Endpoints,
  describeDevice,
  scanBaseName,
  scanPath,
} from '../../../shared/endpoints.js';
import { parseHello, parseHelloExtra, parseScanList, type ParseResult } from '../../../shared/responses.js';
import type { DeviceIdentity, DeviceSummary, HelloExtraInfo, ScanRecord } from '../../../shared/types.js';
import { silentLogger, type Logger } from '../logger.js';
import type { CredentialResolver } from './credentials.js';
import {
  CredentialNotFoundError,
  DeviceError,
  DeviceProtocolError,
  DeviceUnreachableError,
  ScanUnavailableError,
  isAuthStatus,
  toDeviceError,
} from './errors.js';
import {
  HttpTransport,
  TransportError,
  type BasicAuth,
  type HttpMethod,
  type Transport,
} from './transport.js';

export interface DeviceClientOptions {
  /** Consulted only when the scanner reports that it has a password */
  credentials?: CredentialResolver;
  logger?: Logger;
  /** Per-request timeout in ms for the default HTTP transport */
  timeout?: number;
  transport?: Transport;
}

function unwrap<T>(result: ParseResult<T>, operation: string): T {
  if (!result.valid) {
    throw new DeviceProtocolError(`${operation}: ${result.errors.join(', ')}`);
  }
  return result.value;
}

function streamFailure(error: unknown, operation: string): unknown {
  if (error instanceof DeviceError) return error;
  if (error instanceof TransportError) return toDeviceError(error, operation);
  // A failed local write keeps its fs error
  if (error instanceof Error && 'syscall' in error) return error;
  const message = error instanceof Error ? error.message : String(error);
  return new DeviceUnreachableError(`${operation}: ${message}`, { cause: error });
}

/**
 * Client for one scanner. Obtain instances through `DeviceClient.connect`,
 * which loads the identity before anything else can be called.
 *
 * Calls on one client are issued one at a time by its callers; separate
 * clients share nothing mutable and can run side by side.
 */
export class DeviceClient {
  // Firmware never changes while a client is alive, so the first answer sticks
  private firmware: string | undefined;

  private constructor(
    readonly baseUrl: string,
    private readonly transport: Transport,
    private readonly ident: Readonly<DeviceIdentity>,
    private readonly password: string | undefined,
    private readonly logger: Logger
  ) {}

  static async connect(baseUrl: string, options: DeviceClientOptions = {}): Promise<DeviceClient> {
    const transport = options.transport ?? new HttpTransport({ baseUrl, timeout: options.timeout });
    const logger = options.logger ?? silentLogger;
    const operation = `GET ${Endpoints.hello()}`;

    let data: unknown;
    try {
      ({ data } = await transport.request('GET', Endpoints.hello()));
    } catch (error) {
      throw toDeviceError(error, operation);
    }
    const { identity, hasPassword } = unwrap(parseHello(data), operation);

    let password: string | undefined;
    if (hasPassword) {
      if (!options.credentials) {
        throw new CredentialNotFoundError(identity.mac, 'no credential store configured');
      }
      password = await options.credentials.resolve(identity.mac);
    }

    logger.debug({ url: transport.baseUrl, mac: identity.mac, hasPassword }, 'Scanner identity loaded');
    return new DeviceClient(transport.baseUrl, transport, Object.freeze(identity), password, logger);
  }

  identity(): Readonly<DeviceIdentity> {
    return this.ident;
  }

  describe(): string {
    return describeDevice(this.ident, this.baseUrl);
  }

  summary(): DeviceSummary {
    return { url: this.baseUrl, identity: this.ident, description: this.describe() };
  }

  async firmwareDetail(): Promise<string> {
    if (this.firmware === undefined) {
      this.firmware = (await this.helloExtra()).firmware;
    }
    return this.firmware;
  }

  /** Always asks the device: power state can change during a session. */
  async isOnExternalPower(): Promise<boolean> {
    const extra = await this.helloExtra();
    return extra.connectedToExternalPower;
  }

  async listScans(): Promise<ScanRecord[]> {
    const data = await this.call('GET', Endpoints.listScans());
    return unwrap(parseScanList(data), `GET ${Endpoints.listScans()}`);
  }

  /**
   * Stream one scan into `destinationDir`, replacing any file already there.
   * The local name defaults to the remote base name.
   */
  async downloadScan(
    record: ScanRecord | string,
    destinationDir: string,
    fileName?: string
  ): Promise<string> {
    const name = typeof record === 'string' ? record : record.name;
    const remotePath = Endpoints.scan(name);
    const target = path.join(destinationDir, fileName ?? scanBaseName(name));

    let source: Readable;
    try {
      source = await this.transport.stream(remotePath, { auth: this.auth() });
    } catch (error) {
      if (error instanceof TransportError && error.code === 'HTTP_ERROR' && !isAuthStatus(error.status)) {
        throw new ScanUnavailableError(name, error.status);
      }
      throw toDeviceError(error, `GET ${remotePath}`);
    }

    try {
      await pipeline(source, createWriteStream(target));
    } catch (error) {
      await fs.rm(target, { force: true });
      throw streamFailure(error, `GET ${remotePath}`);
    }

    this.logger.debug({ scan: name, path: target }, 'Scan downloaded');
    return target;
  }

  /** One request for the whole batch; the device accepts or rejects it as a unit. */
  async deleteScans(names: readonly string[]): Promise<void> {
    if (names.length === 0) return;
    await this.call('POST', Endpoints.deleteScans(), [...names], false);
    this.logger.debug({ count: names.length }, 'Scans deleted');
  }

  /** A scan that is already gone counts as deleted. */
  async deleteScan(name: string): Promise<void> {
    const remotePath = scanPath(name);
    try {
      await this.transport.request('DELETE', remotePath, undefined, {
        auth: this.auth(),
        expectBody: false,
      });
    } catch (error) {
      if (error instanceof TransportError && error.status === 404) return;
      throw toDeviceError(error, `DELETE ${remotePath}`);
    }
  }

  async restartNetwork(): Promise<void> {
    await this.call('GET', Endpoints.restart(), undefined, false);
  }

  private async helloExtra(): Promise<HelloExtraInfo> {
    const data = await this.call('GET', Endpoints.helloExtra());
    const extra = unwrap(parseHelloExtra(data), `GET ${Endpoints.helloExtra()}`);
    // Same response carries the firmware string, refresh the cache while here
    this.firmware = extra.firmware;
    return extra;
  }

  private auth(): BasicAuth | undefined {
    return this.password === undefined
      ? undefined
      : { username: DEVICE_USERNAME, password: this.password };
  }

  private async call(
    method: HttpMethod,
    endpoint: string,
    body?: unknown,
    expectBody = true
  ): Promise<unknown> {
    try {
      const response = await this.transport.request(method, endpoint, body, {
        auth: this.auth(),
        expectBody,
      });
      return response.data;
    } catch (error) {
      throw toDeviceError(error, `${method} ${endpoint}`);
    }
  }
}
