import dgram from 'dgram';
import { SCANNER_SERVICE_TYPE, normalizeMac } from '../../../shared/endpoints.js';
import {
  SSDP_MULTICAST_ADDRESS,
  SSDP_PORT,
  buildSearchRequest,
  normalizeLocation,
  parseSearchResponse,
} from '../../../shared/ssdp.js';
import type { DiscoveryFailure, DiscoveryOptions } from '../../../shared/types.js';
import { silentLogger, type Logger } from '../logger.js';
import type { DeviceClient } from './deviceClient.js';
import { describeError } from './errors.js';

const DEFAULT_OPTIONS: DiscoveryOptions = {
  multicastAddress: SSDP_MULTICAST_ADDRESS,
  port: SSDP_PORT,
  timeout: 2000,
};

/** The slice of a dgram socket discovery uses. */
export interface DiscoverySocket {
  on(event: 'message', listener: (msg: Buffer, rinfo: { address: string }) => void): void;
  on(event: 'error', listener: (err: Error) => void): void;
  bind(callback: () => void): void;
  send(msg: string, port: number, address: string, callback: (error: Error | null) => void): void;
  close(): void;
}

export interface DiscoveryServiceOptions {
  logger?: Logger;
  defaults?: Partial<DiscoveryOptions>;
  createSocket?: () => DiscoverySocket;
  connect: (baseUrl: string) => Promise<DeviceClient>;
}

export interface DiscoveryReport {
  clients: DeviceClient[];
  failures: DiscoveryFailure[];
}

export class DiscoveryService {
  private clients: Map<string, DeviceClient> = new Map();
  private readonly logger: Logger;
  private readonly defaults: DiscoveryOptions;
  private readonly createSocket: () => DiscoverySocket;
  private readonly connect: (baseUrl: string) => Promise<DeviceClient>;

  constructor(options: DiscoveryServiceOptions) {
    this.logger = options.logger ?? silentLogger;
    this.defaults = { ...DEFAULT_OPTIONS, ...options.defaults };
    this.createSocket = options.createSocket ?? (() => dgram.createSocket({ type: 'udp4', reuseAddr: true }));
    this.connect = options.connect;
  }

  getClients(): DeviceClient[] {
    return Array.from(this.clients.values());
  }

  getClient(mac: string): DeviceClient | undefined {
    return this.clients.get(normalizeMac(mac));
  }

  /**
   * Multicast one SSDP search and collect base URLs until the listen window
   * closes. A quiet network yields an empty list.
   */
  async discover(
    serviceType: string = SCANNER_SERVICE_TYPE,
    options: Partial<DiscoveryOptions> = {}
  ): Promise<string[]> {
    const opts: DiscoveryOptions = {
      multicastAddress: options.multicastAddress ?? this.defaults.multicastAddress,
      port: options.port ?? this.defaults.port,
      timeout: options.timeout ?? this.defaults.timeout,
    };
    const discovered: string[] = [];
    const seen = new Set<string>();
    const mx = Math.max(1, Math.floor(opts.timeout / 1000));

    return new Promise((resolve) => {
      const socket = this.createSocket();

      socket.on('message', (msg, rinfo) => {
        const headers = parseSearchResponse(msg.toString());
        if (!headers) return;
        if (headers.st && headers.st !== serviceType) return;

        const baseUrl = headers.location ? normalizeLocation(headers.location) : null;
        if (!baseUrl) {
          this.logger.debug({ from: rinfo.address }, 'Ignoring SSDP reply without a usable location');
          return;
        }
        if (seen.has(baseUrl)) return;
        seen.add(baseUrl);
        discovered.push(baseUrl);
      });

      socket.on('error', (err) => {
        this.logger.error({ err }, 'Discovery socket error');
      });

      socket.bind(() => {
        socket.send(
          buildSearchRequest(serviceType, mx),
          opts.port,
          opts.multicastAddress,
          (err) => {
            if (err) this.logger.error({ err }, 'Error sending discovery packet');
          }
        );
      });

      setTimeout(() => {
        try {
          socket.close();
        } catch (err) {
          this.logger.debug({ err }, 'Discovery socket already closed');
        }
        this.logger.info({ count: discovered.length, serviceType }, 'Discovery finished');
        resolve(discovered);
      }, opts.timeout);
    });
  }

  /**
   * Discover, then connect to every scanner that answered. Scanners that fail
   * to connect are reported and left out; the others replace the known set.
   */
  async discoverClients(
    serviceType: string = SCANNER_SERVICE_TYPE,
    options: Partial<DiscoveryOptions> = {}
  ): Promise<DiscoveryReport> {
    const urls = await this.discover(serviceType, options);
    const settled = await Promise.allSettled(urls.map((url) => this.connect(url)));

    const clients: DeviceClient[] = [];
    const failures: DiscoveryFailure[] = [];

    settled.forEach((result, i) => {
      if (result.status === 'fulfilled') {
        clients.push(result.value);
        return;
      }
      const failure = { url: urls[i], ...describeError(result.reason) };
      this.logger.warn(failure, 'Could not connect to scanner');
      failures.push(failure);
    });

    this.clients = new Map(clients.map((client) => [normalizeMac(client.identity().mac), client]));
    return { clients, failures };
  }
}
