import { EventEmitter } from 'events';
import { Readable } from 'stream';
import {
  TransportError,
  type HttpMethod,
  type Transport,
  type TransportRequestOptions,
  type TransportResponse,
} from '../src/services/transport.js';
import type { DiscoverySocket } from '../src/services/discovery.js';

export interface RecordedCall {
  method: HttpMethod;
  path: string;
  body: unknown;
  options: TransportRequestOptions;
}

type Handler = (body: unknown) => unknown;

export const BASE_URL = 'http://192.168.1.20:8080/';

export function helloBody(overrides: Record<string, unknown> = {}): Record<string, unknown> {
  return {
    model: 'DX250',
    name: 'Doxie_0A1B2C',
    firmwareWiFi: '1.29',
    hasPassword: false,
    MAC: '00:11:E5:0A:1B:2C',
    mode: 'Host',
    ...overrides,
  };
}

export function notFound(): TransportError {
  return new TransportError('HTTP 404: Not Found', 'HTTP_ERROR', 404);
}

/** In-memory scanner: JSON routes plus files served as byte streams. */
export class FakeTransport implements Transport {
  readonly calls: RecordedCall[] = [];
  private readonly routes = new Map<string, Handler>();
  private readonly files = new Map<string, Buffer>();
  private readonly streamErrors = new Map<string, Error>();
  private readonly streamBodies = new Map<string, () => Readable>();

  constructor(readonly baseUrl: string = BASE_URL) {}

  on(method: HttpMethod, path: string, handler: Handler): this {
    this.routes.set(`${method} ${path}`, handler);
    return this;
  }

  reply(method: HttpMethod, path: string, data: unknown): this {
    return this.on(method, path, () => data);
  }

  serveFile(path: string, content: Buffer): this {
    this.files.set(path, content);
    return this;
  }

  failStream(path: string, error: Error): this {
    this.streamErrors.set(path, error);
    return this;
  }

  /** Serve a hand-built body, e.g. one that fails partway through. */
  streamFrom(path: string, body: () => Readable): this {
    this.streamBodies.set(path, body);
    return this;
  }

  count(method: HttpMethod, path: string): number {
    return this.calls.filter((call) => call.method === method && call.path === path).length;
  }

  async request<TBody = unknown>(
    method: HttpMethod,
    path: string,
    body?: TBody,
    options: TransportRequestOptions = {}
  ): Promise<TransportResponse> {
    this.calls.push({ method, path, body, options });
    const handler = this.routes.get(`${method} ${path}`);
    if (!handler) throw notFound();
    const data = await handler(body);
    return { data, status: 200 };
  }

  async stream(path: string, options: TransportRequestOptions = {}): Promise<Readable> {
    this.calls.push({ method: 'GET', path, body: undefined, options });
    const error = this.streamErrors.get(path);
    if (error) throw error;
    const body = this.streamBodies.get(path);
    if (body) return body();
    const content = this.files.get(path);
    if (!content) throw notFound();

    // Several chunks, so the write side sees an incremental stream
    const chunks: Buffer[] = [];
    for (let i = 0; i < content.length; i += 4) {
      chunks.push(content.subarray(i, i + 4));
    }
    return Readable.from(chunks);
  }
}

export function ssdpReply(location: string, st = 'urn:schemas-getdoxie-com:device:Scanner:1'): string {
  return `HTTP/1.1 200 OK\r\nCACHE-CONTROL: max-age=1800\r\nLOCATION: ${location}\r\nST: ${st}\r\n\r\n`;
}

/** UDP socket stand-in that answers the search with canned replies. */
export class FakeSocket extends EventEmitter implements DiscoverySocket {
  readonly sent: Array<{ msg: string; port: number; address: string }> = [];
  closed = false;

  constructor(private readonly replies: Array<{ message: string; address: string }> = []) {
    super();
  }

  bind(callback: () => void): void {
    setImmediate(callback);
  }

  send(msg: string, port: number, address: string, callback: (error: Error | null) => void): void {
    this.sent.push({ msg, port, address });
    callback(null);
    setImmediate(() => {
      for (const reply of this.replies) {
        this.emit('message', Buffer.from(reply.message), { address: reply.address });
      }
    });
  }

  close(): void {
    this.closed = true;
  }
}
