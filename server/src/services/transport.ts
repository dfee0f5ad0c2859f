import { Readable } from 'stream';

export type HttpMethod = 'GET' | 'POST' | 'DELETE';

export interface BasicAuth {
  username: string;
  password: string;
}

export interface TransportRequestOptions {
  /** Request timeout in ms (overrides default) */
  timeout?: number;

  /** Sent as an `Authorization: Basic` header when present */
  auth?: BasicAuth;

  /** Parse the body as JSON (default: true). Off for calls that answer with nothing. */
  expectBody?: boolean;
}

export interface TransportResponse<T = unknown> {
  data: T;
  status: number;
}

export type TransportErrorCode =
  | 'NETWORK_ERROR'  // Device unreachable
  | 'TIMEOUT'        // No response within the timeout
  | 'HTTP_ERROR'     // Non-2xx status
  | 'PARSE_ERROR';   // Body was not the expected JSON

export class TransportError extends Error {
  constructor(
    message: string,
    public readonly code: TransportErrorCode,
    public readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'TransportError';

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, TransportError);
    }
  }
}

/**
 * One scanner's HTTP surface. The device client only talks through this, so
 * tests can swap in an in-memory fake.
 */
export interface Transport {
  readonly baseUrl: string;

  request<TBody = unknown>(
    method: HttpMethod,
    path: string,
    body?: TBody,
    options?: TransportRequestOptions
  ): Promise<TransportResponse>;

  /** Open a GET whose body is consumed incrementally. */
  stream(path: string, options?: TransportRequestOptions): Promise<Readable>;
}

export interface HttpTransportConfig {
  /** Base URL (e.g., "http://192.168.1.20:8080/") */
  baseUrl: string;

  /** Default timeout in ms (default: 5000) */
  timeout?: number;
}

const DEFAULT_TIMEOUT = 5000;

/**
 * HTTP transport over the global fetch. Requests are not retried: an
 * unreachable scanner fails the current cycle and the caller decides when to
 * try again.
 *
 * ```typescript
 * const transport = new HttpTransport({ baseUrl: 'http://192.168.1.20:8080/' });
 * const { data } = await transport.request('GET', '/hello.json');
 * ```
 */
export class HttpTransport implements Transport {
  readonly baseUrl: string;
  private readonly timeout: number;

  constructor(config: HttpTransportConfig) {
    this.baseUrl = config.baseUrl.endsWith('/') ? config.baseUrl : `${config.baseUrl}/`;
    this.timeout = config.timeout ?? DEFAULT_TIMEOUT;
  }

  async request<TBody = unknown>(
    method: HttpMethod,
    path: string,
    body?: TBody,
    options: TransportRequestOptions = {}
  ): Promise<TransportResponse> {
    return this.withTimeout(method, path, options, async (signal) => {
      const response = await this.send(method, path, body, options.auth, signal);

      let data: unknown;
      if (options.expectBody ?? true) {
        const text = await response.text();
        try {
          data = JSON.parse(text);
        } catch (error) {
          throw new TransportError(
            `Invalid JSON from ${method} ${path}`,
            'PARSE_ERROR',
            response.status,
            { cause: error }
          );
        }
      } else {
        await response.body?.cancel();
      }

      return { data, status: response.status };
    });
  }

  async stream(path: string, options: TransportRequestOptions = {}): Promise<Readable> {
    const timeout = options.timeout ?? this.timeout;
    const controller = new AbortController();
    const connectTimer = setTimeout(() => controller.abort(), timeout);

    let response: Response;
    try {
      response = await this.send('GET', path, undefined, options.auth, controller.signal);
    } catch (error) {
      throw this.normalizeError(error, 'GET', path);
    } finally {
      clearTimeout(connectTimer);
    }
    if (!response.body) {
      throw new TransportError(`Empty body from GET ${path}`, 'PARSE_ERROR', response.status);
    }

    // Past the headers the same budget applies to the gap between chunks
    const body = Readable.fromWeb(response.body);
    const idleTimer = setTimeout(() => {
      body.destroy(new TransportError(`GET ${path} timed out`, 'TIMEOUT'));
      controller.abort();
    }, timeout);

    const normalize = (error: unknown) => this.normalizeError(error, 'GET', path);
    async function* chunks(): AsyncGenerator<Buffer> {
      try {
        for await (const chunk of body) {
          idleTimer.refresh();
          yield Buffer.from(chunk);
        }
      } catch (error) {
        throw normalize(error);
      } finally {
        clearTimeout(idleTimer);
      }
    }
    return Readable.from(chunks(), { objectMode: false });
  }

  private buildUrl(path: string): string {
    return new URL(path.replace(/^\//, ''), this.baseUrl).toString();
  }

  private buildHeaders(hasBody: boolean, auth?: BasicAuth): Record<string, string> {
    const headers: Record<string, string> = { Accept: 'application/json' };
    if (hasBody) headers['Content-Type'] = 'application/json';
    if (auth) {
      const token = Buffer.from(`${auth.username}:${auth.password}`).toString('base64');
      headers.Authorization = `Basic ${token}`;
    }
    return headers;
  }

  /**
   * Execute a single request (no retry logic) and reject non-2xx statuses.
   */
  private async send(
    method: HttpMethod,
    path: string,
    body: unknown,
    auth: BasicAuth | undefined,
    signal: AbortSignal
  ): Promise<Response> {
    const response = await fetch(this.buildUrl(path), {
      method,
      headers: this.buildHeaders(body !== undefined, auth),
      body: body !== undefined ? JSON.stringify(body) : undefined,
      signal,
    });

    if (!response.ok) {
      await response.body?.cancel();
      throw new TransportError(
        `HTTP ${response.status}: ${response.statusText}`,
        'HTTP_ERROR',
        response.status
      );
    }
    return response;
  }

  private async withTimeout<T>(
    method: HttpMethod,
    path: string,
    options: TransportRequestOptions,
    run: (signal: AbortSignal) => Promise<T>
  ): Promise<T> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), options.timeout ?? this.timeout);

    try {
      return await run(controller.signal);
    } catch (error) {
      throw this.normalizeError(error, method, path);
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private normalizeError(error: unknown, method: HttpMethod, path: string): TransportError {
    if (error instanceof TransportError) return error;

    if (error instanceof Error && error.name === 'AbortError') {
      return new TransportError(`${method} ${path} timed out`, 'TIMEOUT', undefined, { cause: error });
    }

    // fetch rejects with a TypeError when the connection itself fails
    const message = error instanceof Error ? error.message : String(error);
    return new TransportError(
      `Network error on ${method} ${path} (${message})`,
      'NETWORK_ERROR',
      undefined,
      { cause: error }
    );
  }
}
