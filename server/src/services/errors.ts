import { TransportError } from './transport.js';

export type DeviceErrorKind =
  | 'DeviceUnreachable'
  | 'DeviceProtocolError'
  | 'DeviceAuthError'
  | 'CredentialNotFound'
  | 'ScanUnavailable';

/**
 * Base class for everything the scanner client surfaces. `kind` lets callers
 * tell "device unreachable" apart from "bad credential" without instanceof
 * chains.
 */
export abstract class DeviceError extends Error {
  abstract readonly kind: DeviceErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

export class DeviceUnreachableError extends DeviceError {
  readonly kind = 'DeviceUnreachable';
}

export class DeviceProtocolError extends DeviceError {
  readonly kind = 'DeviceProtocolError';
}

export class DeviceAuthError extends DeviceError {
  readonly kind = 'DeviceAuthError';
}

export class CredentialNotFoundError extends DeviceError {
  readonly kind = 'CredentialNotFound';

  constructor(public readonly deviceId: string, public readonly store: string) {
    super(`No password for scanner ${deviceId} in ${store}`);
  }
}

/** Expected per-record failure: the listing named a scan the device no longer has. */
export class ScanUnavailableError extends DeviceError {
  readonly kind = 'ScanUnavailable';

  constructor(public readonly scanName: string, public readonly status?: number) {
    super(`Scan ${scanName} is no longer available${status ? ` (HTTP ${status})` : ''}`);
  }
}

export function isAuthStatus(status: number | undefined): boolean {
  return status === 401 || status === 403;
}

/**
 * Map a transport failure onto the device error taxonomy. Errors that did
 * not come from the transport are returned untouched.
 */
export function toDeviceError(error: unknown, operation: string): unknown {
  if (!(error instanceof TransportError)) return error;

  switch (error.code) {
    case 'NETWORK_ERROR':
    case 'TIMEOUT':
      return new DeviceUnreachableError(`${operation}: ${error.message}`, { cause: error });
    case 'HTTP_ERROR':
      if (isAuthStatus(error.status)) {
        return new DeviceAuthError(`${operation}: scanner rejected the credentials`, { cause: error });
      }
      return new DeviceProtocolError(`${operation}: ${error.message}`, { cause: error });
    case 'PARSE_ERROR':
      return new DeviceProtocolError(`${operation}: ${error.message}`, { cause: error });
  }
}

export function describeError(error: unknown): { kind: string; message: string } {
  if (error instanceof DeviceError) return { kind: error.kind, message: error.message };
  if (error instanceof Error) return { kind: 'Unknown', message: error.message };
  return { kind: 'Unknown', message: String(error) };
}
