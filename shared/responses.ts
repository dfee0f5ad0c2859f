import type { DeviceIdentity, HelloExtraInfo, HelloInfo, ScanRecord } from './types.js';

export type ParseResult<T> =
  | { valid: true; value: T }
  | { valid: false; errors: string[] };

type Fields = Record<string, unknown>;

function isRecord(value: unknown): value is Fields {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function requireString(data: Fields, key: string, errors: string[]): string {
  const value = data[key];
  if (typeof value !== 'string') {
    errors.push(`${key} must be a string`);
    return '';
  }
  return value;
}

function requireBoolean(data: Fields, key: string, errors: string[]): boolean {
  const value = data[key];
  if (typeof value !== 'boolean') {
    errors.push(`${key} must be a boolean`);
    return false;
  }
  return value;
}

/**
 * Parse the `hello` response. Fails closed: any missing required field makes
 * the whole response invalid rather than yielding a partial identity.
 */
export function parseHello(data: unknown): ParseResult<HelloInfo> {
  if (!isRecord(data)) {
    return { valid: false, errors: ['hello response must be an object'] };
  }

  const errors: string[] = [];
  const model = requireString(data, 'model', errors);
  const name = requireString(data, 'name', errors);
  const mac = requireString(data, 'MAC', errors);
  const firmwareWifi = requireString(data, 'firmwareWiFi', errors);
  const hasPassword = requireBoolean(data, 'hasPassword', errors);
  const mode = data.mode;

  let identity: DeviceIdentity | undefined;
  if (mode === 'Host') {
    identity = { model, name, mac, firmwareWifi, mode };
  } else if (mode === 'Client') {
    const network = requireString(data, 'network', errors);
    identity = { model, name, mac, firmwareWifi, mode, network };
  } else {
    errors.push('mode must be "Host" or "Client"');
  }

  if (errors.length > 0 || !identity) {
    return { valid: false, errors };
  }
  return { valid: true, value: { identity, hasPassword } };
}

export function parseHelloExtra(data: unknown): ParseResult<HelloExtraInfo> {
  if (!isRecord(data)) {
    return { valid: false, errors: ['hello_extra response must be an object'] };
  }

  const errors: string[] = [];
  const firmware = requireString(data, 'firmware', errors);
  const connectedToExternalPower = requireBoolean(data, 'connectedToExternalPower', errors);

  if (errors.length > 0) return { valid: false, errors };
  return { valid: true, value: { firmware, connectedToExternalPower } };
}

export function parseScanList(data: unknown): ParseResult<ScanRecord[]> {
  if (!Array.isArray(data)) {
    return { valid: false, errors: ['scan listing must be an array'] };
  }

  const errors: string[] = [];
  const scans: ScanRecord[] = [];

  data.forEach((entry: unknown, i) => {
    if (!isRecord(entry) || typeof entry.name !== 'string' || entry.name === '') {
      errors.push(`scan ${i} has no name`);
      return;
    }
    scans.push({
      name: entry.name,
      size: typeof entry.size === 'number' ? entry.size : 0,
      modified: typeof entry.modified === 'string' ? entry.modified : '',
    });
  });

  if (errors.length > 0) return { valid: false, errors };
  return { valid: true, value: scans };
}
