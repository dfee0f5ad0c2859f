import type { DeviceIdentity } from './types.js';

// The scanner's API account name is fixed; only the password is configurable
export const DEVICE_USERNAME = 'doxie';

export const SCANNER_SERVICE_TYPE = 'urn:schemas-getdoxie-com:device:Scanner:1';

const SCANS_PREFIX = '/scans';

export const Endpoints = {
  hello: () => '/hello.json',
  helloExtra: () => '/hello_extra.json',
  restart: () => '/restart.json',

  listScans: () => `${SCANS_PREFIX}.json`,
  scan: (name: string) => scanPath(name),
  deleteScans: () => `${SCANS_PREFIX}/delete.json`,
} as const;

/**
 * Listing entries look like `/DOXIE/JPEG/IMG_0001.JPG`; the file itself is
 * served below `/scans`. Names that already carry the prefix are kept.
 */
export function scanPath(name: string): string {
  if (name.startsWith(SCANS_PREFIX)) return name;
  return name.startsWith('/') ? `${SCANS_PREFIX}${name}` : `${SCANS_PREFIX}/${name}`;
}

export function scanBaseName(name: string): string {
  const parts = name.split('/').filter(Boolean);
  return parts[parts.length - 1] ?? '';
}

/**
 * Local file name for a scan once it leaves the device. The device name keeps
 * files from different scanners apart when they share a directory.
 */
export function renamedScanName(deviceName: string, scanName: string): string {
  const device = deviceName.replace(/[^a-zA-Z0-9_-]+/g, '_');
  return `${device}_${scanBaseName(scanName)}`;
}

export function describeDevice(identity: DeviceIdentity, url: string): string {
  return `${identity.model} scanner ${identity.name} at ${url}`;
}

export function scanLabel(scanName: string, deviceDescription: string): string {
  return `${scanBaseName(scanName)} from ${deviceDescription}`;
}

export function normalizeMac(mac: string): string {
  return mac.trim().toUpperCase();
}
