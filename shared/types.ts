export type DeviceMode = 'Host' | 'Client';

interface IdentityFields {
  model: string;
  name: string;
  mac: string;
  firmwareWifi: string;
}

// `network` is only reported while the scanner is joined to another network
export type DeviceIdentity =
  | (IdentityFields & { mode: 'Host' })
  | (IdentityFields & { mode: 'Client'; network: string });

export interface HelloInfo {
  identity: DeviceIdentity;
  hasPassword: boolean;
}

export interface HelloExtraInfo {
  firmware: string;
  connectedToExternalPower: boolean;
}

export interface ScanRecord {
  name: string;
  size: number;
  modified: string;
}

export interface DeviceSummary {
  url: string;
  identity: Readonly<DeviceIdentity>;
  description: string;
}

export interface DiscoveryOptions {
  multicastAddress: string;
  port: number;
  timeout: number;
}

export interface DiscoveryFailure {
  url: string;
  kind: string;
  message: string;
}

export interface ScanDelivery {
  name: string;
  path: string;
  label: string;
}

export interface TransferResult {
  delivered: ScanDelivery[];
  unavailable: string[];
  deleted: string[];
}

export type TransferOutcome =
  | { device: DeviceSummary; status: 'fulfilled'; result: TransferResult }
  | { device: DeviceSummary; status: 'rejected'; kind: string; message: string };
