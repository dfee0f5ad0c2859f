import type { FastifyPluginAsync } from 'fastify';
import { SCANNER_SERVICE_TYPE } from '../../../shared/endpoints.js';
import type { DiscoveryService } from '../services/discovery.js';
import { DeviceError, type DeviceErrorKind } from '../services/errors.js';
import { transferScans } from '../services/scanTransfer.js';

export interface DeviceRoutesOptions {
  discovery: DiscoveryService;
  downloadDir: string;
}

interface DeviceParams {
  mac: string;
}

const STATUS_BY_KIND: Record<DeviceErrorKind, number> = {
  DeviceUnreachable: 502,
  DeviceProtocolError: 502,
  DeviceAuthError: 401,
  CredentialNotFound: 424,
  ScanUnavailable: 404,
};

function readDiscoverBody(body: unknown): { serviceType: string; timeout?: number } {
  if (typeof body !== 'object' || body === null) {
    return { serviceType: SCANNER_SERVICE_TYPE };
  }
  const serviceType = 'serviceType' in body ? body.serviceType : undefined;
  const timeout = 'timeout' in body ? body.timeout : undefined;
  return {
    serviceType: typeof serviceType === 'string' && serviceType ? serviceType : SCANNER_SERVICE_TYPE,
    timeout: typeof timeout === 'number' && timeout > 0 ? Math.min(timeout, 30000) : undefined,
  };
}

export const deviceRoutes: FastifyPluginAsync<DeviceRoutesOptions> = async (app, opts) => {
  const { discovery, downloadDir } = opts;

  app.setErrorHandler((error, req, reply) => {
    if (error instanceof DeviceError) {
      req.log.warn({ err: error, kind: error.kind }, 'Scanner request failed');
      return reply.code(STATUS_BY_KIND[error.kind]).send({ error: error.message, kind: error.kind });
    }
    req.log.error({ err: error }, 'Request failed');
    return reply.code(error.statusCode ?? 500).send({ error: error.message });
  });

  // Scanners found by the last discovery
  app.get('/devices', async () => {
    return { devices: discovery.getClients().map((client) => client.summary()) };
  });

  // Trigger new discovery
  app.post('/devices/discover', async (req) => {
    const { serviceType, timeout } = readDiscoverBody(req.body);
    const { clients, failures } = await discovery.discoverClients(serviceType, { timeout });
    return { devices: clients.map((client) => client.summary()), failures };
  });

  app.get<{ Params: DeviceParams }>('/devices/:mac', async (req, reply) => {
    const client = discovery.getClient(req.params.mac);
    if (!client) {
      return reply.code(404).send({ error: 'Device not found' });
    }
    return { device: client.summary() };
  });

  app.get<{ Params: DeviceParams }>('/devices/:mac/scans', async (req, reply) => {
    const client = discovery.getClient(req.params.mac);
    if (!client) {
      return reply.code(404).send({ error: 'Device not found' });
    }
    return { scans: await client.listScans() };
  });

  app.get<{ Params: DeviceParams }>('/devices/:mac/power', async (req, reply) => {
    const client = discovery.getClient(req.params.mac);
    if (!client) {
      return reply.code(404).send({ error: 'Device not found' });
    }
    const externalPower = await client.isOnExternalPower();
    return { externalPower, firmware: await client.firmwareDetail() };
  });

  app.post<{ Params: DeviceParams }>('/devices/:mac/grab', async (req, reply) => {
    const client = discovery.getClient(req.params.mac);
    if (!client) {
      return reply.code(404).send({ error: 'Device not found' });
    }
    return transferScans(client, { destinationDir: downloadDir, logger: req.log });
  });

  app.post<{ Params: DeviceParams }>('/devices/:mac/restart', async (req, reply) => {
    const client = discovery.getClient(req.params.mac);
    if (!client) {
      return reply.code(404).send({ error: 'Device not found' });
    }
    await client.restartNetwork();
    return { success: true };
  });
};
