import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import type { ServerConfig } from './config.js';
import type { Logger } from './logger.js';
import { deviceRoutes } from './routes/devices.js';
import { FileCredentialStore } from './services/credentials.js';
import { DeviceClient } from './services/deviceClient.js';
import { DiscoveryService } from './services/discovery.js';

/** Discovery wired to real scanners: SSDP, HTTP, and the credential file. */
export function createDiscovery(config: ServerConfig, logger: Logger): DiscoveryService {
  const credentials = new FileCredentialStore(config.credentialsPath, logger);
  return new DiscoveryService({
    logger,
    defaults: { timeout: config.discoveryTimeout },
    connect: (baseUrl) =>
      DeviceClient.connect(baseUrl, { credentials, logger, timeout: config.httpTimeout }),
  });
}

export async function buildServer(
  config: ServerConfig,
  discovery?: DiscoveryService
): Promise<FastifyInstance> {
  const app = Fastify({
    logger: config.logLevel === 'silent' ? false : { level: config.logLevel },
  });

  await app.register(cors, { origin: true });

  // API routes
  await app.register(deviceRoutes, {
    prefix: '/api',
    discovery: discovery ?? createDiscovery(config, app.log),
    downloadDir: config.downloadDir,
  });

  return app;
}
