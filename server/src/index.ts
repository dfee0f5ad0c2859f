import { buildServer } from './app.js';
import { loadConfig } from './config.js';

async function start() {
  const config = loadConfig();
  const app = await buildServer(config);

  await app.listen({ port: config.port, host: config.host });
  app.log.info(`Scan grabber running at http://localhost:${config.port}`);
}

start().catch((err: unknown) => {
  console.error('Failed to start server:', err);
  process.exitCode = 1;
});
