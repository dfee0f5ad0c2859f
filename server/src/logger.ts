import { pino, type BaseLogger } from 'pino';

// Fastify's own logger satisfies this, so services can log through `app.log`
export type Logger = BaseLogger;

export const silentLogger: Logger = pino({ level: 'silent' });

export function createLogger(level: string): Logger {
  return pino({ level });
}
