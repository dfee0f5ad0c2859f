import os from 'os';
import path from 'path';

export interface ServerConfig {
  port: number;
  host: string;
  logLevel: string;
  credentialsPath: string;
  downloadDir: string;
  discoveryTimeout: number;
  httpTimeout: number;
}

const DEFAULTS = {
  port: 3000,
  host: '0.0.0.0',
  logLevel: 'info',
  discoveryTimeout: 2000,
  httpTimeout: 5000,
};

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

function readNumber(raw: string | undefined, fallback: number): number {
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  return Number.isInteger(value) && value > 0 ? value : fallback;
}

export function expandHome(filePath: string): string {
  if (filePath === '~') return os.homedir();
  if (filePath.startsWith('~/')) return path.join(os.homedir(), filePath.slice(2));
  return filePath;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const logLevel = env.LOG_LEVEL && LOG_LEVELS.includes(env.LOG_LEVEL)
    ? env.LOG_LEVEL
    : DEFAULTS.logLevel;

  return {
    port: readNumber(env.PORT, DEFAULTS.port),
    host: env.HOST || DEFAULTS.host,
    logLevel,
    credentialsPath: path.resolve(
      expandHome(env.SCANGRAB_CREDENTIALS_PATH || '~/.scangrab/credentials.json')
    ),
    downloadDir: path.resolve(expandHome(env.SCANGRAB_DOWNLOAD_DIR || 'scans')),
    discoveryTimeout: readNumber(env.SCANGRAB_DISCOVERY_TIMEOUT, DEFAULTS.discoveryTimeout),
    httpTimeout: readNumber(env.SCANGRAB_HTTP_TIMEOUT, DEFAULTS.httpTimeout),
  };
}
