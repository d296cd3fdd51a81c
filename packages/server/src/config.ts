import { getDefaultDbPath } from './db.js';

export interface ServerConfig {
  host: string;
  port: number;
  dbPath: string;
}

export const DEFAULT_HOST = '127.0.0.1';
export const DEFAULT_PORT = 5000;

/** Server settings from TASKDOCK_HOST, TASKDOCK_PORT and TASKDOCK_DB */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const rawPort = env['TASKDOCK_PORT']?.trim();
  const port = rawPort ? Number(rawPort) : DEFAULT_PORT;
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new RangeError(`TASKDOCK_PORT must be a port number, got '${rawPort}'`);
  }

  return {
    host: env['TASKDOCK_HOST']?.trim() || DEFAULT_HOST,
    port,
    dbPath: env['TASKDOCK_DB']?.trim() || getDefaultDbPath(),
  };
}
