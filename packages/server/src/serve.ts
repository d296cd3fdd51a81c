import { serve } from '@hono/node-server';
import type { ServerType } from '@hono/node-server';
import { defaultLogBuffer } from '@taskdock/core';
import type { LogBuffer } from '@taskdock/core';
import { createDb } from './db.js';
import { createApp } from './app.js';
import type { ServerConfig } from './config.js';

/** Open the database and start listening */
export function startServer(config: ServerConfig, logBuffer: LogBuffer = defaultLogBuffer): ServerType {
  const log = logBuffer.createLogger('server');
  const db = createDb(config.dbPath);
  const app = createApp(db, { logBuffer });

  return serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    log.info(`listening on http://${info.address}:${info.port} (db: ${config.dbPath})`);
  });
}
