import { LogBuffer } from '@taskdock/core';
import { loadServerConfig } from './config.js';
import { startServer } from './serve.js';

const logBuffer = new LogBuffer({ echo: 'info' });
const server = startServer(loadServerConfig(), logBuffer);

for (const signal of ['SIGINT', 'SIGTERM'] as const) {
  process.once(signal, () => {
    server.close();
  });
}
