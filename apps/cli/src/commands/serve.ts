import { Command } from 'commander';
import type { LogBuffer } from '@taskdock/core';
import { loadServerConfig, startServer } from '@taskdock/server';
import { $try } from '../helpers.js';

type ServeOptions = {
  host?: string;
  port?: string;
  db?: string;
};

export function createServeCommand(logBuffer: LogBuffer): Command {
  return new Command('serve')
    .description('Run the task server (defaults from TASKDOCK_HOST, TASKDOCK_PORT, TASKDOCK_DB)')
    .option('--host <host>', 'Interface to bind')
    .option('--port <port>', 'Port to listen on')
    .option('--db <path>', 'SQLite database file')
    .action((opts: ServeOptions) => $try(() => {
      const env = { ...process.env };
      if (opts.host !== undefined) env['TASKDOCK_HOST'] = opts.host;
      if (opts.port !== undefined) env['TASKDOCK_PORT'] = opts.port;
      if (opts.db !== undefined) env['TASKDOCK_DB'] = opts.db;
      const config = loadServerConfig(env);
      logBuffer.setEcho('info');
      const server = startServer(config, logBuffer);
      for (const signal of ['SIGINT', 'SIGTERM'] as const) {
        process.once(signal, () => {
          server.close();
        });
      }
    }));
}
