export { createApp } from './app.js';
export type { AppOptions } from './app.js';
export { createDb, createTestDb, getDefaultDbPath, CREATE_SCHEMA_SQL } from './db.js';
export type { TaskdockDb, TaskdockExecutor } from './db.js';
export { loadServerConfig, DEFAULT_HOST, DEFAULT_PORT } from './config.js';
export type { ServerConfig } from './config.js';
export { startServer } from './serve.js';
export * from './queries/index.js';
export * as schema from './schema/index.js';
