import { describe, it, expect } from 'vitest';
import { loadServerConfig } from '../src/config.js';
import { getDefaultDbPath } from '../src/db.js';

describe('loadServerConfig', () => {
  it('falls back to defaults', () => {
    expect(loadServerConfig({})).toEqual({ host: '127.0.0.1', port: 5000, dbPath: getDefaultDbPath() });
  });

  it('reads the environment', () => {
    expect(loadServerConfig({
      TASKDOCK_HOST: '0.0.0.0',
      TASKDOCK_PORT: '8080',
      TASKDOCK_DB: '/tmp/taskdock-test.db',
    })).toEqual({ host: '0.0.0.0', port: 8080, dbPath: '/tmp/taskdock-test.db' });
  });

  it('rejects a port that is not a number', () => {
    expect(() => loadServerConfig({ TASKDOCK_PORT: 'eighty' })).toThrow(
      "TASKDOCK_PORT must be a port number, got 'eighty'",
    );
  });
});
