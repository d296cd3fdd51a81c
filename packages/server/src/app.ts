import { Hono } from 'hono';
import { defaultLogBuffer } from '@taskdock/core';
import type { LogBuffer } from '@taskdock/core';
import type { TaskdockDb } from './db.js';
import { taskRoutes } from './routes/tasks.js';
import { categoryRoutes } from './routes/categories.js';
import { statsRoutes } from './routes/stats.js';

export interface AppOptions {
  logBuffer?: LogBuffer;
}

/** The REST surface over one database; every response body is JSON */
export function createApp(db: TaskdockDb, opts: AppOptions = {}): Hono {
  const log = (opts.logBuffer ?? defaultLogBuffer).createLogger('http');
  const app = new Hono();

  app.use('*', async (c, next) => {
    const started = Date.now();
    await next();
    log.info(`${c.req.method} ${c.req.path} ${c.res.status} ${Date.now() - started}ms`);
  });

  app.onError((err, c) => {
    log.error(`${c.req.method} ${c.req.path} failed:`, err);
    return c.json({ error: 'Internal server error' }, 500);
  });

  app.notFound((c) => c.json({ error: `No route for ${c.req.method} ${c.req.path}` }, 404));

  app.get('/api/health', (c) => c.json({ status: 'ok' }));

  app.route('/api/tasks', taskRoutes(db));
  app.route('/api/categories', categoryRoutes(db));
  app.route('/api/stats', statsRoutes(db));

  return app;
}
