import { Hono } from 'hono';
import type { TaskdockDb } from '../db.js';
import { getStats } from '../queries/stats-queries.js';

export function statsRoutes(db: TaskdockDb): Hono {
  const app = new Hono();
  app.get('/', (c) => c.json(getStats(db)));
  return app;
}
