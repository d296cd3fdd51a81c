import { Hono } from 'hono';
import { CreateCategoryBodySchema } from '@taskdock/core/wire';
import type { TaskdockDb } from '../db.js';
import { listCategories, createCategory, deleteCategory } from '../queries/category-queries.js';
import { readJson, badRequest, failure } from './respond.js';

export function categoryRoutes(db: TaskdockDb): Hono {
  const app = new Hono();

  app.get('/', (c) => c.json(listCategories(db)));

  app.post('/', async (c) => {
    const body = await readJson(c, CreateCategoryBodySchema);
    if (!body.ok) return badRequest(c, body.message);
    const result = createCategory(db, body.data);
    return result.type === 'success' ? c.json(result.data, 201) : failure(c, result);
  });

  app.delete('/:id{[0-9]+}', (c) => {
    const result = deleteCategory(db, Number(c.req.param('id')));
    return result.type === 'success'
      ? c.json({ message: `Category ${result.data} deleted` })
      : failure(c, result);
  });

  return app;
}
