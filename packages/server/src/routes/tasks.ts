import { Hono } from 'hono';
import { z } from 'zod';
import type { FilterSpec } from '@taskdock/core/types';
import {
  CreateTaskBodySchema, UpdateTaskBodySchema, BatchUpdateBodySchema,
  BatchDeleteBodySchema, ReorderBodySchema,
} from '@taskdock/core/wire';
import type { TaskdockDb } from '../db.js';
import {
  listTasks, getTask, createTask, updateTask, deleteTask,
  batchUpdateTasks, batchDeleteTasks, reorderTasks,
} from '../queries/task-queries.js';
import { readJson, parseWith, badRequest, failure } from './respond.js';

const TaskQuerySchema = z.object({
  search: z.string().optional(),
  completed: z.enum(['true', 'false']).optional(),
  category_id: z.union([z.literal('none'), z.string().regex(/^[1-9][0-9]*$/)]).optional(),
  priority: z.enum(['high', 'medium', 'low']).optional(),
});

function toFilterSpec(query: z.output<typeof TaskQuerySchema>): FilterSpec {
  const category = query.category_id;
  return {
    search: query.search?.trim() || undefined,
    completed: query.completed === undefined ? undefined : query.completed === 'true',
    categoryId: category === undefined ? undefined : category === 'none' ? 'none' : Number(category),
    priority: query.priority,
  };
}

function plural(n: number): string {
  return n === 1 ? '1 task' : `${n} tasks`;
}

/** /api/tasks; the batch and reorder paths are registered ahead of /:id */
export function taskRoutes(db: TaskdockDb): Hono {
  const app = new Hono();

  app.get('/', (c) => {
    const query = parseWith(TaskQuerySchema, c.req.query());
    if (!query.ok) return badRequest(c, query.message);
    return c.json(listTasks(db, toFilterSpec(query.data)));
  });

  app.post('/', async (c) => {
    const body = await readJson(c, CreateTaskBodySchema);
    if (!body.ok) return badRequest(c, body.message);
    const result = createTask(db, body.data);
    return result.type === 'success' ? c.json(result.data, 201) : failure(c, result);
  });

  app.put('/batch', async (c) => {
    const body = await readJson(c, BatchUpdateBodySchema);
    if (!body.ok) return badRequest(c, body.message);
    const { task_ids, ...fields } = body.data;
    const result = batchUpdateTasks(db, task_ids, fields);
    if (result.type !== 'success') return failure(c, result);
    return c.json({ message: `Updated ${plural(result.data)}`, affected: result.data });
  });

  app.delete('/batch', async (c) => {
    const body = await readJson(c, BatchDeleteBodySchema);
    if (!body.ok) return badRequest(c, body.message);
    const result = batchDeleteTasks(db, body.data.task_ids);
    if (result.type !== 'success') return failure(c, result);
    return c.json({ message: `Deleted ${plural(result.data)}`, affected: result.data });
  });

  app.put('/reorder', async (c) => {
    const body = await readJson(c, ReorderBodySchema);
    if (!body.ok) return badRequest(c, body.message);
    const result = reorderTasks(db, body.data.task_orders);
    if (result.type !== 'success') return failure(c, result);
    return c.json({ message: `Reordered ${plural(result.data)}` });
  });

  app.get('/:id{[0-9]+}', (c) => {
    const id = Number(c.req.param('id'));
    const task = getTask(db, id);
    return task ? c.json(task) : c.json({ error: `Task ${id} not found` }, 404);
  });

  app.put('/:id{[0-9]+}', async (c) => {
    const body = await readJson(c, UpdateTaskBodySchema);
    if (!body.ok) return badRequest(c, body.message);
    const result = updateTask(db, Number(c.req.param('id')), body.data);
    return result.type === 'success' ? c.json(result.data) : failure(c, result);
  });

  app.delete('/:id{[0-9]+}', (c) => {
    const result = deleteTask(db, Number(c.req.param('id')));
    return result.type === 'success'
      ? c.json({ message: `Task ${result.data} deleted` })
      : failure(c, result);
  });

  return app;
}
