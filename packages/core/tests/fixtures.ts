import type { Task, Category } from '../src/types/task.js';
import type { WireTask, WireStats } from '../src/wire/schemas.js';
import type { FetchLike } from '../src/board/http.js';

export const BASE_URL = 'http://tasks.test';

export function makeTask(overrides: Partial<Task> & { id: number }): Task {
  return {
    content: `Task ${overrides.id}`,
    completed: false,
    priority: 'medium',
    startDate: null,
    dueDate: null,
    categoryId: null,
    order: overrides.id * 1024,
    createdAt: '2024-01-01T09:00:00.000Z',
    updatedAt: '2024-01-01T09:00:00.000Z',
    ...overrides,
  };
}

export function makeCategory(id: number, name: string, color = '#007bff'): Category {
  return { id, name, color, createdAt: '2024-01-01T09:00:00.000Z' };
}

export function wireTask(overrides: Partial<WireTask> & { id: number }): WireTask {
  return {
    content: `Task ${overrides.id}`,
    completed: false,
    priority: 'medium',
    start_date: null,
    due_date: null,
    category_id: null,
    order: overrides.id * 1024,
    created_at: '2024-01-01T09:00:00.000Z',
    updated_at: '2024-01-01T09:00:00.000Z',
    ...overrides,
  };
}

export function wireStats(overrides: Partial<WireStats> = {}): WireStats {
  return {
    total_tasks: 0,
    completed_tasks: 0,
    pending_tasks: 0,
    completion_rate: 0,
    priority_stats: { high: 0, medium: 0, low: 0 },
    category_stats: [],
    ...overrides,
  };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json' },
  });
}

/**
 * Fake fetch answering by "METHOD /path". Unrouted requests get a 404 body.
 * A route may be a function so each call can build a fresh Response.
 */
export function routedFetch(routes: Record<string, () => Response>): FetchLike {
  return async (input, init) => {
    const key = `${init?.method ?? 'GET'} ${new URL(input).pathname}`;
    const route = routes[key];
    return route ? route() : jsonResponse({ error: `No route for ${key}` }, 404);
  };
}

/** The parsed JSON body of a recorded fetch call */
export function sentBody(call: Parameters<FetchLike> | undefined): unknown {
  const body = call?.[1]?.body;
  return typeof body === 'string' ? JSON.parse(body) : undefined;
}
