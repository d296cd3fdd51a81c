import { describe, it, expect, vi } from 'vitest';
import { SyncClient } from '../../src/board/sync-client.js';
import type { MutationEvent, ReportedError } from '../../src/board/sync-client.js';
import { HttpTransport } from '../../src/board/http.js';
import type { FetchLike } from '../../src/board/http.js';
import { EntityCache } from '../../src/board/entity-cache.js';
import { SelectionTracker } from '../../src/board/selection-tracker.js';
import { LogBuffer } from '../../src/logging/log-buffer.js';
import { NetworkError, ServerError, ValidationError } from '../../src/errors.js';
import { BASE_URL, jsonResponse, makeTask, sentBody, wireTask } from '../fixtures.js';

function setup(fetchImpl: FetchLike, timeoutMs?: number) {
  const cache = new EntityCache();
  const selection = new SelectionTracker();
  const logs = new LogBuffer({ echo: 'silent' });
  const sync = new SyncClient({
    transport: new HttpTransport({ baseUrl: BASE_URL, fetch: fetchImpl, timeoutMs }),
    cache,
    selection,
    logger: logs.createLogger('sync'),
  });
  const errors: ReportedError[] = [];
  const mutations: MutationEvent[] = [];
  sync.onError((e) => errors.push(e));
  sync.onMutation((e) => mutations.push(e));
  return { cache, selection, sync, errors, mutations, logs };
}

describe('SyncClient.fetchTasks', () => {
  it('loads the response into the cache and sends the filter', async () => {
    const fetchMock = vi.fn<FetchLike>(async () => jsonResponse([wireTask({ id: 1, category_id: 2 })]));
    const { sync, cache } = setup(fetchMock);

    const result = await sync.fetchTasks({ completed: false, priority: 'high' });

    expect(result.type).toBe('success');
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${BASE_URL}/api/tasks?completed=false&priority=high`);
    expect(cache.currentTasks()).toEqual([makeTask({ id: 1, categoryId: 2 })]);
    expect(sync.filter).toEqual({ completed: false, priority: 'high' });
  });

  it('discards a response that lands after a newer fetch was issued', async () => {
    const pending: Array<(res: Response) => void> = [];
    const fetchMock = vi.fn<FetchLike>(() => new Promise<Response>((resolve) => {
      pending.push(resolve);
    }));
    const { sync, cache, errors } = setup(fetchMock);

    const older = sync.fetchTasks({ search: 'a' });
    const newer = sync.fetchTasks({ search: 'ab' });
    expect(pending).toHaveLength(2);

    pending[1]?.(jsonResponse([wireTask({ id: 2, content: 'abc' })]));
    expect((await newer).type).toBe('success');

    pending[0]?.(jsonResponse([wireTask({ id: 1, content: 'a' }), wireTask({ id: 2, content: 'abc' })]));
    const late = await older;

    expect(late.type).toBe('stale');
    expect(cache.taskIds()).toEqual([2]);
    expect(errors).toEqual([]);
  });

  it('stays silent when a superseded fetch fails', async () => {
    const pending: Array<{ resolve: (res: Response) => void; reject: (err: Error) => void }> = [];
    const fetchMock = vi.fn<FetchLike>(() => new Promise<Response>((resolve, reject) => {
      pending.push({ resolve, reject });
    }));
    const { sync, errors } = setup(fetchMock);

    const older = sync.fetchTasks();
    const newer = sync.fetchTasks();
    pending[1]?.resolve(jsonResponse([]));
    pending[0]?.reject(new TypeError('fetch failed'));

    expect((await newer).type).toBe('success');
    expect((await older).type).toBe('stale');
    expect(errors).toEqual([]);
  });

  it('leaves the cache untouched when the request fails', async () => {
    const { sync, cache, errors } = setup(async () => {
      throw new TypeError('fetch failed');
    });
    cache.load([makeTask({ id: 7 })]);
    const before = cache.currentTasks();

    const result = await sync.fetchTasks();

    expect(result.type).toBe('failed');
    expect(result.type === 'failed' && result.error).toBeInstanceOf(NetworkError);
    expect(cache.currentTasks()).toBe(before);
    expect(errors).toHaveLength(1);
  });

  it('treats a timeout as a network failure', async () => {
    const fetchMock = vi.fn<FetchLike>((_input, init) => new Promise<Response>((_resolve, reject) => {
      const signal = init?.signal;
      if (signal) signal.addEventListener('abort', () => reject(signal.reason));
    }));
    const { sync, cache, errors } = setup(fetchMock, 5);
    cache.load([makeTask({ id: 7 })]);

    const result = await sync.fetchTasks({});

    expect(result.type).toBe('failed');
    expect(result.type === 'failed' && result.error).toBeInstanceOf(NetworkError);
    expect(cache.taskIds()).toEqual([7]);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toBeInstanceOf(NetworkError);
  });

  it('reports the server error body', async () => {
    const { sync } = setup(async () => jsonResponse({ error: 'database is locked' }, 500));
    const result = await sync.fetchTasks();

    expect(result.type).toBe('failed');
    if (result.type !== 'failed') return;
    expect(result.error).toBeInstanceOf(ServerError);
    expect(result.error.message).toBe('database is locked');
  });

  it('rejects a body that does not match the task schema', async () => {
    const { sync, cache } = setup(async () => jsonResponse([{ id: 1, content: 'no other fields' }]));
    const result = await sync.fetchTasks();

    expect(result.type === 'failed' && result.error.message).toBe('Unexpected response from GET /api/tasks');
    expect(cache.currentTasks()).toEqual([]);
  });
});

describe('SyncClient.createTask', () => {
  it('posts the draft and re-fetches with the last filter', async () => {
    const created = wireTask({
      id: 1, content: 'Buy fabric', priority: 'high', start_date: '2024-01-01', due_date: '2024-01-10',
    });
    const fetchMock = vi.fn<FetchLike>(async (_url, init) =>
      init?.method === 'POST' ? jsonResponse(created, 201) : jsonResponse([created]));
    const { sync, cache, mutations } = setup(fetchMock);

    const result = await sync.createTask({
      content: '  Buy fabric ', priority: 'high', startDate: '2024-01-01', dueDate: '2024-01-10',
    });

    expect(result.type).toBe('success');
    expect(sentBody(fetchMock.mock.calls[0])).toEqual({
      content: 'Buy fabric',
      priority: 'high',
      start_date: '2024-01-01',
      due_date: '2024-01-10',
      category_id: null,
    });
    expect(fetchMock.mock.calls[1]?.[0]).toBe(`${BASE_URL}/api/tasks`);
    expect(cache.currentTasks()).toHaveLength(1);
    expect(cache.currentTasks()[0]?.completed).toBe(false);
    expect(mutations).toEqual([{ kind: 'task-created', taskIds: [1], statsAffected: true }]);
  });

  it('rejects an inverted date range without a request', async () => {
    const fetchMock = vi.fn<FetchLike>();
    const { sync, cache, errors } = setup(fetchMock);

    const result = await sync.createTask({ content: 'Trip', startDate: '2024-02-10', dueDate: '2024-02-01' });

    expect(result.type).toBe('invalid');
    expect(fetchMock).not.toHaveBeenCalled();
    expect(cache.currentTasks()).toEqual([]);
    expect(errors[0]).toBeInstanceOf(ValidationError);
  });

  it('rejects blank and oversized content', async () => {
    const fetchMock = vi.fn<FetchLike>();
    const { sync } = setup(fetchMock);

    const blank = await sync.createTask({ content: '   ' });
    const long = await sync.createTask({ content: 'x'.repeat(201) });

    expect(blank.type === 'invalid' && blank.error.message).toBe('Task content cannot be empty');
    expect(long.type === 'invalid' && long.error.message).toBe('Task content cannot exceed 200 characters');
    expect(fetchMock).not.toHaveBeenCalled();
  });
});

describe('SyncClient.updateTask', () => {
  it('sends only the fields given', async () => {
    const fetchMock = vi.fn<FetchLike>(async (_url, init) =>
      init?.method === 'PUT'
        ? jsonResponse(wireTask({ id: 3, completed: true }))
        : jsonResponse([wireTask({ id: 3, completed: true })]));
    const { sync, mutations } = setup(fetchMock);

    const result = await sync.updateTask(3, { completed: true });

    expect(result.type).toBe('success');
    expect(fetchMock.mock.calls[0]?.[0]).toBe(`${BASE_URL}/api/tasks/3`);
    expect(sentBody(fetchMock.mock.calls[0])).toEqual({ completed: true });
    expect(mutations[0]?.statsAffected).toBe(true);
  });

  it('is idempotent for repeated completion', async () => {
    const fetchMock = vi.fn<FetchLike>(async (_url, init) =>
      init?.method === 'PUT'
        ? jsonResponse(wireTask({ id: 3, completed: true }))
        : jsonResponse([wireTask({ id: 3, completed: true })]));
    const { sync, cache } = setup(fetchMock);

    await sync.updateTask(3, { completed: true });
    const second = await sync.updateTask(3, { completed: true });

    expect(second.type).toBe('success');
    expect(cache.currentTasks().map((t) => t.completed)).toEqual([true]);
  });

  it('checks a single date change against the cached task', async () => {
    const fetchMock = vi.fn<FetchLike>();
    const { sync, cache } = setup(fetchMock);
    cache.load([makeTask({ id: 1, startDate: '2024-03-01' })]);

    const result = await sync.updateTask(1, { dueDate: '2024-02-01' });

    expect(result.type).toBe('invalid');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('marks content edits as not affecting statistics', async () => {
    const { sync, mutations } = setup(async (_url, init) =>
      init?.method === 'PUT' ? jsonResponse(wireTask({ id: 1, content: 'New' })) : jsonResponse([]));

    await sync.updateTask(1, { content: 'New' });

    expect(mutations).toEqual([{ kind: 'task-updated', taskIds: [1], statsAffected: false }]);
  });
});

describe('SyncClient.deleteTask', () => {
  it('drops the id from the selection and re-fetches', async () => {
    const fetchMock = vi.fn<FetchLike>(async (_url, init) =>
      init?.method === 'DELETE' ? jsonResponse({ message: 'Task 1 deleted' }) : jsonResponse([wireTask({ id: 2 })]));
    const { sync, selection, cache } = setup(fetchMock);
    selection.selectAll([1, 2]);

    const result = await sync.deleteTask(1);

    expect(result).toEqual({ type: 'success', data: 1 });
    expect(selection.ids()).toEqual([2]);
    expect(cache.taskIds()).toEqual([2]);
  });

  it('accepts an empty success body', async () => {
    const { sync } = setup(async (_url, init) =>
      init?.method === 'DELETE' ? new Response(null, { status: 204 }) : jsonResponse([]));

    expect(await sync.deleteTask(4)).toEqual({ type: 'success', data: 4 });
  });
});

describe('SyncClient batches', () => {
  it('rejects an empty selection locally', async () => {
    const fetchMock = vi.fn<FetchLike>();
    const { sync } = setup(fetchMock);

    const update = await sync.batchUpdate([], { completed: true });
    const remove = await sync.batchDelete([]);

    expect(update.type === 'invalid' && update.error.message).toBe('No tasks selected');
    expect(remove.type).toBe('invalid');
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('clears the selection and re-fetches after a batch update', async () => {
    const fetchMock = vi.fn<FetchLike>(async (_url, init) =>
      init?.method === 'PUT'
        ? jsonResponse({ message: 'Updated 2 tasks', affected: 2 })
        : jsonResponse([wireTask({ id: 1, completed: true }), wireTask({ id: 2, completed: true })]));
    const { sync, selection, cache } = setup(fetchMock);
    selection.selectAll([1, 2]);

    const result = await sync.batchUpdate([1, 2], { completed: true });

    expect(result).toEqual({ type: 'success', data: { message: 'Updated 2 tasks', affected: 2 } });
    expect(sentBody(fetchMock.mock.calls[0])).toEqual({ task_ids: [1, 2], completed: true });
    expect(selection.isEmpty()).toBe(true);
    expect(cache.currentTasks().every((t) => t.completed)).toBe(true);
  });

  it('reports missing ids as one failure and changes nothing locally', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse({ error: 'Tasks not found: 2', missing_ids: [2] }, 404));
    const { sync, selection, cache, errors } = setup(fetchMock);
    cache.load([makeTask({ id: 1 }), makeTask({ id: 2 }), makeTask({ id: 3 })]);
    selection.selectAll([1, 2, 3]);

    const result = await sync.batchDelete([1, 2, 3]);

    expect(result.type).toBe('failed');
    if (result.type !== 'failed') return;
    expect(result.error).toBeInstanceOf(ServerError);
    expect(result.error instanceof ServerError && result.error.missingIds).toEqual([2]);
    expect(sentBody(fetchMock.mock.calls[0])).toEqual({ task_ids: [1, 2, 3] });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(selection.ids()).toEqual([1, 2, 3]);
    expect(cache.taskIds()).toEqual([1, 2, 3]);
    expect(errors).toHaveLength(1);
  });
});

describe('SyncClient categories', () => {
  it('rejects a duplicate name locally', async () => {
    const fetchMock = vi.fn<FetchLike>(async () =>
      jsonResponse([{ id: 1, name: 'Work', color: '#007bff', created_at: null }]));
    const { sync } = setup(fetchMock);
    await sync.fetchCategories();

    const result = await sync.createCategory('Work');

    expect(result.type).toBe('invalid');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('re-fetches categories and tasks after deleting a category', async () => {
    const fetchMock = vi.fn<FetchLike>(async (url, init) => {
      if (init?.method === 'DELETE') return jsonResponse({ message: 'Category 1 deleted' });
      return url.includes('/api/categories') ? jsonResponse([]) : jsonResponse([wireTask({ id: 5 })]);
    });
    const { sync, cache } = setup(fetchMock);

    const result = await sync.deleteCategory(1);

    expect(result).toEqual({ type: 'success', data: 1 });
    expect(fetchMock.mock.calls.map(([url, init]) => `${init?.method ?? 'GET'} ${url}`)).toEqual([
      `DELETE ${BASE_URL}/api/categories/1`,
      `GET ${BASE_URL}/api/categories`,
      `GET ${BASE_URL}/api/tasks`,
    ]);
    expect(cache.taskIds()).toEqual([5]);
  });
});
