import { describe, it, expect, vi } from 'vitest';
import { EntityCache } from '../../src/board/entity-cache.js';
import { makeTask, makeCategory } from '../fixtures.js';

describe('EntityCache', () => {
  it('starts empty', () => {
    const cache = new EntityCache();
    expect(cache.currentTasks()).toEqual([]);
    expect(cache.currentCategories()).toEqual([]);
  });

  it('replaces the task list wholesale', () => {
    const cache = new EntityCache();
    cache.load([makeTask({ id: 1 }), makeTask({ id: 2 })]);
    cache.load([makeTask({ id: 3 })]);
    expect(cache.taskIds()).toEqual([3]);
    expect(cache.findTask(1)).toBeUndefined();
    expect(cache.findTask(3)?.content).toBe('Task 3');
  });

  it('does not alias the array it was given', () => {
    const cache = new EntityCache();
    const input = [makeTask({ id: 1 })];
    cache.load(input);
    input.push(makeTask({ id: 2 }));
    expect(cache.currentTasks()).toHaveLength(1);
    expect(Object.isFrozen(cache.currentTasks())).toBe(true);
  });

  it('indexes categories by id', () => {
    const cache = new EntityCache();
    cache.loadCategories([makeCategory(4, 'Work')]);
    expect(cache.findCategory(4)?.name).toBe('Work');
    expect(cache.findCategory(5)).toBeUndefined();
  });

  it('notifies subscribers with the collection that changed', () => {
    const cache = new EntityCache();
    const listener = vi.fn();
    const off = cache.subscribe(listener);

    cache.load([]);
    cache.loadCategories([]);
    expect(listener.mock.calls).toEqual([['tasks'], ['categories']]);

    off();
    cache.load([]);
    expect(listener).toHaveBeenCalledTimes(2);
  });
});
