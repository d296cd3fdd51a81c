import type { Task, Category, TaskId, CategoryId } from '../types/task.js';

export type CacheChange = 'tasks' | 'categories';

/**
 * Client-held snapshot of the server's task and category collections.
 *
 * Loads replace a collection wholesale; nothing is merged field by field, so
 * a field the server stopped sending can't survive from an older snapshot.
 * The cache trusts its input: responses are validated by the sync client.
 */
export class EntityCache {
  private tasks: readonly Task[] = [];
  private categories: readonly Category[] = [];
  private taskIndex = new Map<TaskId, Task>();
  private categoryIndex = new Map<CategoryId, Category>();
  private readonly listeners: Array<(change: CacheChange) => void> = [];

  load(tasks: readonly Task[]): void {
    this.tasks = Object.freeze([...tasks]);
    this.taskIndex = new Map(tasks.map((t) => [t.id, t]));
    this.emit('tasks');
  }

  loadCategories(categories: readonly Category[]): void {
    this.categories = Object.freeze([...categories]);
    this.categoryIndex = new Map(categories.map((c) => [c.id, c]));
    this.emit('categories');
  }

  currentTasks(): readonly Task[] {
    return this.tasks;
  }

  currentCategories(): readonly Category[] {
    return this.categories;
  }

  findTask(id: TaskId): Task | undefined {
    return this.taskIndex.get(id);
  }

  findCategory(id: CategoryId): Category | undefined {
    return this.categoryIndex.get(id);
  }

  taskIds(): TaskId[] {
    return this.tasks.map((t) => t.id);
  }

  subscribe(listener: (change: CacheChange) => void): () => void {
    this.listeners.push(listener);
    return () => {
      const idx = this.listeners.indexOf(listener);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }

  private emit(change: CacheChange): void {
    for (const cb of [...this.listeners]) cb(change);
  }
}
