import type { TaskId } from '../types/task.js';

export type TriState = 'unchecked' | 'checked' | 'indeterminate';

/** Checked task ids, kept apart from the cache contents */
export class SelectionTracker {
  private readonly selected = new Set<TaskId>();

  toggle(id: TaskId): boolean {
    if (this.selected.has(id)) {
      this.selected.delete(id);
      return false;
    }
    this.selected.add(id);
    return true;
  }

  selectAll(ids: Iterable<TaskId>): void {
    this.selected.clear();
    for (const id of ids) this.selected.add(id);
  }

  clear(): void {
    this.selected.clear();
  }

  drop(id: TaskId): void {
    this.selected.delete(id);
  }

  /** Drop every id not in `validIds`; returns how many were pruned */
  retain(validIds: Iterable<TaskId>): number {
    const keep = new Set(validIds);
    let pruned = 0;
    for (const id of [...this.selected]) {
      if (!keep.has(id)) {
        this.selected.delete(id);
        pruned++;
      }
    }
    return pruned;
  }

  has(id: TaskId): boolean {
    return this.selected.has(id);
  }

  /** Selected ids in selection order */
  ids(): TaskId[] {
    return [...this.selected];
  }

  isEmpty(): boolean {
    return this.selected.size === 0;
  }

  count(): number {
    return this.selected.size;
  }

  isAll(totalCount: number): boolean {
    return totalCount > 0 && this.selected.size === totalCount;
  }

  triState(totalCount: number): TriState {
    if (this.isEmpty()) return 'unchecked';
    if (this.isAll(totalCount)) return 'checked';
    return 'indeterminate';
  }
}
