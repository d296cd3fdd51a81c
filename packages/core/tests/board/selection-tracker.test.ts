import { describe, it, expect } from 'vitest';
import { SelectionTracker } from '../../src/board/selection-tracker.js';

describe('SelectionTracker', () => {
  it('toggles ids in and out', () => {
    const sel = new SelectionTracker();
    expect(sel.toggle(1)).toBe(true);
    expect(sel.toggle(2)).toBe(true);
    expect(sel.toggle(1)).toBe(false);
    expect(sel.ids()).toEqual([2]);
    expect(sel.has(1)).toBe(false);
  });

  it('selectAll replaces the current selection', () => {
    const sel = new SelectionTracker();
    sel.toggle(9);
    sel.selectAll([1, 2, 3]);
    expect(sel.ids()).toEqual([1, 2, 3]);
    expect(sel.count()).toBe(3);
  });

  it('reports the select-all tri-state', () => {
    const sel = new SelectionTracker();
    expect(sel.triState(3)).toBe('unchecked');
    sel.toggle(1);
    expect(sel.triState(3)).toBe('indeterminate');
    sel.selectAll([1, 2, 3]);
    expect(sel.triState(3)).toBe('checked');
  });

  it('is never "all" for an empty list', () => {
    const sel = new SelectionTracker();
    expect(sel.isAll(0)).toBe(false);
    expect(sel.triState(0)).toBe('unchecked');
  });

  it('retain prunes ids that are no longer rendered', () => {
    const sel = new SelectionTracker();
    sel.selectAll([1, 2, 3, 4]);
    expect(sel.retain([2, 4, 5])).toBe(2);
    expect(sel.ids()).toEqual([2, 4]);
  });

  it('drop and clear', () => {
    const sel = new SelectionTracker();
    sel.selectAll([1, 2]);
    sel.drop(1);
    expect(sel.ids()).toEqual([2]);
    sel.clear();
    expect(sel.isEmpty()).toBe(true);
  });
});
