/**
 * Parses GitHub-style search strings into filter control values.
 * Tokens like `status:done priority:high category:work` are extracted;
 * remaining text becomes the free-text search.
 *
 * `category:` takes a category id, a category name (when the known
 * categories are supplied), or `none` for uncategorized tasks.
 */

import type { Category } from '../types/task.js';
import type { FilterUiState } from '../types/filter.js';
import { Priority } from '../types/priority.js';

const STATUS_MAP: Record<string, FilterUiState['completed']> = {
  done: 'true',
  completed: 'true',
  pending: 'false',
  open: 'false',
  todo: 'false',
  any: '',
  all: '',
};

const PRIORITY_MAP: Record<string, FilterUiState['priority']> = {
  high: Priority.High,
  p1: Priority.High,
  medium: Priority.Medium,
  p2: Priority.Medium,
  low: Priority.Low,
  p3: Priority.Low,
};

// Matches prefix:value tokens; the value may be quoted
const TOKEN_RE = /\b(status|priority|category|cat):("[^"]*"|[^\s]+)/gi;

function resolveCategory(value: string, categories: readonly Category[] | undefined): string | null {
  if (value.toLowerCase() === 'none') return 'none';
  if (/^\d+$/.test(value)) return value;
  const match = categories?.find((c) => c.name.toLowerCase() === value.toLowerCase());
  return match ? String(match.id) : null;
}

export function parseSearchQuery(query: string, categories?: readonly Category[]): FilterUiState {
  let completed: FilterUiState['completed'] = '';
  let priority: FilterUiState['priority'] = '';
  let categoryId = '';

  const remaining = query.replace(TOKEN_RE, (token: string, prefix: string, rawValue: string) => {
    const value = rawValue.replace(/^"|"$/g, '');
    const lower = value.toLowerCase();

    switch (prefix.toLowerCase()) {
      case 'status': {
        const mapped = STATUS_MAP[lower];
        if (mapped === undefined) return token; // Unknown status, keep as text
        completed = mapped;
        return '';
      }
      case 'priority': {
        const mapped = PRIORITY_MAP[lower];
        if (mapped === undefined) return token;
        priority = mapped;
        return '';
      }
      default: {
        const resolved = resolveCategory(value, categories);
        if (resolved === null) return token;
        categoryId = resolved;
        return '';
      }
    }
  });

  return {
    search: remaining.replace(/\s+/g, ' ').trim(),
    completed,
    categoryId,
    priority,
  };
}
