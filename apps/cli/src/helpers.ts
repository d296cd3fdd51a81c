/**
 * CLI helpers: argument parsing, session setup, error handling.
 */

import type { Category, CategoryId, TaskId, SyncResult, LogBuffer } from '@taskdock/core';
import { TaskBoard, Priority, parseDate, errorMessage } from '@taskdock/core';
import * as out from './output.js';

export const DEFAULT_SERVER_URL = 'http://127.0.0.1:5000';

/** Options every command sees through optsWithGlobals() */
export type GlobalOptions = {
  url?: string;
  verbose?: boolean;
};

/**
 * Resolve the server base URL.
 * Priority: --url > TASKDOCK_URL > default.
 */
export function resolveBaseUrl(explicit: string | undefined, env: NodeJS.ProcessEnv = process.env): string {
  const raw = explicit?.trim() || env['TASKDOCK_URL']?.trim() || DEFAULT_SERVER_URL;
  let url: URL;
  try {
    url = new URL(raw);
  } catch (err: unknown) {
    throw new Error(`Invalid server URL '${raw}'`, { cause: err });
  }
  if (url.protocol !== 'http:' && url.protocol !== 'https:') {
    throw new Error(`Invalid server URL '${raw}'`);
  }
  return raw.replace(/\/+$/, '');
}

/**
 * Parse a priority string into a Priority value.
 */
export function parsePriorityArg(level: string): Priority | null {
  switch (level.toLowerCase()) {
    case 'high': case '1': case 'p1': return Priority.High;
    case 'medium': case '2': case 'p2': return Priority.Medium;
    case 'low': case '3': case 'p3': return Priority.Low;
    default: return null;
  }
}

export function requirePriority(level: string): Priority {
  const priority = parsePriorityArg(level);
  if (!priority) throw new Error(`Unknown priority '${level}' (use high, medium or low)`);
  return priority;
}

export function parseTaskId(value: string): TaskId {
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new Error(`'${value}' is not a task id`);
  }
  return Number(value);
}

/** 1-based list position to a 0-based index */
export function parsePosition(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) < 1) {
    throw new Error(`Position must be a number from 1, got '${value}'`);
  }
  return Number(value) - 1;
}

/** Natural date input (tomorrow, +3d, fri, jan15, yyyy-MM-dd); 'none' clears */
export function parseDateArg(value: string, now?: Date): string | null {
  if (value.toLowerCase() === 'none') return null;
  const parsed = parseDate(value, now);
  if (!parsed) throw new Error(`Could not understand date '${value}'`);
  return parsed;
}

/** Category by id or (case-insensitive) name; 'none' means no category */
export function resolveCategoryArg(value: string, categories: readonly Category[]): CategoryId | null {
  if (value.toLowerCase() === 'none') return null;
  if (/^\d+$/.test(value)) return Number(value);
  const match = categories.find((c) => c.name.toLowerCase() === value.toLowerCase());
  if (!match) throw new Error(`Unknown category '${value}'`);
  return match.id;
}

/**
 * Wrap a command action with error handling.
 */
export async function $try(fn: () => void | Promise<void>): Promise<void> {
  try {
    await fn();
  } catch (err: unknown) {
    out.error(errorMessage(err));
    process.exitCode = 1;
  }
}

/**
 * Print the outcome of a board operation. Returns true on success; any
 * reportable failure sets a non-zero exit code.
 */
export function report<T>(result: SyncResult<T>, onSuccess: (data: T) => void): boolean {
  switch (result.type) {
    case 'success':
      onSuccess(result.data);
      return true;
    case 'invalid':
    case 'failed':
      out.printFailure(result.error);
      process.exitCode = 1;
      return false;
    case 'stale':
      return false;
  }
}

/** Run `fn` against a started session store, disposing it afterwards */
export async function withBoard(
  globals: GlobalOptions,
  logBuffer: LogBuffer,
  fn: (board: TaskBoard) => Promise<void>,
): Promise<void> {
  const board = new TaskBoard({
    baseUrl: resolveBaseUrl(globals.url),
    logBuffer,
    statusTimeoutMs: 0,
  });
  try {
    const started = await board.start();
    if (started.type === 'invalid' || started.type === 'failed') throw started.error;
    await fn(board);
  } finally {
    board.dispose();
  }
}
