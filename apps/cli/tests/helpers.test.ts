import { describe, it, expect, vi, afterEach } from 'vitest';
import { Priority, ServerError, ValidationError, success } from '@taskdock/core';
import type { Category } from '@taskdock/core';
import {
  resolveBaseUrl,
  parsePriorityArg,
  requirePriority,
  parseTaskId,
  parsePosition,
  parseDateArg,
  resolveCategoryArg,
  report,
  $try,
  DEFAULT_SERVER_URL,
} from '../src/helpers.js';

const NOW = new Date(2024, 0, 10); // Wednesday

const categories: Category[] = [
  { id: 1, name: 'Home', color: '#007bff', createdAt: null },
  { id: 4, name: 'Work Stuff', color: '#28a745', createdAt: null },
];

afterEach(() => {
  vi.restoreAllMocks();
  process.exitCode = undefined;
});

describe('resolveBaseUrl', () => {
  it('prefers the explicit url', () => {
    expect(resolveBaseUrl('http://example.test:8080', { TASKDOCK_URL: 'http://other.test' }))
      .toBe('http://example.test:8080');
  });

  it('falls back to TASKDOCK_URL', () => {
    expect(resolveBaseUrl(undefined, { TASKDOCK_URL: 'https://tasks.test/' })).toBe('https://tasks.test');
  });

  it('falls back to the default', () => {
    expect(resolveBaseUrl(undefined, {})).toBe(DEFAULT_SERVER_URL);
  });

  it('strips trailing slashes', () => {
    expect(resolveBaseUrl('http://tasks.test/api//', {})).toBe('http://tasks.test/api');
  });

  it('rejects non-http urls', () => {
    expect(() => resolveBaseUrl('ftp://tasks.test', {})).toThrow("Invalid server URL 'ftp://tasks.test'");
  });

  it('rejects garbage', () => {
    expect(() => resolveBaseUrl('not a url', {})).toThrow("Invalid server URL 'not a url'");
  });
});

describe('parsePriorityArg', () => {
  it('parses "high"', () => {
    expect(parsePriorityArg('high')).toBe(Priority.High);
  });

  it('parses "1"', () => {
    expect(parsePriorityArg('1')).toBe(Priority.High);
  });

  it('parses "p2"', () => {
    expect(parsePriorityArg('p2')).toBe(Priority.Medium);
  });

  it('parses "LOW"', () => {
    expect(parsePriorityArg('LOW')).toBe(Priority.Low);
  });

  it('returns null for unknown', () => {
    expect(parsePriorityArg('critical')).toBeNull();
  });

  it('requirePriority throws for unknown', () => {
    expect(() => requirePriority('urgent')).toThrow("Unknown priority 'urgent' (use high, medium or low)");
  });
});

describe('parseTaskId', () => {
  it('parses a positive integer', () => {
    expect(parseTaskId('42')).toBe(42);
  });

  it.each(['0', '-1', '1.5', 'abc', ''])('rejects %j', (value) => {
    expect(() => parseTaskId(value)).toThrow(`'${value}' is not a task id`);
  });
});

describe('parsePosition', () => {
  it('turns a 1-based position into an index', () => {
    expect(parsePosition('1')).toBe(0);
    expect(parsePosition('3')).toBe(2);
  });

  it('rejects zero', () => {
    expect(() => parsePosition('0')).toThrow("Position must be a number from 1, got '0'");
  });
});

describe('parseDateArg', () => {
  it('passes through ISO dates', () => {
    expect(parseDateArg('2024-03-01', NOW)).toBe('2024-03-01');
  });

  it('resolves shorthand against now', () => {
    expect(parseDateArg('tomorrow', NOW)).toBe('2024-01-11');
    expect(parseDateArg('+1w', NOW)).toBe('2024-01-17');
    expect(parseDateArg('fri', NOW)).toBe('2024-01-12');
  });

  it('"none" clears the date', () => {
    expect(parseDateArg('none', NOW)).toBeNull();
  });

  it('throws on input it cannot read', () => {
    expect(() => parseDateArg('someday', NOW)).toThrow("Could not understand date 'someday'");
  });
});

describe('resolveCategoryArg', () => {
  it('takes a numeric id as is', () => {
    expect(resolveCategoryArg('7', categories)).toBe(7);
  });

  it('matches names case-insensitively', () => {
    expect(resolveCategoryArg('work stuff', categories)).toBe(4);
  });

  it('"none" means no category', () => {
    expect(resolveCategoryArg('None', categories)).toBeNull();
  });

  it('throws for an unknown name', () => {
    expect(() => resolveCategoryArg('Garden', categories)).toThrow("Unknown category 'Garden'");
  });
});

describe('report', () => {
  it('passes data to the success callback', () => {
    const onSuccess = vi.fn();
    expect(report(success(3), onSuccess)).toBe(true);
    expect(onSuccess).toHaveBeenCalledWith(3);
    expect(process.exitCode).toBeUndefined();
  });

  it('prints validation failures and sets the exit code', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const onSuccess = vi.fn();
    const ok = report({ type: 'invalid', error: new ValidationError('Task content is required') }, onSuccess);
    expect(ok).toBe(false);
    expect(onSuccess).not.toHaveBeenCalled();
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('Task content is required'));
    expect(process.exitCode).toBe(1);
  });

  it('names missing ids of a rejected batch', () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    report({ type: 'failed', error: new ServerError('Tasks not found: 2', 404, [2]) }, vi.fn());
    expect(logSpy).toHaveBeenCalledTimes(2);
    expect(logSpy).toHaveBeenLastCalledWith(expect.stringContaining('Missing task ids: 2'));
  });
});

describe('$try', () => {
  it('calls the wrapped function', async () => {
    const fn = vi.fn();
    await $try(fn);
    expect(fn).toHaveBeenCalledOnce();
    expect(process.exitCode).toBeUndefined();
  });

  it('catches errors, logs them and sets the exit code', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    await $try(async () => {
      throw new Error('test error');
    });
    expect(logSpy).toHaveBeenCalledWith(expect.stringContaining('test error'));
    expect(process.exitCode).toBe(1);
  });
});
