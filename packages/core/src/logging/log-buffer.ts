export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface LogEntry {
  timestamp: number;
  level: LogLevel;
  scope: string;
  message: string;
}

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const LEVEL_RANK: Record<LogLevel, number> = { debug: 0, info: 1, warn: 2, error: 3 };

const MAX_ENTRIES = 200;

function format(args: unknown[]): string {
  return args
    .map((a) => {
      if (typeof a === 'string') return a;
      if (a instanceof Error) return a.message;
      return JSON.stringify(a);
    })
    .join(' ');
}

/**
 * Ring buffer of recent log lines. Entries at or above `echo` are also written
 * to the console; `'silent'` keeps everything in memory only.
 */
export class LogBuffer {
  private readonly entries: LogEntry[] = [];
  private readonly listeners: Array<(entry: LogEntry) => void> = [];
  private readonly capacity: number;
  private echo: LogLevel | 'silent';

  constructor(opts: { capacity?: number; echo?: LogLevel | 'silent' } = {}) {
    this.capacity = opts.capacity ?? MAX_ENTRIES;
    this.echo = opts.echo ?? 'warn';
  }

  setEcho(level: LogLevel | 'silent'): void {
    this.echo = level;
  }

  push(level: LogLevel, scope: string, args: unknown[]): void {
    const entry: LogEntry = { timestamp: Date.now(), level, scope, message: format(args) };
    this.entries.push(entry);
    if (this.entries.length > this.capacity) this.entries.shift();

    if (this.echo !== 'silent' && LEVEL_RANK[level] >= LEVEL_RANK[this.echo]) {
      const line = `[${scope}] ${entry.message}`;
      if (level === 'error') console.error(line);
      else if (level === 'warn') console.warn(line);
      else console.log(line);
    }
    for (const cb of this.listeners) cb(entry);
  }

  createLogger(scope: string): Logger {
    return {
      debug: (...args) => this.push('debug', scope, args),
      info: (...args) => this.push('info', scope, args),
      warn: (...args) => this.push('warn', scope, args),
      error: (...args) => this.push('error', scope, args),
    };
  }

  history(): LogEntry[] {
    return [...this.entries];
  }

  clear(): void {
    this.entries.length = 0;
  }

  onLog(callback: (entry: LogEntry) => void): () => void {
    this.listeners.push(callback);
    return () => {
      const idx = this.listeners.indexOf(callback);
      if (idx >= 0) this.listeners.splice(idx, 1);
    };
  }
}

/** Process-wide buffer used when no other is supplied */
export const defaultLogBuffer = new LogBuffer();

export function createLogger(scope: string, buffer: LogBuffer = defaultLogBuffer): Logger {
  return buffer.createLogger(scope);
}
