export { LogBuffer, defaultLogBuffer, createLogger } from './log-buffer.js';
export type { LogEntry, LogLevel, Logger } from './log-buffer.js';
