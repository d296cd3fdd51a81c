// Types
export * from './types/index.js';

// Errors
export {
  TaskdockError, ValidationError, NetworkError, ServerError, StaleResponseError, errorMessage,
} from './errors.js';
export type { ErrorKind } from './errors.js';

// Parsers
export * from './parsers/index.js';

// Display
export * from './display/index.js';

// Logging
export * from './logging/index.js';

// Session store
export * from './board/index.js';
