export {
  categoryLink, categoryName, getPriorityLabel, getPriorityIndicator,
  getDueState, formatDueDate, formatDateRange, batchLabel,
} from './task-display.js';
export type { CategoryLink, DueState } from './task-display.js';
