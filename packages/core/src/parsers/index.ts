export { parseSearchQuery } from './search-filter-parser.js';
export {
  parseDate, formatDate, addDays, isIsoDate, compareDates, daysBetween,
} from './date-parser.js';
