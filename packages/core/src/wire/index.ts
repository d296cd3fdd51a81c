export * from './schemas.js';
export {
  toTask, toCategory, toStats,
  toCreateBody, toUpdateBody, toBatchUpdateBody, toBatchDeleteBody, toReorderBody,
} from './mappers.js';
