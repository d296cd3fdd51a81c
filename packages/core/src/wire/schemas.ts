/**
 * JSON shapes of the REST surface. Keys are snake_case on the wire and
 * optional values travel as explicit nulls.
 */

import { z } from 'zod';
import { isIsoDate } from '../parsers/date-parser.js';

const PriorityEnum = z.enum(['high', 'medium', 'low']);

const ISO_TIMESTAMP_RE = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(:\d{2}(\.\d+)?)?(Z|[+-]\d{2}:\d{2})?$/;

/** yyyy-MM-dd; a full ISO timestamp is accepted and truncated to its date */
export const IsoDateSchema = z
  .string()
  .refine(
    (s) => isIsoDate(s.slice(0, 10)) && (s.length === 10 || ISO_TIMESTAMP_RE.test(s)),
    { message: 'Expected an ISO calendar date (yyyy-MM-dd)' },
  )
  .transform((s) => s.slice(0, 10));

const IdSchema = z.number().int().positive();

export const WireCategorySchema = z.object({
  id: IdSchema,
  name: z.string(),
  color: z.string(),
  created_at: z.string().nullable(),
});
export type WireCategory = z.output<typeof WireCategorySchema>;

export const WireTaskSchema = z.object({
  id: IdSchema,
  content: z.string(),
  completed: z.boolean(),
  priority: PriorityEnum,
  start_date: IsoDateSchema.nullable(),
  due_date: IsoDateSchema.nullable(),
  category_id: IdSchema.nullable(),
  category: WireCategorySchema.nullable().optional(),
  order: z.number().int(),
  created_at: z.string().nullable(),
  updated_at: z.string().nullable(),
});
export type WireTask = z.output<typeof WireTaskSchema>;

export const WireTaskListSchema = z.array(WireTaskSchema);
export const WireCategoryListSchema = z.array(WireCategorySchema);

export const WireStatsSchema = z.object({
  total_tasks: z.number().int().nonnegative(),
  completed_tasks: z.number().int().nonnegative(),
  pending_tasks: z.number().int().nonnegative(),
  completion_rate: z.number(),
  priority_stats: z.object({
    high: z.number().int(),
    medium: z.number().int(),
    low: z.number().int(),
  }),
  category_stats: z.array(z.object({
    category: z.object({
      id: IdSchema.nullable(),
      name: z.string(),
      color: z.string(),
    }),
    count: z.number().int(),
  })),
});
export type WireStats = z.output<typeof WireStatsSchema>;

export const MessageSchema = z.object({ message: z.string() });

/** Acknowledgement of a write whose body carries nothing the client needs; may be empty */
export const AckSchema = z.union([MessageSchema, z.null()]);

export const BatchResponseSchema = z.object({
  message: z.string(),
  affected: z.number().int().nonnegative(),
});

export const ErrorBodySchema = z.object({
  error: z.string(),
  missing_ids: z.array(z.number().int()).optional(),
});
export type ErrorBody = z.output<typeof ErrorBodySchema>;

// --- Request bodies ---

export const CreateTaskBodySchema = z.object({
  content: z.string(),
  priority: PriorityEnum.nullish(),
  start_date: IsoDateSchema.nullish(),
  due_date: IsoDateSchema.nullish(),
  category_id: IdSchema.nullish(),
});
export type CreateTaskBody = z.input<typeof CreateTaskBodySchema>;

export const UpdateTaskBodySchema = z.object({
  content: z.string().optional(),
  completed: z.boolean().optional(),
  priority: PriorityEnum.optional(),
  start_date: IsoDateSchema.nullable().optional(),
  due_date: IsoDateSchema.nullable().optional(),
  category_id: IdSchema.nullable().optional(),
  order: z.number().int().optional(),
});
export type UpdateTaskBody = z.input<typeof UpdateTaskBodySchema>;

const TaskIdsSchema = z.array(IdSchema).nonempty();

export const BatchUpdateBodySchema = z.object({
  task_ids: TaskIdsSchema,
  completed: z.boolean().optional(),
  priority: PriorityEnum.optional(),
  category_id: IdSchema.nullable().optional(),
});
export type BatchUpdateBody = z.input<typeof BatchUpdateBodySchema>;

export const BatchDeleteBodySchema = z.object({ task_ids: TaskIdsSchema });
export type BatchDeleteBody = z.input<typeof BatchDeleteBodySchema>;

export const ReorderBodySchema = z.object({
  task_orders: z.array(z.object({ id: IdSchema, order: z.number().int() })).nonempty(),
});
export type ReorderBody = z.input<typeof ReorderBodySchema>;

export const CreateCategoryBodySchema = z.object({
  name: z.string(),
  color: z.string().regex(/^#[0-9a-fA-F]{6}$/).optional(),
});
export type CreateCategoryBody = z.input<typeof CreateCategoryBodySchema>;
