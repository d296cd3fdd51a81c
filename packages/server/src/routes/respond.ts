import type { Context } from 'hono';
import type { z } from 'zod';
import type { QueryFailure } from '../queries/results.js';

export type ParsedBody<T> = { ok: true; data: T } | { ok: false; message: string };

/** Read and validate a JSON request body */
export async function readJson<S extends z.ZodTypeAny>(c: Context, schema: S): Promise<ParsedBody<z.output<S>>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    return { ok: false, message: 'Request body must be JSON' };
  }
  return parseWith(schema, raw);
}

export function parseWith<S extends z.ZodTypeAny>(schema: S, raw: unknown): ParsedBody<z.output<S>> {
  const parsed = schema.safeParse(raw);
  if (parsed.success) return { ok: true, data: parsed.data };
  const issue = parsed.error.issues[0];
  const where = issue && issue.path.length > 0 ? `${issue.path.join('.')}: ` : '';
  return { ok: false, message: `${where}${issue?.message ?? 'Invalid request'}` };
}

export function badRequest(c: Context, message: string) {
  return c.json({ error: message }, 400);
}

/** 404 for unknown ids (listing them), 400 for everything else the query rejected */
export function failure(c: Context, result: QueryFailure) {
  if (result.type === 'not-found') {
    return c.json({ error: result.message, missing_ids: result.missingIds }, 404);
  }
  return c.json({ error: result.message }, 400);
}
