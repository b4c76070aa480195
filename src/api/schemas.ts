/**
 * Zod request schemas for the HTTP API, plus the parse helper that turns a
 * validation failure into an INVALID_INPUT TaskTreeError.
 */

import { z } from 'zod';
import { TaskTreeError } from '../core/errors.js';
import { ExitCode } from '../types/exit-codes.js';

/** Task ids arrive as path/query strings; JSON bodies use numbers. */
export const taskIdParamSchema = z.coerce.number().int().positive();
const taskIdBodySchema = z.number().int().positive();

const titleSchema = z.string().trim().min(1).max(200);
const descriptionSchema = z.string().max(2000).nullable();

export const createTaskBodySchema = z.object({
  title: titleSchema,
  description: descriptionSchema.optional(),
  status: z.boolean().default(false),
});

export const createTaskQuerySchema = z.object({
  parent: taskIdParamSchema.optional(),
});

export const updateTaskBodySchema = z.object({
  title: titleSchema.optional(),
  description: descriptionSchema.optional(),
}).refine((body) => body.title !== undefined || body.description !== undefined, {
  message: 'Provide title or description',
});

export const deleteTaskSchema = z.object({
  id: z.union([taskIdBodySchema, taskIdParamSchema]),
});

export const toggleQuerySchema = z.object({
  with_childs: z.enum(['true', 'false', '1', '0'])
    .transform((v) => v === 'true' || v === '1')
    .optional(),
});

export const changeParentBodySchema = z.object({
  parent_id: taskIdBodySchema.nullable().optional(),
});

export type CreateTaskBody = z.infer<typeof createTaskBodySchema>;
export type UpdateTaskBody = z.infer<typeof updateTaskBodySchema>;
export type ChangeParentBody = z.infer<typeof changeParentBodySchema>;

/**
 * Parse `value` with `schema`, throwing INVALID_INPUT on failure.
 * Issue paths are joined with dots, e.g. "title: String must contain at least 1 character(s)".
 */
export function parseInput<S extends z.ZodTypeAny>(schema: S, value: unknown, what: string): z.output<S> {
  const result = schema.safeParse(value);
  if (result.success) return result.data;

  const issues = result.error.issues.map((issue) => ({
    path: issue.path.join('.'),
    message: issue.message,
  }));
  const summary = issues
    .map((issue) => (issue.path ? `${issue.path}: ${issue.message}` : issue.message))
    .join('; ');
  throw new TaskTreeError(ExitCode.INVALID_INPUT, `Invalid ${what}: ${summary}`, { details: issues });
}
