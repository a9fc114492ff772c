import { z } from 'zod';
import { ResearchDepth, type ResearchConstraints } from '../types/run.js';

/**
 * Run ids name directories, so only plain identifiers are accepted.
 */
export const runIdSchema = z
  .string()
  .trim()
  .min(1, 'Run ID is required')
  .regex(/^[A-Za-z0-9_-]+$/, 'Run ID may only contain letters, digits, "-" and "_"');

export const jobIdSchema = z.string().trim().min(1, 'Job ID is required');

/**
 * Comma-separated focus areas, trimmed, empties dropped.
 */
const focusAreasSchema = z
  .string()
  .transform((value) =>
    value
      .split(',')
      .map((area) => area.trim())
      .filter((area) => area.length > 0)
  );

/**
 * Constraint flags shared by `new` and `revise`.
 */
export const constraintOptionsSchema = z.object({
  timeframe: z.string().trim().min(1).optional(),
  region: z.string().trim().min(1).optional(),
  maxWords: z.coerce.number().int().positive().max(100000).optional(),
  depth: z.nativeEnum(ResearchDepth).optional(),
  focus: focusAreasSchema.optional(),
});

export type ConstraintOptions = z.infer<typeof constraintOptionsSchema>;

export function toConstraints(options: ConstraintOptions): ResearchConstraints {
  const constraints: ResearchConstraints = {};
  if (options.timeframe) constraints.timeframe = options.timeframe;
  if (options.region) constraints.region = options.region;
  if (options.maxWords) constraints.maxWords = options.maxWords;
  if (options.depth) constraints.depth = options.depth;
  if (options.focus && options.focus.length > 0) constraints.focusAreas = options.focus;
  return constraints;
}

/**
 * Schema for new command options.
 */
export const newCommandOptionsSchema = constraintOptionsSchema.extend({
  topic: z.string().trim().min(1, 'Research topic is required').max(2000),
  question: z.array(z.string().trim().min(1)).default([]),
  json: z.boolean().default(false),
});

export type NewCommandOptions = z.infer<typeof newCommandOptionsSchema>;

/**
 * Schema for revise command options.
 */
export const reviseCommandOptionsSchema = constraintOptionsSchema.extend({
  runId: runIdSchema,
  feedback: z.string().trim().min(1, 'Feedback is required'),
  json: z.boolean().default(false),
});

export type ReviseCommandOptions = z.infer<typeof reviseCommandOptionsSchema>;

/**
 * Schema for resume command options.
 */
export const resumeCommandOptionsSchema = z.object({
  runId: runIdSchema,
  json: z.boolean().default(false),
});

export type ResumeCommandOptions = z.infer<typeof resumeCommandOptionsSchema>;

/**
 * Schema for show command options.
 */
export const showCommandOptionsSchema = z.object({
  runId: runIdSchema,
  version: z.coerce.number().int().positive().optional(),
  sources: z.boolean().default(false),
  raw: z.boolean().default(false),
  json: z.boolean().default(false),
});

export type ShowCommandOptions = z.infer<typeof showCommandOptionsSchema>;

/**
 * Schema for list command options.
 */
export const listCommandOptionsSchema = z.object({
  limit: z.coerce.number().int().positive().max(1000).optional(),
  json: z.boolean().default(false),
});

export type ListCommandOptions = z.infer<typeof listCommandOptionsSchema>;

/**
 * Schema for status command options.
 */
export const statusCommandOptionsSchema = z.object({
  jobId: jobIdSchema,
  json: z.boolean().default(false),
});

export type StatusCommandOptions = z.infer<typeof statusCommandOptionsSchema>;

/**
 * Flatten zod issues for formatValidationErrors.
 */
export function toValidationErrors(error: z.ZodError): Array<{ path: string; message: string }> {
  return error.errors.map(e => ({
    path: e.path.join('.'),
    message: e.message,
  }));
}
