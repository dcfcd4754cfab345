/**
 * Zod schemas for user-facing configuration (config.json).
 *
 * Validates what users write in `~/.config/convoy/config.json` or
 * `.convoy/config.json`.
 */

import { z } from 'zod';

// =============================================================================
// SECTION SCHEMAS
// =============================================================================

/**
 * Helper: a feature section that can be an object or `false` to disable.
 */
function featureSection<T extends z.ZodRawShape>(shape: T) {
  return z.union([z.object(shape).strict(), z.literal(false)]);
}

export const SessionsSchema = z
  .object({
    dir: z.string().min(1).optional(),
    autoCheckpoint: z.boolean().optional(),
    checkpointIntervalMs: z.number().int().positive().optional(),
    backup: z.boolean().optional(),
    retentionDays: z.number().positive().optional(),
    keepMinimum: z.number().int().nonnegative().optional(),
  })
  .strict();

export const ContextSchema = z
  .object({
    mode: z.enum(['sliding_window', 'token_budget', 'smart', 'selective', 'summarize']).optional(),
    reservedOutputTokens: z.number().int().positive().optional(),
    windowSize: z.number().int().positive().optional(),
    preserveFirst: z.number().int().nonnegative().optional(),
    preserveLast: z.number().int().nonnegative().optional(),
    toolResultMaxTokens: z.number().int().positive().optional(),
  })
  .strict();

export const CompactionSchema = z
  .object({
    enabled: z.boolean().optional(),
    minMessages: z.number().int().positive().optional(),
    preserveRecent: z.number().int().nonnegative().optional(),
    timeoutMs: z.number().int().positive().optional(),
    summaryMaxTokens: z.number().int().positive().optional(),
  })
  .strict();

export const LoggingSchema = z
  .object({
    level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'silent']).optional(),
    file: z.string().min(1).optional(),
  })
  .strict();

// =============================================================================
// TOP-LEVEL USER CONFIG SCHEMA
// =============================================================================

/**
 * Zod schema for user-facing config.json files.
 *
 * Uses `.passthrough()` at the top level to avoid breaking users with custom fields.
 * Section schemas use `.strict()` to catch typos in section keys.
 */
export const UserConfigSchema = z
  .object({
    /** Default model for new sessions */
    model: z.string().optional(),
    sessions: SessionsSchema.optional(),
    context: ContextSchema.optional(),
    compaction: featureSection(CompactionSchema.shape).optional(),
    logging: LoggingSchema.optional(),
  })
  .passthrough();

/**
 * Validated user config type inferred from the schema.
 */
export type ValidatedUserConfig = z.infer<typeof UserConfigSchema>;
