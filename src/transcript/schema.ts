/**
 * Zod schemas for one line of an agent transcript.
 *
 * Only the fields the model needs are declared; everything else passes
 * through untouched so newer transcript versions keep parsing.
 */

import { z } from 'zod';

// ============================================================================
// Content
// ============================================================================

/** A raw content block. Only `type` is inspected here. */
export const RawContentBlockSchema = z
  .object({
    type: z.string().optional(),
  })
  .passthrough();

export type RawContentBlock = z.infer<typeof RawContentBlockSchema>;

export const RawContentSchema = z.union([z.string(), z.array(RawContentBlockSchema)]);

export type RawContent = z.infer<typeof RawContentSchema>;

// ============================================================================
// Usage
// ============================================================================

export const RawUsageSchema = z
  .object({
    input_tokens: z.number().optional(),
    output_tokens: z.number().optional(),
    cache_creation_input_tokens: z.number().optional(),
    cache_read_input_tokens: z.number().optional(),
  })
  .passthrough();

export type RawUsage = z.infer<typeof RawUsageSchema>;

// ============================================================================
// Message record
// ============================================================================

export const RawMessageBodySchema = z
  .object({
    role: z.enum(['user', 'assistant']),
    content: RawContentSchema,
    model: z.string().optional(),
    stop_reason: z.string().nullable().optional(),
    usage: RawUsageSchema.nullable().optional(),
    id: z.string().optional(),
  })
  .passthrough();

/** A transcript line that carries a message. */
export const RawMessageRecordSchema = z
  .object({
    uuid: z.string().min(1),
    parentUuid: z.string().nullable().optional(),
    timestamp: z.string().datetime({ offset: true }),
    type: z.string(),
    sessionId: z.string().min(1),
    cwd: z.string().optional(),
    isSidechain: z.boolean().optional(),
    isMeta: z.boolean().optional(),
    userType: z.string().optional(),
    version: z.string().optional(),
    requestId: z.string().optional(),
    costUSD: z.number().optional(),
    durationMs: z.number().optional(),
    message: RawMessageBodySchema,
  })
  .passthrough();

export type RawMessageRecord = z.infer<typeof RawMessageRecordSchema>;

/** The loosest shape every line must have: a JSON object with a string `type`. */
export const RawLineSchema = z
  .object({
    type: z.string(),
  })
  .passthrough();

export type RawLine = z.infer<typeof RawLineSchema>;

export const SummaryLineSchema = z
  .object({
    type: z.literal('summary'),
    summary: z.string(),
    leafUuid: z.string().optional(),
  })
  .passthrough();
