import { z } from 'zod';
import type { ValueKind } from '../domain/expression/index.js';

/**
 * Zod schema for a ValueKind in its JSON form, e.g.
 * `{ "tag": "map", "key": { "tag": "string" }, "value": { "tag": "dyn" } }`.
 */
export const valueKindSchema: z.ZodType<ValueKind> = z.lazy(() =>
  z.union([
    z.object({
      tag: z.enum(['bool', 'string', 'int', 'uint', 'double', 'bytes', 'timestamp', 'null', 'dyn']),
    }),
    z.object({ tag: z.literal('map'), key: valueKindSchema, value: valueKindSchema }),
    z.object({ tag: z.literal('list'), elem: valueKindSchema }),
    z.object({ tag: z.literal('object'), name: z.string().min(1).max(255) }),
  ]),
);

/**
 * A host-provided variable. `value` is plain JSON; the HTTP layer converts
 * it to the runtime shape its kind needs.
 */
export const declarationSchema = z.object({
  name: z.string().min(1).max(255),
  kind: valueKindSchema,
  value: z.unknown().optional(),
});

export type DeclarationInput = z.infer<typeof declarationSchema>;

/**
 * Event document: JSON text, or an object that is serialised before use.
 * `null` is accepted here so the pipeline can report it as nil input.
 */
const documentSchema = z.union([z.string(), z.record(z.string(), z.unknown())]).nullable().optional();

const expressionSchema = z.string().min(1).max(10_000);

/** Schema for POST /api/v1/evaluate. */
export const evaluateRequestSchema = z.object({
  expression: expressionSchema,
  data: documentSchema,
  declarations: z.array(declarationSchema).max(100).optional().default([]),
});

export type EvaluateRequest = z.infer<typeof evaluateRequestSchema>;

/** Schema for POST /api/v1/check. `sample` shapes the variables; defaults to `{}`. */
export const checkRequestSchema = z.object({
  expression: expressionSchema,
  sample: documentSchema,
  declarations: z.array(declarationSchema).max(100).optional().default([]),
});

export type CheckRequest = z.infer<typeof checkRequestSchema>;

const severityEnum = z.enum(['low', 'medium', 'high', 'critical']);

/**
 * A rule as it arrives with a match request.
 * All fields required except `description` and `enabled` (defaults true).
 */
export const expressionRuleSchema = z.object({
  id: z.string().min(1).max(255),
  name: z.string().min(1).max(255),
  description: z.string().max(1024).optional().default(''),
  severity: severityEnum,
  expression: expressionSchema,
  enabled: z.boolean().optional().default(true),
});

export type ExpressionRuleInput = z.infer<typeof expressionRuleSchema>;

/** Schema for POST /api/v1/match. */
export const matchRequestSchema = z.object({
  event_id: z.string().min(1).max(255),
  data: documentSchema,
  declarations: z.array(declarationSchema).max(100).optional().default([]),
  rules: z.array(expressionRuleSchema).min(1, 'At least one rule is required').max(500),
});

export type MatchRequest = z.infer<typeof matchRequestSchema>;
