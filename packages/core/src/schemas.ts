import { z } from 'zod';

const nonEmptyString = z.string().trim().min(1, 'Value must not be empty');

export const CONTAINER_FIELD = '@container' as const;
export const ITEM_FIELD = '@item' as const;

export const ConfidenceSchema = z
  .number({ required_error: 'confidence is required' })
  .finite()
  .min(0, { message: 'confidence cannot be negative' })
  .max(1, { message: 'confidence cannot be greater than 1' });

export const StrategyRungSchema = z.enum([
  'memory-evolution',
  'context-free',
  'single-chunk',
  'static-heuristic'
]);

export type StrategyRung = z.infer<typeof StrategyRungSchema>;

export const FieldSelectorSchema = z
  .object({
    primary: nonEmptyString,
    fallbacks: z.array(nonEmptyString).default([]),
    confidence: ConfidenceSchema,
    demoted: z.array(z.string()).default([]),
    attribute: nonEmptyString.optional()
  })
  .strict();

export type FieldSelector = z.infer<typeof FieldSelectorSchema>;

export const ExtractionSchemaSchema = z
  .object({
    containerSelector: nonEmptyString,
    itemSelector: nonEmptyString,
    fields: z.record(nonEmptyString, FieldSelectorSchema).refine((fields) => Object.keys(fields).length > 0, {
      message: 'At least one field selector is required'
    }),
    confidenceSummary: z.record(nonEmptyString, ConfidenceSchema),
    strategy: StrategyRungSchema,
    explanation: z.string().default('')
  })
  .strict()
  .superRefine((schema, ctx) => {
    for (const fieldName of Object.keys(schema.confidenceSummary)) {
      if (!Object.hasOwn(schema.fields, fieldName)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `confidenceSummary references unknown field ${fieldName}`,
          path: ['confidenceSummary', fieldName]
        });
      }
    }
  });

export type ExtractionSchema = z.infer<typeof ExtractionSchemaSchema>;

export const PatternCandidateSchema = z
  .object({
    field: nonEmptyString,
    selector: nonEmptyString,
    confidence: ConfidenceSchema
  })
  .strict();

export type PatternCandidate = z.infer<typeof PatternCandidateSchema>;

/** Payload the oracle must return for a single chunk. */
export const ChunkAnalysisPayloadSchema = z
  .object({
    patterns: z.array(PatternCandidateSchema),
    pageUnderstanding: z.string().optional()
  })
  .strict();

export type ChunkAnalysisPayload = z.infer<typeof ChunkAnalysisPayloadSchema>;

export const SynthesizedFieldSchema = z
  .object({
    selector: nonEmptyString,
    confidence: ConfidenceSchema,
    attribute: nonEmptyString.optional()
  })
  .strict();

/** Payload the oracle must return for the final schema synthesis pass. */
export const SchemaSynthesisPayloadSchema = z
  .object({
    containerSelector: nonEmptyString,
    itemSelector: nonEmptyString,
    fields: z.record(nonEmptyString, SynthesizedFieldSchema),
    explanation: z.string().optional()
  })
  .strict();

export type SchemaSynthesisPayload = z.infer<typeof SchemaSynthesisPayloadSchema>;
