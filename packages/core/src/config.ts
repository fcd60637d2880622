import { z } from 'zod';

const unitInterval = z.number().finite().min(0).max(1);

export const DEFAULT_THROTTLE_BACKOFF_MS = [30_000, 60_000, 120_000, 240_000, 480_000] as const;

export const PipelineConfigSchema = z
  .object({
    chunkTargetSize: z
      .number()
      .int({ message: 'chunkTargetSize must be an integer' })
      .min(100, { message: 'chunkTargetSize must be at least 100 characters' })
      .default(8000),
    overlapHint: z.number().int().min(0, { message: 'overlapHint cannot be negative' }).default(200),
    lookAheadWindow: z.number().int().min(1).default(1000),
    reducedTargetRatio: z.number().finite().gt(0).max(1).default(0.5),
    confidenceThreshold: unitInterval.default(0.8),
    confidenceFloor: unitInterval.default(0.3),
    corroborationIncrement: unitInterval.default(0.02),
    contradictionThreshold: unitInterval.default(0.8),
    compressionThreshold: z.number().int().min(1).default(50),
    topPatternsPerField: z.number().int().min(1).default(3),
    maxFallbacks: z.number().int().min(0).default(3),
    maxValidationAttempts: z.number().int().min(1).default(3),
    throttleBackoffMs: z
      .array(z.number().int().min(0))
      .min(1, { message: 'throttleBackoffMs needs at least one delay' })
      .default([...DEFAULT_THROTTLE_BACKOFF_MS]),
    staticConfidence: unitInterval.default(0.3)
  })
  .strict()
  .refine((config) => config.overlapHint < config.chunkTargetSize / 2, {
    message: 'overlapHint must be less than half of chunkTargetSize',
    path: ['overlapHint']
  })
  .refine((config) => config.confidenceFloor <= config.confidenceThreshold, {
    message: 'confidenceFloor cannot exceed confidenceThreshold',
    path: ['confidenceFloor']
  });

export type PipelineConfig = z.infer<typeof PipelineConfigSchema>;
export type PipelineConfigInput = z.input<typeof PipelineConfigSchema>;

export const createPipelineConfig = (overrides: PipelineConfigInput = {}): PipelineConfig =>
  PipelineConfigSchema.parse(overrides);
