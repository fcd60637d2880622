import { resolve } from 'node:path';

import { z } from 'zod';

import { PipelineConfigSchema, type PipelineConfig } from '@strata/core';

import { DEFAULT_ORACLE_TIMEOUT_MS } from './oracle/ai-sdk-oracle.js';

const optionalNumber = z
  .string()
  .trim()
  .min(1)
  .transform((value, ctx) => {
    const parsed = Number(value);
    if (!Number.isFinite(parsed)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Expected a number, received "${value}"` });
      return z.NEVER;
    }
    return parsed;
  })
  .optional();

const EnvironmentSchema = z.object({
  STRATA_CHUNK_TARGET_SIZE: optionalNumber,
  STRATA_OVERLAP_HINT: optionalNumber,
  STRATA_CONFIDENCE_THRESHOLD: optionalNumber,
  STRATA_COMPRESSION_THRESHOLD: optionalNumber,
  STRATA_MODEL: z.string().trim().min(1).default('gpt-4o-mini'),
  STRATA_ORACLE_TIMEOUT_MS: optionalNumber,
  OPENAI_API_KEY: z.string().trim().min(1).optional(),
  STRATA_SCHEMAS_DIR: z.string().trim().min(1).optional(),
  STRATA_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info')
});

export interface ServiceSettings {
  readonly pipeline: PipelineConfig;
  readonly model: string;
  readonly oracleTimeoutMs: number;
  readonly apiKey?: string;
  readonly schemasDirectory: string;
  readonly logLevel: z.infer<typeof EnvironmentSchema>['STRATA_LOG_LEVEL'];
}

export const loadServiceSettings = (
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ServiceSettings => {
  const parsed = EnvironmentSchema.parse(env);
  // Unset variables stay undefined so the schema defaults apply.
  const pipeline = PipelineConfigSchema.parse({
    chunkTargetSize: parsed.STRATA_CHUNK_TARGET_SIZE,
    overlapHint: parsed.STRATA_OVERLAP_HINT,
    confidenceThreshold: parsed.STRATA_CONFIDENCE_THRESHOLD,
    compressionThreshold: parsed.STRATA_COMPRESSION_THRESHOLD
  });

  return {
    pipeline,
    model: parsed.STRATA_MODEL,
    oracleTimeoutMs: parsed.STRATA_ORACLE_TIMEOUT_MS ?? DEFAULT_ORACLE_TIMEOUT_MS,
    ...(parsed.OPENAI_API_KEY ? { apiKey: parsed.OPENAI_API_KEY } : {}),
    schemasDirectory: parsed.STRATA_SCHEMAS_DIR ?? resolve(cwd, '.schemas'),
    logLevel: parsed.STRATA_LOG_LEVEL
  };
};
