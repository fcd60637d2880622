import { readFile } from 'node:fs/promises';
import { basename } from 'node:path';

import { InputError, type RungFailure, type StrategyRung } from '@strata/core';
import type { SchemaStore, StoredSchema } from '@strata/schema-store';

import { createSilentLogger, type Logger } from '../logger.js';
import type { PipelineResult, RunPipelineOptions } from '../pipeline/index.js';

export interface PipelineRunner {
  run(options: RunPipelineOptions): Promise<PipelineResult>;
}

export interface StrategyWorkflowServiceOptions {
  readonly store: SchemaStore;
  readonly pipeline: PipelineRunner;
  readonly logger?: Logger;
}

export interface GenerateSchemaRequest {
  readonly intent: string;
  readonly html?: string;
  readonly htmlPath?: string;
  readonly source?: string;
  readonly signal?: AbortSignal;
}

export interface GenerateSchemaResult {
  readonly stored: StoredSchema;
  readonly rung: StrategyRung;
  readonly failures: readonly RungFailure[];
}

const INLINE_SOURCE = 'inline';

export class StrategyWorkflowService {
  private readonly store: SchemaStore;
  private readonly pipeline: PipelineRunner;
  private readonly logger: Logger;

  constructor(options: StrategyWorkflowServiceOptions) {
    this.store = options.store;
    this.pipeline = options.pipeline;
    this.logger = options.logger ?? createSilentLogger();
  }

  private async readDocument(request: GenerateSchemaRequest): Promise<string> {
    const hasHtml = typeof request.html === 'string';
    const htmlPath = request.htmlPath?.trim();
    if (hasHtml === Boolean(htmlPath)) {
      throw new InputError('Provide exactly one of html or htmlPath');
    }
    if (typeof request.html === 'string') {
      return request.html;
    }
    if (!htmlPath) {
      throw new InputError('htmlPath must not be empty');
    }

    try {
      return await readFile(htmlPath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        throw new InputError(`HTML document not found at ${htmlPath}`, { cause: error });
      }
      throw error;
    }
  }

  async generate(request: GenerateSchemaRequest): Promise<GenerateSchemaResult> {
    const intent = request.intent.trim();
    if (!intent) {
      throw new InputError('An extraction intent is required');
    }

    const html = await this.readDocument(request);
    const source =
      request.source?.trim() || (request.htmlPath ? basename(request.htmlPath.trim()) : INLINE_SOURCE);

    const result = await this.pipeline.run({ html, intent, signal: request.signal });
    const stored = await this.store.save(result.schema, { intent, source });
    this.logger.info({ schemaId: stored.id, source, rung: result.rung }, 'Stored extraction schema');

    return { stored, rung: result.rung, failures: result.failures };
  }

  async getSchema(id: string): Promise<StoredSchema> {
    const stored = await this.store.getById(id);
    if (!stored) {
      throw new SchemaNotFoundError(id);
    }
    return stored;
  }

  async listSchemas(options: { source?: string } = {}): Promise<readonly StoredSchema[]> {
    return this.store.list(options);
  }
}

export class SchemaNotFoundError extends Error {
  readonly schemaId: string;

  constructor(schemaId: string) {
    super(`Schema ${schemaId} not found`);
    this.name = 'SchemaNotFoundError';
    this.schemaId = schemaId;
  }
}
