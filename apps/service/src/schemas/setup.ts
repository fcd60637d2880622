import { createOpenAI } from '@ai-sdk/openai';

import type { OracleCall } from '@strata/core';
import { createHtmlCapability, createHtmlCleaner } from '@strata/html-tools';
import { LocalFileSystemSchemaStore } from '@strata/schema-store';

import { loadServiceSettings } from '../config.js';
import { createLogger, type Logger } from '../logger.js';
import { createAiSdkOracle } from '../oracle/ai-sdk-oracle.js';
import { StrategyPipeline } from '../pipeline/index.js';
import { StrategyWorkflowService } from './service.js';

export interface CreateWorkflowServiceOptions {
  readonly directory?: string;
  readonly env?: NodeJS.ProcessEnv;
  readonly oracle?: OracleCall;
  readonly now?: () => Date;
  readonly logger?: Logger;
}

export const createWorkflowService = (options: CreateWorkflowServiceOptions = {}): StrategyWorkflowService => {
  const settings = loadServiceSettings(options.env);
  const logger = options.logger ?? createLogger({ level: settings.logLevel });

  const oracle =
    options.oracle ??
    createAiSdkOracle({
      model: createOpenAI({ apiKey: settings.apiKey })(settings.model),
      timeoutMs: settings.oracleTimeoutMs
    });

  const pipeline = new StrategyPipeline(settings.pipeline, {
    oracle,
    html: createHtmlCapability(),
    preprocessor: createHtmlCleaner(),
    logger
  });
  const store = new LocalFileSystemSchemaStore({
    directory: options.directory ?? settings.schemasDirectory,
    now: options.now
  });

  return new StrategyWorkflowService({ store, pipeline, logger });
};
