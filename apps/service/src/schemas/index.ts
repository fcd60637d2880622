export { SchemaNotFoundError, StrategyWorkflowService } from './service.js';
export type {
  GenerateSchemaRequest,
  GenerateSchemaResult,
  PipelineRunner,
  StrategyWorkflowServiceOptions
} from './service.js';
export { createWorkflowService, type CreateWorkflowServiceOptions } from './setup.js';
