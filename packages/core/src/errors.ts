import type { StrategyRung } from './schemas.js';

export type GatewayFailureClass = 'ValidationExhausted' | 'ThrottleExhausted' | 'OracleUnavailable' | 'Cancelled';

export type FailureClass =
  | GatewayFailureClass
  | 'ChunkingUnsafe'
  | 'MemoryAbsorbError'
  | 'SchemaGenerationError'
  | 'PipelineExhausted'
  | 'InputError'
  | 'UnexpectedError';

export class StrataError extends Error {
  readonly failureClass: FailureClass;

  constructor(failureClass: FailureClass, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.failureClass = failureClass;
  }
}

export class InputError extends StrataError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('InputError', message, options);
  }
}

export class ChunkingUnsafeError extends StrataError {
  readonly unsafeChunks: readonly number[];

  constructor(unsafeChunks: readonly number[]) {
    super('ChunkingUnsafe', `No safe cut point found for chunk(s) ${unsafeChunks.join(', ')}`);
    this.unsafeChunks = unsafeChunks;
  }
}

export class GatewayError extends StrataError {
  declare readonly failureClass: GatewayFailureClass;
  readonly attempts: number;

  constructor(failureClass: GatewayFailureClass, message: string, attempts: number, options?: { cause?: unknown }) {
    super(failureClass, message, options);
    this.attempts = attempts;
  }
}

export class MemoryAbsorbError extends StrataError {
  readonly chunkIndex: number;
  readonly rootFailure: GatewayFailureClass;

  constructor(chunkIndex: number, cause: GatewayError) {
    super('MemoryAbsorbError', `Absorbing chunk ${chunkIndex} failed: ${cause.message}`, { cause });
    this.chunkIndex = chunkIndex;
    this.rootFailure = cause.failureClass;
  }
}

export class SchemaGenerationError extends StrataError {
  constructor(message: string, options?: { cause?: unknown }) {
    super('SchemaGenerationError', message, options);
  }
}

export interface RungFailure {
  readonly rung: StrategyRung;
  readonly failureClass: FailureClass;
  readonly detail?: FailureClass;
  readonly message: string;
}

export class PipelineExhaustedError extends StrataError {
  readonly rung: StrategyRung;
  readonly rootFailure: FailureClass;
  readonly failures: readonly RungFailure[];

  constructor(rung: StrategyRung, failures: readonly RungFailure[], options?: { cause?: unknown }) {
    const [root] = failures;
    const rootFailure = root?.failureClass ?? 'PipelineExhausted';
    const detail = root?.detail ? ` (${root.detail})` : '';
    super('PipelineExhausted', `Pipeline exhausted at rung "${rung}"; root failure: ${rootFailure}${detail}`, options);
    this.rung = rung;
    this.rootFailure = rootFailure;
    this.failures = failures;
  }
}

export class PipelineCancelledError extends StrataError {
  constructor(message = 'Pipeline run was cancelled') {
    super('Cancelled', message);
  }
}

export const isStrataError = (error: unknown): error is StrataError => error instanceof StrataError;
