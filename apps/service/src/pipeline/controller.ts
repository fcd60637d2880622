import {
  ChunkingUnsafeError,
  InputError,
  MemoryAbsorbError,
  PipelineCancelledError,
  PipelineExhaustedError,
  isStrataError,
  type DomChunk,
  type ExtractionSchema,
  type FailureClass,
  type HtmlCapability,
  type OracleCall,
  type PipelineConfig,
  type Preprocessor,
  type RungFailure,
  type StrategyRung
} from '@strata/core';

import { createSilentLogger, type Logger } from '../logger.js';
import { createChunker, estimateTokens, type Chunker } from './chunker.js';
import { createSchemaCompiler, type SchemaCompiler } from './compiler.js';
import { createOracleGateway, type Sleep } from './gateway.js';
import { createMemoryEngine, type MemoryEngine } from './memory.js';
import type { PromptBuilders } from './prompts.js';
import { createStaticFallback, type StaticFallback } from './static-fallback.js';

export type PipelineState =
  | { readonly name: 'START' }
  | { readonly name: 'PREPROCESSED' }
  | { readonly name: 'CHUNKED'; readonly chunks: number }
  | { readonly name: 'ABSORBING'; readonly chunkIndex: number }
  | { readonly name: 'COMPRESSING' }
  | { readonly name: 'COMPILING' }
  | { readonly name: 'DONE' }
  | { readonly name: 'FAILED'; readonly reason: FailureClass };

export interface PipelineTransition {
  readonly rung: StrategyRung;
  readonly state: PipelineState;
}

export const describeState = (state: PipelineState): string => {
  switch (state.name) {
    case 'ABSORBING':
      return `ABSORBING(${state.chunkIndex})`;
    case 'FAILED':
      return `FAILED(${state.reason})`;
    default:
      return state.name;
  }
};

export const STRATEGY_LADDER: readonly StrategyRung[] = [
  'memory-evolution',
  'context-free',
  'single-chunk',
  'static-heuristic'
];

const CHUNKING_FAILURES: readonly FailureClass[] = ['ChunkingUnsafe', 'MemoryAbsorbError'];
const SYNTHESIS_FAILURES: readonly FailureClass[] = [...CHUNKING_FAILURES, 'SchemaGenerationError', 'ValidationExhausted'];

/** Failure classes that allow entering each rung from an earlier one. */
export const RUNG_ENTRY: Readonly<Record<StrategyRung, readonly FailureClass[]>> = {
  'memory-evolution': [],
  'context-free': CHUNKING_FAILURES,
  'single-chunk': SYNTHESIS_FAILURES,
  'static-heuristic': [...SYNTHESIS_FAILURES, 'ThrottleExhausted', 'OracleUnavailable']
};

export const nextRung = (current: StrategyRung, failure: FailureClass): StrategyRung | undefined =>
  STRATEGY_LADDER.slice(STRATEGY_LADDER.indexOf(current) + 1).find((rung) => RUNG_ENTRY[rung].includes(failure));

export interface PipelineCollaborators {
  readonly oracle: OracleCall;
  readonly html: HtmlCapability;
  readonly preprocessor: Preprocessor;
  readonly logger?: Logger;
  readonly sleep?: Sleep;
  readonly prompts?: PromptBuilders;
}

export interface RunPipelineOptions {
  readonly html: string;
  readonly intent: string;
  readonly signal?: AbortSignal;
  readonly onTransition?: (transition: PipelineTransition) => void;
}

export interface PipelineResult {
  readonly schema: ExtractionSchema;
  readonly rung: StrategyRung;
  readonly transitions: readonly PipelineTransition[];
  readonly failures: readonly RungFailure[];
}

interface RunContext {
  readonly cleaned: string;
  readonly intent: string;
  readonly signal?: AbortSignal;
  readonly enter: (rung: StrategyRung, state: PipelineState) => void;
}

const throwIfCancelled = (signal: AbortSignal | undefined) => {
  if (signal?.aborted) {
    throw new PipelineCancelledError();
  }
};

/**
 * Runs chunk analysis, memory evolution and schema synthesis for one
 * document, stepping down the strategy ladder when a rung fails with a
 * class the next rung accepts.
 */
export class StrategyPipeline {
  private readonly config: PipelineConfig;
  private readonly html: HtmlCapability;
  private readonly preprocessor: Preprocessor;
  private readonly logger: Logger;
  private readonly chunker: Chunker;
  private readonly memory: MemoryEngine;
  private readonly compiler: SchemaCompiler;
  private readonly staticFallback: StaticFallback;

  constructor(config: PipelineConfig, collaborators: PipelineCollaborators) {
    this.config = config;
    this.html = collaborators.html;
    this.preprocessor = collaborators.preprocessor;
    this.logger = collaborators.logger ?? createSilentLogger();

    const gateway = createOracleGateway({
      oracle: collaborators.oracle,
      sleep: collaborators.sleep,
      logger: this.logger,
      throttleBackoffMs: config.throttleBackoffMs
    });
    this.chunker = createChunker({ html: this.html, lookAheadWindow: config.lookAheadWindow });
    this.memory = createMemoryEngine({
      gateway,
      html: this.html,
      config,
      logger: this.logger,
      prompts: collaborators.prompts
    });
    this.compiler = createSchemaCompiler({
      gateway,
      html: this.html,
      config,
      logger: this.logger,
      prompts: collaborators.prompts
    });
    this.staticFallback = createStaticFallback({
      html: this.html,
      confidence: config.staticConfidence,
      logger: this.logger
    });
  }

  async run(options: RunPipelineOptions): Promise<PipelineResult> {
    const transitions: PipelineTransition[] = [];
    const failures: RungFailure[] = [];
    let rung: StrategyRung = 'memory-evolution';

    const enter = (at: StrategyRung, state: PipelineState) => {
      const transition = { rung: at, state };
      transitions.push(transition);
      this.logger.debug({ rung: at, state: describeState(state) }, 'Pipeline transition');
      options.onTransition?.(transition);
    };

    enter(rung, { name: 'START' });
    try {
      throwIfCancelled(options.signal);
      const cleaned = this.preprocess(options.html);
      enter(rung, { name: 'PREPROCESSED' });
      const context: RunContext = { cleaned, intent: options.intent, signal: options.signal, enter };

      for (;;) {
        try {
          const schema = await this.runRung(rung, context);
          enter(rung, { name: 'DONE' });
          this.logger.info({ rung, fields: Object.keys(schema.fields).length }, 'Pipeline completed');
          return { schema, rung, transitions, failures };
        } catch (error) {
          if (error instanceof PipelineCancelledError || error instanceof InputError) {
            throw error;
          }
          if (!isStrataError(error)) {
            // A defect, not a strategy failure: stop here but keep the rung reached.
            const message = error instanceof Error ? error.message : String(error);
            failures.push({ rung, failureClass: 'UnexpectedError', message });
            this.logger.error({ rung, error: message }, 'Strategy rung failed unexpectedly');
            throw new PipelineExhaustedError(rung, failures, { cause: error });
          }
          failures.push({
            rung,
            failureClass: error.failureClass,
            ...(error instanceof MemoryAbsorbError ? { detail: error.rootFailure } : {}),
            message: error.message
          });
          const next = nextRung(rung, error.failureClass);
          if (!next) {
            throw new PipelineExhaustedError(rung, failures);
          }
          this.logger.warn({ from: rung, to: next, failureClass: error.failureClass }, 'Descending strategy ladder');
          rung = next;
        }
      }
    } catch (error) {
      const reason: FailureClass = isStrataError(error) ? error.failureClass : 'PipelineExhausted';
      enter(rung, { name: 'FAILED', reason });
      throw error;
    }
  }

  private preprocess(rawHtml: string): string {
    let cleaned: string;
    try {
      cleaned = this.preprocessor.clean(rawHtml);
    } catch (error) {
      if (error instanceof InputError) {
        throw error;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new InputError(`Preprocessing failed: ${message}`, { cause: error });
    }
    if (!cleaned.trim()) {
      throw new InputError('Cleaned document is empty');
    }
    return cleaned;
  }

  private async runRung(rung: StrategyRung, context: RunContext): Promise<ExtractionSchema> {
    const { cleaned } = context;
    switch (rung) {
      case 'memory-evolution': {
        const chunks = this.chunker.chunk(cleaned, this.config.chunkTargetSize, this.config.overlapHint);
        context.enter(rung, { name: 'CHUNKED', chunks: chunks.length });
        const unsafe = chunks.filter((chunk) => chunk.unsafe).map((chunk) => chunk.index);
        if (unsafe.length > 0) {
          this.logger.warn({ rung, unsafe }, 'Chunker produced unsafe chunks');
          throw new ChunkingUnsafeError(unsafe);
        }
        return this.evolve(rung, chunks, context);
      }
      case 'context-free': {
        const target = Math.max(100, Math.floor(this.config.chunkTargetSize * this.config.reducedTargetRatio));
        const chunks = this.chunker.chunk(cleaned, target, 0, { preserveContext: false });
        context.enter(rung, { name: 'CHUNKED', chunks: chunks.length });
        const unsafe = chunks.filter((chunk) => chunk.unsafe).map((chunk) => chunk.index);
        if (unsafe.length > 0) {
          this.logger.warn({ rung, unsafe }, 'Continuing with unsafe context-free chunks');
        }
        return this.evolve(rung, chunks, context);
      }
      case 'single-chunk': {
        const whole: DomChunk = {
          index: 0,
          content: cleaned,
          startOffset: 0,
          endOffset: cleaned.length,
          openContextStack: [],
          closingContextStack: [],
          contextEcho: '',
          estimatedSize: estimateTokens(cleaned),
          unsafe: false
        };
        context.enter(rung, { name: 'CHUNKED', chunks: 1 });
        return this.evolve(rung, [whole], context);
      }
      case 'static-heuristic':
        throwIfCancelled(context.signal);
        context.enter(rung, { name: 'COMPILING' });
        return this.staticFallback.generate(cleaned, context.intent);
    }
  }

  private async evolve(rung: StrategyRung, chunks: readonly DomChunk[], context: RunContext): Promise<ExtractionSchema> {
    let state = this.memory.initialize(context.intent);

    for (const chunk of chunks) {
      throwIfCancelled(context.signal);
      context.enter(rung, { name: 'ABSORBING', chunkIndex: chunk.index });
      state = await this.memory.absorb(chunk, state, { totalChunks: chunks.length, signal: context.signal });
      if (this.memory.needsCompression(state)) {
        context.enter(rung, { name: 'COMPRESSING' });
        state = this.memory.compress(state);
      }
    }

    throwIfCancelled(context.signal);
    context.enter(rung, { name: 'COMPILING' });
    return this.compiler.generate(state, context.cleaned, { signal: context.signal, strategy: rung });
  }
}
