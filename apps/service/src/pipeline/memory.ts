import {
  ChunkAnalysisPayloadSchema,
  MemoryAbsorbError,
  PipelineCancelledError,
  areRelatedSelectors,
  canonicalSelectorKey,
  isValidSelector,
  normalizeSelector,
  type ChunkAnalysisPayload,
  type DomChunk,
  type HtmlCapability,
  type MemoryState,
  type Pattern,
  type PatternCandidate,
  type PipelineConfig
} from '@strata/core';

import { createSilentLogger, type Logger } from '../logger.js';
import type { OracleGateway } from './gateway.js';
import { defaultPrompts, renderStartTag, type PromptBuilders } from './prompts.js';

export type MergeSettings = Pick<
  PipelineConfig,
  'corroborationIncrement' | 'contradictionThreshold' | 'compressionThreshold'
>;

export type CompressionSettings = Pick<
  PipelineConfig,
  'confidenceFloor' | 'compressionThreshold' | 'topPatternsPerField'
>;

export interface AbsorbOptions {
  readonly totalChunks?: number;
  readonly signal?: AbortSignal;
}

export interface MemoryEngine {
  initialize(userIntent: string): MemoryState;
  absorb(chunk: DomChunk, state: MemoryState, options?: AbsorbOptions): Promise<MemoryState>;
  compress(state: MemoryState): MemoryState;
  needsCompression(state: MemoryState): boolean;
}

export interface CreateMemoryEngineOptions {
  readonly gateway: OracleGateway;
  readonly html: HtmlCapability;
  readonly config: PipelineConfig;
  readonly logger?: Logger;
  readonly prompts?: PromptBuilders;
}

const roundConfidence = (value: number): number => Math.round(value * 10_000) / 10_000;

const byConfidenceThenRecency = (left: Pattern, right: Pattern): number =>
  right.confidence - left.confidence || right.lastSeenChunkIndex - left.lastSeenChunkIndex;

const countPatterns = (patterns: ReadonlyMap<string, readonly Pattern[]>): number => {
  let total = 0;
  for (const list of patterns.values()) {
    total += list.length;
  }
  return total;
};

export const initializeMemory = (userIntent: string): MemoryState => ({
  userIntentAnchor: userIntent,
  cursor: { offset: 0, contextStack: [] },
  patterns: new Map(),
  discarded: new Set(),
  itemCount: 0,
  chunksAbsorbed: 0,
  pageUnderstanding: ''
});

/**
 * Folds one chunk's candidates into memory. Related selectors corroborate,
 * unrelated ones either contest a confident leader or join the field.
 */
export const mergeCandidates = (
  state: MemoryState,
  payload: ChunkAnalysisPayload,
  chunk: DomChunk,
  settings: MergeSettings
): MemoryState => {
  const patterns = new Map<string, Pattern[]>(
    [...state.patterns.entries()].map(([field, list]) => [field, [...list]])
  );
  const discarded = new Set(state.discarded);
  const discardedKeys = new Set([...discarded].map(normalizeSelector));

  const discard = (expression: string) => {
    discarded.add(expression);
    discardedKeys.add(normalizeSelector(expression));
  };

  for (const candidate of payload.patterns) {
    if (discardedKeys.has(normalizeSelector(candidate.selector))) {
      continue;
    }

    const fresh: Pattern = {
      fieldName: candidate.field,
      selectorExpression: candidate.selector,
      confidence: candidate.confidence,
      evidenceCount: 1,
      lastSeenChunkIndex: chunk.index
    };
    const existing = patterns.get(candidate.field);

    if (!existing) {
      if (patterns.size < settings.compressionThreshold) {
        patterns.set(candidate.field, [fresh]);
      }
      continue;
    }

    const relatedIndex = existing.findIndex((pattern) =>
      areRelatedSelectors(pattern.selectorExpression, candidate.selector)
    );
    const related = existing[relatedIndex];
    if (related) {
      existing[relatedIndex] = {
        ...related,
        confidence: roundConfidence(
          Math.min(1, Math.max(related.confidence + settings.corroborationIncrement, candidate.confidence))
        ),
        evidenceCount: related.evidenceCount + 1,
        lastSeenChunkIndex: chunk.index
      };
    } else {
      const [leader] = existing;
      if (leader && leader.confidence > settings.contradictionThreshold) {
        if (candidate.confidence > leader.confidence) {
          discard(leader.selectorExpression);
          existing.splice(0, 1, fresh);
        } else {
          discard(candidate.selector);
        }
      } else {
        existing.push(fresh);
      }
    }
    existing.sort(byConfidenceThenRecency);
  }

  const understanding = payload.pageUnderstanding?.trim();
  return {
    userIntentAnchor: state.userIntentAnchor,
    cursor: { offset: chunk.endOffset, contextStack: chunk.closingContextStack },
    patterns,
    discarded,
    itemCount: countPatterns(patterns),
    chunksAbsorbed: state.chunksAbsorbed + 1,
    pageUnderstanding: understanding ? understanding : state.pageUnderstanding
  };
};

/**
 * Splits oracle candidates into those whose selector parses and matches at
 * least one element of the chunk, read under its open context, and the rest.
 */
export const confirmCandidates = async (
  html: HtmlCapability,
  chunk: DomChunk,
  candidates: readonly PatternCandidate[]
): Promise<{ readonly confirmed: PatternCandidate[]; readonly rejected: PatternCandidate[] }> => {
  const fragment = `${chunk.openContextStack.map(renderStartTag).join('')}${chunk.content}`;
  const verdicts = new Map<string, Promise<boolean>>();
  const matches = (selector: string): Promise<boolean> => {
    let verdict = verdicts.get(selector);
    if (!verdict) {
      verdict = isValidSelector(selector)
        ? html.resolve(fragment, selector).then(
            (found) => found.length > 0,
            () => false
          )
        : Promise.resolve(false);
      verdicts.set(selector, verdict);
    }
    return verdict;
  };

  const results = await Promise.all(candidates.map((candidate) => matches(candidate.selector)));
  return {
    confirmed: candidates.filter((_, index) => results[index]),
    rejected: candidates.filter((_, index) => !results[index])
  };
};

const consolidate = (list: readonly Pattern[]): Pattern[] => {
  const groups = new Map<string, Pattern>();
  for (const pattern of list) {
    const key = canonicalSelectorKey(pattern.selectorExpression);
    const current = groups.get(key);
    if (!current) {
      groups.set(key, pattern);
      continue;
    }
    const winner =
      pattern.confidence > current.confidence ||
      (pattern.confidence === current.confidence && pattern.lastSeenChunkIndex > current.lastSeenChunkIndex)
        ? pattern
        : current;
    groups.set(key, {
      ...winner,
      evidenceCount: current.evidenceCount + pattern.evidenceCount,
      lastSeenChunkIndex: Math.max(current.lastSeenChunkIndex, pattern.lastSeenChunkIndex)
    });
  }
  return [...groups.values()].sort(byConfidenceThenRecency);
};

export const compressMemory = (
  state: MemoryState,
  settings: CompressionSettings
): { readonly state: MemoryState; readonly perFieldLimit: number } => {
  const consolidated = new Map<string, Pattern[]>();
  for (const [field, list] of state.patterns) {
    const kept = consolidate(list.filter((pattern) => pattern.confidence >= settings.confidenceFloor));
    if (kept.length > 0) {
      consolidated.set(field, kept);
    }
  }

  let perFieldLimit = settings.topPatternsPerField;
  let patterns = consolidated;
  if (countPatterns(consolidated) > settings.compressionThreshold) {
    const truncate = (limit: number) =>
      new Map([...consolidated.entries()].map(([field, list]) => [field, list.slice(0, limit)]));
    patterns = truncate(perFieldLimit);
    while (countPatterns(patterns) > settings.compressionThreshold && perFieldLimit > 1) {
      perFieldLimit -= 1;
      patterns = truncate(perFieldLimit);
    }
  }

  return {
    state: {
      ...state,
      patterns,
      discarded: new Set(state.discarded),
      itemCount: countPatterns(patterns)
    },
    perFieldLimit
  };
};

export const createMemoryEngine = (options: CreateMemoryEngineOptions): MemoryEngine => {
  const { gateway, config, html } = options;
  const logger = options.logger ?? createSilentLogger();
  const prompts = options.prompts ?? defaultPrompts;

  return {
    initialize: initializeMemory,

    async absorb(chunk: DomChunk, state: MemoryState, absorbOptions: AbsorbOptions = {}): Promise<MemoryState> {
      const result = await gateway.invoke(
        () =>
          prompts.chunkAnalysis({
            chunk,
            totalChunks: absorbOptions.totalChunks ?? chunk.index + 1,
            state,
            leadingPatterns: config.topPatternsPerField
          }),
        ChunkAnalysisPayloadSchema,
        { maxAttempts: config.maxValidationAttempts, signal: absorbOptions.signal }
      );

      if (!result.ok) {
        if (result.error.failureClass === 'Cancelled') {
          throw new PipelineCancelledError();
        }
        throw new MemoryAbsorbError(chunk.index, result.error);
      }

      const { confirmed, rejected } = await confirmCandidates(html, chunk, result.payload.patterns);
      if (rejected.length > 0) {
        logger.warn(
          { chunk: chunk.index, selectors: rejected.map((candidate) => candidate.selector) },
          'Dropped selectors that matched nothing in the chunk'
        );
      }
      return mergeCandidates(state, { ...result.payload, patterns: confirmed }, chunk, config);
    },

    compress(state: MemoryState): MemoryState {
      const { state: compressed, perFieldLimit } = compressMemory(state, config);
      logger.info(
        { before: state.itemCount, after: compressed.itemCount, perFieldLimit },
        'Compressed pattern memory'
      );
      return compressed;
    },

    needsCompression: (state: MemoryState) => state.itemCount > config.compressionThreshold
  };
};
