import {
  CONTAINER_FIELD,
  ExtractionSchemaSchema,
  ITEM_FIELD,
  PipelineCancelledError,
  SchemaGenerationError,
  SchemaSynthesisPayloadSchema,
  normalizeSelector,
  type ExtractionSchema,
  type FieldSelector,
  type HtmlCapability,
  type MemoryState,
  type Pattern,
  type PipelineConfig,
  type SchemaSynthesisPayload,
  type StrategyRung
} from '@strata/core';

import { createSilentLogger, type Logger } from '../logger.js';
import type { OracleGateway } from './gateway.js';
import { defaultPrompts, type PromptBuilders } from './prompts.js';

export interface GenerateSchemaOptions {
  readonly signal?: AbortSignal;
  readonly strategy?: StrategyRung;
}

export interface SchemaCompiler {
  generate(state: MemoryState, sourceHtml: string, options?: GenerateSchemaOptions): Promise<ExtractionSchema>;
}

export interface CreateSchemaCompilerOptions {
  readonly gateway: OracleGateway;
  readonly html: HtmlCapability;
  readonly config: PipelineConfig;
  readonly logger?: Logger;
  readonly prompts?: PromptBuilders;
}

interface Candidate {
  readonly selector: string;
  readonly confidence: number;
}

const RESERVED_FIELDS = new Set<string>([CONTAINER_FIELD, ITEM_FIELD]);

type SynthesizedField = SchemaSynthesisPayload['fields'][string];

/** Field names come from the document, so only own keys count. */
const synthesizedField = (plan: SchemaSynthesisPayload, field: string): SynthesizedField | undefined =>
  Object.hasOwn(plan.fields, field) ? plan.fields[field] : undefined;

export const inferAttribute = (fieldName: string): string | undefined => {
  const name = fieldName.toLowerCase();
  if (/(link|url|href)/.test(name)) {
    return 'href';
  }
  if (/(image|img|photo|thumbnail|logo)/.test(name)) {
    return 'src';
  }
  return undefined;
};

/**
 * Orders the selectors worth trying for one field: the synthesized selector
 * first, then memory patterns above the floor that differ from it.
 */
const collectCandidates = (
  synthesized: Candidate | undefined,
  memory: readonly Pattern[],
  floor: number,
  maxFallbacks: number
): Candidate[] => {
  const candidates: Candidate[] = [];
  const seen = new Set<string>();

  if (synthesized) {
    const key = normalizeSelector(synthesized.selector);
    const remembered = memory.find((pattern) => normalizeSelector(pattern.selectorExpression) === key);
    candidates.push({ selector: synthesized.selector, confidence: remembered?.confidence ?? synthesized.confidence });
    seen.add(key);
  }

  const limit = candidates.length + maxFallbacks;
  for (const pattern of memory) {
    if (candidates.length >= limit) {
      break;
    }
    const key = normalizeSelector(pattern.selectorExpression);
    if (pattern.confidence < floor || seen.has(key)) {
      continue;
    }
    seen.add(key);
    candidates.push({ selector: pattern.selectorExpression, confidence: pattern.confidence });
  }
  return candidates;
};

export const createSchemaCompiler = (options: CreateSchemaCompilerOptions): SchemaCompiler => {
  const { gateway, config, html } = options;
  const logger = options.logger ?? createSilentLogger();
  const prompts = options.prompts ?? defaultPrompts;

  const resolveAll = async (sourceHtml: string, selectors: Iterable<string>): Promise<Map<string, number>> => {
    const unique = [...new Set(selectors)];
    const counts = await Promise.all(
      unique.map((selector) =>
        html.resolve(sourceHtml, selector).then(
          (matches) => matches.length,
          (error: unknown) => {
            const message = error instanceof Error ? error.message : String(error);
            logger.warn({ selector, error: message }, 'Selector failed to resolve');
            return 0;
          }
        )
      )
    );
    return new Map(unique.map((selector, index) => [selector, counts[index] ?? 0]));
  };

  return {
    async generate(
      state: MemoryState,
      sourceHtml: string,
      generateOptions: GenerateSchemaOptions = {}
    ): Promise<ExtractionSchema> {
      const qualified = [...state.patterns.values()]
        .flat()
        .filter((pattern) => pattern.confidence >= config.confidenceThreshold);

      const result = await gateway.invoke(
        () => prompts.schemaSynthesis({ state, patterns: qualified }),
        SchemaSynthesisPayloadSchema,
        { maxAttempts: config.maxValidationAttempts, signal: generateOptions.signal }
      );
      if (!result.ok) {
        if (result.error.failureClass === 'Cancelled') {
          throw new PipelineCancelledError();
        }
        throw result.error;
      }
      const plan = result.payload;

      const fieldNames = new Set(Object.keys(plan.fields).filter((name) => !RESERVED_FIELDS.has(name)));
      for (const pattern of qualified) {
        if (!RESERVED_FIELDS.has(pattern.fieldName)) {
          fieldNames.add(pattern.fieldName);
        }
      }

      const memoryFor = (field: string) => state.patterns.get(field) ?? [];
      const fieldCandidates = new Map(
        [...fieldNames].map((field) => [
          field,
          collectCandidates(synthesizedField(plan, field), memoryFor(field), config.confidenceFloor, config.maxFallbacks)
        ])
      );
      const containerCandidates = collectCandidates(
        { selector: plan.containerSelector, confidence: 1 },
        memoryFor(CONTAINER_FIELD),
        config.confidenceFloor,
        config.maxFallbacks
      );
      const itemCandidates = collectCandidates(
        { selector: plan.itemSelector, confidence: 1 },
        memoryFor(ITEM_FIELD),
        config.confidenceFloor,
        config.maxFallbacks
      );

      const counts = await resolveAll(
        sourceHtml,
        [...containerCandidates, ...itemCandidates, ...[...fieldCandidates.values()].flat()].map(
          (candidate) => candidate.selector
        )
      );
      const resolves = (candidate: Candidate) => (counts.get(candidate.selector) ?? 0) > 0;

      const container = containerCandidates.find(resolves);
      const item = itemCandidates.find(resolves);
      if (!container) {
        throw new SchemaGenerationError(
          `Container selector could not be confirmed against the document (tried ${containerCandidates.map((c) => c.selector).join(', ')})`
        );
      }
      if (!item) {
        throw new SchemaGenerationError(
          `Item selector could not be confirmed against the document (tried ${itemCandidates.map((c) => c.selector).join(', ')})`
        );
      }

      const fields = new Map<string, FieldSelector>();
      for (const [field, candidates] of fieldCandidates) {
        const working = candidates.filter(resolves);
        const demoted = candidates.filter((candidate) => !resolves(candidate)).map((candidate) => candidate.selector);
        const [primary, ...fallbacks] = working;

        if (demoted.length > 0) {
          logger.warn({ field, demoted }, 'Demoted selectors that matched nothing');
        }
        if (!primary) {
          logger.warn({ field }, 'Dropped field without a resolving selector');
          continue;
        }

        const attribute = synthesizedField(plan, field)?.attribute ?? inferAttribute(field);
        fields.set(field, {
          primary: primary.selector,
          fallbacks: fallbacks.map((candidate) => candidate.selector),
          confidence: primary.confidence,
          demoted,
          ...(attribute ? { attribute } : {})
        });
      }

      if (fields.size === 0) {
        throw new SchemaGenerationError('No field selector could be confirmed against the document');
      }

      return ExtractionSchemaSchema.parse({
        containerSelector: container.selector,
        itemSelector: item.selector,
        fields: Object.fromEntries(fields),
        confidenceSummary: Object.fromEntries([...fields].map(([field, selector]) => [field, selector.confidence])),
        strategy: generateOptions.strategy ?? 'memory-evolution',
        explanation: plan.explanation ?? ''
      });
    }
  };
};
