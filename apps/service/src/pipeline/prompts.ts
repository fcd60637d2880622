import type { ContextFrame, DomChunk, MemoryState, Pattern } from '@strata/core';

export interface ChunkAnalysisPromptInput {
  readonly chunk: DomChunk;
  readonly totalChunks: number;
  readonly state: MemoryState;
  readonly leadingPatterns?: number;
}

export interface SchemaSynthesisPromptInput {
  readonly state: MemoryState;
  readonly patterns: readonly Pattern[];
}

export interface PromptBuilders {
  readonly chunkAnalysis: (input: ChunkAnalysisPromptInput) => string;
  readonly schemaSynthesis: (input: SchemaSynthesisPromptInput) => string;
}

const escapeAttribute = (value: string): string => value.replace(/&/g, '&amp;').replace(/"/g, '&quot;');

export const renderStartTag = (frame: ContextFrame): string => {
  const attributes = Object.entries(frame.attributes)
    .map(([name, value]) => ` ${name}="${escapeAttribute(value)}"`)
    .join('');
  return `<${frame.tag}${attributes}>`;
};

const section = (title: string, body: string): string => `## ${title}\n${body.length > 0 ? body : '(none)'}`;

const summarizePatterns = (state: MemoryState, perField: number) =>
  Object.fromEntries(
    [...state.patterns.entries()].map(([field, patterns]) => [
      field,
      patterns.slice(0, perField).map((pattern) => ({
        selector: pattern.selectorExpression,
        confidence: pattern.confidence,
        evidence: pattern.evidenceCount
      }))
    ])
  );

const CHUNK_RESPONSE_SHAPE = JSON.stringify(
  {
    patterns: [{ field: 'string', selector: 'CSS selector', confidence: 0.0 }],
    pageUnderstanding: 'one or two sentences about the page'
  },
  null,
  2
);

const SYNTHESIS_RESPONSE_SHAPE = JSON.stringify(
  {
    containerSelector: 'CSS selector',
    itemSelector: 'CSS selector',
    fields: { fieldName: { selector: 'CSS selector relative to the document', confidence: 0.0, attribute: 'optional' } },
    explanation: 'short rationale'
  },
  null,
  2
);

export const buildChunkAnalysisPrompt = (input: ChunkAnalysisPromptInput): string => {
  const { chunk, state } = input;
  return [
    'You are analysing one slice of a large HTML listing page to discover CSS selectors for repeated records.',
    'Use "@container" for the listing wrapper and "@item" for each record; every other field is a value to extract.',
    section('Intent', state.userIntentAnchor),
    section('Position', `Chunk ${chunk.index + 1} of ${input.totalChunks} (offsets ${chunk.startOffset}-${chunk.endOffset})`),
    section('Open context', chunk.openContextStack.map(renderStartTag).join('')),
    section('Previous chunk tail (for orientation only)', chunk.contextEcho),
    section('Current patterns', JSON.stringify(summarizePatterns(state, input.leadingPatterns ?? 3), null, 2)),
    section('Rejected selectors (do not propose again)', JSON.stringify([...state.discarded])),
    section('Page understanding so far', state.pageUnderstanding),
    section('Chunk HTML', chunk.content),
    `Respond with JSON only, in exactly this shape:\n${CHUNK_RESPONSE_SHAPE}`
  ].join('\n\n');
};

export const buildSchemaSynthesisPrompt = (input: SchemaSynthesisPromptInput): string => {
  const grouped = new Map<string, { selector: string; confidence: number }[]>();
  for (const pattern of input.patterns) {
    const list = grouped.get(pattern.fieldName) ?? [];
    list.push({ selector: pattern.selectorExpression, confidence: pattern.confidence });
    grouped.set(pattern.fieldName, list);
  }

  return [
    'Combine the selector evidence gathered across the document into one extraction schema.',
    section('Intent', input.state.userIntentAnchor),
    section('Page understanding', input.state.pageUnderstanding),
    section('High-confidence patterns', JSON.stringify(Object.fromEntries(grouped), null, 2)),
    `Respond with JSON only, in exactly this shape:\n${SYNTHESIS_RESPONSE_SHAPE}`
  ].join('\n\n');
};

export const defaultPrompts: PromptBuilders = {
  chunkAnalysis: buildChunkAnalysisPrompt,
  schemaSynthesis: buildSchemaSynthesisPrompt
};
