import { describe, expect, it } from 'vitest';

import { GatewayError, SchemaGenerationError, createPipelineConfig, type MemoryState, type Pattern } from '@strata/core';
import { createScriptedOracle } from '@strata/fixtures';
import { createHtmlCapability } from '@strata/html-tools';

import { createSchemaCompiler, inferAttribute } from './compiler.js';
import { createOracleGateway } from './gateway.js';
import { initializeMemory } from './memory.js';

const card = (id: number) =>
  `<article class="job"><h2 class="job-title"><a href="/jobs/${id}">Job ${id}</a></h2><span class="company">Acme</span></article>`;
const HTML = `<section class="jobs">${card(1)}${card(2)}${card(3)}</section>`;

const pattern = (fieldName: string, selectorExpression: string, confidence: number): Pattern => ({
  fieldName,
  selectorExpression,
  confidence,
  evidenceCount: 2,
  lastSeenChunkIndex: 1
});

const memory: MemoryState = {
  ...initializeMemory('job titles, links and companies'),
  patterns: new Map([
    ['@container', [pattern('@container', 'section.jobs', 0.85)]],
    ['@item', [pattern('@item', 'article.job', 0.9)]],
    ['title', [pattern('title', 'h2.job-title', 0.9), pattern('title', 'article.job h2', 0.6)]],
    ['company', [pattern('company', 'span.company', 0.85)]],
    ['location', [pattern('location', 'span.location', 0.5)]]
  ]),
  itemCount: 6
};

const createCompiler = (replies: Parameters<typeof createScriptedOracle>[0]) => {
  const oracle = createScriptedOracle(replies);
  const compiler = createSchemaCompiler({
    gateway: createOracleGateway({ oracle }),
    html: createHtmlCapability(),
    config: createPipelineConfig()
  });
  return { oracle, compiler };
};

describe('createSchemaCompiler', () => {
  it('promotes a resolving fallback over a primary that matches nothing', async () => {
    const { oracle, compiler } = createCompiler([
      JSON.stringify({
        containerSelector: 'section.listing',
        itemSelector: 'article.job',
        fields: {
          title: { selector: 'h3.title', confidence: 0.95 },
          link: { selector: 'h2.job-title a', confidence: 0.8 },
          ghost: { selector: '.nope', confidence: 0.7 }
        },
        explanation: 'Cards inside the jobs section'
      })
    ]);

    const schema = await compiler.generate(memory, HTML);

    expect(schema).toEqual({
      containerSelector: 'section.jobs',
      itemSelector: 'article.job',
      fields: {
        title: { primary: 'h2.job-title', fallbacks: ['article.job h2'], confidence: 0.9, demoted: ['h3.title'] },
        link: { primary: 'h2.job-title a', fallbacks: [], confidence: 0.8, demoted: [], attribute: 'href' },
        company: { primary: 'span.company', fallbacks: [], confidence: 0.85, demoted: [] }
      },
      confidenceSummary: { title: 0.9, link: 0.8, company: 0.85 },
      strategy: 'memory-evolution',
      explanation: 'Cards inside the jobs section'
    });
    expect(oracle.prompts[0]).toContain('h2.job-title');
    expect(oracle.prompts[0]).not.toContain('span.location');
  });

  it('uses memory confidence when the synthesized selector was already known', async () => {
    const { compiler } = createCompiler([
      JSON.stringify({
        containerSelector: 'section.jobs',
        itemSelector: 'article.job',
        fields: { title: { selector: 'h2.job-title', confidence: 0.5 } }
      })
    ]);

    const schema = await compiler.generate(memory, HTML, { strategy: 'single-chunk' });

    expect(schema.fields.title?.confidence).toBe(0.9);
    expect(schema.strategy).toBe('single-chunk');
    expect(schema.explanation).toBe('');
  });

  it('treats field names that shadow object members as ordinary fields', async () => {
    const { oracle, compiler } = createCompiler([
      JSON.stringify({
        containerSelector: 'section.jobs',
        itemSelector: 'article.job',
        fields: {
          title: { selector: 'h2.job-title', confidence: 0.95 },
          toString: { selector: 'h2.job-title a', confidence: 0.8 }
        }
      })
    ]);
    const state: MemoryState = {
      ...initializeMemory('job titles and employers'),
      patterns: new Map([
        ['@container', [pattern('@container', 'section.jobs', 0.85)]],
        ['constructor', [pattern('constructor', 'span.company', 0.9)]]
      ]),
      itemCount: 2
    };

    const schema = await compiler.generate(state, HTML);

    expect(schema.fields).toEqual({
      title: { primary: 'h2.job-title', fallbacks: [], confidence: 0.95, demoted: [] },
      toString: { primary: 'h2.job-title a', fallbacks: [], confidence: 0.8, demoted: [] },
      constructor: { primary: 'span.company', fallbacks: [], confidence: 0.9, demoted: [] }
    });
    expect(schema.confidenceSummary).toEqual({ title: 0.95, toString: 0.8, constructor: 0.9 });
    expect(oracle.prompts[0]).toContain('"constructor": [');
  });

  it('fails when the container cannot be confirmed', async () => {
    const { compiler } = createCompiler([
      JSON.stringify({
        containerSelector: 'main.none',
        itemSelector: 'article.job',
        fields: { title: { selector: 'h2.job-title', confidence: 0.9 } }
      })
    ]);

    await expect(compiler.generate(initializeMemory('jobs'), HTML)).rejects.toThrow(
      new SchemaGenerationError('Container selector could not be confirmed against the document (tried main.none)')
    );
  });

  it('fails when no field resolves', async () => {
    const { compiler } = createCompiler([
      JSON.stringify({
        containerSelector: 'section.jobs',
        itemSelector: 'article.job',
        fields: { title: { selector: 'h5', confidence: 0.9 } }
      })
    ]);

    await expect(compiler.generate(initializeMemory('jobs'), HTML)).rejects.toBeInstanceOf(SchemaGenerationError);
  });

  it('passes gateway failures through unchanged', async () => {
    const { compiler } = createCompiler(['{"containerSelector": 1}']);

    const failure = await compiler.generate(memory, HTML).catch((error: unknown) => error);

    expect(failure).toBeInstanceOf(GatewayError);
    if (failure instanceof GatewayError) {
      expect(failure.failureClass).toBe('ValidationExhausted');
    }
  });
});

describe('inferAttribute', () => {
  it('maps link and image fields to their attributes', () => {
    expect(inferAttribute('detailLink')).toBe('href');
    expect(inferAttribute('logo_image')).toBe('src');
    expect(inferAttribute('title')).toBeUndefined();
  });
});
