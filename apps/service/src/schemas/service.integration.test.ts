import { mkdtemp, rm } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { Writable } from 'node:stream';

import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { z } from 'zod';

import { InputError } from '@strata/core';
import { createScriptedOracle, getJobBoardAssetPath, loadJobBoardFixture, type ScriptedOracle } from '@strata/fixtures';

import { createCli } from '../cli/index.js';
import { createServer } from '../http/server.js';
import { createSilentLogger } from '../logger.js';
import { SchemaNotFoundError, type StrategyWorkflowService } from './service.js';
import { createWorkflowService } from './setup.js';

const GenerateResponseSchema = z.object({
  schemaId: z.string(),
  source: z.string(),
  rung: z.string(),
  failures: z.array(z.object({ rung: z.string(), failureClass: z.string() })),
  schema: z.object({
    containerSelector: z.string(),
    itemSelector: z.string(),
    fields: z.record(z.string(), z.object({ primary: z.string() }))
  })
});

const collect = (chunks: string[]) =>
  new Writable({
    write(chunk, _encoding, callback) {
      chunks.push(String(chunk));
      callback();
    }
  });

const FIXED_NOW = new Date('2026-03-01T12:00:00.000Z');

describe('StrategyWorkflowService integration', () => {
  let directory: string;
  let oracle: ScriptedOracle;
  let service: StrategyWorkflowService;
  let server: ReturnType<typeof createServer>;

  beforeEach(async () => {
    directory = await mkdtemp(join(tmpdir(), 'strata-schemas-'));
    // An unreachable model pushes every run down to the structural rung.
    oracle = createScriptedOracle([{ kind: 'timeout' }]);
    service = createWorkflowService({
      directory,
      env: {},
      oracle,
      now: () => FIXED_NOW,
      logger: createSilentLogger()
    });
    server = createServer({ service });
  });

  afterEach(async () => {
    await server.close();
    await rm(directory, { recursive: true, force: true });
  });

  it('generates, stores and serves a schema over HTTP', async () => {
    const fixture = loadJobBoardFixture();

    const generateResponse = await server.inject({
      method: 'POST',
      url: '/schemas/generate',
      payload: { htmlPath: getJobBoardAssetPath(), intent: 'job titles and companies' }
    });
    expect(generateResponse.statusCode).toBe(200);
    const generated = GenerateResponseSchema.parse(generateResponse.json());
    expect(generated.source).toBe('job-board.html');
    expect(generated.rung).toBe('static-heuristic');
    expect(generated.failures.map((failure) => failure.rung)).toEqual([
      'memory-evolution',
      'context-free',
      'single-chunk'
    ]);
    expect(generated.schema.containerSelector).toBe(fixture.expected.containerSelector);
    expect(generated.schema.itemSelector).toBe(fixture.expected.itemSelector);
    expect(Object.keys(generated.schema.fields).sort()).toEqual(['company', 'title']);
    expect(oracle.callCount()).toBe(3);

    const showResponse = await server.inject({ method: 'GET', url: `/schemas/${generated.schemaId}` });
    expect(showResponse.statusCode).toBe(200);
    expect(showResponse.json()).toMatchObject({
      id: generated.schemaId,
      intent: 'job titles and companies',
      source: 'job-board.html',
      createdAt: '2026-03-01T12:00:00.000Z'
    });

    const listResponse = await server.inject({ method: 'GET', url: '/schemas?source=job-board.html' });
    expect(listResponse.json()).toEqual([
      {
        schemaId: generated.schemaId,
        source: 'job-board.html',
        intent: 'job titles and companies',
        createdAt: '2026-03-01T12:00:00.000Z'
      }
    ]);
  });

  it('runs the same workflow through the CLI', async () => {
    const stdoutChunks: string[] = [];
    const cli = createCli({ service, stdout: collect(stdoutChunks), stderr: collect([]) });

    await cli.parseAsync([
      'node',
      'strata',
      'schemas:generate',
      '--html',
      getJobBoardAssetPath(),
      '--intent',
      'job titles',
      '--source',
      'board'
    ]);
    const generated = GenerateResponseSchema.parse(JSON.parse(stdoutChunks.join('')));
    expect(generated.source).toBe('board');
    expect(generated.schema.fields.title?.primary).toBe('article.job-card h2.job-title');

    stdoutChunks.length = 0;
    await cli.parseAsync(['node', 'strata', 'schemas:list']);
    expect(JSON.parse(stdoutChunks.join(''))).toEqual([
      {
        schemaId: generated.schemaId,
        source: 'board',
        intent: 'job titles',
        createdAt: '2026-03-01T12:00:00.000Z'
      }
    ]);

    stdoutChunks.length = 0;
    await cli.parseAsync(['node', 'strata', 'schemas:show', generated.schemaId]);
    expect(JSON.parse(stdoutChunks.join(''))).toMatchObject({ id: generated.schemaId, source: 'board' });
  });

  it('writes CLI failures to stderr', async () => {
    const stderrChunks: string[] = [];
    const cli = createCli({ service, stdout: collect([]), stderr: collect(stderrChunks) });

    await expect(cli.parseAsync(['node', 'strata', 'schemas:show', 'missing'])).rejects.toBeInstanceOf(
      SchemaNotFoundError
    );
    expect(stderrChunks.join('')).toBe('Schema missing not found\n');
  });

  it('labels inline documents and requires exactly one document source', async () => {
    const result = await service.generate({
      html: '<ul><li><a href="/1">One</a></li><li><a href="/2">Two</a></li></ul>',
      intent: 'links'
    });
    expect(result.stored.source).toBe('inline');
    expect(result.stored.schema.itemSelector).toBe('ul > li');

    await expect(service.generate({ intent: 'links' })).rejects.toThrow('Provide exactly one of html or htmlPath');
    await expect(service.generate({ html: '<p>x</p>', htmlPath: '/tmp/x.html', intent: 'links' })).rejects.toBeInstanceOf(
      InputError
    );
    await expect(service.generate({ html: '<p>x</p>', intent: '  ' })).rejects.toThrow(
      'An extraction intent is required'
    );
  });

  it('maps request and pipeline failures to HTTP statuses', async () => {
    const invalid = await server.inject({ method: 'POST', url: '/schemas/generate', payload: { intent: 'jobs' } });
    expect(invalid.statusCode).toBe(400);
    expect(invalid.json()).toEqual({ error: 'Provide exactly one of html or htmlPath' });

    const missingFile = join(directory, 'absent.html');
    const notFound = await server.inject({
      method: 'POST',
      url: '/schemas/generate',
      payload: { htmlPath: missingFile, intent: 'jobs' }
    });
    expect(notFound.statusCode).toBe(422);
    expect(notFound.json()).toEqual({
      error: `HTML document not found at ${missingFile}`,
      failureClass: 'InputError'
    });

    const exhausted = await server.inject({
      method: 'POST',
      url: '/schemas/generate',
      payload: { html: '<p>alone</p>', intent: 'text' }
    });
    expect(exhausted.statusCode).toBe(500);
    expect(exhausted.json()).toEqual({
      error: 'Pipeline exhausted at rung "static-heuristic"; root failure: MemoryAbsorbError (OracleUnavailable)',
      failureClass: 'PipelineExhausted',
      rung: 'static-heuristic'
    });

    const unknown = await server.inject({ method: 'GET', url: '/schemas/unknown' });
    expect(unknown.statusCode).toBe(404);
    expect(unknown.json()).toEqual({ error: 'Schema unknown not found' });
  });
});
