import Fastify, { type FastifyInstance } from 'fastify';
import { z } from 'zod';

import { InputError, PipelineExhaustedError, isStrataError } from '@strata/core';

import { SchemaNotFoundError, type StrategyWorkflowService } from '../schemas/service.js';

export interface CreateServerOptions {
  readonly service: StrategyWorkflowService;
}

const GenerateBodySchema = z
  .object({
    html: z.string().optional(),
    htmlPath: z.string().optional(),
    intent: z.string().min(1),
    source: z.string().optional()
  })
  .strict()
  .refine((body) => (body.html === undefined) !== (body.htmlPath === undefined), {
    message: 'Provide exactly one of html or htmlPath'
  });

const SchemaParamsSchema = z.object({ id: z.string().min(1) });
const ListQuerySchema = z.object({ source: z.string().optional() });

export const createServer = (options: CreateServerOptions): FastifyInstance => {
  const app = Fastify({ logger: false });
  const service = options.service;

  app.post('/schemas/generate', async (request, reply) => {
    const body = GenerateBodySchema.parse(request.body ?? {});
    const result = await service.generate(body);

    return reply.send({
      schemaId: result.stored.id,
      source: result.stored.source,
      rung: result.rung,
      failures: result.failures,
      schema: result.stored.schema
    });
  });

  app.get('/schemas/:id', async (request, reply) => {
    const { id } = SchemaParamsSchema.parse(request.params);
    return reply.send(await service.getSchema(id));
  });

  app.get('/schemas', async (request, reply) => {
    const query = ListQuerySchema.parse(request.query ?? {});
    const stored = await service.listSchemas(query);
    return reply.send(
      stored.map((entry) => ({
        schemaId: entry.id,
        source: entry.source,
        intent: entry.intent,
        createdAt: entry.createdAt.toISOString()
      }))
    );
  });

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof z.ZodError) {
      return reply.status(400).send({ error: error.issues.map((issue) => issue.message).join('; ') });
    }
    if (error instanceof SchemaNotFoundError) {
      return reply.status(404).send({ error: error.message });
    }
    if (error instanceof InputError) {
      return reply.status(422).send({ error: error.message, failureClass: error.failureClass });
    }
    if (isStrataError(error)) {
      return reply.status(500).send({
        error: error.message,
        failureClass: error.failureClass,
        ...(error instanceof PipelineExhaustedError ? { rung: error.rung } : {})
      });
    }
    return reply.status(500).send({ error: error.message });
  });

  return app;
};
