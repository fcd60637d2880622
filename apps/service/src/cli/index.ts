import { Command } from 'commander';

import type { StrategyWorkflowService } from '../schemas/service.js';

export interface CreateCliOptions {
  readonly service: StrategyWorkflowService;
  readonly stdout?: NodeJS.WritableStream;
  readonly stderr?: NodeJS.WritableStream;
}

export const createCli = (options: CreateCliOptions): Command => {
  const program = new Command();
  const stdout = options.stdout ?? process.stdout;
  const stderr = options.stderr ?? process.stderr;
  const service = options.service;

  const writeJson = (value: unknown) => {
    const serialized = JSON.stringify(value, null, 2);
    stdout.write(`${serialized}\n`);
  };

  const handle = <T extends unknown[]>(runner: (...args: T) => Promise<void>) => {
    return async (...args: T) => {
      try {
        await runner(...args);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        stderr.write(`${message}\n`);
        throw error;
      }
    };
  };

  program.name('strata').description('Generate extraction schemas from HTML documents');

  program
    .command('schemas:generate')
    .description('Run the strategy pipeline over an HTML document and store the schema')
    .requiredOption('--html <path>', 'Path to the HTML document')
    .requiredOption('--intent <text>', 'What the schema should extract')
    .option('--source <label>', 'Label recorded with the stored schema')
    .action(
      handle(async (command: { html: string; intent: string; source?: string }) => {
        const result = await service.generate({
          htmlPath: command.html,
          intent: command.intent,
          source: command.source
        });
        writeJson({
          schemaId: result.stored.id,
          source: result.stored.source,
          rung: result.rung,
          failures: result.failures,
          schema: result.stored.schema
        });
      })
    );

  program
    .command('schemas:show <schemaId>')
    .description('Print a stored schema')
    .action(
      handle(async (schemaId: string) => {
        writeJson(await service.getSchema(schemaId));
      })
    );

  program
    .command('schemas:list')
    .description('List stored schemas')
    .option('--source <label>', 'Only schemas generated from this source')
    .action(
      handle(async (command: { source?: string }) => {
        const stored = await service.listSchemas({ source: command.source });
        writeJson(
          stored.map((entry) => ({
            schemaId: entry.id,
            source: entry.source,
            intent: entry.intent,
            createdAt: entry.createdAt.toISOString()
          }))
        );
      })
    );

  return program;
};
