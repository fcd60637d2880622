import { randomUUID } from 'node:crypto';
import { mkdir, readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';

import { z } from 'zod';

import { ExtractionSchemaSchema, type ExtractionSchema } from '@strata/core';

import type { SaveSchemaOptions, SchemaStore, StoredSchema } from './types.js';

const FileRecordSchema = z
  .object({
    id: z.string().min(1, 'Schema record is missing an id'),
    schema: ExtractionSchemaSchema,
    intent: z.string(),
    source: z.string(),
    createdAt: z.string().datetime()
  })
  .strict();

type FileRecord = z.infer<typeof FileRecordSchema>;

const ID_PATTERN = /^[A-Za-z0-9-]+$/;

export interface LocalFileSystemSchemaStoreOptions {
  readonly directory: string;
  readonly now?: () => Date;
}

export class LocalFileSystemSchemaStore implements SchemaStore {
  private readonly directory: string;
  private readonly now: () => Date;
  private readonly ready: Promise<void>;

  constructor(options: LocalFileSystemSchemaStoreOptions) {
    this.directory = options.directory;
    this.now = options.now ?? (() => new Date());
    this.ready = mkdir(this.directory, { recursive: true }).then(() => undefined);
  }

  async save(schema: ExtractionSchema, options: SaveSchemaOptions): Promise<StoredSchema> {
    await this.ready;

    const record: FileRecord = {
      id: randomUUID(),
      schema: ExtractionSchemaSchema.parse(schema),
      intent: options.intent,
      source: options.source,
      createdAt: (options.when ?? this.now()).toISOString()
    };

    const filePath = join(this.directory, `${record.id}.json`);
    await writeFile(filePath, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');

    return this.hydrate(record);
  }

  async list(options: { source?: string } = {}): Promise<readonly StoredSchema[]> {
    await this.ready;
    const entries = await readdir(this.directory, { withFileTypes: true });
    const records: StoredSchema[] = [];

    for (const entry of entries) {
      if (!entry.isFile() || !entry.name.endsWith('.json')) {
        continue;
      }

      const record = await this.readRecord(entry.name);
      if (!record) {
        continue;
      }

      if (options.source !== undefined && record.source !== options.source) {
        continue;
      }

      records.push(record);
    }

    return records.sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
  }

  async getById(id: string): Promise<StoredSchema | undefined> {
    if (!ID_PATTERN.test(id)) {
      return undefined;
    }
    await this.ready;
    return this.readRecord(`${id}.json`);
  }

  async getLatestFor(source: string): Promise<StoredSchema | undefined> {
    const records = await this.list({ source });
    return records.at(-1);
  }

  private async readRecord(fileName: string): Promise<StoredSchema | undefined> {
    const filePath = join(this.directory, fileName);
    let raw: string;
    try {
      raw = await readFile(filePath, 'utf-8');
    } catch (error) {
      if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
        return undefined;
      }
      throw error;
    }

    const parsed = FileRecordSchema.safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Invalid schema record in ${fileName}: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`);
    }

    return this.hydrate(parsed.data);
  }

  private hydrate(record: FileRecord): StoredSchema {
    return {
      id: record.id,
      schema: record.schema,
      intent: record.intent,
      source: record.source,
      createdAt: new Date(record.createdAt)
    };
  }
}
