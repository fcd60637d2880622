import type { ExtractionSchema } from '@strata/core';

export interface StoredSchema {
  readonly id: string;
  readonly schema: ExtractionSchema;
  readonly intent: string;
  /** Free-form label for the document the schema was generated from. */
  readonly source: string;
  readonly createdAt: Date;
}

export interface SaveSchemaOptions {
  readonly intent: string;
  readonly source: string;
  readonly when?: Date;
}

export interface SchemaStore {
  save(schema: ExtractionSchema, options: SaveSchemaOptions): Promise<StoredSchema>;
  list(options?: { source?: string }): Promise<readonly StoredSchema[]>;
  getById(id: string): Promise<StoredSchema | undefined>;
  getLatestFor(source: string): Promise<StoredSchema | undefined>;
}
