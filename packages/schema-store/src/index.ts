export { LocalFileSystemSchemaStore, type LocalFileSystemSchemaStoreOptions } from './local-file-system.js';
export type { SaveSchemaOptions, SchemaStore, StoredSchema } from './types.js';
