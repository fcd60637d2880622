export * from './chunker.js';
export * from './compiler.js';
export * from './controller.js';
export * from './gateway.js';
export * from './memory.js';
export * from './prompts.js';
export * from './static-fallback.js';
