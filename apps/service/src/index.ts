export * from './pipeline/index.js';
export * from './schemas/index.js';
export { createCli, type CreateCliOptions } from './cli/index.js';
export { createServer, type CreateServerOptions } from './http/server.js';
export { loadServiceSettings, type ServiceSettings } from './config.js';
export { createLogger, createSilentLogger, type CreateLoggerOptions, type Logger } from './logger.js';
export { createAiSdkOracle, DEFAULT_ORACLE_TIMEOUT_MS, type AiSdkOracleOptions } from './oracle/ai-sdk-oracle.js';
