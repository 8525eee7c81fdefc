/**
 * Library entry point
 */

export * from './modules/geography/index.js';

export { parseEnv, createConfig, type Env, type AppConfig } from './infra/config/index.js';
export { createLogger, type Logger, type LoggerConfig } from './infra/logger/index.js';
export { initDatabase, type GeographyDbClient, type GeographyDatabase } from './infra/database/client.js';
