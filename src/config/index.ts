// Barrel-файл модуля конфигурации.
export {
  AppConfigSchema,
  DatabaseConfigSchema,
  ServerConfigSchema,
} from './schema.js';

export type {
  AppConfig,
  DatabaseConfig,
  ServerConfig,
} from './schema.js';

export { defaultConfig } from './defaults.js';

export {
  loadConfig,
  resolveEnvVars,
  deepMerge,
  applyDatabaseEnv,
  hostFromPostgresUrl,
} from './loader.js';
