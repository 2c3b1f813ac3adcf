import type { AppConfig } from './schema.js';

// Значения по умолчанию для конфигурации.
// Используются при deep-merge с пользовательским конфигом до валидации.
export const defaultConfig: AppConfig = {
  database: {
    host: 'localhost',
    port: 5432,
    name: 'travel_planner',
    user: 'travel',
    password: 'travel',
    ssl: false,
  },
  server: {
    host: '0.0.0.0',
    port: 3001,
    corsOrigins: ['*'],
    requestLog: true,
  },
};
