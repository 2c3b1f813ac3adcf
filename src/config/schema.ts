import { z } from 'zod';

// Схема подключения к PostgreSQL.
// Порт принимается и строкой: подстановка ${ENV_VAR} всегда дает строку.
export const DatabaseConfigSchema = z.object({
  host: z.string().default('localhost'),
  port: z.coerce.number().int().positive().default(5432),
  name: z.string().default('travel_planner'),
  user: z.string().default('travel'),
  password: z.string().default('travel'),
  ssl: z.boolean().default(false),
});

// Схема HTTP-сервера.
export const ServerConfigSchema = z.object({
  host: z.string().default('0.0.0.0'),
  port: z.coerce.number().int().positive().default(3001),
  corsOrigins: z.array(z.string()).default(['*']),
  requestLog: z.boolean().default(true),
});

// Корневая схема конфигурации приложения.
export const AppConfigSchema = z.object({
  database: DatabaseConfigSchema.default(() => ({
    host: 'localhost',
    port: 5432,
    name: 'travel_planner',
    user: 'travel',
    password: 'travel',
    ssl: false,
  })),
  server: ServerConfigSchema.default(() => ({
    host: '0.0.0.0',
    port: 3001,
    corsOrigins: ['*'],
    requestLog: true,
  })),
});

// Типы, выведенные из схем.
export type DatabaseConfig = z.infer<typeof DatabaseConfigSchema>;
export type ServerConfig = z.infer<typeof ServerConfigSchema>;
export type AppConfig = z.infer<typeof AppConfigSchema>;
