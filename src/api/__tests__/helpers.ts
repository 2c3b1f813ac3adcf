// Общие помощники тестов HTTP API.
import type { Hono } from 'hono';
import { createApp } from '../app.js';
import { createMemoryStores } from '../../storage/__tests__/memory-stores.js';

export const MISSING_ID = '00000000-0000-4000-8000-000000000000';

export function setupApi(ping: () => Promise<void> = async () => {}) {
  const stores = createMemoryStores();
  const app = createApp({ ...stores, ping }, { corsOrigins: ['*'], requestLog: false });
  return { app, stores };
}

export function send(app: Hono, method: string, path: string, body?: unknown): Promise<Response> {
  return Promise.resolve(
    app.request(path, {
      method,
      headers: { 'Content-Type': 'application/json' },
      body: body === undefined ? undefined : JSON.stringify(body),
    }),
  );
}

export async function json<T>(response: Response): Promise<T> {
  return (await response.json()) as T;
}

export interface Page<T> {
  total: number;
  limit: number;
  offset: number;
  items: T[];
}

export interface Detail {
  detail: string;
}

export interface ValidationDetail {
  detail: { loc: (string | number)[]; msg: string; type: string }[];
}
