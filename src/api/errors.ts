// Отображение ошибок на HTTP-ответы вида { detail }.
import type { Context } from 'hono';
import { NotFoundError, ValidationError } from '../errors.js';
import { FOREIGN_KEY_VIOLATION, pgErrorCode } from '../storage/errors.js';

export type RequestLocation = 'body' | 'query' | 'path';

// Элемент списка ошибок валидации запроса.
export interface ValidationIssue {
  loc: (string | number)[];
  msg: string;
  type: string;
}

// Запрос не прошел проверку схемы: тело, строка запроса или параметр пути.
export class RequestValidationError extends Error {
  name = 'RequestValidationError';

  constructor(readonly issues: ValidationIssue[]) {
    super(issues.map((issue) => `${issue.loc.join('.')}: ${issue.msg}`).join('; '));
  }
}

export function handleApiError(error: Error, c: Context): Response {
  if (error instanceof RequestValidationError) {
    return c.json({ detail: error.issues }, 422);
  }

  if (error instanceof ValidationError) {
    return c.json({ detail: error.message }, 422);
  }

  if (error instanceof NotFoundError) {
    return c.json({ detail: error.message }, 404);
  }

  // Ссылка на несуществующую запись, например destination_id.
  if (pgErrorCode(error) === FOREIGN_KEY_VIOLATION) {
    return c.json({ detail: 'Referenced record does not exist' }, 422);
  }

  console.error(`Необработанная ошибка ${c.req.method} ${c.req.path}:`, error);
  return c.json({ detail: 'Internal Server Error' }, 500);
}
