// Zod-схемы запросов API и разбор тела, строки запроса и параметров пути.
import type { Context } from 'hono';
import { z } from 'zod';
import { ValidationError } from '../errors.js';
import { RequestValidationError, type RequestLocation } from './errors.js';

export function parseInput<Output>(
  location: RequestLocation,
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
  data: unknown,
): Output {
  const result = schema.safeParse(data);
  if (!result.success) {
    throw new RequestValidationError(
      result.error.issues.map((issue) => ({
        loc: [location, ...issue.path],
        msg: issue.message,
        type: issue.code,
      })),
    );
  }
  return result.data;
}

// Разбирает JSON-тело запроса по схеме.
export async function parseBody<Output>(
  c: Context,
  schema: z.ZodType<Output, z.ZodTypeDef, unknown>,
): Promise<Output> {
  let body: unknown;
  try {
    body = await c.req.json();
  } catch {
    throw new RequestValidationError([{ loc: ['body'], msg: 'JSON decode error', type: 'json_invalid' }]);
  }
  return parseInput('body', schema, body);
}

export function parseQuery<Output>(c: Context, schema: z.ZodType<Output, z.ZodTypeDef, unknown>): Output {
  return parseInput('query', schema, c.req.query());
}

const uuid = z.string().uuid();

// Проверяет UUID из пути; name: имя параметра в ответе об ошибке.
export function pathUuid(value: string, name: string): string {
  if (!uuid.safeParse(value).success) {
    throw new RequestValidationError([{ loc: ['path', name], msg: 'Invalid uuid', type: 'invalid_string' }]);
  }
  return value;
}

// Значения булевых параметров строки запроса.
const BOOLEAN_VALUES: Record<string, boolean> = {
  true: true,
  '1': true,
  yes: true,
  on: true,
  false: false,
  '0': false,
  no: false,
  off: false,
};

function queryBoolean(fallback: boolean) {
  return z
    .string()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined) {
        return fallback;
      }
      const parsed = BOOLEAN_VALUES[value.toLowerCase()];
      if (parsed === undefined) {
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Input should be a valid boolean' });
        return z.NEVER;
      }
      return parsed;
    });
}

function pageQuery(defaultLimit: number) {
  return z.object({
    limit: z.coerce.number().int().min(1).max(100).default(defaultLimit),
    offset: z.coerce.number().int().min(0).default(0),
  });
}

// Список записей поездки: 50 на страницу по умолчанию.
export const tripScopedPageQuery = pageQuery(50);

export const tripListQuery = pageQuery(20).extend({
  sort_by: z.enum(['created_at', 'name']).default('created_at'),
  sort_dir: z.enum(['asc', 'desc']).default('desc'),
});

// Диапазоны limit / offset проверяет сервис поиска.
export const destinationSearchQuery = z.object({
  q: z.string().min(1),
  limit: z.coerce.number().int().optional(),
  offset: z.coerce.number().int().optional(),
  include_country: queryBoolean(true),
  include_city: queryBoolean(true),
});

const isoDate = z.string().date();
const isoDateTime = z.string().datetime({ offset: true }).transform((value) => new Date(value));

function nonBlank(field: string, max?: number) {
  const text = max === undefined ? z.string() : z.string().max(max);
  return text
    .transform((value) => value.trim())
    .refine((value) => value !== '', `${field} must not be blank`);
}

export const tripCreateBody = z.object({
  name: nonBlank('name', 200),
  start_date: isoDate.nullish(),
  end_date: isoDate.nullish(),
});

// При обновлении null и отсутствующее поле одинаково оставляют значение без изменений.
export const tripUpdateBody = z.object({
  name: nonBlank('name', 200).nullish(),
  start_date: isoDate.nullish(),
  end_date: isoDate.nullish(),
});

export const destinationCreateBody = z.object({
  name: nonBlank('name', 200),
  country: z.string().max(100).nullish(),
  city: z.string().max(100).nullish(),
  description: z.string().nullish(),
  popularity: z.number().int().nullish(),
});

const itineraryFields = {
  day: z.number().int().min(1),
  title: nonBlank('title', 200),
  description: z.string().nullish(),
  start_time: isoDateTime.nullish(),
  end_time: isoDateTime.nullish(),
  destination_id: uuid.nullish(),
};

export const itineraryCreateBody = z.object({ trip_id: uuid, ...itineraryFields });

export const itineraryUpdateBody = z.object({
  day: itineraryFields.day.nullish(),
  title: itineraryFields.title.nullish(),
  description: itineraryFields.description,
  start_time: itineraryFields.start_time,
  end_time: itineraryFields.end_time,
  destination_id: itineraryFields.destination_id,
});

export const noteCreateBody = z.object({ trip_id: uuid, content: nonBlank('content') });

export const noteUpdateBody = z.object({ content: nonBlank('content').nullish() });

export const reminderCreateBody = z.object({
  trip_id: uuid,
  message: nonBlank('message', 255),
  remind_at: isoDateTime,
});

export const reminderUpdateBody = z.object({
  message: nonBlank('message', 255).nullish(),
  remind_at: isoDateTime.nullish(),
});

// trip_id в теле должен совпадать с параметром пути.
export function assertSameTrip(pathTripId: string, bodyTripId: string): void {
  if (pathTripId.toLowerCase() !== bodyTripId.toLowerCase()) {
    throw new ValidationError('payload.trip_id must match trip_id path parameter');
  }
}

// Конец интервала не раньше начала; сравнение строк YYYY-MM-DD совпадает с хронологическим.
export function assertOrdered<T extends string | Date>(
  start: T | null,
  end: T | null,
  message: string,
): void {
  if (start !== null && end !== null && end < start) {
    throw new ValidationError(message);
  }
}
