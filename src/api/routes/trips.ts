// Маршруты /api/trips: список с сортировкой и CRUD поездок.
import { Hono } from 'hono';
import { NotFoundError } from '../../errors.js';
import type { TripStore } from '../../storage/trips.js';
import type { TripRow } from '../../storage/schema.js';
import {
  assertOrdered,
  parseBody,
  parseQuery,
  pathUuid,
  tripCreateBody,
  tripListQuery,
  tripUpdateBody,
} from '../validation.js';

const DATE_ORDER_MESSAGE = 'end_date must be on or after start_date';

// Загружает поездку или бросает NotFoundError. Используется и вложенными маршрутами.
export async function requireTrip(trips: TripStore, tripId: string): Promise<TripRow> {
  const trip = await trips.getById(tripId);
  if (!trip) {
    throw new NotFoundError('Trip');
  }
  return trip;
}

export function tripRoutes(trips: TripStore): Hono {
  const app = new Hono();

  app.get('/', async (c) => {
    const query = parseQuery(c, tripListQuery);
    const [total, items] = await Promise.all([
      trips.count(),
      trips.list({
        limit: query.limit,
        offset: query.offset,
        sortBy: query.sort_by,
        sortDir: query.sort_dir,
      }),
    ]);
    return c.json({ total, limit: query.limit, offset: query.offset, items });
  });

  app.post('/', async (c) => {
    const body = await parseBody(c, tripCreateBody);
    const data = {
      name: body.name,
      startDate: body.start_date ?? null,
      endDate: body.end_date ?? null,
    };
    assertOrdered(data.startDate, data.endDate, DATE_ORDER_MESSAGE);

    return c.json(await trips.create(data), 201);
  });

  app.get('/:tripId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    return c.json(await requireTrip(trips, tripId));
  });

  app.put('/:tripId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const body = await parseBody(c, tripUpdateBody);
    const existing = await requireTrip(trips, tripId);

    const data = {
      name: body.name ?? existing.name,
      startDate: body.start_date ?? existing.start_date,
      endDate: body.end_date ?? existing.end_date,
    };
    assertOrdered(data.startDate, data.endDate, DATE_ORDER_MESSAGE);

    const updated = await trips.update(tripId, data);
    if (!updated) {
      throw new NotFoundError('Trip');
    }
    return c.json(updated);
  });

  app.delete('/:tripId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    if (!(await trips.remove(tripId))) {
      throw new NotFoundError('Trip');
    }
    return c.body(null, 204);
  });

  return app;
}
