// Маршруты /api/trips/:tripId/itinerary: пункты маршрута в пределах поездки.
import { Hono } from 'hono';
import { NotFoundError } from '../../errors.js';
import type { ItineraryItemData, ItineraryStore } from '../../storage/itinerary.js';
import type { TripStore } from '../../storage/trips.js';
import type { ItineraryItemRow } from '../../storage/schema.js';
import {
  assertOrdered,
  assertSameTrip,
  itineraryCreateBody,
  itineraryUpdateBody,
  parseBody,
  parseQuery,
  pathUuid,
  tripScopedPageQuery,
} from '../validation.js';
import { requireTrip } from './trips.js';

const TIME_ORDER_MESSAGE = 'end_time must be on or after start_time';

async function requireItem(items: ItineraryStore, tripId: string, itemId: string): Promise<ItineraryItemRow> {
  const item = await items.getById(tripId, itemId);
  if (!item) {
    throw new NotFoundError('Itinerary item');
  }
  return item;
}

export function itineraryRoutes(trips: TripStore, items: ItineraryStore): Hono {
  const app = new Hono();

  app.get('/:tripId/itinerary', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const page = parseQuery(c, tripScopedPageQuery);
    await requireTrip(trips, tripId);

    const [total, rows] = await Promise.all([items.countByTrip(tripId), items.listByTrip(tripId, page)]);
    return c.json({ total, limit: page.limit, offset: page.offset, items: rows });
  });

  app.post('/:tripId/itinerary', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const body = await parseBody(c, itineraryCreateBody);
    await requireTrip(trips, tripId);
    assertSameTrip(tripId, body.trip_id);

    const data: ItineraryItemData = {
      day: body.day,
      title: body.title,
      description: body.description ?? null,
      startTime: body.start_time ?? null,
      endTime: body.end_time ?? null,
      destinationId: body.destination_id ?? null,
    };
    assertOrdered(data.startTime, data.endTime, TIME_ORDER_MESSAGE);

    return c.json(await items.create(tripId, data), 201);
  });

  app.get('/:tripId/itinerary/:itemId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const itemId = pathUuid(c.req.param('itemId'), 'item_id');
    await requireTrip(trips, tripId);
    return c.json(await requireItem(items, tripId, itemId));
  });

  app.put('/:tripId/itinerary/:itemId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const itemId = pathUuid(c.req.param('itemId'), 'item_id');
    const body = await parseBody(c, itineraryUpdateBody);
    await requireTrip(trips, tripId);
    const existing = await requireItem(items, tripId, itemId);

    const data: ItineraryItemData = {
      day: body.day ?? existing.day,
      title: body.title ?? existing.title,
      description: body.description ?? existing.description,
      startTime: body.start_time ?? existing.start_time,
      endTime: body.end_time ?? existing.end_time,
      destinationId: body.destination_id ?? existing.destination_id,
    };
    assertOrdered(data.startTime, data.endTime, TIME_ORDER_MESSAGE);

    const updated = await items.update(tripId, itemId, data);
    if (!updated) {
      throw new NotFoundError('Itinerary item');
    }
    return c.json(updated);
  });

  app.delete('/:tripId/itinerary/:itemId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const itemId = pathUuid(c.req.param('itemId'), 'item_id');
    await requireTrip(trips, tripId);
    if (!(await items.remove(tripId, itemId))) {
      throw new NotFoundError('Itinerary item');
    }
    return c.body(null, 204);
  });

  return app;
}
