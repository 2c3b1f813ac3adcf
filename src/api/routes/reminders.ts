// Маршруты /api/trips/:tripId/reminders.
import { Hono } from 'hono';
import { NotFoundError } from '../../errors.js';
import type { ReminderStore } from '../../storage/reminders.js';
import type { TripStore } from '../../storage/trips.js';
import type { ReminderRow } from '../../storage/schema.js';
import {
  assertSameTrip,
  parseBody,
  parseQuery,
  pathUuid,
  reminderCreateBody,
  reminderUpdateBody,
  tripScopedPageQuery,
} from '../validation.js';
import { requireTrip } from './trips.js';

async function requireReminder(
  reminders: ReminderStore,
  tripId: string,
  reminderId: string,
): Promise<ReminderRow> {
  const reminder = await reminders.getById(tripId, reminderId);
  if (!reminder) {
    throw new NotFoundError('Reminder');
  }
  return reminder;
}

export function reminderRoutes(trips: TripStore, reminders: ReminderStore): Hono {
  const app = new Hono();

  app.get('/:tripId/reminders', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const page = parseQuery(c, tripScopedPageQuery);
    await requireTrip(trips, tripId);

    const [total, items] = await Promise.all([
      reminders.countByTrip(tripId),
      reminders.listByTrip(tripId, page),
    ]);
    return c.json({ total, limit: page.limit, offset: page.offset, items });
  });

  app.post('/:tripId/reminders', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const body = await parseBody(c, reminderCreateBody);
    await requireTrip(trips, tripId);
    assertSameTrip(tripId, body.trip_id);

    const created = await reminders.create(tripId, { message: body.message, remindAt: body.remind_at });
    return c.json(created, 201);
  });

  app.get('/:tripId/reminders/:reminderId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const reminderId = pathUuid(c.req.param('reminderId'), 'reminder_id');
    await requireTrip(trips, tripId);
    return c.json(await requireReminder(reminders, tripId, reminderId));
  });

  app.put('/:tripId/reminders/:reminderId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const reminderId = pathUuid(c.req.param('reminderId'), 'reminder_id');
    const body = await parseBody(c, reminderUpdateBody);
    await requireTrip(trips, tripId);
    const existing = await requireReminder(reminders, tripId, reminderId);

    const updated = await reminders.update(tripId, reminderId, {
      message: body.message ?? existing.message,
      remindAt: body.remind_at ?? existing.remind_at,
    });
    if (!updated) {
      throw new NotFoundError('Reminder');
    }
    return c.json(updated);
  });

  app.delete('/:tripId/reminders/:reminderId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const reminderId = pathUuid(c.req.param('reminderId'), 'reminder_id');
    await requireTrip(trips, tripId);
    if (!(await reminders.remove(tripId, reminderId))) {
      throw new NotFoundError('Reminder');
    }
    return c.body(null, 204);
  });

  return app;
}
