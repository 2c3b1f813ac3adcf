// Маршруты /api/trips/:tripId/notes.
import { Hono } from 'hono';
import { NotFoundError } from '../../errors.js';
import type { NoteStore } from '../../storage/notes.js';
import type { TripStore } from '../../storage/trips.js';
import type { NoteRow } from '../../storage/schema.js';
import {
  assertSameTrip,
  noteCreateBody,
  noteUpdateBody,
  parseBody,
  parseQuery,
  pathUuid,
  tripScopedPageQuery,
} from '../validation.js';
import { requireTrip } from './trips.js';

async function requireNote(notes: NoteStore, tripId: string, noteId: string): Promise<NoteRow> {
  const note = await notes.getById(tripId, noteId);
  if (!note) {
    throw new NotFoundError('Note');
  }
  return note;
}

export function noteRoutes(trips: TripStore, notes: NoteStore): Hono {
  const app = new Hono();

  app.get('/:tripId/notes', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const page = parseQuery(c, tripScopedPageQuery);
    await requireTrip(trips, tripId);

    const [total, items] = await Promise.all([notes.countByTrip(tripId), notes.listByTrip(tripId, page)]);
    return c.json({ total, limit: page.limit, offset: page.offset, items });
  });

  app.post('/:tripId/notes', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const body = await parseBody(c, noteCreateBody);
    await requireTrip(trips, tripId);
    assertSameTrip(tripId, body.trip_id);

    return c.json(await notes.create(tripId, body.content), 201);
  });

  app.get('/:tripId/notes/:noteId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const noteId = pathUuid(c.req.param('noteId'), 'note_id');
    await requireTrip(trips, tripId);
    return c.json(await requireNote(notes, tripId, noteId));
  });

  app.put('/:tripId/notes/:noteId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const noteId = pathUuid(c.req.param('noteId'), 'note_id');
    const body = await parseBody(c, noteUpdateBody);
    await requireTrip(trips, tripId);
    const existing = await requireNote(notes, tripId, noteId);

    const updated = await notes.update(tripId, noteId, body.content ?? existing.content);
    if (!updated) {
      throw new NotFoundError('Note');
    }
    return c.json(updated);
  });

  app.delete('/:tripId/notes/:noteId', async (c) => {
    const tripId = pathUuid(c.req.param('tripId'), 'trip_id');
    const noteId = pathUuid(c.req.param('noteId'), 'note_id');
    await requireTrip(trips, tripId);
    if (!(await notes.remove(tripId, noteId))) {
      throw new NotFoundError('Note');
    }
    return c.body(null, 204);
  });

  return app;
}
