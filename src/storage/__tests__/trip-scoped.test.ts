import { describe, it, expect } from 'vitest';
import { createRecordingSql } from './recording-sql.js';
import { ItineraryStorage } from '../itinerary.js';
import { NoteStorage } from '../notes.js';
import { ReminderStorage } from '../reminders.js';

const PAGE = { limit: 50, offset: 0 };

describe('ItineraryStorage', () => {
  it('listByTrip упорядочивает по дню, времени начала и заголовку', async () => {
    const db = createRecordingSql();

    await new ItineraryStorage(db.sql).listByTrip('t-1', PAGE);

    expect(db.queries).toEqual([{
      text: 'SELECT * FROM itinerary_items WHERE trip_id = $1 ' +
        'ORDER BY day ASC, start_time ASC NULLS LAST, title ASC LIMIT $2 OFFSET $3',
      params: ['t-1', 50, 0],
    }]);
  });

  it('create передает поля в порядке колонок', async () => {
    const startTime = new Date('2025-06-01T08:00:00Z');
    const row = { id: 'i-1', trip_id: 't-1', day: 1, title: 'Museum' };
    const db = createRecordingSql(() => [row]);

    const created = await new ItineraryStorage(db.sql).create('t-1', {
      day: 1,
      title: 'Museum',
      description: null,
      startTime,
      endTime: null,
      destinationId: 'd-1',
    });

    expect(created).toEqual(row);
    expect(db.queries[0]?.params).toEqual(['t-1', 1, 'Museum', null, startTime, null, 'd-1']);
  });

  it('remove ограничен поездкой', async () => {
    const db = createRecordingSql();

    expect(await new ItineraryStorage(db.sql).remove('t-1', 'i-1')).toBe(false);
    expect(db.queries[0]).toEqual({
      text: 'DELETE FROM itinerary_items WHERE id = $1 AND trip_id = $2',
      params: ['i-1', 't-1'],
    });
  });
});

describe('NoteStorage', () => {
  it('listByTrip возвращает новые заметки первыми', async () => {
    const db = createRecordingSql();

    await new NoteStorage(db.sql).listByTrip('t-1', { limit: 10, offset: 5 });

    expect(db.queries[0]).toEqual({
      text: 'SELECT * FROM notes WHERE trip_id = $1 ORDER BY created_at DESC, id DESC LIMIT $2 OFFSET $3',
      params: ['t-1', 10, 5],
    });
  });

  it('getById ищет заметку только внутри поездки', async () => {
    const db = createRecordingSql();

    expect(await new NoteStorage(db.sql).getById('t-1', 'n-1')).toBeNull();
    expect(db.queries[0]).toEqual({
      text: 'SELECT * FROM notes WHERE id = $1 AND trip_id = $2',
      params: ['n-1', 't-1'],
    });
  });

  it('countByTrip читает COUNT(*) по поездке', async () => {
    const db = createRecordingSql(() => [{ count: 4 }]);

    expect(await new NoteStorage(db.sql).countByTrip('t-1')).toBe(4);
    expect(db.queries[0]).toEqual({
      text: 'SELECT COUNT(*)::int AS count FROM notes WHERE trip_id = $1',
      params: ['t-1'],
    });
  });
});

describe('ReminderStorage', () => {
  it('listByTrip возвращает самые поздние напоминания первыми', async () => {
    const db = createRecordingSql();

    await new ReminderStorage(db.sql).listByTrip('t-1', PAGE);

    expect(db.queries[0]).toEqual({
      text: 'SELECT * FROM reminders WHERE trip_id = $1 ORDER BY remind_at DESC, id DESC LIMIT $2 OFFSET $3',
      params: ['t-1', 50, 0],
    });
  });

  it('update возвращает null, если напоминание не принадлежит поездке', async () => {
    const remindAt = new Date('2025-06-01T07:00:00Z');
    const db = createRecordingSql();

    const updated = await new ReminderStorage(db.sql).update('t-1', 'r-1', { message: 'Pack', remindAt });

    expect(updated).toBeNull();
    expect(db.queries[0]).toEqual({
      text: 'UPDATE reminders SET message = $1, remind_at = $2 WHERE id = $3 AND trip_id = $4 RETURNING *',
      params: ['Pack', remindAt, 'r-1', 't-1'],
    });
  });
});
