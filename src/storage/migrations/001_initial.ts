// Начальная миграция: таблицы trips, destinations, itinerary_items, notes, reminders и b-tree индексы.
// IF NOT EXISTS: миграция принимает объекты, уже созданные `travel schema sync`.
import type { Migration } from '../migrator.js';

const migration: Migration = {
  name: '001_initial',

  async up(sql) {
    // Поездки.
    await sql`
      CREATE TABLE IF NOT EXISTS trips (
        id          UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        name        VARCHAR(200) NOT NULL,
        start_date  DATE,
        end_date    DATE,
        created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `;
    await sql`CREATE INDEX IF NOT EXISTS idx_trips_name ON trips(name)`;

    // Направления. Триграммные индексы: в 003, после установки pg_trgm.
    await sql`
      CREATE TABLE IF NOT EXISTS destinations (
        id           UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        name         VARCHAR(200) NOT NULL,
        country      VARCHAR(100),
        city         VARCHAR(100),
        description  TEXT,
        popularity   INTEGER
      )
    `;
    await sql`CREATE INDEX IF NOT EXISTS idx_destinations_name ON destinations(name)`;
    await sql`CREATE INDEX IF NOT EXISTS idx_destinations_country ON destinations(country)`;
    await sql`CREATE INDEX IF NOT EXISTS idx_destinations_city ON destinations(city)`;
    await sql`CREATE INDEX IF NOT EXISTS idx_destinations_popularity ON destinations(popularity)`;

    // Пункты маршрута по дням поездки.
    await sql`
      CREATE TABLE IF NOT EXISTS itinerary_items (
        id              UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        trip_id         UUID NOT NULL REFERENCES trips(id) ON DELETE CASCADE,
        day             INTEGER NOT NULL,
        title           VARCHAR(200) NOT NULL,
        description     TEXT,
        start_time      TIMESTAMPTZ,
        end_time        TIMESTAMPTZ,
        destination_id  UUID REFERENCES destinations(id) ON DELETE SET NULL
      )
    `;
    await sql`CREATE INDEX IF NOT EXISTS idx_itinerary_trip_day ON itinerary_items(trip_id, day)`;
    await sql`CREATE INDEX IF NOT EXISTS idx_itinerary_destination ON itinerary_items(destination_id)`;

    // Заметки.
    await sql`
      CREATE TABLE IF NOT EXISTS notes (
        id          UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        trip_id     UUID NOT NULL REFERENCES trips(id) ON DELETE CASCADE,
        content     TEXT NOT NULL,
        created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `;
    await sql`CREATE INDEX IF NOT EXISTS idx_notes_trip_created_at ON notes(trip_id, created_at DESC)`;

    // Напоминания.
    await sql`
      CREATE TABLE IF NOT EXISTS reminders (
        id          UUID PRIMARY KEY DEFAULT gen_random_uuid(),
        trip_id     UUID NOT NULL REFERENCES trips(id) ON DELETE CASCADE,
        message     VARCHAR(255) NOT NULL,
        remind_at   TIMESTAMPTZ NOT NULL,
        created_at  TIMESTAMPTZ NOT NULL DEFAULT now()
      )
    `;
    await sql`CREATE INDEX IF NOT EXISTS idx_reminders_trip_remind_at ON reminders(trip_id, remind_at DESC)`;
  },
};

export default migration;
