// HTTP API travel-planner на Hono.
import { Hono } from 'hono';
import { cors } from 'hono/cors';
import { logger } from 'hono/logger';
import type { ServerConfig } from '../config/schema.js';
import type { DestinationStore } from '../storage/destinations.js';
import type { ItineraryStore } from '../storage/itinerary.js';
import type { NoteStore } from '../storage/notes.js';
import type { ReminderStore } from '../storage/reminders.js';
import type { TripStore } from '../storage/trips.js';
import { handleApiError } from './errors.js';
import { destinationRoutes } from './routes/destinations.js';
import { itineraryRoutes } from './routes/itinerary.js';
import { noteRoutes } from './routes/notes.js';
import { reminderRoutes } from './routes/reminders.js';
import { tripRoutes } from './routes/trips.js';

export interface ApiDependencies {
  trips: TripStore;
  destinations: DestinationStore;
  itinerary: ItineraryStore;
  notes: NoteStore;
  reminders: ReminderStore;
  // Проверка соединения с БД (SELECT 1).
  ping(): Promise<void>;
}

export type ApiOptions = Pick<ServerConfig, 'corsOrigins' | 'requestLog'>;

export function createApp(deps: ApiDependencies, options: ApiOptions): Hono {
  const app = new Hono();

  if (options.requestLog) {
    app.use('*', logger());
  }
  const origin = options.corsOrigins.includes('*') ? '*' : options.corsOrigins;
  app.use('*', cors({ origin, credentials: true }));

  app.get('/', (c) => c.json({ message: 'Healthy' }));

  app.get('/health/db', async (c) => {
    await deps.ping();
    return c.json({ database: 'ok' });
  });

  app.route('/api/trips', tripRoutes(deps.trips));
  app.route('/api/trips', itineraryRoutes(deps.trips, deps.itinerary));
  app.route('/api/trips', noteRoutes(deps.trips, deps.notes));
  app.route('/api/trips', reminderRoutes(deps.trips, deps.reminders));
  app.route('/api/destinations', destinationRoutes(deps.destinations));

  app.notFound((c) => c.json({ detail: 'Not Found' }, 404));
  app.onError(handleApiError);

  return app;
}
