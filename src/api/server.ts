// Запуск HTTP API на Node.js через @hono/node-server.
import { serve, type ServerType } from '@hono/node-server';
import type postgres from 'postgres';
import type { ServerConfig } from '../config/schema.js';
import {
  DestinationStorage,
  ItineraryStorage,
  NoteStorage,
  ReminderStorage,
  TripStorage,
  pingDb,
} from '../storage/index.js';
import { createApp } from './app.js';

export function startApiServer(config: ServerConfig, sql: postgres.Sql): ServerType {
  const app = createApp(
    {
      trips: new TripStorage(sql),
      destinations: new DestinationStorage(sql),
      itinerary: new ItineraryStorage(sql),
      notes: new NoteStorage(sql),
      reminders: new ReminderStorage(sql),
      ping: () => pingDb(sql),
    },
    config,
  );

  return serve({ fetch: app.fetch, hostname: config.host, port: config.port }, (info) => {
    console.log(`API слушает http://${config.host}:${info.port}`);
  });
}
