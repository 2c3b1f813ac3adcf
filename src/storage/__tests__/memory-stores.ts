// In-memory реализации хранилищ для тестов HTTP-слоя и поиска.
import { randomUUID } from 'node:crypto';
import type { TripData, TripListOptions, TripStore } from '../trips.js';
import type {
  DestinationData,
  DestinationSearchCriteria,
  DestinationSearchPage,
  DestinationStore,
} from '../destinations.js';
import type { ItineraryItemData, ItineraryStore, PageOptions } from '../itinerary.js';
import type { NoteStore } from '../notes.js';
import type { ReminderData, ReminderStore } from '../reminders.js';
import type {
  DestinationRow,
  ItineraryItemRow,
  NoteRow,
  ReminderRow,
  TripRow,
} from '../schema.js';

// Детерминированные часы: каждая новая запись на секунду позже предыдущей.
export class TestClock {
  private tick = 0;

  constructor(private start = Date.parse('2025-03-01T09:00:00.000Z')) {}

  now(): Date {
    this.tick += 1;
    return new Date(this.start + this.tick * 1000);
  }
}

function page<T>(items: T[], options: PageOptions): T[] {
  return items.slice(options.offset, options.offset + options.limit);
}

function compareNullsLast(a: number | null, b: number | null): number {
  if (a === b) return 0;
  if (a === null) return 1;
  if (b === null) return -1;
  return a - b;
}

export class MemoryTripStore implements TripStore {
  readonly rows = new Map<string, TripRow>();

  constructor(private clock: TestClock) {}

  async list(options: TripListOptions): Promise<TripRow[]> {
    const direction = options.sortDir === 'asc' ? 1 : -1;
    const sorted = [...this.rows.values()].sort((a, b) => {
      const order = options.sortBy === 'name'
        ? a.name.localeCompare(b.name)
        : a.created_at.getTime() - b.created_at.getTime();
      return order * direction;
    });
    return page(sorted, options);
  }

  async count(): Promise<number> {
    return this.rows.size;
  }

  async getById(id: string): Promise<TripRow | null> {
    return this.rows.get(id) ?? null;
  }

  async create(data: TripData): Promise<TripRow> {
    const row: TripRow = {
      id: randomUUID(),
      name: data.name,
      start_date: data.startDate,
      end_date: data.endDate,
      created_at: this.clock.now(),
    };
    this.rows.set(row.id, row);
    return row;
  }

  async update(id: string, data: TripData): Promise<TripRow | null> {
    const existing = this.rows.get(id);
    if (!existing) {
      return null;
    }
    const row: TripRow = { ...existing, name: data.name, start_date: data.startDate, end_date: data.endDate };
    this.rows.set(id, row);
    return row;
  }

  async remove(id: string): Promise<boolean> {
    return this.rows.delete(id);
  }
}

export class MemoryDestinationStore implements DestinationStore {
  readonly rows = new Map<string, DestinationRow>();
  readonly searches: DestinationSearchCriteria[] = [];

  async create(data: DestinationData): Promise<DestinationRow> {
    const row: DestinationRow = { id: randomUUID(), ...data };
    this.rows.set(row.id, row);
    return row;
  }

  async getById(id: string): Promise<DestinationRow | null> {
    return this.rows.get(id) ?? null;
  }

  // Повторяет SQL-вариант: подстрока без учета регистра, популярность по убыванию, затем имя.
  async search(criteria: DestinationSearchCriteria): Promise<DestinationSearchPage> {
    this.searches.push(criteria);
    const needle = criteria.text.toLowerCase();
    const contains = (value: string | null): boolean => value !== null && value.toLowerCase().includes(needle);

    const matches = [...this.rows.values()]
      .filter((row) =>
        contains(row.name) ||
        (criteria.includeCountry && contains(row.country)) ||
        (criteria.includeCity && contains(row.city)))
      .sort((a, b) => compareNullsLast(b.popularity, a.popularity) || a.name.localeCompare(b.name));

    return {
      total: matches.length,
      rows: page(matches, criteria).map((row) => ({
        id: row.id,
        name: row.name,
        country: row.country,
        city: row.city,
        popularity: row.popularity,
        score: null,
      })),
    };
  }
}

export class MemoryItineraryStore implements ItineraryStore {
  readonly rows = new Map<string, ItineraryItemRow>();

  async listByTrip(tripId: string, options: PageOptions): Promise<ItineraryItemRow[]> {
    const items = [...this.rows.values()]
      .filter((row) => row.trip_id === tripId)
      .sort((a, b) =>
        a.day - b.day ||
        compareNullsLast(a.start_time?.getTime() ?? null, b.start_time?.getTime() ?? null) ||
        a.title.localeCompare(b.title));
    return page(items, options);
  }

  async countByTrip(tripId: string): Promise<number> {
    return [...this.rows.values()].filter((row) => row.trip_id === tripId).length;
  }

  async getById(tripId: string, id: string): Promise<ItineraryItemRow | null> {
    const row = this.rows.get(id);
    return row && row.trip_id === tripId ? row : null;
  }

  async create(tripId: string, data: ItineraryItemData): Promise<ItineraryItemRow> {
    const row: ItineraryItemRow = {
      id: randomUUID(),
      trip_id: tripId,
      day: data.day,
      title: data.title,
      description: data.description,
      start_time: data.startTime,
      end_time: data.endTime,
      destination_id: data.destinationId,
    };
    this.rows.set(row.id, row);
    return row;
  }

  async update(tripId: string, id: string, data: ItineraryItemData): Promise<ItineraryItemRow | null> {
    const existing = await this.getById(tripId, id);
    if (!existing) {
      return null;
    }
    const row: ItineraryItemRow = {
      ...existing,
      day: data.day,
      title: data.title,
      description: data.description,
      start_time: data.startTime,
      end_time: data.endTime,
      destination_id: data.destinationId,
    };
    this.rows.set(id, row);
    return row;
  }

  async remove(tripId: string, id: string): Promise<boolean> {
    return (await this.getById(tripId, id)) !== null && this.rows.delete(id);
  }
}

export class MemoryNoteStore implements NoteStore {
  readonly rows = new Map<string, NoteRow>();

  constructor(private clock: TestClock) {}

  async listByTrip(tripId: string, options: PageOptions): Promise<NoteRow[]> {
    const items = [...this.rows.values()]
      .filter((row) => row.trip_id === tripId)
      .sort((a, b) => b.created_at.getTime() - a.created_at.getTime());
    return page(items, options);
  }

  async countByTrip(tripId: string): Promise<number> {
    return [...this.rows.values()].filter((row) => row.trip_id === tripId).length;
  }

  async getById(tripId: string, id: string): Promise<NoteRow | null> {
    const row = this.rows.get(id);
    return row && row.trip_id === tripId ? row : null;
  }

  async create(tripId: string, content: string): Promise<NoteRow> {
    const row: NoteRow = { id: randomUUID(), trip_id: tripId, content, created_at: this.clock.now() };
    this.rows.set(row.id, row);
    return row;
  }

  async update(tripId: string, id: string, content: string): Promise<NoteRow | null> {
    const existing = await this.getById(tripId, id);
    if (!existing) {
      return null;
    }
    const row: NoteRow = { ...existing, content };
    this.rows.set(id, row);
    return row;
  }

  async remove(tripId: string, id: string): Promise<boolean> {
    return (await this.getById(tripId, id)) !== null && this.rows.delete(id);
  }
}

export class MemoryReminderStore implements ReminderStore {
  readonly rows = new Map<string, ReminderRow>();

  constructor(private clock: TestClock) {}

  async listByTrip(tripId: string, options: PageOptions): Promise<ReminderRow[]> {
    const items = [...this.rows.values()]
      .filter((row) => row.trip_id === tripId)
      .sort((a, b) => b.remind_at.getTime() - a.remind_at.getTime());
    return page(items, options);
  }

  async countByTrip(tripId: string): Promise<number> {
    return [...this.rows.values()].filter((row) => row.trip_id === tripId).length;
  }

  async getById(tripId: string, id: string): Promise<ReminderRow | null> {
    const row = this.rows.get(id);
    return row && row.trip_id === tripId ? row : null;
  }

  async create(tripId: string, data: ReminderData): Promise<ReminderRow> {
    const row: ReminderRow = {
      id: randomUUID(),
      trip_id: tripId,
      message: data.message,
      remind_at: data.remindAt,
      created_at: this.clock.now(),
    };
    this.rows.set(row.id, row);
    return row;
  }

  async update(tripId: string, id: string, data: ReminderData): Promise<ReminderRow | null> {
    const existing = await this.getById(tripId, id);
    if (!existing) {
      return null;
    }
    const row: ReminderRow = { ...existing, message: data.message, remind_at: data.remindAt };
    this.rows.set(id, row);
    return row;
  }

  async remove(tripId: string, id: string): Promise<boolean> {
    return (await this.getById(tripId, id)) !== null && this.rows.delete(id);
  }
}

// Набор хранилищ с общими часами.
export function createMemoryStores() {
  const clock = new TestClock();
  return {
    trips: new MemoryTripStore(clock),
    destinations: new MemoryDestinationStore(),
    itinerary: new MemoryItineraryStore(),
    notes: new MemoryNoteStore(clock),
    reminders: new MemoryReminderStore(clock),
  };
}
