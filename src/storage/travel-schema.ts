// Декларативная схема travel-planner: таблицы и индексы.
import type { ColumnDefinition, IndexDefinition, SchemaDefinition, TableDefinition } from './ddl.js';

const idColumn: ColumnDefinition = {
  name: 'id',
  type: 'uuid',
  primaryKey: true,
  default: 'gen_random_uuid()',
};

const createdAtColumn: ColumnDefinition = {
  name: 'created_at',
  type: 'timestamptz',
  nullable: false,
  default: 'now()',
};

const tripIdColumn: ColumnDefinition = {
  name: 'trip_id',
  type: 'uuid',
  nullable: false,
  references: { table: 'trips', column: 'id', onDelete: 'CASCADE' },
};

const tables: TableDefinition[] = [
  {
    name: 'trips',
    columns: [
      idColumn,
      { name: 'name', type: 'varchar(200)', nullable: false },
      { name: 'start_date', type: 'date' },
      { name: 'end_date', type: 'date' },
      createdAtColumn,
    ],
  },
  {
    name: 'destinations',
    columns: [
      idColumn,
      { name: 'name', type: 'varchar(200)', nullable: false },
      { name: 'country', type: 'varchar(100)' },
      { name: 'city', type: 'varchar(100)' },
      { name: 'description', type: 'text' },
      { name: 'popularity', type: 'integer' },
    ],
  },
  {
    name: 'itinerary_items',
    columns: [
      idColumn,
      tripIdColumn,
      { name: 'day', type: 'integer', nullable: false },
      { name: 'title', type: 'varchar(200)', nullable: false },
      { name: 'description', type: 'text' },
      { name: 'start_time', type: 'timestamptz' },
      { name: 'end_time', type: 'timestamptz' },
      {
        name: 'destination_id',
        type: 'uuid',
        references: { table: 'destinations', column: 'id', onDelete: 'SET NULL' },
      },
    ],
  },
  {
    name: 'notes',
    columns: [
      idColumn,
      tripIdColumn,
      { name: 'content', type: 'text', nullable: false },
      createdAtColumn,
    ],
  },
  {
    name: 'reminders',
    columns: [
      idColumn,
      tripIdColumn,
      { name: 'message', type: 'varchar(255)', nullable: false },
      { name: 'remind_at', type: 'timestamptz', nullable: false },
      createdAtColumn,
    ],
  },
];

// Триграммные GIN-индексы для ILIKE '%...%' по полям поиска направлений.
export const DESTINATION_TRIGRAM_INDEXES: IndexDefinition[] = ['name', 'country', 'city'].map((column): IndexDefinition => ({
  name: `idx_destinations_${column}_trgm`,
  table: 'destinations',
  using: 'gin',
  columns: [{ name: column, opclass: 'gin_trgm_ops' }],
}));

const btreeIndexes: IndexDefinition[] = [
  { name: 'idx_trips_name', table: 'trips', columns: [{ name: 'name' }] },
  { name: 'idx_destinations_name', table: 'destinations', columns: [{ name: 'name' }] },
  { name: 'idx_destinations_country', table: 'destinations', columns: [{ name: 'country' }] },
  { name: 'idx_destinations_city', table: 'destinations', columns: [{ name: 'city' }] },
  { name: 'idx_destinations_popularity', table: 'destinations', columns: [{ name: 'popularity' }] },
  {
    name: 'idx_itinerary_trip_day',
    table: 'itinerary_items',
    columns: [{ name: 'trip_id' }, { name: 'day' }],
  },
  { name: 'idx_itinerary_destination', table: 'itinerary_items', columns: [{ name: 'destination_id' }] },
  {
    name: 'idx_notes_trip_created_at',
    table: 'notes',
    columns: [{ name: 'trip_id' }, { name: 'created_at', order: 'DESC' }],
  },
  {
    name: 'idx_reminders_trip_remind_at',
    table: 'reminders',
    columns: [{ name: 'trip_id' }, { name: 'remind_at', order: 'DESC' }],
  },
];

export const TRAVEL_SCHEMA: SchemaDefinition = {
  tables,
  indexes: [...btreeIndexes, ...DESTINATION_TRIGRAM_INDEXES],
};
