// Barrel-файл модуля хранения.
export { createDb, closeDb, pingDb } from './db.js';

export type {
  TripRow,
  DestinationRow,
  DestinationSearchRow,
  ItineraryItemRow,
  NoteRow,
  ReminderRow,
} from './schema.js';

export type { Migration } from './migrator.js';
export { runMigrations, getAppliedMigrations, checkMigrationOrder } from './migrator.js';
export {
  allMigrations,
  initialMigration,
  pgTrgmMigration,
  destinationTrigramIndexesMigration,
} from './migrations/index.js';

export {
  OPERATOR_CLASS_EXTENSIONS,
  quoteIdent,
  extensionForOperatorClass,
  createExtensionStatement,
  ensureExtension,
  isExtensionInstalled,
  listInstalledExtensions,
} from './extensions.js';

export type {
  ColumnDefinition,
  TableDefinition,
  IndexColumn,
  IndexDefinition,
  SchemaDefinition,
  SchemaPlan,
} from './ddl.js';
export { renderCreateTable, renderCreateIndex, requiredExtensions, planSchema } from './ddl.js';
export { syncSchema } from './sync.js';
export { TRAVEL_SCHEMA, DESTINATION_TRIGRAM_INDEXES } from './travel-schema.js';

export {
  MigrationError,
  MigrationOrderError,
  MissingExtensionError,
  SchemaSyncError,
  pgErrorCode,
} from './errors.js';

export type { TripStore, TripData, TripListOptions, TripSortField, SortDirection } from './trips.js';
export { TripStorage } from './trips.js';
export type {
  DestinationStore,
  DestinationData,
  DestinationSearchCriteria,
  DestinationSearchPage,
} from './destinations.js';
export { DestinationStorage } from './destinations.js';
export type { ItineraryStore, ItineraryItemData, PageOptions } from './itinerary.js';
export { ItineraryStorage } from './itinerary.js';
export type { NoteStore } from './notes.js';
export { NoteStorage } from './notes.js';
export type { ReminderStore, ReminderData } from './reminders.js';
export { ReminderStorage } from './reminders.js';

export type { DatabaseStatus, StatusTable } from './status.js';
export { collectStatus, STATUS_TABLES } from './status.js';
