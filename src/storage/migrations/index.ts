// Все миграции в порядке применения.
import type { Migration } from '../migrator.js';
import initialMigration from './001_initial.js';
import pgTrgmMigration from './002_pg_trgm.js';
import destinationTrigramIndexesMigration from './003_destination_trigram_indexes.js';

export { initialMigration, pgTrgmMigration, destinationTrigramIndexesMigration };

export const allMigrations: Migration[] = [
  initialMigration,
  pgTrgmMigration,
  destinationTrigramIndexesMigration,
];
