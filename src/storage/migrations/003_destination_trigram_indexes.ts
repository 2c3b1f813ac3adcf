// Миграция 003: GIN-индексы gin_trgm_ops для поиска направлений по подстроке (ILIKE).
import type { Migration } from '../migrator.js';

const migration: Migration = {
  name: '003_destination_trigram_indexes',
  requires: ['pg_trgm'],

  async up(sql) {
    await sql`CREATE INDEX IF NOT EXISTS idx_destinations_name_trgm ON destinations USING GIN (name gin_trgm_ops)`;
    await sql`CREATE INDEX IF NOT EXISTS idx_destinations_country_trgm ON destinations USING GIN (country gin_trgm_ops)`;
    await sql`CREATE INDEX IF NOT EXISTS idx_destinations_city_trgm ON destinations USING GIN (city gin_trgm_ops)`;
  },
};

export default migration;
