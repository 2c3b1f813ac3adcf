// Миграция 002: расширение pg_trgm (классы операторов gin_trgm_ops / gist_trgm_ops).
import type { Migration } from '../migrator.js';
import { ensureExtension } from '../extensions.js';

const migration: Migration = {
  name: '002_pg_trgm',
  provides: ['pg_trgm'],

  async up(sql) {
    await ensureExtension(sql, 'pg_trgm');
  },
};

export default migration;
