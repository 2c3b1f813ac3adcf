// Операции с таблицей destinations, включая поиск по подстроке.
import type postgres from 'postgres';
import type { DestinationRow, DestinationSearchRow } from './schema.js';

export interface DestinationData {
  name: string;
  country: string | null;
  city: string | null;
  description: string | null;
  popularity: number | null;
}

// Критерии поиска. text уже очищен от пробелов по краям и не пуст.
export interface DestinationSearchCriteria {
  text: string;
  includeCountry: boolean;
  includeCity: boolean;
  limit: number;
  offset: number;
}

export interface DestinationSearchPage {
  // Общее число совпадений без учета пагинации.
  total: number;
  rows: DestinationSearchRow[];
}

export interface DestinationStore {
  create(data: DestinationData): Promise<DestinationRow>;
  getById(id: string): Promise<DestinationRow | null>;
  search(criteria: DestinationSearchCriteria): Promise<DestinationSearchPage>;
}

// Хранилище направлений.
export class DestinationStorage implements DestinationStore {
  constructor(private sql: postgres.Sql) {}

  async create(data: DestinationData): Promise<DestinationRow> {
    const rows = await this.sql<DestinationRow[]>`
      INSERT INTO destinations (name, country, city, description, popularity)
      VALUES (${data.name}, ${data.country}, ${data.city}, ${data.description}, ${data.popularity})
      RETURNING *
    `;
    const row = rows[0];
    if (!row) {
      throw new Error('INSERT INTO destinations returned no row');
    }
    return row;
  }

  async getById(id: string): Promise<DestinationRow | null> {
    const rows = await this.sql<DestinationRow[]>`
      SELECT * FROM destinations WHERE id = ${id}
    `;
    return rows[0] ?? null;
  }

  /**
   * Регистронезависимый поиск по подстроке: name и, по желанию, country / city.
   * ILIKE '%...%' обслуживается GIN-индексами gin_trgm_ops.
   * Порядок: популярность по убыванию (NULL в конце), затем имя.
   */
  async search(criteria: DestinationSearchCriteria): Promise<DestinationSearchPage> {
    const { text, includeCountry, includeCity } = criteria;
    const pattern = `%${text}%`;

    const where = this.sql`
      name ILIKE ${pattern}
      ${includeCountry ? this.sql`OR country ILIKE ${pattern}` : this.sql``}
      ${includeCity ? this.sql`OR city ILIKE ${pattern}` : this.sql``}
    `;

    // Лучшая триграммная близость запроса среди полей, участвующих в поиске.
    const score = this.sql`
      GREATEST(
        similarity(name, ${text})
        ${includeCountry ? this.sql`, similarity(COALESCE(country, ''), ${text})` : this.sql``}
        ${includeCity ? this.sql`, similarity(COALESCE(city, ''), ${text})` : this.sql``}
      )::float8
    `;

    const [totalRows, rows] = await Promise.all([
      this.sql<{ total: number }[]>`
        SELECT COUNT(*)::int AS total FROM destinations WHERE ${where}
      `,
      this.sql<DestinationSearchRow[]>`
        SELECT id, name, country, city, popularity, ${score} AS score
        FROM destinations
        WHERE ${where}
        ORDER BY popularity DESC NULLS LAST, name ASC, id ASC
        LIMIT ${criteria.limit} OFFSET ${criteria.offset}
      `,
    ]);

    return { total: totalRows[0]?.total ?? 0, rows };
  }
}
