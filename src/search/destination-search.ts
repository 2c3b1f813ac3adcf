// Поиск направлений по подстроке (name, country, city) с пагинацией.
import { ValidationError } from '../errors.js';
import type { DestinationStore } from '../storage/destinations.js';
import type { DestinationSearchQuery, DestinationSearchResponse } from './types.js';

export const DEFAULT_SEARCH_LIMIT = 20;
export const MAX_SEARCH_LIMIT = 100;

export class DestinationSearchService {
  constructor(private destinations: DestinationStore) {}

  async search(query: DestinationSearchQuery): Promise<DestinationSearchResponse> {
    const text = query.q.trim();
    if (text === '') {
      throw new ValidationError('q must not be blank');
    }

    const limit = query.limit ?? DEFAULT_SEARCH_LIMIT;
    if (!Number.isInteger(limit) || limit < 1 || limit > MAX_SEARCH_LIMIT) {
      throw new ValidationError(`limit must be an integer between 1 and ${MAX_SEARCH_LIMIT}`);
    }

    const offset = query.offset ?? 0;
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ValidationError('offset must be a non-negative integer');
    }

    const page = await this.destinations.search({
      text,
      includeCountry: query.includeCountry ?? true,
      includeCity: query.includeCity ?? true,
      limit,
      offset,
    });

    return {
      total: page.total,
      limit,
      offset,
      items: page.rows.map((row) => ({
        id: row.id,
        name: row.name,
        country: row.country,
        city: row.city,
        popularity: row.popularity,
        score: row.score,
      })),
    };
  }
}
