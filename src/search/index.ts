// Barrel-файл модуля поиска.
export { DestinationSearchService, DEFAULT_SEARCH_LIMIT, MAX_SEARCH_LIMIT } from './destination-search.js';
export type {
  DestinationSearchQuery,
  DestinationSearchResult,
  DestinationSearchResponse,
} from './types.js';
