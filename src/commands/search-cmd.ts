// Команда travel search: поиск направлений.
import { Command } from 'commander';
import { loadConfig } from '../config/index.js';
import { createDb, closeDb, DestinationStorage } from '../storage/index.js';
import { DestinationSearchService, DEFAULT_SEARCH_LIMIT } from '../search/index.js';
import type { DestinationSearchResponse } from '../search/index.js';

interface SearchOptions {
  config?: string;
  limit: string;
  offset: string;
  country: boolean;
  city: boolean;
}

const COL_NAME = 30;
const COL_COUNTRY = 20;
const COL_CITY = 20;

// Строки вывода для страницы результатов.
export function formatSearchResults(response: DestinationSearchResponse): string[] {
  if (response.total === 0) {
    return ['Ничего не найдено.'];
  }
  // Смещение за пределами результатов: совпадения есть, но страница пуста.
  if (response.items.length === 0) {
    return [`Нет результатов при смещении ${response.offset}: всего совпадений ${response.total}.`];
  }

  const header =
    'Название'.padEnd(COL_NAME) + ' ' +
    'Страна'.padEnd(COL_COUNTRY) + ' ' +
    'Город'.padEnd(COL_CITY) + ' ' +
    'Популярность';

  const lines = ['', header, '-'.repeat(header.length)];

  for (const item of response.items) {
    const name = item.name.slice(0, COL_NAME - 1).padEnd(COL_NAME);
    const country = (item.country ?? '').slice(0, COL_COUNTRY - 1).padEnd(COL_COUNTRY);
    const city = (item.city ?? '').slice(0, COL_CITY - 1).padEnd(COL_CITY);
    lines.push(`${name} ${country} ${city} ${item.popularity ?? '-'}`);
  }

  const last = response.offset + response.items.length;
  lines.push('', `Показаны ${response.offset + 1}–${last} из ${response.total}`);
  return lines;
}

export const searchCommand = new Command('search')
  .description('Search destinations by partial name, country or city')
  .argument('<query>', 'Search text')
  .option('-c, --config <path>', 'Path to config file')
  .option('-l, --limit <n>', 'Page size', String(DEFAULT_SEARCH_LIMIT))
  .option('-o, --offset <n>', 'Number of results to skip', '0')
  .option('--no-country', 'Do not match on country')
  .option('--no-city', 'Do not match on city')
  .action(async (query: string, options: SearchOptions) => {
    try {
      const config = await loadConfig(options.config);
      const sql = createDb(config.database);

      try {
        const service = new DestinationSearchService(new DestinationStorage(sql));
        const response = await service.search({
          q: query,
          limit: Number(options.limit),
          offset: Number(options.offset),
          includeCountry: options.country,
          includeCity: options.city,
        });

        for (const line of formatSearchResults(response)) {
          console.log(line);
        }
      } finally {
        await closeDb(sql);
      }
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Ошибка: ${message}`);
      process.exit(1);
    }
  });
