import { describe, it, expect, beforeEach } from 'vitest';
import { DestinationSearchService, DEFAULT_SEARCH_LIMIT } from '../destination-search.js';
import { ValidationError } from '../../errors.js';
import { MemoryDestinationStore } from '../../storage/__tests__/memory-stores.js';

describe('DestinationSearchService', () => {
  let store: MemoryDestinationStore;
  let service: DestinationSearchService;

  beforeEach(async () => {
    store = new MemoryDestinationStore();
    service = new DestinationSearchService(store);

    await store.create({ name: 'Lisbon', country: 'Portugal', city: 'Lisbon', description: null, popularity: 80 });
    await store.create({ name: 'Porto', country: 'Portugal', city: 'Porto', description: null, popularity: 90 });
    await store.create({ name: 'Sintra', country: 'Portugal', city: null, description: null, popularity: null });
    await store.create({ name: 'Portofino', country: 'Italy', city: 'Portofino', description: null, popularity: 40 });
  });

  it('обрезает пробелы в запросе и подставляет значения по умолчанию', async () => {
    await service.search({ q: '  port  ' });

    expect(store.searches).toEqual([
      { text: 'port', includeCountry: true, includeCity: true, limit: DEFAULT_SEARCH_LIMIT, offset: 0 },
    ]);
  });

  it('сортирует по популярности, направления без популярности в конце', async () => {
    const response = await service.search({ q: 'port' });

    expect(response.total).toBe(4);
    expect(response.items.map((item) => item.name)).toEqual(['Porto', 'Lisbon', 'Portofino', 'Sintra']);
  });

  it('без country ищет только по имени и городу', async () => {
    const response = await service.search({ q: 'port', includeCountry: false });

    expect(response.items.map((item) => item.name)).toEqual(['Porto', 'Portofino']);
  });

  it('без country и city ищет только по имени', async () => {
    const response = await service.search({ q: 'LISB', includeCountry: false, includeCity: false });

    expect(response.total).toBe(1);
    expect(response.items[0]?.name).toBe('Lisbon');
  });

  it('применяет limit и offset, total считает без пагинации', async () => {
    const response = await service.search({ q: 'port', limit: 2, offset: 1 });

    expect(response).toMatchObject({ total: 4, limit: 2, offset: 1 });
    expect(response.items.map((item) => item.name)).toEqual(['Lisbon', 'Portofino']);
  });

  it('возвращает пустую страницу, когда ничего не найдено', async () => {
    const response = await service.search({ q: 'Kyoto' });

    expect(response).toEqual({ total: 0, limit: 20, offset: 0, items: [] });
  });

  it('отклоняет пустой запрос, не обращаясь к хранилищу', async () => {
    await expect(service.search({ q: '   ' })).rejects.toThrow(new ValidationError('q must not be blank'));
    expect(store.searches).toHaveLength(0);
  });

  it('отклоняет limit вне диапазона 1..100', async () => {
    await expect(service.search({ q: 'port', limit: 0 })).rejects.toThrow(
      'limit must be an integer between 1 and 100',
    );
    await expect(service.search({ q: 'port', limit: 101 })).rejects.toThrow(ValidationError);
    await expect(service.search({ q: 'port', limit: 2.5 })).rejects.toThrow(ValidationError);
  });

  it('отклоняет отрицательный offset', async () => {
    await expect(service.search({ q: 'port', offset: -1 })).rejects.toThrow(
      'offset must be a non-negative integer',
    );
  });
});
