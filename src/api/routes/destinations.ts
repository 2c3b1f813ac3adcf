// Маршруты /api/destinations: поиск, создание и чтение направлений.
import { Hono } from 'hono';
import { NotFoundError } from '../../errors.js';
import type { DestinationStore } from '../../storage/destinations.js';
import { DestinationSearchService } from '../../search/destination-search.js';
import {
  destinationCreateBody,
  destinationSearchQuery,
  parseBody,
  parseQuery,
  pathUuid,
} from '../validation.js';

export function destinationRoutes(destinations: DestinationStore): Hono {
  const app = new Hono();
  const search = new DestinationSearchService(destinations);

  // Объявлен раньше /:destinationId, иначе "search" разбирался бы как идентификатор.
  app.get('/search', async (c) => {
    const query = parseQuery(c, destinationSearchQuery);
    const response = await search.search({
      q: query.q,
      limit: query.limit,
      offset: query.offset,
      includeCountry: query.include_country,
      includeCity: query.include_city,
    });
    return c.json(response);
  });

  app.post('/', async (c) => {
    const body = await parseBody(c, destinationCreateBody);
    const created = await destinations.create({
      name: body.name,
      country: body.country ?? null,
      city: body.city ?? null,
      description: body.description ?? null,
      popularity: body.popularity ?? null,
    });
    return c.json(created, 201);
  });

  app.get('/:destinationId', async (c) => {
    const destinationId = pathUuid(c.req.param('destinationId'), 'destination_id');
    const destination = await destinations.getById(destinationId);
    if (!destination) {
      throw new NotFoundError('Destination');
    }
    return c.json(destination);
  });

  return app;
}
