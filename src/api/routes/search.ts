import { FastifyInstance } from 'fastify';
import { SEARCH_ROUTE_RATE_LIMIT } from '../../config/system/constants';
import { SearchService, parseSearchRequest } from '../../services/searchService';

export async function registerSearchRoutes(app: FastifyInstance, searchService: SearchService): Promise<void> {
  app.post('/search', { config: { rateLimit: SEARCH_ROUTE_RATE_LIMIT } }, async (req, reply) => {
    const request = parseSearchRequest(req.body);
    const response = await searchService.search(request);
    return reply.send(response);
  });
}
