import { FastifyInstance } from 'fastify';
import { API_INFO } from '../../config/system/constants';
import { SEARCH_MODE_DESCRIPTIONS } from '../../config/search/constants';

export async function registerRootRoutes(app: FastifyInstance): Promise<void> {
  app.get('/', async () => ({
    message: API_INFO.name,
    version: API_INFO.version,
    endpoints: {
      search: '/search',
      health: '/health'
    },
    search_types: SEARCH_MODE_DESCRIPTIONS
  }));
}
