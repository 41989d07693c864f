import { FastifyReply, FastifyRequest } from 'fastify';
import { PUBLIC_ROUTE_PREFIXES } from '../../config/system/constants';

function isPublic(url: string): boolean {
  return url === '/' || PUBLIC_ROUTE_PREFIXES.some((prefix) => url.startsWith(prefix));
}

export function createApiKeyGuard(apiKey: string | undefined) {
  return async function apiKeyGuard(req: FastifyRequest, reply: FastifyReply) {
    if (!apiKey) return;
    if (isPublic(req.url)) return;

    const headerKey = req.headers['x-api-key'];
    if (headerKey !== apiKey) {
      return reply.status(401).send({ error: 'unauthorized' });
    }
  };
}
