import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { SearchApiError } from '../../errors';

export function searchErrorHandler(err: FastifyError, req: FastifyRequest, reply: FastifyReply) {
  if (err instanceof SearchApiError) {
    if (err.statusCode >= 500) {
      req.log.error({ err, cause: err.cause }, err.message);
    }
    const body = err.details === undefined ? { error: err.message } : { error: err.message, details: err.details };
    return reply.status(err.statusCode).send(body);
  }

  const statusCode = err.statusCode ?? 500;
  if (statusCode >= 500) {
    req.log.error({ err }, 'request failed');
  }
  return reply.status(statusCode).send({ error: err.message });
}
