import { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { ApiFailure } from '../../shared/types';
import { AppError } from '../errors';

// Framework errors (body parsing, sensible's httpErrors) carry a status only
const STATUS_CODES: Record<number, string> = {
  400: 'INVALID_INPUT',
  401: 'UNAUTHORIZED',
  404: 'NOT_FOUND',
  409: 'DUPLICATE_KEY',
};

function failure(code: string, error: string, details?: Record<string, unknown>): ApiFailure {
  return details ? { success: false, error, code, details } : { success: false, error, code };
}

/**
 * Turns every error thrown by a route into the `{ success: false }`
 * envelope. Anything that is not a domain or client error is logged and
 * answered with 500.
 */
export async function errorHandler(error: FastifyError, request: FastifyRequest, reply: FastifyReply) {
  if (error instanceof AppError) {
    if (error.statusCode >= 500) request.log.error({ err: error }, error.message);
    return reply.code(error.statusCode).send(failure(error.code, error.message, error.details));
  }

  if (error instanceof ZodError) {
    const issues = error.issues.map((i) => ({ path: i.path.join('.'), message: i.message }));
    return reply.code(400).send(failure('INVALID_INPUT', 'Invalid input', { issues }));
  }

  const status = error.statusCode ?? 500;
  if (status >= 400 && status < 500) {
    return reply.code(status).send(failure(STATUS_CODES[status] ?? error.code ?? 'BAD_REQUEST', error.message));
  }

  request.log.error({ err: error }, 'Unhandled error');
  return reply.code(500).send(failure('INTERNAL_ERROR', 'Internal server error'));
}

export async function notFoundHandler(request: FastifyRequest, reply: FastifyReply) {
  return reply
    .code(404)
    .send(failure('NOT_FOUND', `Route ${request.method} ${request.url} not found`));
}
