import { FastifyReply, FastifyRequest } from 'fastify';
import { UnauthorizedError } from '../errors';
import { authService, JwtPayload } from '../services/auth.service';

declare module 'fastify' {
  interface FastifyRequest {
    user?: JwtPayload;
  }
}

/**
 * Bearer-token pre-handler.
 * Usage: { preHandler: [authenticate] }
 */
export async function authenticate(request: FastifyRequest, reply: FastifyReply) {
  const authHeader = request.headers.authorization;
  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    return reply.unauthorized('Authentication required');
  }

  try {
    request.user = authService.verifyToken(authHeader.substring(7));
  } catch (error) {
    if (error instanceof UnauthorizedError) return reply.unauthorized(error.message);
    throw error;
  }
}

/** The authenticated caller; only valid behind `authenticate`. */
export function currentUser(request: FastifyRequest): JwtPayload {
  if (!request.user) throw new UnauthorizedError();
  return request.user;
}
