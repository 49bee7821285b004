import { FastifyInstance } from 'fastify';
import { authenticate, currentUser } from '../plugins/auth.plugin';
import { authService } from '../services/auth.service';

export async function authRoutes(server: FastifyInstance) {
  server.post('/auth/login', async (request) => {
    const result = await authService.login(request.body);
    return { success: true, data: result };
  });

  server.get('/auth/me', { preHandler: [authenticate] }, async (request) => {
    const user = await authService.getUser(currentUser(request).userId);
    return { success: true, data: user };
  });

  server.post('/auth/change-password', { preHandler: [authenticate] }, async (request) => {
    await authService.changePassword(currentUser(request).userId, request.body);
    return { success: true, message: 'Password changed' };
  });
}
