// =============================================================
// File: server/app.ts
// Description: Fastify server bootstrap: plugins, JSON parser,
//              error handling and route registrations. Does not
//              listen; see main.ts.
// =============================================================

import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import helmet from '@fastify/helmet';
import sensible from '@fastify/sensible';
import { initializeDb } from './database/connection';
import { loggerOptions } from './logger';
import { errorHandler, notFoundHandler } from './plugins/error-handler.plugin';
import { healthRoutes } from './routes/health';
import { authRoutes } from './routes/auth';
// General ledger
import { accountRoutes } from './routes/accounts';
import { journalRoutes } from './routes/journals';
import { reportRoutes } from './routes/reports';
// Invoicing & VAT
import { vatRoutes } from './routes/vat';
import { customerRoutes } from './routes/customers';
import { invoiceRoutes } from './routes/invoices';
// Cabinet
import { cabinetRoutes } from './routes/cabinets';
import { templateRoutes } from './routes/templates';
import { dashboardRoutes } from './routes/dashboard';

export interface BuildOptions {
  logger?: FastifyServerOptions['logger'];
}

export async function buildServer(options: BuildOptions = {}): Promise<FastifyInstance> {
  const server = Fastify({
    logger: options.logger ?? loggerOptions(),
  });

  // Plugins
  await server.register(cors, {
    origin: true,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization'],
  });
  await server.register(helmet, {
    contentSecurityPolicy: false,
    crossOriginResourcePolicy: { policy: 'cross-origin' },
  });
  await server.register(sensible);

  // Action endpoints (validate, seed-pcm, init-defaults) are posted without a body
  server.removeContentTypeParser('application/json');
  server.addContentTypeParser('application/json', { parseAs: 'string' }, (_req, body, done) => {
    const text = String(body).trim();
    if (!text) {
      done(null, {});
      return;
    }
    try {
      done(null, JSON.parse(text));
    } catch {
      done(server.httpErrors.badRequest('Request body is not valid JSON'), undefined);
    }
  });

  server.setErrorHandler(errorHandler);
  server.setNotFoundHandler(notFoundHandler);

  await initializeDb();

  // Register routes
  await server.register(healthRoutes, { prefix: '/api' });
  await server.register(authRoutes, { prefix: '/api' });
  await server.register(accountRoutes, { prefix: '/api' });
  await server.register(journalRoutes, { prefix: '/api' });
  await server.register(reportRoutes, { prefix: '/api' });
  await server.register(vatRoutes, { prefix: '/api' });
  await server.register(customerRoutes, { prefix: '/api' });
  await server.register(invoiceRoutes, { prefix: '/api' });
  await server.register(cabinetRoutes, { prefix: '/api' });
  await server.register(templateRoutes, { prefix: '/api' });
  await server.register(dashboardRoutes, { prefix: '/api' });

  return server;
}
