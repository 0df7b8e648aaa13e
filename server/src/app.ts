import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import fastifyCompress from '@fastify/compress';
import { sql } from 'drizzle-orm';
import type { ApiErrorResponse, HealthResponse } from '@studio-ledger/shared';
import configPlugin, { loadConfig } from './plugins/config.js';
import dbPlugin from './plugins/db.js';
import errorHandlerPlugin from './plugins/errorHandler.js';
import clientRoutes from './routes/clients.js';
import shootRoutes from './routes/shoots.js';
import packageRoutes from './routes/packages.js';
import invoiceRoutes from './routes/invoices.js';
import paymentRoutes from './routes/payments.js';
import reportRoutes from './routes/reports.js';

export async function buildApp(): Promise<FastifyInstance> {
  // Loaded up front: the logger and proxy handling are fixed when Fastify is created
  const config = loadConfig(process.env);

  const app = Fastify({
    logger: {
      level: config.logLevel,
    },
    trustProxy: config.trustProxy,
    ajv: {
      // Unknown body fields fail validation instead of being dropped
      customOptions: { removeAdditional: false },
    },
  });

  await app.register(configPlugin, { config });

  // Error handler (after config, before routes)
  await app.register(errorHandlerPlugin);

  // Compression (gzip/deflate/brotli)
  await app.register(fastifyCompress);

  // Database connection & migrations
  await app.register(dbPlugin);

  await app.register(clientRoutes, { prefix: '/api/clients' });
  await app.register(shootRoutes, { prefix: '/api/shoots' });
  await app.register(packageRoutes, { prefix: '/api/packages' });
  await app.register(invoiceRoutes, { prefix: '/api/invoices' });
  await app.register(paymentRoutes, { prefix: '/api/payments' });

  // Read-only reporting
  await app.register(reportRoutes, { prefix: '/api/reports' });

  // Health check endpoint (liveness)
  app.get('/api/health', async (): Promise<HealthResponse> => {
    return { status: 'ok', timestamp: new Date().toISOString() };
  });

  // Readiness probe: the database must answer a trivial query
  app.get('/api/health/ready', async (): Promise<HealthResponse> => {
    app.db.run(sql`SELECT 1`);
    return { status: 'ready', timestamp: new Date().toISOString() };
  });

  app.setNotFoundHandler((request, reply) => {
    const response: ApiErrorResponse = {
      error: {
        code: 'ROUTE_NOT_FOUND',
        message: `Route ${request.method} ${request.url} not found`,
      },
    };
    return reply.status(404).send(response);
  });

  return app;
}
