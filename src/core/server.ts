import Fastify from 'fastify';
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from 'fastify-type-provider-zod';
import { registerPlugins } from './plugins.js';
import { registerHooks } from './hooks.js';
import { errorHandler } from '@shared/middleware/error.middleware.js';
import { store } from '@/database/store.js';
import { logger } from '@shared/utils/logger.js';
import { workshopsRoutes, workshopsPublicRoutes } from '@workshops';
import { schoolsRoutes, schoolsPublicRoutes } from '@schools';
import {
  registrationsRoutes,
  registrationsPublicRoutes,
  registrationSubmissionRoutes,
} from '@registrations';
import { paymentsRoutes, paymentsPublicRoutes, paymentCallbackRoutes } from '@payments';
import { reportsRoutes } from '@reports';
import type { AppInstance } from '@shared/types/fastify.js';

export async function buildServer(): Promise<AppInstance> {
  const app = Fastify({
    loggerInstance: logger,
  }).withTypeProvider<ZodTypeProvider>();

  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  // Decorate with the data store
  app.decorate('store', store);

  // Register plugins (Sensible, Form Body, CORS, Helmet, Rate Limit)
  await registerPlugins(app);

  // Register lifecycle hooks
  registerHooks(app);

  // Global error handler
  app.setErrorHandler(errorHandler);

  // Health check with database connectivity
  app.get('/health', async (_request, reply) => {
    const checks: Record<string, 'connected' | 'disconnected'> = {
      database: 'disconnected',
    };

    try {
      await app.store.ping();
      checks.database = 'connected';
    } catch (err) {
      logger.warn({ err }, 'Database health check failed');
    }

    const allHealthy = Object.values(checks).every((v) => v === 'connected');
    const status = allHealthy ? 'ok' : 'degraded';
    const statusCode = allHealthy ? 200 : 503;

    return reply.status(statusCode).send({
      status,
      timestamp: new Date().toISOString(),
      checks,
    });
  });

  // Admin routes
  await app.register(workshopsRoutes, { prefix: '/api/workshops' });
  await app.register(schoolsRoutes, { prefix: '/api/schools' });
  await app.register(registrationsRoutes, { prefix: '/api/registrations' });
  await app.register(paymentsRoutes, { prefix: '/api/payments' });
  await app.register(reportsRoutes, { prefix: '/api/reports' });

  // Public routes
  await app.register(workshopsPublicRoutes, { prefix: '/api/public/workshops' });
  await app.register(registrationSubmissionRoutes, { prefix: '/api/public/workshops' });
  await app.register(schoolsPublicRoutes, { prefix: '/api/public/schools' });
  await app.register(registrationsPublicRoutes, { prefix: '/api/public/registrations' });
  await app.register(paymentsPublicRoutes, { prefix: '/api/public/registrations' });

  // Gateway callbacks
  await app.register(paymentCallbackRoutes, { prefix: '/api/payments/callback' });

  return app;
}
