import cors from '@fastify/cors';
import formbody from '@fastify/formbody';
import helmet from '@fastify/helmet';
import rateLimit from '@fastify/rate-limit';
import sensible from '@fastify/sensible';
import { config } from '@config/app.config.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function registerPlugins(app: AppInstance) {
  // Sensible defaults and HTTP error utilities
  await app.register(sensible, {
    sharedSchemaId: 'HttpError',
  });

  // Gateway callbacks and plain HTML forms post urlencoded bodies
  await app.register(formbody);

  await app.register(cors, {
    origin: config.CORS_ORIGIN,
    credentials: true,
  });

  await app.register(helmet, {
    contentSecurityPolicy: config.isProduction,
  });

  await app.register(rateLimit, {
    max: config.security.rateLimit.max,
    timeWindow: config.security.rateLimit.timeWindow,
  });
}
