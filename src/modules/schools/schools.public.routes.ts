import { listActiveSchools } from './schools.service.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function schoolsPublicRoutes(app: AppInstance): Promise<void> {
  // GET /api/public/schools - Choices for the registration form
  app.get('/', async (_request, reply) => {
    const schools = await listActiveSchools();
    return reply.send(schools.map(({ id, name }) => ({ id, name })));
  });
}
