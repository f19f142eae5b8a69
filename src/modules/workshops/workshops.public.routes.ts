import { listOpenWorkshops, getOpenWorkshop } from './workshops.service.js';
import { WorkshopIdParamSchema } from './workshops.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

// ============================================================================
// Public Routes (No Auth - registration pages)
// ============================================================================

export async function workshopsPublicRoutes(app: AppInstance): Promise<void> {
  // GET /api/public/workshops - Active workshops with availability
  app.get('/', async (_request, reply) => {
    const workshops = await listOpenWorkshops();
    return reply.send(workshops);
  });

  // GET /api/public/workshops/:id - Single active workshop
  app.get<{ Params: { id: string } }>(
    '/:id',
    {
      schema: { params: WorkshopIdParamSchema },
    },
    async (request, reply) => {
      const workshop = await getOpenWorkshop(request.params.id);
      return reply.send(workshop);
    }
  );
}
