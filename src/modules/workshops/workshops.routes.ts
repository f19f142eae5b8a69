import { requireAuth, actorOf } from '@shared/middleware/auth.middleware.js';
import {
  createWorkshop,
  getWorkshopDetails,
  listWorkshops,
  updateWorkshop,
  deleteWorkshop,
} from './workshops.service.js';
import {
  CreateWorkshopSchema,
  UpdateWorkshopSchema,
  ListWorkshopsQuerySchema,
  WorkshopIdParamSchema,
  type CreateWorkshopInput,
  type UpdateWorkshopInput,
  type ListWorkshopsQuery,
} from './workshops.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function workshopsRoutes(app: AppInstance): Promise<void> {
  // All routes require authentication
  app.addHook('onRequest', requireAuth);

  // POST /api/workshops - Create workshop
  app.post<{ Body: CreateWorkshopInput }>(
    '/',
    {
      schema: { body: CreateWorkshopSchema },
    },
    async (request, reply) => {
      const workshop = await createWorkshop(request.body, actorOf(request));
      return reply.status(201).send(workshop);
    }
  );

  // GET /api/workshops - List workshops
  app.get<{ Querystring: ListWorkshopsQuery }>(
    '/',
    {
      schema: { querystring: ListWorkshopsQuerySchema },
    },
    async (request, reply) => {
      const workshops = await listWorkshops(request.query);
      return reply.send(workshops);
    }
  );

  // GET /api/workshops/:id - Workshop with availability
  app.get<{ Params: { id: string } }>(
    '/:id',
    {
      schema: { params: WorkshopIdParamSchema },
    },
    async (request, reply) => {
      const workshop = await getWorkshopDetails(request.params.id);
      return reply.send(workshop);
    }
  );

  // PATCH /api/workshops/:id - Update workshop
  app.patch<{ Params: { id: string }; Body: UpdateWorkshopInput }>(
    '/:id',
    {
      schema: {
        params: WorkshopIdParamSchema,
        body: UpdateWorkshopSchema,
      },
    },
    async (request, reply) => {
      const workshop = await updateWorkshop(request.params.id, request.body, actorOf(request));
      return reply.send(workshop);
    }
  );

  // DELETE /api/workshops/:id - Delete workshop without registrations
  app.delete<{ Params: { id: string } }>(
    '/:id',
    {
      schema: { params: WorkshopIdParamSchema },
    },
    async (request, reply) => {
      await deleteWorkshop(request.params.id, actorOf(request));
      return reply.status(204).send();
    }
  );
}
