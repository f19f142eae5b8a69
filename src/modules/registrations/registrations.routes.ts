import { requireAuth, actorOf } from '@shared/middleware/auth.middleware.js';
import { exportFileName, XLSX_CONTENT_TYPE } from '@documents';
import {
  listRegistrations,
  getRegistrationById,
  exportRegistrations,
  markRegistrationsCompleted,
} from './registrations.service.js';
import {
  ListRegistrationsQuerySchema,
  ExportRegistrationsQuerySchema,
  MarkCompletedSchema,
  RegistrationIdParamSchema,
  type ListRegistrationsQuery,
  type ExportRegistrationsQuery,
  type MarkCompletedInput,
} from './registrations.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function registrationsRoutes(app: AppInstance): Promise<void> {
  // All routes require authentication
  app.addHook('onRequest', requireAuth);

  // GET /api/registrations - List registrations
  app.get<{ Querystring: ListRegistrationsQuery }>(
    '/',
    {
      schema: { querystring: ListRegistrationsQuerySchema },
    },
    async (request, reply) => {
      const registrations = await listRegistrations(request.query);
      return reply.send(registrations);
    }
  );

  // GET /api/registrations/export - XLSX of every matching registration
  app.get<{ Querystring: ExportRegistrationsQuery }>(
    '/export',
    {
      schema: { querystring: ExportRegistrationsQuerySchema },
    },
    async (request, reply) => {
      const file = await exportRegistrations(request.query);
      return reply
        .header('Content-Type', XLSX_CONTENT_TYPE)
        .header('Content-Disposition', `attachment; filename="${exportFileName('registrations')}"`)
        .send(file);
    }
  );

  // GET /api/registrations/:id - Registration with workshop, school and payment
  app.get<{ Params: { id: string } }>(
    '/:id',
    {
      schema: { params: RegistrationIdParamSchema },
    },
    async (request, reply) => {
      const registration = await getRegistrationById(request.params.id);
      if (!registration) {
        throw app.httpErrors.notFound('Registration not found');
      }
      return reply.send(registration);
    }
  );

  // POST /api/registrations/mark-completed - Administrative override
  app.post<{ Body: MarkCompletedInput }>(
    '/mark-completed',
    {
      schema: { body: MarkCompletedSchema },
    },
    async (request, reply) => {
      const result = await markRegistrationsCompleted(
        request.body.registrationIds,
        actorOf(request)
      );
      return reply.send(result);
    }
  );
}
