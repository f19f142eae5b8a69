import { requireAuth } from '@shared/middleware/auth.middleware.js';
import { createSchool, listSchools, updateSchool } from './schools.service.js';
import {
  CreateSchoolSchema,
  UpdateSchoolSchema,
  ListSchoolsQuerySchema,
  SchoolIdParamSchema,
  type CreateSchoolInput,
  type UpdateSchoolInput,
  type ListSchoolsQuery,
} from './schools.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function schoolsRoutes(app: AppInstance): Promise<void> {
  app.addHook('onRequest', requireAuth);

  // POST /api/schools
  app.post<{ Body: CreateSchoolInput }>(
    '/',
    { schema: { body: CreateSchoolSchema } },
    async (request, reply) => {
      const school = await createSchool(request.body);
      return reply.status(201).send(school);
    }
  );

  // GET /api/schools
  app.get<{ Querystring: ListSchoolsQuery }>(
    '/',
    { schema: { querystring: ListSchoolsQuerySchema } },
    async (request, reply) => {
      return reply.send(await listSchools(request.query));
    }
  );

  // PATCH /api/schools/:id
  app.patch<{ Params: { id: string }; Body: UpdateSchoolInput }>(
    '/:id',
    { schema: { params: SchoolIdParamSchema, body: UpdateSchoolSchema } },
    async (request, reply) => {
      const school = await updateSchool(request.params.id, request.body);
      return reply.send(school);
    }
  );
}
