import {
  submitRegistration,
  getRegistrationSummary,
  getReceipt,
  toRegistrationSummary,
  toAppError,
} from './registrations.service.js';
import {
  RegistrationSubmissionSchema,
  WorkshopIdParamSchema,
  RegistrationIdParamSchema,
  type RegistrationSubmission,
} from './registrations.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

// ============================================================================
// Public Routes (No Auth - registration form and confirmation pages)
// ============================================================================

export async function registrationSubmissionRoutes(app: AppInstance): Promise<void> {
  // POST /api/public/workshops/:workshopId/register - Submit registration
  app.post<{ Params: { workshopId: string }; Body: RegistrationSubmission }>(
    '/:workshopId/register',
    {
      schema: {
        params: WorkshopIdParamSchema,
        body: RegistrationSubmissionSchema,
      },
    },
    async (request, reply) => {
      const result = await submitRegistration(request.params.workshopId, request.body);
      if (!result.ok) {
        throw toAppError(result.error);
      }

      const summary = toRegistrationSummary(result.registration);
      return reply.status(201).send({
        ...summary,
        nextStep: summary.workshop.isFree ? 'complete' : 'payment',
      });
    }
  );
}

export async function registrationsPublicRoutes(app: AppInstance): Promise<void> {
  // GET /api/public/registrations/:id - Confirmation / result page data
  app.get<{ Params: { id: string } }>(
    '/:id',
    {
      schema: { params: RegistrationIdParamSchema },
    },
    async (request, reply) => {
      const summary = await getRegistrationSummary(request.params.id);
      return reply.send(summary);
    }
  );

  // GET /api/public/registrations/:id/receipt - PDF receipt
  app.get<{ Params: { id: string } }>(
    '/:id/receipt',
    {
      schema: { params: RegistrationIdParamSchema },
    },
    async (request, reply) => {
      const { fileName, content } = await getReceipt(request.params.id);
      return reply
        .header('Content-Type', 'application/pdf')
        .header('Content-Disposition', `attachment; filename="${fileName}"`)
        .send(Buffer.from(content));
    }
  );
}
