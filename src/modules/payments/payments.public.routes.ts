import { initiatePayment, toAppError } from './payments.service.js';
import { RegistrationIdParamSchema } from './payments.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

// ============================================================================
// Public Routes (No Auth - checkout from the confirmation page)
// ============================================================================

export async function paymentsPublicRoutes(app: AppInstance): Promise<void> {
  // POST /api/public/registrations/:id/payment - Start checkout
  app.post<{ Params: { id: string } }>(
    '/:id/payment',
    {
      schema: { params: RegistrationIdParamSchema },
    },
    async (request, reply) => {
      const result = await initiatePayment(request.params.id);
      if (!result.ok) {
        throw toAppError(result.error);
      }

      if (result.status === 'redirect') {
        return reply.send({ status: result.status, gatewayUrl: result.gatewayUrl });
      }
      return reply.send({ status: result.status });
    }
  );
}
