import type { FastifyReply } from 'fastify';
import { config } from '@config/app.config.js';
import {
  handleSuccessCallback,
  handleFailCallback,
  handleCancelCallback,
  type CallbackResult,
} from './payments.service.js';
import { CallbackBodySchema, type CallbackBody } from './payments.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

// ============================================================================
// Provider Callbacks (No Auth - posted by the gateway through the browser)
// ============================================================================

type ResultStatus = 'completed' | 'failed' | 'cancelled' | 'error';

export function paymentResultUrl(status: ResultStatus, registrationId?: string): string {
  const params = new URLSearchParams({ status });
  if (registrationId) params.set('registration', registrationId);
  return `${config.payments.resultUrl}?${params.toString()}`;
}

function resultStatusOf(result: CallbackResult): ResultStatus {
  if (result.ok) {
    return result.status === 'pending' ? 'error' : result.status;
  }
  switch (result.error.kind) {
    case 'validation_failed':
    case 'amount_mismatch':
      return 'failed';
    default:
      return 'error';
  }
}

function redirectToResult(reply: FastifyReply, result: CallbackResult) {
  return reply.redirect(paymentResultUrl(resultStatusOf(result), result.registrationId), 303);
}

export async function paymentCallbackRoutes(app: AppInstance): Promise<void> {
  // POST /api/payments/callback/success
  app.post<{ Body: CallbackBody }>(
    '/success',
    {
      schema: { body: CallbackBodySchema },
    },
    async (request, reply) => {
      const { tran_id, val_id, amount } = request.body;
      const result = await handleSuccessCallback({
        transactionId: tran_id,
        validationId: val_id ?? '',
        amount,
      });
      return redirectToResult(reply, result);
    }
  );

  // POST /api/payments/callback/fail
  app.post<{ Body: CallbackBody }>(
    '/fail',
    {
      schema: { body: CallbackBodySchema },
    },
    async (request, reply) => {
      const result = await handleFailCallback(request.body.tran_id);
      return redirectToResult(reply, result);
    }
  );

  // POST /api/payments/callback/cancel
  app.post<{ Body: CallbackBody }>(
    '/cancel',
    {
      schema: { body: CallbackBodySchema },
    },
    async (request, reply) => {
      const result = await handleCancelCallback(request.body.tran_id);
      return redirectToResult(reply, result);
    }
  );
}
