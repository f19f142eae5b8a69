import { requireAuth } from '@shared/middleware/auth.middleware.js';
import { exportFileName, XLSX_CONTENT_TYPE } from '@documents';
import { listPayments, exportPayments } from './payments.service.js';
import {
  ListPaymentsQuerySchema,
  ExportPaymentsQuerySchema,
  type ListPaymentsQuery,
  type ExportPaymentsQuery,
} from './payments.schema.js';
import type { AppInstance } from '@shared/types/fastify.js';

export async function paymentsRoutes(app: AppInstance): Promise<void> {
  // All routes require authentication
  app.addHook('onRequest', requireAuth);

  // GET /api/payments - List payments
  app.get<{ Querystring: ListPaymentsQuery }>(
    '/',
    {
      schema: { querystring: ListPaymentsQuerySchema },
    },
    async (request, reply) => {
      const payments = await listPayments(request.query);
      return reply.send(payments);
    }
  );

  // GET /api/payments/export - XLSX of every matching payment
  app.get<{ Querystring: ExportPaymentsQuery }>(
    '/export',
    {
      schema: { querystring: ExportPaymentsQuerySchema },
    },
    async (request, reply) => {
      const file = await exportPayments(request.query);
      return reply
        .header('Content-Type', XLSX_CONTENT_TYPE)
        .header('Content-Disposition', `attachment; filename="${exportFileName('payments')}"`)
        .send(file);
    }
  );
}
