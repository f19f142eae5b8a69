// ============================================================================
// Reports Module - Routes (Protected)
// ============================================================================

import type { AppInstance } from '@shared/types/fastify.js';
import { requireAuth } from '@shared/middleware/auth.middleware.js';
import { DashboardStatsResponseSchema } from './reports.schema.js';
import { getDashboardStats } from './reports.service.js';

// ============================================================================
// Route Registration
// ============================================================================

export async function reportsRoutes(app: AppInstance): Promise<void> {
  // ----------------------------------------------------------------
  // GET /api/reports/dashboard - Admin dashboard figures
  // ----------------------------------------------------------------
  app.get(
    '/dashboard',
    {
      schema: {
        response: {
          200: DashboardStatsResponseSchema,
        },
      },
      preHandler: [requireAuth],
    },
    async (_request, reply) => {
      const stats = await getDashboardStats();
      return reply.send(stats);
    }
  );
}
