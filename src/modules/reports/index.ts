// ============================================================================
// Reports Module - Barrel Export
// ============================================================================

// Services
export { getDashboardStats } from './reports.service.js';

// Schemas & Types
export {
  StatusBreakdownSchema,
  WorkshopStatsItemSchema,
  RecentRegistrationItemSchema,
  DashboardStatsResponseSchema,
  type StatusBreakdown,
  type WorkshopStatsItem,
  type RecentRegistrationItem,
  type DashboardStatsResponse,
} from './reports.schema.js';

// Routes
export { reportsRoutes } from './reports.routes.js';
