// ============================================================================
// Reports Module - Zod Schemas
// ============================================================================

import { z } from 'zod';

// ============================================================================
// Response Schemas
// ============================================================================

export const StatusBreakdownSchema = z.object({
  pending: z.number(),
  completed: z.number(),
  failed: z.number(),
  cancelled: z.number(),
  free: z.number(),
});

export const WorkshopStatsItemSchema = z.object({
  workshopId: z.string().uuid(),
  name: z.string(),
  workshopDate: z.string(),
  capacity: z.number(),
  isActive: z.boolean(),
  participants: z.number(),
  completed: z.number(),
  pending: z.number(),
  free: z.number(),
  revenue: z.string(),
});

export const RecentRegistrationItemSchema = z.object({
  id: z.string().uuid(),
  registrationNumber: z.string(),
  studentName: z.string(),
  workshopName: z.string(),
  paymentStatus: z.string(),
  registeredAt: z.string().datetime(),
});

export const DashboardStatsResponseSchema = z.object({
  generatedAt: z.string().datetime(),
  totalRegistrations: z.number(),
  totalRevenue: z.string(),
  currency: z.string(),
  activeWorkshops: z.number(),
  pendingPayments: z.number(),
  byStatus: StatusBreakdownSchema,
  workshops: z.array(WorkshopStatsItemSchema),
  recentRegistrations: z.array(RecentRegistrationItemSchema),
});

// ============================================================================
// Type Exports
// ============================================================================

export type StatusBreakdown = z.infer<typeof StatusBreakdownSchema>;
export type WorkshopStatsItem = z.infer<typeof WorkshopStatsItemSchema>;
export type RecentRegistrationItem = z.infer<typeof RecentRegistrationItemSchema>;
export type DashboardStatsResponse = z.infer<typeof DashboardStatsResponseSchema>;
