// ============================================================================
// Reports Module - Service
// ============================================================================

import { store } from '@/database/store.js';
import type { Workshop } from '@/database/schema.js';
import { config } from '@config/app.config.js';
import { formatAmount } from '@shared/utils/money.js';
import { isFreeWorkshop } from '@workshops';
import type {
  DashboardStatsResponse,
  RecentRegistrationItem,
  WorkshopStatsItem,
} from './reports.schema.js';

const RECENT_REGISTRATIONS = 10;

async function getWorkshopStats(workshop: Workshop): Promise<WorkshopStatsItem> {
  const [counts, revenue] = await Promise.all([
    store.registrations.countByStatus(workshop.id),
    store.payments.sumCompleted(workshop.id),
  ]);

  return {
    workshopId: workshop.id,
    name: workshop.name,
    workshopDate: workshop.workshopDate,
    capacity: workshop.capacity,
    isActive: workshop.isActive,
    participants: counts.completed + (isFreeWorkshop(workshop) ? counts.free : 0),
    completed: counts.completed,
    pending: counts.pending,
    free: counts.free,
    revenue: formatAmount(revenue),
  };
}

// ============================================================================
// Dashboard
// ============================================================================

export async function getDashboardStats(): Promise<DashboardStatsResponse> {
  const [totalRegistrations, byStatus, revenue, activeWorkshops, workshops, recent] =
    await Promise.all([
      store.registrations.count({}),
      store.registrations.countByStatus(),
      store.payments.sumCompleted(),
      store.workshops.count({ isActive: true }),
      store.workshops.findMany({}),
      store.registrations.findManyDetailed({}, { limit: RECENT_REGISTRATIONS, offset: 0 }),
    ]);

  const recentRegistrations: RecentRegistrationItem[] = recent.map((registration) => ({
    id: registration.id,
    registrationNumber: registration.registrationNumber,
    studentName: registration.studentName,
    workshopName: registration.workshop.name,
    paymentStatus: registration.paymentStatus,
    registeredAt: registration.registeredAt.toISOString(),
  }));

  return {
    generatedAt: new Date().toISOString(),
    totalRegistrations,
    totalRevenue: formatAmount(revenue),
    currency: config.payments.currency,
    activeWorkshops,
    pendingPayments: byStatus.pending,
    byStatus,
    workshops: await Promise.all(workshops.map(getWorkshopStats)),
    recentRegistrations,
  };
}
