import { store, type Store, type StatusCounts } from '@/database/store.js';
import type { Workshop } from '@/database/schema.js';
import { config } from '@config/app.config.js';
import { AppError } from '@shared/errors/app-error.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { auditLog, diffChanges } from '@shared/utils/audit.js';
import { isZeroAmount } from '@shared/utils/money.js';
import { paginate, toPageWindow, type PaginatedResult } from '@shared/utils/pagination.js';
import type {
  CreateWorkshopInput,
  UpdateWorkshopInput,
  ListWorkshopsQuery,
} from './workshops.schema.js';

// ============================================================================
// Availability
// ============================================================================

export interface WorkshopAvailability {
  isFree: boolean;
  /** Completed registrations, plus free ones when the workshop costs nothing. */
  currentRegistrations: number;
  /** Slots held by payments still awaiting a callback (strict lifecycle only). */
  reservedSlots: number;
  isFull: boolean;
  availableSlots: number;
}

export type WorkshopWithAvailability = Workshop & WorkshopAvailability;

export function isFreeWorkshop(workshop: Pick<Workshop, 'fee'>): boolean {
  return isZeroAmount(workshop.fee);
}

export function computeAvailability(
  workshop: Pick<Workshop, 'fee' | 'capacity'>,
  counts: StatusCounts,
  reservedSlots = 0
): WorkshopAvailability {
  const isFree = isFreeWorkshop(workshop);
  const currentRegistrations = counts.completed + (isFree ? counts.free : 0);
  const occupied = currentRegistrations + reservedSlots;

  return {
    isFree,
    currentRegistrations,
    reservedSlots,
    isFull: occupied >= workshop.capacity,
    availableSlots: Math.max(0, workshop.capacity - occupied),
  };
}

/**
 * Derived capacity figures. Under the strict lifecycle, registrations holding a
 * pending payment occupy a slot from the moment the gateway session is opened.
 */
export async function getWorkshopAvailability(
  workshop: Workshop,
  target: Store = store
): Promise<WorkshopAvailability> {
  const counts = await target.registrations.countByStatus(workshop.id);
  const reserved =
    config.registration.strictLifecycle && !isFreeWorkshop(workshop)
      ? await target.payments.countAwaiting(workshop.id)
      : 0;

  return computeAvailability(workshop, counts, reserved);
}

async function withAvailability(workshop: Workshop): Promise<WorkshopWithAvailability> {
  return { ...workshop, ...(await getWorkshopAvailability(workshop)) };
}

// ============================================================================
// CRUD Operations
// ============================================================================

export async function createWorkshop(
  input: CreateWorkshopInput,
  performedBy?: string
): Promise<Workshop> {
  const workshop = await store.workshops.create(input);

  await auditLog(store, {
    entityType: 'workshop',
    entityId: workshop.id,
    action: 'CREATE',
    performedBy,
  });

  return workshop;
}

export async function getWorkshopById(id: string): Promise<Workshop | null> {
  return store.workshops.findById(id);
}

export async function getWorkshopDetails(id: string): Promise<WorkshopWithAvailability> {
  const workshop = await store.workshops.findById(id);
  if (!workshop) {
    throw new AppError('Workshop not found', 404, true, ErrorCodes.NOT_FOUND);
  }
  return withAvailability(workshop);
}

export async function listWorkshops(
  query: ListWorkshopsQuery
): Promise<PaginatedResult<Workshop>> {
  const { page, limit, isActive, search } = query;
  const filter = { isActive, search };

  const [data, total] = await Promise.all([
    store.workshops.findMany(filter, toPageWindow({ page, limit })),
    store.workshops.count(filter),
  ]);

  return paginate(data, total, { page, limit });
}

/**
 * Active workshops in date order, each with live availability.
 */
export async function listOpenWorkshops(): Promise<WorkshopWithAvailability[]> {
  const workshops = await store.workshops.findMany({ isActive: true });
  return Promise.all(workshops.map(withAvailability));
}

/**
 * Public detail view; inactive workshops are reported as missing.
 */
export async function getOpenWorkshop(id: string): Promise<WorkshopWithAvailability> {
  const workshop = await store.workshops.findById(id);
  if (!workshop || !workshop.isActive) {
    throw new AppError('Workshop not found', 404, true, ErrorCodes.NOT_FOUND);
  }
  return withAvailability(workshop);
}

export async function updateWorkshop(
  id: string,
  input: UpdateWorkshopInput,
  performedBy?: string
): Promise<Workshop> {
  const existing = await store.workshops.findById(id);
  if (!existing) {
    throw new AppError('Workshop not found', 404, true, ErrorCodes.NOT_FOUND);
  }

  const updated = await store.workshops.update(id, input);
  if (!updated) {
    throw new AppError('Workshop not found', 404, true, ErrorCodes.NOT_FOUND);
  }

  const changes = diffChanges(existing, input, [
    'name',
    'workshopDate',
    'time',
    'venue',
    'fee',
    'capacity',
    'isActive',
  ]);
  if (changes) {
    await auditLog(store, {
      entityType: 'workshop',
      entityId: id,
      action: 'UPDATE',
      changes,
      performedBy,
    });
  }

  return updated;
}

/**
 * Workshops referenced by any registration cannot be removed.
 */
export async function deleteWorkshop(id: string, performedBy?: string): Promise<void> {
  const workshop = await store.workshops.findById(id);
  if (!workshop) {
    throw new AppError('Workshop not found', 404, true, ErrorCodes.NOT_FOUND);
  }

  const registrations = await store.registrations.count({ workshopId: id });
  if (registrations > 0) {
    throw new AppError(
      'Workshop has registrations and cannot be deleted',
      409,
      true,
      ErrorCodes.WORKSHOP_HAS_REGISTRATIONS,
      { registrations }
    );
  }

  await store.workshops.delete(id);
  await auditLog(store, {
    entityType: 'workshop',
    entityId: id,
    action: 'DELETE',
    performedBy,
  });
}
