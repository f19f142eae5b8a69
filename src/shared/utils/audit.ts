import type { Store } from '@/database/store.js';

export interface AuditLogData {
  entityType: 'registration' | 'payment' | 'workshop' | 'school';
  entityId: string;
  action: string;
  changes?: Record<string, { old: unknown; new: unknown }>;
  performedBy?: string;
  ipAddress?: string;
  userAgent?: string;
}

/**
 * Create an audit log entry. Pass the transaction store to keep the entry
 * in the same unit of work as the change it records.
 */
export async function auditLog(target: Store, data: AuditLogData): Promise<void> {
  await target.auditLogs.create({
    entityType: data.entityType,
    entityId: data.entityId,
    action: data.action,
    changes: data.changes ?? null,
    performedBy: data.performedBy ?? null,
    ipAddress: data.ipAddress ?? null,
    userAgent: data.userAgent ?? null,
  });
}

/**
 * Calculate changes between old and new objects for specified fields.
 * Returns undefined if no changes detected.
 */
export function diffChanges<T extends Record<string, unknown>>(
  old: T | null,
  updated: Partial<T>,
  fields: (keyof T & string)[]
): Record<string, { old: unknown; new: unknown }> | undefined {
  const changes: Record<string, { old: unknown; new: unknown }> = {};

  for (const field of fields) {
    if (!(field in updated)) continue;
    const oldVal = old?.[field];
    const newVal = updated[field];
    if (oldVal !== newVal) {
      changes[field] = { old: oldVal, new: newVal };
    }
  }

  return Object.keys(changes).length > 0 ? changes : undefined;
}
