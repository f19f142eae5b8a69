import { z } from 'zod';
import { paginationQueryShape } from '@shared/utils/pagination.js';

// ============================================================================
// Query Schemas (Admin)
// ============================================================================

export const PaymentStatusSchema = z.enum(['pending', 'completed', 'failed', 'cancelled']);

export const ListPaymentsQuerySchema = z
  .object({
    ...paginationQueryShape,
    paymentStatus: PaymentStatusSchema.optional(),
    workshopId: z.string().uuid().optional(),
    search: z.string().max(200).optional(),
  })
  .strict();

export const ExportPaymentsQuerySchema = ListPaymentsQuerySchema.omit({ page: true, limit: true });

// ============================================================================
// Provider Callbacks
// ============================================================================

// The provider posts many more fields than these; unknown keys are kept.
export const CallbackBodySchema = z
  .object({
    tran_id: z.string().trim().default(''),
    val_id: z.string().trim().optional(),
    amount: z.string().trim().optional(),
    status: z.string().optional(),
    value_a: z.string().optional(),
    value_b: z.string().optional(),
  })
  .passthrough();

// ============================================================================
// Public Schemas
// ============================================================================

export const RegistrationIdParamSchema = z
  .object({
    id: z.string().uuid(),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type ListPaymentsQuery = z.infer<typeof ListPaymentsQuerySchema>;
export type ExportPaymentsQuery = z.infer<typeof ExportPaymentsQuerySchema>;
export type CallbackBody = z.infer<typeof CallbackBodySchema>;
