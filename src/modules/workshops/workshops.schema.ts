import { z } from 'zod';
import { formatAmount } from '@shared/utils/money.js';
import { paginationQueryShape } from '@shared/utils/pagination.js';

// ============================================================================
// Field Schemas
// ============================================================================

// Fits numeric(10,2)
const FEE_PATTERN = /^\d{1,8}(\.\d{1,2})?$/;

export const FeeSchema = z
  .union([z.string(), z.number()])
  .refine(
    (value) => FEE_PATTERN.test(String(value).trim()),
    'Fee must be a non-negative amount below 100000000 with at most two decimals'
  )
  .transform((value) => formatAmount(value));

export const WorkshopDateSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}$/, 'Expected a date in YYYY-MM-DD format');

const BooleanQuerySchema = z
  .enum(['true', 'false'])
  .transform((value) => value === 'true');

// ============================================================================
// Create / Update Schemas (Admin)
// ============================================================================

export const CreateWorkshopSchema = z
  .object({
    name: z.string().trim().min(1).max(200),
    description: z.string().max(5000).default(''),
    workshopDate: WorkshopDateSchema,
    time: z.string().trim().min(1).max(50),
    duration: z.string().trim().min(1).max(50),
    venue: z.string().trim().min(1).max(300),
    fee: FeeSchema.default('0.00'),
    capacity: z.number().int().min(0).default(100),
    isActive: z.boolean().default(true),
    organizer: z.string().max(200).default(''),
  })
  .strict();

export const UpdateWorkshopSchema = z
  .object({
    name: z.string().trim().min(1).max(200).optional(),
    description: z.string().max(5000).optional(),
    workshopDate: WorkshopDateSchema.optional(),
    time: z.string().trim().min(1).max(50).optional(),
    duration: z.string().trim().min(1).max(50).optional(),
    venue: z.string().trim().min(1).max(300).optional(),
    fee: FeeSchema.optional(),
    capacity: z.number().int().min(0).optional(),
    isActive: z.boolean().optional(),
    organizer: z.string().max(200).optional(),
  })
  .strict();

// ============================================================================
// Query Schemas
// ============================================================================

export const ListWorkshopsQuerySchema = z
  .object({
    ...paginationQueryShape,
    isActive: BooleanQuerySchema.optional(),
    search: z.string().max(200).optional(),
  })
  .strict();

export const WorkshopIdParamSchema = z
  .object({
    id: z.string().uuid(),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type CreateWorkshopInput = z.infer<typeof CreateWorkshopSchema>;
export type UpdateWorkshopInput = z.infer<typeof UpdateWorkshopSchema>;
export type ListWorkshopsQuery = z.infer<typeof ListWorkshopsQuerySchema>;
