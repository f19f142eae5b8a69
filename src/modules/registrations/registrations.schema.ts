import { z } from 'zod';
import { paginationQueryShape } from '@shared/utils/pagination.js';

// ============================================================================
// Field Rules (checked one at a time, in submission order)
// ============================================================================

export const BANGLADESH_MOBILE_PATTERN = /^(\+8801|01)[3-9]\d{8}$/;

// Whole numbers only, as a number or a plain digit string
export const GradeSchema = z
  .union([z.number(), z.string().trim().regex(/^\d+$/).transform(Number)])
  .pipe(z.number().int().min(2).max(12));

export const ContactNumberSchema = z.string().trim().regex(BANGLADESH_MOBILE_PATTERN);

export const EmailSchema = z.string().trim().toLowerCase().email().max(254);

export const StudentNameSchema = z.string().trim().min(1).max(200);

export const SchoolIdSchema = z.string().uuid();

// Checkbox values as browsers and form encoders send them
export const TermsAcceptedSchema = z.union([z.literal(true), z.enum(['true', 'on', '1'])]);

// ============================================================================
// Submission Schema (Public)
// ============================================================================

// Fields stay unparsed here: the ledger validates them after the workshop
// checks so the first failing rule is the one reported.
export const RegistrationSubmissionSchema = z
  .object({
    studentName: z.unknown(),
    grade: z.unknown(),
    schoolId: z.unknown(),
    contactNumber: z.unknown(),
    email: z.unknown(),
    termsAccepted: z.unknown(),
  })
  .strict();

export const WorkshopIdParamSchema = z
  .object({
    workshopId: z.string().uuid(),
  })
  .strict();

// ============================================================================
// Admin Schemas
// ============================================================================

export const RegistrationStatusSchema = z.enum([
  'pending',
  'completed',
  'failed',
  'cancelled',
  'free',
]);

export const ListRegistrationsQuerySchema = z
  .object({
    ...paginationQueryShape,
    workshopId: z.string().uuid().optional(),
    paymentStatus: RegistrationStatusSchema.optional(),
    schoolId: z.string().uuid().optional(),
    grade: z.coerce.number().int().min(2).max(12).optional(),
    search: z.string().max(200).optional(),
  })
  .strict();

export const ExportRegistrationsQuerySchema = ListRegistrationsQuerySchema.omit({
  page: true,
  limit: true,
});

export const MarkCompletedSchema = z
  .object({
    registrationIds: z.array(z.string().uuid()).min(1).max(500),
  })
  .strict();

export const RegistrationIdParamSchema = z
  .object({
    id: z.string().uuid(),
  })
  .strict();

// ============================================================================
// Types
// ============================================================================

export type RegistrationSubmission = z.infer<typeof RegistrationSubmissionSchema>;
export type ListRegistrationsQuery = z.infer<typeof ListRegistrationsQuerySchema>;
export type ExportRegistrationsQuery = z.infer<typeof ExportRegistrationsQuerySchema>;
export type MarkCompletedInput = z.infer<typeof MarkCompletedSchema>;
