import { randomUUID } from 'crypto';
import type { ZodType } from 'zod';
import { store, type RegistrationDetail } from '@/database/store.js';
import type { RegistrationStatus, Workshop } from '@/database/schema.js';
import { AppError, UniqueViolationError } from '@shared/errors/app-error.js';
import { ErrorCodes, type ErrorCode } from '@shared/errors/error-codes.js';
import { auditLog } from '@shared/utils/audit.js';
import { dateStamp, schoolNameOf } from '@shared/utils/format.js';
import { logger } from '@shared/utils/logger.js';
import { paginate, toPageWindow, type PaginatedResult } from '@shared/utils/pagination.js';
import { getWorkshopAvailability, isFreeWorkshop } from '@workshops';
import { sendConfirmation } from '@notifications';
import {
  getPaymentState,
  isReceiptAvailable,
  resolveRegistrationStatus,
  type PaymentState,
} from '@payments';
import {
  REGISTRATION_EXPORT_COLUMNS,
  receiptFileName,
  renderReceipt,
  renderSpreadsheet,
} from '@documents';
import {
  ContactNumberSchema,
  EmailSchema,
  GradeSchema,
  SchoolIdSchema,
  StudentNameSchema,
  TermsAcceptedSchema,
  type ExportRegistrationsQuery,
  type ListRegistrationsQuery,
  type RegistrationSubmission,
} from './registrations.schema.js';

// ============================================================================
// Types
// ============================================================================

export interface LedgerError {
  kind: 'validation' | 'conflict';
  code: ErrorCode;
  message: string;
  field?: string;
  retryable?: boolean;
}

export type SubmitRegistrationResult =
  | { ok: true; registration: RegistrationDetail }
  | { ok: false; error: LedgerError };

export interface RegistrationSummary {
  registration: {
    id: string;
    registrationNumber: string;
    studentName: string;
    grade: number;
    school: string;
    email: string;
    contactNumber: string;
    paymentStatus: RegistrationStatus;
    registeredAt: Date;
  };
  workshop: Pick<
    Workshop,
    'id' | 'name' | 'workshopDate' | 'time' | 'duration' | 'venue' | 'fee'
  > & { isFree: boolean };
  paymentState: PaymentState;
  receiptAvailable: boolean;
}

export interface MarkCompletedResult {
  updated: string[];
  skipped: string[];
  notFound: string[];
}

const EMAIL_WORKSHOP_CONSTRAINT = 'registrations_email_workshop_unique';
const REGISTRATION_NUMBER_CONSTRAINT = 'registrations_registration_number_unique';

// ============================================================================
// Helpers
// ============================================================================

export function generateRegistrationNumber(now: Date = new Date()): string {
  const suffix = randomUUID().replace(/-/g, '').slice(0, 5).toUpperCase();
  return `REG-${dateStamp(now)}-${suffix}`;
}

function validationError(code: ErrorCode, field: string, message: string): LedgerError {
  return { kind: 'validation', code, field, message };
}

function duplicateRegistration(): LedgerError {
  return {
    kind: 'conflict',
    code: ErrorCodes.DUPLICATE_REGISTRATION,
    field: 'email',
    message: 'This email is already registered for this workshop',
  };
}

function check<T>(schema: ZodType<T>, value: unknown): T | null {
  const parsed = schema.safeParse(value);
  return parsed.success ? parsed.data : null;
}

async function requireDetail(id: string): Promise<RegistrationDetail> {
  const registration = await store.registrations.findDetailedById(id);
  if (!registration) {
    throw new AppError('Registration not found', 404, true, ErrorCodes.NOT_FOUND);
  }
  return registration;
}

/**
 * HTTP form of a ledger error.
 */
export function toAppError(error: LedgerError): AppError {
  return new AppError(
    error.message,
    error.kind === 'validation' ? 400 : 409,
    true,
    error.code,
    {
      ...(error.field && { field: error.field }),
      ...(error.retryable && { retryable: true }),
    }
  );
}

// ============================================================================
// Submission
// ============================================================================

/**
 * Public registration. Rules are checked in a fixed order and the first one
 * that fails is returned; nothing is written unless all of them pass.
 */
export async function submitRegistration(
  workshopId: string,
  input: RegistrationSubmission
): Promise<SubmitRegistrationResult> {
  const workshop = await store.workshops.findById(workshopId);
  if (!workshop || !workshop.isActive) {
    return {
      ok: false,
      error: {
        kind: 'conflict',
        code: ErrorCodes.WORKSHOP_CLOSED,
        message: 'This workshop is not accepting registrations',
      },
    };
  }

  const availability = await getWorkshopAvailability(workshop);
  if (availability.isFull) {
    return {
      ok: false,
      error: {
        kind: 'conflict',
        code: ErrorCodes.WORKSHOP_FULL,
        message: `This workshop is full (capacity ${workshop.capacity})`,
      },
    };
  }

  const grade = check(GradeSchema, input.grade);
  if (grade === null) {
    return {
      ok: false,
      error: validationError(ErrorCodes.INVALID_GRADE, 'grade', 'Grade must be between 2 and 12'),
    };
  }

  const contactNumber = check(ContactNumberSchema, input.contactNumber);
  if (contactNumber === null) {
    return {
      ok: false,
      error: validationError(
        ErrorCodes.INVALID_PHONE,
        'contactNumber',
        'Enter a valid Bangladeshi mobile number (e.g. 01712345678)'
      ),
    };
  }

  const email = check(EmailSchema, input.email);
  if (email === null) {
    return {
      ok: false,
      error: validationError(ErrorCodes.INVALID_EMAIL, 'email', 'Enter a valid email address'),
    };
  }

  const studentName = check(StudentNameSchema, input.studentName);
  if (studentName === null) {
    return {
      ok: false,
      error: validationError(
        ErrorCodes.INVALID_STUDENT_NAME,
        'studentName',
        'Student name is required'
      ),
    };
  }

  const schoolId = check(SchoolIdSchema, input.schoolId);
  const school = schoolId ? await store.schools.findById(schoolId) : null;
  if (!school || !school.isActive) {
    return {
      ok: false,
      error: validationError(ErrorCodes.INVALID_SCHOOL, 'schoolId', 'Select a school from the list'),
    };
  }

  const existing = await store.registrations.findByEmailAndWorkshop(email, workshop.id);
  if (existing) {
    return { ok: false, error: duplicateRegistration() };
  }

  if (check(TermsAcceptedSchema, input.termsAccepted) === null) {
    return {
      ok: false,
      error: validationError(
        ErrorCodes.TERMS_NOT_ACCEPTED,
        'termsAccepted',
        'You must accept the terms and conditions'
      ),
    };
  }

  let registrationId: string;
  try {
    const created = await store.registrations.create({
      registrationNumber: generateRegistrationNumber(),
      workshopId: workshop.id,
      studentName,
      grade,
      schoolId: school.id,
      contactNumber,
      email,
      paymentStatus: resolveRegistrationStatus('pending', availability.isFree),
    });
    registrationId = created.id;
  } catch (error) {
    if (error instanceof UniqueViolationError) {
      if (error.constraint === EMAIL_WORKSHOP_CONSTRAINT) {
        return { ok: false, error: duplicateRegistration() };
      }
      if (error.constraint === REGISTRATION_NUMBER_CONSTRAINT) {
        logger.error({ workshopId }, 'Registration number collision');
        return {
          ok: false,
          error: {
            kind: 'conflict',
            code: ErrorCodes.REGISTRATION_NUMBER_COLLISION,
            message: 'Registration could not be completed. Please submit again.',
            retryable: true,
          },
        };
      }
    }
    throw error;
  }

  const registration = await requireDetail(registrationId);
  logger.info(
    {
      registrationId,
      registrationNumber: registration.registrationNumber,
      workshopId,
      paymentStatus: registration.paymentStatus,
    },
    'Registration created'
  );

  await sendConfirmation(registration);

  return { ok: true, registration };
}

// ============================================================================
// Queries
// ============================================================================

export async function getRegistrationById(id: string): Promise<RegistrationDetail | null> {
  return store.registrations.findDetailedById(id);
}

export async function getRegistrationByNumber(
  registrationNumber: string
): Promise<RegistrationDetail | null> {
  return store.registrations.findDetailedByNumber(registrationNumber);
}

export function toRegistrationSummary(registration: RegistrationDetail): RegistrationSummary {
  const { workshop } = registration;
  return {
    registration: {
      id: registration.id,
      registrationNumber: registration.registrationNumber,
      studentName: registration.studentName,
      grade: registration.grade,
      school: schoolNameOf(registration),
      email: registration.email,
      contactNumber: registration.contactNumber,
      paymentStatus: registration.paymentStatus,
      registeredAt: registration.registeredAt,
    },
    workshop: {
      id: workshop.id,
      name: workshop.name,
      workshopDate: workshop.workshopDate,
      time: workshop.time,
      duration: workshop.duration,
      venue: workshop.venue,
      fee: workshop.fee,
      isFree: isFreeWorkshop(workshop),
    },
    paymentState: getPaymentState(registration, registration.payment),
    receiptAvailable: isReceiptAvailable(registration.paymentStatus),
  };
}

/**
 * Confirmation and payment-result pages.
 */
export async function getRegistrationSummary(id: string): Promise<RegistrationSummary> {
  return toRegistrationSummary(await requireDetail(id));
}

export async function listRegistrations(
  query: ListRegistrationsQuery
): Promise<PaginatedResult<RegistrationDetail>> {
  const { page, limit, ...filter } = query;

  const [data, total] = await Promise.all([
    store.registrations.findManyDetailed(filter, toPageWindow({ page, limit })),
    store.registrations.count(filter),
  ]);

  return paginate(data, total, { page, limit });
}

// ============================================================================
// Documents
// ============================================================================

export async function getReceipt(id: string): Promise<{ fileName: string; content: Uint8Array }> {
  const registration = await requireDetail(id);
  const content = await renderReceipt(registration);
  return { fileName: receiptFileName(registration.registrationNumber), content };
}

export async function exportRegistrations(query: ExportRegistrationsQuery): Promise<Buffer> {
  const registrations = await store.registrations.findManyDetailed(query);
  return renderSpreadsheet(registrations, REGISTRATION_EXPORT_COLUMNS, 'Registrations');
}

// ============================================================================
// Administrative Override
// ============================================================================

/**
 * Marks registrations (and their payments) completed without gateway
 * validation. Free registrations stay free; each row commits on its own.
 */
export async function markRegistrationsCompleted(
  ids: string[],
  performedBy: string
): Promise<MarkCompletedResult> {
  const result: MarkCompletedResult = { updated: [], skipped: [], notFound: [] };

  for (const id of new Set(ids)) {
    const outcome = await store.transaction(async (tx) => {
      const registration = await tx.registrations.findDetailedById(id);
      if (!registration) return 'notFound' as const;

      const { payment } = registration;
      const paymentSettled = !payment || payment.paymentStatus === 'completed';
      if (isFreeWorkshop(registration.workshop)) return 'skipped' as const;
      if (registration.paymentStatus === 'completed' && paymentSettled) return 'skipped' as const;

      await tx.registrations.update(id, { paymentStatus: 'completed' });

      const changes: Record<string, { old: unknown; new: unknown }> = {
        paymentStatus: { old: registration.paymentStatus, new: 'completed' },
      };

      if (payment && payment.paymentStatus !== 'completed') {
        await tx.payments.update(payment.id, {
          paymentStatus: 'completed',
          completedAt: new Date(),
        });
        changes.paymentPaymentStatus = { old: payment.paymentStatus, new: 'completed' };
      }

      await auditLog(tx, {
        entityType: 'registration',
        entityId: id,
        action: 'PAYMENT_STATUS_OVERRIDE',
        changes,
        performedBy,
      });

      return 'updated' as const;
    });

    result[outcome].push(id);
  }

  if (result.updated.length > 0) {
    logger.warn(
      { registrationIds: result.updated, performedBy },
      'Registrations marked completed without payment validation'
    );
  }

  return result;
}
