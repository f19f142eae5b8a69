import { randomUUID } from 'crypto';
import { store, type PaymentDetail, type RegistrationDetail } from '@/database/store.js';
import type { Payment, PaymentStatus } from '@/database/schema.js';
import { config } from '@config/app.config.js';
import { AppError, UniqueViolationError } from '@shared/errors/app-error.js';
import { ErrorCodes, type ErrorCode } from '@shared/errors/error-codes.js';
import { logger } from '@shared/utils/logger.js';
import { paginate, toPageWindow, type PaginatedResult } from '@shared/utils/pagination.js';
import { getWorkshopAvailability, isFreeWorkshop } from '@workshops';
import { sendPaymentConfirmation } from '@notifications';
import { PAYMENT_EXPORT_COLUMNS, renderSpreadsheet } from '@documents';
import { getPaymentGateway, type GatewayPayload } from './gateway/index.js';
import {
  canTransitionPaymentStatus,
  resolveRegistrationStatus,
  toRegistrationStatus,
} from './payment-status.js';
import type { ExportPaymentsQuery, ListPaymentsQuery } from './payments.schema.js';

// ============================================================================
// Types
// ============================================================================

export type PaymentErrorKind =
  | 'not_found'
  | 'conflict'
  | 'gateway'
  | 'integrity'
  | 'validation_failed'
  | 'amount_mismatch';

export interface PaymentError {
  kind: PaymentErrorKind;
  code: ErrorCode;
  message: string;
  retryable: boolean;
}

export type InitiatePaymentResult =
  | { ok: true; status: 'redirect'; gatewayUrl: string; transactionId: string }
  | { ok: true; status: 'not_required' | 'already_completed' }
  | { ok: false; error: PaymentError };

export type CallbackResult =
  | { ok: true; registrationId: string; status: PaymentStatus; alreadyProcessed: boolean }
  | { ok: false; error: PaymentError; registrationId?: string };

export interface SuccessCallbackInput {
  validationId: string;
  transactionId: string;
  /** Amount the provider reports on the callback, as received. */
  amount?: string;
}

function paymentError(
  kind: PaymentErrorKind,
  code: ErrorCode,
  message: string,
  retryable = false
): PaymentError {
  return { kind, code, message, retryable };
}

const HTTP_STATUS_FOR: Record<PaymentErrorKind, number> = {
  not_found: 404,
  conflict: 409,
  gateway: 502,
  integrity: 404,
  validation_failed: 400,
  amount_mismatch: 400,
};

/**
 * HTTP form of a payment error. Gateway errors keep their opaque message.
 */
export function toAppError(error: PaymentError): AppError {
  return new AppError(
    error.message,
    HTTP_STATUS_FOR[error.kind],
    true,
    error.code,
    error.retryable ? { retryable: true } : undefined
  );
}

function unknownTransaction(): PaymentError {
  return paymentError('integrity', ErrorCodes.PAYMENT_NOT_FOUND, 'Payment record not found');
}

// ============================================================================
// Helpers
// ============================================================================

export function generateTransactionId(registrationNumber: string): string {
  const suffix = randomUUID().replace(/-/g, '').slice(0, 8).toUpperCase();
  return `TXN-${registrationNumber}-${suffix}`;
}

/**
 * Moves a payment and its registration to `target` in one unit of work.
 * Returns null when the guard skipped the write.
 */
async function settlePayment(
  payment: Payment,
  target: PaymentStatus,
  options: { gatewayResponse?: GatewayPayload; unlessStatus?: PaymentStatus } = {}
): Promise<Payment | null> {
  return store.transaction(async (tx) => {
    const updated = await tx.payments.update(
      payment.id,
      {
        paymentStatus: target,
        completedAt: target === 'completed' ? new Date() : null,
        ...(options.gatewayResponse && { gatewayResponse: options.gatewayResponse }),
      },
      { unlessStatus: options.unlessStatus }
    );
    if (!updated) return null;

    const registration = await tx.registrations.findDetailedById(payment.registrationId);
    if (!registration) {
      throw new Error(`Registration ${payment.registrationId} missing for payment ${payment.id}`);
    }

    await tx.registrations.update(registration.id, {
      paymentStatus: resolveRegistrationStatus(
        toRegistrationStatus(target),
        isFreeWorkshop(registration.workshop)
      ),
    });

    return updated;
  });
}

// ============================================================================
// Initiation
// ============================================================================

/**
 * Opens a gateway session for a paid registration. The amount is always the
 * workshop fee, never a client value. A registration owns at most one payment.
 */
export async function initiatePayment(registrationId: string): Promise<InitiatePaymentResult> {
  const registration = await store.registrations.findDetailedById(registrationId);
  if (!registration) {
    return {
      ok: false,
      error: paymentError('not_found', ErrorCodes.NOT_FOUND, 'Registration not found'),
    };
  }

  const { workshop, payment: existing } = registration;

  if (registration.paymentStatus === 'free' || isFreeWorkshop(workshop)) {
    return { ok: true, status: 'not_required' };
  }
  if (registration.paymentStatus === 'completed' || existing?.paymentStatus === 'completed') {
    return { ok: true, status: 'already_completed' };
  }
  if (existing) {
    return {
      ok: false,
      error: paymentError(
        'conflict',
        ErrorCodes.PAYMENT_ALREADY_INITIATED,
        'A payment has already been started for this registration'
      ),
    };
  }

  if (config.registration.strictLifecycle) {
    const availability = await getWorkshopAvailability(workshop);
    if (availability.isFull) {
      return {
        ok: false,
        error: paymentError(
          'conflict',
          ErrorCodes.WORKSHOP_FULL,
          `This workshop is full (capacity ${workshop.capacity})`
        ),
      };
    }
  }

  const transactionId = generateTransactionId(registration.registrationNumber);
  const currency = config.payments.currency;

  const result = await getPaymentGateway().initiate({
    amount: workshop.fee,
    currency,
    transactionId,
    customer: {
      name: registration.studentName,
      email: registration.email,
      phone: registration.contactNumber,
      address: registration.school?.name ?? '',
    },
    product: { name: workshop.name, category: 'Workshop Registration' },
    callbackUrls: config.payments.callbackUrls,
    passthrough: {
      registrationNumber: registration.registrationNumber,
      workshopId: workshop.id,
    },
  });

  if (!result.success) {
    logger.error(
      {
        registrationId,
        transactionId,
        error: result.error,
        gatewayResponse: result.rawResponse,
      },
      'Payment initiation failed'
    );
    return {
      ok: false,
      error: paymentError(
        'gateway',
        ErrorCodes.GATEWAY_ERROR,
        'The payment gateway could not be reached. Please try again.',
        true
      ),
    };
  }

  try {
    await store.payments.create({
      registrationId: registration.id,
      transactionId,
      amount: workshop.fee,
      currency,
      paymentStatus: 'pending',
      paymentMethod: 'gateway',
      gatewayResponse: { initiate: result.rawResponse },
    });
  } catch (error) {
    if (error instanceof UniqueViolationError) {
      return {
        ok: false,
        error: paymentError(
          'conflict',
          ErrorCodes.PAYMENT_ALREADY_INITIATED,
          'A payment has already been started for this registration'
        ),
      };
    }
    throw error;
  }

  logger.info({ registrationId, transactionId }, 'Payment initiated');
  return { ok: true, status: 'redirect', gatewayUrl: result.gatewayUrl, transactionId };
}

// ============================================================================
// Provider Callbacks
// ============================================================================

/**
 * Success callback: validate with the provider, check the amount against the
 * workshop fee, then complete payment and registration together. A payment
 * that is already completed is left untouched and reported as success.
 */
export async function handleSuccessCallback(input: SuccessCallbackInput): Promise<CallbackResult> {
  const { validationId, transactionId, amount } = input;

  const payment = await store.payments.findByTransactionId(transactionId);
  if (!payment) {
    logger.error({ transactionId, validationId }, 'Success callback for unknown transaction');
    return { ok: false, error: unknownTransaction() };
  }

  const registrationId = payment.registrationId;

  if (payment.paymentStatus === 'completed') {
    logger.info({ transactionId, registrationId }, 'Duplicate success callback ignored');
    return { ok: true, registrationId, status: 'completed', alreadyProcessed: true };
  }

  const registration = await store.registrations.findDetailedById(registrationId);
  if (!registration) {
    logger.error({ transactionId, registrationId }, 'Payment has no registration');
    return { ok: false, error: unknownTransaction() };
  }

  const gateway = getPaymentGateway();
  const validation = await gateway.validate(validationId, transactionId);

  if (!validation.success) {
    logger.error(
      { transactionId, registrationId, error: validation.error, gatewayResponse: validation.rawResponse },
      'Payment validation failed'
    );
    await settlePayment(payment, 'failed', {
      gatewayResponse: { ...payment.gatewayResponse, validation: validation.rawResponse ?? null },
      unlessStatus: 'completed',
    });
    return {
      ok: false,
      registrationId,
      error: paymentError(
        'validation_failed',
        ErrorCodes.VALIDATION_FAILED,
        'Payment could not be verified. Please contact support.'
      ),
    };
  }

  if (!gateway.amountsMatch(amount, registration.workshop.fee)) {
    logger.error(
      { transactionId, registrationId, reportedAmount: amount, expectedAmount: registration.workshop.fee },
      'Payment amount mismatch'
    );
    await settlePayment(payment, 'failed', {
      gatewayResponse: { ...payment.gatewayResponse, validation: validation.rawResponse },
      unlessStatus: 'completed',
    });
    return {
      ok: false,
      registrationId,
      error: paymentError(
        'amount_mismatch',
        ErrorCodes.AMOUNT_MISMATCH,
        'Payment amount did not match the workshop fee. Please contact support.'
      ),
    };
  }

  const completed = await settlePayment(payment, 'completed', {
    gatewayResponse: {
      ...payment.gatewayResponse,
      validation: validation.rawResponse,
      cardType: validation.cardType ?? null,
    },
    unlessStatus: 'completed',
  });

  if (!completed) {
    // Another delivery of the same callback completed it first
    return { ok: true, registrationId, status: 'completed', alreadyProcessed: true };
  }

  logger.info({ transactionId, registrationId }, 'Payment completed');

  const confirmed: RegistrationDetail = {
    ...registration,
    paymentStatus: 'completed',
    payment: completed,
  };
  await sendPaymentConfirmation(confirmed, completed);

  return { ok: true, registrationId, status: 'completed', alreadyProcessed: false };
}

async function handleTerminalCallback(
  transactionId: string,
  target: 'failed' | 'cancelled'
): Promise<CallbackResult> {
  const payment = await store.payments.findByTransactionId(transactionId);
  if (!payment) {
    logger.warn({ transactionId, target }, 'Callback for unknown transaction');
    return { ok: false, error: unknownTransaction() };
  }

  const registrationId = payment.registrationId;

  if (
    config.registration.strictLifecycle &&
    !canTransitionPaymentStatus(payment.paymentStatus, target)
  ) {
    logger.info(
      { transactionId, registrationId, current: payment.paymentStatus, target },
      'Callback ignored for settled payment'
    );
    return { ok: true, registrationId, status: payment.paymentStatus, alreadyProcessed: true };
  }

  await settlePayment(payment, target);
  logger.info({ transactionId, registrationId, status: target }, 'Payment settled by provider callback');

  return { ok: true, registrationId, status: target, alreadyProcessed: false };
}

export async function handleFailCallback(transactionId: string): Promise<CallbackResult> {
  return handleTerminalCallback(transactionId, 'failed');
}

export async function handleCancelCallback(transactionId: string): Promise<CallbackResult> {
  return handleTerminalCallback(transactionId, 'cancelled');
}

// ============================================================================
// Queries (Admin)
// ============================================================================

export async function listPayments(query: ListPaymentsQuery): Promise<PaginatedResult<PaymentDetail>> {
  const { page, limit, paymentStatus, workshopId, search } = query;
  const filter = { paymentStatus, workshopId, search };

  const [data, total] = await Promise.all([
    store.payments.findManyDetailed(filter, toPageWindow({ page, limit })),
    store.payments.count(filter),
  ]);

  return paginate(data, total, { page, limit });
}

export async function exportPayments(query: ExportPaymentsQuery): Promise<Buffer> {
  const payments = await store.payments.findManyDetailed(query);
  return renderSpreadsheet(payments, PAYMENT_EXPORT_COLUMNS, 'Payments');
}
