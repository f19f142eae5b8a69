import type {
  Payment,
  PaymentStatus,
  Registration,
  RegistrationStatus,
} from '@/database/schema.js';

// ============================================================================
// Status Mapping
// ============================================================================

const REGISTRATION_STATUS_FOR: Record<PaymentStatus, RegistrationStatus> = {
  pending: 'pending',
  completed: 'completed',
  failed: 'failed',
  cancelled: 'cancelled',
};

/**
 * The one place a payment status is mirrored onto its registration.
 */
export function toRegistrationStatus(status: PaymentStatus): RegistrationStatus {
  return REGISTRATION_STATUS_FOR[status];
}

/**
 * Registrations for free workshops are always `free`, whatever was requested.
 */
export function resolveRegistrationStatus(
  requested: RegistrationStatus,
  workshopIsFree: boolean
): RegistrationStatus {
  return workshopIsFree ? 'free' : requested;
}

// ============================================================================
// Transitions
// ============================================================================

const paymentTransitions: Record<PaymentStatus, PaymentStatus[]> = {
  pending: ['completed', 'failed', 'cancelled'],
  completed: [],
  failed: [],
  cancelled: [],
};

export function isTerminalPaymentStatus(status: PaymentStatus): boolean {
  return paymentTransitions[status].length === 0;
}

/**
 * Strict lifecycle transitions. The default lifecycle lets provider callbacks
 * overwrite any status except a completed payment receiving a success.
 */
export function canTransitionPaymentStatus(current: PaymentStatus, next: PaymentStatus): boolean {
  return paymentTransitions[current].includes(next);
}

// ============================================================================
// Derived State
// ============================================================================

export type PaymentState =
  | 'Free'
  | 'NoPayment'
  | 'AwaitingCallback'
  | 'Completed'
  | 'Failed'
  | 'Cancelled';

const STATE_FOR_PAYMENT: Record<PaymentStatus, PaymentState> = {
  pending: 'AwaitingCallback',
  completed: 'Completed',
  failed: 'Failed',
  cancelled: 'Cancelled',
};

export function getPaymentState(
  registration: Pick<Registration, 'paymentStatus'>,
  payment: Pick<Payment, 'paymentStatus'> | null
): PaymentState {
  if (registration.paymentStatus === 'free') return 'Free';
  if (!payment) {
    // Administrative override can complete a registration that never paid online
    return registration.paymentStatus === 'completed' ? 'Completed' : 'NoPayment';
  }
  return STATE_FOR_PAYMENT[payment.paymentStatus];
}

export function isReceiptAvailable(status: RegistrationStatus): boolean {
  return status === 'completed' || status === 'free';
}
