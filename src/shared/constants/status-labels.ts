import type { RegistrationStatus, PaymentMethod } from '@/database/schema.js';

export const REGISTRATION_STATUS_LABELS: Record<RegistrationStatus, string> = {
  pending: 'Pending',
  completed: 'Completed',
  failed: 'Failed',
  cancelled: 'Cancelled',
  free: 'Free Workshop',
};

export const PAYMENT_METHOD_LABELS: Record<PaymentMethod, string> = {
  gateway: 'SSLCommerz',
  free: 'Free',
};
