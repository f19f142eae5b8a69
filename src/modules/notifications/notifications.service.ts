import type { Payment } from '@/database/schema.js';
import type { RegistrationDetail } from '@/database/store.js';
import { logger } from '@shared/utils/logger.js';
import { sendEmail } from './sendgrid.service.js';
import {
  registrationConfirmationEmail,
  paymentConfirmationEmail,
  type EmailContent,
} from './notifications.templates.js';

async function deliver(
  registration: RegistrationDetail,
  content: EmailContent,
  category: string
): Promise<boolean> {
  try {
    const result = await sendEmail({
      to: registration.email,
      toName: registration.studentName,
      subject: content.subject,
      html: content.html,
      plainText: content.plainText,
      categories: [category],
    });
    return result.success;
  } catch (error) {
    // Delivery problems never propagate into the registration or payment flow
    logger.error(
      { err: error, registrationNumber: registration.registrationNumber, category },
      'Notification delivery failed'
    );
    return false;
  }
}

/**
 * Sent once a registration is stored. Returns whether the provider accepted it.
 */
export async function sendConfirmation(registration: RegistrationDetail): Promise<boolean> {
  return deliver(registration, registrationConfirmationEmail(registration), 'registration-confirmation');
}

/**
 * Sent once, when a payment first reaches Completed.
 */
export async function sendPaymentConfirmation(
  registration: RegistrationDetail,
  payment: Payment
): Promise<boolean> {
  return deliver(registration, paymentConfirmationEmail(registration, payment), 'payment-confirmation');
}
