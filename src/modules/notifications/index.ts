export { sendConfirmation, sendPaymentConfirmation } from './notifications.service.js';
export {
  registrationConfirmationEmail,
  paymentConfirmationEmail,
  type EmailContent,
} from './notifications.templates.js';
export { sendEmail, type SendEmailInput, type SendEmailResult } from './sendgrid.service.js';
