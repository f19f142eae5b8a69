// Services
export {
  initiatePayment,
  handleSuccessCallback,
  handleFailCallback,
  handleCancelCallback,
  listPayments,
  exportPayments,
  generateTransactionId,
  toAppError,
  type PaymentError,
  type PaymentErrorKind,
  type InitiatePaymentResult,
  type CallbackResult,
  type SuccessCallbackInput,
} from './payments.service.js';

export {
  toRegistrationStatus,
  resolveRegistrationStatus,
  isTerminalPaymentStatus,
  canTransitionPaymentStatus,
  getPaymentState,
  isReceiptAvailable,
  type PaymentState,
} from './payment-status.js';

export { getPaymentGateway, SslCommerzGateway, type PaymentGateway } from './gateway/index.js';

// Schemas & Types
export {
  ListPaymentsQuerySchema,
  ExportPaymentsQuerySchema,
  CallbackBodySchema,
  type ListPaymentsQuery,
  type ExportPaymentsQuery,
  type CallbackBody,
} from './payments.schema.js';

// Routes
export { paymentsRoutes } from './payments.routes.js';
export { paymentCallbackRoutes, paymentResultUrl } from './payments.callback.routes.js';
export { paymentsPublicRoutes } from './payments.public.routes.js';
