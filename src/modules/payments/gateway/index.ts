import { config } from '@config/app.config.js';
import { SslCommerzGateway } from './sslcommerz.gateway.js';
import type { PaymentGateway } from './gateway.types.js';

let instance: PaymentGateway | null = null;

/**
 * Get the configured payment gateway singleton.
 */
export function getPaymentGateway(): PaymentGateway {
  if (!instance) {
    instance = new SslCommerzGateway(config.gateway);
  }
  return instance;
}

export { SslCommerzGateway };
export type {
  PaymentGateway,
  GatewayConfig,
  GatewayCustomer,
  GatewayCallbackUrls,
  GatewayPayload,
  InitiatePaymentRequest,
  InitiatePaymentResult,
  ValidatePaymentResult,
} from './gateway.types.js';
