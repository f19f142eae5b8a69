/**
 * Hosted payment gateway contract. Implementations never throw: transport
 * problems, timeouts and provider refusals all come back as `success: false`.
 */

export interface GatewayConfig {
  storeId: string;
  storePassword: string;
  apiUrl: string;
  validationUrl: string;
  isSandbox: boolean;
  timeoutMs: number;
}

export interface GatewayCustomer {
  name: string;
  email: string;
  phone: string;
  address: string;
  city?: string;
  country?: string;
}

export interface GatewayCallbackUrls {
  success: string;
  fail: string;
  cancel: string;
}

export interface InitiatePaymentRequest {
  /** Decimal string, e.g. "200.00". */
  amount: string;
  currency: string;
  transactionId: string;
  customer: GatewayCustomer;
  product: { name: string; category: string };
  callbackUrls: GatewayCallbackUrls;
  /** Echoed back by the provider on every callback. */
  passthrough: { registrationNumber: string; workshopId: string };
}

export type GatewayPayload = Record<string, unknown>;

export type InitiatePaymentResult =
  | { success: true; gatewayUrl: string; rawResponse: GatewayPayload }
  | { success: false; error: string; rawResponse?: GatewayPayload };

export type ValidatePaymentResult =
  | {
      success: true;
      transactionId: string;
      amount: string;
      currency: string;
      cardType?: string;
      rawResponse: GatewayPayload;
    }
  | { success: false; error: string; rawResponse?: GatewayPayload };

export interface PaymentGateway {
  readonly name: string;
  initiate(request: InitiatePaymentRequest): Promise<InitiatePaymentResult>;
  validate(validationId: string, transactionId: string): Promise<ValidatePaymentResult>;
  amountsMatch(received: string | undefined, expected: string): boolean;
}
