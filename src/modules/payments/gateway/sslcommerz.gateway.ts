import { z } from 'zod';
import { amountsEqual } from '@shared/utils/money.js';
import type {
  GatewayConfig,
  GatewayPayload,
  InitiatePaymentRequest,
  InitiatePaymentResult,
  PaymentGateway,
  ValidatePaymentResult,
} from './gateway.types.js';

const PayloadSchema = z.record(z.string(), z.unknown());

const InitiateResponseSchema = z.object({
  status: z.string(),
  GatewayPageURL: z.string().optional(),
  failedreason: z.string().nullish(),
});

const ValidationResponseSchema = z.object({
  status: z.string(),
  tran_id: z.string().optional(),
  amount: z.union([z.string(), z.number()]).optional(),
  currency_type: z.string().optional(),
  currency: z.string().optional(),
  card_type: z.string().optional(),
});

const VALID_STATUSES = new Set(['VALID', 'VALIDATED']);

type JsonResult = { ok: true; body: GatewayPayload } | { ok: false; error: string };

export class SslCommerzGateway implements PaymentGateway {
  readonly name = 'sslcommerz';

  constructor(
    private readonly settings: GatewayConfig,
    private readonly fetchImpl?: typeof fetch
  ) {}

  async initiate(request: InitiatePaymentRequest): Promise<InitiatePaymentResult> {
    const { customer } = request;
    const form = new URLSearchParams({
      store_id: this.settings.storeId,
      store_passwd: this.settings.storePassword,
      total_amount: request.amount,
      currency: request.currency,
      tran_id: request.transactionId,
      success_url: request.callbackUrls.success,
      fail_url: request.callbackUrls.fail,
      cancel_url: request.callbackUrls.cancel,
      cus_name: customer.name,
      cus_email: customer.email,
      cus_add1: customer.address || 'N/A',
      cus_city: customer.city ?? 'Dhaka',
      cus_country: customer.country ?? 'Bangladesh',
      cus_phone: customer.phone,
      product_name: request.product.name,
      product_category: request.product.category,
      product_profile: 'general',
      shipping_method: 'NO',
      num_of_item: '1',
      value_a: request.passthrough.registrationNumber,
      value_b: request.passthrough.workshopId,
    });

    const result = await this.requestJson(this.settings.apiUrl, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: form.toString(),
    });
    if (!result.ok) {
      return { success: false, error: result.error };
    }

    const parsed = InitiateResponseSchema.safeParse(result.body);
    if (!parsed.success) {
      return { success: false, error: 'Unexpected gateway response', rawResponse: result.body };
    }

    const { status, GatewayPageURL, failedreason } = parsed.data;
    if (status === 'SUCCESS' && GatewayPageURL) {
      return { success: true, gatewayUrl: GatewayPageURL, rawResponse: result.body };
    }

    return {
      success: false,
      error: failedreason || 'Payment initiation failed',
      rawResponse: result.body,
    };
  }

  async validate(validationId: string, transactionId: string): Promise<ValidatePaymentResult> {
    if (!validationId) {
      return { success: false, error: 'Missing validation id' };
    }

    const query = new URLSearchParams({
      val_id: validationId,
      store_id: this.settings.storeId,
      store_passwd: this.settings.storePassword,
      format: 'json',
    });

    const result = await this.requestJson(`${this.settings.validationUrl}?${query.toString()}`, {
      method: 'GET',
    });
    if (!result.ok) {
      return { success: false, error: result.error };
    }

    const parsed = ValidationResponseSchema.safeParse(result.body);
    if (!parsed.success) {
      return { success: false, error: 'Unexpected validation response', rawResponse: result.body };
    }

    const data = parsed.data;
    if (!VALID_STATUSES.has(data.status)) {
      return {
        success: false,
        error: `Validation status ${data.status}`,
        rawResponse: result.body,
      };
    }

    if (data.tran_id !== transactionId) {
      return {
        success: false,
        error: 'Validated transaction does not match callback',
        rawResponse: result.body,
      };
    }

    return {
      success: true,
      transactionId,
      amount: data.amount === undefined ? '' : String(data.amount),
      currency: data.currency_type ?? data.currency ?? '',
      cardType: data.card_type,
      rawResponse: result.body,
    };
  }

  amountsMatch(received: string | undefined, expected: string): boolean {
    return received !== undefined && amountsEqual(received, expected);
  }

  private async requestJson(url: string, init: RequestInit): Promise<JsonResult> {
    const doFetch = this.fetchImpl ?? fetch;

    let response: Response;
    try {
      response = await doFetch(url, {
        ...init,
        signal: AbortSignal.timeout(this.settings.timeoutMs),
      });
    } catch (error) {
      const timedOut =
        error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError');
      return {
        ok: false,
        error: timedOut
          ? `Gateway timed out after ${this.settings.timeoutMs}ms`
          : `Gateway unreachable: ${error instanceof Error ? error.message : String(error)}`,
      };
    }

    if (!response.ok) {
      return { ok: false, error: `Gateway responded with HTTP ${response.status}` };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      return { ok: false, error: 'Gateway returned a non-JSON response' };
    }

    const payload = PayloadSchema.safeParse(body);
    if (!payload.success) {
      return { ok: false, error: 'Gateway returned an unexpected payload' };
    }
    return { ok: true, body: payload.data };
  }
}
