import { z } from 'zod';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((value) => value === 'true' || value === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().default(3000),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).optional(),
  DATABASE_URL: z.string().url(),
  CORS_ORIGIN: z.string().default('*'),
  // Absolute base the gateway calls back into
  PUBLIC_API_URL: z.string().url(),
  // Where callback handlers send the browser afterwards
  FRONTEND_URL: z.string().url(),
  CURRENCY: z.string().length(3).default('BDT'),
  REGISTRATION_TIMEZONE: z.string().default('Asia/Dhaka'),
  LIFECYCLE_STRICT_MODE: booleanFlag.default('false'),
  // SSLCommerz
  SSLCOMMERZ_STORE_ID: z.string().min(1),
  SSLCOMMERZ_STORE_PASSWORD: z.string().min(1),
  SSLCOMMERZ_IS_SANDBOX: booleanFlag.default('true'),
  GATEWAY_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  // Firebase
  FIREBASE_PROJECT_ID: z.string(),
  // Firebase service account JSON (for cloud deployments)
  FIREBASE_SERVICE_ACCOUNT: z.string().optional(),
  // SendGrid
  SENDGRID_API_KEY: z.string().optional(),
  SENDGRID_FROM_EMAIL: z.string().email().default('noreply@example.com'),
  SENDGRID_FROM_NAME: z.string().default('Workshop Registrations'),
  SENDGRID_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
});

const env = envSchema.parse(process.env);

const gatewayHost = env.SSLCOMMERZ_IS_SANDBOX
  ? 'https://sandbox.sslcommerz.com'
  : 'https://securepay.sslcommerz.com';

const publicApiUrl = env.PUBLIC_API_URL.replace(/\/+$/, '');

export const config = {
  ...env,
  isDevelopment: env.NODE_ENV === 'development',
  isProduction: env.NODE_ENV === 'production',
  isTest: env.NODE_ENV === 'test',
  database: {
    poolSize: env.NODE_ENV === 'production' ? 20 : 5,
  },
  security: {
    rateLimit: {
      max: env.NODE_ENV === 'production' ? 100 : 1000,
      timeWindow: '1 minute',
    },
  },
  registration: {
    timeZone: env.REGISTRATION_TIMEZONE,
    strictLifecycle: env.LIFECYCLE_STRICT_MODE,
  },
  payments: {
    currency: env.CURRENCY,
    callbackUrls: {
      success: `${publicApiUrl}/api/payments/callback/success`,
      fail: `${publicApiUrl}/api/payments/callback/fail`,
      cancel: `${publicApiUrl}/api/payments/callback/cancel`,
    },
    resultUrl: `${env.FRONTEND_URL.replace(/\/+$/, '')}/payment/result`,
  },
  gateway: {
    storeId: env.SSLCOMMERZ_STORE_ID,
    storePassword: env.SSLCOMMERZ_STORE_PASSWORD,
    apiUrl: `${gatewayHost}/gwprocess/v4/api.php`,
    validationUrl: `${gatewayHost}/validator/api/validationserverAPI.php`,
    isSandbox: env.SSLCOMMERZ_IS_SANDBOX,
    timeoutMs: env.GATEWAY_TIMEOUT_MS,
  },
  firebase: {
    projectId: env.FIREBASE_PROJECT_ID,
    serviceAccount: env.FIREBASE_SERVICE_ACCOUNT,
  },
  sendgrid: {
    apiKey: env.SENDGRID_API_KEY,
    fromEmail: env.SENDGRID_FROM_EMAIL,
    fromName: env.SENDGRID_FROM_NAME,
    timeoutMs: env.SENDGRID_TIMEOUT_MS,
  },
};
