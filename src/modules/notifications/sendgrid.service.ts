// =============================================================================
// SENDGRID EMAIL SERVICE
// Thin wrapper around the SendGrid API; failures are reported, never thrown
// =============================================================================

import sgMail from '@sendgrid/mail'
import { z } from 'zod'
import { config } from '@config/app.config.js'
import { logger } from '@shared/utils/logger.js'

if (config.sendgrid.apiKey) {
  sgMail.setApiKey(config.sendgrid.apiKey)
}
sgMail.setTimeout(config.sendgrid.timeoutMs)

// =============================================================================
// TYPES
// =============================================================================

export interface SendEmailInput {
  to: string
  toName?: string
  subject: string
  html: string
  plainText: string
  categories?: string[]
}

export interface SendEmailResult {
  success: boolean
  messageId?: string
  error?: string
}

// SendGrid rejects with a ResponseError carrying the API's error list
const ResponseErrorSchema = z.object({
  code: z.number().optional(),
  response: z
    .object({
      body: z.object({ errors: z.array(z.object({ message: z.string() })).optional() }).optional(),
    })
    .optional(),
})

function describeError(error: unknown): { message: string; statusCode?: number } {
  const fallback = error instanceof Error ? error.message : String(error)
  const parsed = ResponseErrorSchema.safeParse(error)
  if (!parsed.success) {
    return { message: fallback || 'Unknown error' }
  }
  return {
    message: parsed.data.response?.body?.errors?.[0]?.message || fallback || 'Unknown error',
    statusCode: parsed.data.code,
  }
}

// Bounds the whole send, not just the HTTP socket
function withTimeout<T>(promise: Promise<T>, timeoutMs: number): Promise<T> {
  let timer: NodeJS.Timeout | undefined
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new Error(`SendGrid request timed out after ${timeoutMs}ms`)),
      timeoutMs
    )
  })
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer))
}

// =============================================================================
// SEND SINGLE EMAIL
// =============================================================================

export async function sendEmail(input: SendEmailInput): Promise<SendEmailResult> {
  if (!config.sendgrid.apiKey) {
    logger.warn({ to: input.to }, 'SendGrid API key not configured, skipping email send')
    return { success: false, error: 'SendGrid not configured' }
  }

  try {
    const [response] = await withTimeout(
      sgMail.send({
        to: input.toName ? { email: input.to, name: input.toName } : input.to,
        from: { email: config.sendgrid.fromEmail, name: config.sendgrid.fromName },
        subject: input.subject,
        text: input.plainText,
        html: input.html,
        ...(input.categories && { categories: input.categories }),
      }),
      config.sendgrid.timeoutMs
    )

    const header = response.headers['x-message-id']
    const messageId = typeof header === 'string' ? header : undefined

    logger.info({ to: input.to, messageId }, 'Email sent successfully via SendGrid')

    return { success: true, messageId }
  } catch (error: unknown) {
    const { message, statusCode } = describeError(error)

    logger.error(
      { to: input.to, error: message, statusCode },
      'Failed to send email via SendGrid'
    )

    return { success: false, error: message }
  }
}
