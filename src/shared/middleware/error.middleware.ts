import type { FastifyError, FastifyReply, FastifyRequest } from 'fastify';
import { ZodError } from 'zod';
import { AppError } from '@shared/errors/app-error.js';
import {
  formatZodError,
  formatSchemaValidationErrors,
} from '@shared/errors/zod-error-formatter.js';
import { ErrorCodes } from '@shared/errors/error-codes.js';
import { logger } from '@shared/utils/logger.js';

function sendAppError(reply: FastifyReply, error: AppError, requestId: string) {
  return reply.status(error.statusCode).send({
    error: error.message,
    code: error.code,
    details: error.details,
    requestId,
  });
}

export function errorHandler(
  error: FastifyError | Error,
  request: FastifyRequest,
  reply: FastifyReply
) {
  const requestId = request.id;

  // Zod validation error
  if (error instanceof ZodError) {
    return sendAppError(reply, formatZodError(error), requestId);
  }

  // Route schema validation (params, query, body)
  if ('validation' in error && Array.isArray(error.validation)) {
    return sendAppError(
      reply,
      formatSchemaValidationErrors(error.validation, error.validationContext),
      requestId
    );
  }

  // Known operational error
  if (error instanceof AppError) {
    if (error.statusCode >= 500) {
      logger.error({ err: error, requestId }, error.message);
    } else {
      logger.warn({ err: error, requestId }, error.message);
    }
    return sendAppError(reply, error, requestId);
  }

  // Rate limit error
  if ('statusCode' in error && error.statusCode === 429) {
    return reply.status(429).send({
      error: 'Too many requests',
      code: ErrorCodes.RATE_LIMITED,
      requestId,
    });
  }

  // HTTP errors raised through @fastify/sensible or by fastify itself
  if ('statusCode' in error && error.statusCode && error.statusCode >= 400 && error.statusCode < 500) {
    logger.warn({ err: error, requestId }, error.message);
    return reply.status(error.statusCode).send({
      error: error.message,
      code: error.statusCode === 404 ? ErrorCodes.NOT_FOUND : ErrorCodes.BAD_REQUEST,
      requestId,
    });
  }

  // Unknown error
  logger.error({ err: error, requestId }, 'Unhandled error');
  return reply.status(500).send({
    error: 'Internal server error',
    code: ErrorCodes.INTERNAL_ERROR,
    requestId,
  });
}
