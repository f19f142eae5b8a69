import { ZodError } from 'zod';
import type { FastifyError } from 'fastify';
import { AppError } from './app-error.js';
import { ErrorCodes } from './error-codes.js';

type SchemaValidationIssue = NonNullable<FastifyError['validation']>[number];

export interface FieldIssue {
  field: string;
  message: string;
}

function validationFailed(issues: FieldIssue[]): AppError {
  return new AppError('Validation failed', 400, true, ErrorCodes.VALIDATION_ERROR, { issues });
}

export function formatZodError(error: ZodError): AppError {
  return validationFailed(
    error.issues.map((issue) => ({
      field: issue.path.join('.'),
      message: issue.message,
    }))
  );
}

/**
 * Same shape as formatZodError, for errors raised by the route schema
 * compiler before a handler runs.
 */
export function formatSchemaValidationErrors(
  errors: SchemaValidationIssue[],
  context?: string
): AppError {
  return validationFailed(
    errors.map((issue) => {
      const path = issue.instancePath.replace(/^\//, '').split('/').filter(Boolean).join('.');
      return {
        field: path || context || '',
        message: issue.message ?? 'Invalid value',
      };
    })
  );
}
