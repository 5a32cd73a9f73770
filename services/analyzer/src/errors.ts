import { ZodError } from 'zod';
import { PivotProcessingError, PivotValidationError } from '@station-analyzer/pivot';

export class RequestValidationError extends Error {
  readonly statusCode: number;

  constructor(message: string, statusCode = 400) {
    super(message);
    this.name = 'RequestValidationError';
    this.statusCode = statusCode;
  }
}

export interface ErrorResponse {
  statusCode: number;
  message: string;
  details?: unknown;
}

const hasStatusCode = (error: unknown, statusCode: number): boolean =>
  typeof error === 'object' && error !== null && 'statusCode' in error && error.statusCode === statusCode;

export const mapErrorToResponse = (error: unknown): ErrorResponse => {
  if (error instanceof PivotValidationError) {
    return {
      statusCode: 422,
      message: error.message,
      details: { code: error.code, ...error.details }
    };
  }

  if (error instanceof PivotProcessingError) {
    return {
      statusCode: 500,
      message: error.message
    };
  }

  if (error instanceof RequestValidationError) {
    return {
      statusCode: error.statusCode,
      message: error.message
    };
  }

  if (error instanceof ZodError) {
    return {
      statusCode: 400,
      message: 'Request validation failed',
      details: error.flatten()
    };
  }

  if (hasStatusCode(error, 413)) {
    return {
      statusCode: 413,
      message: 'Uploaded file is too large'
    };
  }

  return {
    statusCode: 500,
    message: 'Unexpected error'
  };
};
