/**
 * Error body shared by every endpoint.
 */
import { httpStatusFor, PipelineError, ValidationError } from '@/core/errors';

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: Array<{ path: string; message: string }>;
  code?: string;
}

export function createErrorResponse(
  message: string,
  errors?: Array<{ path: string; message: string }>,
  code?: string,
): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}

/** Status and body for an error that escaped the pipeline. Internal errors are not echoed. */
export function errorToResponse(err: unknown): { status: number; body: ErrorResponse } {
  const status = httpStatusFor(err);
  if (err instanceof PipelineError) {
    const issues = err instanceof ValidationError ? [...err.issues] : undefined;
    return { status, body: createErrorResponse(err.message, issues, err.code) };
  }
  return { status, body: createErrorResponse('Internal Server Error', undefined, 'internal_error') };
}
