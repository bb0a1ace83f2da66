/**
 * Standardized response envelopes for the HTTP surface.
 */
import type { ZodError } from 'zod';

export interface FieldError {
  path: string;
  message: string;
}

export interface ErrorResponse {
  success: false;
  message: string;
  errors?: FieldError[];
  code?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(message: string, errors?: FieldError[], code?: string): ErrorResponse {
  return {
    success: false,
    message,
    ...(errors && errors.length > 0 && { errors }),
    ...(code && { code }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}

export function zodFieldErrors(error: ZodError): FieldError[] {
  return error.errors.map((e) => ({ path: e.path.join('.') || 'body', message: e.message }));
}
