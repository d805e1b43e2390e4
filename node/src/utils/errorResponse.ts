/**
 * Response envelopes shared by every endpoint: `{ success: true, data }` or
 * `{ success: false, message, code, errors?, correlationId? }`.
 */
import type { ErrorCode, ValidationIssue } from './errors';

export type ResponseCode = ErrorCode | 'not_found' | 'request_timeout' | 'internal_error';

export interface ErrorResponse {
  success: false;
  message: string;
  code: ResponseCode;
  errors?: ValidationIssue[];
  correlationId?: string;
}

export interface SuccessResponse<T> {
  success: true;
  data: T;
}

export function createErrorResponse(
  message: string,
  code: ResponseCode,
  details: { errors?: ValidationIssue[]; correlationId?: string } = {},
): ErrorResponse {
  const { errors, correlationId } = details;
  return {
    success: false,
    message,
    code,
    ...(errors && errors.length > 0 && { errors }),
    ...(correlationId !== undefined && { correlationId }),
  };
}

export function createSuccessResponse<T>(data: T): SuccessResponse<T> {
  return {
    success: true,
    data,
  };
}
