/**
 * API response formatters for consistent JSON response structure.
 *
 * All API responses follow a predictable format:
 * - Success responses include `success: true` and the relevant data
 * - Error responses include `success: false`, an error object with code/message/fields,
 *   and a request correlation ID for debugging
 *
 * @module utils/responses
 */

import { v4 as uuidv4 } from 'uuid';
import type { ErrorResponse, GenericResponse } from '../types/index.js';
import { LEDGER_ERROR_CODES } from '../types/index.js';

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

const ERROR_STATUS_MAP: Record<string, number> = {
  [LEDGER_ERROR_CODES.UNAUTHORIZED]: 403,
  [LEDGER_ERROR_CODES.NOT_OWNER]: 403,
  [LEDGER_ERROR_CODES.ALREADY_COMPLETED]: 409,
  [LEDGER_ERROR_CODES.VALIDATION_ERROR]: 400,
  [LEDGER_ERROR_CODES.CALLER_REQUIRED]: 401,
  [LEDGER_ERROR_CODES.RATE_LIMITED]: 429,
  [LEDGER_ERROR_CODES.INTERNAL_ERROR]: 500,
};

/** Default HTTP status for unknown error codes. */
const DEFAULT_ERROR_STATUS = 500;

// ─── Correlation ID ──────────────────────────────────────────────────────────

/**
 * Generate a unique request correlation ID (UUID v4).
 * Used to trace requests across logs and error responses.
 */
export function generateRequestId(): string {
  return uuidv4();
}

// ─── Success Formatters ──────────────────────────────────────────────────────

export function formatGenericResponse(message: string): GenericResponse {
  return {
    success: true,
    message,
  };
}

/** Wrap a payload as `{ success: true, ...data }`. */
export function formatDataResponse<T extends object>(data: T): { success: true } & T {
  return { success: true, ...data };
}

// ─── Error Formatters ────────────────────────────────────────────────────────

/**
 * Format an error response with error code, message, optional field errors,
 * and a correlation ID for debugging.
 *
 * @param requestId - Correlation ID; auto-generated if not provided
 */
export function formatErrorResponse(
  code: string,
  message: string,
  requestId?: string,
  fields?: Record<string, string[]>,
): ErrorResponse {
  const response: ErrorResponse = {
    success: false,
    error: {
      code,
      message,
    },
    requestId: requestId ?? generateRequestId(),
  };

  if (fields && Object.keys(fields).length > 0) {
    response.error.fields = fields;
  }

  return response;
}

/**
 * Get the HTTP status code for a given error code, or 500 for unknown codes.
 */
export function getHttpStatusForError(code: string): number {
  return ERROR_STATUS_MAP[code] ?? DEFAULT_ERROR_STATUS;
}

/**
 * Format a validation error response with field-specific details.
 */
export function formatValidationError(
  fields: Record<string, string[]>,
  requestId?: string,
): ErrorResponse {
  return formatErrorResponse(
    LEDGER_ERROR_CODES.VALIDATION_ERROR,
    'Request body is invalid',
    requestId,
    fields,
  );
}

/**
 * Format an internal server error response.
 * Uses a generic message to avoid leaking implementation details.
 */
export function formatInternalError(requestId?: string): ErrorResponse {
  return formatErrorResponse(
    LEDGER_ERROR_CODES.INTERNAL_ERROR,
    'An unexpected error occurred. Please try again later.',
    requestId,
  );
}
