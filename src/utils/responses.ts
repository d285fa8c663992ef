/**
 * API response formatters for consistent JSON response structure.
 *
 * All API responses follow a predictable format:
 * - Success responses include `success: true` and a `data` payload
 * - Error responses include `success: false`, an error object with code/message/fields,
 *   and a request correlation ID for debugging
 *
 * @module utils/responses
 */

import { v4 as uuidv4 } from 'uuid';
import type { DataResponse, ErrorResponse } from '../types/index.js';
import { ALERT_ERROR_CODES } from '../types/index.js';

// ─── Error Code to HTTP Status Mapping ───────────────────────────────────────

/**
 * Maps alert engine error codes to their HTTP status codes.
 */
export const ERROR_STATUS_MAP: ReadonlyMap<string, number> = new Map([
  [ALERT_ERROR_CODES.NOT_FOUND, 404],
  [ALERT_ERROR_CODES.INVALID_INPUT, 400],
  [ALERT_ERROR_CODES.INTERNAL_ERROR, 500],
  [ALERT_ERROR_CODES.CONFIG_INVALID, 500],
]);

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

export function formatDataResponse<T>(data: T): DataResponse<T> {
  return {
    success: true,
    data,
  };
}

// ─── Error Formatters ────────────────────────────────────────────────────────

/**
 * Format an error response with error code, message, optional field errors,
 * and a correlation ID for debugging.
 *
 * @param code - Machine-readable error code (e.g. ALERT_NOT_FOUND)
 * @param requestId - Correlation ID; auto-generated if not provided
 * @param fields - Optional field-specific validation errors
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

/** HTTP status for an error code; 500 for unknown codes. */
export function getHttpStatusForError(code: string): number {
  return ERROR_STATUS_MAP.get(code) ?? DEFAULT_ERROR_STATUS;
}

/**
 * Format a validation error response with field-specific details.
 */
export function formatValidationError(
  message: string,
  fields: Record<string, string[]>,
  requestId?: string,
): ErrorResponse {
  return formatErrorResponse(ALERT_ERROR_CODES.INVALID_INPUT, message, requestId, fields);
}

/**
 * Format an internal server error response.
 * Uses a generic message to avoid leaking implementation details.
 */
export function formatInternalError(requestId?: string): ErrorResponse {
  return formatErrorResponse(
    ALERT_ERROR_CODES.INTERNAL_ERROR,
    'An unexpected error occurred. Please try again later.',
    requestId,
  );
}
