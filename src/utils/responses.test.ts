/**
 * Unit tests for API response formatters.
 *
 * Validates the success envelope, error codes with field-specific details,
 * HTTP status mapping, and request correlation IDs.
 */

import { describe, it, expect } from 'vitest';
import {
  generateRequestId,
  formatDataResponse,
  formatErrorResponse,
  getHttpStatusForError,
  formatValidationError,
  formatInternalError,
} from './responses.js';

// ─── Test Helpers ────────────────────────────────────────────────────────────

const UUID_REGEX = /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/i;

// ─── generateRequestId ──────────────────────────────────────────────────────

describe('generateRequestId', () => {
  it('should return a valid UUID v4 string', () => {
    expect(generateRequestId()).toMatch(UUID_REGEX);
  });

  it('should return unique IDs on successive calls', () => {
    expect(generateRequestId()).not.toBe(generateRequestId());
  });
});

// ─── formatDataResponse ─────────────────────────────────────────────────────

describe('formatDataResponse', () => {
  it('should wrap the payload', () => {
    expect(formatDataResponse({ resolved: true })).toEqual({ success: true, data: { resolved: true } });
  });
});

// ─── formatErrorResponse ────────────────────────────────────────────────────

describe('formatErrorResponse', () => {
  it('should carry code, message and the given request id', () => {
    expect(formatErrorResponse('ALERT_NOT_FOUND', 'Alert not found', 'req-1')).toEqual({
      success: false,
      error: { code: 'ALERT_NOT_FOUND', message: 'Alert not found' },
      requestId: 'req-1',
    });
  });

  it('should generate a request id when none is given', () => {
    expect(formatErrorResponse('ALERT_NOT_FOUND', 'Alert not found').requestId).toMatch(UUID_REGEX);
  });

  it('should omit empty field maps', () => {
    const result = formatErrorResponse('ALERT_INVALID_INPUT', 'Invalid', 'req-1', {});
    expect(result.error).not.toHaveProperty('fields');
  });
});

// ─── formatValidationError ──────────────────────────────────────────────────

describe('formatValidationError', () => {
  it('should use the invalid-input code and keep the fields', () => {
    const result = formatValidationError('Invalid query', { limit: ['must be between 1 and 500'] }, 'req-2');

    expect(result).toEqual({
      success: false,
      error: {
        code: 'ALERT_INVALID_INPUT',
        message: 'Invalid query',
        fields: { limit: ['must be between 1 and 500'] },
      },
      requestId: 'req-2',
    });
  });
});

// ─── formatInternalError ────────────────────────────────────────────────────

describe('formatInternalError', () => {
  it('should not leak details', () => {
    expect(formatInternalError('req-3')).toEqual({
      success: false,
      error: {
        code: 'ALERT_INTERNAL_ERROR',
        message: 'An unexpected error occurred. Please try again later.',
      },
      requestId: 'req-3',
    });
  });
});

// ─── getHttpStatusForError ──────────────────────────────────────────────────

describe('getHttpStatusForError', () => {
  it.each([
    ['ALERT_NOT_FOUND', 404],
    ['ALERT_INVALID_INPUT', 400],
    ['ALERT_INTERNAL_ERROR', 500],
    ['CONFIG_INVALID', 500],
    ['SOMETHING_ELSE', 500],
  ])('should map %s to %i', (code, status) => {
    expect(getHttpStatusForError(code)).toBe(status);
  });
});
