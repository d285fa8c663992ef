/**
 * Property-based tests for API response consistency.
 *
 * Any error response is JSON-serializable and carries a code, a message
 * and a request correlation ID.
 *
 * @module utils/responses.property.test
 */

import { describe, it, expect } from 'vitest';
import fc from 'fast-check';
import { formatErrorResponse, getHttpStatusForError } from './responses.js';

const codeArb = fc.constantFrom('ALERT_NOT_FOUND', 'ALERT_INVALID_INPUT', 'ALERT_INTERNAL_ERROR', 'CONFIG_INVALID');

describe('API response consistency', () => {
  it('should round-trip every error response through JSON', () => {
    fc.assert(
      fc.property(codeArb, fc.string(), (code, message) => {
        const response = formatErrorResponse(code, message);
        const parsed: unknown = JSON.parse(JSON.stringify(response));

        expect(parsed).toEqual(response);
        expect(response.success).toBe(false);
        expect(response.requestId.length).toBeGreaterThan(0);
      }),
    );
  });

  it('should map every code to a 4xx or 5xx status', () => {
    fc.assert(
      fc.property(fc.oneof(codeArb, fc.string()), (code) => {
        const status = getHttpStatusForError(code);
        expect(status).toBeGreaterThanOrEqual(400);
        expect(status).toBeLessThan(600);
      }),
    );
  });
});
