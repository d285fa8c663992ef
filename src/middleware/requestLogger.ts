/**
 * Request Logger Middleware
 *
 * Assigns every HTTP request a request id (taken from `x-request-id` when
 * the caller sends a usable one), echoes it back in the response header and
 * logs the completed request under that id.
 *
 * @module middleware/requestLogger
 */

import type { RequestHandler, Response } from 'express';

import type { Logger } from '../logging/logger.js';
import { generateRequestId } from '../utils/responses.js';

export const REQUEST_ID_HEADER = 'x-request-id';

const MAX_REQUEST_ID_LENGTH = 128;

/** The id assigned by `requestLogger`, or a fresh one outside it. */
export function requestIdOf(res: Response): string {
  const id: unknown = res.locals['requestId'];
  return typeof id === 'string' ? id : generateRequestId();
}

export function requestLogger(logger: Logger): RequestHandler {
  return (req, res, next) => {
    const incoming = req.get(REQUEST_ID_HEADER)?.trim();
    const requestId =
      incoming && incoming.length <= MAX_REQUEST_ID_LENGTH ? incoming : generateRequestId();
    res.locals['requestId'] = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    const start = Date.now();
    const child = logger.child({ correlationId: requestId });

    res.on('finish', () => {
      child.info('Request completed', {
        method: req.method,
        url: req.originalUrl,
        statusCode: res.statusCode,
        durationMs: Date.now() - start,
      });
    });

    next();
  };
}
