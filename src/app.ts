/**
 * Express application factory.
 *
 * Mounts the alert routes under `/api/alerts` in front of an `AlertService`.
 * Middleware is wired in order:
 * 1. Request logger (assigns the request id)
 * 2. JSON body parser
 * 3. Alert routes
 * 4. Unknown-route and error handlers
 *
 * The operator acting on an alert is read from the `x-actor-id` header;
 * authenticating that header is left to the gateway in front of this app.
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { AlertService } from './alerting/alertService.js';
import type { Logger } from './logging/logger.js';
import { createLogger, toError } from './logging/logger.js';
import { requestIdOf, requestLogger } from './middleware/requestLogger.js';
import { ALERT_ERROR_CODES, AlertEngineError } from './types/index.js';
import {
  formatDataResponse,
  formatErrorResponse,
  formatInternalError,
  formatValidationError,
  getHttpStatusForError,
} from './utils/responses.js';
import { rejectInput } from './utils/validators/alertInputValidator.js';

export const ACTOR_HEADER = 'x-actor-id';

// ─── Dependency Types ────────────────────────────────────────────────────────

export interface AppDependencies {
  service: AlertService;
  logger?: Logger;
}

// ─── Input Helpers ───────────────────────────────────────────────────────────

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function bodyField(req: Request, name: string): unknown {
  const body: unknown = req.body;
  return isRecord(body) ? body[name] : undefined;
}

function queryString(req: Request, name: string): string | undefined {
  const value = req.query[name];
  return typeof value === 'string' ? value : undefined;
}

/**
 * Numeric input from a query string or JSON body. Blank means absent;
 * anything that is not a number becomes NaN so the service rejects it.
 */
function toInt(value: unknown): number | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return value.trim() === '' ? undefined : Number(value);
  return Number.NaN;
}

function optionalText(value: unknown, field: string): string | null {
  if (value === undefined || value === null) return null;
  if (typeof value !== 'string') rejectInput({ [field]: ['must be a string'] });
  return value;
}

/** Wrap a handler that produces response data; errors go to the error handler. */
function respond(handler: (req: Request) => Promise<unknown>): RequestHandler {
  return (req, res, next) => {
    void handler(req)
      .then((data) => {
        res.status(200).json(formatDataResponse(data));
      })
      .catch(next);
  };
}

// ─── Routes ──────────────────────────────────────────────────────────────────

export function createAlertRouter(service: AlertService): express.Router {
  const router = express.Router();

  router.get(
    '/active',
    respond((req) =>
      service.getActiveAlerts({ kind: queryString(req, 'kind'), severity: queryString(req, 'severity') }),
    ),
  );

  router.get(
    '/history',
    respond((req) =>
      service.getHistory({
        subjectId: queryString(req, 'subjectId'),
        limit: toInt(req.query['limit']),
      }),
    ),
  );

  router.get(
    '/stats',
    respond((req) => service.getStats(queryString(req, 'role'))),
  );

  router.get(
    '/monitor/status',
    respond(async () => service.getMonitorStatus()),
  );

  router.get(
    '/notifications/:role',
    respond((req) => service.getNotifications(req.params['role'] ?? '', toInt(req.query['count']))),
  );

  router.delete(
    '/notifications/:role',
    respond(async (req) => {
      const role = req.params['role'] ?? '';
      return { role, cleared: await service.clearNotifications(role) };
    }),
  );

  router.post(
    '/scan/stock',
    respond(() => service.scanStock()),
  );

  router.post(
    '/scan/expiry',
    respond((req) => service.scanExpiry(toInt(bodyField(req, 'days') ?? req.query['days']))),
  );

  router.post(
    '/scan/orders',
    respond(() => service.scanOrderDelays()),
  );

  router.post(
    '/check/medications/:id',
    respond((req) => service.recheckMedication(req.params['id'] ?? '')),
  );

  router.post(
    '/check/orders/:id',
    respond((req) => service.recheckOrder(req.params['id'] ?? '')),
  );

  router.get(
    '/:id',
    respond((req) => service.getAlert(req.params['id'] ?? '')),
  );

  // A false result is either an unknown alert (404 from getAlert) or one
  // that is already past the requested state.
  router.post(
    '/:id/resolve',
    respond(async (req) => {
      const id = req.params['id'] ?? '';
      const resolved = await service.resolve(id, req.get(ACTOR_HEADER));
      return { alert: await service.getAlert(id), resolved };
    }),
  );

  router.post(
    '/:id/pending-restock',
    respond(async (req) => {
      const id = req.params['id'] ?? '';
      const notes = optionalText(bodyField(req, 'notes'), 'notes');
      const updated = await service.markPendingRestock(id, req.get(ACTOR_HEADER), notes);
      return { alert: await service.getAlert(id), updated };
    }),
  );

  return router;
}

// ─── Application Factory ────────────────────────────────────────────────────

function isMalformedJson(err: unknown): boolean {
  return err instanceof SyntaxError && 'body' in err;
}

export function createApp(deps: AppDependencies): express.Express {
  const logger = deps.logger ?? createLogger().child({ component: 'http' });
  const app = express();

  app.use(requestLogger(logger));
  app.use(express.json());

  app.use('/api/alerts', createAlertRouter(deps.service));

  app.use((req: Request, res: Response) => {
    res
      .status(404)
      .json(
        formatErrorResponse(
          ALERT_ERROR_CODES.NOT_FOUND,
          `Route ${req.method} ${req.path} not found`,
          requestIdOf(res),
        ),
      );
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId = requestIdOf(res);

    if (err instanceof AlertEngineError) {
      res
        .status(getHttpStatusForError(err.code))
        .json(formatErrorResponse(err.code, err.message, requestId, err.fields));
      return;
    }

    if (isMalformedJson(err)) {
      res.status(400).json(formatValidationError('Malformed JSON body', { body: ['must be valid JSON'] }, requestId));
      return;
    }

    logger.child({ correlationId: requestId }).error('Unhandled request error', toError(err));
    res.status(500).json(formatInternalError(requestId));
  });

  return app;
}
