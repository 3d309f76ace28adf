/**
 * Express application factory with dependency injection.
 *
 * Creates an Express app with middleware wired in order:
 * 1. JSON body parser
 * 2. Caller identity extraction (X-Caller-Id header) on ledger routes
 * 3. Per-caller rate limiting on mutating routes, when a Redis client is given
 * 4. Product, role and event routes
 * 5. Global error handling
 *
 * The caller identity is taken as presented; verifying it is left to
 * whatever sits in front of this service.
 *
 * @module app
 */

import express from 'express';
import type { NextFunction, Request, RequestHandler, Response } from 'express';

import type { LedgerControllerDependencies } from './controllers/ledgerController.js';
import {
  completeProduct,
  getProduct,
  getProductChecks,
  getProductCount,
  getRoles,
  grantRole,
  performCheck,
  queryEvents,
  registerProduct,
  renounceRole,
  revokeRole,
  updateProduct,
  verifyEvents,
} from './controllers/ledgerController.js';
import type { RateLimitClient } from './middleware/rateLimiter.js';
import { callerMutationKey, checkLimit } from './middleware/rateLimiter.js';
import type { RateLimitConfig } from './config/index.js';
import { LEDGER_ERROR_CODES } from './types/index.js';
import {
  formatErrorResponse,
  formatInternalError,
  formatValidationError,
  generateRequestId,
  getHttpStatusForError,
} from './utils/responses.js';

// ─── Dependency Types ────────────────────────────────────────────────────────

export interface AppDependencies extends LedgerControllerDependencies {
  /** Redis client for rate limiting; when absent, requests are not limited. */
  redis?: RateLimitClient;
  rateLimit?: RateLimitConfig;
}

export const CALLER_HEADER = 'x-caller-id';

// ─── Helpers ─────────────────────────────────────────────────────────────────

/** Safely extract the HTTP status from a result that may be a success or error response. */
function getResultStatus(result: { success: boolean }, successStatus: number): number {
  if (result.success) return successStatus;
  if ('error' in result && typeof result.error === 'object' && result.error !== null) {
    if ('code' in result.error && typeof result.error.code === 'string') {
      return getHttpStatusForError(result.error.code);
    }
  }
  return 500;
}

/** Trimmed caller identity from the request header, or null when absent. */
export function getCaller(req: Request): string | null {
  const value = req.get(CALLER_HEADER)?.trim();
  return value ? value : null;
}

/** express.json rejects unparseable bodies with `type: 'entity.parse.failed'`. */
function isBodyParseError(err: Error): boolean {
  return 'type' in err && err.type === 'entity.parse.failed';
}

type CallerHandler = (caller: string, req: Request) => Promise<{ success: boolean }>;

/**
 * Wrap a controller call that needs a caller: 401 without one, otherwise
 * respond with the controller's result and its mapped status.
 */
function withCaller(successStatus: number, handler: CallerHandler): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const caller = getCaller(req);
      if (caller === null) {
        res
          .status(getHttpStatusForError(LEDGER_ERROR_CODES.CALLER_REQUIRED))
          .json(
            formatErrorResponse(
              LEDGER_ERROR_CODES.CALLER_REQUIRED,
              `Missing ${CALLER_HEADER} header`,
            ),
          );
        return;
      }
      const result = await handler(caller, req);
      res.status(getResultStatus(result, successStatus)).json(result);
    } catch (err) {
      next(err);
    }
  };
}

/** Wrap a read-only controller call. */
function read(handler: (req: Request) => Promise<{ success: boolean }>): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const result = await handler(req);
      res.status(getResultStatus(result, 200)).json(result);
    } catch (err) {
      next(err);
    }
  };
}

// ─── Rate Limit Middleware Factory ───────────────────────────────────────────

/**
 * Limit mutating requests per caller identity. Returns 429 with a
 * Retry-After header when exceeded. Requests without a caller pass through
 * and are rejected by the route itself.
 */
function rateLimitMiddleware(redis: RateLimitClient, config?: RateLimitConfig): RequestHandler {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const caller = getCaller(req);
    if (caller === null) {
      next();
      return;
    }
    try {
      const result = await checkLimit(
        redis,
        callerMutationKey(caller),
        config?.maxRequests,
        config?.windowSeconds,
      );
      if (!result.allowed) {
        const retryAfterSeconds = Math.ceil((result.resetAt.getTime() - Date.now()) / 1000);
        res.set('Retry-After', String(Math.max(retryAfterSeconds, 1)));
        res
          .status(getHttpStatusForError(LEDGER_ERROR_CODES.RATE_LIMITED))
          .json(
            formatErrorResponse(
              LEDGER_ERROR_CODES.RATE_LIMITED,
              'Too many requests. Please try again later.',
            ),
          );
        return;
      }
      next();
    } catch (err) {
      next(err);
    }
  };
}

function param(req: Request, name: string): string {
  return req.params[name] ?? '';
}

// ─── Application Factory ────────────────────────────────────────────────────

/**
 * Create a configured Express application with all ledger routes.
 */
export function createApp(deps: AppDependencies): express.Express {
  const app = express();

  app.use(express.json());

  const limit: RequestHandler[] = deps.redis ? [rateLimitMiddleware(deps.redis, deps.rateLimit)] : [];

  // ── Product Routes ────────────────────────────────────────────────────

  const products = express.Router();

  products.get('/', read(() => getProductCount(deps)));

  products.post(
    '/',
    ...limit,
    withCaller(201, (caller, req) => registerProduct(caller, req.body, deps)),
  );

  products.get('/:id', read((req) => getProduct(param(req, 'id'), deps)));

  products.put(
    '/:id',
    ...limit,
    withCaller(200, (caller, req) => updateProduct(caller, param(req, 'id'), req.body, deps)),
  );

  products.get('/:id/checks', read((req) => getProductChecks(param(req, 'id'), deps)));

  products.post(
    '/:id/checks',
    ...limit,
    withCaller(201, (caller, req) => performCheck(caller, param(req, 'id'), req.body, deps)),
  );

  products.post(
    '/:id/complete',
    ...limit,
    withCaller(200, (caller, req) => completeProduct(caller, param(req, 'id'), deps)),
  );

  // ── Role Routes ───────────────────────────────────────────────────────

  const roles = express.Router();

  roles.post('/grant', ...limit, withCaller(200, (caller, req) => grantRole(caller, req.body, deps)));
  roles.post('/revoke', ...limit, withCaller(200, (caller, req) => revokeRole(caller, req.body, deps)));
  roles.post(
    '/renounce',
    ...limit,
    withCaller(200, (caller, req) => renounceRole(caller, req.body, deps)),
  );
  roles.get('/:identity', read((req) => getRoles(param(req, 'identity'), deps)));

  // ── Event Routes ──────────────────────────────────────────────────────

  const events = express.Router();

  events.get('/', read(async (req) => queryEvents({ ...req.query }, deps)));
  events.get('/integrity', read(async () => verifyEvents(deps)));

  app.use('/api/products', products);
  app.use('/api/roles', roles);
  app.use('/api/events', events);

  app.get('/health', (_req: Request, res: Response) => {
    res.status(200).json({ success: true, status: 'ok' });
  });

  // ── Global Error Handler ──────────────────────────────────────────────

  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      const requestId = generateRequestId();
      deps.logger.warn('Rejected malformed JSON body', { requestId });
      res
        .status(getHttpStatusForError(LEDGER_ERROR_CODES.VALIDATION_ERROR))
        .json(formatValidationError({ body: ['body must be valid JSON'] }, requestId));
      return;
    }
    deps.logger.error('Unhandled error', err);
    res.status(500).json(formatInternalError());
  });

  return app;
}
