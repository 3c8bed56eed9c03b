/**
 * Shared HTTP helpers: envelope responses, request correlation, async
 * handler wrapping, cancellation and routed calls with static defaults.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { Logger } from 'winston';
import { v4 as uuidv4 } from 'uuid';
import { InvokeOptions } from '../engines/interfaces';
import { OperationKind, OperationPayloads, OperationResults } from '../operations';
import { AllEnginesUnavailableError, EngineRouter } from '../router';
import { ApiEnvelope, RoutedPayload } from './api.interfaces';

export const REQUEST_ID_HEADER = 'x-request-id';

export function getRequestId(res: Response): string {
  const requestId: unknown = res.locals.requestId;
  return typeof requestId === 'string' ? requestId : '';
}

// ── Response Helpers ────────────────────────────────────────────────────────

/** Send a successful JSON response using the standard envelope. */
export function sendOk<T>(res: Response, message: string, data: T, status = 200): void {
  const body: ApiEnvelope<T> = {
    success: true,
    message,
    data,
    requestId: getRequestId(res),
  };
  res.status(status).json(body);
}

/** Send an error JSON response using the standard envelope. */
export function sendError(res: Response, message: string, status = 400, data?: unknown): void {
  const body: ApiEnvelope = {
    success: false,
    message,
    requestId: getRequestId(res),
  };
  if (data !== undefined) {
    body.data = data;
  }
  res.status(status).json(body);
}

// ── Middleware ──────────────────────────────────────────────────────────────

/**
 * Assign a correlation id (reusing the caller's x-request-id) and log each
 * request once it completes.
 */
export function createRequestLogger(logger: Logger): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const incoming = req.get(REQUEST_ID_HEADER);
    const requestId = incoming && incoming.trim() ? incoming.trim() : uuidv4();
    const startedAt = Date.now();

    res.locals.requestId = requestId;
    res.setHeader(REQUEST_ID_HEADER, requestId);

    res.on('finish', () => {
      logger.info(`${req.method} ${req.path} ${res.statusCode}`, {
        requestId,
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startedAt,
      });
    });
    next();
  };
}

/**
 * Forward rejections from async handlers to the error middleware.
 */
export function asyncHandler(
  handler: (req: Request, res: Response) => Promise<void>,
): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/**
 * Abort signal that fires when the client goes away before the response
 * has been written.
 */
export function abortOnClose(res: Response): AbortSignal {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableFinished) {
      controller.abort();
    }
  });
  return controller.signal;
}

// ── Routed Calls ────────────────────────────────────────────────────────────

/**
 * Invoke the router and, when every engine failed, serve the static default
 * instead. Cancellation and other errors propagate.
 */
export async function invokeWithDefault<K extends OperationKind>(
  deps: { router: EngineRouter; logger: Logger },
  kind: K,
  payload: OperationPayloads[K],
  fallback: () => OperationResults[K],
  options: InvokeOptions = {},
): Promise<RoutedPayload<OperationResults[K]>> {
  try {
    const routed = await deps.router.invoke(kind, payload, options);
    return { result: routed.result, engine: routed.engine, fellBack: routed.fellBack, degraded: false };
  } catch (error) {
    if (!(error instanceof AllEnginesUnavailableError)) {
      throw error;
    }
    deps.logger.warn(`Serving static default for ${kind}`, {
      event: 'static_default',
      kind,
      attemptedEngines: error.attemptedEngines,
    });
    return { result: fallback(), engine: null, fellBack: false, degraded: true };
  }
}
