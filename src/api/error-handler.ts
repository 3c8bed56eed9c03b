/**
 * Error-mapping middleware
 */

import { Request, Response, NextFunction, ErrorRequestHandler } from 'express';
import { Logger } from 'winston';
import { ZodError } from 'zod';
import {
  AllEnginesUnavailableError,
  InvalidEngineSelectionError,
  OperationCancelledError,
} from '../router';
import { getRequestId, sendError } from './shared';
import { SessionConflictError, SessionNotFoundError } from './session-store';

function isBodyParseError(error: unknown): boolean {
  return error instanceof SyntaxError && 'body' in error;
}

export function createErrorHandler(logger: Logger): ErrorRequestHandler {
  return (error: unknown, req: Request, res: Response, next: NextFunction): void => {
    if (res.headersSent) {
      next(error);
      return;
    }

    if (error instanceof ZodError) {
      sendError(res, 'Invalid request body', 400, {
        issues: error.issues.map((issue) => ({
          path: issue.path.join('.'),
          message: issue.message,
        })),
      });
      return;
    }

    if (isBodyParseError(error)) {
      sendError(res, 'Malformed JSON body', 400);
      return;
    }

    if (error instanceof InvalidEngineSelectionError) {
      sendError(res, error.message, 400);
      return;
    }

    if (error instanceof SessionNotFoundError) {
      sendError(res, error.message, 404);
      return;
    }

    if (error instanceof SessionConflictError) {
      sendError(res, error.message, 409);
      return;
    }

    if (error instanceof AllEnginesUnavailableError) {
      sendError(res, 'AI service temporarily unavailable', 503, {
        attemptedEngines: error.attemptedEngines,
        failures: error.failures,
      });
      return;
    }

    if (error instanceof OperationCancelledError) {
      // Client already gone: nothing to write
      if (req.socket.destroyed || res.destroyed) {
        logger.info('Request cancelled by client', {
          requestId: getRequestId(res),
          operation: error.operation,
        });
        return;
      }
      sendError(res, 'Request cancelled', 503);
      return;
    }

    logger.error('Unhandled request error', {
      requestId: getRequestId(res),
      method: req.method,
      path: req.path,
      error: error instanceof Error ? error.message : String(error),
      stack: error instanceof Error ? error.stack : undefined,
    });
    sendError(res, 'Internal server error', 500);
  };
}
