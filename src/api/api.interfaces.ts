/**
 * API Interfaces and Types
 */

import { Logger } from 'winston';
import { EngineRouter } from '../router';
import { EngineID } from '../engines/interfaces';
import { InterviewSessionStore } from './session-store';

/**
 * Standard JSON envelope for every response
 */
export interface ApiEnvelope<T = unknown> {
  success: boolean;
  message: string;
  data?: T;
  requestId: string;
}

/**
 * Dependencies shared by all route handlers
 */
export interface ApiDeps {
  router: EngineRouter;
  logger: Logger;
  sessions: InterviewSessionStore;
}

export interface AppOptions {
  router: EngineRouter;
  logger?: Logger;
  sessions?: InterviewSessionStore;   // A fresh in-memory store when omitted
}

/**
 * Caller-route payload: the operation result and where it came from.
 * engine is null and degraded true when a static default was served.
 */
export interface RoutedPayload<T> {
  result: T;
  engine: EngineID | null;
  fellBack: boolean;
  degraded: boolean;
}

export type OverallHealth = 'healthy' | 'unhealthy';
