/**
 * API Module - Barrel Export
 */

export { ApiEnvelope, ApiDeps, AppOptions, RoutedPayload, OverallHealth } from './api.interfaces';
export { createApp } from './app';
export { createErrorHandler } from './error-handler';
export { healthRecommendations } from './handlers/engine';
export {
  REQUEST_ID_HEADER,
  sendOk,
  sendError,
  createRequestLogger,
  asyncHandler,
  abortOnClose,
  invokeWithDefault,
} from './shared';
export * from './static-fallbacks';
export {
  InterviewSessionStore,
  InterviewSession,
  SessionAnswer,
  SessionSummary,
  SessionStoreConfig,
  SessionNotFoundError,
  SessionConflictError,
  DEFAULT_MAX_SESSIONS,
  summarizeSession,
} from './session-store';
export { SAMPLE_ROLES } from './handlers/job-fit';
