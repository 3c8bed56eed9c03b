/**
 * HTTP application
 *
 * Endpoints:
 *   GET  /ai-engine/status          - Preferences, health and usage statistics
 *   GET  /ai-engine/health          - Check every engine, with recommendations
 *   POST /ai-engine/select          - Prefer an engine ({ engine: 'local' | 'cloud' })
 *   POST /ai-engine/fallback        - Enable or disable fallback ({ enabled })
 *   POST /ai-engine/reset           - Restore process-start preferences
 *   GET  /ai-engine/models          - Models served by each engine
 *   POST /interview/start           - Open an interview session, first question
 *   POST /interview/answer          - Answer the current session question
 *   GET  /interview/report/:id      - Report for a session
 *   GET  /interview/reports         - Session summaries, newest first
 *   POST /interview/context         - Candidate context from a profile
 *   POST /interview/first-question  - Opening question
 *   POST /interview/next-question   - Adaptive follow-up question
 *   POST /interview/evaluate        - Score one answer
 *   POST /interview/report          - Final interview report
 *   POST /job-fit/analyze           - Candidate / job fit analysis
 *   POST /job-fit/role-matching     - Rank roles by fit
 *   POST /aptitude/generate         - Aptitude questions
 *   POST /aptitude/evaluate         - Score an aptitude answer
 *   POST /aptitude/batch-evaluate   - Score several aptitude answers
 */

import express, { Express, Request, Response } from 'express';
import { createLogger, transports, format, Logger } from 'winston';
import { ApiDeps, AppOptions } from './api.interfaces';
import { createErrorHandler } from './error-handler';
import { createRequestLogger, sendError } from './shared';
import {
  handleFallback,
  handleHealth,
  handleModels,
  handleReset,
  handleSelect,
  handleStatus,
} from './handlers/engine';
import {
  handleCandidateContext,
  handleEvaluateAnswer,
  handleFinalReport,
  handleFirstQuestion,
  handleNextQuestion,
} from './handlers/interview';
import {
  handleSessionAnswer,
  handleSessionList,
  handleSessionReport,
  handleStartInterview,
} from './handlers/session';
import { handleJobFit, handleRoleMatching } from './handlers/job-fit';
import {
  handleAptitudeBatchEvaluate,
  handleAptitudeEvaluate,
  handleAptitudeGenerate,
} from './handlers/aptitude';
import { InterviewSessionStore } from './session-store';

// Create module logger
const defaultLogger: Logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp(),
    format.json()
  ),
  defaultMeta: { service: 'api' },
  transports: [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.simple()
      ),
    }),
  ],
});

export function createApp(options: AppOptions): Express {
  const deps: ApiDeps = {
    router: options.router,
    logger: options.logger ?? defaultLogger,
    sessions: options.sessions ?? new InterviewSessionStore(),
  };

  const app = express();

  // ── Global Middleware ─────────────────────────────────────────────────────
  app.use(createRequestLogger(deps.logger));
  app.use(express.json({ limit: '1mb' }));

  // ── Engine administration ────────────────────────────────────────────────
  app.get('/ai-engine/status', handleStatus(deps));
  app.get('/ai-engine/health', handleHealth(deps));
  app.post('/ai-engine/select', handleSelect(deps));
  app.post('/ai-engine/fallback', handleFallback(deps));
  app.post('/ai-engine/reset', handleReset(deps));
  app.get('/ai-engine/models', handleModels(deps));

  // ── Interview sessions ───────────────────────────────────────────────────
  app.post('/interview/start', handleStartInterview(deps));
  app.post('/interview/answer', handleSessionAnswer(deps));
  app.get('/interview/report/:sessionId', handleSessionReport(deps));
  app.get('/interview/reports', handleSessionList(deps));

  // ── Interview ────────────────────────────────────────────────────────────
  app.post('/interview/context', handleCandidateContext(deps));
  app.post('/interview/first-question', handleFirstQuestion(deps));
  app.post('/interview/next-question', handleNextQuestion(deps));
  app.post('/interview/evaluate', handleEvaluateAnswer(deps));
  app.post('/interview/report', handleFinalReport(deps));

  // ── Job fit and aptitude ─────────────────────────────────────────────────
  app.post('/job-fit/analyze', handleJobFit(deps));
  app.post('/job-fit/role-matching', handleRoleMatching(deps));
  app.post('/aptitude/generate', handleAptitudeGenerate(deps));
  app.post('/aptitude/evaluate', handleAptitudeEvaluate());
  app.post('/aptitude/batch-evaluate', handleAptitudeBatchEvaluate());

  app.use((req: Request, res: Response) => {
    sendError(res, `Route not found: ${req.method} ${req.path}`, 404);
  });
  app.use(createErrorHandler(deps.logger));

  return app;
}
