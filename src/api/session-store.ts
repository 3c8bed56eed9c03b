/**
 * InterviewSessionStore
 *
 * In-memory interview sessions for the session-based interview routes.
 * Sessions live as long as the process; the oldest is evicted once the
 * configured limit is reached.
 */

import { v4 as uuidv4 } from 'uuid';
import { createLogger, transports, format, Logger } from 'winston';
import {
  AnswerEvaluation,
  CandidateContext,
  CandidateProfile,
  ConversationTurn,
  InterviewQuestion,
  InterviewType,
} from '../operations';

// Create module logger
const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp(),
    format.json()
  ),
  defaultMeta: { service: 'session-store' },
  transports: [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.simple()
      ),
    }),
  ],
});

export const DEFAULT_MAX_SESSIONS = 500;

/**
 * One answered question of a session
 */
export interface SessionAnswer {
  questionId: string;
  questionNumber: number;
  question: string;
  answer: string;
  evaluation: AnswerEvaluation;
  improvedAnswer: string;
}

export interface InterviewSession {
  id: string;
  role: string;
  interviewType: InterviewType;
  profile: CandidateProfile;
  context: CandidateContext;
  history: ConversationTurn[];
  currentQuestion: InterviewQuestion | null;   // null once the last question is answered
  questionNumber: number;                       // Number of the current (or last) question
  answers: SessionAnswer[];
  evaluations: AnswerEvaluation[];
  createdAt: Date;
  busy: boolean;                                // An answer is being processed
}

export interface NewSession {
  profile: CandidateProfile;
  context: CandidateContext;
  firstQuestion: InterviewQuestion;
}

/**
 * Score averages shown in the session listing
 */
export interface SessionSummary {
  sessionId: string;
  role: string;
  interviewType: InterviewType;
  createdAt: string;
  questionsCount: number;
  answersCount: number;
  technicalScore: number;
  communicationScore: number;
  confidenceScore: number;
  overallScore: number;
  completed: boolean;
}

export interface SessionStoreConfig {
  maxSessions: number;
  now: () => Date;
  generateId: () => string;
}

export class SessionNotFoundError extends Error {
  constructor(public readonly sessionId: string) {
    super(`Interview session '${sessionId}' not found`);
    this.name = 'SessionNotFoundError';
    Object.setPrototypeOf(this, SessionNotFoundError.prototype);
  }
}

/**
 * The session cannot take this answer now (finished, busy or wrong question)
 */
export class SessionConflictError extends Error {
  constructor(public readonly sessionId: string, message: string) {
    super(message);
    this.name = 'SessionConflictError';
    Object.setPrototypeOf(this, SessionConflictError.prototype);
  }
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.round(values.reduce((sum, value) => sum + value, 0) / values.length);
}

export function summarizeSession(session: InterviewSession): SessionSummary {
  const technical = average(session.evaluations.map((e) => e.technical));
  const communication = average(session.evaluations.map((e) => e.communication));
  const confidence = average(session.evaluations.map((e) => e.confidence));

  return {
    sessionId: session.id,
    role: session.role,
    interviewType: session.interviewType,
    createdAt: session.createdAt.toISOString(),
    questionsCount: session.history.filter((turn) => turn.type === 'question').length,
    answersCount: session.answers.length,
    technicalScore: technical,
    communicationScore: communication,
    confidenceScore: confidence,
    overallScore: session.evaluations.length > 0
      ? Math.round((technical + communication + confidence) / 3)
      : 0,
    completed: session.currentQuestion === null,
  };
}

export class InterviewSessionStore {
  private readonly sessions: Map<string, InterviewSession> = new Map();
  private readonly config: SessionStoreConfig;

  constructor(config: Partial<SessionStoreConfig> = {}) {
    this.config = {
      maxSessions: config.maxSessions ?? DEFAULT_MAX_SESSIONS,
      now: config.now ?? (() => new Date()),
      generateId: config.generateId ?? (() => uuidv4()),
    };
  }

  get size(): number {
    return this.sessions.size;
  }

  /**
   * Open a session positioned on its first question
   */
  create(input: NewSession): InterviewSession {
    if (this.sessions.size >= this.config.maxSessions) {
      const oldest = this.sessions.keys().next();
      if (!oldest.done) {
        this.sessions.delete(oldest.value);
        logger.info('Evicted oldest interview session', { sessionId: oldest.value });
      }
    }

    const session: InterviewSession = {
      id: this.config.generateId(),
      role: input.context.role,
      interviewType: input.context.interviewType,
      profile: input.profile,
      context: input.context,
      history: [{ type: 'question', questionNumber: 1, content: input.firstQuestion.text }],
      currentQuestion: input.firstQuestion,
      questionNumber: 1,
      answers: [],
      evaluations: [],
      createdAt: this.config.now(),
      busy: false,
    };
    this.sessions.set(session.id, session);

    logger.info('Interview session created', { sessionId: session.id, role: session.role });
    return session;
  }

  get(sessionId: string): InterviewSession {
    const session = this.sessions.get(sessionId);
    if (!session) {
      throw new SessionNotFoundError(sessionId);
    }
    return session;
  }

  /**
   * Sessions, most recently created first
   */
  list(): InterviewSession[] {
    return Array.from(this.sessions.values())
      .reverse()
      .sort((a, b) => b.createdAt.getTime() - a.createdAt.getTime());
  }
}
