/**
 * Session-based interview routes
 *
 * A session runs one interview of INTERVIEW_QUESTION_COUNT questions. Each
 * answer is evaluated, rewritten and followed by the next question; the
 * session is only updated once all of that has been produced, so a
 * cancelled request leaves it as it was.
 */

import { Request, Response } from 'express';
import {
  AnswerEvaluation,
  ConversationTurn,
  INTERVIEW_QUESTION_COUNT,
  InterviewQuestion,
} from '../../operations';
import { ApiDeps, RoutedPayload } from '../api.interfaces';
import { sessionAnswerRequestSchema, startInterviewRequestSchema } from '../request.schemas';
import { abortOnClose, asyncHandler, invokeWithDefault, sendOk } from '../shared';
import { SessionConflictError, summarizeSession } from '../session-store';
import {
  EMPTY_REPORT,
  fallbackCandidateContext,
  fallbackEvaluation,
  fallbackFirstQuestion,
  fallbackImprovedAnswer,
  fallbackNextQuestion,
  fallbackReport,
  isShortAnswer,
  shortAnswerEvaluation,
} from '../static-fallbacks';

/** POST /interview/start */
export function handleStartInterview(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = startInterviewRequestSchema.parse(req.body);
    const signal = abortOnClose(res);

    const context = await invokeWithDefault(
      deps,
      'candidate_context',
      body,
      () => fallbackCandidateContext(body.profile, body.role, body.interviewType),
      { signal },
    );
    const first = await invokeWithDefault(
      deps,
      'first_question',
      { context: context.result },
      () => fallbackFirstQuestion(context.result),
      { signal },
    );

    const session = deps.sessions.create({
      profile: body.profile,
      context: context.result,
      firstQuestion: first.result,
    });

    sendOk(res, 'Interview started', {
      sessionId: session.id,
      question: first.result,
      questionNumber: 1,
      totalQuestions: INTERVIEW_QUESTION_COUNT,
      degraded: context.degraded || first.degraded,
    }, 201);
  });
}

/** POST /interview/answer */
export function handleSessionAnswer(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = sessionAnswerRequestSchema.parse(req.body);
    const session = deps.sessions.get(body.sessionId);
    const question = session.currentQuestion;

    if (!question) {
      throw new SessionConflictError(session.id, `Interview session '${session.id}' is already complete`);
    }
    if (body.questionId !== undefined && body.questionId !== question.id) {
      throw new SessionConflictError(
        session.id,
        `Question '${body.questionId}' is not the current question ('${question.id}')`,
      );
    }
    if (session.busy) {
      throw new SessionConflictError(
        session.id,
        `An answer for session '${session.id}' is already being processed`,
      );
    }

    session.busy = true;
    try {
      const signal = abortOnClose(res);
      const { context } = session;
      const payload = { questionText: question.text, answer: body.answer, context };

      const evaluation: RoutedPayload<AnswerEvaluation> = isShortAnswer(body.answer)
        ? { result: shortAnswerEvaluation(context), engine: null, fellBack: false, degraded: false }
        : await invokeWithDefault(
            deps,
            'answer_evaluation',
            payload,
            () => fallbackEvaluation(body.answer, context),
            { signal },
          );
      const improved = await invokeWithDefault(
        deps,
        'improved_answer',
        payload,
        () => fallbackImprovedAnswer(context),
        { signal },
      );

      const answeredNumber = session.questionNumber;
      const history: ConversationTurn[] = [
        ...session.history,
        { type: 'answer', questionNumber: answeredNumber, content: body.answer },
      ];

      let nextQuestion: InterviewQuestion | null = null;
      let nextDegraded = false;
      if (answeredNumber < INTERVIEW_QUESTION_COUNT) {
        const nextNumber = answeredNumber + 1;
        const next = await invokeWithDefault(
          deps,
          'next_question',
          { context, history, questionNumber: nextNumber },
          () => fallbackNextQuestion(context, nextNumber),
          { signal },
        );
        nextQuestion = next.result;
        nextDegraded = next.degraded;
        history.push({ type: 'question', questionNumber: nextNumber, content: nextQuestion.text });
      }

      session.history = history;
      session.answers.push({
        questionId: question.id,
        questionNumber: answeredNumber,
        question: question.text,
        answer: body.answer,
        evaluation: evaluation.result,
        improvedAnswer: improved.result,
      });
      session.evaluations.push(evaluation.result);
      session.currentQuestion = nextQuestion;
      if (nextQuestion) {
        session.questionNumber = answeredNumber + 1;
      }

      sendOk(res, nextQuestion ? 'Answer recorded' : 'Interview complete', {
        sessionId: session.id,
        questionNumber: answeredNumber,
        evaluation: evaluation.result,
        improvedAnswer: improved.result,
        nextQuestion,
        completed: nextQuestion === null,
        degraded: evaluation.degraded || improved.degraded || nextDegraded,
      });
    } finally {
      session.busy = false;
    }
  });
}

/** GET /interview/report/:sessionId */
export function handleSessionReport(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const session = deps.sessions.get(req.params.sessionId);
    const { context, history, evaluations } = session;

    const routed = evaluations.length === 0
      ? { result: { ...EMPTY_REPORT }, engine: null, fellBack: false, degraded: false }
      : await invokeWithDefault(
          deps,
          'final_report',
          { context, history, evaluations },
          () => fallbackReport(evaluations),
          { signal: abortOnClose(res) },
        );

    sendOk(res, 'Interview report generated', {
      sessionId: session.id,
      role: session.role,
      interviewType: session.interviewType,
      createdAt: session.createdAt.toISOString(),
      questions: history
        .filter((turn) => turn.type === 'question')
        .map((turn) => ({ id: `q${turn.questionNumber}`, text: turn.content })),
      answers: session.answers,
      evaluations,
      report: routed.result,
      engine: routed.engine,
      degraded: routed.degraded,
    });
  });
}

/** GET /interview/reports */
export function handleSessionList(deps: ApiDeps) {
  return (_req: Request, res: Response): void => {
    const reports = deps.sessions.list().map(summarizeSession);
    sendOk(res, `Found ${reports.length} interview sessions`, { reports });
  };
}
