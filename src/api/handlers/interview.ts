import { Request, Response } from 'express';
import { ApiDeps } from '../api.interfaces';
import {
  contextRequestSchema,
  evaluateRequestSchema,
  firstQuestionRequestSchema,
  nextQuestionRequestSchema,
  reportRequestSchema,
} from '../request.schemas';
import { abortOnClose, asyncHandler, invokeWithDefault, sendOk } from '../shared';
import {
  EMPTY_REPORT,
  fallbackCandidateContext,
  fallbackEvaluation,
  fallbackFirstQuestion,
  fallbackNextQuestion,
  fallbackReport,
  isShortAnswer,
  shortAnswerEvaluation,
} from '../static-fallbacks';

/** POST /interview/context */
export function handleCandidateContext(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = contextRequestSchema.parse(req.body);
    const signal = abortOnClose(res);
    const routed = await invokeWithDefault(
      deps,
      'candidate_context',
      body,
      () => fallbackCandidateContext(body.profile, body.role, body.interviewType),
      { signal },
    );
    sendOk(res, 'Candidate context extracted', routed);
  });
}

/** POST /interview/first-question */
export function handleFirstQuestion(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = firstQuestionRequestSchema.parse(req.body);
    const signal = abortOnClose(res);
    const routed = await invokeWithDefault(
      deps,
      'first_question',
      body,
      () => fallbackFirstQuestion(body.context),
      { signal },
    );
    sendOk(res, 'First question generated', routed);
  });
}

/** POST /interview/next-question */
export function handleNextQuestion(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = nextQuestionRequestSchema.parse(req.body);
    const signal = abortOnClose(res);
    const routed = await invokeWithDefault(
      deps,
      'next_question',
      body,
      () => fallbackNextQuestion(body.context, body.questionNumber),
      { signal },
    );
    sendOk(res, `Question ${body.questionNumber} generated`, routed);
  });
}

/** POST /interview/evaluate */
export function handleEvaluateAnswer(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = evaluateRequestSchema.parse(req.body);

    if (isShortAnswer(body.answer)) {
      sendOk(res, 'Answer evaluated', {
        result: shortAnswerEvaluation(body.context),
        engine: null,
        fellBack: false,
        degraded: false,
      });
      return;
    }

    const signal = abortOnClose(res);
    const routed = await invokeWithDefault(
      deps,
      'answer_evaluation',
      body,
      () => fallbackEvaluation(body.answer, body.context),
      { signal },
    );
    sendOk(res, 'Answer evaluated', routed);
  });
}

/** POST /interview/report */
export function handleFinalReport(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = reportRequestSchema.parse(req.body);

    if (body.evaluations.length === 0) {
      sendOk(res, 'Final report generated', {
        result: { ...EMPTY_REPORT },
        engine: null,
        fellBack: false,
        degraded: false,
      });
      return;
    }

    const signal = abortOnClose(res);
    const routed = await invokeWithDefault(
      deps,
      'final_report',
      body,
      () => fallbackReport(body.evaluations),
      { signal },
    );
    sendOk(res, 'Final report generated', routed);
  });
}
