import { Request, Response } from 'express';
import { ApiDeps } from '../api.interfaces';
import {
  aptitudeBatchEvaluateRequestSchema,
  aptitudeEvaluateRequestSchema,
  aptitudeGenerateRequestSchema,
} from '../request.schemas';
import { abortOnClose, asyncHandler, invokeWithDefault, sendOk } from '../shared';
import { fallbackAptitudeQuestions, scoreAptitudeAnswer } from '../static-fallbacks';

/** POST /aptitude/generate */
export function handleAptitudeGenerate(deps: ApiDeps) {
  return asyncHandler(async (req: Request, res: Response): Promise<void> => {
    const body = aptitudeGenerateRequestSchema.parse(req.body ?? {});
    const signal = abortOnClose(res);
    const routed = await invokeWithDefault(
      deps,
      'aptitude_questions',
      body,
      () => fallbackAptitudeQuestions(body.difficulty, body.count),
      { signal },
    );
    const generated = routed.result.length;
    const message = generated < body.count
      ? `Generated ${generated} of ${body.count} requested aptitude questions`
      : `Generated ${generated} aptitude questions`;
    sendOk(res, message, { ...routed, requested: body.count });
  });
}

/** POST /aptitude/evaluate - deterministic, no engine */
export function handleAptitudeEvaluate() {
  return (req: Request, res: Response): void => {
    const body = aptitudeEvaluateRequestSchema.parse(req.body);
    const result = scoreAptitudeAnswer(body.question, body.answer);
    sendOk(res, result.correct ? 'Correct answer' : 'Incorrect answer', result);
  };
}

/** POST /aptitude/batch-evaluate */
export function handleAptitudeBatchEvaluate() {
  return (req: Request, res: Response): void => {
    const { submissions } = aptitudeBatchEvaluateRequestSchema.parse(req.body);
    const results = submissions.map((submission) => scoreAptitudeAnswer(submission.question, submission.answer));
    const correct = results.filter((result) => result.correct).length;

    sendOk(res, `Evaluated ${results.length} aptitude answers`, {
      results,
      total: results.length,
      correct,
      score: Math.round((correct / results.length) * 100),
    });
  };
}
