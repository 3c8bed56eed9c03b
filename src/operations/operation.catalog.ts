/**
 * Operation Catalog
 *
 * One definition per operation kind: how to prompt for it and how to turn the
 * validated model output into the typed result. Shared by every engine.
 */

import {
  CandidateProfile,
  ExperienceLevel,
  OperationKind,
  OperationPayloads,
  OperationResults,
  PromptSpec,
} from './operation.interfaces';
import {
  aptitudeQuestionsSchema,
  domainSignalsSchema,
  evaluationSchema,
  improvedAnswerSchema,
  jobFitSchema,
  questionSchema,
  reportSchema,
} from './operation.schemas';
import {
  buildAnswerEvaluationPrompt,
  buildAptitudeQuestionsPrompt,
  buildCandidateContextPrompt,
  buildFinalReportPrompt,
  buildFirstQuestionPrompt,
  buildImprovedAnswerPrompt,
  buildJobFitPrompt,
  buildNextQuestionPrompt,
} from './operation.prompts';

/**
 * Prompt builder and result parser for a single operation kind.
 * parse() receives already-extracted JSON and throws on a shape mismatch.
 */
export interface OperationDefinition<K extends OperationKind> {
  buildPrompt(payload: OperationPayloads[K]): PromptSpec;
  parse(raw: unknown, payload: OperationPayloads[K]): OperationResults[K];
}

/**
 * Experience band used throughout the interview flow
 */
export function experienceLevelFor(years: number): ExperienceLevel {
  if (years < 2) return 'Junior';
  if (years < 5) return 'Mid-Level';
  if (years < 10) return 'Senior';
  return 'Lead/Principal';
}

/**
 * Profile-derived part of a candidate context (no model involved)
 */
export function baseContextFromProfile(
  profile: CandidateProfile,
  role: string,
  interviewType: OperationPayloads['candidate_context']['interviewType'],
) {
  return {
    role,
    interviewType,
    experienceYears: profile.experienceYears,
    experienceLevel: experienceLevelFor(profile.experienceYears),
    skills: profile.skills,
  };
}

export const OPERATION_CATALOG: { [K in OperationKind]: OperationDefinition<K> } = {
  candidate_context: {
    buildPrompt: buildCandidateContextPrompt,
    parse: (raw, payload) => ({
      ...baseContextFromProfile(payload.profile, payload.role, payload.interviewType),
      ...domainSignalsSchema.parse(raw),
    }),
  },
  first_question: {
    buildPrompt: buildFirstQuestionPrompt,
    parse: (raw) => ({ ...questionSchema.parse(raw), id: 'q1' }),
  },
  next_question: {
    buildPrompt: buildNextQuestionPrompt,
    parse: (raw, payload) => ({
      ...questionSchema.parse(raw),
      id: `q${payload.questionNumber}`,
    }),
  },
  answer_evaluation: {
    buildPrompt: buildAnswerEvaluationPrompt,
    parse: (raw) => evaluationSchema.parse(raw),
  },
  improved_answer: {
    buildPrompt: buildImprovedAnswerPrompt,
    parse: (raw) => improvedAnswerSchema.parse(raw),
  },
  final_report: {
    buildPrompt: buildFinalReportPrompt,
    parse: (raw) => reportSchema.parse(raw),
  },
  job_fit: {
    buildPrompt: buildJobFitPrompt,
    parse: (raw) => jobFitSchema.parse(raw),
  },
  aptitude_questions: {
    buildPrompt: buildAptitudeQuestionsPrompt,
    parse: (raw, payload) =>
      aptitudeQuestionsSchema
        .parse(raw)
        .slice(0, payload.count)
        .map((q, index) => ({
          id: `apt_${index + 1}`,
          question: q.question,
          options: q.options,
          correctAnswer: q.correct_answer,
          explanation: q.explanation,
          type: q.type,
          difficulty: payload.difficulty,
        })),
  },
};

/**
 * Look up the definition for an operation kind
 */
export function getOperationDefinition<K extends OperationKind>(kind: K): OperationDefinition<K> {
  return OPERATION_CATALOG[kind];
}
