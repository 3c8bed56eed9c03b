/**
 * Operations Module - Barrel Export
 */

export {
  OperationKind,
  OPERATION_KINDS,
  InterviewType,
  ExperienceLevel,
  Difficulty,
  CandidateProfile,
  CandidateContext,
  InterviewQuestion,
  ConversationTurn,
  AnswerEvaluation,
  InterviewReport,
  JobDescription,
  JobFitAnalysis,
  AptitudeQuestion,
  OperationPayloads,
  OperationResults,
  PromptSpec,
  INTERVIEW_QUESTION_COUNT,
} from './operation.interfaces';

export {
  OperationDefinition,
  OPERATION_CATALOG,
  getOperationDefinition,
  experienceLevelFor,
  baseContextFromProfile,
} from './operation.catalog';

export { questionFocus, formatHistory } from './operation.prompts';

export { extractJson, excerpt, ResponseParseError } from './response-parser';
