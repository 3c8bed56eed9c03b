/**
 * Operation Interfaces and Types
 *
 * Typed requests and results for every AI operation the engines can run.
 * The router treats these as opaque pass-through values; only the engines
 * and the API layer look inside them.
 */

/**
 * Kinds of work an engine can be asked to perform
 */
export type OperationKind =
  | 'candidate_context'
  | 'first_question'
  | 'next_question'
  | 'answer_evaluation'
  | 'improved_answer'
  | 'final_report'
  | 'job_fit'
  | 'aptitude_questions';

export const OPERATION_KINDS: readonly OperationKind[] = [
  'candidate_context',
  'first_question',
  'next_question',
  'answer_evaluation',
  'improved_answer',
  'final_report',
  'job_fit',
  'aptitude_questions',
];

export type InterviewType = 'technical' | 'behavioral' | 'mixed';

export type ExperienceLevel = 'Junior' | 'Mid-Level' | 'Senior' | 'Lead/Principal';

export type Difficulty = 'easy' | 'medium' | 'hard';

/**
 * Parsed resume / manually entered profile data
 */
export interface CandidateProfile {
  name?: string;
  skills: string[];
  experienceYears: number;
  education: string[];
  workExperience: string[];
}

/**
 * Structured candidate understanding shared by every interview operation
 */
export interface CandidateContext {
  role: string;
  interviewType: InterviewType;
  experienceYears: number;
  experienceLevel: ExperienceLevel;
  skills: string[];
  primaryDomain: string;
  technicalDepth: string;
  keyTechnologies: string[];
  specializations: string[];
  industryExperience: string[];
}

export interface InterviewQuestion {
  id: string;
  text: string;
  type: string;
  expectedKeywords: string[];
  difficulty: string;
}

/**
 * One turn of the interview conversation
 */
export interface ConversationTurn {
  type: 'question' | 'answer';
  questionNumber: number;
  content: string;
}

export interface AnswerEvaluation {
  technical: number;
  communication: number;
  confidence: number;
  relevance: number;
  shortNotes: string;
}

export interface InterviewReport {
  overallSummary: string;
  technicalStrengths: string[];
  technicalGaps: string[];
  communicationScore: number;
  behavioralScore: number;
  recommendations: string[];
}

export interface JobDescription {
  title: string;
  requiredSkills: string[];
  preferredSkills: string[];
  requiredExperienceYears: number;
  description?: string;
}

export interface JobFitAnalysis {
  overallFitScore: number;
  skillMatchPercentage: number;
  experienceMatchPercentage: number;
  matchedSkills: string[];
  missingRequiredSkills: string[];
  missingPreferredSkills: string[];
  roleSuitability: string;
  recommendations: string[];
}

export interface AptitudeQuestion {
  id: string;
  question: string;
  options: string[];
  correctAnswer: string;
  explanation: string;
  type: string;
  difficulty: Difficulty;
}

/**
 * Request payload per operation kind
 */
export interface OperationPayloads {
  candidate_context: {
    profile: CandidateProfile;
    role: string;
    interviewType: InterviewType;
  };
  first_question: {
    context: CandidateContext;
  };
  next_question: {
    context: CandidateContext;
    history: ConversationTurn[];
    questionNumber: number;
  };
  answer_evaluation: {
    questionText: string;
    answer: string;
    context: CandidateContext;
  };
  improved_answer: {
    questionText: string;
    answer: string;
    context: CandidateContext;
  };
  final_report: {
    context: CandidateContext;
    history: ConversationTurn[];
    evaluations: AnswerEvaluation[];
  };
  job_fit: {
    candidate: CandidateProfile;
    job: JobDescription;
  };
  aptitude_questions: {
    difficulty: Difficulty;
    count: number;
  };
}

/**
 * Result shape per operation kind
 */
export interface OperationResults {
  candidate_context: CandidateContext;
  first_question: InterviewQuestion;
  next_question: InterviewQuestion;
  answer_evaluation: AnswerEvaluation;
  improved_answer: string;
  final_report: InterviewReport;
  job_fit: JobFitAnalysis;
  aptitude_questions: AptitudeQuestion[];
}

/**
 * Backend-neutral prompt produced for an operation
 */
export interface PromptSpec {
  prompt: string;
  temperature: number;
  maxTokens: number;
  expects: 'object' | 'array';
}

/**
 * Number of questions in a full interview
 */
export const INTERVIEW_QUESTION_COUNT = 8;
