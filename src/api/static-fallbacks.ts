/**
 * Static Fallbacks
 *
 * Deterministic results the caller routes serve when no engine can
 * produce one. None of these touch the router.
 */

import {
  AnswerEvaluation,
  AptitudeQuestion,
  CandidateContext,
  CandidateProfile,
  Difficulty,
  InterviewQuestion,
  InterviewReport,
  InterviewType,
  JobDescription,
  JobFitAnalysis,
  baseContextFromProfile,
} from '../operations';

/**
 * Answers shorter than this are scored without consulting an engine
 */
export const MIN_ANSWER_LENGTH = 10;

const NEXT_QUESTIONS: Record<number, (role: string) => string> = {
  2: (role) => `Based on what you've shared, what specific technologies do you work with most in your ${role} role?`,
  3: () => 'Can you walk me through your approach to solving complex technical challenges?',
  4: () => 'Tell me about a recent project that you found particularly challenging or rewarding.',
  5: () => 'How do you handle situations when requirements change mid-project?',
  6: () => 'Describe how you collaborate with team members when there are differing technical opinions.',
  7: () => 'What aspects of this role and our technology stack interest you most?',
  8: () => 'Where do you see your technical career heading in the next few years?',
};

export function fallbackCandidateContext(
  profile: CandidateProfile,
  role: string,
  interviewType: InterviewType,
): CandidateContext {
  return {
    ...baseContextFromProfile(profile, role, interviewType),
    primaryDomain: 'fullstack',
    technicalDepth: 'intermediate',
    keyTechnologies: profile.skills.slice(0, 3),
    specializations: [],
    industryExperience: [],
  };
}

export function fallbackFirstQuestion(context: CandidateContext): InterviewQuestion {
  return {
    id: 'q1',
    text: `Thank you for joining us today! Could you start by telling me about your background and experience as a ${context.role}?`,
    type: 'introductory',
    expectedKeywords: [],
    difficulty: 'easy',
  };
}

export function fallbackNextQuestion(
  context: CandidateContext,
  questionNumber: number,
): InterviewQuestion {
  const template = NEXT_QUESTIONS[questionNumber];
  return {
    id: `q${questionNumber}`,
    text: template ? template(context.role) : 'Tell me more about your experience.',
    type: 'adaptive',
    expectedKeywords: [],
    difficulty: 'medium',
  };
}

function uniformEvaluation(score: number, shortNotes: string): AnswerEvaluation {
  return {
    technical: score,
    communication: score,
    confidence: score,
    relevance: score,
    shortNotes,
  };
}

/**
 * Score for answers too short to be worth an engine call
 */
export function shortAnswerEvaluation(context: CandidateContext): AnswerEvaluation {
  return uniformEvaluation(
    20,
    `A complete answer is expected. Provide specific details about your experience, approach, or solution for this ${context.role} question.`,
  );
}

export function isShortAnswer(answer: string): boolean {
  return answer.trim().length < MIN_ANSWER_LENGTH;
}

/**
 * Length-based score: two points per word, between 40 and 80
 */
export function fallbackEvaluation(answer: string, context: CandidateContext): AnswerEvaluation {
  const words = answer.trim().split(/\s+/).filter((word) => word.length > 0).length;
  return uniformEvaluation(
    Math.min(80, Math.max(40, words * 2)),
    `A strong ${context.role} answer demonstrates relevant experience, specific examples, and clear technical understanding.`,
  );
}

export const EMPTY_REPORT: InterviewReport = {
  overallSummary: 'No evaluation data available for this session.',
  technicalStrengths: [],
  technicalGaps: [],
  communicationScore: 0,
  behavioralScore: 0,
  recommendations: [],
};

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return Math.round(values.reduce((sum, value) => sum + value, 0) / values.length);
}

export function fallbackImprovedAnswer(context: CandidateContext): string {
  return `As a ${context.role}, I would approach this by leveraging my experience with relevant technologies and following best practices to ensure quality results.`;
}

export function fallbackReport(evaluations: AnswerEvaluation[]): InterviewReport {
  if (evaluations.length === 0) {
    return { ...EMPTY_REPORT };
  }
  const technical = average(evaluations.map((e) => e.technical));
  const communication = average(evaluations.map((e) => e.communication));
  const confidence = average(evaluations.map((e) => e.confidence));
  const relevance = average(evaluations.map((e) => e.relevance));

  return {
    overallSummary: `Completed interview with average scores: Technical ${technical}%, Communication ${communication}%, Relevance ${relevance}%.`,
    technicalStrengths: [],
    technicalGaps: [],
    communicationScore: communication,
    behavioralScore: average([confidence, relevance]),
    recommendations: ['Practice technical explanations', 'Focus on specific examples'],
  };
}

function suitabilityFor(score: number): string {
  if (score >= 80) return 'Excellent fit - highly recommended';
  if (score >= 60) return 'Good fit with development needed';
  if (score >= 40) return 'Partial fit - significant gaps';
  return 'Poor fit for this role';
}

/**
 * Skill overlap and experience ratio, matching skills case-insensitively
 */
export function fallbackJobFit(candidate: CandidateProfile, job: JobDescription): JobFitAnalysis {
  const owned = new Set(candidate.skills.map((skill) => skill.trim().toLowerCase()));
  const has = (skill: string): boolean => owned.has(skill.trim().toLowerCase());

  const matchedSkills = job.requiredSkills.filter(has);
  const missingRequiredSkills = job.requiredSkills.filter((skill) => !has(skill));
  const missingPreferredSkills = job.preferredSkills.filter((skill) => !has(skill));

  const skillMatch = job.requiredSkills.length > 0
    ? (matchedSkills.length / job.requiredSkills.length) * 100
    : 50;
  const experienceMatch = job.requiredExperienceYears > 0
    ? Math.min(100, (candidate.experienceYears / job.requiredExperienceYears) * 100)
    : 75;
  const overall = Math.round((skillMatch + experienceMatch) / 2);

  const recommendations = missingRequiredSkills.length > 0
    ? [`Build experience with ${missingRequiredSkills.join(', ')}`]
    : [];

  return {
    overallFitScore: overall,
    skillMatchPercentage: Math.round(skillMatch),
    experienceMatchPercentage: Math.round(experienceMatch),
    matchedSkills,
    missingRequiredSkills,
    missingPreferredSkills,
    roleSuitability: suitabilityFor(overall),
    recommendations,
  };
}

const APTITUDE_POOL: Omit<AptitudeQuestion, 'id' | 'difficulty'>[] = [
  {
    question: 'If a development team of 4 can complete a feature in 6 days, how many days will it take for 6 developers?',
    options: ['A) 4 days', 'B) 3 days', 'C) 5 days', 'D) 2 days'],
    correctAnswer: 'A) 4 days',
    explanation: 'Work = people x days. 4 x 6 = 24 person-days; 24 / 6 = 4 days.',
    type: 'quantitative',
  },
  {
    question: 'What comes next in the sequence 3, 6, 12, 24, ?',
    options: ['A) 36', 'B) 48', 'C) 30', 'D) 42'],
    correctAnswer: 'B) 48',
    explanation: 'Each term doubles the previous one: 24 x 2 = 48.',
    type: 'logical',
  },
  {
    question: 'All services in the cluster are monitored. Some monitored services page on-call. Which statement must be true?',
    options: [
      'A) All services page on-call',
      'B) No service pages on-call',
      'C) Some services in the cluster may page on-call',
      'D) Unmonitored services page on-call',
    ],
    correctAnswer: 'C) Some services in the cluster may page on-call',
    explanation: 'Only "some monitored services" page, so paging is possible but not guaranteed for any given service.',
    type: 'logical',
  },
];

/**
 * Up to count questions from a fixed pool; fewer when the pool runs out
 */
export function fallbackAptitudeQuestions(difficulty: Difficulty, count: number): AptitudeQuestion[] {
  return APTITUDE_POOL.slice(0, count).map((question, index) => ({
    ...question,
    id: `apt_${index + 1}`,
    difficulty,
  }));
}

export interface AptitudeAnswerResult {
  questionId: string;
  correct: boolean;
  score: number;
  userAnswer: string;
  correctAnswer: string;
  explanation: string;
}

/**
 * Exact, case-insensitive answer match. No engine involved.
 */
export function scoreAptitudeAnswer(
  question: Pick<AptitudeQuestion, 'id' | 'correctAnswer' | 'explanation'>,
  userAnswer: string,
): AptitudeAnswerResult {
  const correct = userAnswer.trim().toLowerCase() === question.correctAnswer.trim().toLowerCase();
  return {
    questionId: question.id,
    correct,
    score: correct ? 100 : 0,
    userAnswer,
    correctAnswer: question.correctAnswer,
    explanation: question.explanation,
  };
}
