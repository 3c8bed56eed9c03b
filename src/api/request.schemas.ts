/**
 * Request Body Schemas
 *
 * zod schemas for the JSON bodies accepted by the HTTP routes.
 */

import { z } from 'zod';
import { INTERVIEW_QUESTION_COUNT } from '../operations';

const skillList = z.array(z.string().trim().min(1)).default([]);

const score = z.number().int().min(0).max(100);

export const interviewTypeSchema = z.enum(['technical', 'behavioral', 'mixed']);

export const difficultySchema = z.enum(['easy', 'medium', 'hard']);

export const candidateProfileSchema = z.object({
  name: z.string().optional(),
  skills: skillList,
  experienceYears: z.number().min(0).max(60).default(0),
  education: z.array(z.string()).default([]),
  workExperience: z.array(z.string()).default([]),
});

export const candidateContextSchema = z.object({
  role: z.string().trim().min(1),
  interviewType: interviewTypeSchema,
  experienceYears: z.number().min(0),
  experienceLevel: z.enum(['Junior', 'Mid-Level', 'Senior', 'Lead/Principal']),
  skills: skillList,
  primaryDomain: z.string(),
  technicalDepth: z.string(),
  keyTechnologies: z.array(z.string()).default([]),
  specializations: z.array(z.string()).default([]),
  industryExperience: z.array(z.string()).default([]),
});

const conversationTurnSchema = z.object({
  type: z.enum(['question', 'answer']),
  questionNumber: z.number().int().min(1),
  content: z.string(),
});

const answerEvaluationSchema = z.object({
  technical: score,
  communication: score,
  confidence: score,
  relevance: score,
  shortNotes: z.string().default(''),
});

export const contextRequestSchema = z.object({
  profile: candidateProfileSchema,
  role: z.string().trim().min(1),
  interviewType: interviewTypeSchema.default('technical'),
});

export const firstQuestionRequestSchema = z.object({
  context: candidateContextSchema,
});

export const nextQuestionRequestSchema = z.object({
  context: candidateContextSchema,
  history: z.array(conversationTurnSchema).default([]),
  questionNumber: z.number().int().min(2).max(INTERVIEW_QUESTION_COUNT),
});

export const evaluateRequestSchema = z.object({
  questionText: z.string().trim().min(1),
  answer: z.string(),
  context: candidateContextSchema,
});

export const reportRequestSchema = z.object({
  context: candidateContextSchema,
  history: z.array(conversationTurnSchema).default([]),
  evaluations: z.array(answerEvaluationSchema).default([]),
});

export const jobDescriptionSchema = z.object({
  title: z.string().trim().min(1),
  requiredSkills: skillList,
  preferredSkills: skillList,
  requiredExperienceYears: z.number().min(0).default(0),
  description: z.string().optional(),
});

export const jobFitRequestSchema = z.object({
  candidate: candidateProfileSchema,
  job: jobDescriptionSchema,
});

export const roleMatchingRequestSchema = z.object({
  candidate: candidateProfileSchema,
  roles: z.array(jobDescriptionSchema).min(1).max(10).optional(),
});

export const startInterviewRequestSchema = z.object({
  profile: candidateProfileSchema,
  role: z.string().trim().min(1).default('Software Engineer'),
  interviewType: interviewTypeSchema.default('mixed'),
});

export const sessionAnswerRequestSchema = z.object({
  sessionId: z.string().trim().min(1),
  questionId: z.string().optional(),
  answer: z.string(),
});

export const aptitudeGenerateRequestSchema = z.object({
  difficulty: difficultySchema.default('medium'),
  count: z.number().int().min(1).max(20).default(10),
});

export const aptitudeEvaluateRequestSchema = z.object({
  question: z.object({
    id: z.string().min(1),
    correctAnswer: z.string().min(1),
    explanation: z.string().default(''),
  }),
  answer: z.string(),
});

export const aptitudeBatchEvaluateRequestSchema = z.object({
  submissions: z.array(aptitudeEvaluateRequestSchema).min(1).max(50),
});

export const selectEngineRequestSchema = z.object({
  engine: z.unknown(),
});

export const fallbackRequestSchema = z.object({
  enabled: z.boolean(),
});
