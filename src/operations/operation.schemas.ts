/**
 * Operation Response Schemas
 *
 * zod schemas for the JSON the engines are prompted to return. Engines answer
 * in snake_case; each schema validates the raw shape and maps it onto the
 * camelCase result types.
 */

import { z } from 'zod';

const numericString = z
  .string()
  .trim()
  .regex(/^-?\d+(\.\d+)?$/, 'Expected a numeric string')
  .transform(Number);

/**
 * 0-100 integer score; numbers and numeric strings only, out-of-range values clamped
 */
export const scoreSchema = z
  .union([z.number(), numericString])
  .pipe(z.number().finite())
  .transform((value) => Math.round(Math.min(100, Math.max(0, value))));

// Numbers are kept as text; objects, booleans and nulls are rejected
const listItem = z.union([z.string(), z.number()]).transform(String);

const stringList = z.array(listItem).default([]);

export const domainSignalsSchema = z
  .object({
    primary_domain: z.string().min(1),
    technical_depth: z.string().min(1),
    key_technologies: stringList,
    specializations: stringList,
    industry_experience: stringList,
  })
  .transform((raw) => ({
    primaryDomain: raw.primary_domain,
    technicalDepth: raw.technical_depth,
    keyTechnologies: raw.key_technologies,
    specializations: raw.specializations,
    industryExperience: raw.industry_experience,
  }));

export type DomainSignals = z.output<typeof domainSignalsSchema>;

export const questionSchema = z
  .object({
    id: z.string().optional(),
    text: z.string().trim().min(1),
    type: z.string().default('general'),
    expected_keywords: stringList,
    difficulty: z.string().default('medium'),
  })
  .transform((raw) => ({
    id: raw.id,
    text: raw.text,
    type: raw.type,
    expectedKeywords: raw.expected_keywords,
    difficulty: raw.difficulty,
  }));

export const evaluationSchema = z
  .object({
    technical: scoreSchema,
    communication: scoreSchema,
    confidence: scoreSchema,
    relevance: scoreSchema,
    short_notes: z.string().default(''),
  })
  .transform((raw) => ({
    technical: raw.technical,
    communication: raw.communication,
    confidence: raw.confidence,
    relevance: raw.relevance,
    shortNotes: raw.short_notes,
  }));

/**
 * Rewritten answer; anything under 20 characters is not a usable rewrite
 */
export const improvedAnswerSchema = z
  .object({
    improved_answer: z.string().trim().min(20),
  })
  .transform((raw) => raw.improved_answer);

export const reportSchema = z
  .object({
    overall_summary: z.string().trim().min(1),
    technical_strengths: stringList,
    technical_gaps: stringList,
    communication_score: scoreSchema,
    behavioral_score: scoreSchema,
    recommendations: stringList,
  })
  .transform((raw) => ({
    overallSummary: raw.overall_summary,
    technicalStrengths: raw.technical_strengths,
    technicalGaps: raw.technical_gaps,
    communicationScore: raw.communication_score,
    behavioralScore: raw.behavioral_score,
    recommendations: raw.recommendations,
  }));

export const jobFitSchema = z
  .object({
    overall_fit_score: scoreSchema,
    skill_match_percentage: scoreSchema,
    experience_match_percentage: scoreSchema,
    matched_skills: stringList,
    missing_required_skills: stringList,
    missing_preferred_skills: stringList,
    role_suitability: z.string().default(''),
    recommendations: stringList,
  })
  .transform((raw) => ({
    overallFitScore: raw.overall_fit_score,
    skillMatchPercentage: raw.skill_match_percentage,
    experienceMatchPercentage: raw.experience_match_percentage,
    matchedSkills: raw.matched_skills,
    missingRequiredSkills: raw.missing_required_skills,
    missingPreferredSkills: raw.missing_preferred_skills,
    roleSuitability: raw.role_suitability,
    recommendations: raw.recommendations,
  }));

export const aptitudeQuestionsSchema = z
  .array(
    z.object({
      question: z.string().trim().min(1),
      options: z.array(listItem).min(2),
      correct_answer: z.string().min(1),
      explanation: z.string().default(''),
      type: z.string().default('logical'),
    }),
  )
  .min(1);
