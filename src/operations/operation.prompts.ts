/**
 * Operation Prompts
 *
 * Backend-neutral prompt builders. Each engine adapter wraps the returned
 * PromptSpec in its own request shape.
 */

import {
  ConversationTurn,
  INTERVIEW_QUESTION_COUNT,
  OperationPayloads,
  PromptSpec,
} from './operation.interfaces';

const JSON_ONLY = 'Return only valid JSON, no additional text.';

/**
 * Focus area for an adaptive question, by its position in the interview
 */
export function questionFocus(questionNumber: number): string {
  if (questionNumber <= 3) return 'technical skills and experience';
  if (questionNumber <= 5) return 'problem-solving and analytical thinking';
  if (questionNumber <= 7) return 'behavioral and situational scenarios';
  return 'role fit and career goals';
}

/**
 * Render prior turns as "Q2: ..." / "A2: ..." lines
 */
export function formatHistory(history: ConversationTurn[]): string {
  if (history.length === 0) {
    return '(no previous conversation)';
  }
  return history
    .map((turn) => `${turn.type === 'question' ? 'Q' : 'A'}${turn.questionNumber}: ${turn.content}`)
    .join('\n');
}

function listOrDefault(items: string[], fallback = 'Not specified'): string {
  return items.length > 0 ? items.join(', ') : fallback;
}

function average(values: number[]): number {
  if (values.length === 0) return 0;
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

export function buildCandidateContextPrompt(
  payload: OperationPayloads['candidate_context'],
): PromptSpec {
  const { profile, role } = payload;
  return {
    prompt: `Analyze this candidate profile and extract key domain signals.

Role: ${role}
Skills: ${listOrDefault(profile.skills)}
Experience: ${profile.experienceYears} years
Work Experience: ${JSON.stringify(profile.workExperience.slice(0, 3))}

Extract and return ONLY a JSON object with:
{
  "primary_domain": "frontend|backend|fullstack|mobile|devops|data|ml|other",
  "technical_depth": "beginner|intermediate|advanced|expert",
  "key_technologies": ["tech1", "tech2", "tech3"],
  "specializations": ["spec1", "spec2"],
  "industry_experience": ["industry1", "industry2"]
}

${JSON_ONLY}`,
    temperature: 0.2,
    maxTokens: 500,
    expects: 'object',
  };
}

export function buildFirstQuestionPrompt(
  payload: OperationPayloads['first_question'],
): PromptSpec {
  const { context } = payload;
  return {
    prompt: `You are conducting a professional ${context.interviewType} interview for a ${context.role} position.

Candidate Profile:
- Role: ${context.role}
- Experience Level: ${context.experienceLevel}
- Key Skills: ${listOrDefault(context.skills.slice(0, 5))}

Generate the first introductory question that:
1. Is warm and welcoming
2. Asks about their background and experience
3. Sets a conversational tone
4. Is relevant to the ${context.role} role

Return ONLY a JSON object with this exact structure:
{
  "id": "q1",
  "text": "Your question here",
  "type": "introductory",
  "expected_keywords": ["topic1", "topic2"],
  "difficulty": "easy"
}

${JSON_ONLY}`,
    temperature: 0.3,
    maxTokens: 500,
    expects: 'object',
  };
}

export function buildNextQuestionPrompt(
  payload: OperationPayloads['next_question'],
): PromptSpec {
  const { context, history, questionNumber } = payload;
  const focus = questionFocus(questionNumber);
  return {
    prompt: `You are conducting a professional interview for a ${context.role} position.

Previous Conversation:
${formatHistory(history)}

Candidate Profile:
- Role: ${context.role}
- Experience Level: ${context.experienceLevel}
- Primary Domain: ${context.primaryDomain}

This is question #${questionNumber} of ${INTERVIEW_QUESTION_COUNT}. Focus on: ${focus}

Generate the next question that:
1. Builds naturally on the previous conversation
2. Explores ${focus} relevant to ${context.role}
3. Feels conversational, not scripted

Return ONLY a JSON object with this exact structure:
{
  "id": "q${questionNumber}",
  "text": "Your question here",
  "type": "technical|behavioral|situational|role_fit",
  "expected_keywords": ["topic1", "topic2"],
  "difficulty": "easy|medium|hard"
}

${JSON_ONLY}`,
    temperature: 0.5,
    maxTokens: 500,
    expects: 'object',
  };
}

export function buildAnswerEvaluationPrompt(
  payload: OperationPayloads['answer_evaluation'],
): PromptSpec {
  const { questionText, answer, context } = payload;
  return {
    prompt: `Evaluate this interview answer professionally and objectively.

Question: ${questionText}
Candidate Role: ${context.role}
Experience Level: ${context.experienceLevel}

Candidate's Answer: ${answer}

Provide scores (0-100) for technical competency, communication clarity,
confidence level and relevance to the question.

Return ONLY a JSON object with this exact structure:
{
  "technical": 85,
  "communication": 90,
  "confidence": 80,
  "relevance": 85,
  "short_notes": "Brief feedback about the answer quality (max 100 chars)"
}

${JSON_ONLY}`,
    temperature: 0.2,
    maxTokens: 400,
    expects: 'object',
  };
}

export function buildImprovedAnswerPrompt(
  payload: OperationPayloads['improved_answer'],
): PromptSpec {
  const { questionText, answer, context } = payload;
  return {
    prompt: `Improve this interview answer to be more professional and comprehensive.

Question: ${questionText}
Role: ${context.role}
Original Answer: ${answer}

Provide an improved version that is structured and clear, includes specific
examples and shows technical competency.

Return ONLY a JSON object with this exact structure:
{
  "improved_answer": "The improved answer text"
}

${JSON_ONLY}`,
    temperature: 0.3,
    maxTokens: 300,
    expects: 'object',
  };
}

export function buildFinalReportPrompt(
  payload: OperationPayloads['final_report'],
): PromptSpec {
  const { context, evaluations, history } = payload;
  const technical = average(evaluations.map((e) => e.technical));
  const communication = average(evaluations.map((e) => e.communication));
  const confidence = average(evaluations.map((e) => e.confidence));
  return {
    prompt: `Generate a comprehensive interview report for a ${context.role} candidate.

Interview Performance:
- Average Technical Score: ${technical.toFixed(1)}/100
- Average Communication Score: ${communication.toFixed(1)}/100
- Average Confidence Score: ${confidence.toFixed(1)}/100
- Total Questions: ${evaluations.length}

Conversation:
${formatHistory(history)}

Create a professional summary with strengths, gaps, and recommendations.

Return ONLY a JSON object with this exact structure:
{
  "overall_summary": "Comprehensive summary of performance",
  "technical_strengths": ["strength1", "strength2"],
  "technical_gaps": ["gap1", "gap2"],
  "communication_score": 85,
  "behavioral_score": 80,
  "recommendations": ["recommendation1", "recommendation2"]
}

${JSON_ONLY}`,
    temperature: 0.3,
    maxTokens: 1000,
    expects: 'object',
  };
}

export function buildJobFitPrompt(payload: OperationPayloads['job_fit']): PromptSpec {
  const { candidate, job } = payload;
  return {
    prompt: `Analyze job fit between candidate and position requirements.

Candidate Profile:
- Experience: ${candidate.experienceYears} years
- Skills: ${listOrDefault(candidate.skills)}

Job Requirements:
- Position: ${job.title}
- Required Experience: ${job.requiredExperienceYears} years
- Required Skills: ${listOrDefault(job.requiredSkills)}
- Preferred Skills: ${listOrDefault(job.preferredSkills, 'None')}

Provide a job fit analysis with specific scores and actionable recommendations.

Return ONLY a JSON object with this exact structure:
{
  "overall_fit_score": 85,
  "skill_match_percentage": 80,
  "experience_match_percentage": 90,
  "missing_required_skills": ["skill1"],
  "missing_preferred_skills": [],
  "matched_skills": ["skill2"],
  "role_suitability": "Excellent fit - highly recommended",
  "recommendations": ["recommendation1", "recommendation2"]
}

${JSON_ONLY}`,
    temperature: 0.2,
    maxTokens: 800,
    expects: 'object',
  };
}

export function buildAptitudeQuestionsPrompt(
  payload: OperationPayloads['aptitude_questions'],
): PromptSpec {
  const { count, difficulty } = payload;
  return {
    prompt: `Generate ${count} aptitude and logical reasoning questions for technical interview assessment.

Requirements:
- Difficulty: ${difficulty}
- Include: quantitative reasoning, logical puzzles, pattern recognition
- Each question should have 4 multiple choice options
- Provide the correct answer and the reasoning steps

Return ONLY a JSON array with this exact structure:
[
  {
    "question": "Question text here",
    "options": ["A) Option 1", "B) Option 2", "C) Option 3", "D) Option 4"],
    "correct_answer": "A) Option 1",
    "explanation": "Step-by-step reasoning",
    "type": "quantitative|logical|pattern"
  }
]

${JSON_ONLY}`,
    temperature: 0.4,
    maxTokens: 2000,
    expects: 'array',
  };
}
