/**
 * In-process engine for router and API tests.
 *
 * Runs the real BaseEngine pipeline (prompt, timeout, JSON extraction,
 * validation); only the backend call is a jest mock.
 */

import { BaseEngine } from '../../engines/base.engine';
import { EngineConfig, EngineID } from '../../engines/interfaces';
import { CandidateContext, PromptSpec } from '../../operations';

export class FakeEngine extends BaseEngine {
  readonly generate = jest.fn<Promise<string>, [PromptSpec, AbortSignal]>();
  readonly healthPing = jest.fn<Promise<void>, [AbortSignal]>();

  constructor(id: EngineID, overrides: Partial<EngineConfig> = {}) {
    super({
      id,
      name: id === 'local' ? 'Ollama' : 'Gemini',
      model: `${id}-model`,
      timeoutMs: 1000,
      healthCheckTimeoutMs: 500,
      ...overrides,
    });
    this.healthPing.mockResolvedValue(undefined);
  }

  protected executeGenerate(prompt: PromptSpec, signal: AbortSignal): Promise<string> {
    return this.generate(prompt, signal);
  }

  protected executeHealthCheck(signal: AbortSignal): Promise<void> {
    return this.healthPing(signal);
  }
}

/**
 * Generation that only settles when the signal aborts
 */
export function hangUntilAborted(_prompt: PromptSpec, signal: AbortSignal): Promise<string> {
  return new Promise<string>((_resolve, reject) => {
    signal.addEventListener('abort', () => reject(new Error('aborted')), { once: true });
  });
}

export const QUESTION_TEXT = 'Tell me about a challenging bug you fixed.';

export const QUESTION_JSON = JSON.stringify({ text: QUESTION_TEXT });

export const sampleContext: CandidateContext = {
  role: 'Backend Engineer',
  interviewType: 'technical',
  experienceYears: 4,
  experienceLevel: 'Mid-Level',
  skills: ['TypeScript', 'PostgreSQL', 'Docker', 'Redis'],
  primaryDomain: 'backend',
  technicalDepth: 'intermediate',
  keyTechnologies: ['TypeScript', 'PostgreSQL'],
  specializations: [],
  industryExperience: [],
};
