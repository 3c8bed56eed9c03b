/**
 * Gemini Engine Implementation
 *
 * Cloud engine. Uses @google/generative-ai for Gemini text generation.
 */

import {
  GoogleGenerativeAI,
  GenerativeModel,
  FinishReason,
} from '@google/generative-ai';
import { BaseEngine } from './base.engine';
import { PromptSpec } from '../operations';
import {
  EngineConfig,
  EngineError,
  EngineUnavailableError,
  EngineResponseInvalidError,
} from './interfaces';

/**
 * Google Gemini engine implementation
 */
export class GeminiEngine extends BaseEngine {
  private readonly client: GoogleGenerativeAI | null;

  constructor(config: EngineConfig) {
    super(config);
    this.client = config.apiKey ? this.createClient(config.apiKey) : null;
  }

  /**
   * Create a Google Generative AI client
   */
  protected createClient(apiKey: string): GoogleGenerativeAI {
    return new GoogleGenerativeAI(apiKey);
  }

  /**
   * Get a generative model configured for this prompt
   */
  private getModel(client: GoogleGenerativeAI, prompt?: PromptSpec): GenerativeModel {
    return client.getGenerativeModel(
      {
        model: this.config.model,
        ...(prompt
          ? {
              generationConfig: {
                temperature: prompt.temperature,
                maxOutputTokens: prompt.maxTokens,
                topP: 0.8,
                topK: 10,
              },
            }
          : {}),
      },
      {
        timeout: this.config.timeoutMs,
        ...(this.config.baseUrl ? { baseUrl: this.config.baseUrl } : {}),
      },
    );
  }

  private requireClient(): GoogleGenerativeAI {
    if (!this.client) {
      throw new EngineUnavailableError('Gemini API key not configured', this.id, 'not_configured');
    }
    return this.client;
  }

  /**
   * Execute a generation request using the Gemini API
   */
  protected async executeGenerate(prompt: PromptSpec, signal: AbortSignal): Promise<string> {
    const model = this.getModel(this.requireClient(), prompt);
    const result = await model.generateContent(prompt.prompt, { signal });
    const response = result.response;

    const blockReason = response.promptFeedback?.blockReason;
    if (blockReason) {
      throw new EngineResponseInvalidError(`Prompt blocked by Gemini: ${blockReason}`, this.id, '');
    }

    const candidate = response.candidates?.[0];
    if (candidate?.finishReason === FinishReason.SAFETY) {
      throw new EngineResponseInvalidError('Content blocked by safety filter', this.id, '');
    }

    const parts = candidate?.content?.parts ?? [];
    return parts.map((part) => part.text ?? '').join('').trim();
  }

  /**
   * Health check by counting tokens: validates the key and reachability
   * without generating anything
   */
  protected async executeHealthCheck(signal: AbortSignal): Promise<void> {
    const model = this.getModel(this.requireClient());
    await model.countTokens('ping', { signal });
  }

  /**
   * Map Google AI errors to EngineError
   */
  mapError(error: unknown): EngineError {
    if (error instanceof EngineError) {
      return error;
    }

    if (error instanceof Error && error.message.includes('API key')) {
      return new EngineUnavailableError(error.message, this.id, 'authentication_error');
    }

    return super.mapError(error);
  }
}
