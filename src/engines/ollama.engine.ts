/**
 * Ollama Engine Implementation
 *
 * Local engine. Uses the openai npm package against Ollama's
 * OpenAI-compatible /v1 API, the same way an OpenAI-compatible hosted
 * backend would be reached.
 */

import OpenAI from 'openai';
import { BaseEngine } from './base.engine';
import { PromptSpec } from '../operations';
import {
  EngineConfig,
  EngineError,
  EngineUnavailableError,
} from './interfaces';

const DEFAULT_OLLAMA_BASE_URL = 'http://localhost:11434';

/**
 * Ollama ignores the key, but the client requires a non-empty one
 */
const OLLAMA_PLACEHOLDER_KEY = 'ollama';

/**
 * True when a listed model id satisfies the configured model
 * (exact tag, or the same family before the ':' tag separator)
 */
export function matchesModel(listedId: string, configured: string): boolean {
  const family = configured.split(':')[0];
  return listedId === configured || listedId.includes(configured) || listedId.startsWith(`${family}:`);
}

export class OllamaEngine extends BaseEngine {
  private readonly client: OpenAI;

  constructor(config: EngineConfig) {
    super({
      ...config,
      baseUrl: (config.baseUrl || DEFAULT_OLLAMA_BASE_URL).replace(/\/$/, ''),
    });
    this.client = this.createClient();
  }

  /**
   * Create an OpenAI client pointed at the Ollama server.
   * Retries are disabled: fallback is the router's job.
   */
  protected createClient(): OpenAI {
    return new OpenAI({
      apiKey: OLLAMA_PLACEHOLDER_KEY,
      baseURL: `${this.config.baseUrl}/v1`,
      timeout: this.config.timeoutMs,
      maxRetries: 0,
    });
  }

  /**
   * Send the prompt as a single user message to the chat completions API
   */
  protected async executeGenerate(prompt: PromptSpec, signal: AbortSignal): Promise<string> {
    const response = await this.client.chat.completions.create(
      {
        model: this.config.model,
        messages: [{ role: 'user', content: prompt.prompt }],
        temperature: prompt.temperature,
        max_tokens: prompt.maxTokens,
        top_p: 0.8,
        stream: false,
      },
      { signal },
    );

    return response.choices[0]?.message?.content?.trim() ?? '';
  }

  /**
   * Health check using models.list; the configured model must be pulled
   */
  protected async executeHealthCheck(signal: AbortSignal): Promise<void> {
    const page = await this.client.models.list({ signal });
    const modelIds = page.data.map((model) => model.id);

    if (!modelIds.some((id) => matchesModel(id, this.config.model))) {
      throw new EngineUnavailableError(
        `Model '${this.config.model}' not pulled; available: ${modelIds.join(', ') || 'none'}`,
        this.id,
        'not_configured',
      );
    }
  }

  /**
   * Map OpenAI SDK errors to EngineError
   */
  mapError(error: unknown): EngineError {
    if (error instanceof EngineError) {
      return error;
    }

    if (error instanceof OpenAI.APIConnectionTimeoutError) {
      return new EngineUnavailableError(error.message, this.id, 'timeout');
    }

    if (error instanceof OpenAI.APIConnectionError) {
      return new EngineUnavailableError(
        `Cannot reach Ollama at ${this.config.baseUrl}: ${error.message}`,
        this.id,
        'connection_error',
      );
    }

    return super.mapError(error);
  }
}
