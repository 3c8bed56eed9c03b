/**
 * BaseEngine Abstract Class
 *
 * Shared implementation for all engine adapters.
 * Provides prompt construction, timeout and cancellation handling,
 * response parsing, health probing, and error normalization.
 */

import { ZodError } from 'zod';
import { createLogger, transports, format, Logger } from 'winston';
import {
  OperationKind,
  OperationPayloads,
  OperationResults,
  PromptSpec,
  getOperationDefinition,
  extractJson,
  excerpt,
} from '../operations';
import {
  EngineAdapter,
  EngineID,
  EngineConfig,
  EngineHealth,
  EngineModelInfo,
  InvokeOptions,
  EngineError,
  EngineUnavailableError,
  EngineResponseInvalidError,
  EngineFailureReason,
} from './interfaces';

// Create module logger
const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp(),
    format.json()
  ),
  defaultMeta: { service: 'engine' },
  transports: [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.simple()
      ),
    }),
  ],
});

const NETWORK_ERROR_MARKERS = ['ECONNREFUSED', 'ENOTFOUND', 'ECONNRESET', 'EAI_AGAIN', 'fetch failed'];

/**
 * Read an HTTP status from an SDK error, if it carries one
 */
export function readStatus(error: unknown): number | undefined {
  if (typeof error === 'object' && error !== null && 'status' in error && typeof error.status === 'number') {
    return error.status;
  }
  return undefined;
}

function readMessage(error: unknown, fallback: string): string {
  if (error instanceof Error && error.message) {
    return error.message;
  }
  return typeof error === 'string' && error ? error : fallback;
}

function isNetworkError(error: unknown): boolean {
  const texts: string[] = [];
  if (error instanceof Error) {
    texts.push(error.message);
    const cause: unknown = error.cause;
    if (typeof cause === 'object' && cause !== null && 'code' in cause && typeof cause.code === 'string') {
      texts.push(cause.code);
    }
  }
  return texts.some((text) => NETWORK_ERROR_MARKERS.some((marker) => text.includes(marker)));
}

/**
 * Abstract base class for all engine adapters.
 *
 * Subclasses must implement:
 * - executeGenerate: send a prompt to the backend and return the generated text
 * - executeHealthCheck: lightweight check, throws when the backend is unusable
 *
 * and may refine mapError for SDK-specific error classes.
 */
export abstract class BaseEngine implements EngineAdapter {
  public readonly id: EngineID;
  public readonly name: string;
  public readonly config: EngineConfig;

  constructor(config: EngineConfig) {
    this.id = config.id;
    this.name = config.name;
    this.config = config;
  }

  /**
   * Run an operation: build its prompt, call the backend under a timeout,
   * then extract and validate the JSON result.
   */
  async invoke<K extends OperationKind>(
    kind: K,
    payload: OperationPayloads[K],
    options: InvokeOptions = {},
  ): Promise<OperationResults[K]> {
    const definition = getOperationDefinition(kind);
    const prompt = definition.buildPrompt(payload);
    const start = Date.now();

    logger.debug('Engine request', { engine: this.id, kind, promptChars: prompt.prompt.length });

    const text = await this.withTimeout(
      this.config.timeoutMs,
      options.signal,
      (signal) => this.executeGenerate(prompt, signal),
    );

    logger.debug('Engine response', {
      engine: this.id,
      kind,
      responseChars: text.length,
      latencyMs: Date.now() - start,
    });

    try {
      return definition.parse(extractJson(text, prompt.expects), payload);
    } catch (error) {
      throw this.invalidResponse(kind, text, error);
    }
  }

  /**
   * Check the backend with its own, shorter timeout. Never rejects.
   */
  async healthCheck(): Promise<EngineHealth> {
    const start = Date.now();
    try {
      await this.withTimeout(
        this.config.healthCheckTimeoutMs,
        undefined,
        (signal) => this.executeHealthCheck(signal),
      );
      return {
        engine: this.id,
        available: true,
        lastCheckedAt: new Date(),
        lastError: null,
        latencyMs: Date.now() - start,
      };
    } catch (error) {
      return {
        engine: this.id,
        available: false,
        lastCheckedAt: new Date(),
        lastError: readMessage(error, 'Health check failed'),
        latencyMs: Date.now() - start,
      };
    }
  }

  describeModel(): EngineModelInfo {
    return {
      engine: this.id,
      name: this.name,
      model: this.config.model,
      ...(this.config.baseUrl ? { baseUrl: this.config.baseUrl } : {}),
    };
  }

  /**
   * Map a transport or SDK error to an EngineError.
   * Subclasses override to recognise SDK-specific error classes first.
   */
  mapError(error: unknown): EngineError {
    if (error instanceof EngineError) {
      return error;
    }

    const status = readStatus(error);
    const message = readMessage(error, `Unknown ${this.name} error`);

    if (status !== undefined) {
      return new EngineUnavailableError(message, this.id, this.reasonForStatus(status), status);
    }

    if (isNetworkError(error)) {
      return new EngineUnavailableError(message, this.id, 'connection_error');
    }

    return new EngineUnavailableError(message, this.id, 'unknown');
  }

  /**
   * Classify an HTTP status code
   */
  protected reasonForStatus(status: number): EngineFailureReason {
    if (status === 401 || status === 403) return 'authentication_error';
    if (status === 408) return 'timeout';
    if (status === 429) return 'rate_limited';
    if (status >= 500) return 'server_error';
    return 'request_rejected';
  }

  /**
   * Run fn with an AbortSignal that fires on timeout or when the caller's
   * signal aborts. Uses Promise.race so a backend that ignores the signal
   * still cannot hold the call past the timeout. Clears the timer on exit.
   */
  protected async withTimeout<T>(
    timeoutMs: number,
    parentSignal: AbortSignal | undefined,
    fn: (signal: AbortSignal) => Promise<T>,
  ): Promise<T> {
    if (parentSignal?.aborted) {
      throw new EngineUnavailableError('Request cancelled by caller', this.id, 'cancelled');
    }

    const controller = new AbortController();
    let timedOut = false;

    const abortPromise = new Promise<never>((_, reject) => {
      controller.signal.addEventListener('abort', () => reject(controller.signal.reason), { once: true });
    });
    const onParentAbort = () => controller.abort();
    parentSignal?.addEventListener('abort', onParentAbort, { once: true });

    const timer = setTimeout(() => {
      timedOut = true;
      controller.abort();
    }, timeoutMs);

    try {
      return await Promise.race([fn(controller.signal), abortPromise]);
    } catch (error) {
      if (timedOut) {
        throw new EngineUnavailableError(
          `${this.name} request timed out after ${timeoutMs}ms`,
          this.id,
          'timeout',
        );
      }
      if (parentSignal?.aborted) {
        throw new EngineUnavailableError('Request cancelled by caller', this.id, 'cancelled');
      }
      throw this.mapError(error);
    } finally {
      clearTimeout(timer);
      parentSignal?.removeEventListener('abort', onParentAbort);
    }
  }

  private invalidResponse(kind: OperationKind, text: string, error: unknown): EngineResponseInvalidError {
    const reason = error instanceof ZodError
      ? error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`).join('; ')
      : readMessage(error, 'unparseable output');
    const rawExcerpt = excerpt(text);

    logger.warn('Engine returned an invalid response', {
      event: 'engine_response_invalid',
      engine: this.id,
      kind,
      reason,
      rawExcerpt,
    });

    return new EngineResponseInvalidError(
      `${this.name} returned an invalid ${kind} response: ${reason}`,
      this.id,
      rawExcerpt,
    );
  }

  // Abstract methods that subclasses must implement

  /**
   * Backend-specific generation call; resolves with the raw generated text
   */
  protected abstract executeGenerate(prompt: PromptSpec, signal: AbortSignal): Promise<string>;

  /**
   * Backend-specific reachability check; resolves when usable, throws otherwise
   */
  protected abstract executeHealthCheck(signal: AbortSignal): Promise<void>;
}
