/**
 * Engine Interfaces and Types
 *
 * Identity, configuration, health and error types shared by the engine
 * adapters and the router.
 */

/**
 * Interchangeable AI backends: a local Ollama server and Google Gemini
 */
export type EngineID = 'local' | 'cloud';

/**
 * Canonical engine order; also the order health is reported in
 */
export const ENGINE_IDS: readonly EngineID[] = ['local', 'cloud'];

export function isEngineID(value: unknown): value is EngineID {
  return ENGINE_IDS.some((id) => id === value);
}

/**
 * Cached belief about whether an engine is currently usable
 */
export interface EngineHealth {
  engine: EngineID;
  available: boolean;
  lastCheckedAt: Date | null;
  lastError: string | null;
  latencyMs: number | null;
}

/**
 * Engine configuration
 */
export interface EngineConfig {
  id: EngineID;
  name: string;
  model: string;
  baseUrl?: string;            // Override for custom endpoints
  apiKey?: string;             // Cloud engine only
  timeoutMs: number;           // Default: 30000
  healthCheckTimeoutMs: number; // Default: 5000
}

/**
 * Model served by an engine, for the models listing
 */
export interface EngineModelInfo {
  engine: EngineID;
  name: string;
  model: string;
  baseUrl?: string;
}

/**
 * Per-call options
 */
export interface InvokeOptions {
  signal?: AbortSignal;
}

/**
 * Why an engine could not be reached or refused the request
 */
export type EngineFailureReason =
  | 'not_configured'           // Missing API key / base URL
  | 'connection_error'         // Connection refused, DNS failure
  | 'timeout'                  // No answer within timeoutMs
  | 'authentication_error'     // Invalid API key
  | 'rate_limited'             // Quota exceeded
  | 'server_error'             // 5xx from the backend
  | 'request_rejected'         // Other 4xx (unknown model, bad request)
  | 'cancelled'                // Caller aborted the call
  | 'unknown';

/**
 * Base class for adapter-level errors
 */
export class EngineError extends Error {
  constructor(
    message: string,
    public readonly engine: EngineID,
  ) {
    super(message);
    this.name = 'EngineError';
    Object.setPrototypeOf(this, EngineError.prototype);
  }
}

/**
 * Transport-level failure reaching an engine's backend
 */
export class EngineUnavailableError extends EngineError {
  constructor(
    message: string,
    engine: EngineID,
    public readonly reason: EngineFailureReason,
    public readonly statusCode?: number,
  ) {
    super(message, engine);
    this.name = 'EngineUnavailableError';
    Object.setPrototypeOf(this, EngineUnavailableError.prototype);
  }
}

/**
 * Backend answered, but the output could not be parsed into the expected shape
 */
export class EngineResponseInvalidError extends EngineError {
  constructor(
    message: string,
    engine: EngineID,
    public readonly rawExcerpt: string,
  ) {
    super(message, engine);
    this.name = 'EngineResponseInvalidError';
    Object.setPrototypeOf(this, EngineResponseInvalidError.prototype);
  }
}
