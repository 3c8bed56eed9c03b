/**
 * Router Interfaces and Types
 *
 * Type definitions for engine selection, fallback bookkeeping and the
 * status snapshot exposed to administrators.
 */

import { EngineID, EngineHealth, EngineModelInfo } from '../engines/interfaces';

/**
 * Process-wide routing preferences
 */
export interface RouterPreferences {
  preferredEngine: EngineID;
  fallbackEnabled: boolean;
}

/**
 * Observational counters; never consulted when routing
 */
export interface UsageStatistics {
  requestsByEngine: Record<EngineID, number>;
  fallbackCount: number;
  lastEngineUsed: EngineID | null;
}

/**
 * Read-only snapshot of the router's state
 */
export interface RouterStatus {
  preferences: RouterPreferences;
  defaults: RouterPreferences;       // Process-start values restored by reset
  health: Record<EngineID, EngineHealth>;
  statistics: UsageStatistics;
}

/**
 * One step of a routed invocation
 */
export interface EngineAttempt {
  engine: EngineID;
  outcome: 'success' | 'failure' | 'skipped';
  durationMs: number;
  error?: string;
}

/**
 * Successful routed invocation with the engine that produced it
 */
export interface RoutedResult<T> {
  result: T;
  engine: EngineID;
  fellBack: boolean;                 // True when the preferred engine did not produce the result
  attempts: EngineAttempt[];
}

/**
 * Last error of an attempted engine, carried by AllEnginesUnavailableError
 */
export interface EngineFailure {
  engine: EngineID;
  errorType: 'unavailable' | 'response_invalid' | 'unexpected';
  reason: string;                    // EngineFailureReason, 'response_invalid' or 'unexpected'
  message: string;
}

/**
 * Model listing entry combined with cached health
 */
export interface EngineModelStatus extends EngineModelInfo {
  available: boolean;
}

export interface RouterOptions {
  now?: () => Date;
  unhealthyRetryMs?: number;         // How long a failed engine is skipped before it is tried again
}
