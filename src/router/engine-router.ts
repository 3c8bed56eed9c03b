/**
 * EngineRouter
 *
 * Routes AI operations to one of the interchangeable engine adapters.
 *
 * Selection algorithm (per invocation, deterministic):
 * 1. Candidates are [preferred, ...others] when fallback is enabled,
 *    otherwise [preferred] only. Preferences are read once, at the start.
 * 2. A candidate whose cached health is unavailable is skipped, unless it
 *    is the last candidate or its last check is older than the retry
 *    window (health is advisory, never a hard gate).
 * 3. The first successful adapter call wins; remaining candidates are not tried.
 * 4. A failure marks the engine unavailable and moves on; moving on from a
 *    candidate (failure or skip) counts as one fallback.
 * 5. If every candidate fails, throw AllEnginesUnavailableError.
 *
 * Adapter calls run strictly one after another and outside any state
 * update. All reads and writes of health, preferences and statistics
 * happen in synchronous sections, so concurrent invocations on the event
 * loop never observe a half-applied update.
 */

import { createLogger, transports, format, Logger } from 'winston';
import { OperationKind, OperationPayloads, OperationResults } from '../operations';
import {
  EngineAdapter,
  EngineID,
  EngineHealth,
  ENGINE_IDS,
  isEngineID,
  EngineUnavailableError,
  EngineResponseInvalidError,
  InvokeOptions,
} from '../engines/interfaces';
import {
  RouterPreferences,
  UsageStatistics,
  RouterStatus,
  EngineAttempt,
  RoutedResult,
  EngineFailure,
  EngineModelStatus,
  RouterOptions,
} from './router.interfaces';
import {
  AllEnginesUnavailableError,
  InvalidEngineSelectionError,
  OperationCancelledError,
} from './router-errors';
import { DEFAULT_UNHEALTHY_RETRY_MS } from './router.defaults';

// Create module logger
const logger: Logger = createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: format.combine(
    format.timestamp(),
    format.json()
  ),
  defaultMeta: { service: 'engine-router' },
  transports: [
    new transports.Console({
      format: format.combine(
        format.colorize(),
        format.simple()
      ),
    }),
  ],
});

function describeFailure(engine: EngineID, error: unknown): EngineFailure {
  if (error instanceof EngineUnavailableError) {
    return { engine, errorType: 'unavailable', reason: error.reason, message: error.message };
  }
  if (error instanceof EngineResponseInvalidError) {
    return { engine, errorType: 'response_invalid', reason: 'response_invalid', message: error.message };
  }
  return {
    engine,
    errorType: 'unexpected',
    reason: 'unexpected',
    message: error instanceof Error ? error.message : String(error),
  };
}

function copyHealth(health: EngineHealth): EngineHealth {
  return {
    ...health,
    lastCheckedAt: health.lastCheckedAt ? new Date(health.lastCheckedAt.getTime()) : null,
  };
}

export class EngineRouter {
  private readonly adapters: Map<EngineID, EngineAdapter> = new Map();
  private readonly health: Map<EngineID, EngineHealth> = new Map();
  private readonly defaults: RouterPreferences;
  private preferences: RouterPreferences;
  private statistics: UsageStatistics;
  private readonly now: () => Date;
  private readonly unhealthyRetryMs: number;

  constructor(
    adapters: EngineAdapter[],
    defaults: RouterPreferences,
    options: RouterOptions = {},
  ) {
    for (const adapter of adapters) {
      if (this.adapters.has(adapter.id)) {
        throw new Error(`Engine '${adapter.id}' is registered more than once`);
      }
      this.adapters.set(adapter.id, adapter);
    }
    for (const id of ENGINE_IDS) {
      if (!this.adapters.has(id)) {
        throw new Error(`Engine '${id}' is not registered`);
      }
      this.health.set(id, {
        engine: id,
        available: true,
        lastCheckedAt: null,
        lastError: null,
        latencyMs: null,
      });
    }

    this.defaults = { ...defaults };
    this.preferences = { ...defaults };
    this.statistics = {
      requestsByEngine: { local: 0, cloud: 0 },
      fallbackCount: 0,
      lastEngineUsed: null,
    };
    this.now = options.now ?? (() => new Date());
    this.unhealthyRetryMs = options.unhealthyRetryMs ?? DEFAULT_UNHEALTHY_RETRY_MS;

    logger.info('Engine router initialized', {
      preferredEngine: this.preferences.preferredEngine,
      fallbackEnabled: this.preferences.fallbackEnabled,
    });
  }

  /**
   * Run an operation on the best available engine, falling back on failure.
   */
  async invoke<K extends OperationKind>(
    kind: K,
    payload: OperationPayloads[K],
    options: InvokeOptions = {},
  ): Promise<RoutedResult<OperationResults[K]>> {
    const candidates = this.candidateOrder({ ...this.preferences });
    const attempts: EngineAttempt[] = [];
    const failures: EngineFailure[] = [];
    let fellBack = false;

    for (let index = 0; index < candidates.length; index++) {
      const engine = candidates[index];
      const next = candidates[index + 1];

      if (options.signal?.aborted) {
        throw new OperationCancelledError(kind, null);
      }

      if (next !== undefined && this.shouldSkip(engine)) {
        const lastError = this.getHealth(engine).lastError ?? 'marked unavailable';
        attempts.push({ engine, outcome: 'skipped', durationMs: 0, error: lastError });
        failures.push({ engine, errorType: 'unavailable', reason: 'marked_unavailable', message: lastError });
        this.recordFallback(kind, engine, next, 'marked unavailable');
        fellBack = true;
        continue;
      }

      const adapter = this.getAdapter(engine);
      const startedAt = this.now().getTime();
      try {
        const result = await adapter.invoke(kind, payload, options);
        const durationMs = this.now().getTime() - startedAt;
        this.recordSuccess(engine, durationMs);
        attempts.push({ engine, outcome: 'success', durationMs });
        return { result, engine, fellBack, attempts };
      } catch (error) {
        if (options.signal?.aborted) {
          logger.info('Operation cancelled by caller', { kind, engine });
          throw new OperationCancelledError(kind, engine);
        }

        const durationMs = this.now().getTime() - startedAt;
        const failure = describeFailure(engine, error);
        this.recordFailure(engine, failure, durationMs);
        failures.push(failure);
        attempts.push({ engine, outcome: 'failure', durationMs, error: failure.message });

        if (next !== undefined) {
          this.recordFallback(kind, engine, next, failure.message);
          fellBack = true;
        }
      }
    }

    const terminal = new AllEnginesUnavailableError(kind, failures);
    logger.error('All engines failed', { kind, failures });
    throw terminal;
  }

  /**
   * Prefer an engine for subsequent invocations.
   * Unknown values are rejected without changing any state.
   */
  forceSelect(engine: unknown): RouterPreferences {
    if (!isEngineID(engine)) {
      logger.warn('Rejected engine selection', { requested: String(engine) });
      throw new InvalidEngineSelectionError(engine);
    }
    this.preferences = { ...this.preferences, preferredEngine: engine };
    logger.info('Forced engine selection', { preferredEngine: engine });
    return { ...this.preferences };
  }

  /**
   * Enable or disable falling back to the non-preferred engine
   */
  setFallbackEnabled(enabled: boolean): RouterPreferences {
    this.preferences = { ...this.preferences, fallbackEnabled: enabled };
    logger.info('Fallback setting changed', { fallbackEnabled: enabled });
    return { ...this.preferences };
  }

  /**
   * Restore the process-start preferences
   */
  resetPreferences(): RouterPreferences {
    this.preferences = { ...this.defaults };
    logger.info('Engine preferences reset to defaults', { ...this.preferences });
    return { ...this.preferences };
  }

  /**
   * Snapshot of preferences, health and statistics. Does not mutate state.
   */
  getStatus(): RouterStatus {
    const health: Record<EngineID, EngineHealth> = {
      local: copyHealth(this.getHealth('local')),
      cloud: copyHealth(this.getHealth('cloud')),
    };
    return {
      preferences: { ...this.preferences },
      defaults: { ...this.defaults },
      health,
      statistics: {
        ...this.statistics,
        requestsByEngine: { ...this.statistics.requestsByEngine },
      },
    };
  }

  /**
   * Check every engine and store the results. A result is discarded when an
   * invocation recorded health for that engine after the check started.
   */
  async refreshHealth(): Promise<Record<EngineID, EngineHealth>> {
    const startedAt = this.now().getTime();
    const results = await Promise.allSettled(
      ENGINE_IDS.map((id) => this.getAdapter(id).healthCheck()),
    );
    const checkedAt = this.now();

    results.forEach((result, index) => {
      const engine = ENGINE_IDS[index];
      const checked: EngineHealth = result.status === 'fulfilled'
        ? { ...result.value, engine, lastCheckedAt: checkedAt }
        : {
            engine,
            available: false,
            lastCheckedAt: checkedAt,
            lastError: result.reason instanceof Error ? result.reason.message : 'Health check failed',
            latencyMs: null,
          };
      const current = this.getHealth(engine);
      if (current.lastCheckedAt !== null && current.lastCheckedAt.getTime() > startedAt) {
        logger.debug('Discarding health check older than the last invocation', { engine });
        return;
      }
      this.health.set(engine, checked);
      if (!checked.available) {
        logger.warn('Engine health check failed', { engine, error: checked.lastError });
      }
    });

    return this.getStatus().health;
  }

  /**
   * Models served by each engine, with cached availability
   */
  listModels(): EngineModelStatus[] {
    return ENGINE_IDS.map((id) => ({
      ...this.getAdapter(id).describeModel(),
      available: this.getHealth(id).available,
    }));
  }

  // ===== Private methods =====

  private candidateOrder(preferences: RouterPreferences): EngineID[] {
    if (!preferences.fallbackEnabled) {
      return [preferences.preferredEngine];
    }
    return [
      preferences.preferredEngine,
      ...ENGINE_IDS.filter((id) => id !== preferences.preferredEngine),
    ];
  }

  private shouldSkip(engine: EngineID): boolean {
    const health = this.getHealth(engine);
    if (health.available || health.lastCheckedAt === null) {
      return false;
    }
    return this.now().getTime() - health.lastCheckedAt.getTime() < this.unhealthyRetryMs;
  }

  private getAdapter(engine: EngineID): EngineAdapter {
    const adapter = this.adapters.get(engine);
    if (!adapter) {
      throw new Error(`Engine '${engine}' is not registered`);
    }
    return adapter;
  }

  private getHealth(engine: EngineID): EngineHealth {
    const health = this.health.get(engine);
    if (!health) {
      throw new Error(`Engine '${engine}' is not registered`);
    }
    return health;
  }

  private recordSuccess(engine: EngineID, durationMs: number): void {
    this.health.set(engine, {
      engine,
      available: true,
      lastCheckedAt: this.now(),
      lastError: null,
      latencyMs: durationMs,
    });
    this.statistics.requestsByEngine[engine] += 1;
    this.statistics.lastEngineUsed = engine;
  }

  private recordFailure(engine: EngineID, failure: EngineFailure, durationMs: number): void {
    this.health.set(engine, {
      engine,
      available: false,
      lastCheckedAt: this.now(),
      lastError: failure.message,
      latencyMs: durationMs,
    });

    if (failure.errorType === 'response_invalid') {
      logger.warn('Engine response could not be parsed', {
        event: 'engine_response_invalid',
        engine,
        error: failure.message,
      });
    } else {
      logger.warn('Engine call failed', {
        event: 'engine_unavailable',
        engine,
        reason: failure.reason,
        error: failure.message,
      });
    }
  }

  private recordFallback(kind: OperationKind, from: EngineID, to: EngineID, cause: string): void {
    this.statistics.fallbackCount += 1;
    logger.warn(`Falling back from ${from} to ${to} for ${kind}`, {
      event: 'engine_fallback',
      kind,
      from,
      to,
      cause,
    });
  }
}
