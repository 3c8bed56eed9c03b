/**
 * Router Errors
 *
 * Errors the router surfaces to its callers. Adapter-level errors never
 * escape the router; they are aggregated here.
 */

import { OperationKind } from '../operations';
import { EngineID } from '../engines/interfaces';
import { EngineFailure } from './router.interfaces';

/**
 * Every candidate engine failed for an operation.
 */
export class AllEnginesUnavailableError extends Error {
  constructor(
    public readonly operation: OperationKind,
    public readonly failures: EngineFailure[],
  ) {
    super(
      `All AI engines failed for '${operation}': ${failures
        .map((f) => `${f.engine} (${f.reason}: ${f.message})`)
        .join('; ')}`,
    );
    this.name = 'AllEnginesUnavailableError';
    // Restore prototype chain for instanceof checks when targeting ES5
    Object.setPrototypeOf(this, AllEnginesUnavailableError.prototype);
  }

  get attemptedEngines(): EngineID[] {
    return this.failures.map((f) => f.engine);
  }
}

/**
 * Administrative call named an engine that does not exist.
 */
export class InvalidEngineSelectionError extends Error {
  constructor(public readonly requested: unknown) {
    super(`Invalid engine '${String(requested)}'. Must be 'local' or 'cloud'`);
    this.name = 'InvalidEngineSelectionError';
    Object.setPrototypeOf(this, InvalidEngineSelectionError.prototype);
  }
}

/**
 * The caller aborted the operation; no engine state was changed.
 */
export class OperationCancelledError extends Error {
  constructor(
    public readonly operation: OperationKind,
    public readonly engine: EngineID | null,
  ) {
    super(`Operation '${operation}' was cancelled by the caller`);
    this.name = 'OperationCancelledError';
    Object.setPrototypeOf(this, OperationCancelledError.prototype);
  }
}
