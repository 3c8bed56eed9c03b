/**
 * Router Module - Barrel Export
 *
 * Exports EngineRouter, interfaces, defaults, errors, and factory function.
 */

// Interfaces and types
export {
  RouterPreferences,
  UsageStatistics,
  RouterStatus,
  EngineAttempt,
  RoutedResult,
  EngineFailure,
  EngineModelStatus,
  RouterOptions,
} from './router.interfaces';

// Errors
export {
  AllEnginesUnavailableError,
  InvalidEngineSelectionError,
  OperationCancelledError,
} from './router-errors';

// Defaults
export {
  DEFAULT_ROUTER_PREFERENCES,
  DEFAULT_UNHEALTHY_RETRY_MS,
  LoadedRouterPreferences,
  loadRouterPreferences,
} from './router.defaults';

// Router
export { EngineRouter } from './engine-router';

// Dependencies
import { EngineAdapter } from '../engines/interfaces';
import { EngineRouter } from './engine-router';
import { RouterOptions, RouterPreferences } from './router.interfaces';
import { DEFAULT_ROUTER_PREFERENCES } from './router.defaults';

/**
 * Factory function to create a configured EngineRouter.
 *
 * @param adapters One adapter per engine id
 * @param defaults Process-start preferences, restored by resetPreferences()
 */
export function createEngineRouter(
  adapters: EngineAdapter[],
  defaults: RouterPreferences = DEFAULT_ROUTER_PREFERENCES,
  options?: RouterOptions,
): EngineRouter {
  return new EngineRouter(adapters, defaults, options);
}
