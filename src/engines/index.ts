/**
 * Engines Module - Barrel Export
 *
 * Exports interfaces, the base class, both engine implementations,
 * defaults, and the factory function.
 */

// Interfaces and types
export {
  EngineID,
  ENGINE_IDS,
  isEngineID,
  EngineHealth,
  EngineConfig,
  EngineModelInfo,
  InvokeOptions,
  EngineFailureReason,
  EngineError,
  EngineUnavailableError,
  EngineResponseInvalidError,
  EngineAdapter,
} from './interfaces';

// Base class
export { BaseEngine } from './base.engine';

// Engine implementations
export { OllamaEngine } from './ollama.engine';
export { GeminiEngine } from './gemini.engine';

// Defaults
export {
  DEFAULT_ENGINE_TIMEOUT_MS,
  DEFAULT_HEALTH_CHECK_TIMEOUT_MS,
  loadEngineConfigs,
  getEngineConfig,
} from './engine.defaults';

import { EngineAdapter, EngineConfig } from './interfaces';
import { OllamaEngine } from './ollama.engine';
import { GeminiEngine } from './gemini.engine';
import { getEngineConfig } from './engine.defaults';

/**
 * Configuration overrides for creating the engines
 */
export interface EnginesConfig {
  local?: Partial<EngineConfig>;
  cloud?: Partial<EngineConfig>;
  env?: NodeJS.ProcessEnv;
}

/**
 * Factory function to create both engine adapters.
 *
 * @param config Optional configuration overrides per engine
 * @returns The local and cloud adapters, in canonical order
 */
export function createEngines(config?: EnginesConfig): EngineAdapter[] {
  const env = config?.env ?? process.env;
  return [
    new OllamaEngine(getEngineConfig('local', config?.local, env)),
    new GeminiEngine(getEngineConfig('cloud', config?.cloud, env)),
  ];
}
