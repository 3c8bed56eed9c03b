/**
 * Engine Defaults Configuration
 *
 * Default configurations for both engines.
 * Environment variables override base URLs, models, keys and timeouts.
 */

import { EngineConfig, EngineID } from './interfaces';

export const DEFAULT_ENGINE_TIMEOUT_MS = 30000;
export const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 5000;

function parseTimeout(value: string | undefined, fallback: number): number {
  const parsed = parseInt(value || '', 10);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Build engine configurations from an environment map
 */
export function loadEngineConfigs(
  env: NodeJS.ProcessEnv = process.env,
): Record<EngineID, EngineConfig> {
  const healthCheckTimeoutMs = parseTimeout(env.ENGINE_HEALTH_TIMEOUT_MS, DEFAULT_HEALTH_CHECK_TIMEOUT_MS);

  return {
    local: {
      id: 'local',
      name: 'Ollama',
      model: env.OLLAMA_MODEL || 'llama3.1:8b',
      baseUrl: env.OLLAMA_BASE_URL || 'http://localhost:11434',
      timeoutMs: parseTimeout(env.OLLAMA_TIMEOUT_MS, DEFAULT_ENGINE_TIMEOUT_MS),
      healthCheckTimeoutMs,
    },
    cloud: {
      id: 'cloud',
      name: 'Gemini',
      model: env.GEMINI_MODEL || 'gemini-2.0-flash',
      baseUrl: env.GEMINI_BASE_URL || undefined,
      apiKey: env.GEMINI_API_KEY || undefined,
      timeoutMs: parseTimeout(env.GEMINI_TIMEOUT_MS, DEFAULT_ENGINE_TIMEOUT_MS),
      healthCheckTimeoutMs,
    },
  };
}

/**
 * Get engine config with optional overrides
 */
export function getEngineConfig(
  id: EngineID,
  overrides?: Partial<EngineConfig>,
  env: NodeJS.ProcessEnv = process.env,
): EngineConfig {
  const defaults = loadEngineConfigs(env)[id];
  return {
    ...defaults,
    ...overrides,
    id, // Ensure ID cannot be overridden
  };
}
