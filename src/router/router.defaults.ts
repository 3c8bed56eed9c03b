/**
 * Router Defaults
 *
 * Process-start routing preferences read from the environment.
 */

import { isEngineID } from '../engines/interfaces';
import { RouterPreferences } from './router.interfaces';

export const DEFAULT_ROUTER_PREFERENCES: RouterPreferences = {
  preferredEngine: 'local',
  fallbackEnabled: true,
};

/**
 * A failed engine is skipped (while another candidate remains) for this long
 */
export const DEFAULT_UNHEALTHY_RETRY_MS = 30000;

export interface LoadedRouterPreferences {
  preferences: RouterPreferences;
  warnings: string[];
}

const TRUE_VALUES = ['true', '1', 'yes', 'on'];
const FALSE_VALUES = ['false', '0', 'no', 'off'];

function parseBoolean(value: string): boolean | undefined {
  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.includes(normalized)) return true;
  if (FALSE_VALUES.includes(normalized)) return false;
  return undefined;
}

/**
 * Read routing preferences from the environment.
 *
 * PREFERRED_ENGINE / FALLBACK_ENABLED take precedence over the older
 * PREFER_OLLAMA / FALLBACK_TO_GEMINI flags. Unrecognised values keep the
 * default and produce a warning.
 */
export function loadRouterPreferences(
  env: NodeJS.ProcessEnv = process.env,
): LoadedRouterPreferences {
  const warnings: string[] = [];
  const preferences: RouterPreferences = { ...DEFAULT_ROUTER_PREFERENCES };

  const preferred = env.PREFERRED_ENGINE?.trim().toLowerCase();
  if (preferred) {
    if (isEngineID(preferred)) {
      preferences.preferredEngine = preferred;
    } else {
      warnings.push(`Ignoring PREFERRED_ENGINE='${env.PREFERRED_ENGINE}'; expected 'local' or 'cloud'`);
    }
  } else if (env.PREFER_OLLAMA) {
    const preferOllama = parseBoolean(env.PREFER_OLLAMA);
    if (preferOllama === undefined) {
      warnings.push(`Ignoring PREFER_OLLAMA='${env.PREFER_OLLAMA}'; expected a boolean`);
    } else {
      preferences.preferredEngine = preferOllama ? 'local' : 'cloud';
    }
  }

  const fallbackKey = env.FALLBACK_ENABLED !== undefined ? 'FALLBACK_ENABLED' : 'FALLBACK_TO_GEMINI';
  const fallbackRaw = env[fallbackKey];
  if (fallbackRaw !== undefined && fallbackRaw !== '') {
    const fallback = parseBoolean(fallbackRaw);
    if (fallback === undefined) {
      warnings.push(`Ignoring ${fallbackKey}='${fallbackRaw}'; expected a boolean`);
    } else {
      preferences.fallbackEnabled = fallback;
    }
  }

  return { preferences, warnings };
}
