import { Request, Response } from 'express';
import { ENGINE_IDS, EngineHealth, EngineID } from '../../engines/interfaces';
import { RouterPreferences, RouterStatus } from '../../router';
import { ApiDeps, OverallHealth } from '../api.interfaces';
import { fallbackRequestSchema, selectEngineRequestSchema } from '../request.schemas';
import { asyncHandler, sendOk } from '../shared';

function availableEngines(health: Record<EngineID, EngineHealth>): EngineID[] {
  return ENGINE_IDS.filter((id) => health[id].available);
}

function statusView(status: RouterStatus) {
  return {
    ...status,
    availableEngines: availableEngines(status.health),
    currentEngine: status.preferences.preferredEngine,
    fallbackCount: status.statistics.fallbackCount,
  };
}

/**
 * Operator guidance derived from checked health
 */
export function healthRecommendations(
  health: Record<EngineID, EngineHealth>,
  preferences: RouterPreferences,
): string[] {
  const local = health.local.available;
  const cloud = health.cloud.available;
  const recommendations: string[] = [];

  if (!local && !cloud) {
    recommendations.push('CRITICAL: No AI engines available. Check the Ollama installation and the Gemini API key.');
  } else if (!local) {
    recommendations.push('Ollama not available. Install Ollama and pull the configured model for local processing.');
  } else if (!cloud) {
    recommendations.push('Gemini not available. Set GEMINI_API_KEY for cloud fallback.');
  } else {
    recommendations.push('Both engines available. Optimal configuration for reliability.');
  }

  if (!health[preferences.preferredEngine].available) {
    recommendations.push(
      `Preferred engine '${preferences.preferredEngine}' is not available. Consider switching preference.`,
    );
  }

  return recommendations;
}

/** GET /ai-engine/status */
export function handleStatus(deps: ApiDeps) {
  return (_req: Request, res: Response): void => {
    sendOk(res, 'AI engine status retrieved', statusView(deps.router.getStatus()));
  };
}

/** GET /ai-engine/health - checks every engine before answering */
export function handleHealth(deps: ApiDeps) {
  return asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const health = await deps.router.refreshHealth();
    const status = deps.router.getStatus();
    const overallStatus: OverallHealth = availableEngines(health).length > 0 ? 'healthy' : 'unhealthy';

    sendOk(res, `Health check completed - status: ${overallStatus}`, {
      health,
      preferences: status.preferences,
      overallStatus,
      recommendations: healthRecommendations(health, status.preferences),
    });
  });
}

/** POST /ai-engine/select */
export function handleSelect(deps: ApiDeps) {
  return (req: Request, res: Response): void => {
    const { engine } = selectEngineRequestSchema.parse(req.body ?? {});
    const preferences = deps.router.forceSelect(engine);
    sendOk(res, `Preferred engine set to '${preferences.preferredEngine}'`, { preferences });
  };
}

/** POST /ai-engine/fallback */
export function handleFallback(deps: ApiDeps) {
  return (req: Request, res: Response): void => {
    const { enabled } = fallbackRequestSchema.parse(req.body ?? {});
    const preferences = deps.router.setFallbackEnabled(enabled);
    sendOk(res, `Fallback ${enabled ? 'enabled' : 'disabled'}`, { preferences });
  };
}

/** POST /ai-engine/reset */
export function handleReset(deps: ApiDeps) {
  return (_req: Request, res: Response): void => {
    deps.router.resetPreferences();
    sendOk(res, 'Engine preferences reset to defaults', statusView(deps.router.getStatus()));
  };
}

/** GET /ai-engine/models */
export function handleModels(deps: ApiDeps) {
  return (_req: Request, res: Response): void => {
    sendOk(res, 'AI engine models retrieved', { models: deps.router.listModels() });
  };
}
