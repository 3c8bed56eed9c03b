/**
 * Engine Interfaces - Barrel Export
 */

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
} from './engine.interfaces';

export { EngineAdapter } from './engine-adapter.interface';
