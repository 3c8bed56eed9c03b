/**
 * Engine Adapter Interface
 *
 * Contract every engine implementation satisfies. The router is written
 * against this interface only.
 */

import { OperationKind, OperationPayloads, OperationResults } from '../../operations';
import {
  EngineID,
  EngineConfig,
  EngineHealth,
  EngineModelInfo,
  InvokeOptions,
} from './engine.interfaces';

export interface EngineAdapter {
  readonly id: EngineID;
  readonly name: string;
  readonly config: EngineConfig;

  /**
   * Run one operation. No internal retries.
   * Rejects with EngineUnavailableError or EngineResponseInvalidError.
   */
  invoke<K extends OperationKind>(
    kind: K,
    payload: OperationPayloads[K],
    options?: InvokeOptions,
  ): Promise<OperationResults[K]>;

  /**
   * Lightweight reachability check; never rejects
   */
  healthCheck(): Promise<EngineHealth>;

  describeModel(): EngineModelInfo;
}
