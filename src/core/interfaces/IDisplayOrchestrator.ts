import {
  ModuleDescriptor,
  OrchestratorStatus,
  PresentedFrame,
  Result,
} from "@core/types";
import { ConfigError, OrchestratorError } from "@core/errors";
import { DisplayModule, ModuleCacheReader } from "./IDisplayModule";

/**
 * Display Orchestrator Interface
 *
 * Owns the rotation of modules, the tick loop and refresh dispatch.
 */
export interface IDisplayOrchestrator {
  /**
   * Append a module to the rotation
   * @returns Reader of the module's applied cache, or a failure with
   * CONFIG_DUPLICATE_MODULE when the name is taken
   */
  register<TCache>(
    module: DisplayModule<TCache>,
    descriptor: ModuleDescriptor,
  ): Result<ModuleCacheReader<TCache>, ConfigError>;

  /**
   * Start the tick loop. The promise settles when stop() is called, or
   * immediately with a failure when the loop cannot start.
   */
  run(tickRateHz: number): Promise<Result<void, OrchestratorError>>;

  /**
   * Stop the tick loop and settle the pending run() promise
   */
  stop(): Result<void, OrchestratorError>;

  /**
   * One loop iteration
   * @param dtSeconds Seconds since the previous tick
   */
  tick(dtSeconds: number): void;

  /**
   * Name of the active module, or null when nothing is registered
   */
  currentModule(): string | null;

  isRunning(): boolean;

  getStatus(): OrchestratorStatus;

  /**
   * Register a callback for presented frames
   * @returns Unsubscribe function
   */
  onPresent(callback: (frame: PresentedFrame) => void): () => void;
}
