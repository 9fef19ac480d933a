import { BaseError } from "./BaseError";

/**
 * Orchestrator-related error codes
 */
export enum OrchestratorErrorCode {
  ALREADY_RUNNING = "ORCHESTRATOR_ALREADY_RUNNING",
  NOT_RUNNING = "ORCHESTRATOR_NOT_RUNNING",
  NO_MODULES = "ORCHESTRATOR_NO_MODULES",
  INVALID_TICK_RATE = "ORCHESTRATOR_INVALID_TICK_RATE",
  UNKNOWN = "ORCHESTRATOR_UNKNOWN_ERROR",
}

/**
 * Display loop lifecycle error
 */
export class OrchestratorError extends BaseError {
  constructor(
    message: string,
    code: OrchestratorErrorCode = OrchestratorErrorCode.UNKNOWN,
    recoverable: boolean = false,
    context?: Record<string, unknown>,
  ) {
    super(message, code, recoverable, context);
  }

  static alreadyRunning(): OrchestratorError {
    return new OrchestratorError(
      "Display loop is already running",
      OrchestratorErrorCode.ALREADY_RUNNING,
      true,
    );
  }

  static notRunning(): OrchestratorError {
    return new OrchestratorError(
      "Display loop is not running",
      OrchestratorErrorCode.NOT_RUNNING,
      true,
    );
  }

  static noModules(): OrchestratorError {
    return new OrchestratorError(
      "Cannot start the display loop without registered modules",
      OrchestratorErrorCode.NO_MODULES,
      false,
    );
  }

  static invalidTickRate(tickRateHz: number): OrchestratorError {
    return new OrchestratorError(
      `Tick rate must be greater than 0 (got ${tickRateHz})`,
      OrchestratorErrorCode.INVALID_TICK_RATE,
      false,
      { tickRateHz },
    );
  }
}
