import { Result } from "@core/types";
import { OrchestratorError } from "@core/errors";

/**
 * Sunrise and sunset for the current day (ms since epoch)
 */
export type SunTimes = {
  sunrise: number;
  sunset: number;
};

/**
 * Auto-brightness Interface
 */
export interface IBrightnessController {
  /**
   * Brightness in percent for a moment in time
   */
  calculateBrightness(now: Date, sun?: SunTimes | null): number;

  /**
   * Apply brightness now and then every update interval
   */
  start(): Result<void, OrchestratorError>;

  stop(): void;

  isRunning(): boolean;
}
