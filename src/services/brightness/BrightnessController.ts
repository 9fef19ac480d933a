import { BrightnessConfig, Result, success, failure } from "@core/types";
import {
  IBrightnessController,
  SunTimes,
} from "@core/interfaces/IBrightnessController";
import { IMatrixDriver } from "@core/interfaces/IMatrixDriver";
import { OrchestratorError } from "@core/errors/OrchestratorError";
import { getLogger } from "@utils/logger";
import { localMonth, localTimeOfDay } from "@utils/time";

const logger = getLogger("BrightnessController");

/**
 * Approximate daylight hours by month when no sunrise/sunset is known
 */
function seasonalDaylight(month: number): [number, number] {
  if (month === 12 || month <= 2) {
    return [7, 18];
  }
  if (month >= 6 && month <= 8) {
    return [6, 20];
  }
  return [6.5, 19];
}

function clampPercent(value: number): number {
  return Math.max(1, Math.min(100, value));
}

export interface BrightnessControllerOptions {
  config: BrightnessConfig;
  timeZone: string;
  driver: IMatrixDriver;

  /** Latest sunrise/sunset, typically from the weather module */
  sunTimes?: () => SunTimes | null;
  clock?: () => number;
}

/**
 * Follows the sun: minimum brightness at night, a cosine curve between
 * minimum and maximum during the day, peaking halfway between sunrise
 * and sunset.
 */
export class BrightnessController implements IBrightnessController {
  private readonly minBrightness: number;
  private readonly maxBrightness: number;
  private readonly clock: () => number;
  private timer: NodeJS.Timeout | null = null;

  constructor(private readonly options: BrightnessControllerOptions) {
    this.minBrightness = clampPercent(options.config.minBrightness);
    this.maxBrightness = clampPercent(options.config.maxBrightness);
    this.clock = options.clock ?? Date.now;
  }

  calculateBrightness(now: Date, sun?: SunTimes | null): number {
    const { timeZone } = this.options;
    const hour = localTimeOfDay(now.getTime(), timeZone);

    const [sunrise, sunset] = sun
      ? [localTimeOfDay(sun.sunrise, timeZone), localTimeOfDay(sun.sunset, timeZone)]
      : seasonalDaylight(localMonth(now.getTime(), timeZone));

    if (hour >= sunset || hour < sunrise) {
      return this.minBrightness;
    }

    const daylight = sunset - sunrise;
    if (daylight <= 0) {
      return this.maxBrightness;
    }

    // 0 at midday, 1 at sunrise or sunset
    const midday = (sunrise + sunset) / 2;
    const distance = Math.min(1, Math.abs(hour - midday) / (daylight / 2));
    const factor = Math.cos((distance * Math.PI) / 2);

    const brightness = Math.floor(
      this.minBrightness + (this.maxBrightness - this.minBrightness) * factor,
    );
    return Math.max(this.minBrightness, Math.min(this.maxBrightness, brightness));
  }

  start(): Result<void, OrchestratorError> {
    if (this.timer) {
      return failure(OrchestratorError.alreadyRunning());
    }

    const { config } = this.options;
    if (!config.autoBrightness) {
      logger.info(`Auto-brightness disabled, using ${this.maxBrightness}%`);
      this.options.driver.setBrightness(this.maxBrightness);
      return success(undefined);
    }

    this.update();
    this.timer = setInterval(
      () => this.update(),
      config.updateIntervalSeconds * 1000,
    );
    logger.info(
      `Auto-brightness every ${config.updateIntervalSeconds}s (${this.minBrightness}-${this.maxBrightness}%)`,
    );
    return success(undefined);
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  private update(): void {
    const sun = this.options.sunTimes?.() ?? null;
    const brightness = this.calculateBrightness(new Date(this.clock()), sun);
    if (brightness === this.options.driver.getBrightness()) {
      return;
    }
    this.options.driver.setBrightness(brightness);
    logger.debug(
      `Brightness ${brightness}% (${sun ? "sun times" : "seasonal estimate"})`,
    );
  }
}
