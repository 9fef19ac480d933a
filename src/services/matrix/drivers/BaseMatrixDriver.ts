import { PresentedFrame } from "@core/types";
import { IMatrixDriver } from "@core/interfaces/IMatrixDriver";
import { BRIGHTNESS_DEFAULT_MAX } from "@core/constants/defaults";
import { getLogger } from "@utils/logger";

/**
 * Base class for matrix drivers
 *
 * Provides common functionality shared across all drivers:
 * - Brightness state
 * - Disposed state (frames are dropped after dispose)
 * - Frame counting
 * - Logging
 *
 * Subclasses implement output of a single frame.
 */
export abstract class BaseMatrixDriver implements IMatrixDriver {
  abstract readonly name: string;

  protected logger = getLogger("MatrixDriver");
  protected brightness = BRIGHTNESS_DEFAULT_MAX;
  protected disposed = false;
  protected framesShown = 0;

  show(frame: PresentedFrame): void {
    if (this.disposed) {
      return;
    }
    this.framesShown++;
    this.output(frame);
  }

  /**
   * Driver-specific output of one frame
   */
  protected abstract output(frame: PresentedFrame): void;

  setBrightness(percent: number): void {
    const clamped = Math.round(Math.min(100, Math.max(1, percent)));
    if (clamped !== this.brightness) {
      this.logger.info(`Brightness ${this.brightness}% -> ${clamped}%`);
    }
    this.brightness = clamped;
  }

  getBrightness(): number {
    return this.brightness;
  }

  getFramesShown(): number {
    return this.framesShown;
  }

  async dispose(): Promise<void> {
    if (this.disposed) {
      return;
    }
    this.logger.info(`Disposing ${this.name} driver after ${this.framesShown} frames`);
    await this.onDispose();
    this.disposed = true;
  }

  /**
   * Hook for subclasses to release their output
   */
  protected async onDispose(): Promise<void> {
    // Default: nothing to release
  }
}
