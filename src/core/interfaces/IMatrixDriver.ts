import { PresentedFrame } from "@core/types";

/**
 * Matrix Driver Interface
 *
 * Sink for presented frames. Each output (in-memory emulator, terminal,
 * a real LED panel) implements this with its own transport.
 */
export interface IMatrixDriver {
  /**
   * Unique identifier used for registration and configuration
   * Example: 'emulator', 'terminal'
   */
  readonly name: string;

  /**
   * Show a presented frame. Called once per tick from the render loop,
   * so implementations must not block.
   */
  show(frame: PresentedFrame): void;

  /**
   * Set panel brightness in percent (1-100)
   */
  setBrightness(percent: number): void;

  /**
   * Current brightness in percent
   */
  getBrightness(): number;

  /**
   * Release the output. The driver ignores frames afterwards.
   */
  dispose(): Promise<void>;
}
