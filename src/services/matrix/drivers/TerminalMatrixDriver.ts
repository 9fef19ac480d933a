import { PresentedFrame } from "@core/types";
import { dimChannel } from "../FrameEncoder";
import { BaseMatrixDriver } from "./BaseMatrixDriver";
import { getLogger } from "@utils/logger";

/** Upper half block: foreground paints the top pixel, background the bottom */
const HALF_BLOCK = "▀";
const ESC = "\u001b[";

/**
 * Anything text can be written to, such as process.stdout
 */
export interface TextSink {
  write(text: string): unknown;
}

export interface TerminalDriverOptions {
  /** Output stream (default process.stdout) */
  stream?: TextSink;

  /** Frames per second written to the terminal (default 10) */
  maxFps?: number;

  clock?: () => number;
}

/**
 * Draws frames in a truecolor terminal, two matrix rows per text line.
 * Output is throttled so a fast render loop does not flood the terminal.
 */
export class TerminalMatrixDriver extends BaseMatrixDriver {
  readonly name = "terminal";

  private readonly stream: TextSink;
  private readonly minIntervalMs: number;
  private readonly clock: () => number;
  private lastWriteAt: number | null = null;

  constructor(options: TerminalDriverOptions = {}) {
    super();
    this.logger = getLogger("TerminalMatrixDriver");
    this.stream = options.stream ?? process.stdout;
    this.minIntervalMs = 1000 / Math.max(1, options.maxFps ?? 10);
    this.clock = options.clock ?? Date.now;
  }

  protected output(frame: PresentedFrame): void {
    const now = this.clock();
    if (this.lastWriteAt !== null && now - this.lastWriteAt < this.minIntervalMs) {
      return;
    }
    this.lastWriteAt = now;
    this.stream.write(this.renderAnsi(frame));
  }

  /**
   * ANSI text for one frame, starting with a cursor-home sequence
   */
  renderAnsi(frame: PresentedFrame): string {
    const lines: string[] = [];
    for (let y = 0; y < frame.height; y += 2) {
      let line = "";
      for (let x = 0; x < frame.width; x++) {
        const [tr, tg, tb] = this.pixel(frame, x, y);
        const [br, bg, bb] =
          y + 1 < frame.height ? this.pixel(frame, x, y + 1) : [0, 0, 0];
        line += `${ESC}38;2;${tr};${tg};${tb}m${ESC}48;2;${br};${bg};${bb}m${HALF_BLOCK}`;
      }
      lines.push(`${line}${ESC}0m`);
    }
    return `${ESC}H${lines.join("\n")}\n`;
  }

  private pixel(
    frame: PresentedFrame,
    x: number,
    y: number,
  ): [number, number, number] {
    const offset = (y * frame.width + x) * 3;
    return [
      dimChannel(frame.data[offset], this.brightness),
      dimChannel(frame.data[offset + 1], this.brightness),
      dimChannel(frame.data[offset + 2], this.brightness),
    ];
  }

  protected async onDispose(): Promise<void> {
    // Reset colours and move below the drawing
    this.stream.write(`${ESC}0m\n`);
  }
}
