import { PresentedFrame, Result, failure } from "@core/types";
import { DisplayError } from "@core/errors/DisplayError";
import { encodeFramePng, dimChannel } from "../FrameEncoder";
import { BaseMatrixDriver } from "./BaseMatrixDriver";
import { getLogger } from "@utils/logger";

/**
 * In-memory matrix for development and tests.
 *
 * Keeps a copy of the last shown frame with brightness applied, and
 * converts it to PNG on request.
 */
export class EmulatorMatrixDriver extends BaseMatrixDriver {
  readonly name = "emulator";

  private lastFrame: PresentedFrame | null = null;

  constructor() {
    super();
    this.logger = getLogger("EmulatorMatrixDriver");
  }

  protected output(frame: PresentedFrame): void {
    const data = new Uint8Array(frame.data.length);
    for (let i = 0; i < frame.data.length; i++) {
      data[i] = dimChannel(frame.data[i], this.brightness);
    }
    this.lastFrame = { ...frame, data };
  }

  /**
   * Last shown frame as the panel would emit it
   */
  getLastFrame(): PresentedFrame | null {
    return this.lastFrame;
  }

  /**
   * Last shown frame as PNG
   */
  async getDisplayPng(scale = 1): Promise<Result<Buffer, DisplayError>> {
    if (!this.lastFrame) {
      return failure(DisplayError.noFrame());
    }
    return encodeFramePng(this.lastFrame, scale);
  }

  protected async onDispose(): Promise<void> {
    this.lastFrame = null;
  }
}
