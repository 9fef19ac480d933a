import sharp from "sharp";
import { RawImage, Result, success, failure } from "@core/types";
import { DisplayError } from "@core/errors/DisplayError";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("FrameEncoder");

/**
 * Encode a frame as PNG, enlarged with nearest-neighbour scaling so each
 * LED becomes a visible square.
 *
 * The pixel data is copied before the first await, so the caller may
 * reuse the source buffer immediately.
 */
export async function encodeFramePng(
  frame: RawImage,
  scale = 1,
): Promise<Result<Buffer, DisplayError>> {
  const input = Buffer.from(frame.data);
  const factor = Math.max(1, Math.floor(scale));

  try {
    let pipeline = sharp(input, {
      raw: { width: frame.width, height: frame.height, channels: 3 },
    });
    if (factor > 1) {
      pipeline = pipeline.resize(frame.width * factor, frame.height * factor, {
        kernel: "nearest",
      });
    }
    const png = await pipeline.png().toBuffer();
    logger.debug(`Encoded ${frame.width}x${frame.height} frame: ${png.length} bytes`);
    return success(png);
  } catch (error) {
    const err = toError(error);
    logger.error(`Failed to encode frame: ${err.message}`);
    return failure(DisplayError.encodeFailed(err));
  }
}

/**
 * Scale a colour channel by a brightness percentage
 */
export function dimChannel(value: number, brightnessPercent: number): number {
  const factor = Math.min(100, Math.max(0, brightnessPercent)) / 100;
  return Math.round(value * factor);
}
