import sharp from "sharp";
import { RawImage } from "@core/types";

/** Largest logo drawn beside the score */
export const LOGO_MAX_WIDTH = 18;
export const LOGO_MAX_HEIGHT = 28;

/**
 * Decode a team logo into packed RGB that fits the logo box.
 * Transparent areas become black, which blit() treats as transparent.
 */
export async function decodeLogo(
  input: Buffer,
  maxWidth: number = LOGO_MAX_WIDTH,
  maxHeight: number = LOGO_MAX_HEIGHT,
): Promise<RawImage> {
  const { data, info } = await sharp(input)
    .flatten({ background: { r: 0, g: 0, b: 0 } })
    .resize(maxWidth, maxHeight, { fit: "inside", kernel: "lanczos3" })
    .removeAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  return {
    width: info.width,
    height: info.height,
    data: new Uint8Array(data),
  };
}
