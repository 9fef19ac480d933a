import { z } from "zod";
import iconData from "@assets/icons.json";
import { RGB } from "@core/types";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";

/**
 * Small monochrome icons drawn in a single colour.
 * Rows are "0"/"1" strings in assets/icons.json.
 */

const iconSchema = z.array(z.string().regex(/^[01]+$/)).min(1);

const iconsSchema = z.object({
  sunny: iconSchema,
  cloudy: iconSchema,
  rainy: iconSchema,
  night: iconSchema,
  wheel: iconSchema,
  bolt: iconSchema,
  boltPlus: iconSchema,
  dock: iconSchema,
});

const icons = iconsSchema.parse(iconData);

export type IconName = keyof typeof icons;

/**
 * Icon rows by name
 */
export function getIcon(name: IconName): string[] {
  return icons[name];
}

/**
 * Draw an icon with its top-left corner at (x, y)
 */
export function renderIcon(
  frame: IFrameBuffer,
  name: IconName,
  x: number,
  y: number,
  color: RGB,
): void {
  icons[name].forEach((row, rowIndex) => {
    for (let col = 0; col < row.length; col++) {
      if (row[col] === "1") {
        frame.setPixel(x + col, y + rowIndex, color);
      }
    }
  });
}
