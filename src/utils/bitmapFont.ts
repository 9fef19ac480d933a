import { z } from "zod";
import fontData from "@assets/font4x6.json";
import { RGB } from "@core/types";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";

/**
 * Fixed-width bitmap font for the LED matrix.
 *
 * Glyphs are 3x5 pixels on a 4x6 cell, so every character advances 4 px
 * and a line takes 6 px. Rows are stored as "0"/"1" strings in
 * assets/font4x6.json. Lowercase letters draw as uppercase; characters
 * without a glyph draw as the fallback glyph.
 */

const fontSchema = z.object({
  glyphWidth: z.number().int().positive(),
  glyphHeight: z.number().int().positive(),
  advance: z.number().int().positive(),
  lineHeight: z.number().int().positive(),
  fallback: z.string().length(1),
  glyphs: z.record(z.string(), z.array(z.string().regex(/^[01]+$/))),
});

const font = fontSchema.parse(fontData);

/** Horizontal advance per character in pixels */
export const GLYPH_ADVANCE = font.advance;

/** Height of one text line in pixels */
export const LINE_HEIGHT = font.lineHeight;

/** Height of the drawn part of a glyph in pixels */
export const GLYPH_HEIGHT = font.glyphHeight;

export interface BitmapTextOptions {
  /** Integer scale factor (default 1) */
  scale?: number;
}

/**
 * Glyph rows for a character, after case folding and fallback
 */
export function getGlyph(char: string): string[] {
  return (
    font.glyphs[char] ??
    font.glyphs[char.toUpperCase()] ??
    font.glyphs[font.fallback] ??
    []
  );
}

/**
 * Width of a string in pixels, including the gap after the last glyph
 */
export function calculateBitmapTextWidth(text: string, scale = 1): number {
  return Array.from(text).length * font.advance * scale;
}

/**
 * Height of one line in pixels
 */
export function calculateBitmapTextHeight(scale = 1): number {
  return font.lineHeight * scale;
}

/**
 * Draw text with its top-left corner at (x, y). Pixels outside the frame
 * are clipped by the frame buffer.
 *
 * @returns x position after the last character
 */
export function renderBitmapText(
  frame: IFrameBuffer,
  text: string,
  x: number,
  y: number,
  color: RGB,
  options: BitmapTextOptions = {},
): number {
  const scale = Math.max(1, Math.floor(options.scale ?? 1));
  const { width } = frame.dimensions();
  let cursorX = x;

  for (const char of Array.from(text)) {
    // Skip glyphs entirely off the right edge
    if (cursorX >= width) {
      cursorX += font.advance * scale;
      continue;
    }

    const rows = getGlyph(char);
    rows.forEach((row, rowIndex) => {
      for (let col = 0; col < row.length; col++) {
        if (row[col] !== "1") continue;
        const px = cursorX + col * scale;
        const py = y + rowIndex * scale;
        if (scale === 1) {
          frame.setPixel(px, py, color);
        } else {
          frame.fillRect(px, py, scale, scale, color);
        }
      }
    });

    cursorX += font.advance * scale;
  }

  return cursorX;
}

/**
 * Draw text horizontally centred in the frame
 */
export function renderCenteredText(
  frame: IFrameBuffer,
  text: string,
  y: number,
  color: RGB,
): void {
  const { width } = frame.dimensions();
  // The trailing gap is not part of the visible text
  const textWidth = calculateBitmapTextWidth(text) - 1;
  renderBitmapText(frame, text, Math.floor((width - textWidth) / 2), y, color);
}

/**
 * Cut text to the number of characters that fit in maxWidth pixels
 */
export function truncateToWidth(text: string, maxWidth: number): string {
  const maxChars = Math.max(0, Math.floor((maxWidth + 1) / font.advance));
  const chars = Array.from(text);
  return chars.length <= maxChars ? text : chars.slice(0, maxChars).join("");
}
