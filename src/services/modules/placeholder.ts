import { Colors, PlaceholderKind } from "@core/types";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { renderCenteredText, truncateToWidth } from "@utils/bitmapFont";

/**
 * Status line for each placeholder kind
 */
export const PLACEHOLDER_TEXT: Record<PlaceholderKind, string> = {
  loading: "LOADING",
  stale: "NO DATA",
};

/**
 * Default placeholder: module title on the upper half, status below
 */
export function renderPlaceholder(
  frame: IFrameBuffer,
  title: string,
  kind: PlaceholderKind,
): void {
  const { width, height } = frame.dimensions();
  const top = Math.max(0, Math.floor(height / 2) - 8);

  renderCenteredText(
    frame,
    truncateToWidth(title.toUpperCase(), width),
    top,
    Colors.DIM,
  );
  renderCenteredText(
    frame,
    PLACEHOLDER_TEXT[kind],
    top + 10,
    kind === "loading" ? Colors.WHITE : Colors.ORANGE,
  );
}
