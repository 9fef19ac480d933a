import { ScrollParams, ScrollPhase, ScrollState } from "@core/types";
import { calculateBitmapTextWidth } from "@utils/bitmapFont";

/**
 * Fresh ticker state: text held left-aligned at offset 0
 */
export function createScrollState(
  text: string,
  textWidth: number = calculateBitmapTextWidth(text),
): ScrollState {
  return {
    text,
    textWidth,
    phase: ScrollPhase.HOLD_LEFT,
    offset: 0,
    holdElapsed: 0,
  };
}

/**
 * Advance a ticker by dt seconds.
 *
 * HOLD_LEFT -> SCROLLING once the settle time has elapsed; time left over
 * in the same step is spent scrolling. SCROLLING -> DONE once the whole
 * text has left the left edge. DONE never changes.
 *
 * The offset is kept as a real number; rounding happens only in drawX().
 */
export function stepScroll(
  state: ScrollState,
  dt: number,
  params: ScrollParams,
): ScrollState {
  let { phase, offset, holdElapsed } = state;
  let remaining = Math.max(0, dt);

  if (phase === ScrollPhase.DONE) {
    return state;
  }

  if (phase === ScrollPhase.HOLD_LEFT) {
    holdElapsed += remaining;
    if (holdElapsed < params.settleSeconds) {
      return { ...state, holdElapsed };
    }
    remaining = holdElapsed - params.settleSeconds;
    phase = ScrollPhase.SCROLLING;
  }

  offset += params.speedPxPerSecond * remaining;
  if (offset >= state.textWidth) {
    phase = ScrollPhase.DONE;
  }

  return { ...state, phase, offset, holdElapsed };
}

/**
 * Left edge of the text for a ticker drawn at originX
 */
export function drawX(state: ScrollState, originX: number): number {
  return originX - Math.round(state.offset);
}

/**
 * Stateful wrapper around stepScroll() owned by a module.
 *
 * @example
 * ```typescript
 * const ticker = new TextTicker({ settleSeconds: 1.5, speedPxPerSecond: 20 });
 * ticker.setText("BREAKING NEWS");
 * ticker.advance(context.dt);
 * renderBitmapText(frame, ticker.getText(), ticker.drawX(0), 10, Colors.WHITE);
 * if (ticker.isDone()) carousel.next();
 * ```
 */
export class TextTicker {
  private state: ScrollState;

  constructor(
    private readonly params: ScrollParams,
    private readonly measure: (text: string) => number = calculateBitmapTextWidth,
  ) {
    this.state = createScrollState("", 0);
  }

  /**
   * Assign text. A different text restarts from HOLD_LEFT; the same text
   * leaves the animation untouched.
   * @returns Whether the text changed
   */
  setText(text: string): boolean {
    if (text === this.state.text) {
      return false;
    }
    this.state = createScrollState(text, this.measure(text));
    return true;
  }

  /**
   * Restart the current text from HOLD_LEFT
   */
  reset(): void {
    this.state = createScrollState(this.state.text, this.state.textWidth);
  }

  advance(dt: number): ScrollState {
    this.state = stepScroll(this.state, dt, this.params);
    return this.state;
  }

  isDone(): boolean {
    return this.state.phase === ScrollPhase.DONE;
  }

  drawX(originX: number): number {
    return drawX(this.state, originX);
  }

  getText(): string {
    return this.state.text;
  }

  getState(): ScrollState {
    return this.state;
  }
}
