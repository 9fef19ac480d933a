/**
 * Phases of a text ticker
 */
export enum ScrollPhase {
  /** Text drawn left-aligned at offset 0 while the settle timer runs */
  HOLD_LEFT = "hold_left",

  /** Offset grows by speed * dt every tick */
  SCROLLING = "scrolling",

  /** Whole text has left the left edge; waiting for the owner to pull */
  DONE = "done",
}

/**
 * Immutable state of one ticker instance
 */
export type ScrollState = {
  /** Text being scrolled */
  text: string;

  /** Rendered width of the text in pixels */
  textWidth: number;

  /** Current phase */
  phase: ScrollPhase;

  /** Horizontal offset in pixels; real-valued, never rounded */
  offset: number;

  /** Seconds spent in HOLD_LEFT */
  holdElapsed: number;
};

/**
 * Tuning for the scroll step
 */
export type ScrollParams = {
  /** Seconds to hold the text at the left edge before scrolling */
  settleSeconds: number;

  /** Scroll speed in pixels per second */
  speedPxPerSecond: number;
};
