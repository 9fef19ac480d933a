import { TIMING_EPSILON_SECONDS } from "@core/constants/defaults";

/**
 * Cycles through a list of items, either on a dwell timer (advance) or
 * when the owner pulls (next). An empty carousel is valid and has no
 * current item.
 */
export class Carousel<T> {
  private items: T[] = [];
  private currentIndex = 0;
  private dwellElapsed = 0;

  /**
   * @param dwellSeconds Seconds per item for advance(); 0 or less disables the timer
   * @param keyOf Identity used by setItems() to find the current item again
   */
  constructor(
    private readonly dwellSeconds: number,
    private readonly keyOf: (item: T) => string = (item) => String(item),
  ) {}

  /**
   * Replace the items. The current item stays current when it is still in
   * the list, otherwise the carousel restarts at the first item.
   */
  setItems(items: T[]): void {
    const current = this.current();
    this.items = [...items];

    if (current !== null) {
      const key = this.keyOf(current);
      const found = this.items.findIndex((item) => this.keyOf(item) === key);
      if (found >= 0) {
        this.currentIndex = found;
        return;
      }
    }

    this.currentIndex = 0;
    this.dwellElapsed = 0;
  }

  /**
   * Run the dwell timer
   * @returns Whether the current item changed
   */
  advance(dt: number): boolean {
    if (this.items.length === 0 || this.dwellSeconds <= 0) {
      return false;
    }
    this.dwellElapsed += Math.max(0, dt);
    let moved = false;
    while (this.dwellElapsed >= this.dwellSeconds - TIMING_EPSILON_SECONDS) {
      this.dwellElapsed = Math.max(0, this.dwellElapsed - this.dwellSeconds);
      this.step();
      moved = true;
    }
    return moved;
  }

  /**
   * Move to the next item, wrapping at the end
   */
  next(): T | null {
    this.dwellElapsed = 0;
    this.step();
    return this.current();
  }

  /**
   * Back to the first item with a fresh dwell timer
   */
  reset(): void {
    this.currentIndex = 0;
    this.dwellElapsed = 0;
  }

  current(): T | null {
    if (this.items.length === 0) {
      return null;
    }
    return this.items[this.currentIndex];
  }

  get index(): number {
    return this.currentIndex;
  }

  get size(): number {
    return this.items.length;
  }

  /**
   * Seconds the current item has been shown
   */
  get elapsed(): number {
    return this.dwellElapsed;
  }

  private step(): void {
    if (this.items.length === 0) {
      return;
    }
    this.currentIndex = (this.currentIndex + 1) % this.items.length;
  }
}
