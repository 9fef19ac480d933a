import {
  ModuleDescriptor,
  ModuleStatus,
  PlaceholderKind,
  RefreshOutcome,
  RenderContext,
  Result,
} from "@core/types";
import { FetchError, RenderError } from "@core/errors";
import { IFrameBuffer } from "./IFrameBuffer";

/**
 * Capability set of an information module.
 *
 * Modules fetch on refresh() and draw on render(); the orchestrator owns
 * scheduling, caching and rotation. Any object with these members can be
 * registered, no base class is required.
 */
export interface DisplayModule<TCache> {
  /**
   * Unique module name
   */
  readonly name: string;

  /**
   * Fetch fresh data and return a complete new cache.
   * Must not touch state that render() reads.
   */
  refresh(): Promise<Result<TCache, FetchError>>;

  /**
   * Draw the current frame from context.cache and advance the module's
   * own animation state by context.dt. No I/O.
   */
  render(frame: IFrameBuffer, context: RenderContext<TCache>): void;

  /**
   * Seconds this module wants to stay on screen, asked every tick
   */
  displayDuration(cache: TCache): number;

  /**
   * False when there is nothing worth showing; the module is then skipped
   */
  hasContent(cache: TCache): boolean;

  /**
   * Restart tickers and carousels from their first, fully visible frame
   */
  resetAnimation(): void;

  /**
   * Draw the loading or stale placeholder. When absent the shared
   * title + status placeholder is used.
   */
  renderPlaceholder?(frame: IFrameBuffer, kind: PlaceholderKind): void;
}

/**
 * Read access to the cache a registered module last had applied
 */
export interface ModuleCacheReader<TCache> {
  readonly name: string;
  getCache(): TCache | null;
}

/**
 * What the orchestrator and the refresh scheduler see of a registered
 * module. The cache type stays inside the adapter.
 */
export interface IModuleAdapter {
  readonly name: string;
  readonly descriptor: ModuleDescriptor;

  /**
   * Record a dispatch and return its version
   */
  beginRefresh(now: number): number;

  /**
   * Run the module's refresh() for a dispatched version and hand the
   * result back. Never rejects.
   */
  executeRefresh(version: number): Promise<RefreshOutcome>;

  /**
   * Never dispatched, or the refresh interval has passed since the last
   * dispatch
   */
  isEligible(now: number): boolean;

  /**
   * Has a successful cache for which hasContent() is false
   */
  isSkippable(): boolean;

  /**
   * Last success is older than the stale window
   */
  isDegraded(now: number): boolean;

  /**
   * At least one refresh has succeeded
   */
  hasData(): boolean;

  /**
   * Placeholder that render() would draw at this time, or null for content
   */
  placeholderKind(now: number): PlaceholderKind | null;

  /**
   * Slot length for the current cache; the configured base duration while
   * there is no data
   */
  displayDuration(): number;

  /**
   * Draw into the back buffer: placeholder or module content
   */
  render(
    frame: IFrameBuffer,
    dt: number,
    elapsedInSlot: number,
    now: number,
  ): Result<void, RenderError>;

  resetAnimation(): void;

  getStatus(now: number, active: boolean): ModuleStatus;
}
