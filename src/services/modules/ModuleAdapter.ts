import {
  ModuleDescriptor,
  ModuleStatus,
  PlaceholderKind,
  RefreshOutcome,
  Result,
  success,
  failure,
} from "@core/types";
import {
  DisplayModule,
  IModuleAdapter,
  ModuleCacheReader,
} from "@core/interfaces/IDisplayModule";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { FetchError } from "@core/errors/FetchError";
import { RenderError } from "@core/errors/RenderError";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { renderPlaceholder } from "./placeholder";

const logger = getLogger("ModuleAdapter");

/**
 * Cache held by an adapter together with the dispatch that produced it
 */
type CacheEntry<TCache> = {
  value: TCache;
  version: number;
};

/**
 * Wraps a DisplayModule with its descriptor and refresh bookkeeping.
 *
 * completeRefresh() is the only writer of the cache. Every dispatch gets
 * a version; a result is applied only when its version is newer than the
 * cache it would replace, so a slow refresh cannot overwrite a faster,
 * later one.
 */
export class ModuleAdapter<TCache>
  implements IModuleAdapter, ModuleCacheReader<TCache>
{
  readonly name: string;

  private cached: CacheEntry<TCache> | null = null;
  private dispatchVersion = 0;
  private lastDispatchAt: number | null = null;
  private lastSuccessAt: number | null = null;
  private stale = false;
  private lastError: FetchError | null = null;

  constructor(
    private readonly module: DisplayModule<TCache>,
    readonly descriptor: ModuleDescriptor,
    private readonly clock: () => number = Date.now,
  ) {
    this.name = descriptor.name;
  }

  beginRefresh(now: number): number {
    this.dispatchVersion++;
    this.lastDispatchAt = now;
    return this.dispatchVersion;
  }

  async executeRefresh(version: number): Promise<RefreshOutcome> {
    let result: Result<TCache, FetchError>;
    try {
      result = await this.module.refresh();
    } catch (error) {
      result = failure(FetchError.fromUnknown(this.name, toError(error)));
    }
    return this.completeRefresh(version, result, this.clock());
  }

  /**
   * Hand a refresh result back to the adapter
   */
  completeRefresh(
    version: number,
    result: Result<TCache, FetchError>,
    now: number,
  ): RefreshOutcome {
    const currentVersion = this.cached?.version ?? 0;

    if (version <= currentVersion) {
      logger.debug(
        `${this.name}: discarding refresh v${version}, cache is at v${currentVersion}`,
      );
      return "discarded";
    }

    if (!result.success) {
      this.stale = true;
      this.lastError = result.error;
      logger.warn(`${this.name}: refresh v${version} failed: ${result.error.message}`);
      return "failed";
    }

    this.cached = { value: result.data, version };
    this.lastSuccessAt = now;
    this.stale = false;
    this.lastError = null;
    logger.debug(`${this.name}: applied refresh v${version}`);
    return "applied";
  }

  isEligible(now: number): boolean {
    if (this.lastDispatchAt === null) {
      return true;
    }
    return (
      now - this.lastDispatchAt >= this.descriptor.refreshIntervalSeconds * 1000
    );
  }

  isSkippable(): boolean {
    if (!this.cached) {
      return false;
    }
    try {
      return !this.module.hasContent(this.cached.value);
    } catch (error) {
      logger.error(`${this.name}: hasContent failed: ${toError(error).message}`);
      return false;
    }
  }

  isDegraded(now: number): boolean {
    if (this.lastSuccessAt === null) {
      return false;
    }
    return now - this.lastSuccessAt > this.descriptor.staleAfterSeconds * 1000;
  }

  hasData(): boolean {
    return this.cached !== null;
  }

  /**
   * Current cache, or null before the first successful refresh
   */
  getCache(): TCache | null {
    return this.cached ? this.cached.value : null;
  }

  placeholderKind(now: number): PlaceholderKind | null {
    if (!this.cached) {
      return "loading";
    }
    return this.isDegraded(now) ? "stale" : null;
  }

  displayDuration(): number {
    if (!this.cached) {
      return this.descriptor.displayDurationSeconds;
    }
    try {
      return this.module.displayDuration(this.cached.value);
    } catch (error) {
      logger.error(
        `${this.name}: displayDuration failed: ${toError(error).message}`,
      );
      return this.descriptor.displayDurationSeconds;
    }
  }

  render(
    frame: IFrameBuffer,
    dt: number,
    elapsedInSlot: number,
    now: number,
  ): Result<void, RenderError> {
    try {
      const kind = this.placeholderKind(now);
      if (kind !== null || !this.cached) {
        this.drawPlaceholder(frame, kind ?? "loading");
      } else {
        this.module.render(frame, {
          cache: this.cached.value,
          dt,
          elapsedInSlot,
          now,
        });
      }
      return success(undefined);
    } catch (error) {
      return failure(RenderError.drawFailed(this.name, toError(error)));
    }
  }

  resetAnimation(): void {
    this.module.resetAnimation();
  }

  getStatus(now: number, active: boolean): ModuleStatus {
    return {
      name: this.name,
      active,
      stale: this.stale,
      placeholder: this.placeholderKind(now),
      version: this.cached?.version ?? 0,
      lastSuccessAt: this.lastSuccessAt,
      lastDispatchAt: this.lastDispatchAt,
      lastError: this.lastError?.message ?? null,
      hasContent: this.cached !== null && !this.isSkippable(),
    };
  }

  private drawPlaceholder(frame: IFrameBuffer, kind: PlaceholderKind): void {
    if (this.module.renderPlaceholder) {
      this.module.renderPlaceholder(frame, kind);
    } else {
      renderPlaceholder(frame, this.name, kind);
    }
  }
}
