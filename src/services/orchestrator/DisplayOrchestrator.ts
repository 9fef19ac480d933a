import {
  ModuleDescriptor,
  OrchestratorStatus,
  PresentedFrame,
  Result,
  success,
  failure,
} from "@core/types";
import { IDisplayOrchestrator } from "@core/interfaces/IDisplayOrchestrator";
import {
  DisplayModule,
  IModuleAdapter,
  ModuleCacheReader,
} from "@core/interfaces/IDisplayModule";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { IMatrixDriver } from "@core/interfaces/IMatrixDriver";
import { ConfigError } from "@core/errors/ConfigError";
import { OrchestratorError } from "@core/errors/OrchestratorError";
import {
  DISPLAY_DEFAULT_MAX_CONCURRENT_REFRESHES,
  TIMING_EPSILON_SECONDS,
} from "@core/constants/defaults";
import { ModuleAdapter } from "@services/modules/ModuleAdapter";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { RefreshScheduler } from "./RefreshScheduler";

const logger = getLogger("DisplayOrchestrator");

export interface OrchestratorOptions {
  /** Refreshes allowed to run at the same time */
  maxConcurrentRefreshes?: number;

  /** Wall clock in ms since epoch */
  clock?: () => number;
}

/**
 * Display Orchestrator
 *
 * Rotates through registered modules, one active at a time, and drives
 * everything from a single tick:
 *
 * 0. Skip the active module when it has data but nothing to show
 * 1. Dispatch refreshes for every module whose interval has passed
 * 2. Render the active module (or its placeholder) into the back buffer
 * 3. Present the frame and hand it to the driver
 * 4. Advance the rotation once the module's display duration is used up
 *
 * Refreshes run in the RefreshScheduler and never block a tick. Refresh
 * and render failures are logged and never stop the loop.
 */
export class DisplayOrchestrator implements IDisplayOrchestrator {
  private readonly adapters: IModuleAdapter[] = [];
  private readonly scheduler: RefreshScheduler;
  private readonly clock: () => number;

  private activeIndex = 0;
  private elapsedInSlot = 0;
  private frames = 0;

  private timer: ReturnType<typeof setInterval> | null = null;
  private resolveRun: ((result: Result<void, OrchestratorError>) => void) | null =
    null;
  private presentCallbacks: Array<(frame: PresentedFrame) => void> = [];

  constructor(
    private readonly frameBuffer: IFrameBuffer,
    private readonly driver: IMatrixDriver | null = null,
    options: OrchestratorOptions = {},
  ) {
    this.scheduler = new RefreshScheduler(
      options.maxConcurrentRefreshes ?? DISPLAY_DEFAULT_MAX_CONCURRENT_REFRESHES,
    );
    this.clock = options.clock ?? Date.now;
  }

  register<TCache>(
    module: DisplayModule<TCache>,
    descriptor: ModuleDescriptor,
  ): Result<ModuleCacheReader<TCache>, ConfigError> {
    if (this.adapters.some((adapter) => adapter.name === descriptor.name)) {
      return failure(ConfigError.duplicateModule(descriptor.name));
    }

    const adapter = new ModuleAdapter(module, descriptor, this.clock);
    this.adapters.push(adapter);
    logger.info(
      `Registered ${descriptor.name} (refresh ${descriptor.refreshIntervalSeconds}s, display ${descriptor.displayDurationSeconds}s, stale after ${descriptor.staleAfterSeconds}s)`,
    );
    return success(adapter);
  }

  async run(tickRateHz: number): Promise<Result<void, OrchestratorError>> {
    if (this.timer !== null) {
      return failure(OrchestratorError.alreadyRunning());
    }
    if (!Number.isFinite(tickRateHz) || tickRateHz <= 0) {
      return failure(OrchestratorError.invalidTickRate(tickRateHz));
    }
    if (this.adapters.length === 0) {
      return failure(OrchestratorError.noModules());
    }

    const dt = 1 / tickRateHz;
    logger.info(
      `Starting display loop at ${tickRateHz} Hz with ${this.adapters.length} modules`,
    );

    return new Promise((resolve) => {
      this.resolveRun = resolve;
      this.timer = setInterval(() => this.safeTick(dt), 1000 / tickRateHz);
      this.safeTick(dt);
    });
  }

  stop(): Result<void, OrchestratorError> {
    if (this.timer === null) {
      return failure(OrchestratorError.notRunning());
    }

    clearInterval(this.timer);
    this.timer = null;
    logger.info(`Display loop stopped after ${this.frames} frames`);

    const resolve = this.resolveRun;
    this.resolveRun = null;
    resolve?.(success(undefined));
    return success(undefined);
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  tick(dtSeconds: number): void {
    if (this.adapters.length === 0) {
      return;
    }
    const now = this.clock();

    this.applySkipPolicy();
    this.scheduleRefreshes(now);

    const active = this.adapters[this.activeIndex];
    this.frameBuffer.clear();
    const rendered = active.render(
      this.frameBuffer,
      dtSeconds,
      this.elapsedInSlot,
      now,
    );
    if (!rendered.success) {
      logger.error(rendered.error.message);
      this.frameBuffer.clear();
    }

    const frame = this.frameBuffer.present();
    this.frames++;
    this.publish(frame);

    this.elapsedInSlot += dtSeconds;
    const duration = active.displayDuration();
    if (this.elapsedInSlot >= duration - TIMING_EPSILON_SECONDS) {
      logger.debug(
        `${active.name}: slot ended after ${this.elapsedInSlot.toFixed(2)}s (duration ${duration}s)`,
      );
      this.moveCursor();
      this.activeIndex = this.firstShowableFrom(this.activeIndex);
      this.activate();
    }
  }

  currentModule(): string | null {
    if (this.adapters.length === 0) {
      return null;
    }
    return this.adapters[this.activeIndex].name;
  }

  getStatus(): OrchestratorStatus {
    const now = this.clock();
    return {
      running: this.isRunning(),
      activeModule: this.currentModule(),
      elapsedInSlot: this.elapsedInSlot,
      frames: this.frames,
      modules: this.adapters.map((adapter, index) =>
        adapter.getStatus(now, index === this.activeIndex),
      ),
    };
  }

  onPresent(callback: (frame: PresentedFrame) => void): () => void {
    this.presentCallbacks.push(callback);
    return () => {
      this.presentCallbacks = this.presentCallbacks.filter(
        (cb) => cb !== callback,
      );
    };
  }

  /**
   * Wait for every dispatched refresh to finish
   */
  async drainRefreshes(): Promise<void> {
    await this.scheduler.drain();
  }

  /**
   * Move past modules that have data but nothing to show, without giving
   * them screen time. When every module is in that state the cursor stays
   * put and the active module draws its empty frame.
   */
  private applySkipPolicy(): void {
    const index = this.firstShowableFrom(this.activeIndex);
    if (index !== this.activeIndex) {
      this.activeIndex = index;
      this.activate();
    }
  }

  /**
   * First module at or after start (wrapping, at most N-1 steps) that is
   * not skippable. Returns start when every module is skippable.
   */
  private firstShowableFrom(start: number): number {
    const count = this.adapters.length;
    if (!this.adapters[start].isSkippable()) {
      return start;
    }

    for (let step = 1; step < count; step++) {
      const index = (start + step) % count;
      if (!this.adapters[index].isSkippable()) {
        logger.debug(
          `Skipping ${step} module(s) with nothing to show, landing on ${this.adapters[index].name}`,
        );
        return index;
      }
    }
    return start;
  }

  private scheduleRefreshes(now: number): void {
    for (const adapter of this.adapters) {
      if (adapter.isEligible(now)) {
        this.scheduler.dispatch(adapter, now);
      }
    }
  }

  private moveCursor(): void {
    this.activeIndex = (this.activeIndex + 1) % this.adapters.length;
  }

  /**
   * Start a fresh slot for the module under the cursor
   */
  private activate(): void {
    this.elapsedInSlot = 0;
    const active = this.adapters[this.activeIndex];
    try {
      active.resetAnimation();
    } catch (error) {
      logger.error(
        `${active.name}: resetAnimation failed: ${toError(error).message}`,
      );
    }
    logger.info(`Switched to ${active.name}`);
  }

  private publish(frame: PresentedFrame): void {
    if (this.driver) {
      try {
        this.driver.show(frame);
      } catch (error) {
        logger.error(`Driver ${this.driver.name} failed: ${toError(error).message}`);
      }
    }
    for (const callback of this.presentCallbacks) {
      try {
        callback(frame);
      } catch (error) {
        logger.error(`Present callback failed: ${toError(error).message}`);
      }
    }
  }

  private safeTick(dt: number): void {
    try {
      this.tick(dt);
    } catch (error) {
      logger.error(`Tick failed: ${toError(error).message}`);
    }
  }
}
