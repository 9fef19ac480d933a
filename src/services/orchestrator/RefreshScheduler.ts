import { IModuleAdapter } from "@core/interfaces/IDisplayModule";
import { DISPLAY_DEFAULT_MAX_CONCURRENT_REFRESHES } from "@core/constants/defaults";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";

const logger = getLogger("RefreshScheduler");

/**
 * A dispatched refresh waiting for a free slot
 */
type RefreshJob = {
  adapter: IModuleAdapter;
  version: number;
};

/**
 * Runs module refreshes off the render path with bounded concurrency.
 *
 * dispatch() never blocks: the job either starts at once or waits in a
 * FIFO queue. A module has at most one running and one queued job, and its
 * queued job starts only once the running one settles, so a slow source
 * holds a single slot however often it comes due.
 */
export class RefreshScheduler {
  private readonly queue: RefreshJob[] = [];
  private readonly inFlight = new Set<Promise<void>>();
  private readonly runningModules = new Set<string>();
  private running = 0;

  constructor(
    private readonly maxConcurrent: number = DISPLAY_DEFAULT_MAX_CONCURRENT_REFRESHES,
  ) {}

  /**
   * Dispatch a refresh for a module
   * @returns false when the module already has a queued job
   */
  dispatch(adapter: IModuleAdapter, now: number): boolean {
    if (this.isQueued(adapter.name)) {
      logger.debug(`${adapter.name}: refresh already queued`);
      return false;
    }

    const version = adapter.beginRefresh(now);
    this.queue.push({ adapter, version });
    logger.debug(`${adapter.name}: dispatched refresh v${version}`);
    this.pump();
    return true;
  }

  isQueued(name: string): boolean {
    return this.queue.some((job) => job.adapter.name === name);
  }

  getQueueLength(): number {
    return this.queue.length;
  }

  getActiveCount(): number {
    return this.running;
  }

  /**
   * Wait until every running and queued refresh has finished
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  isRefreshing(name: string): boolean {
    return this.runningModules.has(name);
  }

  private pump(): void {
    while (this.running < Math.max(1, this.maxConcurrent)) {
      const index = this.queue.findIndex(
        (job) => !this.runningModules.has(job.adapter.name),
      );
      if (index < 0) {
        return;
      }
      const [job] = this.queue.splice(index, 1);
      this.start(job);
    }
  }

  private start(job: RefreshJob): void {
    this.running++;
    this.runningModules.add(job.adapter.name);
    logger.time(`${job.adapter.name} refresh v${job.version}`);

    const task: Promise<void> = job.adapter
      .executeRefresh(job.version)
      .then((outcome) => {
        logger.timeEnd(`${job.adapter.name} refresh v${job.version}`);
        logger.debug(`${job.adapter.name}: refresh v${job.version} ${outcome}`);
      })
      .catch((error: unknown) => {
        logger.error(
          `${job.adapter.name}: refresh v${job.version} crashed: ${toError(error).message}`,
        );
      })
      .finally(() => {
        this.running--;
        this.runningModules.delete(job.adapter.name);
        this.inFlight.delete(task);
        this.pump();
      });

    this.inFlight.add(task);
  }
}
