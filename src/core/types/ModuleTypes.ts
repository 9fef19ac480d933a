import { PlaceholderKind } from "./DisplayTypes";

/**
 * What the orchestrator passes to a module's render() every tick
 */
export type RenderContext<TCache> = {
  /** Latest successfully refreshed cache */
  cache: TCache;

  /** Seconds since the previous tick; modules advance animations by this */
  dt: number;

  /** Seconds the module has been active in the current slot */
  elapsedInSlot: number;

  /** Wall-clock time of this tick (ms since epoch) */
  now: number;
};

/**
 * Static description of a registered module, built from configuration
 */
export type ModuleDescriptor = {
  /** Unique module name */
  name: string;

  /** Seconds between refreshes */
  refreshIntervalSeconds: number;

  /** Base slot length in seconds */
  displayDurationSeconds: number;

  /** Seconds without a successful refresh before the placeholder is shown */
  staleAfterSeconds: number;
};

/**
 * Outcome of handing a refresh result back to an adapter
 */
export type RefreshOutcome = "applied" | "discarded" | "failed";

/**
 * Snapshot of a module for logs and the preview endpoint
 */
export type ModuleStatus = {
  name: string;
  active: boolean;
  /** Last refresh attempt failed */
  stale: boolean;
  /** Rendering a placeholder instead of cached data */
  placeholder: PlaceholderKind | null;
  /** Version of the cache currently held */
  version: number;
  /** Successful refresh timestamp (ms since epoch) */
  lastSuccessAt: number | null;
  /** Most recent refresh dispatch timestamp (ms since epoch) */
  lastDispatchAt: number | null;
  /** Message of the last refresh failure */
  lastError: string | null;
  /** Whether the module currently has something to show */
  hasContent: boolean;
};

/**
 * Orchestrator status snapshot
 */
export type OrchestratorStatus = {
  running: boolean;
  activeModule: string | null;
  elapsedInSlot: number;
  frames: number;
  modules: ModuleStatus[];
};
