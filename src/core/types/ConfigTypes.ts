import { MatrixDriverType } from "./DisplayTypes";

/**
 * Auto-brightness settings
 */
export type BrightnessConfig = {
  /** Follow the sun; when false maxBrightness is applied once */
  autoBrightness: boolean;

  /** Night-time brightness (1-100) */
  minBrightness: number;

  /** Midday brightness (1-100) */
  maxBrightness: number;

  /** Seconds between brightness updates */
  updateIntervalSeconds: number;
};

/**
 * Matrix and render loop settings
 */
export type DisplayConfig = {
  /** Matrix width in pixels */
  width: number;

  /** Matrix height in pixels */
  height: number;

  /** Render loop frequency */
  tickRateHz: number;

  /** Driver used to show presented frames */
  driver: MatrixDriverType;

  /** Upper bound on refreshes running at the same time */
  maxConcurrentRefreshes: number;

  brightness: BrightnessConfig;
};

/**
 * Text ticker settings shared by all modules
 */
export type ScrollConfig = {
  settleSeconds: number;
  speedPxPerSecond: number;
};

/**
 * Read-only preview server
 */
export type PreviewConfig = {
  enabled: boolean;
  host: string;
  port: number;
};

/**
 * Where the display lives
 */
export type LocationConfig = {
  /** IANA time zone used for game times */
  timezone: string;
  latitude: number;
  longitude: number;
};

// ----------------------------------------------------------------------------
// Module configuration
// ----------------------------------------------------------------------------

/**
 * Fields every module entry carries
 */
type BaseModuleConfig = {
  /** Unique name used for rotation and logs */
  name: string;

  /** Disabled modules are not registered */
  enabled: boolean;

  refreshIntervalSeconds: number;
  displayDurationSeconds: number;

  /** Defaults to 3x refreshIntervalSeconds */
  staleAfterSeconds?: number;
};

/**
 * Leagues with a scoreboard feed
 */
export const SPORTS_LEAGUES = ["NBA", "NFL", "WNBA", "NHL", "MLB"] as const;

export type SportsLeague = (typeof SPORTS_LEAGUES)[number];

export type SportsModuleParams = {
  leagues: SportsLeague[];

  /** Team abbreviations or names per league; empty shows every game */
  favoriteTeams: Record<string, string[]>;

  /** Seconds each game stays on screen */
  gameDwellSeconds: number;

  /** Games further out than this are dropped */
  lookaheadDays: number;

  /** Fetch and draw team logos */
  showLogos: boolean;
};

export type TransitModuleParams = {
  addresses: string[];

  /** Predictions API key */
  apiKey: string;

  /** Seconds each stop stays on screen */
  stopDwellSeconds: number;

  /** Search radius around each address in feet */
  searchRadiusFeet: number;
};

export type BikeShareModuleParams = {
  /** Station names as published by the operator */
  stations: string[];

  regionCode: string;

  /** Seconds each station stays on screen */
  stationDwellSeconds: number;

  /** E-bikes with less range than this are not counted */
  minRangeMiles: number;
};

export type WeatherModuleParams = {
  /** Header drawn above the temperature */
  title: string;
};

export type NewsSourceConfig = {
  /** Short tag drawn beside the headline */
  key: string;
  name: string;
  url: string;
};

export type NewsModuleParams = {
  sources: NewsSourceConfig[];

  /** Headlines kept per source */
  maxHeadlinesPerSource: number;
};

export type SportsModuleConfig = BaseModuleConfig & {
  type: "sports";
  params: SportsModuleParams;
};

export type TransitModuleConfig = BaseModuleConfig & {
  type: "transit";
  params: TransitModuleParams;
};

export type BikeShareModuleConfig = BaseModuleConfig & {
  type: "bikeshare";
  params: BikeShareModuleParams;
};

export type WeatherModuleConfig = BaseModuleConfig & {
  type: "weather";
  params: WeatherModuleParams;
};

export type NewsModuleConfig = BaseModuleConfig & {
  type: "news";
  params: NewsModuleParams;
};

/**
 * One entry of the ordered module list
 */
export type ModuleConfig =
  | SportsModuleConfig
  | TransitModuleConfig
  | BikeShareModuleConfig
  | WeatherModuleConfig
  | NewsModuleConfig;

export type ModuleType = ModuleConfig["type"];

/**
 * Complete application configuration
 */
export type AppConfig = {
  display: DisplayConfig;
  scroll: ScrollConfig;
  preview: PreviewConfig;
  location: LocationConfig;

  /** Rotation order */
  modules: ModuleConfig[];
};
