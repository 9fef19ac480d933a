import { RawImage } from "./DisplayTypes";

// ----------------------------------------------------------------------------
// Sports
// ----------------------------------------------------------------------------

/**
 * Normalised game state
 */
export enum GameStatus {
  IN_PROGRESS = "in_progress",
  SCHEDULED = "scheduled",
  FINAL = "final",
  POSTPONED = "postponed",
  CANCELED = "canceled",
  OTHER = "other",
}

/**
 * One game from a league scoreboard
 */
export type Game = {
  /** Scoreboard event id */
  id: string;

  /** League key, e.g. "NBA" */
  league: string;

  awayTeam: string;
  homeTeam: string;
  awayScore: string;
  homeScore: string;

  status: GameStatus;

  /** Short status text, e.g. "Q2 2:30" or "Final" */
  statusDetail: string;

  /** Start time (ms since epoch), null when the feed has none */
  startTime: number | null;

  /** Betting line for scheduled games, e.g. "GS -6.5" */
  odds: string | null;

  awayLogoUrl: string | null;
  homeLogoUrl: string | null;
};

/**
 * Cached state of the sports module
 */
export type SportsCache = {
  games: Game[];

  /** Resized logos keyed by source URL */
  logos: Record<string, RawImage>;
};

// ----------------------------------------------------------------------------
// Transit
// ----------------------------------------------------------------------------

/**
 * Upcoming arrivals of one route at a stop
 */
export type RoutePrediction = {
  route: string;

  /** Route colour as hex without '#', e.g. "FF0000" */
  color: string;

  /** Minutes until the next arrivals, soonest first */
  minutes: number[];
};

/**
 * A stop with at least one prediction
 */
export type TransitStop = {
  stopId: string;
  title: string;
  address: string;
  predictions: RoutePrediction[];
};

export type TransitCache = {
  stops: TransitStop[];
};

// ----------------------------------------------------------------------------
// Bike share
// ----------------------------------------------------------------------------

export type BikeStation = {
  stationId: string;
  name: string;
  bikesAvailable: number;
  docksAvailable: number;
  ebikesAvailable: number;

  /** E-bikes with a 3-digit name suffix and enough range */
  oldGenEbikes: number;

  /** E-bikes with a 4-digit name suffix and enough range */
  nextGenEbikes: number;
};

export type BikeShareCache = {
  stations: BikeStation[];
};

// ----------------------------------------------------------------------------
// Weather
// ----------------------------------------------------------------------------

export type WeatherIcon = "sunny" | "cloudy" | "rainy" | "night";

export type WeatherData = {
  currentTempF: number;
  nextTempF: number | null;
  precipitationProbability: number;
  rainMm: number;
  uvIndex: number;

  /** Sunrise today (ms since epoch) */
  sunrise: number | null;

  /** Sunset today (ms since epoch) */
  sunset: number | null;

  fetchedAt: number;
};

// ----------------------------------------------------------------------------
// News
// ----------------------------------------------------------------------------

export type Headline = {
  /** Stable id: source key plus link or title */
  id: string;
  title: string;

  /** Source key from configuration, e.g. "NYT" */
  source: string;
  sourceName: string;
};

export type NewsCache = {
  headlines: Headline[];
};
