/**
 * Default Configuration Constants
 *
 * This file contains all default configuration values used throughout the application.
 * Each section is organized by service/domain and includes JSDoc documentation
 * explaining the purpose and units of each constant.
 */

import { MatrixDriverType } from "@core/types/DisplayTypes";

// =============================================================================
// Display Configuration Defaults
// =============================================================================

/**
 * Default matrix width in pixels (two chained 32x32 panels)
 */
export const DISPLAY_DEFAULT_WIDTH = 64;

/**
 * Default matrix height in pixels
 */
export const DISPLAY_DEFAULT_HEIGHT = 32;

/**
 * Default render loop frequency in Hz
 * 30 keeps 20 px/s scrolling smooth on a 64 px wide panel
 */
export const DISPLAY_DEFAULT_TICK_RATE_HZ = 30;

/**
 * Upper bound accepted for the render loop frequency
 */
export const DISPLAY_MAX_TICK_RATE_HZ = 120;

/**
 * Default matrix driver
 */
export const DISPLAY_DEFAULT_DRIVER = MatrixDriverType.EMULATOR;

/**
 * Default number of module refreshes allowed to run at the same time
 */
export const DISPLAY_DEFAULT_MAX_CONCURRENT_REFRESHES = 2;

/**
 * Slack when comparing summed tick time against a duration.
 * Thirty steps of 1/30 s add up to slightly less than one second.
 */
export const TIMING_EPSILON_SECONDS = 1e-6;

// =============================================================================
// Brightness Defaults
// =============================================================================

/**
 * Night-time brightness in percent
 */
export const BRIGHTNESS_DEFAULT_MIN = 20;

/**
 * Midday brightness in percent
 */
export const BRIGHTNESS_DEFAULT_MAX = 100;

/**
 * Seconds between brightness updates (5 minutes)
 */
export const BRIGHTNESS_DEFAULT_UPDATE_INTERVAL_SECONDS = 300;

// =============================================================================
// Scroll Defaults
// =============================================================================

/**
 * Seconds a ticker holds its text left-aligned before scrolling
 */
export const SCROLL_DEFAULT_SETTLE_SECONDS = 1.5;

/**
 * Ticker speed in pixels per second
 */
export const SCROLL_DEFAULT_SPEED_PX_PER_SECOND = 20;

// =============================================================================
// Module Defaults
// =============================================================================

/**
 * Slot length in seconds when a module entry does not set one
 */
export const MODULE_DEFAULT_DISPLAY_DURATION_SECONDS = 20;

/**
 * Refresh interval in seconds when a module entry does not set one
 */
export const MODULE_DEFAULT_REFRESH_INTERVAL_SECONDS = 30;

/**
 * Stale window as a multiple of the refresh interval
 */
export const MODULE_STALE_INTERVAL_MULTIPLIER = 3;

/**
 * Timeout for a single HTTP request made by a module refresh
 */
export const FETCH_DEFAULT_TIMEOUT_MS = 10000;

/**
 * Seconds each game stays on screen in the sports carousel
 */
export const SPORTS_DEFAULT_GAME_DWELL_SECONDS = 3;

/**
 * Games starting further out than this many days are dropped
 */
export const SPORTS_DEFAULT_LOOKAHEAD_DAYS = 7;

/**
 * Seconds each stop stays on screen in the transit carousel
 */
export const TRANSIT_DEFAULT_STOP_DWELL_SECONDS = 5;

/**
 * Search radius around an address for nearby stops, in feet
 */
export const TRANSIT_DEFAULT_SEARCH_RADIUS_FEET = 700;

/**
 * Stops kept per address, ranked by number of routes served
 */
export const TRANSIT_MAX_STOPS_PER_ADDRESS = 5;

/**
 * Routes shown per stop
 */
export const TRANSIT_MAX_ROUTES_PER_STOP = 4;

/**
 * Arrivals shown per route
 */
export const TRANSIT_MAX_ARRIVALS_PER_ROUTE = 2;

/**
 * Seconds each station stays on screen in the bike share carousel
 */
export const BIKESHARE_DEFAULT_STATION_DWELL_SECONDS = 5;

/**
 * E-bikes with less remaining range are not counted
 */
export const BIKESHARE_DEFAULT_MIN_RANGE_MILES = 3.0;

/**
 * Default bike share region
 */
export const BIKESHARE_DEFAULT_REGION_CODE = "SFO";

/**
 * Headlines kept per RSS source
 */
export const NEWS_DEFAULT_MAX_HEADLINES_PER_SOURCE = 10;

// =============================================================================
// Location Defaults
// =============================================================================

/**
 * Default time zone for game times and brightness
 */
export const LOCATION_DEFAULT_TIMEZONE = "America/Los_Angeles";

/**
 * Default latitude (San Francisco)
 */
export const LOCATION_DEFAULT_LATITUDE = 37.7749;

/**
 * Default longitude (San Francisco)
 */
export const LOCATION_DEFAULT_LONGITUDE = -122.4194;

// =============================================================================
// Preview Server Defaults
// =============================================================================

/**
 * Default preview server port
 */
export const PREVIEW_DEFAULT_PORT = 8080;

/**
 * Default preview server host
 * 0.0.0.0 allows connections from any network interface
 */
export const PREVIEW_DEFAULT_HOST = "0.0.0.0";

/**
 * Scale factor applied when encoding the preview PNG
 */
export const PREVIEW_PNG_SCALE = 8;

// =============================================================================
// Logging Defaults
// =============================================================================

/**
 * Maximum size of one log file before it is rotated (10MB)
 */
export const LOG_FILE_MAX_SIZE_BYTES = 10485760;

/**
 * Number of rotated log files kept
 */
export const LOG_FILE_MAX_FILES = 5;

// =============================================================================
// Shutdown
// =============================================================================

/**
 * Forced exit if graceful shutdown takes longer than this
 */
export const SHUTDOWN_TIMEOUT_MS = 5000;
