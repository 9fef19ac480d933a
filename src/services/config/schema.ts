/**
 * Configuration Schemas
 *
 * Zod schemas for config/default.json. Every field has a default, so an
 * empty object parses to the built-in configuration.
 */

import { z } from "zod";
import { MatrixDriverType, SPORTS_LEAGUES } from "@core/types";
import * as defaults from "@core/constants/defaults";

// ============================================================================
// Common Schemas
// ============================================================================

const percentSchema = z.number().int().min(1).max(100);

const secondsSchema = z.number().positive();

export const latitudeSchema = z
  .number({ message: "Latitude must be a number" })
  .min(-90, "Latitude must be between -90 and 90")
  .max(90, "Latitude must be between -90 and 90");

export const longitudeSchema = z
  .number({ message: "Longitude must be a number" })
  .min(-180, "Longitude must be between -180 and 180")
  .max(180, "Longitude must be between -180 and 180");

const timeZoneSchema = z.string().refine(
  (timeZone) => {
    try {
      new Intl.DateTimeFormat("en-US", { timeZone });
      return true;
    } catch {
      return false;
    }
  },
  { message: "Unknown IANA time zone" },
);

// ============================================================================
// Display, Scroll, Preview, Location
// ============================================================================

export const brightnessSchema = z
  .object({
    autoBrightness: z.boolean().default(true),
    minBrightness: percentSchema.default(defaults.BRIGHTNESS_DEFAULT_MIN),
    maxBrightness: percentSchema.default(defaults.BRIGHTNESS_DEFAULT_MAX),
    updateIntervalSeconds: secondsSchema.default(
      defaults.BRIGHTNESS_DEFAULT_UPDATE_INTERVAL_SECONDS,
    ),
  })
  .refine((b) => b.minBrightness <= b.maxBrightness, {
    message: "minBrightness must not exceed maxBrightness",
    path: ["minBrightness"],
  });

export const displaySchema = z.object({
  width: z.number().int().positive().default(defaults.DISPLAY_DEFAULT_WIDTH),
  height: z.number().int().positive().default(defaults.DISPLAY_DEFAULT_HEIGHT),
  tickRateHz: z
    .number()
    .positive()
    .max(defaults.DISPLAY_MAX_TICK_RATE_HZ)
    .default(defaults.DISPLAY_DEFAULT_TICK_RATE_HZ),
  driver: z.nativeEnum(MatrixDriverType).default(defaults.DISPLAY_DEFAULT_DRIVER),
  maxConcurrentRefreshes: z
    .number()
    .int()
    .min(1)
    .default(defaults.DISPLAY_DEFAULT_MAX_CONCURRENT_REFRESHES),
  brightness: brightnessSchema.default({}),
});

export const scrollSchema = z.object({
  settleSeconds: z.number().min(0).default(defaults.SCROLL_DEFAULT_SETTLE_SECONDS),
  speedPxPerSecond: z
    .number()
    .positive()
    .default(defaults.SCROLL_DEFAULT_SPEED_PX_PER_SECOND),
});

export const previewSchema = z.object({
  enabled: z.boolean().default(false),
  host: z.string().default(defaults.PREVIEW_DEFAULT_HOST),
  port: z.number().int().min(1).max(65535).default(defaults.PREVIEW_DEFAULT_PORT),
});

export const locationSchema = z.object({
  timezone: timeZoneSchema.default(defaults.LOCATION_DEFAULT_TIMEZONE),
  latitude: latitudeSchema.default(defaults.LOCATION_DEFAULT_LATITUDE),
  longitude: longitudeSchema.default(defaults.LOCATION_DEFAULT_LONGITUDE),
});

// ============================================================================
// Modules
// ============================================================================

const baseModuleSchema = z.object({
  name: z.string().min(1, "Module name must not be empty"),
  enabled: z.boolean().default(true),
  refreshIntervalSeconds: secondsSchema.default(
    defaults.MODULE_DEFAULT_REFRESH_INTERVAL_SECONDS,
  ),
  displayDurationSeconds: secondsSchema.default(
    defaults.MODULE_DEFAULT_DISPLAY_DURATION_SECONDS,
  ),
  staleAfterSeconds: secondsSchema.optional(),
});

export const sportsModuleSchema = baseModuleSchema.extend({
  type: z.literal("sports"),
  params: z
    .object({
      leagues: z.array(z.enum(SPORTS_LEAGUES)).min(1).default(["NBA", "NFL"]),
      favoriteTeams: z.record(z.array(z.string())).default({}),
      gameDwellSeconds: secondsSchema.default(
        defaults.SPORTS_DEFAULT_GAME_DWELL_SECONDS,
      ),
      lookaheadDays: z
        .number()
        .int()
        .min(0)
        .default(defaults.SPORTS_DEFAULT_LOOKAHEAD_DAYS),
      showLogos: z.boolean().default(true),
    })
    .default({}),
});

export const transitModuleSchema = baseModuleSchema.extend({
  type: z.literal("transit"),
  params: z.object({
    addresses: z.array(z.string().min(1)).min(1, "At least one address is required"),
    apiKey: z.string().default(""),
    stopDwellSeconds: secondsSchema.default(
      defaults.TRANSIT_DEFAULT_STOP_DWELL_SECONDS,
    ),
    searchRadiusFeet: z
      .number()
      .positive()
      .default(defaults.TRANSIT_DEFAULT_SEARCH_RADIUS_FEET),
  }),
});

export const bikeShareModuleSchema = baseModuleSchema.extend({
  type: z.literal("bikeshare"),
  params: z.object({
    stations: z.array(z.string().min(1)).min(1, "At least one station is required"),
    regionCode: z.string().default(defaults.BIKESHARE_DEFAULT_REGION_CODE),
    stationDwellSeconds: secondsSchema.default(
      defaults.BIKESHARE_DEFAULT_STATION_DWELL_SECONDS,
    ),
    minRangeMiles: z.number().min(0).default(defaults.BIKESHARE_DEFAULT_MIN_RANGE_MILES),
  }),
});

export const weatherModuleSchema = baseModuleSchema.extend({
  type: z.literal("weather"),
  params: z
    .object({
      title: z.string().default("WEATHER"),
    })
    .default({}),
});

export const newsModuleSchema = baseModuleSchema.extend({
  type: z.literal("news"),
  params: z.object({
    sources: z
      .array(
        z.object({
          key: z.string().min(1),
          name: z.string().min(1),
          url: z.string().url(),
        }),
      )
      .min(1, "At least one news source is required"),
    maxHeadlinesPerSource: z
      .number()
      .int()
      .positive()
      .default(defaults.NEWS_DEFAULT_MAX_HEADLINES_PER_SOURCE),
  }),
});

export const moduleSchema = z.discriminatedUnion("type", [
  sportsModuleSchema,
  transitModuleSchema,
  bikeShareModuleSchema,
  weatherModuleSchema,
  newsModuleSchema,
]);

// ============================================================================
// Application
// ============================================================================

/**
 * Modules shown when there is no configuration file
 */
export const DEFAULT_MODULES: z.input<typeof moduleSchema>[] = [
  { type: "sports", name: "sports" },
  {
    type: "weather",
    name: "weather",
    refreshIntervalSeconds: 1800,
    displayDurationSeconds: 10,
    params: { title: "SF WEATHER" },
  },
  {
    type: "news",
    name: "news",
    refreshIntervalSeconds: 300,
    displayDurationSeconds: 30,
    params: {
      sources: [
        {
          key: "NYT",
          name: "NY Times",
          url: "https://rss.nytimes.com/services/xml/rss/nyt/HomePage.xml",
        },
      ],
    },
  },
];

export const appConfigSchema = z
  .object({
    display: displaySchema.default({}),
    scroll: scrollSchema.default({}),
    preview: previewSchema.default({}),
    location: locationSchema.default({}),
    modules: z.array(moduleSchema).default(DEFAULT_MODULES),
  })
  .superRefine((config, ctx) => {
    const seen = new Set<string>();
    config.modules.forEach((module, index) => {
      if (seen.has(module.name)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `Duplicate module name "${module.name}"`,
          path: ["modules", index, "name"],
        });
      }
      seen.add(module.name);

      if (module.type === "transit" && module.enabled && !module.params.apiKey) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: "Predictions API key is required (set TRANSIT_API_KEY)",
          path: ["modules", index, "params", "apiKey"],
        });
      }
    });
  });

export type AppConfigInput = z.input<typeof appConfigSchema>;
