import { z } from "zod";
import { WeatherData } from "@core/types";

export const FORECAST_URL = "https://api.open-meteo.com/v1/forecast";

const nullableNumbers = z.array(z.number().nullable());

export const forecastSchema = z.object({
  utc_offset_seconds: z.number().default(0),
  hourly: z.object({
    time: z.array(z.string()),
    temperature_2m: nullableNumbers,
    precipitation_probability: nullableNumbers,
    rain: nullableNumbers,
  }),
  daily: z.object({
    time: z.array(z.string()),
    uv_index_max: nullableNumbers,
    sunrise: z.array(z.string()),
    sunset: z.array(z.string()),
  }),
});

export type Forecast = z.infer<typeof forecastSchema>;

export interface ForecastQuery {
  latitude: number;
  longitude: number;
  timezone: string;
}

/**
 * Forecast URL for today and tomorrow, temperatures in °F
 */
export function forecastUrl(query: ForecastQuery): string {
  const params = new URLSearchParams({
    latitude: String(query.latitude),
    longitude: String(query.longitude),
    hourly: "temperature_2m,precipitation_probability,rain",
    daily: "uv_index_max,sunrise,sunset",
    temperature_unit: "fahrenheit",
    timezone: query.timezone,
    forecast_days: "2",
  });
  return `${FORECAST_URL}?${params}`;
}

/**
 * Local "YYYY-MM-DDTHH:mm" from the forecast to ms since epoch
 */
export function parseLocalTime(local: string, utcOffsetSeconds: number): number | null {
  const asUtc = Date.parse(`${local}Z`);
  if (Number.isNaN(asUtc)) {
    return null;
  }
  return asUtc - utcOffsetSeconds * 1000;
}

/**
 * Conditions for the hour containing now and the hour after it
 */
export function extractWeather(forecast: Forecast, now: number): WeatherData | null {
  const offset = forecast.utc_offset_seconds;
  const hours = forecast.hourly.time.map((time) => parseLocalTime(time, offset));

  let current = -1;
  hours.forEach((hour, index) => {
    if (hour !== null && hour <= now) {
      current = index;
    }
  });
  if (current < 0) {
    current = 0;
  }

  const temperature = forecast.hourly.temperature_2m[current];
  if (temperature === null || temperature === undefined) {
    return null;
  }
  const next = forecast.hourly.temperature_2m[current + 1];

  const sunrise = forecast.daily.sunrise[0];
  const sunset = forecast.daily.sunset[0];

  return {
    currentTempF: Math.round(temperature),
    nextTempF: next === null || next === undefined ? null : Math.round(next),
    precipitationProbability: Math.round(
      forecast.hourly.precipitation_probability[current] ?? 0,
    ),
    rainMm: forecast.hourly.rain[current] ?? 0,
    uvIndex: Math.round(forecast.daily.uv_index_max[0] ?? 0),
    sunrise: sunrise ? parseLocalTime(sunrise, offset) : null,
    sunset: sunset ? parseLocalTime(sunset, offset) : null,
    fetchedAt: now,
  };
}
