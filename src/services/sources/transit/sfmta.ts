import { z } from "zod";
import { Result, RoutePrediction, success } from "@core/types";
import { FetchError } from "@core/errors/FetchError";
import {
  TRANSIT_MAX_ARRIVALS_PER_ROUTE,
  TRANSIT_MAX_ROUTES_PER_STOP,
  TRANSIT_MAX_STOPS_PER_ADDRESS,
} from "@core/constants/defaults";
import { BoundingBox, GeoCoordinate } from "@utils/geo";
import { fetchJson } from "../http";

const GEOCODE_URL = "https://www.sfmta.com/find-a-stop/geocode";
const STOPS_URL = "https://www.sfmta.com/find-a-stop/query";
const PREDICTIONS_URL =
  "https://webservices.umoiq.com/api/pub/v1/agencies/sfmta-cis/stopcodes";

const geocodeSchema = z.object({
  results: z
    .array(
      z.object({
        geometry: z.object({
          location: z.object({ lat: z.number(), lng: z.number() }),
        }),
      }),
    )
    .default([]),
});

const stopsSchema = z.object({
  stops: z
    .array(
      z.object({
        stop_id: z.union([z.string(), z.number()]).transform(String),
        title: z.string().default("Unknown Stop"),
        routes: z.array(z.unknown()).nullish(),
      }),
    )
    .default([]),
});

const predictionsSchema = z.array(
  z.object({
    route: z.object({
      title: z.string(),
      color: z.string().optional(),
    }),
    values: z
      .array(z.object({ minutes: z.number().nullish() }))
      .nullish(),
  }),
);

export type NearbyStop = {
  stopId: string;
  title: string;
  routeCount: number;
};

/**
 * Coordinates of an address, or null when the geocoder finds nothing
 */
export async function geocodeAddress(
  source: string,
  address: string,
): Promise<Result<GeoCoordinate | null, FetchError>> {
  const url = `${GEOCODE_URL}?${new URLSearchParams({ address })}`;
  const result = await fetchJson(source, url, geocodeSchema);
  if (!result.success) {
    return result;
  }

  const first = result.data.results[0];
  if (!first) {
    return success(null);
  }
  const { lat, lng } = first.geometry.location;
  return success({ latitude: lat, longitude: lng });
}

/**
 * Stops inside the box that serve at least one route, busiest first
 */
export async function findNearbyStops(
  source: string,
  box: BoundingBox,
  limit: number = TRANSIT_MAX_STOPS_PER_ADDRESS,
): Promise<Result<NearbyStop[], FetchError>> {
  const bbox = [
    box.sw.longitude,
    box.sw.latitude,
    box.ne.longitude,
    box.ne.latitude,
  ].join(",");
  const url = `${STOPS_URL}?${new URLSearchParams({ bbox, limit: "20", lang: "en" })}`;

  const result = await fetchJson(source, url, stopsSchema);
  if (!result.success) {
    return result;
  }

  const stops = result.data.stops
    .map((stop) => ({
      stopId: stop.stop_id,
      title: stop.title,
      routeCount: stop.routes?.length ?? 0,
    }))
    .filter((stop) => stop.routeCount > 0)
    .sort((a, b) => b.routeCount - a.routeCount);

  return success(stops.slice(0, limit));
}

/**
 * Next arrivals per route at a stop, soonest route first. Routes without
 * a prediction are left out.
 */
export async function fetchPredictions(
  source: string,
  stopId: string,
  apiKey: string,
): Promise<Result<RoutePrediction[], FetchError>> {
  const url = `${PREDICTIONS_URL}/${encodeURIComponent(stopId)}/predictions?${new URLSearchParams({ key: apiKey })}`;
  const result = await fetchJson(source, url, predictionsSchema);
  if (!result.success) {
    return result;
  }

  const predictions: RoutePrediction[] = [];
  for (const entry of result.data) {
    const minutes = (entry.values ?? [])
      .slice(0, TRANSIT_MAX_ARRIVALS_PER_ROUTE)
      .flatMap((value) =>
        value.minutes === null || value.minutes === undefined ? [] : [value.minutes],
      );
    if (minutes.length === 0) {
      continue;
    }
    predictions.push({
      route: entry.route.title,
      color: entry.route.color ?? "FFFFFF",
      minutes,
    });
  }

  predictions.sort((a, b) => Math.min(...a.minutes) - Math.min(...b.minutes));
  return success(predictions.slice(0, TRANSIT_MAX_ROUTES_PER_STOP));
}
