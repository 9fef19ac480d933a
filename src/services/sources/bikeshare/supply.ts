import { z } from "zod";
import { BikeStation } from "@core/types";

export const SUPPLY_URL = "https://account.baywheels.com/bikesharefe-gql";

const KM_TO_MILES = 0.621371;

export const SUPPLY_QUERY = `query GetSystemSupply($input: SupplyInput) {
  supply(input: $input) {
    stations {
      stationId
      stationName
      bikesAvailable
      bikeDocksAvailable
      ebikesAvailable
      ebikes {
        rideableName
        batteryStatus {
          distanceRemaining {
            value
            unit
          }
        }
      }
    }
  }
}`;

/**
 * GraphQL request body for the system supply of a region
 */
export function supplyRequestBody(regionCode: string): string {
  return JSON.stringify({
    operationName: "GetSystemSupply",
    variables: { input: { regionCode, rideablePageLimit: 1000 } },
    query: SUPPLY_QUERY,
  });
}

const ebikeSchema = z.object({
  rideableName: z.string(),
  batteryStatus: z
    .object({
      distanceRemaining: z
        .object({
          value: z.coerce.number(),
          unit: z.string().optional(),
        })
        .nullish(),
    })
    .nullish(),
});

const stationSchema = z.object({
  stationId: z.union([z.string(), z.number()]).transform(String),
  stationName: z.string(),
  bikesAvailable: z.number().default(0),
  bikeDocksAvailable: z.number().default(0),
  ebikesAvailable: z.number().default(0),
  ebikes: z.array(ebikeSchema).nullish(),
});

export const supplyResponseSchema = z.object({
  data: z.object({
    supply: z.object({
      stations: z.array(stationSchema),
    }),
  }),
});

export type SupplyStation = z.infer<typeof stationSchema>;
type Ebike = z.infer<typeof ebikeSchema>;

/**
 * Next-generation e-bikes carry a four digit name ("···3632"), older
 * ones three digits
 */
export function isNextGen(rideableName: string): boolean {
  return rideableName.replace(/·/g, "").length === 4;
}

/**
 * Remaining range in miles, 0 when the bike reports none
 */
export function rangeMiles(ebike: Ebike): number {
  const distance = ebike.batteryStatus?.distanceRemaining;
  if (!distance || !Number.isFinite(distance.value)) {
    return 0;
  }
  return /^k/i.test(distance.unit ?? "") ? distance.value * KM_TO_MILES : distance.value;
}

/**
 * Station summary with e-bikes counted by generation. Bikes with less
 * range than minRangeMiles (or exactly that much) are not counted.
 */
export function summarizeStation(
  station: SupplyStation,
  minRangeMiles: number,
): BikeStation {
  let oldGen = 0;
  let nextGen = 0;
  for (const ebike of station.ebikes ?? []) {
    if (rangeMiles(ebike) <= minRangeMiles) {
      continue;
    }
    if (isNextGen(ebike.rideableName)) {
      nextGen++;
    } else {
      oldGen++;
    }
  }

  return {
    stationId: station.stationId,
    name: station.stationName,
    bikesAvailable: station.bikesAvailable,
    docksAvailable: station.bikeDocksAvailable,
    ebikesAvailable: station.ebikesAvailable,
    oldGenEbikes: oldGen,
    nextGenEbikes: nextGen,
  };
}
