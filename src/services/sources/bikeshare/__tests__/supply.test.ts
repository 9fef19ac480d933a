import {
  isNextGen,
  rangeMiles,
  summarizeStation,
  supplyRequestBody,
  supplyResponseSchema,
} from "../supply";

describe("supply", () => {
  const ebike = (rideableName: string, value: number | string, unit = "MILES") => ({
    rideableName,
    batteryStatus: { distanceRemaining: { value, unit } },
  });

  describe("supplyRequestBody", () => {
    it("should ask for the region's supply", () => {
      const body = JSON.parse(supplyRequestBody("SFO"));

      expect(body.operationName).toBe("GetSystemSupply");
      expect(body.variables).toEqual({
        input: { regionCode: "SFO", rideablePageLimit: 1000 },
      });
      expect(body.query).toContain("supply(input: $input)");
    });
  });

  describe("isNextGen", () => {
    it("should tell generations apart by the digits after the dots", () => {
      expect(isNextGen("···3632")).toBe(true);
      expect(isNextGen("···363")).toBe(false);
    });
  });

  describe("rangeMiles", () => {
    it("should read miles and convert kilometres", () => {
      const [miles, km] = supplyResponseSchema.parse({
        data: {
          supply: {
            stations: [
              {
                stationId: 1,
                stationName: "A",
                ebikes: [ebike("···101", "4.5"), ebike("···102", 10, "KILOMETERS")],
              },
            ],
          },
        },
      }).data.supply.stations[0].ebikes ?? [];

      expect(rangeMiles(miles)).toBe(4.5);
      expect(rangeMiles(km)).toBeCloseTo(6.21371, 5);
    });

    it("should treat a missing battery status as empty", () => {
      expect(rangeMiles({ rideableName: "···1", batteryStatus: null })).toBe(0);
    });
  });

  describe("summarizeStation", () => {
    it("should count e-bikes with more than the minimum range", () => {
      const station = supplyResponseSchema.parse({
        data: {
          supply: {
            stations: [
              {
                stationId: "st-1",
                stationName: "Market St at 10th St",
                bikesAvailable: 7,
                bikeDocksAvailable: 12,
                ebikesAvailable: 5,
                ebikes: [
                  ebike("···3632", 12),
                  ebike("···3633", 3.0),
                  ebike("···411", 8),
                  ebike("···412", 3.1),
                  ebike("···413", 1),
                ],
              },
            ],
          },
        },
      }).data.supply.stations[0];

      expect(summarizeStation(station, 3.0)).toEqual({
        stationId: "st-1",
        name: "Market St at 10th St",
        bikesAvailable: 7,
        docksAvailable: 12,
        ebikesAvailable: 5,
        oldGenEbikes: 2,
        nextGenEbikes: 1,
      });
    });

    it("should default missing counts to zero", () => {
      const station = supplyResponseSchema.parse({
        data: { supply: { stations: [{ stationId: 9, stationName: "B" }] } },
      }).data.supply.stations[0];

      expect(summarizeStation(station, 3)).toMatchObject({
        stationId: "9",
        bikesAvailable: 0,
        oldGenEbikes: 0,
        nextGenEbikes: 0,
      });
    });
  });
});
