import { WeatherModule, chooseWeatherIcon, sunTimesOf } from "../WeatherModule";
import { ModuleAdapter } from "@services/modules/ModuleAdapter";
import { FrameBuffer } from "@services/matrix/FrameBuffer";
import { Colors, WeatherData } from "@core/types";
import { FetchErrorCode } from "@core/errors/FetchError";

jest.mock("@utils/logger", () => ({
  getLogger: () => ({
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  }),
}));

const mockFetch = jest.fn();
global.fetch = mockFetch;

const location = {
  timezone: "America/Los_Angeles",
  latitude: 37.77,
  longitude: -122.42,
};

const forecast = (
  temperature: number | null,
  sun: { sunrise: string; sunset: string } = {
    sunrise: "2024-06-01T05:48",
    sunset: "2024-06-01T20:30",
  },
) => ({
  utc_offset_seconds: -25200,
  hourly: {
    time: ["2024-06-01T15:00", "2024-06-01T16:00"],
    temperature_2m: [temperature, 61],
    precipitation_probability: [10, 10],
    rain: [0, 0],
  },
  daily: {
    time: ["2024-06-01"],
    uv_index_max: [4],
    sunrise: [sun.sunrise],
    sunset: [sun.sunset],
  },
});

describe("WeatherModule", () => {
  // 15:30 local
  const now = Date.parse("2024-06-01T22:30:00Z");

  const createModule = () =>
    new WeatherModule({
      name: "weather",
      params: { title: "SF Weather" },
      location,
      displayDurationSeconds: 10,
      clock: () => now,
    });

  beforeEach(() => {
    mockFetch.mockReset();
  });

  describe("chooseWeatherIcon", () => {
    const cases: Array<[number, number, string]> = [
      [10, 12, "sunny"],
      [21, 12, "cloudy"],
      [50, 12, "cloudy"],
      [51, 12, "rainy"],
      [10, 22, "night"],
      [29, 5, "night"],
      [30, 23, "cloudy"],
      [80, 2, "rainy"],
    ];

    it.each(cases)("should show %i%% at %i:00 as %s", (precipitation, hour, icon) => {
      expect(chooseWeatherIcon(precipitation, hour)).toBe(icon);
    });
  });

  describe("refresh", () => {
    it("should return the current conditions with the sun times", async () => {
      mockFetch.mockResolvedValue(new Response(JSON.stringify(forecast(60.2))));

      const result = await createModule().refresh();

      expect(result.success && result.data.currentTempF).toBe(60);
      expect(result.success && result.data.nextTempF).toBe(61);
      expect(result.success && result.data.sunrise).toBe(
        Date.parse("2024-06-01T12:48:00Z"),
      );
      expect(result.success && result.data.sunset).toBe(
        Date.parse("2024-06-02T03:30:00Z"),
      );
      const url = new URL(String(mockFetch.mock.calls[0][0]));
      expect(url.searchParams.get("longitude")).toBe("-122.42");
    });

    it("should fail without a temperature", async () => {
      mockFetch.mockResolvedValue(new Response(JSON.stringify(forecast(null))));

      const result = await createModule().refresh();

      expect(!result.success && result.error.code).toBe(FetchErrorCode.NO_DATA);
    });
  });

  describe("sunTimesOf", () => {
    it("should be null without a cache or without both times", () => {
      expect(sunTimesOf(null)).toBeNull();
      expect(
        sunTimesOf({
          currentTempF: 60,
          nextTempF: null,
          precipitationProbability: 0,
          rainMm: 0,
          uvIndex: 1,
          sunrise: 1000,
          sunset: null,
          fetchedAt: now,
        }),
      ).toBeNull();
    });

    it("should follow the applied cache and ignore a refresh the adapter discards", async () => {
      const module = createModule();
      const adapter = new ModuleAdapter(
        module,
        {
          name: "weather",
          refreshIntervalSeconds: 600,
          displayDurationSeconds: 10,
          staleAfterSeconds: 1800,
        },
        () => now,
      );
      mockFetch
        .mockResolvedValueOnce(
          new Response(
            JSON.stringify(
              forecast(58, {
                sunrise: "2024-06-01T05:40",
                sunset: "2024-06-01T20:20",
              }),
            ),
          ),
        )
        .mockResolvedValueOnce(new Response(JSON.stringify(forecast(60))));

      const slowVersion = adapter.beginRefresh(now);
      const slow = await module.refresh();
      const fastVersion = adapter.beginRefresh(now);
      const fast = await module.refresh();

      expect(adapter.completeRefresh(fastVersion, fast, now)).toBe("applied");
      expect(adapter.completeRefresh(slowVersion, slow, now)).toBe("discarded");
      expect(sunTimesOf(adapter.getCache())).toEqual({
        sunrise: Date.parse("2024-06-01T12:48:00Z"),
        sunset: Date.parse("2024-06-02T03:30:00Z"),
      });
    });
  });

  describe("render", () => {
    const weather: WeatherData = {
      currentTempF: 60,
      nextTempF: 61,
      precipitationProbability: 10,
      rainMm: 0,
      uvIndex: 4,
      sunrise: null,
      sunset: null,
      fetchedAt: now,
    };

    const render = (data: WeatherData, at: number): FrameBuffer => {
      const frame = new FrameBuffer(64, 32);
      createModule().render(frame, { cache: data, dt: 0, elapsedInSlot: 0, now: at });
      return frame;
    };

    it("should draw the sun in the afternoon", () => {
      expect(render(weather, now).getPixel(59, 1)).toEqual(Colors.YELLOW);
    });

    it("should draw the moon at night", () => {
      // 22:00 local
      const night = Date.parse("2024-06-02T05:00:00Z");
      expect(render(weather, night).getPixel(59, 1)).toEqual({ r: 200, g: 200, b: 255 });
    });

    it("should draw the next-hour line only when known", () => {
      expect(render(weather, now).getPixel(1, 25)).toEqual(Colors.WHITE);
      expect(render({ ...weather, nextTempF: null }, now).getPixel(1, 25)).toEqual(
        Colors.BLACK,
      );
    });

    it("should always have content", () => {
      expect(createModule().hasContent(weather)).toBe(true);
      expect(createModule().displayDuration(weather)).toBe(10);
    });
  });
});
