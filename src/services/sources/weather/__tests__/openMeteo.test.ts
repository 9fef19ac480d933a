import {
  extractWeather,
  forecastSchema,
  forecastUrl,
  parseLocalTime,
} from "../openMeteo";

/** Hourly forecast for 2024-06-01 in a UTC-7 zone */
function forecastFixture(overrides: { temperature?: Array<number | null> } = {}) {
  const hours = Array.from({ length: 24 }, (_, i) => i);
  return {
    utc_offset_seconds: -25200,
    hourly: {
      time: hours.map((h) => `2024-06-01T${String(h).padStart(2, "0")}:00`),
      temperature_2m: overrides.temperature ?? hours.map((h) => 50.4 + h),
      precipitation_probability: hours.map((h) => h * 2),
      rain: hours.map(() => 0.2),
    },
    daily: {
      time: ["2024-06-01"],
      uv_index_max: [6.6],
      sunrise: ["2024-06-01T05:48"],
      sunset: ["2024-06-01T20:30"],
    },
  };
}

describe("openMeteo", () => {
  describe("forecastUrl", () => {
    it("should ask for the hourly and daily fields in °F", () => {
      const url = new URL(
        forecastUrl({
          latitude: 37.77,
          longitude: -122.42,
          timezone: "America/Los_Angeles",
        }),
      );

      expect(url.origin + url.pathname).toBe("https://api.open-meteo.com/v1/forecast");
      expect(url.searchParams.get("latitude")).toBe("37.77");
      expect(url.searchParams.get("hourly")).toBe(
        "temperature_2m,precipitation_probability,rain",
      );
      expect(url.searchParams.get("daily")).toBe("uv_index_max,sunrise,sunset");
      expect(url.searchParams.get("temperature_unit")).toBe("fahrenheit");
      expect(url.searchParams.get("timezone")).toBe("America/Los_Angeles");
    });
  });

  describe("parseLocalTime", () => {
    it("should apply the UTC offset", () => {
      expect(parseLocalTime("2024-06-01T05:48", -25200)).toBe(
        Date.parse("2024-06-01T12:48:00Z"),
      );
    });

    it("should return null for garbage", () => {
      expect(parseLocalTime("soon", 0)).toBeNull();
    });
  });

  describe("extractWeather", () => {
    // 15:30 local
    const now = Date.parse("2024-06-01T22:30:00Z");

    it("should read the current and next hour", () => {
      const forecast = forecastSchema.parse(forecastFixture());

      expect(extractWeather(forecast, now)).toEqual({
        currentTempF: 65,
        nextTempF: 66,
        precipitationProbability: 30,
        rainMm: 0.2,
        uvIndex: 7,
        sunrise: Date.parse("2024-06-01T12:48:00Z"),
        sunset: Date.parse("2024-06-02T03:30:00Z"),
        fetchedAt: now,
      });
    });

    it("should use the first hour before the forecast starts", () => {
      const forecast = forecastSchema.parse(forecastFixture());
      const early = Date.parse("2024-05-31T12:00:00Z");

      expect(extractWeather(forecast, early)?.currentTempF).toBe(50);
    });

    it("should have no next temperature in the last hour", () => {
      const forecast = forecastSchema.parse(forecastFixture());
      const late = Date.parse("2024-06-02T06:30:00Z");

      const weather = extractWeather(forecast, late);
      expect(weather?.currentTempF).toBe(73);
      expect(weather?.nextTempF).toBeNull();
    });

    it("should return null without a current temperature", () => {
      const forecast = forecastSchema.parse(
        forecastFixture({ temperature: Array.from({ length: 24 }, () => null) }),
      );

      expect(extractWeather(forecast, now)).toBeNull();
    });
  });
});
