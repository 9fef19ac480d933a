import {
  Colors,
  LocationConfig,
  RenderContext,
  Result,
  RGB,
  WeatherData,
  WeatherIcon,
  WeatherModuleParams,
  success,
  failure,
} from "@core/types";
import { DisplayModule } from "@core/interfaces/IDisplayModule";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { SunTimes } from "@core/interfaces/IBrightnessController";
import { FetchError } from "@core/errors/FetchError";
import { renderBitmapText, truncateToWidth } from "@utils/bitmapFont";
import { renderIcon } from "@utils/icons";
import { getLogger } from "@utils/logger";
import { formatHourLabel, localHour } from "@utils/time";
import { fetchJson } from "../http";
import { extractWeather, forecastSchema, forecastUrl } from "./openMeteo";

const logger = getLogger("WeatherModule");

const ICON_COLORS: Record<WeatherIcon, RGB> = {
  sunny: Colors.YELLOW,
  cloudy: { r: 180, g: 180, b: 180 },
  rainy: { r: 100, g: 150, b: 255 },
  night: { r: 200, g: 200, b: 255 },
};

/**
 * Icon for the precipitation chance at a local hour. Night (20:00 to
 * 06:00) shows the moon unless rain is likely.
 */
export function chooseWeatherIcon(
  precipitationProbability: number,
  hour: number,
): WeatherIcon {
  const night = hour >= 20 || hour < 6;
  if (night && precipitationProbability < 30) {
    return "night";
  }
  if (precipitationProbability > 50) {
    return "rainy";
  }
  if (precipitationProbability > 20) {
    return "cloudy";
  }
  return "sunny";
}

/**
 * Sunrise and sunset of an applied weather cache, for the brightness
 * controller
 */
export function sunTimesOf(weather: WeatherData | null): SunTimes | null {
  if (!weather || weather.sunrise === null || weather.sunset === null) {
    return null;
  }
  return { sunrise: weather.sunrise, sunset: weather.sunset };
}

export interface WeatherModuleOptions {
  name: string;
  params: WeatherModuleParams;
  location: LocationConfig;
  displayDurationSeconds: number;
  clock?: () => number;
}

/**
 * Current conditions from the forecast as a static frame
 */
export class WeatherModule implements DisplayModule<WeatherData> {
  readonly name: string;

  private readonly params: WeatherModuleParams;
  private readonly location: LocationConfig;
  private readonly baseDuration: number;
  private readonly clock: () => number;

  constructor(options: WeatherModuleOptions) {
    this.name = options.name;
    this.params = options.params;
    this.location = options.location;
    this.baseDuration = options.displayDurationSeconds;
    this.clock = options.clock ?? Date.now;
  }

  async refresh(): Promise<Result<WeatherData, FetchError>> {
    const url = forecastUrl({
      latitude: this.location.latitude,
      longitude: this.location.longitude,
      timezone: this.location.timezone,
    });
    const result = await fetchJson(this.name, url, forecastSchema);
    if (!result.success) {
      return result;
    }

    const weather = extractWeather(result.data, this.clock());
    if (!weather) {
      return failure(FetchError.noData(this.name, "forecast has no temperature"));
    }

    logger.info(
      `Updated weather: ${weather.currentTempF}°F, ${weather.precipitationProbability}% rain, UV ${weather.uvIndex}`,
    );
    return success(weather);
  }

  render(frame: IFrameBuffer, context: RenderContext<WeatherData>): void {
    const { cache: weather, now } = context;
    const { width } = frame.dimensions();
    const hour = localHour(now, this.location.timezone);

    const icon = chooseWeatherIcon(weather.precipitationProbability, hour);
    renderIcon(frame, icon, width - 8, 1, ICON_COLORS[icon]);

    renderBitmapText(
      frame,
      truncateToWidth(this.params.title.toUpperCase(), width - 11),
      1,
      1,
      Colors.YELLOW,
    );
    renderBitmapText(frame, `${weather.currentTempF}°F`, 1, 9, Colors.WHITE);
    renderBitmapText(
      frame,
      `RAIN ${weather.precipitationProbability}%`,
      1,
      17,
      { r: 100, g: 150, b: 255 },
    );
    renderBitmapText(frame, `UV ${weather.uvIndex}`, 41, 17, Colors.GREEN);

    if (weather.nextTempF !== null) {
      renderBitmapText(
        frame,
        `NEXT ${weather.nextTempF}°F ${formatHourLabel(hour + 1)}`,
        1,
        25,
        Colors.WHITE,
      );
    }
  }

  displayDuration(_cache: WeatherData): number {
    return this.baseDuration;
  }

  hasContent(_cache: WeatherData): boolean {
    return true;
  }

  resetAnimation(): void {
    // static frame
  }
}
