import {
  Colors,
  RenderContext,
  Result,
  RGB,
  TransitCache,
  TransitModuleParams,
  TransitStop,
  success,
  failure,
} from "@core/types";
import { DisplayModule } from "@core/interfaces/IDisplayModule";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { FetchError } from "@core/errors/FetchError";
import { Carousel } from "@services/scroll/Carousel";
import {
  renderBitmapText,
  renderCenteredText,
  truncateToWidth,
} from "@utils/bitmapFont";
import { boundingBox } from "@utils/geo";
import { getLogger } from "@utils/logger";
import { fetchPredictions, findNearbyStops, geocodeAddress } from "./sfmta";

const logger = getLogger("TransitModule");

const ROUTES_SHOWN = 3;
const TIMES_X = 35;

export interface TransitModuleOptions {
  name: string;
  params: TransitModuleParams;
  displayDurationSeconds: number;
}

/**
 * Route colour from a "RRGGBB" string, white when unparsable
 */
export function routeColor(hex: string): RGB {
  const value = hex.replace(/^#/, "");
  if (!/^[0-9a-fA-F]{6}$/.test(value)) {
    return Colors.WHITE;
  }
  return {
    r: parseInt(value.slice(0, 2), 16),
    g: parseInt(value.slice(2, 4), 16),
    b: parseInt(value.slice(4, 6), 16),
  };
}

/**
 * "5m 12m" for the next arrivals
 */
export function formatArrivals(minutes: number[]): string {
  return minutes.length === 0
    ? "N/A"
    : minutes.map((value) => `${value}m`).join(" ");
}

/**
 * Arrival predictions for stops near the configured addresses, one stop
 * at a time
 */
export class TransitModule implements DisplayModule<TransitCache> {
  readonly name: string;

  private readonly params: TransitModuleParams;
  private readonly baseDuration: number;
  private readonly carousel: Carousel<TransitStop>;
  private shownStops: TransitStop[] | null = null;

  constructor(options: TransitModuleOptions) {
    this.name = options.name;
    this.params = options.params;
    this.baseDuration = options.displayDurationSeconds;
    this.carousel = new Carousel<TransitStop>(
      options.params.stopDwellSeconds,
      (stop) => stop.stopId,
    );
  }

  async refresh(): Promise<Result<TransitCache, FetchError>> {
    const stops: TransitStop[] = [];
    const seen = new Set<string>();
    let firstError: FetchError | null = null;
    let answered = 0;

    for (const address of this.params.addresses) {
      const collected = await this.collectAddress(address);
      if (!collected.success) {
        logger.warn(collected.error.message);
        firstError = firstError ?? collected.error;
        continue;
      }
      answered++;
      for (const stop of collected.data) {
        if (!seen.has(stop.stopId)) {
          seen.add(stop.stopId);
          stops.push(stop);
        }
      }
    }

    if (answered === 0 && firstError) {
      return failure(firstError);
    }

    logger.info(
      `Transit update complete: ${stops.length} stops with predictions`,
    );
    return success({ stops });
  }

  render(frame: IFrameBuffer, context: RenderContext<TransitCache>): void {
    const { cache, dt } = context;
    if (cache.stops !== this.shownStops) {
      this.carousel.setItems(cache.stops);
      this.shownStops = cache.stops;
    }
    this.carousel.advance(dt);

    const stop = this.carousel.current();
    if (!stop) {
      renderCenteredText(frame, "NO ROUTES", 13, Colors.WHITE);
      return;
    }

    const { width } = frame.dimensions();
    renderBitmapText(
      frame,
      truncateToWidth(stop.title.toUpperCase(), width - 2),
      1,
      1,
      Colors.YELLOW,
    );

    stop.predictions.slice(0, ROUTES_SHOWN).forEach((prediction, index) => {
      const y = 9 + index * 8;
      renderBitmapText(
        frame,
        prediction.route.slice(0, 8),
        1,
        y,
        routeColor(prediction.color),
      );
      renderBitmapText(
        frame,
        formatArrivals(prediction.minutes),
        TIMES_X,
        y,
        Colors.GREEN,
      );
    });
  }

  displayDuration(_cache: TransitCache): number {
    return this.baseDuration;
  }

  hasContent(cache: TransitCache): boolean {
    return cache.stops.length > 0;
  }

  resetAnimation(): void {
    this.carousel.reset();
  }

  /**
   * Stops with predictions near one address. Stops whose predictions
   * cannot be fetched are left out.
   */
  private async collectAddress(
    address: string,
  ): Promise<Result<TransitStop[], FetchError>> {
    const location = await geocodeAddress(this.name, address);
    if (!location.success) {
      return location;
    }
    if (!location.data) {
      logger.warn(`Could not get coordinates for ${address}`);
      return success([]);
    }

    const nearby = await findNearbyStops(
      this.name,
      boundingBox(location.data, this.params.searchRadiusFeet),
    );
    if (!nearby.success) {
      return nearby;
    }
    logger.debug(`Found ${nearby.data.length} nearby stops for ${address}`);

    const stops = await Promise.all(
      nearby.data.map(async (stop): Promise<TransitStop | null> => {
        const predictions = await fetchPredictions(
          this.name,
          stop.stopId,
          this.params.apiKey,
        );
        if (!predictions.success) {
          logger.debug(predictions.error.message);
          return null;
        }
        if (predictions.data.length === 0) {
          return null;
        }
        return {
          stopId: stop.stopId,
          title: stop.title,
          address,
          predictions: predictions.data,
        };
      }),
    );

    return success(stops.filter((stop): stop is TransitStop => stop !== null));
  }
}
