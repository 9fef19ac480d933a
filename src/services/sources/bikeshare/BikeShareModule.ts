import {
  BikeShareCache,
  BikeShareModuleParams,
  BikeStation,
  Colors,
  RenderContext,
  Result,
  RGB,
  success,
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
import { IconName, renderIcon } from "@utils/icons";
import { getLogger } from "@utils/logger";
import { fetchJson } from "../http";
import {
  SUPPLY_URL,
  summarizeStation,
  supplyRequestBody,
  supplyResponseSchema,
} from "./supply";

const logger = getLogger("BikeShareModule");

const ICON_Y = 10;
const COLUMN_WIDTH = 21;

type Counter = {
  icon: IconName;
  color: RGB;
  count: (station: BikeStation) => number;
};

const COUNTERS: Counter[] = [
  { icon: "wheel", color: Colors.GRAY, count: (s) => s.bikesAvailable },
  { icon: "bolt", color: Colors.GREEN, count: (s) => s.oldGenEbikes },
  { icon: "boltPlus", color: Colors.BLUE, count: (s) => s.nextGenEbikes },
];

export interface BikeShareModuleOptions {
  name: string;
  params: BikeShareModuleParams;
  displayDurationSeconds: number;
}

/**
 * Bikes, e-bikes and free docks at the configured stations, one station
 * at a time
 */
export class BikeShareModule implements DisplayModule<BikeShareCache> {
  readonly name: string;

  private readonly params: BikeShareModuleParams;
  private readonly baseDuration: number;
  private readonly carousel: Carousel<BikeStation>;
  private shownStations: BikeStation[] | null = null;

  constructor(options: BikeShareModuleOptions) {
    this.name = options.name;
    this.params = options.params;
    this.baseDuration = options.displayDurationSeconds;
    this.carousel = new Carousel<BikeStation>(
      options.params.stationDwellSeconds,
      (station) => station.stationId,
    );
  }

  async refresh(): Promise<Result<BikeShareCache, FetchError>> {
    const result = await fetchJson(this.name, SUPPLY_URL, supplyResponseSchema, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: supplyRequestBody(this.params.regionCode),
    });
    if (!result.success) {
      return result;
    }

    const byName = new Map(
      result.data.data.supply.stations.map((station) => [station.stationName, station]),
    );
    const stations: BikeStation[] = [];
    for (const name of this.params.stations) {
      const station = byName.get(name);
      if (!station) {
        logger.warn(`Station not found: ${name}`);
        continue;
      }
      stations.push(summarizeStation(station, this.params.minRangeMiles));
    }

    logger.info(`Bike share update: ${stations.length}/${this.params.stations.length} stations`);
    return success({ stations });
  }

  render(frame: IFrameBuffer, context: RenderContext<BikeShareCache>): void {
    const { cache, dt } = context;
    if (cache.stations !== this.shownStations) {
      this.carousel.setItems(cache.stations);
      this.shownStations = cache.stations;
    }
    this.carousel.advance(dt);

    const station = this.carousel.current();
    if (!station) {
      renderCenteredText(frame, "NO STATIONS", 13, Colors.WHITE);
      return;
    }

    const { width } = frame.dimensions();
    renderBitmapText(
      frame,
      truncateToWidth(station.name.toUpperCase(), width - 2),
      1,
      1,
      Colors.WHITE,
    );

    COUNTERS.forEach((counter, index) => {
      const x = 1 + index * COLUMN_WIDTH;
      renderIcon(frame, counter.icon, x, ICON_Y, counter.color);
      renderBitmapText(
        frame,
        String(counter.count(station)),
        x + 10,
        ICON_Y + 2,
        Colors.WHITE,
      );
    });

    renderIcon(frame, "dock", 1, ICON_Y + 11, Colors.DIM);
    renderBitmapText(
      frame,
      `${station.docksAvailable} DOCKS`,
      11,
      ICON_Y + 13,
      Colors.DIM,
    );
  }

  displayDuration(_cache: BikeShareCache): number {
    return this.baseDuration;
  }

  hasContent(cache: BikeShareCache): boolean {
    return cache.stations.length > 0;
  }

  resetAnimation(): void {
    this.carousel.reset();
  }
}
