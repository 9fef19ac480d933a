import {
  Colors,
  Headline,
  NewsCache,
  NewsModuleParams,
  RenderContext,
  Result,
  ScrollParams,
  success,
  failure,
} from "@core/types";
import { DisplayModule } from "@core/interfaces/IDisplayModule";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { FetchError } from "@core/errors/FetchError";
import { Carousel } from "@services/scroll/Carousel";
import { TextTicker } from "@services/scroll/ScrollEngine";
import { renderBitmapText, renderCenteredText } from "@utils/bitmapFont";
import { getLogger } from "@utils/logger";
import { fetchText } from "../http";
import { parseFeed } from "./feed";

const logger = getLogger("NewsModule");

const HEADLINE_X = 1;
const HEADLINE_Y = 14;

export interface NewsModuleOptions {
  name: string;
  params: NewsModuleParams;
  scroll: ScrollParams;
  displayDurationSeconds: number;
}

/**
 * Headlines from RSS/Atom feeds, scrolled one at a time.
 *
 * Each headline is held at the left edge for the settle time, scrolls
 * until it has left the screen, then the next one starts.
 */
export class NewsModule implements DisplayModule<NewsCache> {
  readonly name: string;

  private readonly params: NewsModuleParams;
  private readonly settleSeconds: number;
  private readonly baseDuration: number;
  private readonly carousel = new Carousel<Headline>(0, (headline) => headline.id);
  private readonly ticker: TextTicker;

  private shownHeadlines: Headline[] | null = null;
  private headlineElapsed = 0;

  constructor(options: NewsModuleOptions) {
    this.name = options.name;
    this.params = options.params;
    this.settleSeconds = options.scroll.settleSeconds;
    this.baseDuration = options.displayDurationSeconds;
    this.ticker = new TextTicker(options.scroll);
  }

  async refresh(): Promise<Result<NewsCache, FetchError>> {
    const results = await Promise.all(
      this.params.sources.map(async (source) => {
        const body = await fetchText(this.name, source.url, {
          headers: { Accept: "application/rss+xml, application/atom+xml, text/xml" },
        });
        if (!body.success) {
          return body;
        }
        const items = await parseFeed(this.name, body.data);
        if (!items.success) {
          return items;
        }
        return success(
          items.data.slice(0, this.params.maxHeadlinesPerSource).map(
            (item): Headline => ({
              id: `${source.key}:${item.link ?? item.title}`,
              title: item.title,
              source: source.key,
              sourceName: source.name,
            }),
          ),
        );
      }),
    );

    const headlines: Headline[] = [];
    for (const [index, result] of results.entries()) {
      if (!result.success) {
        logger.warn(result.error.message);
        if (results.every((r) => !r.success)) {
          return failure(result.error);
        }
        continue;
      }
      logger.debug(
        `Found ${result.data.length} headlines from ${this.params.sources[index].name}`,
      );
      headlines.push(...result.data);
    }

    logger.info(`Total headlines collected: ${headlines.length}`);
    return success({ headlines });
  }

  render(frame: IFrameBuffer, context: RenderContext<NewsCache>): void {
    const { cache, dt } = context;
    if (cache.headlines !== this.shownHeadlines) {
      this.carousel.setItems(cache.headlines);
      this.shownHeadlines = cache.headlines;
      const current = this.carousel.current();
      if (current && this.ticker.setText(current.title)) {
        this.headlineElapsed = 0;
      }
    }

    const headline = this.carousel.current();
    if (!headline) {
      renderCenteredText(frame, "NO NEWS", 13, Colors.WHITE);
      return;
    }

    this.ticker.advance(dt);
    this.headlineElapsed += dt;
    if (this.ticker.isDone() && this.headlineElapsed >= this.settleSeconds) {
      this.carousel.next();
      this.startCurrent();
    }

    const shown = this.carousel.current() ?? headline;
    renderBitmapText(frame, shown.source, 1, 1, Colors.CYAN);
    renderBitmapText(
      frame,
      this.ticker.getText(),
      this.ticker.drawX(HEADLINE_X),
      HEADLINE_Y,
      Colors.WHITE,
    );
  }

  displayDuration(_cache: NewsCache): number {
    return this.baseDuration;
  }

  hasContent(cache: NewsCache): boolean {
    return cache.headlines.length > 0;
  }

  resetAnimation(): void {
    this.carousel.reset();
    this.startCurrent();
  }

  /**
   * Headline currently on screen
   */
  currentHeadline(): Headline | null {
    return this.carousel.current();
  }

  /**
   * Restart the ticker on the carousel's current headline
   */
  private startCurrent(): void {
    this.headlineElapsed = 0;
    const current = this.carousel.current();
    if (current && !this.ticker.setText(current.title)) {
      this.ticker.reset();
    }
  }
}
