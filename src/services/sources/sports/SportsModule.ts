import {
  Colors,
  Game,
  GameStatus,
  RawImage,
  RenderContext,
  Result,
  RGB,
  SportsCache,
  SportsModuleParams,
  success,
  failure,
} from "@core/types";
import { DisplayModule } from "@core/interfaces/IDisplayModule";
import { IFrameBuffer } from "@core/interfaces/IFrameBuffer";
import { FetchError } from "@core/errors/FetchError";
import { Carousel } from "@services/scroll/Carousel";
import {
  calculateBitmapTextWidth,
  renderBitmapText,
  renderCenteredText,
} from "@utils/bitmapFont";
import { getLogger } from "@utils/logger";
import { toError } from "@utils/typeGuards";
import { fetchBuffer, fetchJson } from "../http";
import { decodeLogo } from "./logos";
import {
  SCOREBOARD_URLS,
  filterFavorites,
  normalizeScoreboard,
  scoreboardSchema,
  sortGames,
  splitOdds,
} from "./scoreboard";

const logger = getLogger("SportsModule");

const TEXT_X = 20;
const SCORE_X = 36;

const STATUS_COLORS: Partial<Record<GameStatus, RGB>> = {
  [GameStatus.IN_PROGRESS]: Colors.GREEN,
  [GameStatus.SCHEDULED]: Colors.BLUE,
  [GameStatus.FINAL]: Colors.RED,
};

export interface SportsModuleOptions {
  name: string;
  params: SportsModuleParams;
  timeZone: string;
  clock?: () => number;
}

/**
 * Scoreboards for the configured leagues, one game at a time.
 *
 * Slot length grows with the number of games so a full pass through the
 * carousel fits in one rotation.
 */
export class SportsModule implements DisplayModule<SportsCache> {
  readonly name: string;

  private readonly params: SportsModuleParams;
  private readonly timeZone: string;
  private readonly clock: () => number;
  private readonly carousel: Carousel<Game>;

  /** Logos decoded by earlier refreshes, keyed by URL */
  private readonly logoMemo = new Map<string, RawImage>();

  private shownGames: Game[] | null = null;

  constructor(options: SportsModuleOptions) {
    this.name = options.name;
    this.params = options.params;
    this.timeZone = options.timeZone;
    this.clock = options.clock ?? Date.now;
    this.carousel = new Carousel<Game>(
      options.params.gameDwellSeconds,
      (game) => game.id,
    );
  }

  async refresh(): Promise<Result<SportsCache, FetchError>> {
    const now = this.clock();
    const results = await Promise.all(
      this.params.leagues.map(async (league) => ({
        league,
        result: await fetchJson(this.name, SCOREBOARD_URLS[league], scoreboardSchema),
      })),
    );

    const failed = results.filter((entry) => !entry.result.success);
    const games: Game[] = [];
    for (const { league, result } of results) {
      if (!result.success) {
        logger.warn(`${league}: ${result.error.message}`);
        if (failed.length === results.length) {
          return failure(result.error);
        }
        continue;
      }
      const leagueGames = normalizeScoreboard(result.data, league, {
        now,
        timeZone: this.timeZone,
        lookaheadDays: this.params.lookaheadDays,
      });
      logger.debug(`Found ${leagueGames.length} ${league} games`);
      games.push(...leagueGames);
    }

    const shown = sortGames(filterFavorites(games, this.params.favoriteTeams));
    const logos = this.params.showLogos ? await this.loadLogos(shown) : {};

    logger.info(`Total games found: ${shown.length}`);
    return success({ games: shown, logos });
  }

  render(frame: IFrameBuffer, context: RenderContext<SportsCache>): void {
    const { cache, dt } = context;
    if (cache.games !== this.shownGames) {
      this.carousel.setItems(cache.games);
      this.shownGames = cache.games;
    }
    this.carousel.advance(dt);

    const game = this.carousel.current();
    if (!game) {
      renderCenteredText(frame, "NO GAMES", 13, Colors.WHITE);
      return;
    }
    this.drawGame(frame, game, cache.logos);
  }

  displayDuration(cache: SportsCache): number {
    const count = cache.games.length;
    let seconds: number;
    if (count === 0) {
      seconds = 10;
    } else if (count === 1) {
      seconds = 15;
    } else if (count <= 3) {
      seconds = 25;
    } else {
      seconds = 35;
    }

    const live = cache.games.filter(
      (game) => game.status === GameStatus.IN_PROGRESS,
    ).length;
    return live >= 2 ? seconds + 5 : seconds;
  }

  hasContent(cache: SportsCache): boolean {
    return cache.games.length > 0;
  }

  resetAnimation(): void {
    this.carousel.reset();
  }

  private drawGame(
    frame: IFrameBuffer,
    game: Game,
    logos: Record<string, RawImage>,
  ): void {
    const { width, height } = frame.dimensions();

    const awayLogo = game.awayLogoUrl ? logos[game.awayLogoUrl] : undefined;
    if (awayLogo) {
      frame.blit(awayLogo, 1, 2);
    }
    const homeLogo = game.homeLogoUrl ? logos[game.homeLogoUrl] : undefined;
    if (homeLogo) {
      frame.blit(homeLogo, width - homeLogo.width - 1, 2);
    }

    renderCenteredText(frame, game.league, 1, Colors.YELLOW);
    renderBitmapText(frame, game.awayTeam, TEXT_X, 8, Colors.WHITE);
    renderBitmapText(frame, game.homeTeam, TEXT_X, 16, Colors.WHITE);

    if (game.status === GameStatus.SCHEDULED && game.odds) {
      const [awayLine, homeLine] = splitOdds(game.odds);
      renderBitmapText(frame, awayLine.slice(0, 6), SCORE_X, 8, Colors.YELLOW);
      renderBitmapText(frame, homeLine.slice(0, 6), SCORE_X, 16, Colors.YELLOW);
    } else {
      renderBitmapText(frame, game.awayScore, SCORE_X, 8, Colors.WHITE);
      renderBitmapText(frame, game.homeScore, SCORE_X, 16, Colors.WHITE);
    }

    const status = game.statusDetail.toUpperCase().slice(0, 12);
    const statusX = Math.floor((width - calculateBitmapTextWidth(status)) / 2);
    renderBitmapText(
      frame,
      status,
      statusX,
      height - 7,
      STATUS_COLORS[game.status] ?? Colors.WHITE,
    );
  }

  /**
   * Logos for the shown games. Failed logos are left out and retried on
   * the next refresh.
   */
  private async loadLogos(games: Game[]): Promise<Record<string, RawImage>> {
    const urls = new Set<string>();
    for (const game of games) {
      if (game.awayLogoUrl) urls.add(game.awayLogoUrl);
      if (game.homeLogoUrl) urls.add(game.homeLogoUrl);
    }

    await Promise.all(
      [...urls]
        .filter((url) => !this.logoMemo.has(url))
        .map(async (url) => {
          const body = await fetchBuffer(this.name, url);
          if (!body.success) {
            logger.debug(`Logo unavailable: ${body.error.message}`);
            return;
          }
          try {
            this.logoMemo.set(url, await decodeLogo(body.data));
          } catch (error) {
            logger.debug(`Could not decode logo ${url}: ${toError(error).message}`);
          }
        }),
    );

    const logos: Record<string, RawImage> = {};
    for (const url of urls) {
      const logo = this.logoMemo.get(url);
      if (logo) {
        logos[url] = logo;
      }
    }
    return logos;
  }
}
