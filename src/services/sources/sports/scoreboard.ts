import { z } from "zod";
import { Game, GameStatus, SportsLeague } from "@core/types";
import { formatStartTime } from "@utils/time";

/**
 * Scoreboard endpoints per league key
 */
export const SCOREBOARD_URLS: Record<SportsLeague, string> = {
  NBA: "https://site.api.espn.com/apis/site/v2/sports/basketball/nba/scoreboard",
  NFL: "https://site.api.espn.com/apis/site/v2/sports/football/nfl/scoreboard",
  WNBA: "https://site.api.espn.com/apis/site/v2/sports/basketball/wnba/scoreboard",
  NHL: "https://site.api.espn.com/apis/site/v2/sports/hockey/nhl/scoreboard",
  MLB: "https://site.api.espn.com/apis/site/v2/sports/baseball/mlb/scoreboard",
};

// ============================================================================
// Response schema (only the fields the display uses)
// ============================================================================

const teamOddsSchema = z.object({
  displayOdds: z.string().optional(),
});

const competitorSchema = z.object({
  homeAway: z.string().optional(),
  score: z.string().optional(),
  team: z
    .object({
      abbreviation: z.string().optional(),
      logo: z.string().optional(),
    })
    .default({}),
});

const competitionSchema = z.object({
  status: z
    .object({
      type: z
        .object({
          name: z.string().default("STATUS_UNKNOWN"),
          shortDetail: z.string().default(""),
        })
        .default({}),
    })
    .default({}),
  competitors: z.array(competitorSchema).default([]),
  odds: z
    .array(
      z.object({
        details: z.string().optional(),
        homeTeamOdds: teamOddsSchema.optional(),
        awayTeamOdds: teamOddsSchema.optional(),
      }),
    )
    .optional(),
});

export const scoreboardSchema = z.object({
  events: z
    .array(
      z.object({
        id: z.string(),
        date: z.string().optional(),
        competitions: z.array(competitionSchema).default([]),
      }),
    )
    .default([]),
});

export type Scoreboard = z.infer<typeof scoreboardSchema>;
type Competition = z.infer<typeof competitionSchema>;
type Competitor = z.infer<typeof competitorSchema>;

// ============================================================================
// Normalisation
// ============================================================================

const STATUS_MAP: Record<string, GameStatus> = {
  STATUS_IN_PROGRESS: GameStatus.IN_PROGRESS,
  STATUS_HALFTIME: GameStatus.IN_PROGRESS,
  STATUS_END_PERIOD: GameStatus.IN_PROGRESS,
  STATUS_SCHEDULED: GameStatus.SCHEDULED,
  STATUS_FINAL: GameStatus.FINAL,
  STATUS_POSTPONED: GameStatus.POSTPONED,
  STATUS_CANCELED: GameStatus.CANCELED,
};

export interface NormalizeOptions {
  now: number;
  timeZone: string;
  lookaheadDays: number;
}

/**
 * Turn one league's scoreboard into games, dropping events without two
 * competitors and games further out than the lookahead window
 */
export function normalizeScoreboard(
  scoreboard: Scoreboard,
  league: string,
  options: NormalizeOptions,
): Game[] {
  const horizon = options.now + options.lookaheadDays * 24 * 60 * 60 * 1000;
  const games: Game[] = [];

  for (const event of scoreboard.events) {
    const competition = event.competitions[0];
    if (!competition || competition.competitors.length < 2) {
      continue;
    }

    const [away, home] = splitCompetitors(competition.competitors);
    const status = STATUS_MAP[competition.status.type.name] ?? GameStatus.OTHER;
    const parsedDate = event.date ? Date.parse(event.date) : NaN;
    const startTime = Number.isNaN(parsedDate) ? null : parsedDate;

    if (startTime !== null && startTime > horizon) {
      continue;
    }

    games.push({
      id: `${league}:${event.id}`,
      league,
      awayTeam: away.team.abbreviation ?? "AWAY",
      homeTeam: home.team.abbreviation ?? "HOME",
      awayScore: away.score ?? "0",
      homeScore: home.score ?? "0",
      status,
      statusDetail: statusText(
        status,
        competition.status.type.shortDetail,
        startTime,
        options,
      ),
      startTime,
      odds: status === GameStatus.SCHEDULED ? extractOdds(competition) : null,
      awayLogoUrl: away.team.logo ?? null,
      homeLogoUrl: home.team.logo ?? null,
    });
  }

  return games;
}

/**
 * Live games first, then scheduled, then everything else; each group by
 * start time with unknown times last
 */
export function sortGames(games: Game[]): Game[] {
  const rank = (game: Game): number => {
    if (game.status === GameStatus.IN_PROGRESS) return 0;
    if (game.status === GameStatus.SCHEDULED) return 1;
    return 2;
  };
  return [...games].sort(
    (a, b) =>
      rank(a) - rank(b) ||
      (a.startTime ?? Infinity) - (b.startTime ?? Infinity),
  );
}

/**
 * Keep games involving a favourite team. Leagues without favourites
 * keep every game.
 */
export function filterFavorites(
  games: Game[],
  favoriteTeams: Record<string, string[]>,
): Game[] {
  return games.filter((game) => {
    const favorites = favoriteTeams[game.league] ?? [];
    if (favorites.length === 0) {
      return true;
    }
    const wanted = favorites.map((team) => team.toUpperCase());
    return (
      wanted.includes(game.awayTeam.toUpperCase()) ||
      wanted.includes(game.homeTeam.toUpperCase())
    );
  });
}

function splitCompetitors(
  competitors: Competitor[],
): [Competitor, Competitor] {
  const [first, second] = competitors;
  if (second.homeAway === "away") {
    return [second, first];
  }
  return [first, second];
}

function statusText(
  status: GameStatus,
  shortDetail: string,
  startTime: number | null,
  options: NormalizeOptions,
): string {
  switch (status) {
    case GameStatus.SCHEDULED:
      return startTime === null
        ? "TBD"
        : formatStartTime(startTime, options.now, options.timeZone);
    case GameStatus.OTHER:
      return shortDetail.split(" ").slice(0, 2).join(" ");
    default:
      return shortDetail;
  }
}

function extractOdds(competition: Competition): string | null {
  const first = competition.odds?.[0];
  if (!first) {
    return null;
  }
  if (first.details) {
    return first.details;
  }
  const away = first.awayTeamOdds?.displayOdds;
  const home = first.homeTeamOdds?.displayOdds;
  return away && home ? `${away}/${home}` : null;
}

/**
 * Split a betting line into the two lines drawn where the scores go:
 * "OKC -6.5/LAL +3" by the slash, "GS -6.5" into team and spread
 */
export function splitOdds(odds: string): [string, string] {
  if (odds.includes("/")) {
    const [away, home] = odds.split("/");
    return [away.trim(), home.trim()];
  }
  const parts = odds.split(/\s+/);
  if (parts.length >= 2) {
    return [parts[0], parts.slice(1).join(" ")];
  }
  return [odds, ""];
}
