import { Game, GameStatus } from "@core/types";

type EventOptions = {
  id: string;
  status?: string;
  detail?: string;
  date?: string;
  away?: string;
  home?: string;
  awayScore?: string;
  homeScore?: string;
  odds?: Array<Record<string, unknown>>;
  logos?: boolean;
};

/**
 * Scoreboard event in the feed's shape, home team listed first
 */
export function scoreboardEvent(options: EventOptions): Record<string, unknown> {
  const away = options.away ?? "LAL";
  const home = options.home ?? "GS";
  return {
    id: options.id,
    date: options.date,
    competitions: [
      {
        status: {
          type: {
            name: options.status ?? "STATUS_SCHEDULED",
            shortDetail: options.detail ?? "",
          },
        },
        competitors: [
          {
            homeAway: "home",
            score: options.homeScore ?? "0",
            team: {
              abbreviation: home,
              logo: options.logos ? `https://logos.test/${home}.png` : undefined,
            },
          },
          {
            homeAway: "away",
            score: options.awayScore ?? "0",
            team: {
              abbreviation: away,
              logo: options.logos ? `https://logos.test/${away}.png` : undefined,
            },
          },
        ],
        odds: options.odds,
      },
    ],
  };
}

export function game(overrides: Partial<Game> & { id: string }): Game {
  return {
    league: "NBA",
    awayTeam: "LAL",
    homeTeam: "GS",
    awayScore: "0",
    homeScore: "0",
    status: GameStatus.SCHEDULED,
    statusDetail: "7:00PM",
    startTime: null,
    odds: null,
    awayLogoUrl: null,
    homeLogoUrl: null,
    ...overrides,
  };
}
