/**
 * Shape of the `data/games.json` artifact written by the site generator.
 */

/** Open set: anything outside the known tags falls back to a generic icon. */
export type PlatformTag = 'PC' | 'IOS' | 'ANDROID' | (string & {});

export interface GameRecord {
  readonly id: number | string;
  readonly name: string;
  readonly link: string;
  readonly image: string | null;
  readonly platform: PlatformTag;
  /** 0-5; null or 0 means "no rating" */
  readonly rating: number | null;
  /** ISO-8601, may be missing or malformed */
  readonly firstFreeDate: string | null;
  readonly epicId?: string | null;
  readonly lastFreeDate?: string | null;
  readonly startDate?: string | null;
  readonly endDate?: string | null;
  readonly status?: string | null;
}

export interface UpcomingGameRecord extends GameRecord {
  readonly startDate: string | null;
  readonly endDate: string | null;
}

export interface StatisticsSummary {
  readonly gamesByYear: Readonly<Record<string, number>>;
  readonly totalGames?: number;
  readonly totalPromotions?: number;
  readonly firstGameDate?: string | null;
  readonly avgGamesPerWeek?: number;
}

export interface Dataset {
  readonly allGames: readonly GameRecord[];
  readonly upcomingGames: readonly UpcomingGameRecord[];
  readonly currentGames: readonly GameRecord[];
  readonly statistics: StatisticsSummary;
  readonly lastUpdated: string | null;
}
