// Domain models shared by ingest, stats, lineup and matchup code

export const CATEGORIES = ["PTS", "BLK", "STL", "AST", "REB", "3PM", "FT%", "DD"] as const;
export type Category = (typeof CATEGORIES)[number];

const STAT_KEYS = ["PTS", "REB", "AST", "STL", "BLK", "3PM", "FTM", "FTA", "FT%", "GP"] as const;
export type StatKey = (typeof STAT_KEYS)[number];

// null (or a missing key) means the provider had no value
export type StatRecord = Partial<Record<StatKey, number | null>>;

export const PERIODS = ["total", "last_30", "last_15", "last_7", "projected"] as const;
export type PeriodKey = (typeof PERIODS)[number];

export type Player = {
  id: string;
  name: string;
  positions: string[]; // e.g. ["PG", "SG"]
  proTeam: string; // 3-letter
  injuryStatus: string | null; // "OUT", "DAY_TO_DAY", ...
  injured: boolean;
  fantasyTeamId: string | null; // null for free agents
  stats: Partial<Record<PeriodKey, StatRecord>>;
};

export type FantasyTeam = {
  id: string;
  name: string;
  roster: string[]; // player ids
};

export type MatchupPairing = {
  matchupId: number;
  teamA: string;
  teamB: string;
};

export type LeagueSnapshot = {
  players: Player[];
  teams: FantasyTeam[];
  freeAgents: string[]; // player ids, already sampled
  proSchedule: Record<string, number[]>; // pro team -> day ids with a game
  pairings: MatchupPairing[];
};

export type PopulationStats = {
  mean: number;
  stdDev: number;
  count: number;
};

export type PopulationTable = Record<Category, PopulationStats>;

export type ZScoreEntry = {
  playerId: string;
  zscores: Record<Category, number>;
  rawPerGamePower: number;
  perGamePower: number; // shifted so the weakest player is > 0
  seasonPower: number;
  gamesPlayed: number;
};

export type ZScoreTable = Map<string, ZScoreEntry>;

// Builds a full per-category record without casting
export function byCategory<T>(fn: (category: Category) => T): Record<Category, T> {
  return {
    PTS: fn("PTS"),
    BLK: fn("BLK"),
    STL: fn("STL"),
    AST: fn("AST"),
    REB: fn("REB"),
    "3PM": fn("3PM"),
    "FT%": fn("FT%"),
    DD: fn("DD"),
  };
}
