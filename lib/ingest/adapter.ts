import { promises as fs } from "fs";
import path from "path";
import type { LeagueSnapshot } from "@/lib/domain/types";
import type { EngineConfig } from "@/lib/config/engine";
import { parseCsv, type ParseReport } from "./parse";
import {
  MATCHUP_ALIASES,
  MatchupCsvSchema,
  PLAYER_ALIASES,
  PlayerCsvSchema,
  SCHEDULE_ALIASES,
  STAT_ALIASES,
  ScheduleCsvSchema,
  StatCsvSchema,
  TEAM_ALIASES,
  TeamCsvSchema,
  type MatchupCsv,
} from "./schemas";
import {
  attachStats,
  buildProSchedule,
  buildSnapshot,
  normalizePairings,
  normalizePlayers,
  normalizeTeams,
} from "./normalize";

export const LEAGUE_FILES = {
  teams: "teams.csv",
  players: "players.csv",
  stats: "stats.csv",
  schedule: "schedule.csv",
  matchups: "matchups.csv", // optional
} as const;

export type IngestSummary = {
  rows: Record<keyof typeof LEAGUE_FILES, number>;
  dropped: Record<keyof typeof LEAGUE_FILES, number>;
  errors: { file: string; row: number; message: string }[];
  unknownColumns: Record<string, string[]>;
  unmatchedStatRows: number;
  orphanedPlayers: string[];
};

export type LeagueExport = {
  teams: string;
  players: string;
  stats: string;
  schedule: string;
  matchups?: string | null;
};

function emptyReport<T>(): ParseReport<T> {
  return { rows: [], errors: [], rowCount: 0, droppedRows: 0, unknownColumns: [] };
}

// Build a snapshot from the CSV texts of a league export
export function buildLeagueFromCsv(
  files: LeagueExport,
  config: EngineConfig
): { snapshot: LeagueSnapshot; summary: IngestSummary } {
  const teams = parseCsv(files.teams, TeamCsvSchema, TEAM_ALIASES);
  const players = parseCsv(files.players, PlayerCsvSchema, PLAYER_ALIASES);
  const stats = parseCsv(files.stats, StatCsvSchema, STAT_ALIASES);
  const schedule = parseCsv(files.schedule, ScheduleCsvSchema, SCHEDULE_ALIASES);
  const matchups = files.matchups ? parseCsv(files.matchups, MatchupCsvSchema, MATCHUP_ALIASES) : emptyReport<MatchupCsv>();

  const withStats = attachStats(normalizePlayers(players.rows), stats.rows);
  const { snapshot, orphanedPlayers } = buildSnapshot(
    normalizeTeams(teams.rows),
    withStats.players,
    buildProSchedule(schedule.rows),
    normalizePairings(matchups.rows),
    config.freeAgentSampleSize
  );

  const reports: [keyof typeof LEAGUE_FILES, ParseReport<unknown>][] = [
    ["teams", teams],
    ["players", players],
    ["stats", stats],
    ["schedule", schedule],
    ["matchups", matchups],
  ];
  const summary: IngestSummary = {
    rows: {
      teams: teams.rowCount,
      players: players.rowCount,
      stats: stats.rowCount,
      schedule: schedule.rowCount,
      matchups: matchups.rowCount,
    },
    dropped: {
      teams: teams.droppedRows,
      players: players.droppedRows,
      stats: stats.droppedRows,
      schedule: schedule.droppedRows,
      matchups: matchups.droppedRows,
    },
    errors: reports.flatMap(([file, rep]) => rep.errors.map((e) => ({ file: LEAGUE_FILES[file], ...e }))),
    unknownColumns: Object.fromEntries(reports.map(([file, rep]) => [file, rep.unknownColumns])),
    unmatchedStatRows: withStats.unmatched.length,
    orphanedPlayers,
  };
  for (const r of withStats.unmatched) {
    summary.errors.push({ file: LEAGUE_FILES.stats, row: -1, message: `Unmatched stat row for player ${r.player_id} (${r.period})` });
  }
  return { snapshot, summary };
}

async function readOptional(file: string): Promise<string | null> {
  try {
    return await fs.readFile(file, "utf8");
  } catch (e: unknown) {
    if (e instanceof Error && "code" in e && e.code === "ENOENT") return null;
    throw e;
  }
}

/**
 * Load a league export directory (teams, players, stats, schedule and an
 * optional matchups file).
 */
export async function loadLeagueDir(
  dir: string,
  config: EngineConfig
): Promise<{ snapshot: LeagueSnapshot; summary: IngestSummary }> {
  const read = (name: string) => fs.readFile(path.join(dir, name), "utf8");
  const [teams, players, stats, schedule, matchups] = await Promise.all([
    read(LEAGUE_FILES.teams),
    read(LEAGUE_FILES.players),
    read(LEAGUE_FILES.stats),
    read(LEAGUE_FILES.schedule),
    readOptional(path.join(dir, LEAGUE_FILES.matchups)),
  ]);
  const res = buildLeagueFromCsv({ teams, players, stats, schedule, matchups }, config);

  const dropped = Object.values(res.summary.dropped).reduce((a, b) => a + b, 0);
  if (dropped > 0 || res.summary.unmatchedStatRows > 0) {
    console.warn(
      `[ingest] ${dir}: dropped ${dropped} invalid rows, ${res.summary.unmatchedStatRows} unmatched stat rows`
    );
  }
  if (res.summary.orphanedPlayers.length > 0) {
    console.warn("[ingest] players on unknown fantasy teams:", res.summary.orphanedPlayers.join(", "));
  }
  console.info(
    `[ingest] loaded ${res.snapshot.players.length} players, ${res.snapshot.teams.length} teams, ${res.snapshot.freeAgents.length} free agents`
  );
  return res;
}
