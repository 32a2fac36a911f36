import type { FantasyTeam, LeagueSnapshot, MatchupPairing, Player, StatRecord } from "@/lib/domain/types";
import { OUT_STATUSES } from "@/lib/opt/config";
import { normalizeProTeam, splitPositions } from "./aliases";
import type { MatchupCsv, PlayerCsv, ScheduleCsv, StatCsv, TeamCsv } from "./schemas";

export function normalizeTeams(rows: TeamCsv[]): FantasyTeam[] {
  return rows.map((r) => ({ id: r.team_id, name: r.team_name, roster: [] }));
}

export function normalizePlayers(rows: PlayerCsv[]): Player[] {
  return rows.map((r) => {
    const status = r.injury_status ? r.injury_status.toUpperCase() : null;
    return {
      id: r.player_id,
      name: r.name,
      positions: splitPositions(r.positions),
      proTeam: normalizeProTeam(r.pro_team),
      injuryStatus: status,
      injured: status !== null && OUT_STATUSES.includes(status),
      fantasyTeamId: r.fantasy_team_id,
      stats: {},
    };
  });
}

export function toStatRecord(r: StatCsv): StatRecord {
  return {
    PTS: r.PTS,
    REB: r.REB,
    AST: r.AST,
    STL: r.STL,
    BLK: r.BLK,
    "3PM": r["3PM"],
    FTM: r.FTM,
    FTA: r.FTA,
    "FT%": r["FT%"],
    GP: r.GP,
  };
}

// Attach per-period records; rows for unknown players come back unmatched
export function attachStats(players: Player[], rows: StatCsv[]): { players: Player[]; unmatched: StatCsv[] } {
  const byId = new Map(players.map((p): [string, Player] => [p.id, { ...p, stats: { ...p.stats } }]));
  const unmatched: StatCsv[] = [];
  for (const r of rows) {
    const p = byId.get(r.player_id);
    if (!p) {
      unmatched.push(r);
      continue;
    }
    p.stats[r.period] = toStatRecord(r);
  }
  return { players: [...byId.values()], unmatched };
}

export function buildProSchedule(rows: ScheduleCsv[]): Record<string, number[]> {
  const out: Record<string, number[]> = {};
  for (const r of rows) {
    const team = normalizeProTeam(r.pro_team);
    const days = (out[team] ??= []);
    if (!days.includes(r.day)) days.push(r.day);
  }
  for (const days of Object.values(out)) days.sort((a, b) => a - b);
  return out;
}

export function normalizePairings(rows: MatchupCsv[]): MatchupPairing[] {
  return rows.map((r) => ({ matchupId: r.matchup_id, teamA: r.team_a, teamB: r.team_b }));
}

/**
 * Join players to fantasy teams. Players pointing at an unknown team are
 * reported and treated as free agents. At most `freeAgentSampleSize` free
 * agents are kept, in file order.
 */
export function buildSnapshot(
  teams: FantasyTeam[],
  players: Player[],
  proSchedule: Record<string, number[]>,
  pairings: MatchupPairing[],
  freeAgentSampleSize: number
): { snapshot: LeagueSnapshot; orphanedPlayers: string[] } {
  const rosters = new Map<string, string[]>();
  for (const t of teams) rosters.set(t.id, []);
  const orphanedPlayers: string[] = [];
  const freeAgents: string[] = [];
  const kept: Player[] = [];

  for (const p of players) {
    const roster = p.fantasyTeamId !== null ? rosters.get(p.fantasyTeamId) : undefined;
    if (roster) {
      roster.push(p.id);
      kept.push(p);
      continue;
    }
    if (p.fantasyTeamId !== null) orphanedPlayers.push(p.id);
    if (freeAgents.length < freeAgentSampleSize) {
      freeAgents.push(p.id);
      kept.push({ ...p, fantasyTeamId: null });
    }
  }

  return {
    snapshot: {
      players: kept,
      teams: teams.map((t) => ({ ...t, roster: rosters.get(t.id) ?? [] })),
      freeAgents,
      proSchedule,
      pairings,
    },
    orphanedPlayers,
  };
}
