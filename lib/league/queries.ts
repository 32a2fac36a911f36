import { byCategory } from "@/lib/domain/types";
import type {
  Category,
  FantasyTeam,
  LeagueSnapshot,
  PeriodKey,
  Player,
  StatRecord,
  ZScoreEntry,
} from "@/lib/domain/types";
import { ValidationError } from "@/lib/domain/errors";
import { normalizeNameKey } from "@/lib/ingest/aliases";
import { currentMatchupId, fullPeriodKey, matchupDays, resolvePeriodKey } from "@/lib/matchup/calendar";
import { compareTeams, type ComparisonResult } from "@/lib/matchup/compare";
import {
  projectMatchupTotals,
  scheduleFromProTeams,
  type MatchupTotals,
  type PlayerSchedule,
  type RosterTeam,
} from "@/lib/matchup/project";
import type { LeagueStore } from "@/lib/state/league-store";

export type QueryOptions = {
  period?: string; // "total", "last_15", "2026_projected", ...
  matchupId?: number; // defaults to the matchup containing `today`
  today?: Date;
};

type Scope = {
  snapshot: LeagueSnapshot;
  period: PeriodKey;
  fullPeriod: string;
  matchupId: number;
  days: readonly number[];
  schedule: PlayerSchedule;
};

function resolveScope(store: LeagueStore, opts: QueryOptions, defaultPeriod: PeriodKey): Scope {
  const { snapshot, config } = store.getState();
  if (!snapshot) throw new ValidationError("No league loaded");
  const period = resolvePeriodKey(opts.period ?? defaultPeriod, config.season);
  const matchupId = opts.matchupId ?? currentMatchupId(opts.today ?? new Date(), config);
  return {
    snapshot,
    period,
    fullPeriod: fullPeriodKey(period, config.season),
    matchupId,
    days: matchupDays(matchupId, config),
    schedule: scheduleFromProTeams(snapshot.players, snapshot.proSchedule),
  };
}

export function findTeam(snapshot: LeagueSnapshot, query: string): FantasyTeam {
  const q = query.trim().toLowerCase();
  const team = snapshot.teams.find((t) => t.id.toLowerCase() === q) ?? snapshot.teams.find((t) => t.name.toLowerCase() === q);
  if (!team) {
    throw new ValidationError(`Team '${query}' not found`, [
      `available teams: ${snapshot.teams.map((t) => t.name).join(", ")}`,
    ]);
  }
  return team;
}

export function findPlayer(snapshot: LeagueSnapshot, query: string): Player {
  const key = normalizeNameKey(query);
  const player = snapshot.players.find((p) => p.id === query.trim()) ?? snapshot.players.find((p) => normalizeNameKey(p.name) === key);
  if (!player) throw new ValidationError(`Player '${query}' not found`);
  return player;
}

function resolveRoster(snapshot: LeagueSnapshot, team: FantasyTeam): RosterTeam {
  const byId = new Map(snapshot.players.map((p) => [p.id, p] as const));
  return {
    id: team.id,
    name: team.name,
    players: team.roster.flatMap((id) => {
      const p = byId.get(id);
      return p ? [p] : [];
    }),
  };
}

function gameDays(player: Player, scope: Scope): number[] {
  const days = scope.schedule.get(player.id) ?? [];
  return scope.days.filter((d) => days.includes(d));
}

export type TeamProjection = {
  team: Pick<FantasyTeam, "id" | "name">;
  matchupId: number;
  period: PeriodKey;
  fullPeriod: string;
  totals: MatchupTotals;
};

export function projectTeam(store: LeagueStore, teamQuery: string, opts: QueryOptions = {}): TeamProjection {
  const scope = resolveScope(store, opts, "projected");
  const team = findTeam(scope.snapshot, teamQuery);
  const { config, zscoresFor } = store.getState();
  const totals = projectMatchupTotals(
    resolveRoster(scope.snapshot, team),
    scope.matchupId,
    scope.schedule,
    zscoresFor(scope.period),
    scope.period,
    config
  );
  return { team: { id: team.id, name: team.name }, matchupId: scope.matchupId, period: scope.period, fullPeriod: scope.fullPeriod, totals };
}

export type MatchupProjection = {
  teamA: string;
  teamB: string;
  totalsA: MatchupTotals;
  totalsB: MatchupTotals;
} & ComparisonResult;

// Listed pairings for the matchup, else teams paired in order (1v2, 3v4, ...)
export function pairingsFor(snapshot: LeagueSnapshot, matchupId: number): [FantasyTeam, FantasyTeam][] {
  const listed = snapshot.pairings.filter((p) => p.matchupId === matchupId);
  if (listed.length > 0) {
    return listed.map((p): [FantasyTeam, FantasyTeam] => [findTeam(snapshot, p.teamA), findTeam(snapshot, p.teamB)]);
  }
  const out: [FantasyTeam, FantasyTeam][] = [];
  for (let i = 0; i + 1 < snapshot.teams.length; i += 2) out.push([snapshot.teams[i], snapshot.teams[i + 1]]);
  return out;
}

export function projectLeagueMatchups(
  store: LeagueStore,
  opts: QueryOptions = {}
): { matchupId: number; period: PeriodKey; fullPeriod: string; matchups: MatchupProjection[] } {
  const scope = resolveScope(store, opts, "projected");
  const { config, zscoresFor } = store.getState();
  const zscores = zscoresFor(scope.period);

  const totals = new Map<string, MatchupTotals>();
  for (const team of scope.snapshot.teams) {
    totals.set(
      team.id,
      projectMatchupTotals(resolveRoster(scope.snapshot, team), scope.matchupId, scope.schedule, zscores, scope.period, config)
    );
  }

  const matchups = pairingsFor(scope.snapshot, scope.matchupId).flatMap(([a, b]) => {
    const totalsA = totals.get(a.id);
    const totalsB = totals.get(b.id);
    if (!totalsA || !totalsB) return [];
    return [{ teamA: a.name, teamB: b.name, totalsA, totalsB, ...compareTeams(totalsA, totalsB, config.categories) }];
  });
  return { matchupId: scope.matchupId, period: scope.period, fullPeriod: scope.fullPeriod, matchups };
}

export type PlayerLine = {
  playerId: string;
  name: string;
  proTeam: string;
  positions: string[];
  injuryStatus: string | null;
  perGamePower: number;
  seasonPower: number;
  zscores: Record<Category, number>;
  gameDays: number[];
};

function unrankedEntry(playerId: string): ZScoreEntry {
  return {
    playerId,
    zscores: byCategory(() => 0),
    rawPerGamePower: 0,
    perGamePower: 0,
    seasonPower: 0,
    gamesPlayed: 0,
  };
}

function playerLine(player: Player, z: ZScoreEntry, scope: Scope): PlayerLine {
  return {
    playerId: player.id,
    name: player.name,
    proTeam: player.proTeam,
    positions: player.positions,
    injuryStatus: player.injuryStatus,
    perGamePower: z.perGamePower,
    seasonPower: z.seasonPower,
    zscores: z.zscores,
    gameDays: gameDays(player, scope),
  };
}

// Players without a z entry for the period are dropped unless `keepUnranked`,
// in which case they trail the ranking with zero power
function rankedLines(
  players: readonly Player[],
  store: LeagueStore,
  scope: Scope,
  keepUnranked = false
): PlayerLine[] {
  const zscores = store.getState().zscoresFor(scope.period);
  const ranked: PlayerLine[] = [];
  const unranked: PlayerLine[] = [];
  for (const p of players) {
    const z = zscores.get(p.id);
    if (z) ranked.push(playerLine(p, z, scope));
    else if (keepUnranked) unranked.push(playerLine(p, unrankedEntry(p.id), scope));
  }
  ranked.sort((a, b) => b.perGamePower - a.perGamePower);
  return [...ranked, ...unranked];
}

export function topFreeAgents(
  store: LeagueStore,
  opts: QueryOptions & { limit?: number } = {}
): { matchupId: number; period: PeriodKey; fullPeriod: string; freeAgents: PlayerLine[] } {
  const scope = resolveScope(store, opts, "total");
  const fa = new Set(scope.snapshot.freeAgents);
  const pool = scope.snapshot.players.filter((p) => fa.has(p.id));
  const limit = opts.limit ?? 10;
  return {
    matchupId: scope.matchupId,
    period: scope.period,
    fullPeriod: scope.fullPeriod,
    freeAgents: rankedLines(pool, store, scope).slice(0, limit),
  };
}

export function teamRoster(
  store: LeagueStore,
  teamQuery: string,
  opts: QueryOptions = {}
): { team: Pick<FantasyTeam, "id" | "name">; matchupId: number; period: PeriodKey; players: PlayerLine[] } {
  const scope = resolveScope(store, opts, "total");
  const team = findTeam(scope.snapshot, teamQuery);
  return {
    team: { id: team.id, name: team.name },
    matchupId: scope.matchupId,
    period: scope.period,
    players: rankedLines(resolveRoster(scope.snapshot, team).players, store, scope, true),
  };
}

export type PlayerReport = {
  player: Pick<Player, "id" | "name" | "proTeam" | "positions" | "injuryStatus" | "fantasyTeamId">;
  period: PeriodKey;
  fullPeriod: string;
  averages: StatRecord | null;
  zscore: ZScoreEntry | null;
};

export function playerReport(store: LeagueStore, playerQuery: string, opts: Omit<QueryOptions, "matchupId" | "today"> = {}): PlayerReport {
  const { snapshot, config, zscoresFor } = store.getState();
  if (!snapshot) throw new ValidationError("No league loaded");
  const period = resolvePeriodKey(opts.period ?? "total", config.season);
  const p = findPlayer(snapshot, playerQuery);
  return {
    player: {
      id: p.id,
      name: p.name,
      proTeam: p.proTeam,
      positions: p.positions,
      injuryStatus: p.injuryStatus,
      fantasyTeamId: p.fantasyTeamId,
    },
    period,
    fullPeriod: fullPeriodKey(period, config.season),
    averages: p.stats[period] ?? null,
    zscore: zscoresFor(period).get(p.id) ?? null,
  };
}
