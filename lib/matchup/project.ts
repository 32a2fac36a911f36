import type { FantasyTeam, PeriodKey, Player, ZScoreTable } from "@/lib/domain/types";
import type { EngineConfig } from "@/lib/config/engine";
import { filledSlots, optimizeLineup } from "@/lib/opt/algorithms/greedy";
import { isInjuredOut } from "@/lib/opt/constraints";
import type { DailyLine, DailyLineup } from "@/lib/opt/types";
import { matchupDays } from "@/lib/matchup/calendar";

// player id -> day ids with a game
export type PlayerSchedule = ReadonlyMap<string, readonly number[]>;

// A fantasy team with its roster resolved to players
export type RosterTeam = Pick<FantasyTeam, "id" | "name"> & { players: readonly Player[] };

export type MatchupTotals = DailyLine & {
  "FT%": number; // summed makes / summed attempts
  gamesPlayed: number;
  days: DailyLineup[];
};

const COUNTING_KEYS = ["PTS", "AST", "BLK", "REB", "STL", "3PM", "FTM", "FTA", "DD"] as const;

export function scheduleFromProTeams(
  players: readonly Player[],
  proSchedule: Readonly<Record<string, readonly number[]>>
): PlayerSchedule {
  return new Map(players.map((p) => [p.id, proSchedule[p.proTeam] ?? []] as const));
}

export function playersAvailableOn(
  day: number,
  roster: readonly Player[],
  schedule: PlayerSchedule
): Player[] {
  return roster.filter((p) => !isInjuredOut(p) && (schedule.get(p.id) ?? []).includes(day));
}

/**
 * Sum of daily optimized lineups over a matchup window. Days without an
 * eligible player add nothing. FT% is derived from the summed makes and
 * attempts, never averaged across days.
 */
export function projectMatchupTotals(
  team: RosterTeam,
  matchupId: number,
  schedule: PlayerSchedule,
  zscores: ZScoreTable,
  period: PeriodKey,
  config: EngineConfig
): MatchupTotals {
  const window = matchupDays(matchupId, config);
  const totals: MatchupTotals = {
    PTS: 0,
    AST: 0,
    BLK: 0,
    REB: 0,
    STL: 0,
    "3PM": 0,
    FTM: 0,
    FTA: 0,
    DD: 0,
    "FT%": 0,
    gamesPlayed: 0,
    days: [],
  };

  for (const day of window) {
    const available = playersAvailableOn(day, team.players, schedule);
    if (available.length === 0) {
      totals.days.push({ day, eligible: 0, slots: [] });
      continue;
    }
    const slots = optimizeLineup(available, zscores, period, config);
    for (const { line } of filledSlots(slots)) {
      for (const k of COUNTING_KEYS) totals[k] += line[k];
      totals.gamesPlayed += 1;
    }
    totals.days.push({ day, eligible: available.length, slots });
  }

  totals["FT%"] = totals.FTA > 0 ? totals.FTM / totals.FTA : 0;
  return totals;
}
