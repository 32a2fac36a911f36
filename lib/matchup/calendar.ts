import { PERIODS, type PeriodKey } from "@/lib/domain/types";
import { ValidationError } from "@/lib/domain/errors";
import type { EngineConfig } from "@/lib/config/engine";

const PERIOD_ALIASES = new Map<string, PeriodKey>([
  ["total", "total"],
  ["last_30", "last_30"],
  ["last30", "last_30"],
  ["last_15", "last_15"],
  ["last15", "last_15"],
  ["last_7", "last_7"],
  ["last7", "last_7"],
  ["projected", "projected"],
  ["projection", "projected"],
]);

function isPeriodKey(s: string): s is PeriodKey {
  return PERIODS.some((p) => p === s);
}

/**
 * Accepts short keys ("last_30", "last30", "projection") and full keys
 * ("2026_last_30") for the configured season.
 */
export function resolvePeriodKey(input: string, season: number): PeriodKey {
  const key = input.trim().toLowerCase();
  const prefix = `${season}_`;
  if (key.startsWith(prefix)) {
    const rest = key.slice(prefix.length);
    if (isPeriodKey(rest)) return rest;
  }
  const hit = PERIOD_ALIASES.get(key);
  if (hit) return hit;
  throw new ValidationError(`Invalid stat period '${input}'`, [
    `valid options: ${[...PERIOD_ALIASES.keys()].join(", ")}`,
  ]);
}

export function fullPeriodKey(period: PeriodKey, season: number): string {
  return `${season}_${period}`;
}

export function matchupIds(config: EngineConfig): number[] {
  return [...config.matchupSchedule.keys()].sort((a, b) => a - b);
}

export function matchupDays(matchupId: number, config: EngineConfig): readonly number[] {
  const days = config.matchupSchedule.get(matchupId);
  if (!days) {
    const ids = matchupIds(config);
    const bounds = ids.length > 0 ? `${ids[0]} and ${ids[ids.length - 1]}` : "none configured";
    throw new ValidationError(`Invalid matchup_id ${matchupId}`, [`must be between ${bounds}`]);
  }
  return days;
}

const DAY_MS = 24 * 60 * 60 * 1000;

function utcDay(d: Date): number {
  return Date.UTC(d.getFullYear(), d.getMonth(), d.getDate());
}

/**
 * Matchup whose window contains `today` (scoring period 1 = season start).
 * Before the season: the first matchup; after it: the last one.
 */
export function currentMatchupId(today: Date, config: EngineConfig): number {
  const ids = matchupIds(config);
  if (ids.length === 0) throw new ValidationError("No matchups configured");
  const [y, m, d] = config.seasonStart.split("-").map(Number);
  const start = Date.UTC(y, m - 1, d);
  const now = utcDay(today);
  if (now < start) return ids[0];

  const period = Math.floor((now - start) / DAY_MS) + 1;
  for (const id of ids) {
    const days = matchupDays(id, config);
    if (days.length === 0) continue;
    if (Math.min(...days) <= period && period <= Math.max(...days)) return id;
  }
  return ids[ids.length - 1];
}
