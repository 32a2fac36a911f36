import { z } from "zod";
import { CATEGORIES, type Category } from "@/lib/domain/types";
import { ValidationError } from "@/lib/domain/errors";
import { DEFAULT_SLOTS } from "@/lib/opt/config";
import type { Slot } from "@/lib/opt/types";

export const DOUBLE_DOUBLE_STATS = ["PTS", "REB", "AST", "STL", "BLK"] as const;
export type DoubleDoubleStat = (typeof DOUBLE_DOUBLE_STATS)[number];

export const DEFAULT_LEAGUE_ID = 682068465;
export const DEFAULT_SEASON = 2026;
export const FULL_SEASON_GAMES = 82;
export const FREE_AGENT_SAMPLE_SIZE = 60;
export const DEFAULT_SEASON_START = "2025-10-21"; // scoring period 1

// Per-game standard deviation as a fraction of the player's average.
// Low-volume categories swing more game to game.
export const DEFAULT_VARIANCE_RATIOS: Record<DoubleDoubleStat, number> = {
  PTS: 0.35,
  REB: 0.4,
  AST: 0.45,
  BLK: 0.6,
  STL: 0.6,
};
export const FALLBACK_VARIANCE_RATIO = 0.4;
export const DOUBLE_DOUBLE_THRESHOLD = 10;

// matchup id -> [first day, last day], inclusive
const MATCHUP_WINDOWS_2026: [number, number, number][] = [
  [1, 1, 6], // Oct 21 - 26
  [2, 7, 13],
  [3, 14, 20],
  [4, 21, 27],
  [5, 28, 34],
  [6, 35, 41],
  [7, 42, 48],
  [8, 49, 55],
  [9, 56, 62],
  [10, 63, 69],
  [11, 70, 76],
  [12, 77, 83],
  [13, 84, 90],
  [14, 91, 97],
  [15, 98, 104],
  [16, 105, 111],
  [17, 112, 125], // All-Star break, two weeks
  [18, 126, 132],
  [19, 133, 139],
  [20, 140, 146], // Mar 9 - 15
];

function range(first: number, last: number): number[] {
  const out: number[] = [];
  for (let d = first; d <= last; d++) out.push(d);
  return out;
}

function readOnlyMap<K, V>(entries: Iterable<readonly [K, V]>): ReadonlyMap<K, V> {
  const map = new Map(entries);
  const refuse = (): never => {
    throw new TypeError("engine configuration is read-only");
  };
  return Object.freeze(Object.assign(map, { set: refuse, delete: refuse, clear: refuse }));
}

export function defaultMatchupSchedule(): ReadonlyMap<number, readonly number[]> {
  return readOnlyMap(
    MATCHUP_WINDOWS_2026.map(([id, first, last]) => [id, Object.freeze(range(first, last))] as const)
  );
}

export type EngineConfig = Readonly<{
  leagueId: number;
  season: number;
  categories: readonly Category[];
  varianceRatios: Readonly<Record<DoubleDoubleStat, number>>;
  doubleDoubleThreshold: number;
  slots: readonly Slot[];
  fullSeasonGames: number;
  freeAgentSampleSize: number;
  seasonStart: string; // YYYY-MM-DD
  matchupSchedule: ReadonlyMap<number, readonly number[]>;
}>;

const ratio = z.number().positive().max(5);

export const EngineConfigOverridesSchema = z
  .object({
    leagueId: z.number().int().positive(),
    season: z.number().int().min(2000).max(2100),
    varianceRatios: z
      .object({
        PTS: ratio,
        REB: ratio,
        AST: ratio,
        STL: ratio,
        BLK: ratio,
      })
      .partial(),
    fullSeasonGames: z.number().int().positive(),
    freeAgentSampleSize: z.number().int().min(0),
    seasonStart: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "expected YYYY-MM-DD"),
    matchupSchedule: z.record(
      z.string().regex(/^\d+$/, "matchup ids are positive integers"),
      z.array(z.number().int().positive()).min(1)
    ),
  })
  .partial()
  .strict();

export type EngineConfigOverrides = z.input<typeof EngineConfigOverridesSchema>;

export function createEngineConfig(overrides: EngineConfigOverrides = {}): EngineConfig {
  const parsed = EngineConfigOverridesSchema.safeParse(overrides);
  if (!parsed.success) {
    throw new ValidationError(
      "Invalid engine configuration",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const o = parsed.data;

  const schedule = o.matchupSchedule
    ? readOnlyMap(
        Object.entries(o.matchupSchedule)
          .map(([id, days]) => [Number(id), Object.freeze([...days])] as const)
          .sort((a, b) => a[0] - b[0])
      )
    : defaultMatchupSchedule();

  return Object.freeze({
    leagueId: o.leagueId ?? DEFAULT_LEAGUE_ID,
    season: o.season ?? DEFAULT_SEASON,
    categories: Object.freeze([...CATEGORIES]),
    varianceRatios: Object.freeze({ ...DEFAULT_VARIANCE_RATIOS, ...o.varianceRatios }),
    doubleDoubleThreshold: DOUBLE_DOUBLE_THRESHOLD,
    slots: Object.freeze([...DEFAULT_SLOTS]),
    fullSeasonGames: o.fullSeasonGames ?? FULL_SEASON_GAMES,
    freeAgentSampleSize: o.freeAgentSampleSize ?? FREE_AGENT_SAMPLE_SIZE,
    seasonStart: o.seasonStart ?? DEFAULT_SEASON_START,
    matchupSchedule: schedule,
  });
}

export const DEFAULT_ENGINE_CONFIG: EngineConfig = createEngineConfig();
