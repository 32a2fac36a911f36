import type { StatRecord } from "@/lib/domain/types";
import {
  DEFAULT_ENGINE_CONFIG,
  DOUBLE_DOUBLE_STATS,
  FALLBACK_VARIANCE_RATIO,
  type DoubleDoubleStat,
  type EngineConfig,
} from "@/lib/config/engine";
import { normalCDF } from "@/lib/stats/normal";
import { statValue } from "@/lib/stats/record";

/**
 * P(X >= threshold) for one category, X ~ N(avg, avg * ratio).
 * Evaluated at threshold - 0.5 (continuity correction). Absent or zero
 * averages cannot reach the threshold.
 */
export function probabilityOfReaching(
  average: number | null,
  varianceRatio: number,
  threshold: number
): number {
  if (average === null || average === 0) return 0;
  const sd = average * varianceRatio;
  if (!(sd > 0)) return average >= threshold ? 1 : 0;
  const z = (threshold - 0.5 - average) / sd;
  return 1 - normalCDF(z);
}

/**
 * P(at least 2 of n independent events), i.e. 1 - P(none) - P(exactly one).
 * Accumulated directly so a single non-zero category yields exactly 0.
 */
export function probabilityAtLeastTwo(probabilities: readonly number[]): number {
  let none = 1;
  let one = 0;
  let twoPlus = 0;
  for (const p of probabilities) {
    twoPlus += one * p;
    one = one * (1 - p) + none * p;
    none *= 1 - p;
  }
  return Math.min(1, Math.max(0, twoPlus));
}

export function doubleDoubleProbabilities(
  averages: StatRecord,
  config: EngineConfig = DEFAULT_ENGINE_CONFIG
): Record<DoubleDoubleStat, number> {
  const ratio = (stat: DoubleDoubleStat) => config.varianceRatios[stat] ?? FALLBACK_VARIANCE_RATIO;
  const p = (stat: DoubleDoubleStat) =>
    probabilityOfReaching(statValue(averages, stat), ratio(stat), config.doubleDoubleThreshold);
  return { PTS: p("PTS"), REB: p("REB"), AST: p("AST"), STL: p("STL"), BLK: p("BLK") };
}

/**
 * Expected double-doubles per game from a player's per-game averages.
 * Categories are treated as independent.
 */
export function expectedDoubleDoubles(averages: StatRecord, config: EngineConfig = DEFAULT_ENGINE_CONFIG): number {
  const probs = doubleDoubleProbabilities(averages, config);
  return probabilityAtLeastTwo(DOUBLE_DOUBLE_STATS.map((s) => probs[s]));
}
