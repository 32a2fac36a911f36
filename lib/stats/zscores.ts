import { byCategory } from "@/lib/domain/types";
import type { PeriodKey, Player, PopulationTable, ZScoreEntry, ZScoreTable } from "@/lib/domain/types";
import type { EngineConfig } from "@/lib/config/engine";
import { categoryValue, computePopulationTable, playersWithRecord } from "@/lib/stats/population";
import { statValue } from "@/lib/stats/record";

export function zScore(value: number | null, mean: number, stdDev: number): number {
  if (value === null || stdDev === 0) return 0;
  return (value - mean) / stdDev;
}

// Expected games from the projected record; a full season when unknown
export function expectedGamesPlayed(player: Player, config: EngineConfig): number {
  const projected = player.stats.projected;
  const gp = projected ? statValue(projected, "GP") : null;
  return gp ?? config.fullSeasonGames;
}

/**
 * Shift applied to every raw power so the weakest player lands strictly above
 * zero: |min| + 1 when the pool minimum is negative, otherwise 0.
 */
export function powerBaseline(rawPowers: readonly number[]): number {
  if (rawPowers.length === 0) return 0;
  const min = Math.min(...rawPowers);
  return min < 0 ? Math.abs(min) + 1 : 0;
}

/**
 * Z-scores and power scores for every pool player with a record for `period`.
 * Pass `population` to reuse a table computed for the same pool and period.
 */
export function computeZScores(
  pool: readonly Player[],
  period: PeriodKey,
  config: EngineConfig,
  population: PopulationTable = computePopulationTable(pool, period, config)
): ZScoreTable {
  const evaluated = playersWithRecord(pool, period).map(([player, rec]) => {
    const zscores = byCategory((c) =>
      zScore(categoryValue(rec, c, config), population[c].mean, population[c].stdDev)
    );
    const raw = config.categories.reduce((sum, c) => sum + zscores[c], 0);
    return { player, zscores, raw };
  });

  const baseline = powerBaseline(evaluated.map((e) => e.raw));
  const out: ZScoreTable = new Map();
  for (const { player, zscores, raw } of evaluated) {
    const perGamePower = raw + baseline;
    const gamesPlayed = expectedGamesPlayed(player, config);
    const entry: ZScoreEntry = {
      playerId: player.id,
      zscores,
      rawPerGamePower: raw,
      perGamePower,
      seasonPower: perGamePower * (gamesPlayed / config.fullSeasonGames),
      gamesPlayed,
    };
    out.set(player.id, entry);
  }
  return out;
}

export function rankByPower(table: ZScoreTable, key: "perGamePower" | "seasonPower" = "perGamePower"): ZScoreEntry[] {
  return [...table.values()].sort((a, b) => b[key] - a[key]);
}
