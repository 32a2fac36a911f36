import { byCategory } from "@/lib/domain/types";
import type {
  Category,
  PeriodKey,
  Player,
  PopulationStats,
  PopulationTable,
  StatRecord,
} from "@/lib/domain/types";
import type { EngineConfig } from "@/lib/config/engine";
import { expectedDoubleDoubles } from "@/lib/stats/double-double";
import { statValue } from "@/lib/stats/record";

export const EMPTY_POPULATION: PopulationStats = { mean: 0, stdDev: 1, count: 0 };

// Value a player contributes to a category; DD is estimated from the record
export function categoryValue(record: StatRecord, category: Category, config?: EngineConfig): number | null {
  if (category === "DD") return expectedDoubleDoubles(record, config);
  return statValue(record, category);
}

/**
 * Mean and population standard deviation over the non-absent values.
 * No values yields { mean: 0, stdDev: 1 } so normalization stays inert.
 */
export function summarize(values: ReadonlyArray<number | null | undefined>): PopulationStats {
  const present = values.filter((v): v is number => typeof v === "number" && Number.isFinite(v));
  if (present.length === 0) return { ...EMPTY_POPULATION };
  const mean = present.reduce((a, b) => a + b, 0) / present.length;
  const variance = present.reduce((a, v) => a + (v - mean) ** 2, 0) / present.length;
  return { mean, stdDev: Math.sqrt(variance), count: present.length };
}

export function playersWithRecord(pool: readonly Player[], period: PeriodKey): [Player, StatRecord][] {
  const out: [Player, StatRecord][] = [];
  for (const p of pool) {
    const rec = p.stats[period];
    if (rec) out.push([p, rec]);
  }
  return out;
}

export function computePopulationStats(
  pool: readonly Player[],
  category: Category,
  period: PeriodKey,
  config?: EngineConfig
): PopulationStats {
  return summarize(playersWithRecord(pool, period).map(([, rec]) => categoryValue(rec, category, config)));
}

// All categories in one pass over the pool; compute once per (period, pool) and reuse
export function computePopulationTable(
  pool: readonly Player[],
  period: PeriodKey,
  config: EngineConfig
): PopulationTable {
  const records = playersWithRecord(pool, period).map(([, rec]) => rec);
  return byCategory((category) => summarize(records.map((rec) => categoryValue(rec, category, config))));
}
