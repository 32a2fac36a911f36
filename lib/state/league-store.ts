import { createStore } from "zustand/vanilla";
import type { LeagueSnapshot, PeriodKey, PopulationTable, ZScoreTable } from "@/lib/domain/types";
import { DEFAULT_ENGINE_CONFIG, type EngineConfig } from "@/lib/config/engine";
import { computePopulationTable } from "@/lib/stats/population";
import { computeZScores } from "@/lib/stats/zscores";

type Status = "empty" | "ready";

type PeriodCache = {
  population: PopulationTable;
  zscores: ZScoreTable;
};

export type LeagueState = {
  status: Status;
  config: EngineConfig;
  snapshot: LeagueSnapshot | null;
  cache: Partial<Record<PeriodKey, PeriodCache>>;
  load: (snapshot: LeagueSnapshot) => void;
  reset: () => void;
  // Memoized per period; the pool is the whole snapshot (rostered + free-agent sample)
  zscoresFor: (period: PeriodKey) => ZScoreTable;
  populationFor: (period: PeriodKey) => PopulationTable;
};

export function createLeagueStore(config: EngineConfig = DEFAULT_ENGINE_CONFIG) {
  return createStore<LeagueState>()((set, get) => {
    const ensure = (period: PeriodKey): PeriodCache => {
      const { snapshot, cache } = get();
      const hit = cache[period];
      if (hit) return hit;
      const pool = snapshot?.players ?? [];
      console.debug(`[league-store] computing z-scores for ${period} over ${pool.length} players`);
      const population = computePopulationTable(pool, period, config);
      const entry: PeriodCache = { population, zscores: computeZScores(pool, period, config, population) };
      set((s) => ({ cache: { ...s.cache, [period]: entry } }));
      return entry;
    };

    return {
      status: "empty",
      config,
      snapshot: null,
      cache: {},
      load: (snapshot) => set({ status: "ready", snapshot, cache: {} }),
      reset: () => set({ status: "empty", snapshot: null, cache: {} }),
      zscoresFor: (period) => ensure(period).zscores,
      populationFor: (period) => ensure(period).population,
    };
  });
}

export type LeagueStore = ReturnType<typeof createLeagueStore>;
