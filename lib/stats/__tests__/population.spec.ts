import { describe, it, expect } from "vitest";
import {
  categoryValue,
  computePopulationStats,
  computePopulationTable,
  summarize,
} from "@/lib/stats/population";
import { DEFAULT_ENGINE_CONFIG } from "@/lib/config/engine";
import { makePlayer } from "@/lib/test-utils/factories";

describe("population stats", () => {
  it("uses the population standard deviation", () => {
    const s = summarize([10, 20, 30]);
    expect(s.mean).toBe(20);
    expect(s.stdDev).toBeCloseTo(8.16497, 4);
    expect(s.count).toBe(3);
  });

  it("is inert for an empty pool", () => {
    expect(summarize([])).toEqual({ mean: 0, stdDev: 1, count: 0 });
    expect(summarize([null, undefined, NaN])).toEqual({ mean: 0, stdDev: 1, count: 0 });
  });

  it("skips absent values and reports a zero spread for one value", () => {
    expect(summarize([null, 5, undefined])).toEqual({ mean: 5, stdDev: 0, count: 1 });
  });

  it("only counts players with a record for the period", () => {
    const pool = [
      makePlayer("a", { stats: { total: { PTS: 10, "FT%": 0.8 } } }),
      makePlayer("b", { stats: { total: { PTS: 30, "FT%": null } } }),
      makePlayer("c", { stats: { last_7: { PTS: 100 } } }),
    ];
    expect(computePopulationStats(pool, "PTS", "total")).toEqual({ mean: 20, stdDev: 10, count: 2 });
    expect(computePopulationStats(pool, "FT%", "total")).toEqual({ mean: 0.8, stdDev: 0, count: 1 });
    expect(computePopulationStats(pool, "PTS", "projected").count).toBe(0);
  });

  it("derives the DD category from the record", () => {
    expect(categoryValue({ PTS: 12, REB: 11, AST: 8 }, "DD")).toBeCloseTo(0.6077, 3);
    expect(categoryValue({ PTS: 12 }, "REB")).toBeNull();
  });

  it("builds a table for every category", () => {
    const pool = [makePlayer("a", { stats: { total: { PTS: 10, BLK: 1 } } })];
    const table = computePopulationTable(pool, "total", DEFAULT_ENGINE_CONFIG);
    expect(Object.keys(table).sort()).toEqual(["3PM", "AST", "BLK", "DD", "FT%", "PTS", "REB", "STL"]);
    expect(table.BLK).toEqual({ mean: 1, stdDev: 0, count: 1 });
    expect(table.STL).toEqual({ mean: 0, stdDev: 1, count: 0 });
  });
});
