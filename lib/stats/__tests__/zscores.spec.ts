import { describe, it, expect } from "vitest";
import { computeZScores, expectedGamesPlayed, powerBaseline, rankByPower, zScore } from "@/lib/stats/zscores";
import { createEngineConfig, DEFAULT_ENGINE_CONFIG } from "@/lib/config/engine";
import { makePlayer } from "@/lib/test-utils/factories";

const pool = [
  makePlayer("a", { stats: { total: { PTS: 10 } } }),
  makePlayer("b", { stats: { total: { PTS: 20 } } }),
  makePlayer("c", { stats: { total: { PTS: 30 }, projected: { GP: 41 } } }),
  makePlayer("d", { stats: { last_7: { PTS: 50 } } }),
];

describe("z-scores", () => {
  it("zScore is 0 for absent values and zero spread", () => {
    expect(zScore(null, 10, 2)).toBe(0);
    expect(zScore(12, 10, 0)).toBe(0);
    expect(zScore(12, 10, 2)).toBe(1);
  });

  it("normalizes each category against the pool", () => {
    const table = computeZScores(pool, "total", DEFAULT_ENGINE_CONFIG);
    expect(table.size).toBe(3);
    expect(table.has("d")).toBe(false);
    expect(table.get("a")?.zscores.PTS).toBeCloseTo(-1.224745, 5);
    expect(table.get("b")?.zscores.PTS).toBeCloseTo(0, 10);
    expect(table.get("c")?.zscores.PTS).toBeCloseTo(1.224745, 5);
    // categories nobody reports stay neutral
    expect(table.get("a")?.zscores.REB).toBe(0);
    expect(table.get("a")?.zscores.DD).toBe(0);
  });

  it("shifts power so the weakest player scores exactly 1", () => {
    const table = computeZScores(pool, "total", DEFAULT_ENGINE_CONFIG);
    expect(table.get("a")?.rawPerGamePower).toBeCloseTo(-1.224745, 5);
    expect(table.get("a")?.perGamePower).toBeCloseTo(1, 10);
    expect(table.get("b")?.perGamePower).toBeCloseTo(2.224745, 5);
    expect(table.get("c")?.perGamePower).toBeCloseTo(3.449490, 5);
    for (const e of table.values()) expect(e.perGamePower).toBeGreaterThan(0);
  });

  it("scales season power by expected games", () => {
    const table = computeZScores(pool, "total", DEFAULT_ENGINE_CONFIG);
    expect(table.get("b")?.gamesPlayed).toBe(82);
    expect(table.get("b")?.seasonPower).toBeCloseTo(2.224745, 5);
    expect(table.get("c")?.gamesPlayed).toBe(41);
    expect(table.get("c")?.seasonPower).toBeCloseTo(1.724745, 5);
  });

  it("leaves non-negative pools unshifted", () => {
    expect(powerBaseline([])).toBe(0);
    expect(powerBaseline([0, 2])).toBe(0);
    expect(powerBaseline([-2.5, 1])).toBe(3.5);
    const single = computeZScores([pool[0]], "total", DEFAULT_ENGINE_CONFIG);
    expect(single.get("a")?.perGamePower).toBe(0);
  });

  it("falls back to a full season without a projected GP", () => {
    const cfg = createEngineConfig({ fullSeasonGames: 72 });
    expect(expectedGamesPlayed(pool[0], cfg)).toBe(72);
    expect(expectedGamesPlayed(pool[2], cfg)).toBe(41);
  });

  it("ranks by per-game or season power", () => {
    const table = computeZScores(pool, "total", DEFAULT_ENGINE_CONFIG);
    expect(rankByPower(table).map((e) => e.playerId)).toEqual(["c", "b", "a"]);
    expect(rankByPower(table, "seasonPower").map((e) => e.playerId)).toEqual(["b", "c", "a"]);
  });
});
