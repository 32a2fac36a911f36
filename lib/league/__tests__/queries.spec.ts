import { beforeAll, describe, it, expect, vi } from "vitest";
import { fileURLToPath } from "url";
import { loadLeagueDir } from "@/lib/ingest/adapter";
import { DEFAULT_ENGINE_CONFIG } from "@/lib/config/engine";
import { ValidationError } from "@/lib/domain/errors";
import { createLeagueStore, type LeagueStore } from "@/lib/state/league-store";
import {
  findTeam,
  pairingsFor,
  playerReport,
  projectLeagueMatchups,
  projectTeam,
  teamRoster,
  topFreeAgents,
} from "@/lib/league/queries";

const LEAGUE_DIR = fileURLToPath(new URL("../../../fixtures/league", import.meta.url));

let store: LeagueStore;

beforeAll(async () => {
  vi.spyOn(console, "info").mockImplementation(() => {});
  vi.spyOn(console, "warn").mockImplementation(() => {});
  vi.spyOn(console, "debug").mockImplementation(() => {});
  const { snapshot } = await loadLeagueDir(LEAGUE_DIR, DEFAULT_ENGINE_CONFIG);
  store = createLeagueStore(DEFAULT_ENGINE_CONFIG);
  store.getState().load(snapshot);
});

describe("team lookup", () => {
  it("finds teams by id or case-insensitive name", () => {
    const snapshot = store.getState().snapshot;
    if (!snapshot) throw new Error("fixture not loaded");
    expect(findTeam(snapshot, "hoopers").id).toBe("T1");
    expect(findTeam(snapshot, "t2").name).toBe("Dunkers");
    expect(() => findTeam(snapshot, "Nope")).toThrow(
      "Team 'Nope' not found: available teams: Hoopers, Dunkers, Bricklayers, Benchwarmers"
    );
  });

  it("pairs teams in listed order when a matchup has no pairings", () => {
    const snapshot = store.getState().snapshot;
    if (!snapshot) throw new Error("fixture not loaded");
    expect(pairingsFor(snapshot, 2).map(([a, b]) => [a.name, b.name])).toEqual([
      ["Hoopers", "Dunkers"],
      ["Bricklayers", "Benchwarmers"],
    ]);
  });
});

describe("team projection", () => {
  it("sums optimized daily lineups over the matchup", () => {
    const res = projectTeam(store, "Hoopers", { period: "total", matchupId: 1 });
    expect(res.fullPeriod).toBe("2026_total");
    // p01 and p02 play days 1, 3, 5; p03 plays 2, 4, 6; p04 is out
    expect(res.totals.gamesPlayed).toBe(9);
    expect(res.totals.PTS).toBeCloseTo(162, 9);
    expect(res.totals.FTM).toBeCloseTo(28.8, 9);
    expect(res.totals.FTA).toBeCloseTo(36, 9);
    expect(res.totals["FT%"]).toBeCloseTo(0.8, 9);
    expect(res.totals.days.map((d) => d.eligible)).toEqual([2, 1, 2, 1, 2, 1]);
  });

  it("defaults the matchup to the one containing today", () => {
    const res = projectTeam(store, "T1", { period: "total", today: new Date(2025, 9, 28) });
    expect(res.matchupId).toBe(2);
    expect(res.totals.days.map((d) => d.day)).toEqual([7, 8, 9, 10, 11, 12, 13]);
  });

  it("validates the period and matchup", () => {
    expect(() => projectTeam(store, "Hoopers", { period: "bogus", matchupId: 1 })).toThrow(ValidationError);
    expect(() => projectTeam(store, "T1", { period: "constructor", matchupId: 1 })).toThrow(
      "Invalid stat period 'constructor'"
    );
    expect(() => projectTeam(store, "Hoopers", { matchupId: 25 })).toThrow("Invalid matchup_id 25");
  });
});

describe("league matchups", () => {
  it("projects every listed pairing", () => {
    const res = projectLeagueMatchups(store, { period: "total", matchupId: 1 });
    expect(res.matchups.map((m) => [m.teamA, m.teamB])).toEqual([
      ["Hoopers", "Dunkers"],
      ["Bricklayers", "Benchwarmers"],
    ]);
    expect(res.matchups[0].totalsA.PTS).toBeCloseTo(162, 9);
    for (const m of res.matchups) {
      expect(m.winsA + m.winsB + m.ties).toBe(8);
      expect(m.record).toBe(`${m.winsA}-${m.winsB}`);
    }
  });
});

describe("player rankings", () => {
  it("ranks free agents by per-game power", () => {
    const res = topFreeAgents(store, { period: "total", matchupId: 1 });
    // p19 has no season record
    expect(res.freeAgents.map((p) => p.playerId).sort()).toEqual(["p15", "p16", "p17", "p18"]);
    expect(res.freeAgents[0].playerId).toBe("p15");
    expect(res.freeAgents[0].gameDays).toEqual([1, 2, 4]);
    const powers = res.freeAgents.map((p) => p.perGamePower);
    expect(powers).toEqual([...powers].sort((a, b) => b - a));
    expect(topFreeAgents(store, { period: "total", matchupId: 1, limit: 2 }).freeAgents).toHaveLength(2);
  });

  it("lists a roster with game days in the matchup", () => {
    const res = teamRoster(store, "Hoopers", { period: "total", matchupId: 1 });
    expect(res.players.map((p) => p.playerId).sort()).toEqual(["p01", "p02", "p03", "p04"]);
    expect(res.players.find((p) => p.playerId === "p01")?.gameDays).toEqual([1, 3, 5]);
    expect(res.players.find((p) => p.playerId === "p04")?.injuryStatus).toBe("OUT");
  });

  it("keeps roster players without a record for the period, ranked last", () => {
    // p04 has no projected line
    const res = teamRoster(store, "Hoopers", { period: "projected", matchupId: 1 });
    expect(res.players.map((p) => p.playerId).sort()).toEqual(["p01", "p02", "p03", "p04"]);
    const last = res.players[res.players.length - 1];
    expect(last.playerId).toBe("p04");
    expect(last.perGamePower).toBe(0);
    expect(last.seasonPower).toBe(0);
    expect(Object.values(last.zscores).every((z) => z === 0)).toBe(true);
    expect(last.gameDays).toEqual([2, 4, 6]);
    expect(last.injuryStatus).toBe("OUT");
  });

  it("reports a player found by accent-insensitive name", () => {
    const res = playerReport(store, "jose ibanez", { period: "2026_total" });
    expect(res.player.id).toBe("p14");
    expect(res.player.fantasyTeamId).toBe("T4");
    expect(res.averages?.PTS).toBe(16);
    expect(res.zscore?.playerId).toBe("p14");
  });

  it("returns empty stats for a player without a record", () => {
    const res = playerReport(store, "p19");
    expect(res.averages).toBeNull();
    expect(res.zscore).toBeNull();
    expect(() => playerReport(store, "Nobody Here")).toThrow("Player 'Nobody Here' not found");
  });

  it("requires a loaded league", () => {
    expect(() => topFreeAgents(createLeagueStore(), { matchupId: 1 })).toThrow("No league loaded");
  });
});
