import { byCategory } from "@/lib/domain/types";
import type { LeagueSnapshot, Player, ZScoreEntry, ZScoreTable } from "@/lib/domain/types";

// Builders for unit tests; keep fixtures small and explicit
export function makePlayer(id: string, overrides: Partial<Player> = {}): Player {
  return {
    id,
    name: `Player ${id}`,
    positions: ["PG"],
    proTeam: "BOS",
    injuryStatus: null,
    injured: false,
    fantasyTeamId: null,
    stats: {},
    ...overrides,
  };
}

export function zEntry(playerId: string, perGamePower: number): ZScoreEntry {
  return {
    playerId,
    zscores: byCategory(() => 0),
    rawPerGamePower: perGamePower,
    perGamePower,
    seasonPower: perGamePower,
    gamesPlayed: 82,
  };
}

export function zTable(entries: [string, number][]): ZScoreTable {
  return new Map(entries.map(([id, power]) => [id, zEntry(id, power)] as const));
}

export function makeSnapshot(overrides: Partial<LeagueSnapshot> = {}): LeagueSnapshot {
  return { players: [], teams: [], freeAgents: [], proSchedule: {}, pairings: [], ...overrides };
}
