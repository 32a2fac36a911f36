import { byCategory } from "@/lib/domain/types";
import type { Category, LeagueSnapshot, ZScoreEntry, ZScoreTable } from "@/lib/domain/types";
import { summarize } from "@/lib/stats/population";

export const FREE_AGENTS_GROUP = "Free Agents";

// team name -> player id -> z entry
export type TeamGroups = Map<string, Map<string, ZScoreEntry>>;

export type TeamAverages = Record<Category, number> & { rosterSize: number };

export function groupByTeam(snapshot: LeagueSnapshot, zscores: ZScoreTable): TeamGroups {
  const groups: TeamGroups = new Map();
  const collect = (ids: readonly string[]) => {
    const m = new Map<string, ZScoreEntry>();
    for (const id of ids) {
      const z = zscores.get(id);
      if (z) m.set(id, z);
    }
    return m;
  };
  for (const team of snapshot.teams) groups.set(team.name, collect(team.roster));
  groups.set(FREE_AGENTS_GROUP, collect(snapshot.freeAgents));
  return groups;
}

// Mean z per category for each fantasy team; free agents and empty teams are left out
export function teamCategoryAverages(groups: TeamGroups): Map<string, TeamAverages> {
  const out = new Map<string, TeamAverages>();
  for (const [team, players] of groups) {
    if (team === FREE_AGENTS_GROUP || players.size === 0) continue;
    const entries = [...players.values()];
    const means = byCategory((c) => summarize(entries.map((e) => e.zscores[c])).mean);
    out.set(team, { ...means, rosterSize: players.size });
  }
  return out;
}
