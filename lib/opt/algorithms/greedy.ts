import type { PeriodKey, Player, StatKey, StatRecord, ZScoreTable } from "@/lib/domain/types";
import type { EngineConfig } from "@/lib/config/engine";
import { eligibleForSlot } from "@/lib/opt/constraints";
import type { DailyLine, SlotAssignment } from "@/lib/opt/types";
import { expectedDoubleDoubles } from "@/lib/stats/double-double";
import { statValue } from "@/lib/stats/record";

export function dailyLine(rec: StatRecord, config: EngineConfig): DailyLine {
  const n = (k: StatKey) => statValue(rec, k) ?? 0;
  return {
    PTS: n("PTS"),
    AST: n("AST"),
    BLK: n("BLK"),
    REB: n("REB"),
    STL: n("STL"),
    "3PM": n("3PM"),
    FTM: n("FTM"),
    FTA: n("FTA"),
    DD: expectedDoubleDoubles(rec, config),
  };
}

/**
 * Fill the slot template for one day. Players are sorted once by per-game
 * power (stable on ties); each slot takes the first unused player who can
 * play it. Greedy: a flexible player taken early can leave a stricter slot
 * empty even when a swap would have filled it.
 */
export function optimizeLineup(
  availablePlayers: readonly Player[],
  zscores: ZScoreTable,
  period: PeriodKey,
  config: EngineConfig
): SlotAssignment[] {
  const ranked = availablePlayers
    .flatMap((p) => {
      const z = zscores.get(p.id);
      return z ? [{ player: p, power: z.perGamePower }] : [];
    })
    .sort((a, b) => b.power - a.power);

  const used = new Set<string>();
  const out: SlotAssignment[] = [];

  for (const slot of config.slots) {
    let picked: SlotAssignment | null = null;
    for (const { player } of ranked) {
      if (used.has(player.id)) continue;
      if (!eligibleForSlot(player, slot)) continue;
      const rec = player.stats[period];
      if (!rec) continue;
      picked = { slot, playerId: player.id, line: dailyLine(rec, config) };
      used.add(player.id);
      break;
    }
    out.push(picked ?? { slot, playerId: null, line: null });
  }
  return out;
}

export function filledSlots(lineup: readonly SlotAssignment[]): Extract<SlotAssignment, { playerId: string }>[] {
  return lineup.flatMap((s) => (s.playerId !== null ? [s] : []));
}
