import type { Player } from "@/lib/domain/types";
import { FLEX_POSITIONS, OUT_STATUSES } from "@/lib/opt/config";
import type { Slot } from "./types";

export function normalizePositions(raw: readonly string[]): string[] {
  return raw
    .flatMap((s) => String(s).split(/[\/ ,]/)) // handle "PG/SG" or comma/space separated
    .map((s) => s.trim().toUpperCase())
    .filter(Boolean);
}

export function eligibleForSlot(p: Pick<Player, "positions">, slot: Slot): boolean {
  if (slot === "UTIL") return true;

  const pos = normalizePositions(p.positions);
  // If we can't determine a position, only UTIL is permissive.
  if (pos.length === 0) return false;

  switch (slot) {
    case "PG":
    case "SG":
    case "SF":
    case "PF":
    case "C":
      return pos.includes(slot);
    case "G":
    case "F":
      return FLEX_POSITIONS[slot].some((x) => pos.includes(x));
    default:
      return false;
  }
}

export function isInjuredOut(p: Pick<Player, "injured" | "injuryStatus">): boolean {
  if (p.injured) return true;
  return p.injuryStatus !== null && OUT_STATUSES.includes(p.injuryStatus.toUpperCase());
}
