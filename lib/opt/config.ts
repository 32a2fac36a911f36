import type { Slot } from "@/lib/opt/types";

// Exact positions first, then flex, then utility; order matters for the greedy fill
export const DEFAULT_SLOTS: Slot[] = ["PG", "SG", "SF", "PF", "C", "G", "F", "UTIL", "UTIL", "UTIL"];

export const FLEX_POSITIONS: Record<"G" | "F", readonly [string, string]> = {
  G: ["PG", "SG"],
  F: ["SF", "PF"],
};

// Injury designations that keep a player out of the daily lineup
export const OUT_STATUSES = ["OUT"];
