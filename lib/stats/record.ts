import type { StatKey, StatRecord } from "@/lib/domain/types";

// Finite number or null; absent values stay absent
export function statValue(record: StatRecord, key: StatKey): number | null {
  const v = record[key];
  return typeof v === "number" && Number.isFinite(v) ? v : null;
}
