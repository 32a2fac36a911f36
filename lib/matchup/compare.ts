import { CATEGORIES, type Category } from "@/lib/domain/types";

export type CategoryWinner = "A" | "B" | "TIE";

export type ComparisonResult = {
  categories: Partial<Record<Category, CategoryWinner>>;
  winsA: number;
  winsB: number;
  ties: number;
  record: string; // "winsA-winsB"
};

export type CategoryTotals = Partial<Record<Category, number>>;

/**
 * Head-to-head by category: strictly greater wins, equal is a tie for
 * neither side. Missing totals count as 0.
 */
export function compareTeams(
  totalsA: CategoryTotals,
  totalsB: CategoryTotals,
  categories: readonly Category[] = CATEGORIES
): ComparisonResult {
  const out: ComparisonResult = { categories: {}, winsA: 0, winsB: 0, ties: 0, record: "" };
  for (const c of categories) {
    const a = totalsA[c] ?? 0;
    const b = totalsB[c] ?? 0;
    if (a > b) {
      out.categories[c] = "A";
      out.winsA++;
    } else if (b > a) {
      out.categories[c] = "B";
      out.winsB++;
    } else {
      out.categories[c] = "TIE";
      out.ties++;
    }
  }
  out.record = `${out.winsA}-${out.winsB}`;
  return out;
}
