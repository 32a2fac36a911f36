import { describe, it, expect } from "vitest";
import { compareTeams } from "@/lib/matchup/compare";
import { CATEGORIES } from "@/lib/domain/types";

describe("category comparator", () => {
  it("awards strictly greater totals and records ties", () => {
    const res = compareTeams(
      { PTS: 500, BLK: 20, STL: 30, AST: 100, REB: 200, "3PM": 60, "FT%": 0.8, DD: 4 },
      { PTS: 480, BLK: 25, STL: 30, AST: 90, REB: 210, "3PM": 60, "FT%": 0.75, DD: 5 }
    );
    expect(res.categories).toEqual({
      PTS: "A",
      BLK: "B",
      STL: "TIE",
      AST: "A",
      REB: "B",
      "3PM": "TIE",
      "FT%": "A",
      DD: "B",
    });
    expect(res.winsA).toBe(3);
    expect(res.winsB).toBe(3);
    expect(res.ties).toBe(2);
    expect(res.record).toBe("3-3");
  });

  it("counts missing totals as zero", () => {
    const res = compareTeams({ PTS: 1 }, {});
    expect(res.winsA).toBe(1);
    expect(res.ties).toBe(7);
    expect(res.record).toBe("1-0");
  });

  it("only scores the requested categories", () => {
    const res = compareTeams({ PTS: 1, REB: 1 }, { PTS: 2, REB: 0 }, ["PTS"]);
    expect(res.categories).toEqual({ PTS: "B" });
    expect(res.winsA + res.winsB + res.ties).toBe(1);
  });

  it("swapping sides swaps the outcome", () => {
    const a = { PTS: 10, AST: 3, DD: 1 };
    const b = { PTS: 8, AST: 5, DD: 1 };
    const ab = compareTeams(a, b);
    const ba = compareTeams(b, a);
    expect([ab.winsA, ab.winsB, ab.ties]).toEqual([ba.winsB, ba.winsA, ba.ties]);
    expect(ab.categories).toMatchObject({ PTS: "A", AST: "B", DD: "TIE" });
    const flip = { A: "B", B: "A", TIE: "TIE" } as const;
    for (const c of CATEGORIES) {
      const winner = ab.categories[c];
      expect(winner).toBeDefined();
      if (winner) expect(ba.categories[c]).toBe(flip[winner]);
    }
  });
});
