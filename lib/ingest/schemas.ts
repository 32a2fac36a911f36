import { z } from "zod";
import { PERIODS } from "@/lib/domain/types";

// Helpers
const toStr = z
  .string()
  .transform((s) => s.trim())
  .pipe(z.string().min(1));

const toInt = z
  .union([z.number(), z.string()])
  .transform((v) => (typeof v === "number" ? v : Number(String(v).trim())))
  .pipe(z.number().int().positive());

// Blank, "NA" or "--" cells are absent values, kept as null
const toOptNum = z
  .union([z.number(), z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim().replace(/%$/, "");
    if (s === "" || s.toLowerCase() === "na" || s === "--") return null;
    const n = Number(s);
    return Number.isFinite(n) ? n : null;
  });

const toOptStr = z
  .union([z.string(), z.null(), z.undefined()])
  .transform((v) => {
    if (v === null || v === undefined) return null;
    const s = String(v).trim();
    return s === "" ? null : s;
  });

// Row schemas for CSV after aliasing
export const TeamCsvSchema = z.object({
  team_id: toStr,
  team_name: toStr,
});

export type TeamCsv = z.infer<typeof TeamCsvSchema>;

export const PlayerCsvSchema = z.object({
  player_id: toStr,
  name: toStr,
  positions: toStr.transform((s) => s.toUpperCase()),
  pro_team: toStr.transform((s) => s.toUpperCase()),
  injury_status: toOptStr,
  fantasy_team_id: toOptStr,
});

export type PlayerCsv = z.infer<typeof PlayerCsvSchema>;

export const StatCsvSchema = z.object({
  player_id: toStr,
  period: toStr.transform((s) => s.toLowerCase()).pipe(z.enum(PERIODS)),
  PTS: toOptNum,
  REB: toOptNum,
  AST: toOptNum,
  STL: toOptNum,
  BLK: toOptNum,
  "3PM": toOptNum,
  FTM: toOptNum,
  FTA: toOptNum,
  "FT%": toOptNum,
  GP: toOptNum,
});

export type StatCsv = z.infer<typeof StatCsvSchema>;

export const ScheduleCsvSchema = z.object({
  pro_team: toStr.transform((s) => s.toUpperCase()),
  day: toInt,
});

export type ScheduleCsv = z.infer<typeof ScheduleCsvSchema>;

export const MatchupCsvSchema = z.object({
  matchup_id: toInt,
  team_a: toStr,
  team_b: toStr,
});

export type MatchupCsv = z.infer<typeof MatchupCsvSchema>;

// Common alias maps for CSV headers (keys compared lower-cased)
export const TEAM_ALIASES: Record<string, keyof TeamCsv> = {
  team_id: "team_id",
  id: "team_id",
  team_name: "team_name",
  name: "team_name",
};

export const PLAYER_ALIASES: Record<string, keyof PlayerCsv> = {
  player_id: "player_id",
  "player id": "player_id",
  id: "player_id",
  name: "name",
  player_name: "name",
  positions: "positions",
  position: "positions",
  pos: "positions",
  pro_team: "pro_team",
  proteam: "pro_team",
  team: "pro_team",
  injury_status: "injury_status",
  injurystatus: "injury_status",
  fantasy_team_id: "fantasy_team_id",
  fantasy_team: "fantasy_team_id",
  owner: "fantasy_team_id",
};

export const STAT_ALIASES: Record<string, keyof StatCsv> = {
  player_id: "player_id",
  "player id": "player_id",
  id: "player_id",
  period: "period",
  stat_key: "period",
  pts: "PTS",
  reb: "REB",
  ast: "AST",
  stl: "STL",
  blk: "BLK",
  "3pm": "3PM",
  "3ptm": "3PM",
  ftm: "FTM",
  fta: "FTA",
  "ft%": "FT%",
  ft_pct: "FT%",
  gp: "GP",
};

export const SCHEDULE_ALIASES: Record<string, keyof ScheduleCsv> = {
  pro_team: "pro_team",
  team: "pro_team",
  day: "day",
  scoring_period_id: "day",
  scoring_period: "day",
};

export const MATCHUP_ALIASES: Record<string, keyof MatchupCsv> = {
  matchup_id: "matchup_id",
  matchup: "matchup_id",
  team_a: "team_a",
  home: "team_a",
  team_b: "team_b",
  away: "team_b",
};
