export * from "@/lib/domain/types";
export * from "@/lib/domain/errors";
export * from "@/lib/config/engine";
export * from "@/lib/config/env";
export * from "@/lib/stats/normal";
export * from "@/lib/stats/population";
export * from "@/lib/stats/double-double";
export * from "@/lib/stats/zscores";
export * from "@/lib/stats/team-stats";
export * from "@/lib/opt/config";
export * from "@/lib/opt/constraints";
export * from "@/lib/opt/algorithms/greedy";
export type * from "@/lib/opt/types";
export * from "@/lib/matchup/calendar";
export * from "@/lib/matchup/project";
export * from "@/lib/matchup/compare";
export * from "@/lib/ingest/adapter";
export * from "@/lib/league/queries";
export * from "@/lib/state/league-store";
