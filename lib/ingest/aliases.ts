// Small alias maps for provider quirks and normalization helpers

export const PRO_TEAM_ALIASES: Record<string, string> = {
  NO: "NOP",
  NOR: "NOP",
  PHO: "PHX",
  SA: "SAS",
  GS: "GSW",
  NY: "NYK",
  UTAH: "UTA",
  WSH: "WAS",
};

export function normalizeProTeam(team: string): string {
  const t = team.trim().toUpperCase();
  return PRO_TEAM_ALIASES[t] ?? t;
}

export function normalizeNameKey(name: string): string {
  // Uppercase, remove periods and extra spaces, collapse whitespace
  return name
    .normalize("NFKD")
    .replace(/[\u0300-\u036f]/g, "") // strip diacritics
    .toUpperCase()
    .replace(/\./g, "")
    .replace(/\s+/g, " ")
    .trim();
}

export function splitPositions(pos: string | null | undefined): string[] {
  if (!pos) return [];
  const parts = String(pos)
    .toUpperCase()
    .split(/[\/,\s]+/)
    .map((s) => s.trim())
    .filter(Boolean);
  return [...new Set(parts)];
}
