import { z } from "zod";
import { ValidationError } from "@/lib/domain/errors";
import type { EngineConfigOverrides } from "@/lib/config/engine";

export function getEnv(name: string, env: NodeJS.ProcessEnv = process.env): string | undefined {
  const value = env[name];
  if (value === undefined || value.trim() === "") return undefined;
  return value.trim();
}

const intFromEnv = z.coerce.number().int().positive();

const EnvSchema = z.object({
  LEAGUE_ID: intFromEnv.optional(),
  SEASON_YEAR: intFromEnv.optional(),
  FREE_AGENT_SAMPLE: z.coerce.number().int().min(0).optional(),
});

// Reads league settings from the environment; blank variables count as unset.
export function readEnvOverrides(env: NodeJS.ProcessEnv = process.env): EngineConfigOverrides {
  const parsed = EnvSchema.safeParse({
    LEAGUE_ID: getEnv("LEAGUE_ID", env),
    SEASON_YEAR: getEnv("SEASON_YEAR", env),
    FREE_AGENT_SAMPLE: getEnv("FREE_AGENT_SAMPLE", env),
  });
  if (!parsed.success) {
    throw new ValidationError(
      "Invalid environment",
      parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`)
    );
  }
  const out: EngineConfigOverrides = {};
  if (parsed.data.LEAGUE_ID !== undefined) out.leagueId = parsed.data.LEAGUE_ID;
  if (parsed.data.SEASON_YEAR !== undefined) out.season = parsed.data.SEASON_YEAR;
  if (parsed.data.FREE_AGENT_SAMPLE !== undefined) out.freeAgentSampleSize = parsed.data.FREE_AGENT_SAMPLE;
  return out;
}
