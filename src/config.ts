import { config as loadDotEnv } from "dotenv";
import { z } from "zod";

import { LOG_LEVELS } from "./logger.ts";
import type { AppConfig } from "./types.ts";

// Excel refuses sheet names longer than 31 characters
const MAX_SHEET_NAME = 31;

// Every variable is optional; the defaults give a working setup out of the box
const EnvSchema = z.object({
  ROSTER_FILE: z.string().default("students.xlsx"),
  ROSTER_SHEET: z.string().max(MAX_SHEET_NAME).regex(/^[^\\/?*[\]:]+$/, "contains a character Excel does not allow").default("Roster"),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("warn"),
});

/**
 * Read `.env` into process.env if the file exists.
 * A missing file is fine: the environment and defaults still apply.
 */
export function loadEnvFile(path = ".env"): void {
  const result = loadDotEnv({ path });
  if (result.error && !isMissingFile(result.error)) {
    throw result.error;
  }
}

function isMissingFile(error: Error): boolean {
  return "code" in error && error.code === "ENOENT";
}

// Blank values count as unset so `ROSTER_SHEET=` falls back to the default
function valueOf(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

/**
 * Collect all runtime configuration in one place.
 *
 * Throws when a variable is set to something unusable, listing every
 * problem at once, so a bad setup fails at startup and not mid-session.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = EnvSchema.safeParse({
    ROSTER_FILE: valueOf(env, "ROSTER_FILE"),
    ROSTER_SHEET: valueOf(env, "ROSTER_SHEET"),
    LOG_LEVEL: valueOf(env, "LOG_LEVEL")?.toLowerCase(),
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new Error(`Invalid configuration: ${problems.join("; ")}`);
  }

  return {
    rosterFile: parsed.data.ROSTER_FILE,
    rosterSheet: parsed.data.ROSTER_SHEET,
    logLevel: parsed.data.LOG_LEVEL,
  };
}
