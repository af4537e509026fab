/**
 * Application configuration.
 *
 * Env vars (loaded from .env by dotenv at startup):
 *   PORT                  HTTP port (default 5000)
 *   NODE_ENV              "production" enables secure cookies
 *   TRIPS_DATA_FILE       JSON file holding every user's trips (default saved_trips.json)
 *   USE_IN_MEMORY_STORE   "true" or "1" keeps trips in memory instead of on disk
 *   USERS                 login map: JSON object or "name:password,name2:password2"
 *   OPENAI_API_KEY        enables the trip planner AI (may also be an entry in USERS)
 *   OPENAI_BASE_URL       optional OpenAI-compatible endpoint
 *   AI_PLANNER_MODEL      model for itinerary planning (default gpt-4o)
 */

import { z } from "zod";

// ============================================================================
// TYPES
// ============================================================================

/** Explicit present/absent result for optional credentials */
export type Lookup<T> = { ok: true; value: T } | { ok: false; error: string };

export type UsersMap = Record<string, string>;

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(5000),
  NODE_ENV: z.string().default("development"),
  TRIPS_DATA_FILE: z.string().min(1).default("saved_trips.json"),
  USE_IN_MEMORY_STORE: z
    .string()
    .optional()
    .transform((value) => value === "true" || value === "1"),
  USERS: z.string().optional(),
  OPENAI_API_KEY: z.string().optional(),
  OPENAI_BASE_URL: z.string().url().optional(),
  AI_PLANNER_MODEL: z.string().min(1).default("gpt-4o"),
});

export type AppConfig = z.infer<typeof envSchema>;

type Env = Record<string, string | undefined>;

// ============================================================================
// LOADING
// ============================================================================

export function loadConfig(env: Env = process.env): AppConfig {
  // Empty strings in .env files mean "unset"
  const cleaned: Env = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") cleaned[key] = value;
  }
  return envSchema.parse(cleaned);
}

let cached: AppConfig | null = null;

export function getConfig(): AppConfig {
  if (!cached) {
    cached = loadConfig();
  }
  return cached;
}

// ============================================================================
// CREDENTIAL LOOKUPS
// ============================================================================

/** Entry in USERS that holds the OpenAI key rather than a login */
export const USERS_API_KEY_ENTRY = "OPENAI_API_KEY";

export const MISSING_OPENAI_KEY =
  "OpenAI API key not set. Set OPENAI_API_KEY in the environment or .env file, or add an OPENAI_API_KEY entry to USERS.";

const usersJsonSchema = z.record(z.string(), z.union([z.string(), z.number()]));

type UserEntry = [name: string, password: string];

/**
 * Name/password entries from the USERS setting, in the order given.
 * Accepts a JSON object or a comma-separated list of name:password pairs.
 */
function parseUserEntries(raw: string | undefined): Lookup<UserEntry[]> {
  if (!raw) {
    return {
      ok: false,
      error: "No USERS configuration found. Set USERS in the environment or .env file.",
    };
  }

  const trimmed = raw.trim();
  if (trimmed.startsWith("{")) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      return { ok: false, error: `USERS is not valid JSON. Details: ${message}` };
    }
    const result = usersJsonSchema.safeParse(parsed);
    if (!result.success) {
      return { ok: false, error: "USERS must map usernames to passwords." };
    }
    return {
      ok: true,
      value: Object.entries(result.data).map(([name, password]): UserEntry => [name, String(password)]),
    };
  }

  const entries: UserEntry[] = [];
  for (const pair of trimmed.split(",")) {
    const separator = pair.indexOf(":");
    if (separator <= 0) {
      return { ok: false, error: `USERS entry "${pair.trim()}" is not in name:password form.` };
    }
    entries.push([pair.slice(0, separator).trim(), pair.slice(separator + 1)]);
  }
  return { ok: true, value: entries };
}

/** Login map from USERS. The OPENAI_API_KEY entry is never a login. */
export function parseUsers(raw: string | undefined): Lookup<UsersMap> {
  const entries = parseUserEntries(raw);
  if (!entries.ok) return entries;
  return {
    ok: true,
    value: Object.fromEntries(entries.value.filter(([name]) => name !== USERS_API_KEY_ENTRY)),
  };
}

export function getUsers(config: AppConfig = getConfig()): Lookup<UsersMap> {
  return parseUsers(config.USERS);
}

/** OPENAI_API_KEY first, then an OPENAI_API_KEY entry inside USERS */
export function getOpenAIKey(config: AppConfig = getConfig()): Lookup<string> {
  if (config.OPENAI_API_KEY) {
    return { ok: true, value: config.OPENAI_API_KEY };
  }

  const entries = parseUserEntries(config.USERS);
  const nested = entries.ok ? entries.value.find(([name]) => name === USERS_API_KEY_ENTRY) : undefined;
  if (nested && nested[1].trim()) {
    return { ok: true, value: nested[1].trim() };
  }

  return { ok: false, error: MISSING_OPENAI_KEY };
}
