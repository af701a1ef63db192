import "dotenv/config";
import { promises as fs } from "node:fs";
import path from "node:path";
import { parseArgs } from "node:util";
import { ConfigurationError, errorMessage } from "./errors";
import { isRecord } from "./http";
import { logger } from "./logger";
import { MAX_RECENT_TRACKS } from "./spotify-client";
import { USER_CREDENTIAL_KEYS, type UserCredentials } from "./types";

export const DEFAULT_TRACK_COUNT = 5;
export const DEFAULT_USERS_JSON_PATH = "./config/users.json";

export type Env = Record<string, string | undefined>;

export interface CliArgs {
  numTracks?: string;
  usersJson?: string;
  teamsWebhook?: string;
  help: boolean;
}

export interface AppConfig {
  trackCount: number;
  usersJsonPath: string;
  webhookUrl: string;
  users: UserCredentials[];
}

export const USAGE = [
  "Usage: recently-played-notifier [options]",
  "",
  "Options:",
  `  --num-tracks <n>       Recent tracks per user (default ${DEFAULT_TRACK_COUNT}, max ${MAX_RECENT_TRACKS})`,
  `  --users-json <path>    Users file (default USERS_JSON_PATH or ${DEFAULT_USERS_JSON_PATH})`,
  "  --teams-webhook <url>  Teams webhook URL (default WEBHOOK_URL)",
  "  --help                 Show this message"
].join("\n");

function readEnv(env: Env, name: string): string | undefined {
  return env[name]?.trim() || undefined;
}

export function parseCliArgs(argv: string[]): CliArgs {
  try {
    const { values } = parseArgs({
      args: argv,
      options: {
        "num-tracks": { type: "string" },
        "users-json": { type: "string" },
        "teams-webhook": { type: "string" },
        help: { type: "boolean", default: false }
      },
      strict: true,
      allowPositionals: false
    });

    return {
      numTracks: values["num-tracks"],
      usersJson: values["users-json"],
      teamsWebhook: values["teams-webhook"],
      help: values.help === true
    };
  } catch (error) {
    throw new ConfigurationError(`Invalid command line: ${errorMessage(error)}`, { cause: error });
  }
}

export function resolveTrackCount(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_TRACK_COUNT;
  }

  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (!/^\d+$/.test(trimmed) || value < 1) {
    throw new ConfigurationError(`--num-tracks must be a positive integer, got "${raw}"`);
  }

  if (value > MAX_RECENT_TRACKS) {
    logger.warn(`--num-tracks=${value} exceeds the maximum of ${MAX_RECENT_TRACKS}; using ${MAX_RECENT_TRACKS}.`);
    return MAX_RECENT_TRACKS;
  }

  return value;
}

export function resolveUsersJsonPath(cliPath: string | undefined, env: Env): string {
  const configured = cliPath?.trim() || readEnv(env, "USERS_JSON_PATH") || DEFAULT_USERS_JSON_PATH;
  return path.resolve(process.cwd(), configured);
}

export function resolveWebhookUrl(cliUrl: string | undefined, env: Env): string {
  const configured = cliUrl?.trim() || readEnv(env, "WEBHOOK_URL");
  if (!configured) {
    throw new ConfigurationError("Missing webhook URL: pass --teams-webhook or set WEBHOOK_URL");
  }

  let parsed: URL;
  try {
    parsed = new URL(configured);
  } catch (error) {
    throw new ConfigurationError("Webhook URL is not a valid URL", { cause: error });
  }

  if (parsed.protocol !== "https:" && parsed.protocol !== "http:") {
    throw new ConfigurationError(`Webhook URL must use http or https, got ${parsed.protocol}`);
  }

  return configured;
}

function toUserCredentials(entry: unknown, index: number): UserCredentials {
  if (!isRecord(entry)) {
    throw new ConfigurationError(`User entry ${index} must be an object`);
  }

  const missing = USER_CREDENTIAL_KEYS.filter((key) => {
    const value = entry[key];
    return typeof value !== "string" || !value.trim();
  });

  if (missing.length > 0) {
    const label = typeof entry.username === "string" && entry.username.trim() ? ` (${entry.username})` : "";
    throw new ConfigurationError(`User entry ${index}${label} is missing required keys: ${missing.join(", ")}`);
  }

  const read = (key: (typeof USER_CREDENTIAL_KEYS)[number]): string => {
    const value = entry[key];
    return typeof value === "string" ? value.trim() : "";
  };

  return {
    username: read("username"),
    client_id: read("client_id"),
    client_secret: read("client_secret"),
    redirect_uri: read("redirect_uri"),
    refresh_token: read("refresh_token")
  };
}

export async function loadUsers(usersJsonPath: string): Promise<UserCredentials[]> {
  let raw: string;
  try {
    raw = await fs.readFile(usersJsonPath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new ConfigurationError(`Users file not found: ${usersJsonPath}`, { cause: error });
    }

    throw new ConfigurationError(`Failed to read users file (${usersJsonPath}): ${errorMessage(error)}`, {
      cause: error
    });
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch (error) {
    throw new ConfigurationError(`Users file is not valid JSON (${usersJsonPath}): ${errorMessage(error)}`, {
      cause: error
    });
  }

  if (!Array.isArray(parsed)) {
    throw new ConfigurationError(`Users file must contain a JSON array of user credentials (${usersJsonPath})`);
  }

  return parsed.map(toUserCredentials);
}

export async function loadConfig(args: CliArgs, env: Env = process.env): Promise<AppConfig> {
  const trackCount = resolveTrackCount(args.numTracks);
  const usersJsonPath = resolveUsersJsonPath(args.usersJson, env);
  const webhookUrl = resolveWebhookUrl(args.teamsWebhook, env);
  const users = await loadUsers(usersJsonPath);

  return {
    trackCount,
    usersJsonPath,
    webhookUrl,
    users
  };
}
