import "dotenv/config";
import { ModeratorCredential } from "./settings";

/** Process-level knobs, read once at startup from the environment (and `.env` when present). */
export interface ServerConfig {
  port: number;
  /** How long a challenge may wait for acceptance before it is withdrawn. */
  challengeTimeoutMs: number;
  /** How long an accepted match may sit without any action before it is cancelled. */
  roundTimeoutMs: number;
  settingsFile: string;
  /** Moderator credentials supplied by the environment, merged with the settings file roster. */
  moderators: ModeratorCredential[];
}

export const DEFAULT_CONFIG: ServerConfig = {
  port: 3000,
  challengeTimeoutMs: 5 * 60_000,
  roundTimeoutMs: 30 * 60_000,
  settingsFile: "settings.json",
  moderators: []
};

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw.trim() === "") return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`${name} must be a non-negative number, got "${raw}"`);
  }
  return value;
}

function readList(env: NodeJS.ProcessEnv, name: string): string[] {
  const raw = env[name];
  if (!raw) return [];
  return raw
    .split(",")
    .map(entry => entry.trim())
    .filter(entry => entry.length > 0);
}

/** `id:token` pairs; the token is everything after the first colon. */
function readCredentials(env: NodeJS.ProcessEnv, name: string): ModeratorCredential[] {
  return readList(env, name).map(entry => {
    const separator = entry.indexOf(":");
    const id = separator > 0 ? entry.slice(0, separator).trim() : "";
    const token = separator > 0 ? entry.slice(separator + 1).trim() : "";
    if (!id || !token) {
      throw new Error(`${name} entries must look like id:token, got "${entry}"`);
    }
    return { id, token };
  });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return {
    port: readNumber(env, "PORT", DEFAULT_CONFIG.port),
    challengeTimeoutMs: readNumber(env, "CHALLENGE_TIMEOUT_MS", DEFAULT_CONFIG.challengeTimeoutMs),
    roundTimeoutMs: readNumber(env, "ROUND_TIMEOUT_MS", DEFAULT_CONFIG.roundTimeoutMs),
    settingsFile: env.SETTINGS_FILE?.trim() || DEFAULT_CONFIG.settingsFile,
    moderators: readCredentials(env, "MODERATORS")
  };
}
