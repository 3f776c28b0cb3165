import fs from "fs";
import path from "path";

/** A moderator id and the secret that proves it over the wire. */
export interface ModeratorCredential {
  id: string;
  token: string;
}

/** Operator-managed settings persisted beside the server. */
export interface DuelSettings {
  moderators: ModeratorCredential[];
}

export function defaultSettings(): DuelSettings {
  return { moderators: [] };
}

function toText(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number") return String(value);
  return "";
}

/** Keeps well-formed `{ id, token }` entries, first one wins for a repeated id or token. */
export function normalizeModerators(value: unknown): ModeratorCredential[] {
  if (!Array.isArray(value)) return [];
  const entries: unknown[] = value;
  const seenIds = new Set<string>();
  const seenTokens = new Set<string>();
  const credentials: ModeratorCredential[] = [];
  for (const entry of entries) {
    if (typeof entry !== "object" || entry === null) continue;
    const id = "id" in entry ? toText(entry.id) : "";
    const token = "token" in entry ? toText(entry.token) : "";
    if (!id || !token || seenIds.has(id) || seenTokens.has(token)) continue;
    seenIds.add(id);
    seenTokens.add(token);
    credentials.push({ id, token });
  }
  return credentials;
}

/**
 * Reads the settings file. A missing file yields the defaults; an unreadable or corrupt one
 * is reported and also falls back to the defaults so the server can still start.
 */
export function loadSettings(file: string): DuelSettings {
  if (!fs.existsSync(file)) {
    return defaultSettings();
  }
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(file, "utf8"));
    if (typeof parsed !== "object" || parsed === null) {
      console.warn(`Settings file ${file} does not hold an object; using defaults`);
      return defaultSettings();
    }
    return { moderators: normalizeModerators("moderators" in parsed ? parsed.moderators : undefined) };
  } catch (err) {
    console.warn(`Failed to read settings from ${file}:`, err instanceof Error ? err.message : err);
    return defaultSettings();
  }
}

export function saveSettings(file: string, settings: DuelSettings): void {
  fs.mkdirSync(path.dirname(file), { recursive: true });
  fs.writeFileSync(file, JSON.stringify({ moderators: normalizeModerators(settings.moderators) }, null, 2));
}

/**
 * Loads the settings, writing the defaults out first when no file exists yet.
 * A file that cannot be written is reported and the server runs on the defaults.
 */
export function ensureSettings(file: string): DuelSettings {
  if (!fs.existsSync(file)) {
    try {
      saveSettings(file, defaultSettings());
    } catch (err) {
      console.warn(`Could not create settings file ${file}:`, err instanceof Error ? err.message : err);
      return defaultSettings();
    }
    console.log(`Created settings file ${file}`);
  }
  return loadSettings(file);
}

/** Moderator roster used for SET_MODIFIER and FORCE_END, looked up by secret token. */
export class ModeratorRoster {
  private byToken = new Map<string, string>();

  constructor(credentials: Iterable<ModeratorCredential> = []) {
    for (const credential of credentials) {
      if (!this.byToken.has(credential.token)) {
        this.byToken.set(credential.token, credential.id);
      }
    }
  }

  static fromSources(settings: DuelSettings, extra: readonly ModeratorCredential[]): ModeratorRoster {
    return new ModeratorRoster(normalizeModerators([...settings.moderators, ...extra]));
  }

  /** Moderator id for a token, or null when the token is unknown. */
  authenticate(token: string): string | null {
    return this.byToken.get(token) ?? null;
  }

  list(): string[] {
    return [...new Set(this.byToken.values())];
  }
}
