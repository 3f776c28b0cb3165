import { describe, it, expect } from "vitest";
import { DEFAULT_CONFIG, loadConfig } from "../../src/server/config";

describe("loadConfig", () => {
  it("uses defaults for an empty environment", () => {
    expect(loadConfig({})).toEqual(DEFAULT_CONFIG);
  });

  it("reads numbers, the settings path and the moderator list", () => {
    const config = loadConfig({
      PORT: "8080",
      CHALLENGE_TIMEOUT_MS: "0",
      ROUND_TIMEOUT_MS: " ",
      SETTINGS_FILE: "data/duel.json",
      MODERATORS: " mod:t-mod, ref : t:ref ,,"
    });
    expect(config).toEqual({
      port: 8080,
      challengeTimeoutMs: 0,
      roundTimeoutMs: DEFAULT_CONFIG.roundTimeoutMs,
      settingsFile: "data/duel.json",
      moderators: [
        { id: "mod", token: "t-mod" },
        { id: "ref", token: "t:ref" }
      ]
    });
  });

  it("rejects moderator entries without both an id and a token", () => {
    expect(() => loadConfig({ MODERATORS: "mod" })).toThrowError('MODERATORS entries must look like id:token, got "mod"');
    expect(() => loadConfig({ MODERATORS: ":t-mod" })).toThrowError(
      'MODERATORS entries must look like id:token, got ":t-mod"'
    );
  });

  it("rejects values that are not non-negative numbers", () => {
    expect(() => loadConfig({ PORT: "abc" })).toThrowError('PORT must be a non-negative number, got "abc"');
    expect(() => loadConfig({ ROUND_TIMEOUT_MS: "-5" })).toThrowError(
      'ROUND_TIMEOUT_MS must be a non-negative number, got "-5"'
    );
  });
});
