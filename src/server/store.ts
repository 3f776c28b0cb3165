import { DuelRuleError, MatchState } from "../engine/types";
import { isTerminal } from "../engine/utils";

/**
 * In-memory match registry keyed by context (channel) key, at most one live match per key.
 * The embedding layer owns the instance and hands it to whatever needs it; there is no global.
 */
export class MatchStore {
  private matches = new Map<string, MatchState>();

  /**
   * Inserts a new match. A live match on the same key is a DUPLICATE_MATCH;
   * a finished one is simply replaced.
   */
  create(match: MatchState): MatchState {
    const existing = this.matches.get(match.contextKey);
    if (existing && !isTerminal(existing)) {
      throw new DuelRuleError("DUPLICATE_MATCH", "There is already an active match in this channel");
    }
    this.matches.set(match.contextKey, match);
    return match;
  }

  /** Fetches a match by context key or undefined when missing. */
  get(contextKey: string): MatchState | undefined {
    return this.matches.get(contextKey);
  }

  /** Like get, but MATCH_NOT_FOUND when nothing is stored for the key. */
  require(contextKey: string): MatchState {
    const match = this.matches.get(contextKey);
    if (!match) {
      throw new DuelRuleError("MATCH_NOT_FOUND", "No active match in this channel");
    }
    return match;
  }

  /**
   * Load-modify-store for one match. This is the serialization point for every action:
   * the updater runs synchronously, so two picks arriving together are applied one after the other
   * and only the second sees both. A throwing updater leaves the stored snapshot untouched.
   */
  withMatch(contextKey: string, updater: (current: MatchState) => MatchState): MatchState {
    const current = this.require(contextKey);
    const updated = updater(current);
    if (updated.contextKey !== contextKey) {
      throw new Error("Context key mismatch");
    }
    this.matches.set(contextKey, updated);
    return updated;
  }

  /** Removes a match entirely (used once a finished match has been announced). */
  delete(contextKey: string): boolean {
    return this.matches.delete(contextKey);
  }

  /** Returns all stored matches, useful for diagnostics. */
  list(): MatchState[] {
    return Array.from(this.matches.values());
  }
}
