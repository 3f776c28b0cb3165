import { MatchState } from "../engine/types";
import { isTerminal } from "../engine/utils";

export interface ExpiryLimits {
  challengeTimeoutMs: number;
  roundTimeoutMs: number;
}

/**
 * Tracks one timeout per context and fires when a match sits idle too long:
 * an unaccepted challenge after `challengeTimeoutMs`, an accepted match after `roundTimeoutMs`
 * without any action. A limit of 0 disables that timeout.
 */
export class ExpiryTimer {
  private timers = new Map<string, NodeJS.Timeout>();

  constructor(
    private limits: ExpiryLimits,
    private onExpire: (contextKey: string) => void
  ) {}

  schedule(match: MatchState, now: number = Date.now()): void {
    this.clear(match.contextKey);
    if (isTerminal(match)) return;

    const limit = match.phase === "PENDING_CHALLENGE" ? this.limits.challengeTimeoutMs : this.limits.roundTimeoutMs;
    if (limit <= 0) return;

    const delay = Math.max(0, match.updatedAt + limit - now);
    const timeout = setTimeout(() => {
      this.timers.delete(match.contextKey);
      this.onExpire(match.contextKey);
    }, delay);
    timeout.unref();
    this.timers.set(match.contextKey, timeout);
  }

  clear(contextKey: string): void {
    const timer = this.timers.get(contextKey);
    if (!timer) return;
    clearTimeout(timer);
    this.timers.delete(contextKey);
  }

  clearAll(): void {
    for (const timer of this.timers.values()) {
      clearTimeout(timer);
    }
    this.timers.clear();
  }

  has(contextKey: string): boolean {
    return this.timers.has(contextKey);
  }
}
