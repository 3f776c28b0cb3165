import { afterEach, beforeEach, describe, it, expect, vi } from "vitest";
import * as transitions from "../../src/engine/transitions";
import { ExpiryTimer } from "../../src/server/timers";

const ALICE = { participantId: "alice", name: "Alice" };
const BOB = { participantId: "bob", name: "Bob" };
const LIMITS = { challengeTimeoutMs: 1000, roundTimeoutMs: 5000 };

describe("ExpiryTimer", () => {
  beforeEach(() => {
    vi.useFakeTimers();
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  it("expires an unaccepted challenge after the challenge timeout", () => {
    const onExpire = vi.fn();
    const timer = new ExpiryTimer(LIMITS, onExpire);
    timer.schedule(transitions.createChallenge("chan", ALICE, BOB, undefined, 0), 0);

    vi.advanceTimersByTime(999);
    expect(onExpire).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onExpire).toHaveBeenCalledWith("chan");
    expect(timer.has("chan")).toBe(false);
  });

  it("uses the round timeout once the match is active and counts from the last update", () => {
    const onExpire = vi.fn();
    const timer = new ExpiryTimer(LIMITS, onExpire);
    const pending = transitions.createChallenge("chan", ALICE, BOB, undefined, 0);
    const active = transitions.acceptChallenge(pending, "bob", 0);
    timer.schedule(active, 2000);

    vi.advanceTimersByTime(2999);
    expect(onExpire).not.toHaveBeenCalled();
    vi.advanceTimersByTime(1);
    expect(onExpire).toHaveBeenCalledTimes(1);
  });

  it("rescheduling replaces the previous timeout", () => {
    const onExpire = vi.fn();
    const timer = new ExpiryTimer(LIMITS, onExpire);
    const pending = transitions.createChallenge("chan", ALICE, BOB, undefined, 0);
    timer.schedule(pending, 0);
    timer.schedule(transitions.acceptChallenge(pending, "bob", 0), 0);

    vi.advanceTimersByTime(1000);
    expect(onExpire).not.toHaveBeenCalled();
  });

  it("skips finished matches and disabled limits", () => {
    const onExpire = vi.fn();
    const pending = transitions.createChallenge("chan", ALICE, BOB, undefined, 0);

    const timer = new ExpiryTimer(LIMITS, onExpire);
    timer.schedule(transitions.cancelMatch(pending, "alice", 0), 0);
    expect(timer.has("chan")).toBe(false);

    const disabled = new ExpiryTimer({ challengeTimeoutMs: 0, roundTimeoutMs: 0 }, onExpire);
    disabled.schedule(pending, 0);
    expect(disabled.has("chan")).toBe(false);

    vi.advanceTimersByTime(10_000);
    expect(onExpire).not.toHaveBeenCalled();
  });

  it("clears every pending timeout", () => {
    const onExpire = vi.fn();
    const timer = new ExpiryTimer(LIMITS, onExpire);
    timer.schedule(transitions.createChallenge("a", ALICE, BOB, undefined, 0), 0);
    timer.schedule(transitions.createChallenge("b", ALICE, BOB, undefined, 0), 0);
    timer.clear("a");
    expect(timer.has("a")).toBe(false);
    expect(timer.has("b")).toBe(true);

    timer.clearAll();
    vi.advanceTimersByTime(10_000);
    expect(onExpire).not.toHaveBeenCalled();
  });
});
