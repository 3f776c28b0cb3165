import { describe, it, expect } from "vitest";
import * as transitions from "../../src/engine/transitions";
import { buildMatchStatus } from "../../src/shared/messages";
import { dice } from "../helpers";

const ALICE = { participantId: "alice", name: "Alice" };
const BOB = { participantId: "bob", name: "Bob" };

function activeMatch() {
  return transitions.acceptChallenge(transitions.createChallenge("chan", ALICE, BOB, undefined, 0), "bob", 0);
}

describe("buildMatchStatus", () => {
  it("summarises a pending challenge", () => {
    const status = buildMatchStatus(transitions.createChallenge("chan", ALICE, BOB, { bestOf: 5 }, 0));
    expect(status.phase).toBe("PENDING_CHALLENGE");
    expect(status.winThreshold).toBe(3);
    expect(status.pending).toEqual(["bob"]);
    expect(status.scores).toEqual({ alice: 0, bob: 0 });
    expect(status.lastResult).toBeNull();
    expect(status.you).toBeNull();
  });

  it("hides a declaration from everyone but its owner until both are in", () => {
    const match = transitions.declareStances(activeMatch(), "alice", ["Bagr", "Tigr"], 0);

    const bobView = buildMatchStatus(match, "bob");
    expect(bobView.participants[0].declared).toBeNull();
    expect(bobView.participants[0].hasDeclared).toBe(true);
    expect(bobView.you?.declared).toBeNull();

    const aliceView = buildMatchStatus(match, "alice");
    expect(aliceView.participants[0].declared).toBeNull();
    expect(aliceView.you?.declared).toEqual(["Bagr", "Tigr"]);
  });

  it("reveals both declarations once the round moves past declaring", () => {
    let match = transitions.declareStances(activeMatch(), "alice", ["Bagr", "Tigr"], 0);
    match = transitions.declareStances(match, "bob", ["Radae", "Tortad"], 0);

    const observer = buildMatchStatus(match);
    expect(observer.step).toBe("PICKING");
    expect(observer.participants.map(p => p.declared)).toEqual([
      ["Bagr", "Tigr"],
      ["Radae", "Tortad"]
    ]);
  });

  it("shows a pick only to the participant who made it", () => {
    let match = transitions.declareStances(activeMatch(), "alice", ["Bagr", "Tigr"], 0);
    match = transitions.declareStances(match, "bob", ["Radae", "Tortad"], 0);
    match = transitions.pickStance(match, "alice", "Bagr", dice(), 0);

    const bobView = buildMatchStatus(match, "bob");
    expect(bobView.participants[0].hasPicked).toBe(true);
    expect(bobView.you?.pick).toBeNull();
    expect(bobView.pending).toEqual(["bob"]);
    expect("pick" in bobView.participants[0]).toBe(false);

    expect(buildMatchStatus(match, "alice").you?.pick).toBe("Bagr");
    expect(buildMatchStatus(match, "carol").you).toBeNull();
  });

  it("exposes modifiers and the latest result", () => {
    let match = transitions.declareStances(activeMatch(), "alice", ["Bagr", "Tigr"], 0);
    match = transitions.declareStances(match, "bob", ["Radae", "Tortad"], 0);
    match = transitions.setModifier(match, "bob", "MATCH", -1, 0);
    match = transitions.pickStance(match, "alice", "Bagr", dice(), 0);
    match = transitions.pickStance(match, "bob", "Radae", dice(5, 2, 3, 4), 0);

    const status = buildMatchStatus(match);
    expect(status.participants[1].modifiers).toEqual({ round: 0, match: -1, total: -1, roundSet: false, matchSet: true });
    expect(status.lastResult?.winnerId).toBe("alice");
    expect(status.history).toHaveLength(1);
    expect(status.roundNumber).toBe(2);
  });
});
