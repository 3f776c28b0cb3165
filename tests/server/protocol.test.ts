import { describe, it, expect } from "vitest";
import { parseClientMessage } from "../../src/server/protocol";
import { expectRuleError } from "../helpers";

describe("parseClientMessage", () => {
  it("parses a challenge with options", () => {
    const message = parseClientMessage(
      JSON.stringify({
        type: "CHALLENGE",
        payload: {
          contextKey: "chan",
          participantId: "alice",
          name: "Alice",
          opponentId: "bob",
          opponentName: "Bob",
          options: { bestOf: 5, baitSwitch: true }
        }
      })
    );
    expect(message).toEqual({
      type: "CHALLENGE",
      payload: {
        contextKey: "chan",
        participantId: "alice",
        name: "Alice",
        opponentId: "bob",
        opponentName: "Bob",
        options: { bestOf: 5, baitSwitch: true }
      }
    });
  });

  it("parses joins with optional seat and moderator tokens", () => {
    expect(parseClientMessage('{"type":"JOIN","payload":{"contextKey":"chan"}}')).toEqual({
      type: "JOIN",
      payload: { contextKey: "chan" }
    });
    expect(
      parseClientMessage('{"type":"JOIN","payload":{"contextKey":"chan","seatToken":"seat-1","moderatorToken":"mod-secret"}}')
    ).toEqual({ type: "JOIN", payload: { contextKey: "chan", seatToken: "seat-1", moderatorToken: "mod-secret" } });
  });

  it("ignores a participant id on a join", () => {
    expect(parseClientMessage('{"type":"JOIN","payload":{"contextKey":"chan","participantId":"alice"}}')).toEqual({
      type: "JOIN",
      payload: { contextKey: "chan", seatToken: undefined, moderatorToken: undefined }
    });
  });

  it("parses payload-free actions", () => {
    expect(parseClientMessage('{"type":"ACCEPT"}')).toEqual({ type: "ACCEPT" });
    expect(parseClientMessage('{"type":"FORCE_END"}')).toEqual({ type: "FORCE_END" });
  });

  it("keeps stance names as given", () => {
    expect(parseClientMessage('{"type":"DECLARE","payload":{"stances":["bagr","Tigr"]}}')).toEqual({
      type: "DECLARE",
      payload: { stances: ["bagr", "Tigr"] }
    });
    expect(parseClientMessage('{"type":"PICK","payload":{"stance":"Radae"}}')).toEqual({
      type: "PICK",
      payload: { stance: "Radae" }
    });
  });

  it("parses modifier requests", () => {
    expect(
      parseClientMessage('{"type":"SET_MODIFIER","payload":{"targetId":"bob","scope":"MATCH","value":-2}}')
    ).toEqual({ type: "SET_MODIFIER", payload: { targetId: "bob", scope: "MATCH", value: -2 } });
  });

  it("throws SyntaxError on malformed JSON", () => {
    expect(() => parseClientMessage("{nope")).toThrow(SyntaxError);
  });

  it("rejects messages of the wrong shape", () => {
    expectRuleError(() => parseClientMessage("[]"), "BAD_MESSAGE");
    expectRuleError(() => parseClientMessage('{"type":7}'), "BAD_MESSAGE");
    expectRuleError(() => parseClientMessage('{"type":"PICK"}'), "BAD_MESSAGE");
    expectRuleError(() => parseClientMessage('{"type":"JOIN","payload":{"contextKey":"chan","seatToken":""}}'), "BAD_MESSAGE");
    expectRuleError(() => parseClientMessage('{"type":"PICK","payload":{"stance":"  "}}'), "BAD_MESSAGE");
    expectRuleError(() => parseClientMessage('{"type":"DECLARE","payload":{"stances":"Bagr"}}'), "BAD_MESSAGE");
    expectRuleError(() => parseClientMessage('{"type":"DECLARE","payload":{"stances":["Bagr",2]}}'), "BAD_MESSAGE");
    expectRuleError(
      () => parseClientMessage('{"type":"SET_MODIFIER","payload":{"targetId":"bob","scope":"GAME","value":1}}'),
      "BAD_MESSAGE"
    );
    expectRuleError(
      () => parseClientMessage('{"type":"SET_MODIFIER","payload":{"targetId":"bob","scope":"ROUND","value":"1"}}'),
      "BAD_MESSAGE"
    );
  });

  it("rejects challenge options of the wrong type", () => {
    const base = { contextKey: "chan", participantId: "alice", name: "Alice", opponentId: "bob", opponentName: "Bob" };
    expectRuleError(
      () => parseClientMessage(JSON.stringify({ type: "CHALLENGE", payload: { ...base, options: { bestOf: "3" } } })),
      "BAD_MESSAGE"
    );
    expectRuleError(
      () => parseClientMessage(JSON.stringify({ type: "CHALLENGE", payload: { ...base, options: { noRepeat: 1 } } })),
      "BAD_MESSAGE"
    );
  });

  it("names unknown message types", () => {
    expect(() => parseClientMessage('{"type":"DANCE"}')).toThrowError("Unknown message type DANCE");
  });
});
