import { DuelRuleError, ModifierScope } from "../engine/types";
import { ChallengeOptions, ClientMessage } from "../shared/messages";

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function bad(message: string): DuelRuleError {
  return new DuelRuleError("BAD_MESSAGE", message);
}

function requireString(payload: Json, key: string): string {
  const value = payload[key];
  if (typeof value !== "string" || value.trim().length === 0) {
    throw bad(`"${key}" must be a non-empty string`);
  }
  return value;
}

function optionalString(source: Json, key: string): string | undefined {
  if (source[key] === undefined) return undefined;
  return requireString(source, key);
}

function optionalBoolean(source: Json, key: string): boolean | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== "boolean") throw bad(`"${key}" must be a boolean`);
  return value;
}

function optionalNumber(source: Json, key: string): number | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== "number") throw bad(`"${key}" must be a number`);
  return value;
}

function requirePayload(message: Json): Json {
  if (!isObject(message.payload)) {
    throw bad("Missing payload");
  }
  return message.payload;
}

function parseOptions(value: unknown): ChallengeOptions | undefined {
  if (value === undefined) return undefined;
  if (!isObject(value)) throw bad('"options" must be an object');
  return {
    bestOf: optionalNumber(value, "bestOf"),
    noRepeat: optionalBoolean(value, "noRepeat"),
    adjacency: optionalBoolean(value, "adjacency"),
    baitSwitch: optionalBoolean(value, "baitSwitch")
  };
}

function parseScope(value: unknown): ModifierScope {
  if (value === "ROUND" || value === "MATCH") return value;
  throw bad('"scope" must be ROUND or MATCH');
}

/**
 * Narrows a raw WebSocket frame into a typed client message.
 * Stance names stay strings here; the gateway parses them against the stance table.
 * Throws SyntaxError for invalid JSON and BAD_MESSAGE for well-formed JSON of the wrong shape.
 */
export function parseClientMessage(raw: string): ClientMessage {
  const parsed: unknown = JSON.parse(raw);
  if (!isObject(parsed)) {
    throw bad("Message must be an object with a type");
  }
  const type = parsed.type;
  if (typeof type !== "string") {
    throw bad("Message must be an object with a type");
  }

  switch (type) {
    case "CHALLENGE": {
      const payload = requirePayload(parsed);
      return {
        type: "CHALLENGE",
        payload: {
          contextKey: requireString(payload, "contextKey"),
          participantId: requireString(payload, "participantId"),
          name: requireString(payload, "name"),
          opponentId: requireString(payload, "opponentId"),
          opponentName: requireString(payload, "opponentName"),
          options: parseOptions(payload.options)
        }
      };
    }
    case "JOIN": {
      const payload = requirePayload(parsed);
      return {
        type: "JOIN",
        payload: {
          contextKey: requireString(payload, "contextKey"),
          seatToken: optionalString(payload, "seatToken"),
          moderatorToken: optionalString(payload, "moderatorToken")
        }
      };
    }
    case "DECLARE": {
      const payload = requirePayload(parsed);
      const stances = payload.stances;
      if (!Array.isArray(stances) || !stances.every((s): s is string => typeof s === "string")) {
        throw bad('"stances" must be an array of stance names');
      }
      return { type: "DECLARE", payload: { stances } };
    }
    case "SWITCH": {
      const payload = requirePayload(parsed);
      return {
        type: "SWITCH",
        payload: { oldStance: requireString(payload, "oldStance"), newStance: requireString(payload, "newStance") }
      };
    }
    case "PICK": {
      const payload = requirePayload(parsed);
      return { type: "PICK", payload: { stance: requireString(payload, "stance") } };
    }
    case "SET_MODIFIER": {
      const payload = requirePayload(parsed);
      const value = payload.value;
      if (typeof value !== "number") throw bad('"value" must be a number');
      return {
        type: "SET_MODIFIER",
        payload: { targetId: requireString(payload, "targetId"), scope: parseScope(payload.scope), value }
      };
    }
    case "ACCEPT":
    case "PASS_SWITCH":
    case "STATUS":
    case "CANCEL":
    case "FORCE_END":
      return { type };
    default:
      throw bad(`Unknown message type ${type}`);
  }
}
