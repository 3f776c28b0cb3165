import { Adjacency, DuelRuleError, Relationship, STANCES, Stance } from "./types";

const CYCLE = STANCES.length;

/** Position of a stance on the clockwise cycle. */
export function stanceIndex(stance: Stance): number {
  return STANCES.indexOf(stance);
}

/** Clockwise steps from `from` to `to`, in [0, 5]. */
export function cyclicDistance(from: Stance, to: Stance): number {
  return (((stanceIndex(to) - stanceIndex(from)) % CYCLE) + CYCLE) % CYCLE;
}

export function isStance(value: string): value is Stance {
  return STANCES.some(stance => stance === value);
}

/** Case-insensitive lookup for untrusted input. */
export function parseStance(value: string): Stance {
  const wanted = value.trim().toLowerCase();
  const match = STANCES.find(stance => stance.toLowerCase() === wanted);
  if (!match) {
    throw new DuelRuleError("INVALID_STANCE", `Unknown stance "${value}". Valid stances: ${STANCES.join(", ")}`);
  }
  return match;
}

/**
 * Relationship of `attacker` against `defender`.
 * One or two steps clockwise is an advantage, four or five a disadvantage;
 * the opposite stance and the stance itself are neutral.
 */
export function relationship(attacker: Stance, defender: Stance): Relationship {
  switch (cyclicDistance(attacker, defender)) {
    case 1:
    case 2:
      return "ADVANTAGE";
    case 4:
    case 5:
      return "DISADVANTAGE";
    default:
      return "NEUTRAL";
  }
}

export function adjacency(a: Stance, b: Stance): Adjacency {
  const distance = cyclicDistance(a, b);
  if (distance === 1 || distance === 5) return "ADJACENT";
  if (distance === 3) return "OPPOSITE";
  return "OTHER";
}

/** Roll adjustment the adjacency variant applies to both duelists. */
export function adjacencyModifier(kind: Adjacency): number {
  switch (kind) {
    case "ADJACENT":
      return 1;
    case "OPPOSITE":
      return -1;
    case "OTHER":
      return 0;
    default: {
      const exhaustive: never = kind;
      throw new Error(`Unhandled adjacency ${exhaustive}`);
    }
  }
}

/** The two stances `stance` rolls with advantage against. */
export function advantageTargets(stance: Stance): Stance[] {
  return STANCES.filter(other => relationship(stance, other) === "ADVANTAGE");
}

export interface StanceChartEntry {
  stance: Stance;
  beats: Stance[];
  losesTo: Stance[];
  opposite: Stance;
}

/** Rules chart derived from the cycle, one row per stance. */
export function stanceChart(): StanceChartEntry[] {
  return STANCES.map(stance => {
    const others = STANCES.filter(other => other !== stance);
    const opposite = others.find(other => cyclicDistance(stance, other) === 3);
    if (!opposite) {
      throw new Error(`No opposite stance for ${stance}`);
    }
    return {
      stance,
      beats: advantageTargets(stance),
      losesTo: others.filter(other => relationship(stance, other) === "DISADVANTAGE"),
      opposite
    };
  });
}
