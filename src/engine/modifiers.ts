import { ActiveModifiers, DuelRuleError, ModifierEntry, ModifierRegistry, ModifierScope } from "./types";

export const MODIFIER_MIN = -3;
export const MODIFIER_MAX = 3;

function assertModifierValue(value: number): void {
  if (!Number.isInteger(value) || value < MODIFIER_MIN || value > MODIFIER_MAX) {
    throw new DuelRuleError(
      "MODIFIER_RANGE",
      `Modifier must be a whole number between ${MODIFIER_MIN} and ${MODIFIER_MAX}`
    );
  }
}

function withEntry(registry: ModifierRegistry, participantId: string, entry: ModifierEntry): ModifierRegistry {
  const next = { ...registry };
  if (entry.round === undefined && entry.match === undefined) {
    delete next[participantId];
  } else {
    next[participantId] = entry;
  }
  return next;
}

/**
 * Writes one scope for a participant. A value of 0 removes that scope's entry.
 * Throws MODIFIER_RANGE outside [-3, 3].
 */
export function setModifier(
  registry: ModifierRegistry,
  participantId: string,
  scope: ModifierScope,
  value: number
): ModifierRegistry {
  assertModifierValue(value);
  const { round, match } = registry[participantId] ?? {};
  const stored = value === 0 ? undefined : value;
  const entry: ModifierEntry = scope === "ROUND" ? { round: stored, match } : { round, match: stored };
  return withEntry(registry, participantId, stripUndefined(entry));
}

export function setRoundModifier(registry: ModifierRegistry, participantId: string, value: number): ModifierRegistry {
  return setModifier(registry, participantId, "ROUND", value);
}

export function setMatchModifier(registry: ModifierRegistry, participantId: string, value: number): ModifierRegistry {
  return setModifier(registry, participantId, "MATCH", value);
}

export function getActiveModifiers(registry: ModifierRegistry, participantId: string): ActiveModifiers {
  const entry = registry[participantId];
  const round = entry?.round ?? 0;
  const match = entry?.match ?? 0;
  return {
    round,
    match,
    total: round + match,
    roundSet: entry?.round !== undefined,
    matchSet: entry?.match !== undefined
  };
}

/** Drops every round-scoped entry; match-scoped entries survive. */
export function clearRoundModifiers(registry: ModifierRegistry): ModifierRegistry {
  let next: ModifierRegistry = {};
  for (const [participantId, entry] of Object.entries(registry)) {
    next = withEntry(next, participantId, stripUndefined({ match: entry.match }));
  }
  return next;
}

function stripUndefined(entry: ModifierEntry): ModifierEntry {
  const result: ModifierEntry = {};
  if (entry.round !== undefined) result.round = entry.round;
  if (entry.match !== undefined) result.match = entry.match;
  return result;
}
