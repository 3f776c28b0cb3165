import { adjacency, adjacencyModifier, relationship } from "./stances";
import { ActiveModifiers, CombatRoll, Relationship, RoundResult, Stance } from "./types";
import { DIE_FACES, DieRoller, clamp, defaultDieRoller } from "./utils";

/** One duelist's committed pick plus the modifiers registered for them at resolution time. */
export interface CombatantInput {
  participantId: string;
  stance: Stance;
  modifiers: ActiveModifiers;
}

export interface ResolveInput {
  challenger: CombatantInput;
  opponent: CombatantInput;
  adjacencyEnabled: boolean;
}

/** Everything a resolution decides; the state machine adds round bookkeeping on top. */
export type CombatOutcome = Omit<RoundResult, "roundNumber" | "attempt" | "scores">;

export interface DiceRoll {
  dice: number[];
  kept: number;
  discarded: number | null;
}

/** Neutral rolls one die; advantage keeps the higher of two, disadvantage the lower. */
export function rollProfile(profile: Relationship, roll: DieRoller = defaultDieRoller): DiceRoll {
  if (profile === "NEUTRAL") {
    const value = roll();
    return { dice: [value], kept: value, discarded: null };
  }
  const first = roll();
  const second = roll();
  const kept = profile === "ADVANTAGE" ? Math.max(first, second) : Math.min(first, second);
  const discarded = profile === "ADVANTAGE" ? Math.min(first, second) : Math.max(first, second);
  return { dice: [first, second], kept, discarded };
}

function invert(profile: Relationship): Relationship {
  if (profile === "ADVANTAGE") return "DISADVANTAGE";
  if (profile === "DISADVANTAGE") return "ADVANTAGE";
  return "NEUTRAL";
}

function buildRoll(combatant: CombatantInput, profile: Relationship, dice: DiceRoll, adjacencyMod: number): CombatRoll {
  const totalModifier = adjacencyMod + combatant.modifiers.total;
  const rawValue = dice.kept + totalModifier;
  const finalValue = clamp(rawValue, 1, DIE_FACES);
  return {
    participantId: combatant.participantId,
    stance: combatant.stance,
    profile,
    dice: dice.dice,
    kept: dice.kept,
    discarded: dice.discarded,
    adjacencyModifier: adjacencyMod,
    roundModifier: combatant.modifiers.round,
    matchModifier: combatant.modifiers.match,
    totalModifier,
    appliedModifier: finalValue - dice.kept,
    rawValue,
    finalValue
  };
}

/**
 * Resolves one exchange of picks. Pure apart from the injected die roller,
 * which is called for the challenger's dice first, then the opponent's.
 */
export function resolveCombat(input: ResolveInput, roll: DieRoller = defaultDieRoller): CombatOutcome {
  const { challenger, opponent } = input;
  const challengerProfile = relationship(challenger.stance, opponent.stance);
  const opponentProfile = invert(challengerProfile);

  const challengerDice = rollProfile(challengerProfile, roll);
  const opponentDice = rollProfile(opponentProfile, roll);

  const positioning = adjacency(challenger.stance, opponent.stance);
  const adjacencyMod = input.adjacencyEnabled ? adjacencyModifier(positioning) : 0;

  const rolls: [CombatRoll, CombatRoll] = [
    buildRoll(challenger, challengerProfile, challengerDice, adjacencyMod),
    buildRoll(opponent, opponentProfile, opponentDice, adjacencyMod)
  ];

  const [a, b] = rolls;
  let winner: CombatRoll | null = null;
  if (a.finalValue > b.finalValue) winner = a;
  else if (b.finalValue > a.finalValue) winner = b;

  return {
    relationship: challengerProfile,
    winnerRelationship: winner ? winner.profile : null,
    adjacency: positioning,
    adjacencyApplied: adjacencyMod !== 0,
    rolls,
    winnerId: winner ? winner.participantId : null,
    tie: winner === null
  };
}
