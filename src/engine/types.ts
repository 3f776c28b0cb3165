/**
 * Core domain types for the stance duel engine.
 * Keep this file dependency-free so it can be shared across layers.
 */

/** The six stances, listed clockwise around the cycle. */
export const STANCES = ["Bagr", "Radae", "Darda", "Tigr", "Riposje", "Tortad"] as const;

export type Stance = (typeof STANCES)[number];

/** How one stance fares against another; also the dice profile it rolls with. */
export type Relationship = "ADVANTAGE" | "DISADVANTAGE" | "NEUTRAL";

/** Cyclic positioning of two stances, used by the adjacency variant. */
export type Adjacency = "ADJACENT" | "OPPOSITE" | "OTHER";

/** Match lifecycle. COMPLETED and CANCELLED are terminal. */
export type MatchPhase = "PENDING_CHALLENGE" | "ACTIVE" | "COMPLETED" | "CANCELLED";

/**
 * Per-round sub-state while the match is ACTIVE.
 * Resolution happens inside the pick that completes the pair, so there is no resting "resolved" step.
 */
export type RoundStep = "DECLARING" | "SWITCHING" | "PICKING";

export type ModifierScope = "ROUND" | "MATCH";

/** Allowed match lengths. */
export type BestOf = 3 | 5 | 7;

export interface MatchConfig {
  bestOf: BestOf;
  noRepeat: boolean;
  adjacency: boolean;
  baitSwitch: boolean;
}

/** Opaque identity handed over by the embedding platform. */
export interface ParticipantIdentity {
  participantId: string;
  name: string;
}

/**
 * One of the two duelists.
 * Per-round fields (`declared`, `pick`, `hasSwitched`, `switchSettled`) reset whenever a round produces a winner.
 */
export interface Participant extends ParticipantIdentity {
  roundWins: number;
  /** Stance picked in the previous decided round, for the no-repeat rule. */
  lastStance: Stance | null;
  declared: [Stance, Stance] | null;
  pick: Stance | null;
  hasSwitched: boolean;
  /** True once the participant switched or passed during SWITCHING. */
  switchSettled: boolean;
}

/** Moderator-applied adjustments for one participant; absent keys were never set (or set to 0). */
export interface ModifierEntry {
  round?: number;
  match?: number;
}

export type ModifierRegistry = Record<string, ModifierEntry>;

export interface ActiveModifiers {
  round: number;
  match: number;
  total: number;
  roundSet: boolean;
  matchSet: boolean;
}

/** One participant's side of a resolved round. */
export interface CombatRoll {
  participantId: string;
  stance: Stance;
  profile: Relationship;
  dice: number[];
  kept: number;
  discarded: number | null;
  adjacencyModifier: number;
  roundModifier: number;
  matchModifier: number;
  /** Sum of every modifier before clamping. */
  totalModifier: number;
  /** What the modifiers actually moved the die by once the final value was clamped. */
  appliedModifier: number;
  rawValue: number;
  finalValue: number;
}

/** Immutable record of one resolution. Ties are recorded too, with `winnerId === null`. */
export interface RoundResult {
  roundNumber: number;
  /** 1 for the first resolution of a round, higher after tied re-picks. */
  attempt: number;
  /** Relationship of the challenger's pick against the opponent's. */
  relationship: Relationship;
  /** Relationship from the winner's perspective; null on a tie. */
  winnerRelationship: Relationship | null;
  adjacency: Adjacency;
  adjacencyApplied: boolean;
  rolls: [CombatRoll, CombatRoll];
  winnerId: string | null;
  tie: boolean;
  scores: Record<string, number>;
}

/**
 * Immutable snapshot of one match.
 * Key invariants:
 * - `phase` is COMPLETED exactly when `winnerId !== null`.
 * - `history` is append-only; cancelling keeps it.
 * - `participants[0]` is always the challenger.
 */
export interface MatchState {
  contextKey: string;
  participants: [Participant, Participant];
  config: MatchConfig;
  phase: MatchPhase;
  step: RoundStep | null;
  roundNumber: number;
  /** Attempt number within the current round; a tie starts another attempt. */
  attempt: number;
  history: RoundResult[];
  modifiers: ModifierRegistry;
  winnerId: string | null;
  cancelledBy: string | null;
  createdAt: number;
  updatedAt: number;
}

export type DuelErrorCode =
  | "INVALID_DECLARATION"
  | "INVALID_SWITCH"
  | "INVALID_PICK"
  | "MODIFIER_TIMING"
  | "MODIFIER_RANGE"
  | "DUPLICATE_MATCH"
  | "ILLEGAL_TRANSITION"
  | "PARTICIPANT_NOT_FOUND"
  | "INVALID_CONFIG"
  | "INVALID_STANCE"
  | "MATCH_NOT_FOUND"
  | "NOT_AUTHORIZED"
  | "NOT_BOUND"
  | "ALREADY_BOUND"
  | "BAD_MESSAGE";

/** Application-level error for rejected actions. Surfaces to clients as structured error codes. */
export class DuelRuleError extends Error {
  constructor(public code: DuelErrorCode, message: string) {
    super(message);
    this.name = "DuelRuleError";
  }
}
