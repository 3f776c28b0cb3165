import {
  BestOf,
  DuelRuleError,
  MatchConfig,
  MatchPhase,
  MatchState,
  ModifierScope,
  Participant,
  ParticipantIdentity,
  RoundResult,
  RoundStep,
  Stance
} from "./types";
import { clearRoundModifiers, getActiveModifiers, setModifier as writeModifier } from "./modifiers";
import { resolveCombat } from "./resolver";
import { DieRoller, defaultDieRoller, getParticipant, isTerminal, nowMs } from "./utils";
import { checkWin } from "./win";

/** Partial overrides accepted when issuing a challenge. */
export interface MatchConfigOverrides {
  bestOf?: number;
  noRepeat?: boolean;
  adjacency?: boolean;
  baitSwitch?: boolean;
}

export const BEST_OF_OPTIONS: readonly BestOf[] = [3, 5, 7];

/** Plain best-of-3 with every variant off. */
export const DEFAULT_MATCH_CONFIG: MatchConfig = {
  bestOf: 3,
  noRepeat: false,
  adjacency: false,
  baitSwitch: false
};

function isBestOf(value: number): value is BestOf {
  return BEST_OF_OPTIONS.some(option => option === value);
}

/** Merges supplied overrides with the default config, rejecting unsupported match lengths. */
export function mergeConfig(overrides?: MatchConfigOverrides): MatchConfig {
  const bestOf = overrides?.bestOf ?? DEFAULT_MATCH_CONFIG.bestOf;
  if (!isBestOf(bestOf)) {
    throw new DuelRuleError("INVALID_CONFIG", `Best of must be one of ${BEST_OF_OPTIONS.join(", ")}`);
  }
  return {
    bestOf,
    noRepeat: overrides?.noRepeat ?? DEFAULT_MATCH_CONFIG.noRepeat,
    adjacency: overrides?.adjacency ?? DEFAULT_MATCH_CONFIG.adjacency,
    baitSwitch: overrides?.baitSwitch ?? DEFAULT_MATCH_CONFIG.baitSwitch
  };
}

/**
 * Ensures the match is in one of the allowed phases before continuing.
 * Throws ILLEGAL_TRANSITION if the guard fails; terminal matches get a dedicated message.
 */
export function ensurePhase(match: MatchState, expected: MatchPhase | MatchPhase[], message: string): void {
  const allowed = Array.isArray(expected) ? expected : [expected];
  if (allowed.includes(match.phase)) return;
  if (isTerminal(match)) {
    throw new DuelRuleError("ILLEGAL_TRANSITION", "This match is already over");
  }
  throw new DuelRuleError("ILLEGAL_TRANSITION", message);
}

/** Phase guard plus round-step guard for actions inside an active round. */
export function ensureStep(match: MatchState, expected: RoundStep, message: string): void {
  ensurePhase(match, "ACTIVE", message);
  if (match.step !== expected) {
    throw new DuelRuleError("ILLEGAL_TRANSITION", message);
  }
}

/** Looks up a duelist, throwing PARTICIPANT_NOT_FOUND for outsiders. */
export function assertParticipant(match: MatchState, participantId: string): Participant {
  const participant = getParticipant(match, participantId);
  if (!participant) {
    throw new DuelRuleError("PARTICIPANT_NOT_FOUND", `${participantId} is not part of this match`);
  }
  return participant;
}

/** Promotes an identity payload to a fresh duelist record. */
export function toParticipant(identity: ParticipantIdentity): Participant {
  return {
    participantId: identity.participantId,
    name: identity.name,
    roundWins: 0,
    lastStance: null,
    declared: null,
    pick: null,
    hasSwitched: false,
    switchSettled: false
  };
}

function resetRound(participant: Participant): Participant {
  return { ...participant, declared: null, pick: null, hasSwitched: false, switchSettled: false };
}

function updateParticipant(
  match: MatchState,
  participantId: string,
  patch: Partial<Participant>
): MatchState["participants"] {
  const [a, b] = match.participants;
  return [
    a.participantId === participantId ? { ...a, ...patch } : a,
    b.participantId === participantId ? { ...b, ...patch } : b
  ];
}

function scoreSnapshot(participants: MatchState["participants"]): Record<string, number> {
  return Object.fromEntries(participants.map(p => [p.participantId, p.roundWins]));
}

/**
 * Creates the pending challenge for a context. The challenger always sits in slot 0.
 */
export function createChallenge(
  contextKey: string,
  challenger: ParticipantIdentity,
  opponent: ParticipantIdentity,
  overrides?: MatchConfigOverrides,
  now: number = nowMs()
): MatchState {
  if (challenger.participantId === opponent.participantId) {
    throw new DuelRuleError("INVALID_CONFIG", "You cannot challenge yourself");
  }
  return {
    contextKey,
    participants: [toParticipant(challenger), toParticipant(opponent)],
    config: mergeConfig(overrides),
    phase: "PENDING_CHALLENGE",
    step: null,
    roundNumber: 1,
    attempt: 1,
    history: [],
    modifiers: {},
    winnerId: null,
    cancelledBy: null,
    createdAt: now,
    updatedAt: now
  };
}

/** Opponent-only action that starts round 1. */
export function acceptChallenge(match: MatchState, participantId: string, now: number = nowMs()): MatchState {
  ensurePhase(match, "PENDING_CHALLENGE", "This challenge has already been accepted");
  assertParticipant(match, participantId);
  if (match.participants[1].participantId !== participantId) {
    throw new DuelRuleError("NOT_AUTHORIZED", "Only the challenged participant can accept");
  }
  return { ...match, phase: "ACTIVE", step: "DECLARING", updatedAt: now };
}

/**
 * Records a participant's two declared stances. Re-declaring is allowed until the opponent has declared too;
 * the second declaration moves the round on to SWITCHING (bait & switch) or straight to PICKING.
 */
export function declareStances(
  match: MatchState,
  participantId: string,
  stances: readonly Stance[],
  now: number = nowMs()
): MatchState {
  ensureStep(match, "DECLARING", "Stances can only be declared during the declaration step");
  const participant = assertParticipant(match, participantId);

  if (stances.length !== 2) {
    throw new DuelRuleError("INVALID_DECLARATION", "Declare exactly two stances");
  }
  const [first, second] = stances;
  if (first === second) {
    throw new DuelRuleError("INVALID_DECLARATION", "You cannot declare the same stance twice");
  }
  if (match.config.noRepeat && participant.lastStance && stances.includes(participant.lastStance)) {
    throw new DuelRuleError(
      "INVALID_DECLARATION",
      `You cannot use ${participant.lastStance} again (no-repeat rule)`
    );
  }

  const participants = updateParticipant(match, participantId, { declared: [first, second] });
  const bothDeclared = participants.every(p => p.declared !== null);
  let step: RoundStep = "DECLARING";
  if (bothDeclared) {
    step = match.config.baitSwitch ? "SWITCHING" : "PICKING";
  }
  return { ...match, participants, step, updatedAt: now };
}

function advanceFromSwitching(match: MatchState): MatchState {
  const settled = match.participants.every(p => p.switchSettled);
  return settled ? { ...match, step: "PICKING" } : match;
}

/**
 * Bait & switch: replaces one declared stance with a new one, once per round.
 */
export function switchStance(
  match: MatchState,
  participantId: string,
  oldStance: Stance,
  newStance: Stance,
  now: number = nowMs()
): MatchState {
  ensurePhase(match, "ACTIVE", "Switching is only possible during an active match");
  const participant = assertParticipant(match, participantId);
  if (!match.config.baitSwitch) {
    throw new DuelRuleError("INVALID_SWITCH", "Bait & switch is not enabled for this match");
  }
  if (participant.hasSwitched) {
    throw new DuelRuleError("INVALID_SWITCH", "You have already used your switch this round");
  }
  ensureStep(match, "SWITCHING", "Switching only happens after both declarations and before picking");
  if (participant.switchSettled) {
    throw new DuelRuleError("INVALID_SWITCH", "You already passed on switching this round");
  }

  const declared = participant.declared;
  if (!declared) {
    throw new DuelRuleError("ILLEGAL_TRANSITION", "Nothing declared to switch");
  }
  if (!declared.includes(oldStance)) {
    throw new DuelRuleError("INVALID_SWITCH", `${oldStance} is not one of your declared stances`);
  }
  if (declared.includes(newStance)) {
    throw new DuelRuleError("INVALID_SWITCH", `You already declared ${newStance}`);
  }
  if (match.config.noRepeat && participant.lastStance === newStance) {
    throw new DuelRuleError("INVALID_SWITCH", `You cannot switch to ${newStance} (no-repeat rule)`);
  }

  const [first, second] = declared;
  const swapped: [Stance, Stance] = first === oldStance ? [newStance, second] : [first, newStance];
  const participants = updateParticipant(match, participantId, {
    declared: swapped,
    hasSwitched: true,
    switchSettled: true
  });
  return advanceFromSwitching({ ...match, participants, updatedAt: now });
}

/** Bait & switch: moves on to picking without switching. */
export function passSwitch(match: MatchState, participantId: string, now: number = nowMs()): MatchState {
  ensureStep(match, "SWITCHING", "There is no switch to pass on right now");
  const participant = assertParticipant(match, participantId);
  if (participant.switchSettled) {
    throw new DuelRuleError("INVALID_SWITCH", "You already switched or passed this round");
  }
  const participants = updateParticipant(match, participantId, { switchSettled: true });
  return advanceFromSwitching({ ...match, participants, updatedAt: now });
}

/** True once both secret picks are in for the current round. */
export function areBothPicksIn(match: MatchState): boolean {
  return match.participants.every(p => p.pick !== null);
}

/**
 * Commits a secret pick. The pick that completes the pair resolves the round before returning,
 * so resolution happens exactly once per pair of picks.
 */
export function pickStance(
  match: MatchState,
  participantId: string,
  stance: Stance,
  roll: DieRoller = defaultDieRoller,
  now: number = nowMs()
): MatchState {
  ensureStep(match, "PICKING", "Picks are only accepted during the picking step");
  const participant = assertParticipant(match, participantId);
  if (participant.pick) {
    throw new DuelRuleError("INVALID_PICK", "You have already made your pick");
  }
  if (!participant.declared || !participant.declared.includes(stance)) {
    throw new DuelRuleError("INVALID_PICK", `${stance} is not one of your declared stances`);
  }

  const picked: MatchState = {
    ...match,
    participants: updateParticipant(match, participantId, { pick: stance }),
    updatedAt: now
  };
  return areBothPicksIn(picked) ? resolveRound(picked, roll, now) : picked;
}

/**
 * Rolls the round and applies its result.
 * A tie is recorded without scoring and sends both duelists back to re-pick from the same declarations.
 * A decided round scores, remembers each pick for the no-repeat rule, clears round modifiers and either
 * starts the next round or completes the match.
 */
export function resolveRound(match: MatchState, roll: DieRoller = defaultDieRoller, now: number = nowMs()): MatchState {
  ensureStep(match, "PICKING", "Rounds resolve from the picking step");
  const [a, b] = match.participants;
  if (!a.pick || !b.pick) {
    throw new DuelRuleError("ILLEGAL_TRANSITION", "Both participants must pick before the round resolves");
  }

  const outcome = resolveCombat(
    {
      challenger: { participantId: a.participantId, stance: a.pick, modifiers: getActiveModifiers(match.modifiers, a.participantId) },
      opponent: { participantId: b.participantId, stance: b.pick, modifiers: getActiveModifiers(match.modifiers, b.participantId) },
      adjacencyEnabled: match.config.adjacency
    },
    roll
  );

  if (outcome.tie) {
    const result: RoundResult = {
      ...outcome,
      roundNumber: match.roundNumber,
      attempt: match.attempt,
      scores: scoreSnapshot(match.participants)
    };
    return {
      ...match,
      participants: [{ ...a, pick: null }, { ...b, pick: null }],
      history: [...match.history, result],
      attempt: match.attempt + 1,
      updatedAt: now
    };
  }

  const settle = (participant: Participant, stance: Stance): Participant => ({
    ...resetRound(participant),
    roundWins: participant.participantId === outcome.winnerId ? participant.roundWins + 1 : participant.roundWins,
    lastStance: stance
  });
  const participants: MatchState["participants"] = [settle(a, a.pick), settle(b, b.pick)];
  const result: RoundResult = {
    ...outcome,
    roundNumber: match.roundNumber,
    attempt: match.attempt,
    scores: scoreSnapshot(participants)
  };

  const baseState: MatchState = {
    ...match,
    participants,
    history: [...match.history, result],
    modifiers: clearRoundModifiers(match.modifiers),
    attempt: 1,
    updatedAt: now
  };

  const winnerId = checkWin(baseState);
  if (winnerId !== null) {
    return { ...baseState, phase: "COMPLETED", step: null, winnerId, modifiers: {} };
  }
  return { ...baseState, step: "DECLARING", roundNumber: match.roundNumber + 1 };
}

/**
 * Moderator action: sets a round- or match-scoped modifier for one duelist.
 * Only valid once both declarations are in for the current round.
 */
export function setModifier(
  match: MatchState,
  participantId: string,
  scope: ModifierScope,
  value: number,
  now: number = nowMs()
): MatchState {
  if (isTerminal(match)) {
    throw new DuelRuleError("ILLEGAL_TRANSITION", "This match is already over");
  }
  if (match.phase !== "ACTIVE" || match.step === "DECLARING") {
    throw new DuelRuleError("MODIFIER_TIMING", "Modifiers can only be set after both participants have declared");
  }
  assertParticipant(match, participantId);
  return { ...match, modifiers: writeModifier(match.modifiers, participantId, scope, value), updatedAt: now };
}

/**
 * Cancels or force-ends the match from any live state. In-progress round data and modifiers are dropped,
 * resolved rounds stay in history. Cancelling a finished match changes nothing.
 */
export function cancelMatch(match: MatchState, cancelledBy: string | null = null, now: number = nowMs()): MatchState {
  if (isTerminal(match)) return match;
  const [a, b] = match.participants;
  return {
    ...match,
    participants: [resetRound(a), resetRound(b)],
    phase: "CANCELLED",
    step: null,
    modifiers: {},
    cancelledBy,
    updatedAt: now
  };
}

/** Participants whose input the match is currently waiting on. */
export function pendingParticipants(match: MatchState): string[] {
  if (match.phase === "PENDING_CHALLENGE") {
    return [match.participants[1].participantId];
  }
  if (match.phase !== "ACTIVE") return [];

  const waiting = match.participants.filter(p => {
    switch (match.step) {
      case "DECLARING":
        return p.declared === null;
      case "SWITCHING":
        return !p.switchSettled;
      case "PICKING":
        return p.pick === null;
      default:
        return false;
    }
  });
  return waiting.map(p => p.participantId);
}

