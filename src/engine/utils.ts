/** Utility helpers shared across engine modules. */
import { MatchState, Participant } from "./types";

export type RandomFn = () => number;

/** Source of independent d6 results, integers in [1, 6]. */
export type DieRoller = () => number;

export const DIE_FACES = 6;

/** Default RNG, override in tests for determinism. */
export const defaultRandom: RandomFn = () => Math.random();

/** Wall-clock helper for transitions. */
export const nowMs = () => Date.now();

/** Turns a [0, 1) RNG into a d6. */
export function createDieRoller(random: RandomFn = defaultRandom): DieRoller {
  return () => Math.floor(random() * DIE_FACES) + 1;
}

export const defaultDieRoller: DieRoller = createDieRoller();

export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/** Round wins needed to take a best-of-N match: ceil(N/2). */
export function winThreshold(bestOf: number): number {
  return Math.ceil(bestOf / 2);
}

/** Safe participant lookup, null when missing. */
export function getParticipant(match: MatchState, participantId: string): Participant | null {
  return match.participants.find(p => p.participantId === participantId) ?? null;
}

export function isTerminal(match: MatchState): boolean {
  return match.phase === "COMPLETED" || match.phase === "CANCELLED";
}
