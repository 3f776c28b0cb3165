import { MatchState } from "./types";
import { winThreshold } from "./utils";

/**
 * Computes the match winner (if any) for the supplied state.
 * - An already recorded winner stands.
 * - A cancelled match never has a winner.
 * - Otherwise the first participant at ceil(bestOf/2) round wins takes it.
 */
export function checkWin(state: MatchState): string | null {
  if (state.winnerId !== null) return state.winnerId;
  if (state.phase === "CANCELLED") return null;

  const threshold = winThreshold(state.config.bestOf);
  const leader = state.participants.find(p => p.roundWins >= threshold);
  return leader ? leader.participantId : null;
}
