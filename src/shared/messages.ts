import { getActiveModifiers } from "../engine/modifiers";
import { pendingParticipants } from "../engine/transitions";
import {
  ActiveModifiers,
  MatchConfig,
  MatchPhase,
  MatchState,
  ModifierScope,
  Participant,
  RoundResult,
  RoundStep,
  Stance
} from "../engine/types";
import { getParticipant, winThreshold } from "../engine/utils";

/** Options a challenger may set; anything omitted falls back to the defaults. */
export interface ChallengeOptions {
  bestOf?: number;
  noRepeat?: boolean;
  adjacency?: boolean;
  baitSwitch?: boolean;
}

/**
 * All actions that a client may issue over the WebSocket channel.
 * A socket binds to one context via CHALLENGE or JOIN; every later action acts as that identity.
 * Seats are claimed with the server-issued seat token, never by naming a participant id.
 */
export type ClientMessage =
  /** Open a challenge in a context and bind the socket as the challenger. */
  | {
      type: "CHALLENGE";
      payload: {
        contextKey: string;
        participantId: string;
        name: string;
        opponentId: string;
        opponentName: string;
        options?: ChallengeOptions;
      };
    }
  /**
   * Bind to an existing context. A seat token binds as that duelist, a moderator token adds
   * moderator rights, and neither means observing.
   */
  | { type: "JOIN"; payload: { contextKey: string; seatToken?: string; moderatorToken?: string } }
  /** Challenged participant accepts and round 1 begins. */
  | { type: "ACCEPT" }
  /** Declare two stances for the current round. */
  | { type: "DECLARE"; payload: { stances: string[] } }
  /** Bait & switch: swap one declared stance for another. */
  | { type: "SWITCH"; payload: { oldStance: string; newStance: string } }
  /** Bait & switch: go on to picking without switching. */
  | { type: "PASS_SWITCH" }
  /** Secretly commit to one declared stance. */
  | { type: "PICK"; payload: { stance: string } }
  /** Moderator-only round/match modifier for a participant. */
  | { type: "SET_MODIFIER"; payload: { targetId: string; scope: ModifierScope; value: number } }
  /** Ask for a fresh view of the bound match. */
  | { type: "STATUS" }
  /** Participant withdraws or abandons the match. */
  | { type: "CANCEL" }
  /** Moderator-only termination. */
  | { type: "FORCE_END" };

export type ClientMessageType = ClientMessage["type"];

/** Public info exposed to every viewer, with in-progress secrets stripped. */
export interface ParticipantView {
  participantId: string;
  name: string;
  roundWins: number;
  lastStance: Stance | null;
  /** Null until both participants have declared, so neither sees the other's pair early. */
  declared: [Stance, Stance] | null;
  hasDeclared: boolean;
  hasSwitched: boolean;
  hasPicked: boolean;
  modifiers: ActiveModifiers;
}

/** A participant's own view adds their uncommitted secrets. */
export interface SelfView extends ParticipantView {
  pick: Stance | null;
}

/** Read-only match snapshot tailored for one viewer (or nobody in particular). */
export interface MatchStatus {
  contextKey: string;
  phase: MatchPhase;
  step: RoundStep | null;
  roundNumber: number;
  attempt: number;
  config: MatchConfig;
  winThreshold: number;
  scores: Record<string, number>;
  pending: string[];
  participants: ParticipantView[];
  lastResult: RoundResult | null;
  history: RoundResult[];
  winnerId: string | null;
  cancelledBy: string | null;
  you: SelfView | null;
}

function toParticipantView(match: MatchState, participant: Participant, revealDeclared: boolean): ParticipantView {
  return {
    participantId: participant.participantId,
    name: participant.name,
    roundWins: participant.roundWins,
    lastStance: participant.lastStance,
    declared: revealDeclared && participant.declared ? [...participant.declared] : null,
    hasDeclared: participant.declared !== null,
    hasSwitched: participant.hasSwitched,
    hasPicked: participant.pick !== null,
    modifiers: getActiveModifiers(match.modifiers, participant.participantId)
  };
}

/**
 * Builds a status snapshot. Picks never appear for anyone but their owner, and declarations stay hidden
 * from everyone but their owner until both pairs are in. Unknown viewers get the observer view.
 */
export function buildMatchStatus(match: MatchState, viewerId?: string): MatchStatus {
  const declarationsRevealed = match.step !== "DECLARING";
  const viewer = viewerId === undefined ? null : getParticipant(match, viewerId);

  const participants = match.participants.map(p => toParticipantView(match, p, declarationsRevealed));
  const you: SelfView | null = viewer
    ? { ...toParticipantView(match, viewer, true), pick: viewer.pick }
    : null;

  return {
    contextKey: match.contextKey,
    phase: match.phase,
    step: match.step,
    roundNumber: match.roundNumber,
    attempt: match.attempt,
    config: { ...match.config },
    winThreshold: winThreshold(match.config.bestOf),
    scores: Object.fromEntries(match.participants.map(p => [p.participantId, p.roundWins])),
    pending: pendingParticipants(match),
    participants,
    lastResult: match.history.length > 0 ? match.history[match.history.length - 1] : null,
    history: [...match.history],
    winnerId: match.winnerId,
    cancelledBy: match.cancelledBy,
    you
  };
}

/**
 * Messages emitted by the server. State-bearing payloads always carry a per-viewer MatchStatus.
 */
export type ServerMessage =
  | { type: "ERROR"; payload: { code: string; message: string } }
  | {
      type: "BOUND";
      payload: {
        contextKey: string;
        participantId: string | null;
        moderatorId: string | null;
        /** The bound seat's token, for reconnecting; null for observers. */
        seatToken: string | null;
        status: MatchStatus;
      };
    }
  /** Sent to the challenger only: the opponent's seat token, to pass on out of band. */
  | { type: "SEAT_INVITE"; payload: { contextKey: string; participantId: string; seatToken: string } }
  | { type: "MATCH_STATE"; payload: { status: MatchStatus } }
  | { type: "PICK_RECEIVED"; payload: { contextKey: string; stance: Stance } }
  | { type: "ROUND_RESULT"; payload: { contextKey: string; result: RoundResult } }
  | { type: "MATCH_CLOSED"; payload: { contextKey: string; phase: MatchPhase; winnerId: string | null } };
