import { randomUUID } from "crypto";
import http from "http";
import { WebSocketServer, WebSocket } from "ws";
import { ClientMessage, ServerMessage, buildMatchStatus } from "../shared/messages";
import { DuelRuleError, MatchState, ModifierScope } from "../engine/types";
import { parseStance } from "../engine/stances";
import * as transitions from "../engine/transitions";
import { DieRoller, defaultDieRoller, isTerminal } from "../engine/utils";
import { parseClientMessage } from "./protocol";
import { ModeratorRoster } from "./settings";
import { MatchStore } from "./store";
import { ExpiryLimits, ExpiryTimer } from "./timers";

/** The part of a socket the gateway writes to. */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
}

interface ConnectionContext {
  contextKey: string;
  /** Seat this socket holds; null for observers. */
  participantId: string | null;
  moderatorId: string | null;
}

interface SeatedContext extends ConnectionContext {
  participantId: string;
}

export interface GatewayOptions {
  moderators: ModeratorRoster;
  limits: ExpiryLimits;
  roll?: DieRoller;
  /** Seat token source; defaults to random UUIDs. */
  mintToken?: () => string;
}

/**
 * WebSocket gateway standing in for the chat-platform binding. It is responsible for:
 * - binding sockets to a context, with seats claimed only through server-issued tokens,
 * - routing client messages into engine transitions through the store,
 * - broadcasting per-viewer match views and round results, and
 * - expiring idle challenges and abandoned matches.
 */
export class DuelGateway {
  private contexts = new Map<ClientSocket, ConnectionContext>();
  private rooms = new Map<string, Set<ClientSocket>>();
  /** contextKey → seat token → participantId */
  private seats = new Map<string, Map<string, string>>();
  private timers: ExpiryTimer;
  private moderators: ModeratorRoster;
  private roll: DieRoller;
  private mintToken: () => string;
  private wss: WebSocketServer | null = null;

  constructor(private store: MatchStore, options: GatewayOptions) {
    this.moderators = options.moderators;
    this.roll = options.roll ?? defaultDieRoller;
    this.mintToken = options.mintToken ?? randomUUID;
    this.timers = new ExpiryTimer(options.limits, contextKey => this.onExpire(contextKey));
  }

  /** Binds the gateway to an HTTP server and starts accepting connections. */
  attach(server: http.Server): void {
    const wss = new WebSocketServer({ server });
    wss.on("connection", socket => {
      socket.on("message", data => this.handleMessage(socket, data.toString()));
      socket.on("close", () => this.detach(socket));
      socket.on("error", err => console.error("WebSocket error", err));
    });
    this.wss = wss;
  }

  /** Stops timers and closes every socket. */
  close(): void {
    this.timers.clearAll();
    this.wss?.close();
    this.wss = null;
  }

  /** Parses an incoming frame and dispatches the typed client message. */
  handleMessage(socket: ClientSocket, raw: string): void {
    try {
      const message = parseClientMessage(raw);
      this.handleClientMessage(socket, message);
    } catch (err) {
      if (err instanceof SyntaxError) {
        this.sendError(socket, "BAD_JSON", "Invalid JSON payload");
      } else if (err instanceof DuelRuleError) {
        this.sendError(socket, err.code, err.message);
      } else {
        console.error("Unexpected message error", err);
        this.sendError(socket, "SERVER_ERROR", "Unexpected error");
      }
    }
  }

  private handleClientMessage(socket: ClientSocket, msg: ClientMessage): void {
    switch (msg.type) {
      case "CHALLENGE":
        this.handleChallenge(socket, msg.payload);
        break;
      case "JOIN":
        this.handleJoin(socket, msg.payload);
        break;
      case "ACCEPT":
        this.act(socket, (match, ctx) => transitions.acceptChallenge(match, ctx.participantId));
        break;
      case "DECLARE": {
        const stances = msg.payload.stances.map(parseStance);
        this.act(socket, (match, ctx) => transitions.declareStances(match, ctx.participantId, stances));
        break;
      }
      case "SWITCH": {
        const oldStance = parseStance(msg.payload.oldStance);
        const newStance = parseStance(msg.payload.newStance);
        this.act(socket, (match, ctx) => transitions.switchStance(match, ctx.participantId, oldStance, newStance));
        break;
      }
      case "PASS_SWITCH":
        this.act(socket, (match, ctx) => transitions.passSwitch(match, ctx.participantId));
        break;
      case "PICK":
        this.handlePick(socket, msg.payload.stance);
        break;
      case "SET_MODIFIER":
        this.handleSetModifier(socket, msg.payload);
        break;
      case "STATUS": {
        const ctx = this.requireContext(socket);
        const match = this.store.require(ctx.contextKey);
        this.send(socket, { type: "MATCH_STATE", payload: { status: this.statusFor(match, ctx) } });
        break;
      }
      case "CANCEL":
        this.act(socket, (match, ctx) => transitions.cancelMatch(match, ctx.participantId));
        break;
      case "FORCE_END": {
        const ctx = this.requireContext(socket);
        const moderatorId = this.requireModerator(ctx);
        this.update(ctx.contextKey, match => transitions.cancelMatch(match, moderatorId));
        console.log(`Match in ${ctx.contextKey} force-ended by ${moderatorId}`);
        break;
      }
      default: {
        const exhaustive: never = msg;
        throw new DuelRuleError("BAD_MESSAGE", `Unhandled message ${JSON.stringify(exhaustive)}`);
      }
    }
  }

  /** Ensures the socket previously bound to a context. */
  private requireContext(socket: ClientSocket): ConnectionContext {
    const ctx = this.contexts.get(socket);
    if (!ctx) {
      throw new DuelRuleError("NOT_BOUND", "Socket is not bound to a match");
    }
    return ctx;
  }

  /** Ensures the socket holds one of the two seats. */
  private requireSeat(socket: ClientSocket): SeatedContext {
    const ctx = this.requireContext(socket);
    const participantId = ctx.participantId;
    if (participantId === null) {
      throw new DuelRuleError("NOT_AUTHORIZED", "Only match participants can do that");
    }
    return { ...ctx, participantId };
  }

  private requireModerator(ctx: ConnectionContext): string {
    if (ctx.moderatorId === null) {
      throw new DuelRuleError("NOT_AUTHORIZED", "Only moderators can do that");
    }
    return ctx.moderatorId;
  }

  private statusFor(match: MatchState, ctx: ConnectionContext) {
    return buildMatchStatus(match, ctx.participantId ?? undefined);
  }

  /** Runs one seated participant's transition against their match and broadcasts the result. */
  private act(socket: ClientSocket, transition: (match: MatchState, ctx: SeatedContext) => MatchState): MatchState {
    const ctx = this.requireSeat(socket);
    return this.update(ctx.contextKey, current => transition(current, ctx));
  }

  private update(contextKey: string, transition: (match: MatchState) => MatchState): MatchState {
    const updated = this.store.withMatch(contextKey, transition);
    this.broadcastState(updated);
    return updated;
  }

  /** Adds a socket to the per-context room and stores its identity. */
  private attachSocket(socket: ClientSocket, ctx: ConnectionContext): void {
    this.contexts.set(socket, ctx);
    const room = this.rooms.get(ctx.contextKey) ?? new Set<ClientSocket>();
    room.add(socket);
    this.rooms.set(ctx.contextKey, room);
  }

  private detach(socket: ClientSocket): void {
    const ctx = this.contexts.get(socket);
    if (!ctx) return;

    this.contexts.delete(socket);
    const room = this.rooms.get(ctx.contextKey);
    if (room) {
      room.delete(socket);
      if (room.size === 0) {
        this.rooms.delete(ctx.contextKey);
      }
    }
  }

  private send(socket: ClientSocket, message: ServerMessage): void {
    if (socket.readyState !== WebSocket.OPEN) return;
    socket.send(JSON.stringify(message));
  }

  private sendError(socket: ClientSocket, code: string, message: string): void {
    this.send(socket, { type: "ERROR", payload: { code, message } });
  }

  private broadcast(contextKey: string, message: ServerMessage): void {
    const room = this.rooms.get(contextKey);
    if (!room) return;
    for (const socket of room) {
      this.send(socket, message);
    }
  }

  /**
   * Fans out the latest state with one view per socket, re-arms the expiry timer, and retires
   * finished matches once everyone has seen the final state.
   */
  private broadcastState(match: MatchState): void {
    this.timers.schedule(match);

    const room = this.rooms.get(match.contextKey);
    if (room) {
      for (const socket of room) {
        const ctx = this.contexts.get(socket);
        if (!ctx) continue;
        this.send(socket, { type: "MATCH_STATE", payload: { status: this.statusFor(match, ctx) } });
      }
    }

    if (isTerminal(match)) {
      this.closeMatch(match);
    }
  }

  private closeMatch(match: MatchState): void {
    this.broadcast(match.contextKey, {
      type: "MATCH_CLOSED",
      payload: { contextKey: match.contextKey, phase: match.phase, winnerId: match.winnerId }
    });
    this.timers.clear(match.contextKey);
    this.store.delete(match.contextKey);
    this.seats.delete(match.contextKey);

    const room = this.rooms.get(match.contextKey);
    if (room) {
      for (const socket of room) {
        this.contexts.delete(socket);
      }
      this.rooms.delete(match.contextKey);
    }
  }

  /** Called by the expiry timer when a challenge or match sat idle too long. */
  private onExpire(contextKey: string): void {
    const match = this.store.get(contextKey);
    if (!match || isTerminal(match)) return;

    try {
      const cancelled = this.store.withMatch(contextKey, current => transitions.cancelMatch(current));
      console.log(`Match in ${contextKey} expired during ${match.phase}`);
      this.broadcastState(cancelled);
    } catch (err) {
      console.error("Expiry error", err);
    }
  }

  private sendBound(socket: ClientSocket, match: MatchState, ctx: ConnectionContext, seatToken: string | null): void {
    this.send(socket, {
      type: "BOUND",
      payload: {
        contextKey: ctx.contextKey,
        participantId: ctx.participantId,
        moderatorId: ctx.moderatorId,
        seatToken,
        status: this.statusFor(match, ctx)
      }
    });
  }

  /**
   * CHALLENGE → opens a pending match, mints a seat token for each duelist and binds the socket
   * to the challenger's seat. The opponent's token goes back to the challenger only.
   */
  private handleChallenge(socket: ClientSocket, payload: Extract<ClientMessage, { type: "CHALLENGE" }>["payload"]): void {
    if (this.contexts.has(socket)) {
      throw new DuelRuleError("ALREADY_BOUND", "Socket already bound to a match");
    }

    const match = transitions.createChallenge(
      payload.contextKey,
      { participantId: payload.participantId, name: payload.name },
      { participantId: payload.opponentId, name: payload.opponentName },
      payload.options
    );
    this.store.create(match);

    const challengerToken = this.mintToken();
    const opponentToken = this.mintToken();
    this.seats.set(
      match.contextKey,
      new Map([
        [challengerToken, payload.participantId],
        [opponentToken, payload.opponentId]
      ])
    );

    const ctx: ConnectionContext = { contextKey: match.contextKey, participantId: payload.participantId, moderatorId: null };
    this.attachSocket(socket, ctx);
    console.log(`${payload.participantId} challenged ${payload.opponentId} in ${match.contextKey}`);

    this.sendBound(socket, match, ctx, challengerToken);
    this.send(socket, {
      type: "SEAT_INVITE",
      payload: { contextKey: match.contextKey, participantId: payload.opponentId, seatToken: opponentToken }
    });
    this.broadcastState(match);
  }

  /**
   * JOIN → subscribes the socket to a context. The seat comes from the seat token alone;
   * moderator rights from a token in the roster. Without either the socket observes.
   */
  private handleJoin(
    socket: ClientSocket,
    payload: { contextKey: string; seatToken?: string; moderatorToken?: string }
  ): void {
    if (this.contexts.has(socket)) {
      throw new DuelRuleError("ALREADY_BOUND", "Socket already bound to a match");
    }
    const match = this.store.require(payload.contextKey);

    let participantId: string | null = null;
    if (payload.seatToken !== undefined) {
      participantId = this.seats.get(payload.contextKey)?.get(payload.seatToken) ?? null;
      if (participantId === null) {
        throw new DuelRuleError("NOT_AUTHORIZED", "Unknown seat token");
      }
    }
    let moderatorId: string | null = null;
    if (payload.moderatorToken !== undefined) {
      moderatorId = this.moderators.authenticate(payload.moderatorToken);
      if (moderatorId === null) {
        throw new DuelRuleError("NOT_AUTHORIZED", "Unknown moderator token");
      }
    }

    const ctx: ConnectionContext = { contextKey: payload.contextKey, participantId, moderatorId };
    this.attachSocket(socket, ctx);
    this.sendBound(socket, match, ctx, participantId === null ? null : payload.seatToken ?? null);
  }

  /**
   * PICK → records the secret pick. Only the picker is told which stance was received; everyone else
   * just sees that a pick is in. The pick that completes the pair resolves the round inside the same
   * store update, and the result goes out to the whole room.
   */
  private handlePick(socket: ClientSocket, rawStance: string): void {
    const stance = parseStance(rawStance);
    const ctx = this.requireSeat(socket);
    const before = this.store.require(ctx.contextKey);

    const updated = this.store.withMatch(ctx.contextKey, current =>
      transitions.pickStance(current, ctx.participantId, stance, this.roll)
    );
    this.send(socket, { type: "PICK_RECEIVED", payload: { contextKey: ctx.contextKey, stance } });

    if (updated.history.length > before.history.length) {
      const result = updated.history[updated.history.length - 1];
      this.broadcast(ctx.contextKey, { type: "ROUND_RESULT", payload: { contextKey: ctx.contextKey, result } });
    }
    this.broadcastState(updated);
  }

  /** SET_MODIFIER → moderator-only adjustment of a participant's roll. */
  private handleSetModifier(socket: ClientSocket, payload: { targetId: string; scope: ModifierScope; value: number }): void {
    const ctx = this.requireContext(socket);
    this.requireModerator(ctx);
    this.update(ctx.contextKey, match => transitions.setModifier(match, payload.targetId, payload.scope, payload.value));
  }
}
