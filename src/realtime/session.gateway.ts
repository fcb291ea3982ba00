import type { Server, Socket } from "socket.io";
import { z } from "zod";
import type { AnimationEffect } from "../core/commands";
import type { Props } from "../core/props";
import { logger } from "../lib/logger";
import { applyIntent, intentSchema, loadBodySchema } from "../services/session.intents";
import type { Session, SessionService } from "../services/session.service";

const joinSchema = z.object({ sessionId: z.string().min(1).max(64) });
const loadSchema = joinSchema.and(loadBodySchema);
const intentPayloadSchema = joinSchema.extend({ intent: intentSchema });

export type GatewayError = { ok: false; code: "INVALID_BODY" | "SESSION_NOT_FOUND" | "INVALID_HAND"; details?: unknown };
export type GatewayResult<T> = { ok: true; value: T } | GatewayError;

export function sessionRoom(sessionId: string) {
  return `room:session:${sessionId}`;
}

/** Pushes an animation cue to everyone watching the session. */
export function broadcastEffect(io: Server, sessionId: string, effect: AnimationEffect, token: number, durationMs: number) {
  io.to(sessionRoom(sessionId)).emit("session:effect", { sessionId, effect, token, durationMs });
}

/**
 * Resolves the session a payload names. Sockets only attach to sessions
 * created over HTTP; an unknown id is refused.
 */
export function findSession(sessions: SessionService, payload: unknown): GatewayResult<Session> {
  const parsed = joinSchema.safeParse(payload);
  if (!parsed.success) return { ok: false, code: "INVALID_BODY" };
  const session = sessions.get(parsed.data.sessionId);
  if (!session) return { ok: false, code: "SESSION_NOT_FOUND" };
  return { ok: true, value: session };
}

export function loadFromPayload(sessions: SessionService, payload: unknown): GatewayResult<Props> {
  const parsed = loadSchema.safeParse(payload);
  if (!parsed.success) return { ok: false, code: "INVALID_BODY" };

  const { sessionId, hand, mode, humanSeat, autoplay } = parsed.data;
  if (!sessions.get(sessionId)) return { ok: false, code: "SESSION_NOT_FOUND" };
  const result = sessions.loadHand(sessionId, hand, { mode, humanSeat, autoplay });
  if (!result.ok) return { ok: false, code: "INVALID_HAND", details: result.error };
  return { ok: true, value: result.props };
}

export function intentFromPayload(sessions: SessionService, payload: unknown): GatewayResult<Session> {
  const parsed = intentPayloadSchema.safeParse(payload);
  if (!parsed.success) return { ok: false, code: "INVALID_BODY" };

  const session = sessions.get(parsed.data.sessionId);
  if (!session) return { ok: false, code: "SESSION_NOT_FOUND" };
  applyIntent(session, parsed.data.intent);
  return { ok: true, value: session };
}

export function registerSessionGateway(socket: Socket, sessions: SessionService) {
  // One props subscription per joined session, dropped on leave/disconnect.
  const subscriptions = new Map<string, () => void>();

  function fail(error: GatewayError) {
    socket.emit("session:event", { type: "ERROR", code: error.code, details: error.details });
  }

  function leave(sessionId: string) {
    subscriptions.get(sessionId)?.();
    subscriptions.delete(sessionId);
    void socket.leave(sessionRoom(sessionId));
  }

  socket.on("session:join", (payload: unknown) => {
    const found = findSession(sessions, payload);
    if (!found.ok) return fail(found);
    const session = found.value;
    if (subscriptions.has(session.id)) return;

    void socket.join(sessionRoom(session.id));
    subscriptions.set(
      session.id,
      session.onProps((props) => socket.emit("session:props", { sessionId: session.id, props }))
    );
    logger.info("Socket joined session", { event: "session_join", sessionId: session.id, socketId: socket.id });
  });

  socket.on("session:leave", (payload: unknown) => {
    const parsed = joinSchema.safeParse(payload);
    if (parsed.success) leave(parsed.data.sessionId);
  });

  socket.on("session:load", (payload: unknown) => {
    const result = loadFromPayload(sessions, payload);
    if (!result.ok) fail(result);
  });

  socket.on("session:intent", (payload: unknown) => {
    const result = intentFromPayload(sessions, payload);
    if (!result.ok) fail(result);
  });

  socket.on("disconnect", () => {
    for (const sessionId of Array.from(subscriptions.keys())) leave(sessionId);
  });
}
