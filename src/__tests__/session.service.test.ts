import { describe, expect, it, vi } from "vitest";
import type { AnimationEffect } from "../core/commands";
import type { Props } from "../core/props";
import { findSession, intentFromPayload, loadFromPayload, sessionRoom } from "../realtime/session.gateway";
import { InMemoryEventBus, eventChannel } from "../services/event-bus.service";
import { applyIntent, intentSchema } from "../services/session.intents";
import { SessionService } from "../services/session.service";
import { HAND_INPUT, ManualScheduler, flushAsync, quietLogger } from "./helpers";

const CONFIG = {
  stepDelayMs: 500,
  botThinkMs: 100,
  animationMs: 10,
  bannerTtlMs: 2000,
  defaultThemeId: "forest-green-pro",
};

function makeService() {
  const schedulers: ManualScheduler[] = [];
  const events = new InMemoryEventBus();
  const effects: Array<{ sessionId: string; effect: AnimationEffect; token: number; durationMs: number }> = [];
  const sessions = new SessionService({
    config: CONFIG,
    audio: { play: async () => undefined, speak: async () => undefined },
    events,
    evaluate: async () => 1,
    rng: () => 0.9,
    createScheduler: () => {
      const scheduler = new ManualScheduler();
      schedulers.push(scheduler);
      return scheduler;
    },
    onEffect: (sessionId, effect, token, durationMs) => effects.push({ sessionId, effect, token, durationMs }),
    logger: quietLogger,
  });
  return { sessions, events, effects, schedulers };
}

describe("SessionService", () => {
  it("creates sessions with the configured defaults", () => {
    const { sessions } = makeService();
    const session = sessions.create("s1");
    expect(sessions.create("s1")).toBe(session);
    expect(sessions.size).toBe(1);
    expect(session.model().stepDelayMs).toBe(500);
    expect(session.model().bannerTtlMs).toBe(2000);
    expect(session.props().handId).toBe("");
  });

  it("rejects an invalid hand without touching the session", () => {
    const { sessions } = makeService();
    const result = sessions.loadHand("s1", { handId: "" }, { mode: "REPLAY" });
    expect(result.ok).toBe(false);
    expect(sessions.get("s1")).toBeUndefined();
  });

  it("loads a replay and publishes it", async () => {
    const { sessions, events } = makeService();
    const loaded = vi.fn();
    events.on("hand.loaded", loaded);

    const result = sessions.loadHand("s1", HAND_INPUT, { mode: "REPLAY" });
    await flushAsync();

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.props.handId).toBe("h-1");
    expect(result.props.reviewLength).toBe(8);
    expect(loaded).toHaveBeenCalledWith({ handId: "h-1", mode: "REPLAY", seats: 3 });
  });

  it("streams Props only when they change", async () => {
    const { sessions, effects, schedulers } = makeService();
    sessions.loadHand("s1", HAND_INPUT, { mode: "REPLAY" });
    await flushAsync();
    const session = sessions.get("s1");
    if (!session) throw new Error("session missing");

    const frames: Props[] = [];
    session.onProps((props) => frames.push(props));
    session.changeTheme("forest-green-pro");
    expect(frames).toHaveLength(1);

    session.advance();
    await flushAsync();
    schedulers[0].advance(10);
    await flushAsync();

    expect(effects[0]).toEqual({
      sessionId: "s1",
      effect: { kind: "ACTION", seat: 2, action: "FOLD", amount: 0 },
      token: 2,
      durationMs: 10,
    });
    expect(frames[frames.length - 1].reviewCursor).toBe(1);
    expect(frames[frames.length - 1].lastAction).toEqual({ seat: 2, kind: "FOLD", amount: 0, street: "PREFLOP" });
  });

  it("lets bots act and hands the turn to the user in practice", async () => {
    const { sessions, schedulers } = makeService();
    sessions.loadHand("s1", HAND_INPUT, { mode: "PRACTICE", humanSeat: 0 });
    await flushAsync();
    const session = sessions.get("s1");
    if (!session) throw new Error("session missing");

    session.advance();
    expect(session.props().waitingFor).toBe("BOT_DECISION");

    schedulers[0].advance(100);
    await flushAsync();
    schedulers[0].advance(10);
    await flushAsync();

    const props = session.props();
    expect(props.lastAction).toEqual({ seat: 2, kind: "CALL", amount: 2, street: "PREFLOP" });
    expect(props.waitingFor).toBe("HUMAN_DECISION");
    expect(props.toActSeat).toBe(0);
    expect(props.legalActions).toEqual(["FOLD", "CALL", "RAISE", "ALL_IN"]);
    expect(props.pot).toBe(5);

    session.choose("CALL", 1);
    expect(session.props().lastAction).toEqual({ seat: 0, kind: "CALL", amount: 1, street: "PREFLOP" });
  });

  it("disposes a session and its timers", async () => {
    const { sessions, schedulers } = makeService();
    sessions.loadHand("s1", HAND_INPUT, { mode: "REPLAY", autoplay: true });
    await flushAsync();
    expect(schedulers[0].pending).toBe(1);

    expect(await sessions.dispose("s1")).toBe(true);
    expect(schedulers[0].pending).toBe(0);
    expect(sessions.get("s1")).toBeUndefined();
    expect(await sessions.dispose("s1")).toBe(false);
  });
});

describe("intents", () => {
  it("validates intent payloads", () => {
    expect(intentSchema.safeParse({ type: "seek", index: -1 }).success).toBe(false);
    expect(intentSchema.safeParse({ type: "choose", action: "SHOVE" }).success).toBe(false);
    expect(intentSchema.parse({ type: "choose", action: "CALL" })).toEqual({ type: "choose", action: "CALL", amount: 0 });
  });

  it("routes an intent to the session", () => {
    const { sessions } = makeService();
    const session = sessions.create("s1");
    applyIntent(session, intentSchema.parse({ type: "theme", themeId: "midnight" }));
    applyIntent(session, intentSchema.parse({ type: "stepDelay", ms: 750 }));
    expect(session.props().themeId).toBe("midnight");
    expect(session.model().stepDelayMs).toBe(750);
  });
});

describe("socket payloads", () => {
  it("refuses to join or load a session that was never created", () => {
    const { sessions } = makeService();
    expect(findSession(sessions, { sessionId: "ghost" })).toEqual({ ok: false, code: "SESSION_NOT_FOUND" });
    expect(loadFromPayload(sessions, { sessionId: "ghost", mode: "REPLAY", hand: HAND_INPUT })).toEqual({
      ok: false,
      code: "SESSION_NOT_FOUND",
    });
    expect(intentFromPayload(sessions, { sessionId: "ghost", intent: { type: "advance" } })).toEqual({
      ok: false,
      code: "SESSION_NOT_FOUND",
    });
    expect(sessions.size).toBe(0);
  });

  it("loads into a session that exists", () => {
    const { sessions } = makeService();
    const session = sessions.create("s1");
    const result = loadFromPayload(sessions, { sessionId: "s1", mode: "REPLAY", hand: HAND_INPUT });
    expect(result.ok).toBe(true);
    expect(session.props().handId).toBe("h-1");
    expect(findSession(sessions, { sessionId: "s1" })).toEqual({ ok: true, value: session });
  });

  it("reports a malformed payload or hand", () => {
    const { sessions } = makeService();
    sessions.create("s1");
    expect(findSession(sessions, {})).toEqual({ ok: false, code: "INVALID_BODY" });
    const result = loadFromPayload(sessions, { sessionId: "s1", mode: "REPLAY", hand: { handId: "" } });
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.code).toBe("INVALID_HAND");
  });

  it("keeps socket rooms apart from event channels", () => {
    expect(sessionRoom("s1")).toBe("room:session:s1");
    expect(eventChannel("hand.loaded")).toBe("session-events:hand.loaded");
  });
});
