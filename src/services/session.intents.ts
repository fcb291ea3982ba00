import { z } from "zod";
import { ACTION_KINDS } from "../core/model";
import type { Session } from "./session.service";

/** User intents accepted from HTTP and socket clients alike. */
export const intentSchema = z.discriminatedUnion("type", [
  z.object({ type: z.literal("advance") }),
  z.object({ type: z.literal("autoplay"), on: z.boolean() }),
  z.object({ type: z.literal("stepDelay"), ms: z.number().int().min(0).max(60_000) }),
  z.object({ type: z.literal("choose"), action: z.enum(ACTION_KINDS), amount: z.number().int().min(0).default(0) }),
  z.object({ type: z.literal("seek"), index: z.number().int().min(0) }),
  z.object({ type: z.literal("pause"), paused: z.boolean() }),
  z.object({ type: z.literal("theme"), themeId: z.string().min(1).max(64) }),
  z.object({ type: z.literal("reset") }),
]);

export type Intent = z.infer<typeof intentSchema>;

export function applyIntent(session: Session, intent: Intent) {
  switch (intent.type) {
    case "advance":
      return session.advance();
    case "autoplay":
      return session.toggleAutoplay(intent.on);
    case "stepDelay":
      return session.setStepDelay(intent.ms);
    case "choose":
      return session.choose(intent.action, intent.amount);
    case "seek":
      return session.seek(intent.index);
    case "pause":
      return session.pause(intent.paused);
    case "theme":
      return session.changeTheme(intent.themeId);
    case "reset":
      return session.reset();
  }
}

export const loadBodySchema = z.object({
  mode: z.enum(["PRACTICE", "ADVISORY", "REPLAY"]),
  humanSeat: z.number().int().min(0).nullable().optional(),
  autoplay: z.boolean().optional(),
  hand: z.unknown(),
});

