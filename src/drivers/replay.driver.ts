import type { HandData } from "../core/hand.schema";
import type { Msg } from "../core/messages";
import type { Model } from "../core/model";
import { buildReplayScript } from "../core/replay.script";
import { logger } from "../lib/logger";
import type { Logger } from "../lib/logger";
import type { DecisionCallback, SessionDriver } from "./session-driver";

/** Plays a recorded hand back one scripted message at a time. */
export class ReplayDriver implements SessionDriver {
  readonly mode = "REPLAY" as const;
  private readonly script: readonly Msg[];

  constructor(hand: HandData, private readonly log: Logger = logger) {
    this.script = buildReplayScript(hand);
  }

  decide(_model: Model, seat: number, _onReady: DecisionCallback) {
    // Decisions come from the script; nobody should be asked.
    this.log.unexpectedDriverCall("replay", "decide", seat);
  }

  scriptedEventAt(index: number): Msg | undefined {
    if (!Number.isInteger(index) || index < 0) return undefined;
    return this.script[index];
  }

  scriptedEventCount(): number {
    return this.script.length;
  }

  dispose() {}
}
