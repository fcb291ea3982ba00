import type { Decision } from "../core/messages";
import { currentBet, isHumanSeat } from "../core/model";
import type { ActionKind, Model } from "../core/model";
import type { CancelTask, SchedulerPort } from "../core/ports";
import { logger } from "../lib/logger";
import type { Logger } from "../lib/logger";
import type { DecisionCallback, SessionDriver } from "./session-driver";

export type Rng = () => number;

/** Share of decisions where a bot that may bet or raise does so. */
export const RAISE_FREQUENCY = 0.15;

/**
 * Simple bot line: take a free card, call a bet, fold otherwise, with an
 * occasional aggressive bet or raise.
 */
export function chooseBotAction(model: Model, seat: number, legal: readonly ActionKind[], bigBlind: number, rng: Rng): Decision {
  const toMatch = currentBet(model.seats);
  const aggressive = rng() < RAISE_FREQUENCY;

  if (aggressive && legal.includes("BET")) {
    return { seat, action: "BET", amount: Math.max(bigBlind, Math.round(model.pot / 2)) };
  }
  if (aggressive && legal.includes("RAISE")) {
    return { seat, action: "RAISE", amount: Math.max(toMatch * 2, toMatch + bigBlind) };
  }
  if (legal.includes("CHECK")) return { seat, action: "CHECK", amount: 0 };
  if (legal.includes("CALL")) return { seat, action: "CALL", amount: toMatch - (model.seats[seat]?.chipsInFront ?? 0) };
  if (legal.includes("FOLD")) return { seat, action: "FOLD", amount: 0 };
  return { seat, action: legal[0] ?? "FOLD", amount: 0 };
}

export type PracticeDriverOptions = {
  bigBlind: number;
  thinkMs: number;
  rng?: Rng;
  logger?: Logger;
};

/** Bots answer for every seat but the user's, after a short think. */
export class PracticeDriver implements SessionDriver {
  readonly mode = "PRACTICE" as const;
  private disposed = false;
  /** Pending think per seat; asking again for a seat replaces it. */
  private readonly thinking = new Map<number, CancelTask>();
  private readonly rng: Rng;
  private readonly log: Logger;

  constructor(private readonly scheduler: SchedulerPort, private readonly options: PracticeDriverOptions) {
    this.rng = options.rng ?? Math.random;
    this.log = options.logger ?? logger;
  }

  decide(model: Model, seat: number, onReady: DecisionCallback) {
    if (isHumanSeat(model, seat)) {
      this.log.unexpectedDriverCall("practice", "decide", seat);
      return;
    }
    const legal = model.legalActions.length > 0 ? model.legalActions : model.offeredActions;
    const decision = chooseBotAction(model, seat, legal, this.options.bigBlind, this.rng);
    this.thinking.get(seat)?.();
    const cancel = this.scheduler.schedule(this.options.thinkMs, () => {
      this.thinking.delete(seat);
      if (!this.disposed) onReady(decision);
    });
    this.thinking.set(seat, cancel);
  }

  scriptedEventAt(): undefined {
    return undefined;
  }

  scriptedEventCount(): number {
    return 0;
  }

  dispose() {
    this.disposed = true;
    for (const cancel of this.thinking.values()) cancel();
    this.thinking.clear();
  }
}
