import type { HandData } from "../core/hand.schema";
import type { Decision, Msg } from "../core/messages";
import type { Model, SessionMode } from "../core/model";
import type { SchedulerPort } from "../core/ports";
import type { Logger } from "../lib/logger";
import { AdvisoryDriver } from "./advisory.driver";
import type { StrategyProvider } from "./advisory.driver";
import { PracticeDriver } from "./practice.driver";
import type { Rng } from "./practice.driver";
import { ReplayDriver } from "./replay.driver";

export type DecisionCallback = (decision: Decision) => void;

/**
 * Source of decisions and scripted events for one loaded hand. Implementations
 * never touch the Store; they answer through `onReady`, at most once per call.
 */
export interface SessionDriver {
  readonly mode: SessionMode;
  decide(model: Model, seat: number, onReady: DecisionCallback): void;
  scriptedEventAt(index: number): Msg | undefined;
  scriptedEventCount(): number;
  dispose(): void;
}

export type DriverOptions = {
  scheduler: SchedulerPort;
  botThinkMs: number;
  rng?: Rng;
  strategy?: StrategyProvider;
  logger?: Logger;
};

export function createSessionDriver(mode: SessionMode, hand: HandData, options: DriverOptions): SessionDriver {
  switch (mode) {
    case "REPLAY":
      return new ReplayDriver(hand, options.logger);
    case "PRACTICE":
      return new PracticeDriver(options.scheduler, {
        bigBlind: hand.bigBlind,
        thinkMs: options.botThinkMs,
        rng: options.rng,
        logger: options.logger,
      });
    case "ADVISORY":
      return new AdvisoryDriver(options.strategy ?? null, options.logger);
  }
}
