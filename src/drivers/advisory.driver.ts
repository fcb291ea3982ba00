import type { Decision } from "../core/messages";
import type { ActionKind, Model } from "../core/model";
import { logger } from "../lib/logger";
import type { Logger } from "../lib/logger";
import type { DecisionCallback, SessionDriver } from "./session-driver";

/** Produces a recommended line for a seat; null when it has nothing to say. */
export interface StrategyProvider {
  suggest(model: Model, seat: number): Promise<Decision | null>;
}

export function fallbackDecision(seat: number, legal: readonly ActionKind[]): Decision {
  const action: ActionKind = legal.includes("CHECK") ? "CHECK" : "FOLD";
  return { seat, action, amount: 0, frequency: 1, rationale: "No strategy available" };
}

/**
 * Asks the strategy provider for every decision. For the user's seat the answer
 * becomes a hint; for the other seats it is played.
 */
export class AdvisoryDriver implements SessionDriver {
  readonly mode = "ADVISORY" as const;
  private disposed = false;

  constructor(private readonly strategy: StrategyProvider | null, private readonly log: Logger = logger) {}

  decide(model: Model, seat: number, onReady: DecisionCallback) {
    const legal = model.legalActions.length > 0 ? model.legalActions : model.offeredActions;
    void (async () => {
      const decision = (await this.suggest(model, seat, legal)) ?? fallbackDecision(seat, legal);
      if (!this.disposed) onReady(decision);
    })();
  }

  private async suggest(model: Model, seat: number, legal: readonly ActionKind[]): Promise<Decision | null> {
    if (!this.strategy) return null;
    try {
      const suggestion = await this.strategy.suggest(model, seat);
      if (!suggestion) return null;
      if (suggestion.seat !== seat || !legal.includes(suggestion.action)) {
        this.log.warn("Strategy suggested an illegal action", {
          event: "strategy_illegal",
          seat,
          action: suggestion.action,
        });
        return null;
      }
      return suggestion;
    } catch (err) {
      this.log.warn("Strategy provider failed", {
        event: "strategy_failed",
        seat,
        error: err instanceof Error ? err.message : String(err),
      });
      return null;
    }
  }

  scriptedEventAt(): undefined {
    return undefined;
  }

  scriptedEventCount(): number {
    return 0;
  }

  dispose() {
    this.disposed = true;
  }
}
