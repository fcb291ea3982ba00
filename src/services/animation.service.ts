import type { AnimationEffect } from "../core/commands";
import type { AnimatorPort, SchedulerPort } from "../core/ports";

export type EffectListener = (effect: AnimationEffect, token: number, durationMs: number) => void;

// Relative lengths: dealing a street and pushing the pot take longer than a bet.
const DURATION_FACTOR: Record<AnimationEffect["kind"], number> = {
  ACTION: 1,
  DEAL_STREET: 2,
  PUSH_POT: 3,
};

/**
 * Plays effects on a clock: the listener (usually a realtime broadcast) hears
 * about the effect immediately and the promise settles once its duration has
 * elapsed on the scheduler.
 */
export class TimedAnimator implements AnimatorPort {
  constructor(
    private readonly scheduler: SchedulerPort,
    private readonly baseMs: number,
    private readonly listener?: EffectListener
  ) {}

  durationOf(effect: AnimationEffect): number {
    return this.baseMs * DURATION_FACTOR[effect.kind];
  }

  animate(effect: AnimationEffect, token: number): Promise<void> {
    const durationMs = this.durationOf(effect);
    this.listener?.(effect, token, durationMs);
    return new Promise<void>((resolve) => {
      this.scheduler.schedule(durationMs, () => resolve());
    });
  }
}
