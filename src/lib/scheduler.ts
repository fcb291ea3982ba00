import type { CancelTask, SchedulerPort } from "../core/ports";

/** setTimeout-backed scheduler; keeps its handles so a disposed session leaves nothing behind. */
export class TimerScheduler implements SchedulerPort {
  private readonly timers = new Set<NodeJS.Timeout>();

  schedule(delayMs: number, fn: () => void): CancelTask {
    const timeout = setTimeout(() => {
      this.timers.delete(timeout);
      fn();
    }, Math.max(0, delayMs));
    this.timers.add(timeout);
    return () => {
      clearTimeout(timeout);
      this.timers.delete(timeout);
    };
  }

  cancelAll() {
    for (const timeout of this.timers) clearTimeout(timeout);
    this.timers.clear();
  }

  get pending(): number {
    return this.timers.size;
  }
}
