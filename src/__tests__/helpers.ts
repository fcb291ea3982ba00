import { vi } from "vitest";
import { parseHand } from "../core/hand.schema";
import type { HandData, HandInput } from "../core/hand.schema";
import type { CancelTask, Collaborators, EnginePort, SchedulerPort } from "../core/ports";
import { Logger } from "../lib/logger";

export const quietLogger = new Logger({ LOG_LEVEL: "error" });

/**
 * Three-handed hand, blinds 1/2, Cara (seat 2) first to act. The log folds
 * Cara, sees a flop heads-up and ends when Alice folds to Bob's bet.
 */
export const HAND_INPUT: HandInput = {
  handId: "h-1",
  seats: [
    { seat: 0, playerUid: "u0", name: "Alice", stack: 100, chipsInFront: 1, position: 0, cards: ["AS", "KS"] },
    { seat: 1, playerUid: "u1", name: "Bob", stack: 100, chipsInFront: 2, position: 1, cards: ["QH", "QD"] },
    { seat: 2, playerUid: "u2", name: "Cara", stack: 100, position: 2, cards: ["7C", "2D"] },
  ],
  pot: 3,
  toActSeat: 2,
  legalActions: ["FOLD", "CALL", "RAISE"],
  dealerSeat: 2,
  bigBlind: 2,
  runout: ["2S", "7H", "9D", "JC", "3C"],
  actions: [
    { seat: 2, kind: "FOLD", street: "PREFLOP" },
    { seat: 0, kind: "CALL", amount: 1, street: "PREFLOP" },
    { seat: 1, kind: "CHECK", street: "PREFLOP" },
    { seat: 0, kind: "CHECK", street: "FLOP" },
    { seat: 1, kind: "BET", amount: 4, street: "FLOP" },
    { seat: 0, kind: "FOLD", street: "FLOP" },
  ],
  winners: [{ seat: 1, amount: 8 }],
};

export function makeHand(overrides: Partial<HandInput> = {}): HandData {
  const parsed = parseHand({ ...HAND_INPUT, ...overrides });
  if (!parsed.ok) throw new Error(`fixture hand is invalid: ${JSON.stringify(parsed.error)}`);
  return parsed.hand;
}

/** Deterministic clock: tasks run only when the test advances time. */
export class ManualScheduler implements SchedulerPort {
  now = 0;
  private seq = 0;
  private tasks: Array<{ at: number; seq: number; fn: () => void }> = [];

  schedule(delayMs: number, fn: () => void): CancelTask {
    const task = { at: this.now + Math.max(0, delayMs), seq: this.seq++, fn };
    this.tasks.push(task);
    return () => {
      this.tasks = this.tasks.filter((t) => t !== task);
    };
  }

  cancelAll() {
    this.tasks = [];
  }

  get pending(): number {
    return this.tasks.length;
  }

  advance(ms: number) {
    const until = this.now + ms;
    for (;;) {
      const due = this.tasks
        .filter((t) => t.at <= until)
        .sort((a, b) => a.at - b.at || a.seq - b.seq)[0];
      if (!due) break;
      this.tasks = this.tasks.filter((t) => t !== due);
      this.now = due.at;
      due.fn();
    }
    this.now = until;
  }
}

/** Lets every pending promise chain run to completion. */
export function flushAsync(): Promise<void> {
  return new Promise<void>((resolve) => setImmediate(resolve));
}

export function fakeCollaborators(engine: EnginePort, scheduler: SchedulerPort = new ManualScheduler()) {
  const audio = {
    play: vi.fn(async (_sound: string) => undefined),
    speak: vi.fn(async (_text: string) => undefined),
  };
  const animator = { animate: vi.fn(async () => undefined) };
  const events = { publish: vi.fn(async () => undefined) };
  const collaborators: Collaborators = { audio, animator, engine, scheduler, events };
  return { collaborators, audio, animator, events };
}
