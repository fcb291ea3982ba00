import type { SessionDriver } from "../drivers/session-driver";
import { logger } from "../lib/logger";
import type { Logger } from "../lib/logger";
import type { Cmd } from "./commands";
import { deepEqual } from "./equality";
import type { HandData } from "./hand.schema";
import { RESET_MESSAGES, msg } from "./messages";
import type { Msg } from "./messages";
import { initialModel, seatCount } from "./model";
import type { LastAction, Model, Street } from "./model";
import type { Collaborators } from "./ports";
import { transition } from "./update";
import type { Transition } from "./update";

export type Reducer = (model: Model, message: Msg) => Transition;
export type Subscriber = (model: Model) => void;
export type RejectionHook = (message: Msg, reason: string) => void;

export type StoreOptions = {
  collaborators: Collaborators;
  model?: Model;
  driver?: SessionDriver | null;
  reducer?: Reducer;
  sessionId?: string;
  logger?: Logger;
  onRejected?: RejectionHook;
};

function errorCode(err: unknown): string {
  if (err instanceof Error && "code" in err && typeof err.code === "string") return err.code;
  return "ENGINE_FAILURE";
}

/**
 * Owns the Model of one session. Messages are processed one at a time in
 * arrival order; a dispatch made while another is in progress (for instance
 * from a command) is queued behind it. Commands run after the commit and only
 * come back in through `dispatch`.
 */
export class Store {
  private model: Model;
  private driver: SessionDriver | null;
  private readonly collaborators: Collaborators;
  private readonly reducer: Reducer;
  private readonly sessionId: string;
  private readonly log: Logger;
  private readonly onRejected: RejectionHook | null;
  private readonly subscribers = new Set<Subscriber>();
  private readonly queue: Msg[] = [];
  private draining = false;
  private disposed = false;
  private loadedHand: HandData | null = null;

  constructor(options: StoreOptions) {
    this.collaborators = options.collaborators;
    this.model = options.model ?? initialModel();
    this.driver = options.driver ?? null;
    this.reducer = options.reducer ?? transition;
    this.sessionId = options.sessionId ?? "local";
    this.log = options.logger ?? logger;
    this.onRejected = options.onRejected ?? null;
  }

  getModel(): Model {
    return this.model;
  }

  setSessionDriver(driver: SessionDriver | null) {
    if (this.driver && this.driver !== driver) this.driver.dispose();
    this.driver = driver;
  }

  subscribe(subscriber: Subscriber): () => void {
    this.subscribers.add(subscriber);
    this.deliver(subscriber, this.model);
    return () => {
      this.subscribers.delete(subscriber);
    };
  }

  dispatch(message: Msg) {
    if (this.disposed) return;
    this.queue.push(message);
    if (this.draining) return;

    this.draining = true;
    try {
      let next = this.queue.shift();
      while (next && !this.disposed) {
        this.step(next);
        next = this.queue.shift();
      }
    } finally {
      this.draining = false;
    }
  }

  dispose() {
    if (this.disposed) return;
    this.disposed = true;
    this.queue.length = 0;
    this.collaborators.scheduler.cancelAll();
    this.driver?.dispose();
    this.driver = null;
    this.subscribers.clear();
  }

  private step(message: Msg) {
    const before = this.model;
    let result: Transition;
    try {
      result = this.reducer(before, message);
    } catch (err) {
      this.log.error("Reducer threw", {
        event: "reducer_error",
        sessionId: this.sessionId,
        message: message.type,
        error: err instanceof Error ? err.message : String(err),
      });
      return;
    }

    if (result.rejection !== null) {
      this.log.transitionRejected(before.handId, result.rejection, message.type);
      this.onRejected?.(message, result.rejection);
    }

    let next = result.model;
    const seatsBefore = seatCount(before.seats);
    const seatsAfter = seatCount(next.seats);
    if (!RESET_MESSAGES.has(message.type) && (seatsBefore === 0) !== (seatsAfter === 0)) {
      this.log.regressionGuard(before.handId, message.type, seatsBefore);
      next = before;
    }

    if (next !== before && !deepEqual(before, next)) {
      this.model = next;
      for (const subscriber of [...this.subscribers]) this.deliver(subscriber, next);
    }

    for (const command of result.commands) {
      if (this.disposed) return;
      this.execute(command);
    }
  }

  private deliver(subscriber: Subscriber, model: Model) {
    try {
      subscriber(model);
    } catch (err) {
      this.log.error("Subscriber failed", {
        event: "subscriber_error",
        sessionId: this.sessionId,
        error: err instanceof Error ? err.message : String(err),
      });
    }
  }

  private context() {
    return { sessionId: this.sessionId, handId: this.model.handId };
  }

  /** Runs an async collaborator call; failures are logged, then `onFailure` runs. */
  private perform(command: Cmd, task: () => Promise<void>, onFailure?: (err: unknown) => void) {
    void (async () => {
      try {
        await task();
      } catch (err) {
        this.log.commandFailed(command.type, err, this.context());
        onFailure?.(err);
      }
    })();
  }

  private engineRejected(err: unknown, token: number) {
    this.dispatch(msg.engineRejected(errorCode(err), this.collaborators.engine.snapshot(), token));
  }

  private execute(command: Cmd) {
    const { audio, animator, engine, scheduler, events } = this.collaborators;

    switch (command.type) {
      case "PLAY_SOUND": {
        const { sound } = command;
        this.perform(command, () => audio.play(sound));
        return;
      }

      case "SPEAK": {
        const { text } = command;
        this.perform(command, () => audio.speak(text));
        return;
      }

      case "ANIMATE": {
        const { effect, token } = command;
        this.perform(command, async () => {
          try {
            await animator.animate(effect, token);
          } finally {
            this.dispatch(msg.animationFinished(token));
          }
        });
        return;
      }

      case "ASK_DRIVER_FOR_DECISION": {
        const driver = this.driver;
        if (!driver) {
          this.log.unexpectedDriverCall("none", "decide", command.seat);
          return;
        }
        try {
          driver.decide(this.model, command.seat, (decision) => this.dispatch(msg.decisionReady(decision)));
        } catch (err) {
          this.log.commandFailed(command.type, err, { ...this.context(), seat: command.seat });
        }
        return;
      }

      case "APPLY_TO_ENGINE": {
        const { seat, action, amount, street, scripted, token } = command;
        this.perform(
          command,
          async () => {
            const feedback = await engine.apply({ seat, action, amount, street, scripted });
            this.dispatch({ ...feedback, token });
          },
          (err) => this.engineRejected(err, token)
        );
        return;
      }

      case "APPLY_CONTINUE": {
        const { token } = command;
        this.perform(
          command,
          async () => {
            const feedback = await engine.continue();
            this.dispatch({ ...feedback, token });
          },
          (err) => this.engineRejected(err, token)
        );
        return;
      }

      case "SYNC_ENGINE_STREET": {
        const { street, board, token } = command;
        this.perform(
          command,
          async () => this.dispatch(msg.tableSynced(await engine.syncStreet(street, board), token)),
          (err) => this.engineRejected(err, token)
        );
        return;
      }

      case "LOAD_ENGINE": {
        const hand = command.hand;
        this.loadedHand = hand;
        this.perform(command, async () => {
          await engine.load(hand);
        });
        return;
      }

      case "RESTORE_REPLAY": {
        const { index, token } = command;
        this.perform(command, () => this.restoreReplay(index, token), (err) => this.engineRejected(err, token));
        return;
      }

      case "SCHEDULE_TIMER": {
        const message = command.message;
        scheduler.schedule(command.delayMs, () => this.dispatch(message));
        return;
      }

      case "PUBLISH_EVENT": {
        const { topic, payload } = command;
        this.log.sessionEvent(this.sessionId, topic, payload);
        this.perform(command, () => events.publish(topic, payload));
        return;
      }

      case "FETCH_SCRIPTED_EVENT": {
        const event = this.driver?.scriptedEventAt(command.index);
        if (!event) {
          this.log.warn("No scripted event", { ...this.context(), event: "script_missing", index: command.index });
          return;
        }
        this.dispatch(event);
        return;
      }

      default: {
        const unknownCommand: never = command;
        this.log.warn("Unknown command ignored", { ...this.context(), command: unknownCommand });
      }
    }
  }

  /** Rebuilds the engine at script position `index` by folding the events before it. */
  private async restoreReplay(index: number, token: number) {
    const { engine } = this.collaborators;
    const driver = this.driver;
    const hand = this.loadedHand;
    if (!driver || !hand) throw new Error("nothing to restore");

    let street: Street = (await engine.load(hand)).street;
    let lastAction: LastAction | null = null;
    for (let i = 0; i < index; i++) {
      const event = driver.scriptedEventAt(i);
      if (!event) break;
      if (event.type === "DECISION_READY") {
        const { seat, action, amount } = event.decision;
        const at = event.decision.street ?? street;
        await engine.apply({ seat, action, amount, street: at, scripted: true });
        street = at;
        lastAction = { seat, kind: action, amount, street: at };
      } else if (event.type === "STREET_ADVANCED") {
        await engine.syncStreet(event.street, event.board);
        street = event.street;
        lastAction = null;
      }
    }

    const snapshot = engine.snapshot();
    if (!snapshot) throw new Error("engine lost its table during restore");
    this.dispatch(msg.replayRestored(index, snapshot, lastAction, token));
  }
}
