import { describe, expect, it, vi } from "vitest";
import { cmd } from "../core/commands";
import { msg } from "../core/messages";
import type { Msg } from "../core/messages";
import type { Model } from "../core/model";
import { Store } from "../core/store";
import type { Reducer } from "../core/store";
import { transition } from "../core/update";
import { PokerEngine } from "../poker/engine";
import { HAND_INPUT, fakeCollaborators, flushAsync, makeHand, quietLogger } from "./helpers";

function makeStore(reducer?: Reducer) {
  const fakes = fakeCollaborators(new PokerEngine());
  const store = new Store({ collaborators: fakes.collaborators, reducer, logger: quietLogger });
  return { store, ...fakes };
}

describe("Store", () => {
  it("delivers the current model on subscribe", () => {
    const { store } = makeStore();
    const seen: Model[] = [];
    store.subscribe((m) => seen.push(m));
    expect(seen).toEqual([store.getModel()]);
  });

  it("does not notify subscribers when nothing changed", () => {
    const { store } = makeStore();
    const subscriber = vi.fn();
    store.subscribe(subscriber);

    store.dispatch(msg.themeChanged(store.getModel().themeId));
    store.dispatch(msg.nextPressed());
    expect(subscriber).toHaveBeenCalledTimes(1);

    store.dispatch(msg.themeChanged("midnight"));
    expect(subscriber).toHaveBeenCalledTimes(2);
  });

  it("stops delivering after unsubscribe", () => {
    const { store } = makeStore();
    const subscriber = vi.fn();
    const unsubscribe = store.subscribe(subscriber);
    unsubscribe();
    store.dispatch(msg.themeChanged("midnight"));
    expect(subscriber).toHaveBeenCalledTimes(1);
  });

  it("processes a dispatch made during delivery after the current message", () => {
    const order: string[] = [];
    const recording: Reducer = (model, message) => {
      order.push(message.type === "THEME_CHANGED" ? `theme:${message.themeId}` : message.type);
      return transition(model, message);
    };
    const { store } = makeStore(recording);
    const themes: string[] = [];
    store.subscribe((m) => {
      themes.push(m.themeId);
      if (m.themeId === "a") store.dispatch(msg.themeChanged("b"));
    });

    store.dispatch(msg.themeChanged("a"));
    expect(order).toEqual(["theme:a", "theme:b"]);
    expect(themes).toEqual(["forest-green-pro", "a", "b"]);
  });

  it("reverts a transition that empties the seats outside load or reset", () => {
    const emptying: Reducer = (model, message) => {
      const t = transition(model, message);
      return message.type === "THEME_CHANGED" ? { ...t, model: { ...t.model, seats: {} } } : t;
    };
    const { store } = makeStore(emptying);
    store.dispatch(msg.loadHand(makeHand(), "REPLAY"));
    const loaded = store.getModel();
    const subscriber = vi.fn();
    store.subscribe(subscriber);

    store.dispatch(msg.themeChanged("midnight"));
    expect(store.getModel()).toBe(loaded);
    expect(subscriber).toHaveBeenCalledTimes(1);
  });

  it("still runs the commands of a reverted transition", async () => {
    const emptyingWithEvent: Reducer = (model, message) => {
      const t = transition(model, message);
      if (message.type !== "THEME_CHANGED") return t;
      return {
        model: { ...t.model, seats: {} },
        commands: [cmd.publishEvent("theme.changed", { themeId: message.themeId })],
        rejection: null,
      };
    };
    const { store, events } = makeStore(emptyingWithEvent);
    store.dispatch(msg.loadHand(makeHand(), "REPLAY"));
    const loaded = store.getModel();

    store.dispatch(msg.themeChanged("midnight"));
    await flushAsync();
    expect(store.getModel()).toBe(loaded);
    expect(events.publish).toHaveBeenCalledWith("theme.changed", { themeId: "midnight" });
  });

  it("finishes delivering a commit to a subscriber removed mid-notification", () => {
    const { store } = makeStore();
    const second = vi.fn();
    let unsubscribeSecond = () => {};
    const first = vi.fn((m: Model) => {
      if (m.themeId === "midnight") unsubscribeSecond();
    });
    store.subscribe(first);
    unsubscribeSecond = store.subscribe(second);

    store.dispatch(msg.themeChanged("midnight"));
    expect(second).toHaveBeenCalledTimes(2);
    expect(second).toHaveBeenLastCalledWith(store.getModel());

    store.dispatch(msg.themeChanged("dawn"));
    expect(first).toHaveBeenCalledTimes(3);
    expect(second).toHaveBeenCalledTimes(2);
  });

  it("lets reset empty the seats", () => {
    const { store } = makeStore();
    store.dispatch(msg.loadHand(makeHand(), "REPLAY"));
    store.dispatch(msg.reset());
    expect(store.getModel().seats).toEqual({});
    expect(store.getModel().handId).toBe("");
  });

  it("reports rejected messages to the hook", () => {
    const onRejected = vi.fn<(message: Msg, reason: string) => void>();
    const store = new Store({
      collaborators: fakeCollaborators(new PokerEngine()).collaborators,
      logger: quietLogger,
      onRejected,
    });
    store.dispatch(msg.userChose("FOLD"));
    expect(onRejected).toHaveBeenCalledWith(msg.userChose("FOLD"), "no hand loaded");
  });

  it("keeps running when a reducer throws", () => {
    const throwing: Reducer = (model, message) => {
      if (message.type === "THEME_CHANGED") throw new Error("boom");
      return transition(model, message);
    };
    const { store } = makeStore(throwing);
    store.dispatch(msg.themeChanged("midnight"));
    store.dispatch(msg.setStepDelay(300));
    expect(store.getModel().stepDelayMs).toBe(300);
    expect(store.getModel().themeId).toBe("forest-green-pro");
  });

  it("runs the commands of a transition", async () => {
    const { store, events } = makeStore();
    store.dispatch(msg.loadHand(makeHand(), "REPLAY"));
    await flushAsync();
    expect(events.publish).toHaveBeenCalledWith("hand.loaded", { handId: "h-1", mode: "REPLAY", seats: 3 });
  });

  it("ends the animation wait even when the animator fails", async () => {
    const { store, animator } = makeStore();
    animator.animate.mockRejectedValueOnce(new Error("renderer gone"));
    store.dispatch(msg.loadHand(makeHand(), "PRACTICE", 2));
    store.dispatch(msg.userChose("FOLD"));
    expect(store.getModel().waitingFor).toBe("ANIMATION");

    await flushAsync();
    expect(animator.animate).toHaveBeenCalledTimes(1);
    expect(store.getModel().waitingFor).toBe("NONE");
    expect(store.getModel().engineBusy).toBe(false);
    expect(store.getModel().toActSeat).toBe(0);
  });

  it("asks the driver a second time when a thinking bot is advanced", () => {
    const { store } = makeStore();
    const decide = vi.fn();
    store.setSessionDriver({
      mode: "PRACTICE",
      decide,
      scriptedEventAt: () => undefined,
      scriptedEventCount: () => 0,
      dispose: () => {},
    });
    store.dispatch(msg.loadHand(makeHand(), "PRACTICE", 0));

    store.dispatch(msg.nextPressed());
    expect(store.getModel().waitingFor).toBe("BOT_DECISION");
    store.dispatch(msg.nextPressed());
    expect(store.getModel().waitingFor).toBe("NONE");
    expect(decide).toHaveBeenCalledTimes(2);
    expect(decide).toHaveBeenLastCalledWith(store.getModel(), 2, expect.any(Function));
  });

  it("drops an engine reply that lands after another hand was loaded", async () => {
    const onRejected = vi.fn<(message: Msg, reason: string) => void>();
    const store = new Store({
      collaborators: fakeCollaborators(new PokerEngine()).collaborators,
      logger: quietLogger,
      onRejected,
    });
    store.dispatch(msg.loadHand(makeHand(), "PRACTICE", 2));
    store.dispatch(msg.userChose("FOLD"));
    const next = makeHand({
      handId: "h-2",
      seats: [
        { ...HAND_INPUT.seats[0], seat: 4 },
        { ...HAND_INPUT.seats[1], seat: 5 },
      ],
      toActSeat: 4,
      dealerSeat: 4,
      actions: [],
      winners: [],
    });
    store.dispatch(msg.loadHand(next, "PRACTICE"));

    await flushAsync();
    expect(store.getModel().handId).toBe("h-2");
    expect(Object.keys(store.getModel().seats)).toEqual(["4", "5"]);
    expect(store.getModel().toActSeat).toBe(4);
    expect(onRejected.mock.calls.map(([, reason]) => reason)).toContain("stale engine reply");
  });

  it("ignores dispatches after dispose", () => {
    const { store } = makeStore();
    store.dispose();
    store.dispatch(msg.themeChanged("midnight"));
    expect(store.getModel().themeId).toBe("forest-green-pro");
  });
});
