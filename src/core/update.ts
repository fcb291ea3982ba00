import { cmd, soundForStreet } from "./commands";
import type { Cmd } from "./commands";
import { reuseIfEqual, shareRecord } from "./equality";
import { msg } from "./messages";
import type {
  Decision,
  DecisionReadyMsg,
  HandFinishedMsg,
  LoadHandMsg,
  Msg,
  ReplayRestoredMsg,
  SeatSnapshot,
  StreetAdvancedMsg,
  TableSnapshot,
  UserChoseMsg,
} from "./messages";
import {
  actionSet,
  initialModel,
  isBoardConsistent,
  isHumanSeat,
  streetForBoard,
  streetIndex,
} from "./model";
import type { ActionKind, Banner, BannerTone, Model, SeatState, Seats } from "./model";
import { replayScriptLength } from "./replay.script";

/**
 * Outcome of one transition. `rejection` names why an input was refused; the
 * model and commands of a rejected transition are always `model` and `[]`.
 */
export type Transition = {
  model: Model;
  commands: Cmd[];
  rejection: string | null;
};

const NO_ACTIONS: readonly ActionKind[] = [];

const accept = (model: Model, commands: Cmd[] = []): Transition => ({ model, commands, rejection: null });
const ignore = (model: Model): Transition => ({ model, commands: [], rejection: null });
const reject = (model: Model, rejection: string): Transition => ({ model, commands: [], rejection });

/** The pure reducer: (Model, Msg) -> (Model, Cmd[]). */
export function update(model: Model, message: Msg): [Model, Cmd[]] {
  const t = transition(model, message);
  return [t.model, t.commands];
}

export function transition(model: Model, message: Msg): Transition {
  switch (message.type) {
    case "LOAD_HAND":
      return loadHand(model, message);
    case "RESET":
      return accept(resetModel(model));
    case "NEXT_PRESSED":
      return advance(model);
    case "AUTO_ADVANCE":
      if (message.token !== model.txId) return reject(model, "stale autoplay token");
      if (!model.autoplayOn) return ignore(model);
      if (model.sessionMode === "REPLAY" && model.reviewPaused) return ignore(model);
      // A retry is a manual affair; ticks never re-ask a thinking bot.
      if (model.waitingFor === "BOT_DECISION") return ignore(model);
      return advance(model);
    case "TOGGLE_AUTOPLAY": {
      if (message.on === model.autoplayOn) return ignore(model);
      const next: Model = { ...model, autoplayOn: message.on };
      return accept(next, autoTick(next));
    }
    case "SET_STEP_DELAY": {
      const ms = Math.max(0, Math.floor(message.ms));
      if (!Number.isFinite(ms)) return reject(model, "step delay must be finite");
      if (ms === model.stepDelayMs) return ignore(model);
      return accept({ ...model, stepDelayMs: ms });
    }
    case "USER_CHOSE":
      return userChose(model, message);
    case "DECISION_READY":
      return decisionReady(model, message);
    case "ACTION_APPLIED":
    case "TABLE_SYNCED":
      return engineFeedback(model, message.snapshot, message.token);
    case "STREET_ADVANCED":
      return streetAdvanced(model, message);
    case "HAND_FINISHED":
      return handFinished(model, message);
    case "ENGINE_REJECTED": {
      if (!model.handId) return ignore(model);
      if (isStaleReply(model, message.token)) return reject(model, "stale engine reply");
      const synced = message.snapshot ? withSnapshot(model, message.snapshot) : model;
      const [bannered, expiry] = pushBanner(synced, `Action refused (${message.code})`, "warning");
      const next: Model = { ...bannered, engineBusy: false };
      if (next.waitingFor === "ANIMATION") return accept(next, [expiry]);
      const settled = settle(next);
      return accept(settled.model, [expiry, ...settled.commands]);
    }
    case "ANIMATION_FINISHED":
      if (model.waitingFor !== "ANIMATION") return ignore(model);
      if (message.token !== model.txId) return reject(model, "stale animation token");
      return settle({ ...model, waitingFor: "NONE" });
    case "SEEK_REVIEW": {
      if (model.sessionMode !== "REPLAY") return reject(model, "seek outside replay");
      if (model.reviewLength === 0) return reject(model, "nothing to review");
      const index = Number.isFinite(message.index) ? Math.trunc(message.index) : 0;
      const target = Math.min(Math.max(index, 0), model.reviewLength - 1);
      const txId = model.txId + 1;
      return accept(
        {
          ...model,
          reviewCursor: target,
          reviewPaused: true,
          waitingFor: "NONE",
          legalActions: NO_ACTIONS,
          engineBusy: true,
          hint: null,
          txId,
        },
        [cmd.restoreReplay(target, txId)]
      );
    }
    case "SET_REVIEW_PAUSED": {
      if (model.sessionMode !== "REPLAY") return reject(model, "pause outside replay");
      if (message.paused === model.reviewPaused) return ignore(model);
      const next: Model = { ...model, reviewPaused: message.paused };
      return accept(next, message.paused ? [] : autoTick(next));
    }
    case "REPLAY_RESTORED":
      return replayRestored(model, message);
    case "THEME_CHANGED":
      if (message.themeId === model.themeId) return ignore(model);
      return accept({ ...model, themeId: message.themeId });
    case "BANNER_EXPIRED": {
      if (!model.banners.some((b) => b.id === message.id)) return ignore(model);
      return accept({ ...model, banners: model.banners.filter((b) => b.id !== message.id) });
    }
    default: {
      const unknownMessage: never = message;
      void unknownMessage;
      return ignore(model);
    }
  }
}

// ---------------------------------------------------------------------------
// load / reset

function resetModel(model: Model): Model {
  return {
    ...initialModel({
      sessionMode: model.sessionMode,
      themeId: model.themeId,
      stepDelayMs: model.stepDelayMs,
      autoplayOn: model.autoplayOn,
      bannerTtlMs: model.bannerTtlMs,
    }),
    txId: model.txId + 1,
    bannerSeq: model.bannerSeq,
  };
}

function loadHand(model: Model, message: LoadHandMsg): Transition {
  const { hand, mode } = message;
  const street = streetForBoard(hand.board.length);
  if (!street) return reject(model, "board length does not match any street");
  if (hand.seats.length === 0) return reject(model, "hand has no seats");

  const toActSeat = hand.toActSeat;
  const seats: Record<number, SeatState> = {};
  const stacks: Record<number, number> = {};
  for (const s of hand.seats) {
    seats[s.seat] = {
      playerUid: s.playerUid,
      name: s.name,
      stack: s.stack,
      chipsInFront: s.chipsInFront,
      folded: s.folded,
      allIn: s.allIn,
      cards: s.cards,
      position: s.position,
      acting: s.seat === toActSeat,
    };
    stacks[s.seat] = s.stack;
  }

  const humanSeat =
    mode === "REPLAY" || message.humanSeat === null || !(message.humanSeat in seats) ? null : message.humanSeat;

  const loaded: Model = {
    ...resetModel({ ...model, sessionMode: mode }),
    handId: hand.handId,
    street,
    toActSeat,
    pot: hand.pot,
    board: hand.board,
    seats,
    stacks,
    offeredActions: toActSeat === null ? NO_ACTIONS : actionSet(hand.legalActions),
    humanSeat,
    reviewLength: mode === "REPLAY" ? replayScriptLength(hand) : 0,
  };

  const announce: Cmd[] = [
    cmd.loadEngine(hand),
    cmd.publishEvent("hand.loaded", { handId: hand.handId, mode, seats: hand.seats.length }),
  ];
  const settled = settle(loaded);
  return accept(settled.model, [...announce, ...settled.commands]);
}

// ---------------------------------------------------------------------------
// advancing

/** Shared by manual advance and accepted autoplay ticks. */
function advance(model: Model): Transition {
  if (!model.handId) return ignore(model);
  if (model.waitingFor === "HUMAN_DECISION" || model.waitingFor === "ANIMATION") return ignore(model);
  if (model.engineBusy) return ignore(model);

  if (model.waitingFor === "BOT_DECISION") {
    if (model.toActSeat === null) return ignore(model);
    return accept({ ...model, waitingFor: "NONE", legalActions: NO_ACTIONS }, [cmd.askDriver(model.toActSeat)]);
  }

  if (model.sessionMode === "REPLAY") {
    if (model.reviewCursor >= model.reviewLength) return ignore(model);
    return accept({ ...model, reviewCursor: model.reviewCursor + 1 }, [cmd.fetchScriptedEvent(model.reviewCursor)]);
  }

  const seat = model.toActSeat;
  if (seat === null) {
    if (model.street === "DONE") return ignore(model);
    return accept({ ...model, engineBusy: true }, [cmd.applyContinue(model.txId)]);
  }
  if (model.offeredActions.length === 0) return ignore(model);

  if (isHumanSeat(model, seat)) {
    const next: Model = { ...model, waitingFor: "HUMAN_DECISION", legalActions: model.offeredActions };
    return accept(next, model.sessionMode === "ADVISORY" ? [cmd.askDriver(seat)] : []);
  }
  return accept({ ...model, waitingFor: "BOT_DECISION", legalActions: model.offeredActions }, [cmd.askDriver(seat)]);
}

/** Autoplay tick for the current txId, when autoplay could make progress. */
function autoTick(model: Model): Cmd[] {
  if (!model.autoplayOn || !model.handId) return [];
  if (model.waitingFor !== "NONE" || model.engineBusy) return [];
  if (model.sessionMode === "REPLAY") {
    if (model.reviewPaused || model.reviewCursor >= model.reviewLength) return [];
  } else {
    if (model.street === "DONE") return [];
    if (model.toActSeat !== null && isHumanSeat(model, model.toActSeat)) return [];
  }
  return [cmd.scheduleTimer(model.stepDelayMs, msg.autoAdvance(model.txId))];
}

/**
 * Picks the resting state once nothing is animating: the human's turn opens
 * HUMAN_DECISION straight away, everything else waits in NONE for an advance.
 */
function settle(model: Model): Transition {
  const base: Model =
    model.waitingFor === "NONE" && model.legalActions.length === 0
      ? model
      : { ...model, waitingFor: "NONE", legalActions: NO_ACTIONS };
  if (base.engineBusy || !base.handId) return accept(base);

  const seat = base.toActSeat;
  if (base.sessionMode === "REPLAY" || seat === null) return accept(base, autoTick(base));
  if (base.offeredActions.length === 0) return accept(base);

  if (isHumanSeat(base, seat)) {
    const next: Model = { ...base, waitingFor: "HUMAN_DECISION", legalActions: base.offeredActions };
    return accept(next, base.sessionMode === "ADVISORY" ? [cmd.askDriver(seat)] : []);
  }
  return accept(base, autoTick(base));
}

// ---------------------------------------------------------------------------
// decisions

function userChose(model: Model, message: UserChoseMsg): Transition {
  if (!model.handId) return reject(model, "no hand loaded");
  const seat = model.humanSeat ?? model.toActSeat;
  if (seat === null || seat !== model.toActSeat) return reject(model, "not the user's turn");
  if (model.waitingFor === "ANIMATION" || model.waitingFor === "BOT_DECISION" || model.engineBusy) {
    return reject(model, `cannot act while ${model.engineBusy ? "engine is busy" : model.waitingFor}`);
  }
  if (!model.offeredActions.includes(message.action)) return reject(model, `${message.action} is not legal`);
  return applyDecision(model, { seat, action: message.action, amount: message.amount }, false);
}

function decisionReady(model: Model, message: DecisionReadyMsg): Transition {
  const { decision } = message;
  if (!model.handId) return reject(model, "no hand loaded");

  if (message.scripted) {
    if (model.sessionMode !== "REPLAY") return reject(model, "scripted decision outside replay");
    if (model.waitingFor === "ANIMATION" || model.engineBusy) return reject(model, "replay step still in flight");
    if (!(decision.seat in model.seats)) return reject(model, `seat ${decision.seat} is empty`);
    return applyDecision(model, decision, true);
  }

  if (decision.seat !== model.toActSeat) return reject(model, `seat ${decision.seat} is not to act`);
  if (!model.offeredActions.includes(decision.action)) return reject(model, `${decision.action} is not legal`);

  if (model.sessionMode === "ADVISORY" && isHumanSeat(model, decision.seat)) {
    const hint = {
      action: decision.action,
      amount: decision.amount,
      frequency: decision.frequency ?? 1,
      rationale: decision.rationale ?? "",
    };
    return accept({ ...model, hint: reuseIfEqual(model.hint, hint) });
  }

  if (isHumanSeat(model, decision.seat)) return reject(model, "driver cannot act for the human seat");
  if (model.waitingFor !== "BOT_DECISION" && model.waitingFor !== "NONE") {
    return reject(model, `not waiting for a bot (${model.waitingFor})`);
  }
  if (model.engineBusy) return reject(model, "engine is busy");
  return applyDecision(model, decision, false);
}

function applyDecision(model: Model, decision: Decision, scripted: boolean): Transition {
  const txId = model.txId + 1;
  const street = decision.street ?? model.street;
  const toActSeat = scripted ? decision.seat : model.toActSeat;
  const next: Model = {
    ...model,
    toActSeat,
    seats: withActing(model.seats, toActSeat),
    lastAction: { seat: decision.seat, kind: decision.action, amount: decision.amount, street },
    hint: null,
    offeredActions: NO_ACTIONS,
    legalActions: NO_ACTIONS,
    waitingFor: "ANIMATION",
    engineBusy: true,
    txId,
  };
  const commands: Cmd[] = [
    cmd.playSound(decision.action),
    cmd.animate({ kind: "ACTION", seat: decision.seat, action: decision.action, amount: decision.amount }, txId),
    cmd.applyToEngine(decision.seat, decision.action, decision.amount, street, scripted, txId),
  ];
  if (model.sessionMode === "REPLAY") commands.push(cmd.scheduleTimer(0, msg.animationFinished(txId)));
  return accept(next, commands);
}

// ---------------------------------------------------------------------------
// engine feedback

/** A reply issued for an older txId belongs to a table the model has since left. */
function isStaleReply(model: Model, token: number | null): boolean {
  return token !== null && token !== model.txId;
}

function engineFeedback(model: Model, snapshot: TableSnapshot, token: number | null): Transition {
  if (!model.handId) return ignore(model);
  if (isStaleReply(model, token)) return reject(model, "stale engine reply");
  const next: Model = { ...withSnapshot(model, snapshot), engineBusy: false };
  if (next.waitingFor === "ANIMATION") return accept(next);
  return settle(next);
}

function streetAdvanced(model: Model, message: StreetAdvancedMsg): Transition {
  if (!model.handId) return ignore(model);
  if (isStaleReply(model, message.token)) return reject(model, "stale engine reply");
  const { street, board, snapshot } = message;
  if (street === "DONE") return reject(model, "hand completion arrives as HAND_FINISHED");
  if (streetIndex(street) <= streetIndex(model.street)) return reject(model, `street ${street} is not ahead`);
  if (!isBoardConsistent(street, board)) return reject(model, `board of ${board.length} does not fit ${street}`);

  const txId = model.txId + 1;
  const synced: Model = snapshot
    ? withSnapshot(model, snapshot)
    : {
        ...model,
        toActSeat: null,
        offeredActions: NO_ACTIONS,
        seats: collectBets(model.seats, null),
      };
  const scriptedInReplay = snapshot === null && model.sessionMode === "REPLAY";
  const next: Model = {
    ...synced,
    street,
    board: reuseIfEqual(model.board, board),
    lastAction: null,
    hint: null,
    legalActions: NO_ACTIONS,
    waitingFor: "ANIMATION",
    engineBusy: scriptedInReplay,
    txId,
  };

  const commands: Cmd[] = [
    cmd.animate({ kind: "DEAL_STREET", street, board }, txId),
    cmd.playSound(soundForStreet(street)),
  ];
  if (scriptedInReplay) commands.push(cmd.syncEngineStreet(street, board, txId));
  commands.push(...completionPacing(next));
  return accept(next, commands);
}

function handFinished(model: Model, message: HandFinishedMsg): Transition {
  if (!model.handId) return ignore(model);
  if (isStaleReply(model, message.token)) return reject(model, "stale engine reply");
  if (model.street === "DONE") return reject(model, "hand already finished");
  const { winners, snapshot } = message;

  const txId = model.txId + 1;
  let synced: Model;
  if (snapshot) {
    synced = withSnapshot(model, { ...snapshot, toActSeat: null, legalActions: NO_ACTIONS });
  } else {
    // Recorded results: pay the winners out of the pot.
    const paid = winners.reduce((sum, w) => sum + w.amount, 0);
    const seats = payWinners(collectBets(model.seats, null), winners);
    synced = {
      ...model,
      seats,
      stacks: stacksOf(model.stacks, seats),
      pot: Math.max(0, model.pot - paid),
      toActSeat: null,
    };
  }

  const text =
    winners.length === 0
      ? "Hand complete"
      : winners.map((w) => `${model.seats[w.seat]?.name ?? `Seat ${w.seat}`} wins ${w.amount}`).join(", ");
  const [bannered, expiry] = pushBanner(synced, text, "success");
  const next: Model = {
    ...bannered,
    street: "DONE",
    offeredActions: NO_ACTIONS,
    legalActions: NO_ACTIONS,
    lastAction: null,
    hint: null,
    waitingFor: "ANIMATION",
    engineBusy: false,
    txId,
  };

  return accept(next, [
    cmd.animate({ kind: "PUSH_POT", winners }, txId),
    cmd.playSound("WINNER"),
    cmd.speak(text),
    cmd.publishEvent("hand.finished", { handId: model.handId, winners }),
    expiry,
    ...completionPacing(next),
  ]);
}

/**
 * After a street or the hand completes: replay resolves its presentation
 * immediately, and autoplay queues the next step.
 */
function completionPacing(model: Model): Cmd[] {
  const commands: Cmd[] = [];
  const replay = model.sessionMode === "REPLAY";
  if (replay) commands.push(cmd.scheduleTimer(0, msg.animationFinished(model.txId)));
  if (!model.autoplayOn) return commands;
  if (replay && (model.reviewPaused || model.reviewCursor >= model.reviewLength)) return commands;
  if (!replay && model.street === "DONE") return commands;
  commands.push(cmd.scheduleTimer(model.stepDelayMs, msg.autoAdvance(model.txId)));
  return commands;
}

function replayRestored(model: Model, message: ReplayRestoredMsg): Transition {
  if (model.sessionMode !== "REPLAY") return ignore(model);
  if (message.token !== model.txId) return reject(model, "stale replay restore");
  const synced = withSnapshot(model, message.snapshot);
  return settle({
    ...synced,
    street: message.snapshot.street,
    board: reuseIfEqual(model.board, message.snapshot.board),
    lastAction: reuseIfEqual(model.lastAction, message.lastAction),
    reviewCursor: Math.min(Math.max(message.cursor, 0), model.reviewLength),
    engineBusy: false,
    waitingFor: "NONE",
  });
}

// ---------------------------------------------------------------------------
// table helpers

/** Copies seats, stacks, pot, actor and offers from an engine snapshot. */
function withSnapshot(model: Model, snapshot: TableSnapshot): Model {
  const toActSeat = snapshot.toActSeat;
  const seats = seatsFromSnapshot(model.seats, snapshot.seats, toActSeat);
  return {
    ...model,
    seats,
    stacks: stacksOf(model.stacks, seats),
    pot: snapshot.pot,
    toActSeat,
    offeredActions: toActSeat === null ? NO_ACTIONS : reuseIfEqual(model.offeredActions, actionSet(snapshot.legalActions)),
  };
}

function seatsFromSnapshot(
  prev: Seats,
  snapshot: Readonly<Record<number, SeatSnapshot>>,
  toActSeat: number | null
): Seats {
  const next: Record<number, SeatState> = {};
  for (const key of Object.keys(snapshot).map(Number)) {
    next[key] = { ...snapshot[key], acting: key === toActSeat };
  }
  return shareRecord(prev, next);
}

function withActing(seats: Seats, toActSeat: number | null): Seats {
  const next: Record<number, SeatState> = {};
  for (const key of Object.keys(seats).map(Number)) {
    const seat = seats[key];
    const acting = key === toActSeat;
    next[key] = seat.acting === acting ? seat : { ...seat, acting };
  }
  return shareRecord(seats, next);
}

/** Street boundary: bets move into the pot (which already counts them). */
function collectBets(seats: Seats, toActSeat: number | null): Seats {
  const next: Record<number, SeatState> = {};
  for (const key of Object.keys(seats).map(Number)) {
    next[key] = { ...seats[key], chipsInFront: 0, acting: key === toActSeat };
  }
  return shareRecord(seats, next);
}

function payWinners(seats: Seats, winners: HandFinishedMsg["winners"]): Seats {
  const next: Record<number, SeatState> = { ...seats };
  for (const w of winners) {
    const seat = next[w.seat];
    if (seat) next[w.seat] = { ...seat, stack: seat.stack + w.amount };
  }
  return shareRecord(seats, next);
}

function stacksOf(prev: Model["stacks"], seats: Seats): Model["stacks"] {
  const next: Record<number, number> = {};
  for (const key of Object.keys(seats).map(Number)) next[key] = seats[key].stack;
  return shareRecord(prev, next);
}

function pushBanner(model: Model, text: string, tone: BannerTone): [Model, Cmd] {
  const id = model.bannerSeq + 1;
  const banner: Banner = { id, text, tone, ttlMs: model.bannerTtlMs };
  return [
    { ...model, banners: [...model.banners, banner], bannerSeq: id },
    cmd.scheduleTimer(model.bannerTtlMs, msg.bannerExpired(id)),
  ];
}
