import type { ActionKind } from "../core/model";
import { EngineError } from "./errors";
import type { HandRuntime, SeatRuntime } from "./types";

function contenders(rt: HandRuntime): SeatRuntime[] {
  return Object.values(rt.players).filter((p) => !p.hasFolded);
}

// Seats that can still take actions (not folded, not all-in, stack > 0)
function actionables(rt: HandRuntime): SeatRuntime[] {
  return contenders(rt).filter((p) => !p.isAllIn && p.stack > 0);
}

function actionableSeatNos(rt: HandRuntime): number[] {
  return actionables(rt)
    .map((p) => p.seatNo)
    .sort((a, b) => a - b);
}

function nextSeatFrom(list: number[], fromSeat: number): number | null {
  if (!list.length) return null;
  for (const s of list) if (s > fromSeat) return s;
  return list[0];
}

export function nextActionableSeat(rt: HandRuntime, fromSeat: number): number | null {
  return nextSeatFrom(actionableSeatNos(rt), fromSeat);
}

export function onlyOneLeft(rt: HandRuntime): number | null {
  const act = contenders(rt);
  return act.length === 1 ? act[0].seatNo : null;
}

export function isRoundSettled(rt: HandRuntime): boolean {
  const act = contenders(rt);
  if (act.length <= 1) return true;

  // Nobody left to bet against: the rest of the board just runs out.
  const actionable = actionables(rt);
  if (actionable.length === 0) return true;
  if (actionable.length === 1 && actionable[0].bet >= rt.currentBet) return true;

  // Each player must get a chance to act on streets where currentBet == 0.
  const allActed = act.every((p) => p.isAllIn || p.stack === 0 || rt.actedThisRound[p.seatNo] === true);

  if (rt.currentBet === 0) {
    return allActed;
  }

  const allMatched = act.every((p) => p.isAllIn || p.stack === 0 || p.bet === rt.currentBet);
  return allMatched && allActed;
}

export function resetBets(rt: HandRuntime) {
  for (const p of Object.values(rt.players)) p.bet = 0;
  rt.currentBet = 0;
  rt.minRaise = rt.bigBlind;
  rt.lastAggressorSeat = null;

  // Reset per-street action tracking.
  for (const k of Object.keys(rt.actedThisRound)) rt.actedThisRound[Number(k)] = false;
}

/** First seat to act on a fresh street, or null when betting is over. */
export function firstToActPostflop(rt: HandRuntime): number | null {
  if (actionables(rt).length <= 1) return null;
  return nextActionableSeat(rt, rt.dealerSeat);
}

export function legalActionsFor(rt: HandRuntime, seatNo: number): ActionKind[] {
  const p = rt.players[seatNo];
  if (!p || p.hasFolded || p.isAllIn || p.stack === 0 || rt.finished) return [];

  const toCall = Math.max(0, rt.currentBet - p.bet);
  const actions: ActionKind[] = [];
  if (toCall > 0) {
    actions.push("FOLD", "CALL");
  } else {
    actions.push("CHECK");
  }
  if (rt.currentBet === 0) {
    actions.push("BET");
  } else if (p.stack > toCall) {
    actions.push("RAISE");
  }
  actions.push("ALL_IN");
  return actions;
}

/**
 * Applies one betting action to the runtime. Strict mode enforces the betting
 * rules; lenient mode (recorded hands) clamps amounts and accepts the line as
 * it was played.
 */
export function applyBettingAction(
  rt: HandRuntime,
  seat: SeatRuntime,
  action: ActionKind,
  amount: number,
  strict: boolean
) {
  const toCall = Math.max(0, rt.currentBet - seat.bet);

  if (action === "FOLD") {
    seat.hasFolded = true;
    rt.actedThisRound[seat.seatNo] = true;
    return;
  }

  if (action === "CHECK") {
    if (toCall !== 0 && strict) throw new EngineError("CANNOT_CHECK");
    rt.actedThisRound[seat.seatNo] = true;
    return;
  }

  if (action === "CALL") {
    commit(rt, seat, Math.min(toCall, seat.stack));
    rt.actedThisRound[seat.seatNo] = true;
    return;
  }

  let raiseTo = action === "ALL_IN" ? seat.bet + seat.stack : Number(amount);
  if (!Number.isFinite(raiseTo)) throw new EngineError("INVALID_RAISE");

  if (raiseTo <= rt.currentBet) {
    // An all-in for less than the current bet is a call.
    if (action === "ALL_IN" || !strict) {
      commit(rt, seat, Math.min(toCall, seat.stack));
      rt.actedThisRound[seat.seatNo] = true;
      return;
    }
    throw new EngineError("INVALID_RAISE");
  }

  const minTo = rt.currentBet === 0 ? rt.minRaise : rt.currentBet + rt.minRaise;

  // Allow all-in raises even if the requested amount is too high.
  let need = raiseTo - seat.bet;
  if (need > seat.stack) {
    raiseTo = seat.bet + seat.stack;
    need = seat.stack;
    if (raiseTo <= rt.currentBet) {
      commit(rt, seat, need);
      rt.actedThisRound[seat.seatNo] = true;
      return;
    }
  }

  const isAllInRaise = need === seat.stack;
  // Enforce minimum raise size unless it's an all-in raise (common poker rule).
  if (strict && raiseTo < minTo && !isAllInRaise) throw new EngineError("RAISE_TOO_SMALL");

  commit(rt, seat, need);

  // Update raise sizing info only when this is a "full" raise.
  if (raiseTo >= minTo) {
    rt.minRaise = raiseTo - rt.currentBet;
  }
  rt.currentBet = raiseTo;
  rt.lastAggressorSeat = seat.seatNo;

  // After a raise, everyone must get a new chance to respond.
  for (const k of Object.keys(rt.actedThisRound)) rt.actedThisRound[Number(k)] = false;
  rt.actedThisRound[seat.seatNo] = true;
}

function commit(rt: HandRuntime, seat: SeatRuntime, pay: number) {
  seat.stack -= pay;
  seat.bet += pay;
  seat.committed += pay;
  rt.pot.total += pay;
  if (seat.stack === 0) seat.isAllIn = true;
}
