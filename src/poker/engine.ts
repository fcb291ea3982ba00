import type { HandData } from "../core/hand.schema";
import { msg } from "../core/messages";
import type { HandFinishedMsg, SeatSnapshot, TableSnapshot, Winner } from "../core/messages";
import { BOARD_SIZE, nextStreet, streetForBoard, streetIndex } from "../core/model";
import type { Card, Street } from "../core/model";
import type { EnginePort } from "../core/ports";
import {
  applyBettingAction,
  firstToActPostflop,
  isRoundSettled,
  legalActionsFor,
  nextActionableSeat,
  onlyOneLeft,
  resetBets,
} from "./actions";
import { draw, remainingDeck } from "./cards";
import type { Rng } from "./cards";
import { EngineError } from "./errors";
import { pokerEvaluator, resolveShowdown } from "./showdown";
import type { HandEvaluator } from "./showdown";
import type { ApplyInput, EngineOutcome, HandRuntime, SeatRuntime } from "./types";

export type EngineOptions = {
  evaluate?: HandEvaluator;
  rng?: Rng;
};

/**
 * Server-authoritative betting runtime for one session. Operations are
 * serialized; each resolves with the table state the core should adopt.
 */
export class PokerEngine implements EnginePort {
  private rt: HandRuntime | null = null;
  private queue: Promise<unknown> = Promise.resolve();
  private readonly evaluate: HandEvaluator;
  private readonly rng: Rng;

  constructor(options: EngineOptions = {}) {
    this.evaluate = options.evaluate ?? pokerEvaluator;
    this.rng = options.rng ?? Math.random;
  }

  load(hand: HandData): Promise<TableSnapshot> {
    return this.exclusive(async () => {
      const players: Record<number, SeatRuntime> = {};
      const actedThisRound: Record<number, boolean> = {};
      const known: Card[] = [...hand.board, ...hand.runout];
      for (const s of hand.seats) {
        players[s.seat] = {
          seatNo: s.seat,
          playerUid: s.playerUid,
          name: s.name,
          position: s.position,
          stack: s.stack,
          bet: s.chipsInFront,
          committed: s.chipsInFront,
          isAllIn: s.allIn,
          hasFolded: s.folded,
          holeCards: [...s.cards],
        };
        actedThisRound[s.seat] = false;
        known.push(...s.cards);
      }

      const bets = hand.seats.map((s) => s.chipsInFront);
      const rt: HandRuntime = {
        handId: hand.handId,
        round: streetForBoard(hand.board.length) ?? "PREFLOP",
        dealerSeat: hand.dealerSeat ?? Math.min(...hand.seats.map((s) => s.seat)),
        currentTurnSeat: hand.toActSeat,
        deck: remainingDeck(known, this.rng),
        board: [...hand.board],
        runout: [...hand.runout],
        pot: { total: Math.max(hand.pot, bets.reduce((sum, b) => sum + b, 0)) },
        currentBet: Math.max(0, ...bets),
        minRaise: hand.bigBlind,
        bigBlind: hand.bigBlind,
        lastAggressorSeat: null,
        actedThisRound,
        players,
        finished: false,
      };
      this.rt = rt;
      return toSnapshot(rt);
    });
  }

  apply(input: ApplyInput): Promise<EngineOutcome> {
    return this.exclusive(async () => {
      const rt = this.require();
      if (rt.finished) throw new EngineError("HAND_OVER");
      const seat = rt.players[input.seat];
      if (!seat) throw new EngineError("NOT_YOUR_TURN", `seat ${input.seat} is empty`);

      if (input.scripted) {
        // Recorded line: trust it, and leave hand completion to the recording.
        this.catchUp(rt, input.street);
        if (!seat.hasFolded) applyBettingAction(rt, seat, input.action, input.amount, false);
        rt.currentTurnSeat =
          onlyOneLeft(rt) !== null || isRoundSettled(rt) ? null : nextActionableSeat(rt, seat.seatNo);
        return msg.actionApplied(toSnapshot(rt));
      }

      if (seat.hasFolded) throw new EngineError("ALREADY_FOLDED");
      if (rt.currentTurnSeat !== seat.seatNo) throw new EngineError("NOT_YOUR_TURN");
      applyBettingAction(rt, seat, input.action, input.amount, true);

      // win by everyone folding
      const winnerByFold = onlyOneLeft(rt);
      if (winnerByFold !== null) return this.finishByFold(rt, winnerByFold);

      rt.currentTurnSeat = isRoundSettled(rt) ? null : nextActionableSeat(rt, seat.seatNo);
      return msg.actionApplied(toSnapshot(rt));
    });
  }

  /** Deals the next street once betting settled, or resolves the showdown after the river. */
  continue(): Promise<EngineOutcome> {
    return this.exclusive(async () => {
      const rt = this.require();
      if (rt.finished) throw new EngineError("HAND_OVER");
      if (rt.currentTurnSeat !== null && !isRoundSettled(rt)) throw new EngineError("ROUND_NOT_SETTLED");

      const winnerByFold = onlyOneLeft(rt);
      if (winnerByFold !== null) return this.finishByFold(rt, winnerByFold);

      if (rt.round === "RIVER" || rt.round === "SHOWDOWN") {
        rt.round = "SHOWDOWN";
        const { winners } = await resolveShowdown(rt, this.evaluate);
        for (const w of winners) rt.players[w.seatNo].stack += w.payout;
        const paid: Winner[] = winners.map((w) => ({ seat: w.seatNo, amount: w.payout }));
        return this.finish(rt, paid);
      }

      const next = nextStreet(rt.round);
      resetBets(rt);
      this.dealTo(rt, next);
      rt.round = next;
      rt.currentTurnSeat = firstToActPostflop(rt);
      return msg.streetAdvanced(next, [...rt.board], toSnapshot(rt));
    });
  }

  /** Moves the runtime onto a street whose board is already known. */
  syncStreet(street: Street, board: readonly Card[]): Promise<TableSnapshot> {
    return this.exclusive(async () => {
      const rt = this.require();
      if (streetIndex(street) > streetIndex(rt.round)) {
        resetBets(rt);
        rt.round = street;
      }
      const used = new Set(board);
      rt.board = [...board];
      rt.runout = rt.runout.filter((c) => !used.has(c));
      rt.deck = rt.deck.filter((c) => !used.has(c));
      rt.currentTurnSeat = firstToActPostflop(rt);
      return toSnapshot(rt);
    });
  }

  snapshot(): TableSnapshot | null {
    return this.rt ? toSnapshot(this.rt) : null;
  }

  dispose(): Promise<void> {
    return this.exclusive(async () => {
      this.rt = null;
    });
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.catch(() => undefined);
    return run;
  }

  private require(): HandRuntime {
    if (!this.rt) throw new EngineError("NO_HAND_LOADED");
    return this.rt;
  }

  private catchUp(rt: HandRuntime, street: Street) {
    while (streetIndex(rt.round) < streetIndex(street) && streetIndex(rt.round) < streetIndex("RIVER")) {
      const next = nextStreet(rt.round);
      resetBets(rt);
      this.dealTo(rt, next);
      rt.round = next;
    }
  }

  // Recorded runout first, then the shuffled deck.
  private dealTo(rt: HandRuntime, street: Street) {
    const need = BOARD_SIZE[street] - rt.board.length;
    if (need <= 0) return;
    const recorded = rt.runout.splice(0, need);
    const d = draw(rt.deck, need - recorded.length);
    rt.deck = d.rest;
    rt.board.push(...recorded, ...d.drawn);
  }

  private finishByFold(rt: HandRuntime, winnerSeat: number): HandFinishedMsg {
    const amount = rt.pot.total;
    rt.players[winnerSeat].stack += amount;
    return this.finish(rt, [{ seat: winnerSeat, amount }]);
  }

  private finish(rt: HandRuntime, winners: Winner[]): HandFinishedMsg {
    for (const p of Object.values(rt.players)) p.bet = 0;
    rt.pot.total = 0;
    rt.currentBet = 0;
    rt.currentTurnSeat = null;
    rt.round = "DONE";
    rt.finished = true;
    return msg.handFinished(winners, toSnapshot(rt));
  }
}

export function toSnapshot(rt: HandRuntime): TableSnapshot {
  const seats: Record<number, SeatSnapshot> = {};
  for (const p of Object.values(rt.players)) {
    seats[p.seatNo] = {
      playerUid: p.playerUid,
      name: p.name,
      stack: p.stack,
      chipsInFront: p.bet,
      folded: p.hasFolded,
      allIn: p.isAllIn,
      cards: [...p.holeCards],
      position: p.position,
    };
  }
  return {
    street: rt.round,
    board: [...rt.board],
    pot: rt.pot.total,
    toActSeat: rt.currentTurnSeat,
    legalActions: rt.currentTurnSeat === null ? [] : legalActionsFor(rt, rt.currentTurnSeat),
    seats,
  };
}
