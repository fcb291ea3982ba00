import type { HandData } from "./hand.schema";
import { msg } from "./messages";
import type { Msg } from "./messages";
import { BOARD_SIZE, nextStreet, streetForBoard, streetIndex } from "./model";
import type { Card, Street } from "./model";

const BETTING_STREETS: ReadonlySet<Street> = new Set<Street>(["PREFLOP", "FLOP", "TURN", "RIVER"]);

/**
 * Derives the scripted message sequence for a recorded hand: one scripted
 * DECISION_READY per logged action, a STREET_ADVANCED wherever the log crosses
 * into a later street (board taken from the recorded board and runout), and a
 * closing HAND_FINISHED once the hand is over.
 *
 * Pure: the same hand always yields the same script.
 */
export function buildReplayScript(hand: HandData): Msg[] {
  const script: Msg[] = [];
  const fullBoard: Card[] = [...hand.board, ...hand.runout];
  const folded = new Set(hand.seats.filter((s) => s.folded).map((s) => s.seat));
  let street: Street = streetForBoard(hand.board.length) ?? "PREFLOP";

  // Moves `street` forward one step at a time while the recorded board allows it.
  const advanceTo = (target: Street) => {
    while (streetIndex(street) < streetIndex(target)) {
      const next = nextStreet(street);
      const size = BOARD_SIZE[next];
      if (fullBoard.length < size) return;
      script.push(msg.streetAdvanced(next, fullBoard.slice(0, size)));
      street = next;
    }
  };

  for (const action of hand.actions) {
    if (!BETTING_STREETS.has(action.street)) continue;
    advanceTo(action.street);
    script.push(
      msg.decisionReady(
        { seat: action.seat, action: action.kind, amount: action.amount, street: action.street },
        true
      )
    );
    if (action.kind === "FOLD") folded.add(action.seat);
  }

  const remaining = hand.seats.filter((s) => !folded.has(s.seat)).length;
  if (remaining <= 1) {
    script.push(msg.handFinished(hand.winners));
    return script;
  }

  // Several players left: only a recorded result closes the hand.
  if (hand.winners.length === 0) return script;
  advanceTo("RIVER");
  if (street === "RIVER") advanceTo("SHOWDOWN");
  script.push(msg.handFinished(hand.winners));
  return script;
}

export function replayScriptLength(hand: HandData): number {
  return buildReplayScript(hand).length;
}
