import type { Card, Street } from "../core/model";
import type { EngineFeedback, EngineRequest } from "../core/ports";

export type SeatRuntime = {
  seatNo: number;
  playerUid: string;
  name: string;
  position: number;
  stack: number; // chips behind (not in bet)
  bet: number;   // chips committed this betting round
  /** Total chips committed to the pot for this hand (across all betting rounds). */
  committed: number;
  /** True once the player is all-in (stack==0 and not folded). */
  isAllIn: boolean;
  hasFolded: boolean;
  holeCards: Card[];
};

export type HandRuntime = {
  handId: string;
  round: Street;
  dealerSeat: number;
  /** Null while the betting round is settled and the engine waits for `continue`. */
  currentTurnSeat: number | null;
  deck: Card[];   // remaining deck
  board: Card[];
  /** Recorded future board cards, dealt before anything from the deck. */
  runout: Card[];
  pot: { total: number };
  currentBet: number;
  minRaise: number;
  bigBlind: number;
  lastAggressorSeat: number | null;
  /** Tracks whether each active seat has acted in the current betting round (street). */
  actedThisRound: Record<number, boolean>;
  players: Record<number, SeatRuntime>; // seatNo -> runtime
  finished: boolean;
};

/** BET and RAISE amounts are raise-to totals; scripted requests trust the seat. */
export type ApplyInput = EngineRequest;

export type EngineOutcome = EngineFeedback;
