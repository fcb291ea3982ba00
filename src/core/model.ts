export const STREETS = ["PREFLOP", "FLOP", "TURN", "RIVER", "SHOWDOWN", "DONE"] as const;
export type Street = (typeof STREETS)[number];

export const ACTION_KINDS = ["FOLD", "CHECK", "CALL", "BET", "RAISE", "ALL_IN"] as const;
export type ActionKind = (typeof ACTION_KINDS)[number];

export type SessionMode = "PRACTICE" | "ADVISORY" | "REPLAY";

export type WaitingFor = "NONE" | "HUMAN_DECISION" | "BOT_DECISION" | "ANIMATION";

export type Card = string; // e.g. "AS" (Ace of Spades)

export type SeatState = Readonly<{
  playerUid: string;
  name: string;
  stack: number; // chips behind (not in front)
  chipsInFront: number; // chips committed this street
  folded: boolean;
  allIn: boolean;
  cards: readonly Card[];
  position: number;
  acting: boolean;
}>;

export type Seats = Readonly<Record<number, SeatState>>;

export type LastAction = Readonly<{
  seat: number;
  kind: ActionKind;
  amount: number;
  street: Street;
}>;

export type Hint = Readonly<{
  action: ActionKind;
  amount: number;
  /** How often the strategy takes this line, 0..1. */
  frequency: number;
  rationale: string;
}>;

export type BannerTone = "info" | "success" | "warning";

export type Banner = Readonly<{
  id: number;
  text: string;
  tone: BannerTone;
  ttlMs: number;
}>;

export type Model = Readonly<{
  handId: string;
  street: Street;
  toActSeat: number | null;
  pot: number;
  board: readonly Card[];
  seats: Seats;
  stacks: Readonly<Record<number, number>>;
  legalActions: readonly ActionKind[];
  /** Engine's offering for `toActSeat`, held while no decision is being awaited. */
  offeredActions: readonly ActionKind[];
  lastAction: LastAction | null;
  sessionMode: SessionMode;
  humanSeat: number | null;
  autoplayOn: boolean;
  stepDelayMs: number;
  waitingFor: WaitingFor;
  engineBusy: boolean;
  reviewCursor: number;
  reviewLength: number;
  reviewPaused: boolean;
  hint: Hint | null;
  banners: readonly Banner[];
  bannerSeq: number;
  bannerTtlMs: number;
  themeId: string;
  txId: number;
}>;

export type ModelOptions = {
  sessionMode?: SessionMode;
  themeId?: string;
  stepDelayMs?: number;
  autoplayOn?: boolean;
  bannerTtlMs?: number;
};

export const DEFAULT_THEME_ID = "forest-green-pro";
export const DEFAULT_STEP_DELAY_MS = 1000;
export const DEFAULT_BANNER_TTL_MS = 2500;

export function initialModel(options: ModelOptions = {}): Model {
  return {
    handId: "",
    street: "PREFLOP",
    toActSeat: null,
    pot: 0,
    board: [],
    seats: {},
    stacks: {},
    legalActions: [],
    offeredActions: [],
    lastAction: null,
    sessionMode: options.sessionMode ?? "REPLAY",
    humanSeat: null,
    autoplayOn: options.autoplayOn ?? false,
    stepDelayMs: options.stepDelayMs ?? DEFAULT_STEP_DELAY_MS,
    waitingFor: "NONE",
    engineBusy: false,
    reviewCursor: 0,
    reviewLength: 0,
    reviewPaused: false,
    hint: null,
    banners: [],
    bannerSeq: 0,
    bannerTtlMs: options.bannerTtlMs ?? DEFAULT_BANNER_TTL_MS,
    themeId: options.themeId ?? DEFAULT_THEME_ID,
    txId: 0,
  };
}

/** Board length each street must carry. */
export const BOARD_SIZE: Record<Street, number> = {
  PREFLOP: 0,
  FLOP: 3,
  TURN: 4,
  RIVER: 5,
  SHOWDOWN: 5,
  DONE: 5,
};

export function streetIndex(street: Street): number {
  return STREETS.indexOf(street);
}

export function streetForBoard(boardLength: number): Street | null {
  switch (boardLength) {
    case 0:
      return "PREFLOP";
    case 3:
      return "FLOP";
    case 4:
      return "TURN";
    case 5:
      return "RIVER";
    default:
      return null;
  }
}

/** Next betting street; SHOWDOWN follows the river. */
export function nextStreet(street: Street): Street {
  if (street === "PREFLOP") return "FLOP";
  if (street === "FLOP") return "TURN";
  if (street === "TURN") return "RIVER";
  if (street === "RIVER") return "SHOWDOWN";
  return "DONE";
}

export function isBoardConsistent(street: Street, board: readonly Card[]): boolean {
  // A hand can end early (everyone folded) with any board dealt so far.
  if (street === "DONE") return board.length <= 5;
  return board.length === BOARD_SIZE[street];
}

/** Canonical, duplicate-free ordering so action sets compare by value. */
export function actionSet(kinds: Iterable<ActionKind>): ActionKind[] {
  const wanted = new Set(kinds);
  return ACTION_KINDS.filter((k) => wanted.has(k));
}

export function seatNumbers(seats: Seats): number[] {
  return Object.keys(seats)
    .map(Number)
    .sort((a, b) => a - b);
}

export function seatCount(seats: Seats): number {
  return Object.keys(seats).length;
}

export function currentBet(seats: Seats): number {
  let max = 0;
  for (const seat of Object.values(seats)) max = Math.max(max, seat.chipsInFront);
  return max;
}

export function isHumanSeat(model: Model, seat: number): boolean {
  // Without a designated human seat the user studies every seat.
  return model.humanSeat === null || model.humanSeat === seat;
}
