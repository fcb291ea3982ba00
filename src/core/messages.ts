import type { HandData } from "./hand.schema";
import type { ActionKind, Card, LastAction, SeatState, SessionMode, Street } from "./model";

export type SeatSnapshot = Readonly<Omit<SeatState, "acting">>;

/** Authoritative table state reported by the engine after it applies something. */
export type TableSnapshot = Readonly<{
  street: Street;
  board: readonly Card[];
  pot: number;
  toActSeat: number | null;
  legalActions: readonly ActionKind[];
  seats: Readonly<Record<number, SeatSnapshot>>;
}>;

export type Winner = Readonly<{ seat: number; amount: number }>;

export type Decision = Readonly<{
  seat: number;
  action: ActionKind;
  amount: number;
  /** Street the action was recorded on; replay scripts carry it. */
  street?: Street;
  frequency?: number;
  rationale?: string;
}>;

export type LoadHandMsg = {
  type: "LOAD_HAND";
  hand: HandData;
  mode: SessionMode;
  humanSeat: number | null;
};

export type ResetMsg = { type: "RESET" };

/** "Advance requested" from a control. */
export type NextPressedMsg = { type: "NEXT_PRESSED" };

/** Autoplay tick; ignored unless `token` still equals the model's txId. */
export type AutoAdvanceMsg = { type: "AUTO_ADVANCE"; token: number };

export type ToggleAutoplayMsg = { type: "TOGGLE_AUTOPLAY"; on: boolean };

export type SetStepDelayMsg = { type: "SET_STEP_DELAY"; ms: number };

export type UserChoseMsg = { type: "USER_CHOSE"; action: ActionKind; amount: number };

export type DecisionReadyMsg = { type: "DECISION_READY"; decision: Decision; scripted: boolean };

/**
 * Engine replies echo the `token` of the command that asked for them and are
 * dropped once the model's txId has moved past it (new hand, seek, reset).
 * A null token marks a message no engine request produced, such as a
 * scripted street.
 */
export type ActionAppliedMsg = { type: "ACTION_APPLIED"; snapshot: TableSnapshot; token: number | null };

export type StreetAdvancedMsg = {
  type: "STREET_ADVANCED";
  street: Street;
  board: readonly Card[];
  /** Null when the event comes from a replay script rather than the engine. */
  snapshot: TableSnapshot | null;
  token: number | null;
};

export type HandFinishedMsg = {
  type: "HAND_FINISHED";
  winners: readonly Winner[];
  snapshot: TableSnapshot | null;
  token: number | null;
};

export type TableSyncedMsg = { type: "TABLE_SYNCED"; snapshot: TableSnapshot; token: number | null };

export type EngineRejectedMsg = {
  type: "ENGINE_REJECTED";
  code: string;
  /** Engine state after the failure, so offers for the acting seat come back. */
  snapshot: TableSnapshot | null;
  token: number | null;
};

export type AnimationFinishedMsg = { type: "ANIMATION_FINISHED"; token: number };

export type SeekReviewMsg = { type: "SEEK_REVIEW"; index: number };

export type SetReviewPausedMsg = { type: "SET_REVIEW_PAUSED"; paused: boolean };

export type ReplayRestoredMsg = {
  type: "REPLAY_RESTORED";
  cursor: number;
  snapshot: TableSnapshot;
  lastAction: LastAction | null;
  token: number;
};

export type ThemeChangedMsg = { type: "THEME_CHANGED"; themeId: string };

export type BannerExpiredMsg = { type: "BANNER_EXPIRED"; id: number };

export type Msg =
  | LoadHandMsg
  | ResetMsg
  | NextPressedMsg
  | AutoAdvanceMsg
  | ToggleAutoplayMsg
  | SetStepDelayMsg
  | UserChoseMsg
  | DecisionReadyMsg
  | ActionAppliedMsg
  | StreetAdvancedMsg
  | HandFinishedMsg
  | TableSyncedMsg
  | EngineRejectedMsg
  | AnimationFinishedMsg
  | SeekReviewMsg
  | SetReviewPausedMsg
  | ReplayRestoredMsg
  | ThemeChangedMsg
  | BannerExpiredMsg;

export type MsgType = Msg["type"];

/** Messages allowed to empty (or first populate) the seats of a hand. */
export const RESET_MESSAGES: ReadonlySet<MsgType> = new Set<MsgType>(["LOAD_HAND", "RESET"]);

export const msg = {
  loadHand: (hand: HandData, mode: SessionMode, humanSeat: number | null = null): LoadHandMsg => ({
    type: "LOAD_HAND",
    hand,
    mode,
    humanSeat,
  }),
  reset: (): ResetMsg => ({ type: "RESET" }),
  nextPressed: (): NextPressedMsg => ({ type: "NEXT_PRESSED" }),
  autoAdvance: (token: number): AutoAdvanceMsg => ({ type: "AUTO_ADVANCE", token }),
  toggleAutoplay: (on: boolean): ToggleAutoplayMsg => ({ type: "TOGGLE_AUTOPLAY", on }),
  setStepDelay: (ms: number): SetStepDelayMsg => ({ type: "SET_STEP_DELAY", ms }),
  userChose: (action: ActionKind, amount = 0): UserChoseMsg => ({ type: "USER_CHOSE", action, amount }),
  decisionReady: (decision: Decision, scripted = false): DecisionReadyMsg => ({
    type: "DECISION_READY",
    decision,
    scripted,
  }),
  actionApplied: (snapshot: TableSnapshot, token: number | null = null): ActionAppliedMsg => ({
    type: "ACTION_APPLIED",
    snapshot,
    token,
  }),
  streetAdvanced: (
    street: Street,
    board: readonly Card[],
    snapshot: TableSnapshot | null = null,
    token: number | null = null
  ): StreetAdvancedMsg => ({
    type: "STREET_ADVANCED",
    street,
    board,
    snapshot,
    token,
  }),
  handFinished: (
    winners: readonly Winner[],
    snapshot: TableSnapshot | null = null,
    token: number | null = null
  ): HandFinishedMsg => ({
    type: "HAND_FINISHED",
    winners,
    snapshot,
    token,
  }),
  tableSynced: (snapshot: TableSnapshot, token: number | null = null): TableSyncedMsg => ({
    type: "TABLE_SYNCED",
    snapshot,
    token,
  }),
  engineRejected: (code: string, snapshot: TableSnapshot | null = null, token: number | null = null): EngineRejectedMsg => ({
    type: "ENGINE_REJECTED",
    code,
    snapshot,
    token,
  }),
  animationFinished: (token: number): AnimationFinishedMsg => ({ type: "ANIMATION_FINISHED", token }),
  seekReview: (index: number): SeekReviewMsg => ({ type: "SEEK_REVIEW", index }),
  setReviewPaused: (paused: boolean): SetReviewPausedMsg => ({ type: "SET_REVIEW_PAUSED", paused }),
  replayRestored: (
    cursor: number,
    snapshot: TableSnapshot,
    lastAction: LastAction | null,
    token: number
  ): ReplayRestoredMsg => ({ type: "REPLAY_RESTORED", cursor, snapshot, lastAction, token }),
  themeChanged: (themeId: string): ThemeChangedMsg => ({ type: "THEME_CHANGED", themeId }),
  bannerExpired: (id: number): BannerExpiredMsg => ({ type: "BANNER_EXPIRED", id }),
} as const;
