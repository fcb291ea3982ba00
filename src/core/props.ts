import { deepEqual } from "./equality";
import { seatNumbers } from "./model";
import type { ActionKind, Banner, Card, Hint, LastAction, Model, SeatState, SessionMode, Street, WaitingFor } from "./model";

export type SeatProps = Readonly<SeatState & { seat: number }>;

/** Everything a table view renders. Plain data, compared by value. */
export type Props = Readonly<{
  handId: string;
  street: Street;
  seats: readonly SeatProps[];
  board: readonly Card[];
  pot: number;
  toActSeat: number | null;
  legalActions: readonly ActionKind[];
  lastAction: LastAction | null;
  banners: readonly Banner[];
  themeId: string;
  autoplayOn: boolean;
  waitingFor: WaitingFor;
  reviewCursor: number;
  reviewLength: number;
  reviewPaused: boolean;
  sessionMode: SessionMode;
  hint: Hint | null;
}>;

export function toProps(model: Model): Props {
  return {
    handId: model.handId,
    street: model.street,
    seats: seatNumbers(model.seats).map((seat) => ({ seat, ...model.seats[seat] })),
    board: model.board,
    pot: model.pot,
    toActSeat: model.toActSeat,
    legalActions: model.legalActions,
    lastAction: model.lastAction,
    banners: model.banners,
    themeId: model.themeId,
    autoplayOn: model.autoplayOn,
    waitingFor: model.waitingFor,
    reviewCursor: model.reviewCursor,
    reviewLength: model.reviewLength,
    reviewPaused: model.reviewPaused,
    sessionMode: model.sessionMode,
    hint: model.hint,
  };
}

export const propsEqual = (a: Props, b: Props): boolean => deepEqual(a, b);

/**
 * Memoizing selector: returns the previously produced Props object whenever the
 * newly derived one is value-equal, so views can skip work on reference checks.
 */
export function createPropsSelector(): (model: Model) => Props {
  let lastModel: Model | null = null;
  let lastProps: Props | null = null;
  return (model) => {
    if (model === lastModel && lastProps) return lastProps;
    const next = toProps(model);
    lastModel = model;
    if (lastProps && propsEqual(lastProps, next)) return lastProps;
    lastProps = next;
    return next;
  };
}
