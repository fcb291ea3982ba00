import type { HandData } from "./hand.schema";
import type { Msg, Winner } from "./messages";
import type { ActionKind, Card, Street } from "./model";

export type AnimationEffect =
  | { kind: "ACTION"; seat: number; action: ActionKind; amount: number }
  | { kind: "DEAL_STREET"; street: Street; board: readonly Card[] }
  | { kind: "PUSH_POT"; winners: readonly Winner[] };

export type PlaySoundCmd = { type: "PLAY_SOUND"; sound: string };
export type SpeakCmd = { type: "SPEAK"; text: string };
export type AnimateCmd = { type: "ANIMATE"; effect: AnimationEffect; token: number };
export type AskDriverCmd = { type: "ASK_DRIVER_FOR_DECISION"; seat: number };
export type ApplyToEngineCmd = {
  type: "APPLY_TO_ENGINE";
  seat: number;
  action: ActionKind;
  amount: number;
  street: Street;
  scripted: boolean;
  /** txId the reply must still match; the same holds for the two engine commands below. */
  token: number;
};
export type ApplyContinueCmd = { type: "APPLY_CONTINUE"; token: number };
export type SyncEngineStreetCmd = { type: "SYNC_ENGINE_STREET"; street: Street; board: readonly Card[]; token: number };
export type LoadEngineCmd = { type: "LOAD_ENGINE"; hand: HandData };
export type RestoreReplayCmd = { type: "RESTORE_REPLAY"; index: number; token: number };
export type ScheduleTimerCmd = { type: "SCHEDULE_TIMER"; delayMs: number; message: Msg };
export type PublishEventCmd = { type: "PUBLISH_EVENT"; topic: string; payload: Record<string, unknown> };
export type FetchScriptedEventCmd = { type: "FETCH_SCRIPTED_EVENT"; index: number };

export type Cmd =
  | PlaySoundCmd
  | SpeakCmd
  | AnimateCmd
  | AskDriverCmd
  | ApplyToEngineCmd
  | ApplyContinueCmd
  | SyncEngineStreetCmd
  | LoadEngineCmd
  | RestoreReplayCmd
  | ScheduleTimerCmd
  | PublishEventCmd
  | FetchScriptedEventCmd;

export const cmd = {
  playSound: (sound: string): PlaySoundCmd => ({ type: "PLAY_SOUND", sound }),
  speak: (text: string): SpeakCmd => ({ type: "SPEAK", text }),
  animate: (effect: AnimationEffect, token: number): AnimateCmd => ({ type: "ANIMATE", effect, token }),
  askDriver: (seat: number): AskDriverCmd => ({ type: "ASK_DRIVER_FOR_DECISION", seat }),
  applyToEngine: (
    seat: number,
    action: ActionKind,
    amount: number,
    street: Street,
    scripted: boolean,
    token: number
  ): ApplyToEngineCmd => ({ type: "APPLY_TO_ENGINE", seat, action, amount, street, scripted, token }),
  applyContinue: (token: number): ApplyContinueCmd => ({ type: "APPLY_CONTINUE", token }),
  syncEngineStreet: (street: Street, board: readonly Card[], token: number): SyncEngineStreetCmd => ({
    type: "SYNC_ENGINE_STREET",
    street,
    board,
    token,
  }),
  loadEngine: (hand: HandData): LoadEngineCmd => ({ type: "LOAD_ENGINE", hand }),
  restoreReplay: (index: number, token: number): RestoreReplayCmd => ({ type: "RESTORE_REPLAY", index, token }),
  scheduleTimer: (delayMs: number, message: Msg): ScheduleTimerCmd => ({ type: "SCHEDULE_TIMER", delayMs, message }),
  publishEvent: (topic: string, payload: Record<string, unknown>): PublishEventCmd => ({
    type: "PUBLISH_EVENT",
    topic,
    payload,
  }),
  fetchScriptedEvent: (index: number): FetchScriptedEventCmd => ({ type: "FETCH_SCRIPTED_EVENT", index }),
} as const;

/** Sound cue for a dealt street; action cues use the action kind itself (see config/sounds.json). */
export function soundForStreet(street: Street): string {
  switch (street) {
    case "FLOP":
      return "DEAL_FLOP";
    case "TURN":
      return "DEAL_TURN";
    case "RIVER":
      return "DEAL_RIVER";
    case "SHOWDOWN":
    case "DONE":
    case "PREFLOP":
      return "SHOWDOWN";
  }
}
