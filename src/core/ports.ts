import type { AnimationEffect, ApplyToEngineCmd } from "./commands";
import type { HandData } from "./hand.schema";
import type { ActionAppliedMsg, HandFinishedMsg, StreetAdvancedMsg, TableSnapshot } from "./messages";
import type { Card, Street } from "./model";

export interface AudioPort {
  play(sound: string): Promise<void>;
  speak(text: string): Promise<void>;
}

export interface AnimatorPort {
  /** Resolves once the effect has played; rejects if it could not. */
  animate(effect: AnimationEffect, token: number): Promise<void>;
}

/** Drops one scheduled task if it has not run yet. */
export type CancelTask = () => void;

export interface SchedulerPort {
  schedule(delayMs: number, fn: () => void): CancelTask;
  cancelAll(): void;
}

export type EventPayload = Record<string, unknown>;

export interface EventPublisher {
  publish(topic: string, payload: EventPayload): Promise<void>;
}

export type EngineRequest = Omit<ApplyToEngineCmd, "type" | "token">;
export type EngineFeedback = ActionAppliedMsg | StreetAdvancedMsg | HandFinishedMsg;

export interface EnginePort {
  load(hand: HandData): Promise<TableSnapshot>;
  apply(request: EngineRequest): Promise<EngineFeedback>;
  continue(): Promise<EngineFeedback>;
  syncStreet(street: Street, board: readonly Card[]): Promise<TableSnapshot>;
  snapshot(): TableSnapshot | null;
}

export interface Collaborators {
  audio: AudioPort;
  animator: AnimatorPort;
  engine: EnginePort;
  scheduler: SchedulerPort;
  events: EventPublisher;
}
