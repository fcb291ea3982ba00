import { randomUUID } from "crypto";
import type { AnimationEffect } from "../core/commands";
import { parseHand } from "../core/hand.schema";
import type { HandData, HandIssues } from "../core/hand.schema";
import { msg } from "../core/messages";
import { initialModel, seatNumbers } from "../core/model";
import type { ActionKind, Model, SessionMode } from "../core/model";
import type { AudioPort, EventPublisher, SchedulerPort } from "../core/ports";
import { createPropsSelector } from "../core/props";
import type { Props } from "../core/props";
import { Store } from "../core/store";
import type { RejectionHook } from "../core/store";
import type { StrategyProvider } from "../drivers/advisory.driver";
import { createSessionDriver } from "../drivers/session-driver";
import { logger } from "../lib/logger";
import type { Logger } from "../lib/logger";
import { TimerScheduler } from "../lib/scheduler";
import { PokerEngine } from "../poker/engine";
import type { HandEvaluator } from "../poker/showdown";
import { TimedAnimator } from "./animation.service";

export type SessionConfig = {
  stepDelayMs: number;
  botThinkMs: number;
  animationMs: number;
  bannerTtlMs: number;
  defaultThemeId: string;
};

export type SessionDeps = {
  config: SessionConfig;
  audio: AudioPort;
  events: EventPublisher;
  evaluate?: HandEvaluator;
  rng?: () => number;
  strategy?: StrategyProvider;
  createScheduler?: () => SchedulerPort;
  onEffect?: (sessionId: string, effect: AnimationEffect, token: number, durationMs: number) => void;
  onRejected?: RejectionHook;
  logger?: Logger;
};

export type LoadOptions = {
  mode: SessionMode;
  humanSeat?: number | null;
  autoplay?: boolean;
};

export type HandLoadResult = { ok: true; props: Props } | { ok: false; error: HandIssues };

/** One table being replayed or practised: a Store plus the engine and clock it drives. */
export class Session {
  private readonly selectProps = createPropsSelector();

  constructor(
    readonly id: string,
    readonly store: Store,
    readonly engine: PokerEngine,
    readonly clock: SchedulerPort
  ) {}

  model(): Model {
    return this.store.getModel();
  }

  props(): Props {
    return this.selectProps(this.store.getModel());
  }

  /** Calls `listener` with the current Props and again whenever they change by value. */
  onProps(listener: (props: Props) => void): () => void {
    const select = createPropsSelector();
    let last: Props | null = null;
    return this.store.subscribe((model) => {
      const props = select(model);
      if (props === last) return;
      last = props;
      listener(props);
    });
  }

  advance() {
    this.store.dispatch(msg.nextPressed());
  }

  toggleAutoplay(on: boolean) {
    this.store.dispatch(msg.toggleAutoplay(on));
  }

  setStepDelay(ms: number) {
    this.store.dispatch(msg.setStepDelay(ms));
  }

  choose(action: ActionKind, amount = 0) {
    this.store.dispatch(msg.userChose(action, amount));
  }

  seek(index: number) {
    this.store.dispatch(msg.seekReview(index));
  }

  pause(paused: boolean) {
    this.store.dispatch(msg.setReviewPaused(paused));
  }

  changeTheme(themeId: string) {
    this.store.dispatch(msg.themeChanged(themeId));
  }

  reset() {
    this.store.dispatch(msg.reset());
  }

  async dispose() {
    this.store.dispose();
    this.clock.cancelAll();
    await this.engine.dispose();
  }
}

export class SessionService {
  private readonly sessions = new Map<string, Session>();
  private readonly log: Logger;

  constructor(private readonly deps: SessionDeps) {
    this.log = deps.logger ?? logger;
  }

  create(sessionId: string = randomUUID()): Session {
    const existing = this.sessions.get(sessionId);
    if (existing) return existing;

    const { config } = this.deps;
    const scheduler = this.deps.createScheduler?.() ?? new TimerScheduler();
    const engine = new PokerEngine({ evaluate: this.deps.evaluate, rng: this.deps.rng });
    const onEffect = this.deps.onEffect;
    const animator = new TimedAnimator(
      scheduler,
      config.animationMs,
      onEffect ? (effect, token, durationMs) => onEffect(sessionId, effect, token, durationMs) : undefined
    );
    const store = new Store({
      sessionId,
      model: initialModel({
        themeId: config.defaultThemeId,
        stepDelayMs: config.stepDelayMs,
        bannerTtlMs: config.bannerTtlMs,
      }),
      collaborators: { audio: this.deps.audio, animator, engine, scheduler, events: this.deps.events },
      logger: this.log,
      onRejected: this.deps.onRejected,
    });

    const session = new Session(sessionId, store, engine, scheduler);
    this.sessions.set(sessionId, session);
    this.log.info("Session created", { event: "session_created", sessionId });
    return session;
  }

  get(sessionId: string): Session | undefined {
    return this.sessions.get(sessionId);
  }

  get size(): number {
    return this.sessions.size;
  }

  /** Validates the payload, installs the driver for `options.mode` and loads the hand. */
  loadHand(sessionId: string, raw: unknown, options: LoadOptions): HandLoadResult {
    const parsed = parseHand(raw);
    if (!parsed.ok) return { ok: false, error: parsed.error };

    const session = this.get(sessionId) ?? this.create(sessionId);
    this.install(session, parsed.hand, options);
    return { ok: true, props: session.props() };
  }

  async dispose(sessionId: string): Promise<boolean> {
    const session = this.sessions.get(sessionId);
    if (!session) return false;
    this.sessions.delete(sessionId);
    await session.dispose();
    this.log.info("Session disposed", { event: "session_disposed", sessionId });
    return true;
  }

  async disposeAll() {
    await Promise.all(Array.from(this.sessions.keys()).map((id) => this.dispose(id)));
  }

  private install(session: Session, hand: HandData, options: LoadOptions) {
    const driver = createSessionDriver(options.mode, hand, {
      scheduler: session.clock,
      botThinkMs: this.deps.config.botThinkMs,
      rng: this.deps.rng,
      strategy: this.deps.strategy,
      logger: this.log,
    });
    session.store.setSessionDriver(driver);
    if (options.autoplay !== undefined) session.toggleAutoplay(options.autoplay);
    session.store.dispatch(msg.loadHand(hand, options.mode, options.humanSeat ?? null));

    const model = session.model();
    this.log.handLoaded(session.id, hand.handId, options.mode, seatNumbers(model.seats));
  }
}
