import path from "path";
import { describe, expect, it, vi } from "vitest";
import { AudioService, SILENT_CONFIG, loadSoundConfig } from "../services/audio.service";
import type { AudioSink } from "../services/audio.service";
import { TimedAnimator } from "../services/animation.service";
import { ManualScheduler, quietLogger } from "./helpers";

function fakeSink() {
  const sink = {
    play: vi.fn(async (_file: string) => undefined),
    speak: vi.fn(async (_text: string) => undefined),
  };
  const typed: AudioSink = sink;
  return { sink, typed };
}

describe("AudioService", () => {
  const config = { soundsEnabled: true, soundDirectory: "sounds", sounds: { FOLD: "actions/fold.wav" } };

  it("plays the file mapped to a cue", async () => {
    const { sink, typed } = fakeSink();
    await new AudioService(config, typed, quietLogger).play("FOLD");
    expect(sink.play).toHaveBeenCalledWith(path.join("sounds", "actions/fold.wav"));
  });

  it("skips unknown cues", async () => {
    const { sink, typed } = fakeSink();
    await new AudioService(config, typed, quietLogger).play("FANFARE");
    expect(sink.play).not.toHaveBeenCalled();
  });

  it("stays quiet when sounds are disabled", async () => {
    const { sink, typed } = fakeSink();
    const audio = new AudioService({ ...config, soundsEnabled: false }, typed, quietLogger);
    await audio.play("FOLD");
    await audio.speak("Bob wins 8");
    expect(sink.play).not.toHaveBeenCalled();
    expect(sink.speak).not.toHaveBeenCalled();
  });

  it("speaks announcements", async () => {
    const { sink, typed } = fakeSink();
    await new AudioService(config, typed, quietLogger).speak("Bob wins 8");
    expect(sink.speak).toHaveBeenCalledWith("Bob wins 8");
  });
});

describe("loadSoundConfig", () => {
  it("reads the bundled mapping", () => {
    const loaded = loadSoundConfig(path.join(process.cwd(), "config", "sounds.json"), quietLogger);
    expect(loaded.soundsEnabled).toBe(true);
    expect(loaded.sounds.WINNER).toBe("table/winner.wav");
  });

  it("disables audio when the file is missing", () => {
    expect(loadSoundConfig(path.join(process.cwd(), "config", "missing.json"), quietLogger)).toEqual(SILENT_CONFIG);
  });
});

describe("TimedAnimator", () => {
  it("announces the effect and settles after its duration", async () => {
    const scheduler = new ManualScheduler();
    const listener = vi.fn();
    const animator = new TimedAnimator(scheduler, 100, listener);
    const effect = { kind: "DEAL_STREET" as const, street: "FLOP" as const, board: ["2S", "7H", "9D"] };

    let done = false;
    const finished = animator.animate(effect, 7).then(() => {
      done = true;
    });
    expect(listener).toHaveBeenCalledWith(effect, 7, 200);

    scheduler.advance(199);
    await Promise.resolve();
    expect(done).toBe(false);
    scheduler.advance(1);
    await finished;
    expect(done).toBe(true);
  });
});
