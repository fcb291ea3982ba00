import fs from "fs";
import path from "path";
import { z } from "zod";
import type { AudioPort } from "../core/ports";
import { logger } from "../lib/logger";
import type { Logger } from "../lib/logger";

const soundConfigSchema = z.object({
  soundsEnabled: z.boolean().default(true),
  soundDirectory: z.string().default("sounds"),
  sounds: z.record(z.string(), z.string()).default({}),
});

export type SoundConfig = z.infer<typeof soundConfigSchema>;

/** Whatever actually produces audio: a desktop mixer, a client push, a log. */
export interface AudioSink {
  play(file: string): Promise<void>;
  speak(text: string): Promise<void>;
}

export const SILENT_CONFIG: SoundConfig = { soundsEnabled: false, soundDirectory: "sounds", sounds: {} };

export function loggingSink(log: Logger = logger): AudioSink {
  return {
    async play(file) {
      log.debug("Play sound", { event: "sound", file });
    },
    async speak(text) {
      log.debug("Speak", { event: "speech", text });
    },
  };
}

/**
 * Reads the sound mapping (cue name -> file). A missing or malformed file
 * leaves audio disabled.
 */
export function loadSoundConfig(file: string, log: Logger = logger): SoundConfig {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(file, "utf8"));
  } catch (err) {
    log.warn("Sound config unavailable, audio disabled", {
      file,
      error: err instanceof Error ? err.message : String(err),
    });
    return SILENT_CONFIG;
  }
  const parsed = soundConfigSchema.safeParse(json);
  if (!parsed.success) {
    log.warn("Sound config invalid, audio disabled", { file, issues: parsed.error.issues.length });
    return SILENT_CONFIG;
  }
  return parsed.data;
}

export class AudioService implements AudioPort {
  constructor(
    private readonly config: SoundConfig,
    private readonly sink: AudioSink = loggingSink(),
    private readonly log: Logger = logger
  ) {}

  static fromFile(file: string, sink?: AudioSink): AudioService {
    return new AudioService(loadSoundConfig(file), sink);
  }

  resolve(sound: string): string | null {
    const file = this.config.sounds[sound];
    return file ? path.join(this.config.soundDirectory, file) : null;
  }

  async play(sound: string): Promise<void> {
    if (!this.config.soundsEnabled) return;
    const file = this.resolve(sound);
    if (!file) {
      this.log.warn("Unknown sound", { event: "sound_unknown", sound });
      return;
    }
    await this.sink.play(file);
  }

  async speak(text: string): Promise<void> {
    if (!this.config.soundsEnabled || !text) return;
    await this.sink.speak(text);
  }
}
