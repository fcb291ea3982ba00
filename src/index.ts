import "dotenv/config";
import { validateEnv, logEnvSummary } from "./config/env";

// Validate environment variables FIRST, before any other imports that depend on them.
const env = validateEnv();
logEnvSummary(env);

import express from "express";
import http from "http";
import cors from "cors";
import type { Server } from "socket.io";
import type { EventPublisher } from "./core/ports";
import { logger } from "./lib/logger";
import { broadcastEffect } from "./realtime/session.gateway";
import { buildSocketServer } from "./realtime/socket";
import { createRedis } from "./redis";
import { AudioService } from "./services/audio.service";
import { InMemoryEventBus, RedisEventBus } from "./services/event-bus.service";
import { SessionService } from "./services/session.service";
import { createSessionRoutes } from "./sessions.routes";

const allowedOrigin = env.CORS_ORIGIN ?? "http://localhost:3000";

const redis = env.REDIS_URL ? createRedis(env.REDIS_URL) : null;
const events: EventPublisher = redis ? new RedisEventBus(redis) : new InMemoryEventBus();

// Filled in once the socket server exists; effects before that have nobody to reach.
let io: Server | null = null;

const sessions = new SessionService({
  config: {
    stepDelayMs: env.STEP_DELAY_MS,
    botThinkMs: env.BOT_THINK_MS,
    animationMs: env.ANIMATION_MS,
    bannerTtlMs: env.BANNER_TTL_MS,
    defaultThemeId: env.DEFAULT_THEME_ID,
  },
  audio: AudioService.fromFile(env.SOUND_CONFIG_PATH),
  events,
  onEffect: (sessionId, effect, token, durationMs) => {
    if (io) broadcastEffect(io, sessionId, effect, token, durationMs);
  },
});

const app = express();

app.use(
  cors({
    origin: allowedOrigin,
    credentials: true,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
  })
);
app.use(express.json({ limit: "1mb" }));

app.get("/health", (_req: express.Request, res: express.Response) =>
  res.json({ ok: true, sessions: sessions.size })
);

app.use(createSessionRoutes(sessions));

const server = http.createServer(app);
io = buildSocketServer(server, sessions, allowedOrigin);

server.listen(env.PORT, () => {
  logger.info(`API listening on :${env.PORT}`, { event: "server_listening" });
});

// --- Graceful shutdown ---
async function shutdown(signal: string) {
  logger.info(`Received ${signal}, shutting down gracefully...`, { event: "shutdown" });
  io?.disconnectSockets(true);
  server.close(async () => {
    try {
      await sessions.disposeAll();
      if (redis) await redis.quit();
    } catch (err) {
      logger.error("Error during shutdown", {
        event: "shutdown_error",
        error: err instanceof Error ? err.message : String(err),
      });
    }
    process.exit(0);
  });
  setTimeout(() => { process.exit(1); }, 10_000).unref();
}

process.on("SIGTERM", () => void shutdown("SIGTERM"));
process.on("SIGINT", () => void shutdown("SIGINT"));
