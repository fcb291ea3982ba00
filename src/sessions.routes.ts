/**
 * Session routes - factory function
 */

import express, { Request, Response } from "express";
import { z } from "zod";
import { logger } from "./lib/logger";
import { applyIntent, intentSchema, loadBodySchema } from "./services/session.intents";
import type { SessionService } from "./services/session.service";

const createBodySchema = z.object({
  sessionId: z.string().min(1).max(64).optional(),
});

export function createSessionRoutes(sessions: SessionService) {
  const router = express.Router();

  /**
   * POST /sessions
   * Body: { sessionId?: string }
   */
  router.post("/sessions", (req: Request, res: Response) => {
    const parsed = createBodySchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ error: "INVALID_BODY", details: parsed.error.flatten() });
    }
    const session = sessions.create(parsed.data.sessionId);
    return res.status(201).json({ sessionId: session.id, props: session.props() });
  });

  /**
   * POST /sessions/:id/hand
   * Body: { mode, humanSeat?, autoplay?, hand }
   */
  router.post("/sessions/:id/hand", (req: Request, res: Response) => {
    const parsed = loadBodySchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "INVALID_BODY", details: parsed.error.flatten() });
    }
    if (!sessions.get(req.params.id)) {
      return res.status(404).json({ error: "SESSION_NOT_FOUND" });
    }

    const { hand, mode, humanSeat, autoplay } = parsed.data;
    const result = sessions.loadHand(req.params.id, hand, { mode, humanSeat, autoplay });
    if (!result.ok) {
      return res.status(400).json({ error: "INVALID_HAND", details: result.error });
    }
    return res.json({ sessionId: req.params.id, props: result.props });
  });

  /**
   * POST /sessions/:id/intents
   * Body: one intent, e.g. { type: "advance" } or { type: "seek", index: 3 }
   */
  router.post("/sessions/:id/intents", (req: Request, res: Response) => {
    const session = sessions.get(req.params.id);
    if (!session) return res.status(404).json({ error: "SESSION_NOT_FOUND" });

    const parsed = intentSchema.safeParse(req.body);
    if (!parsed.success) {
      return res.status(400).json({ error: "INVALID_BODY", details: parsed.error.flatten() });
    }
    applyIntent(session, parsed.data);
    return res.json({ props: session.props() });
  });

  router.get("/sessions/:id/props", (req: Request, res: Response) => {
    const session = sessions.get(req.params.id);
    if (!session) return res.status(404).json({ error: "SESSION_NOT_FOUND" });
    return res.json({ props: session.props() });
  });

  router.delete("/sessions/:id", async (req: Request, res: Response) => {
    try {
      const removed = await sessions.dispose(req.params.id);
      if (!removed) return res.status(404).json({ error: "SESSION_NOT_FOUND" });
      return res.status(204).end();
    } catch (err) {
      logger.error("Session dispose failed", {
        event: "session_dispose_error",
        sessionId: req.params.id,
        error: err instanceof Error ? err.message : String(err),
      });
      return res.status(500).json({ error: "Failed to dispose session" });
    }
  });

  return router;
}
