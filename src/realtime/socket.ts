import type { Server as HttpServer } from "http";
import { Server } from "socket.io";
import { logger } from "../lib/logger";
import type { SessionService } from "../services/session.service";
import { registerSessionGateway } from "./session.gateway";

export function buildSocketServer(httpServer: HttpServer, sessions: SessionService, corsOrigin?: string) {
  const io = new Server(httpServer, {
    cors: { origin: corsOrigin ?? "*" },
  });

  io.on("connection", (socket) => {
    logger.debug("Socket connected", { event: "socket_connected", socketId: socket.id });
    registerSessionGateway(socket, sessions);
  });

  return io;
}
