/**
 * Structured logging for session debugging and anomaly trails.
 * Logs are JSON-formatted in production for easy ingestion by logging services.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export interface LogContext {
  sessionId?: string;
  handId?: string;
  seat?: number;
  action?: string;
  amount?: number;
  event?: string;
  [key: string]: unknown;
}

function isLogLevel(value: unknown): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

export class Logger {
  private level: LogLevel;
  private isProduction: boolean;

  constructor(env: NodeJS.ProcessEnv = process.env) {
    this.level = isLogLevel(env.LOG_LEVEL) ? env.LOG_LEVEL : "info";
    this.isProduction = env.NODE_ENV === "production";
  }

  setLevel(level: LogLevel) {
    this.level = level;
  }

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private format(level: LogLevel, message: string, context?: LogContext): string {
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...context,
    };

    if (this.isProduction) {
      // Production: JSON for log aggregators
      return JSON.stringify(entry);
    }
    // Development: human-readable
    const ctx = context ? ` ${JSON.stringify(context)}` : "";
    return `[${entry.timestamp}] ${level.toUpperCase()}: ${message}${ctx}`;
  }

  debug(message: string, context?: LogContext) {
    if (this.shouldLog("debug")) {
      console.log(this.format("debug", message, context));
    }
  }

  info(message: string, context?: LogContext) {
    if (this.shouldLog("info")) {
      console.log(this.format("info", message, context));
    }
  }

  warn(message: string, context?: LogContext) {
    if (this.shouldLog("warn")) {
      console.warn(this.format("warn", message, context));
    }
  }

  error(message: string, context?: LogContext) {
    if (this.shouldLog("error")) {
      console.error(this.format("error", message, context));
    }
  }

  // Specialized loggers for common events
  handLoaded(sessionId: string, handId: string, mode: string, seats: number[]) {
    this.info("Hand loaded", {
      event: "hand_loaded",
      sessionId,
      handId,
      mode,
      seatCount: seats.length,
      seats,
    });
  }

  sessionEvent(sessionId: string, topic: string, payload: Record<string, unknown>) {
    this.info("Session event", {
      event: topic,
      sessionId,
      ...payload,
    });
  }

  transitionRejected(handId: string, reason: string, message: string) {
    this.debug("Transition rejected", {
      event: "transition_rejected",
      handId,
      reason,
      message,
    });
  }

  regressionGuard(handId: string, message: string, seatsBefore: number) {
    this.warn("Regression guard tripped: seat map emptied or filled outside load/reset", {
      event: "regression_guard",
      handId,
      message,
      seatsBefore,
    });
  }

  commandFailed(command: string, err: unknown, context?: LogContext) {
    this.error("Command failed", {
      event: "command_failed",
      command,
      error: err instanceof Error ? err.message : String(err),
      ...context,
    });
  }

  unexpectedDriverCall(driver: string, operation: string, seat?: number) {
    this.warn("Unexpected driver call", {
      event: "driver_unexpected",
      driver,
      operation,
      seat,
    });
  }
}

export const logger = new Logger();
