import fs from "fs";
import path from "path";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event?(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_RANK: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

const logDir = path.join(process.cwd(), "logs");
const logFile = path.join(logDir, "app.log");

function isThreshold(value: string): value is keyof typeof LEVEL_RANK {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, value);
}

// Read on every write so LOG_LEVEL set after import still applies.
function threshold(): number {
  const configured = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isThreshold(configured) ? LEVEL_RANK[configured] : LEVEL_RANK.info;
}

function fileLoggingEnabled(): boolean {
  return (process.env.LOG_TO_FILE || "true").toLowerCase() !== "false";
}

function ensureLogDir(): void {
  if (!fs.existsSync(logDir)) {
    fs.mkdirSync(logDir, { recursive: true });
  }
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < threshold()) {
    return;
  }

  if (level === "error") {
    console.error(entry);
  } else {
    console.log(entry);
  }

  if (!fileLoggingEnabled()) {
    return;
  }

  try {
    ensureLogDir();
    fs.appendFileSync(logFile, JSON.stringify(entry) + "\n", {
      encoding: "utf-8",
    });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

/**
 * JSON-line logger used across the gateway and the engine adapters.
 *
 * - `log()` records `{ timestamp, level, message, ...meta }`.
 * - `event()` records `{ timestamp, type, ...payload }` at info level.
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    writeEntry("info", {
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  if (typeof logger.event === "function") {
    logger.event(type, payload);
    return;
  }

  logger.log("info", type, payload);
}

export function describeError(error: unknown): { message: string; name?: string } {
  if (error instanceof Error) {
    return { message: error.message, name: error.name };
  }
  return { message: String(error) };
}
