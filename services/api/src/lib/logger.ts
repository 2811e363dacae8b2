import type { NextFunction, Request, Response } from "express";
import { LogLevel, parseLogLevel } from "./settings";

export type LogMeta = Record<string, unknown>;

export type Logger = {
  debug(message: string, meta?: LogMeta): void;
  info(message: string, meta?: LogMeta): void;
  warn(message: string, meta?: LogMeta): void;
  error(message: string, meta?: LogMeta): void;
};

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

// Read per call so that LOG_LEVEL changes (tests, REPL) apply without a restart.
function enabled(level: LogLevel): boolean {
  return rank[level] >= rank[parseLogLevel(process.env.LOG_LEVEL)];
}

export function createLogger(scope: string): Logger {
  const write = (level: LogLevel, message: string, meta?: LogMeta) => {
    if (!enabled(level)) return;
    const line = `[${scope}] ${message}`;
    const sink = level === "error" ? console.error : level === "warn" ? console.warn : console.log;
    if (meta) sink(line, meta);
    else sink(line);
  };
  return {
    debug: (message, meta) => write("debug", message, meta),
    info: (message, meta) => write("info", message, meta),
    warn: (message, meta) => write("warn", message, meta),
    error: (message, meta) => write("error", message, meta)
  };
}

export function requestLogger(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    const path = req.path;
    logger.info("Starting request", { method: req.method, path });
    res.on("finish", () => {
      logger.info("Finished request", { method: req.method, path, status: res.statusCode, durationMs: Date.now() - start });
    });
    next();
  };
}
