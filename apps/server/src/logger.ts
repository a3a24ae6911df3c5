import pino from "pino";
import type { NextFunction, Request, Response } from "express";
import { validateEnv } from "@shared/env";

const env = validateEnv(process.env);

export const logger = pino({
  name: "tradebook",
  level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
  redact: ["password", "token", "headers.cookie"],
  ...(env.NODE_ENV === "development"
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname,name",
          },
        },
      }
    : {}),
});

export interface HttpLoggerOptions {
  /** Paths logged at trace only, e.g. health probes. */
  quietPaths?: string[];
}

export function createHttpLogger(options: HttpLoggerOptions = {}) {
  const quiet = new Set(options.quietPaths ?? []);

  return (req: Request, res: Response, next: NextFunction) => {
    const start = process.hrtime.bigint();
    res.on("finish", () => {
      const entry = {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Number((process.hrtime.bigint() - start) / 1_000_000n),
      };

      if (quiet.has(req.path)) {
        logger.trace(entry, "probe");
      } else if (res.statusCode >= 500) {
        logger.error(entry, "request failed");
      } else if (res.statusCode >= 400) {
        logger.warn(entry, "request rejected");
      } else {
        logger.debug(entry, "request");
      }
    });
    next();
  };
}
