import type { Request, Response, NextFunction } from "express";
import type { Logger } from "../utils/logger.js";

export function requestLog(logger: Logger) {
  return (req: Request, res: Response, next: NextFunction) => {
    const startedAt = Date.now();
    logger.info({
      msg: "Incoming request",
      method: req.method,
      url: req.url,
      ip: req.ip,
      userAgent: req.headers["user-agent"],
    });

    res.on("finish", () => {
      logger.info({
        msg: "Request completed",
        method: req.method,
        url: req.url,
        statusCode: res.statusCode,
        responseTimeMs: Date.now() - startedAt,
      });
    });

    next();
  };
}
