import express, { type Express, type NextFunction, type Request, type Response } from "express";
import compression from "compression";
import helmet from "helmet";
import { randomUUID } from "crypto";
import type { ApiError } from "@todolist/types";
import { AppError, isBodyParserError } from "./errors";
import type { Logger } from "./logger";
import { createHealthRouter, createItemRouter } from "./routes";
import type { ItemStore } from "./store";

export interface AppDeps {
  store: ItemStore;
  logger: Logger;
  jsonLimit?: string;
}

export function createApp({ store, logger, jsonLimit = "100kb" }: AppDeps): Express {
  const app = express();

  app.use(helmet());
  app.use(compression());
  app.use(express.json({ limit: jsonLimit }));

  // Request ID + access log
  app.use((req: Request, res: Response, next: NextFunction) => {
    const requestId = req.get("x-request-id") || randomUUID();
    const start = process.hrtime.bigint();
    res.setHeader("x-request-id", requestId);
    res.locals.requestId = requestId;

    res.on("finish", () => {
      logger.info({
        requestId,
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        durationMs: Number(process.hrtime.bigint() - start) / 1_000_000,
      });
    });
    next();
  });

  app.use(createHealthRouter(store, logger));
  app.use("/api/v1/items", createItemRouter(store));

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ error: "Route not found" } satisfies ApiError);
  });

  // Error handler
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const requestId: unknown = res.locals.requestId;

    if (err instanceof AppError) {
      if (err.cause) logger.debug({ err: err.cause, requestId }, err.message);
      res.status(err.statusCode).json({ error: err.message } satisfies ApiError);
      return;
    }

    if (isBodyParserError(err)) {
      const status = err.status === 413 ? 413 : 400;
      res.status(status).json({ error: err.message } satisfies ApiError);
      return;
    }

    logger.error({ err, requestId }, "Unhandled error");
    res.status(500).json({ error: "Internal server error" } satisfies ApiError);
  });

  return app;
}
