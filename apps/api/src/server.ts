/**
 * ─────────────────────────────────────────────────────────
 *  To-do items API
 *  Stack: Node.js + TypeScript + Express + PostgreSQL (pg)
 * ─────────────────────────────────────────────────────────
 *
 *  Startup order: config → pool + schema → listen.
 *  Any failure before listening is fatal: one log line, exit 1.
 */

import { createApp } from "./app";
import { loadConfig, type AppConfig } from "./config";
import { connect } from "./db";
import { createLogger, type Logger } from "./logger";
import { PgItemStore } from "./store";

function fatal(logger: Logger, err: unknown, msg: string): never {
  logger.fatal({ err }, msg);
  process.exit(1);
}

async function main(): Promise<void> {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    fatal(createLogger({ level: "info", nodeEnv: "production" }), err, "Failed to load configuration");
  }

  const logger = createLogger({ level: config.LOG_LEVEL, nodeEnv: config.NODE_ENV });

  const pool = await connect(config, logger).catch((err: unknown) =>
    fatal(logger, err, "Failed to connect to database or migrate schema"),
  );

  const app = createApp({
    store: new PgItemStore(pool),
    logger,
    jsonLimit: config.JSON_BODY_LIMIT,
  });

  // ─── Graceful Shutdown ────────────────────────────────────
  const server = app.listen(config.PORT, () => {
    logger.info(`Items API listening on :${config.PORT}`);
  });
  server.on("error", (err) => fatal(logger, err, "Failed to start server"));

  const shutdown = (signal: string) => {
    logger.info(`${signal} received, shutting down`);
    server.close(() => {
      pool
        .end()
        .then(() => process.exit(0))
        .catch((err: unknown) => fatal(logger, err, "Failed to close database pool"));
    });
    setTimeout(() => process.exit(1), 10_000).unref();
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));
}

main().catch((err: unknown) => {
  console.error("Startup failed:", err);
  process.exit(1);
});
