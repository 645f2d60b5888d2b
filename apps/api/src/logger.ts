import pino, { type Logger } from "pino";

export type { Logger };

// ─── Logger ───────────────────────────────────────────────
// Pretty output in development, raw JSON everywhere else.
export function createLogger(opts: { level: string; nodeEnv: string }): Logger {
  return pino({
    level: opts.level,
    transport:
      opts.nodeEnv === "development" ? { target: "pino-pretty" } : undefined,
  });
}
