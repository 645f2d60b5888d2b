/**
 * ─────────────────────────────────────────────────────────
 * Seeds the to_do_items table with sample data, for local
 * runs and load testing of the list endpoint.
 *
 * Usage:
 *   npm run seed
 *   npm run seed -- --count 50000
 *
 * Creates the table when missing, then inserts in batches
 * of 500. Roughly one item in ten is soft-deleted.
 * ─────────────────────────────────────────────────────────
 */

import { loadConfig } from "../src/config";
import { createPool, ITEMS_TABLE, migrate } from "../src/db";
import { createLogger } from "../src/logger";

const BATCH_SIZE = 500;

const VERBS = ["Buy", "Fix", "Call", "Write", "Review", "Clean", "Plan", "Book", "Send", "Read"];
const NOUNS = [
  "milk", "the bike", "grandma", "report", "pull request", "kitchen",
  "trip", "dentist", "invoice", "chapter 3", "garage", "newsletter",
];
const STATUSES = ["open", "open", "open", "doing", "done", "done", "open", "doing", "done", "deleted"];

function parseCount(argv: string[]): number {
  const idx = argv.indexOf("--count");
  const value = idx >= 0 ? Number(argv[idx + 1]) : 1000;
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`--count must be a positive integer, got ${argv[idx + 1]}`);
  }
  return value;
}

function randomItem<T>(arr: readonly T[]): T {
  return arr[Math.floor(Math.random() * arr.length)];
}

function generateItem(index: number): [string, string, string] {
  const title = `${randomItem(VERBS)} ${randomItem(NOUNS)}`;
  return [title, `Seeded item #${index}`, STATUSES[index % STATUSES.length]];
}

async function seed(): Promise<void> {
  const config = loadConfig();
  const logger = createLogger({ level: config.LOG_LEVEL, nodeEnv: config.NODE_ENV });
  const total = parseCount(process.argv);
  const pool = createPool(config, logger);

  try {
    await migrate(pool);
    logger.info(`Seeding ${total} items into ${ITEMS_TABLE}`);
    const startTime = Date.now();

    let inserted = 0;
    for (let start = 0; start < total; start += BATCH_SIZE) {
      const size = Math.min(BATCH_SIZE, total - start);

      // VALUES ($1, $2, $3), ($4, $5, $6), ...
      const placeholders: string[] = [];
      const values: string[] = [];
      for (let i = 0; i < size; i++) {
        const base = i * 3;
        placeholders.push(`($${base + 1}, $${base + 2}, $${base + 3})`);
        values.push(...generateItem(start + i));
      }

      const { rowCount } = await pool.query(
        `INSERT INTO ${ITEMS_TABLE} (title, description, status) VALUES ${placeholders.join(", ")}`,
        values,
      );
      inserted += rowCount ?? 0;
      logger.debug({ inserted, total }, "Batch inserted");
    }

    const elapsed = (Date.now() - startTime) / 1000;
    logger.info({ inserted, seconds: elapsed }, "Seeding done");
  } finally {
    await pool.end();
  }
}

seed().catch((err: unknown) => {
  console.error("Seed failed:", err);
  process.exit(1);
});
