import type { Pool } from "pg";
import type { Item, ItemCreate, ItemUpdate } from "@todolist/types";
import { ITEMS_TABLE } from "./db";

export const DELETED_STATUS = "deleted";
export const DEFAULT_STATUS = "open";

export type ItemRow = {
  id: number;
  title: string;
  description: string;
  status: string;
  created_at: Date;
  updated_at: Date | null;
};

// ─── Persistence Gateway ──────────────────────────────────
// Everything the handlers need from storage. Handlers receive an instance;
// nothing here is module-level state.
export interface ItemStore {
  insert(input: ItemCreate): Promise<number>;
  findById(id: number): Promise<ItemRow | null>;
  update(id: number, patch: ItemUpdate): Promise<boolean>;
  softDelete(id: number): Promise<boolean>;
  countAll(): Promise<number>;
  listPage(limit: number, offset: number): Promise<ItemRow[]>;
  ping(): Promise<void>;
}

const COLUMNS = "id, title, description, status, created_at, updated_at";
const UPDATABLE = ["title", "description", "status"] as const;

export class PgItemStore implements ItemStore {
  constructor(private readonly pool: Pool) {}

  async insert(input: ItemCreate): Promise<number> {
    const { rows } = await this.pool.query<{ id: number }>(
      `INSERT INTO ${ITEMS_TABLE} (title, description, status)
       VALUES ($1, $2, $3)
       RETURNING id`,
      [input.title, input.description ?? "", input.status ?? DEFAULT_STATUS],
    );
    return rows[0].id;
  }

  async findById(id: number): Promise<ItemRow | null> {
    const { rows } = await this.pool.query<ItemRow>(
      `SELECT ${COLUMNS} FROM ${ITEMS_TABLE} WHERE id = $1`,
      [id],
    );
    return rows[0] ?? null;
  }

  // Only keys carrying a value are written; updated_at is always bumped.
  async update(id: number, patch: ItemUpdate): Promise<boolean> {
    const sets: string[] = [];
    const values: unknown[] = [];

    for (const column of UPDATABLE) {
      const value = patch[column];
      if (value === undefined) continue;
      values.push(value);
      sets.push(`${column} = $${values.length}`);
    }
    sets.push("updated_at = NOW()");
    values.push(id);

    const { rows } = await this.pool.query<{ id: number }>(
      `UPDATE ${ITEMS_TABLE} SET ${sets.join(", ")}
       WHERE id = $${values.length}
       RETURNING id`,
      values,
    );
    return rows.length > 0;
  }

  softDelete(id: number): Promise<boolean> {
    return this.update(id, { status: DELETED_STATUS });
  }

  // Counts every row, soft-deleted ones included.
  async countAll(): Promise<number> {
    const { rows } = await this.pool.query<{ total: string | number }>(
      `SELECT COUNT(*) AS total FROM ${ITEMS_TABLE}`,
    );
    return Number(rows[0].total);
  }

  async listPage(limit: number, offset: number): Promise<ItemRow[]> {
    const { rows } = await this.pool.query<ItemRow>(
      `SELECT ${COLUMNS} FROM ${ITEMS_TABLE}
       WHERE status <> $1
       ORDER BY id DESC
       LIMIT $2 OFFSET $3`,
      [DELETED_STATUS, limit, offset],
    );
    return rows;
  }

  async ping(): Promise<void> {
    await this.pool.query("SELECT 1");
  }
}

/** Wire shape of a row: ISO timestamps, `updated_at` dropped while unset. */
export function toItem(row: ItemRow): Item {
  const item: Item = {
    id: row.id,
    title: row.title,
    description: row.description,
    status: row.status,
    created_at: new Date(row.created_at).toISOString(),
  };
  if (row.updated_at) item.updated_at = new Date(row.updated_at).toISOString();
  return item;
}
