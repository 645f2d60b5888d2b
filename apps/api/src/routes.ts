import { Router, type Request, type RequestHandler } from "express";
import type { ApiResponse, Item, Paging } from "@todolist/types";
import { BadRequestError, NotFoundError, errorMessage } from "./errors";
import type { Logger } from "./logger";
import { normalizePaging, pagingOffset } from "./paging";
import {
  ItemCreateSchema,
  ItemIdSchema,
  ItemUpdateSchema,
  ListQuerySchema,
  parseOrBadRequest,
} from "./schemas";
import { toItem, type ItemRow, type ItemStore } from "./store";

// Ids that are not positive integers can never match a row.
function parseItemId(raw: string): number {
  const parsed = ItemIdSchema.safeParse(raw);
  if (!parsed.success) throw new NotFoundError();
  return parsed.data;
}

// body-parser turns an empty body into {}; only a non-empty JSON body counts.
function requireJsonBody(req: Pick<Request, "is" | "get">): void {
  if (!req.is("application/json") || req.get("content-length") === "0") {
    throw new BadRequestError("request body must be JSON");
  }
}

// Lookup failures of any kind surface as 404.
async function findOrNotFound(store: ItemStore, id: number): Promise<ItemRow> {
  let row: ItemRow | null;
  try {
    row = await store.findById(id);
  } catch (err) {
    throw new NotFoundError("Item not found", { cause: err });
  }
  if (!row) throw new NotFoundError();
  return row;
}

// Write failures surface as 400 with the storage message.
async function write<T>(op: () => Promise<T>): Promise<T> {
  try {
    return await op();
  } catch (err) {
    throw new BadRequestError(errorMessage(err), { cause: err });
  }
}

// ─── Handlers ─────────────────────────────────────────────
export const createItem =
  (store: ItemStore): RequestHandler =>
  async (req, res, next) => {
    try {
      requireJsonBody(req);
      const input = parseOrBadRequest(ItemCreateSchema, req.body);
      const id = await write(() => store.insert(input));

      res
        .status(201)
        .json({ message: "Item created successfully", data: id } satisfies ApiResponse<number>);
    } catch (err) {
      next(err);
    }
  };

export const getItem =
  (store: ItemStore): RequestHandler<{ id: string }> =>
  async (req, res, next) => {
    try {
      const row = await findOrNotFound(store, parseItemId(req.params.id));
      res.json({ data: toItem(row) } satisfies ApiResponse<Item>);
    } catch (err) {
      next(err);
    }
  };

// LIST: newest first, soft-deleted rows hidden. `total` counts every row.
export const listItems =
  (store: ItemStore): RequestHandler =>
  async (req, res, next) => {
    try {
      const paging = normalizePaging(parseOrBadRequest(ListQuerySchema, req.query));

      const [total, rows] = await write(() =>
        Promise.all([store.countAll(), store.listPage(paging.limit, pagingOffset(paging))]),
      );

      res.json({
        data: rows.map(toItem),
        paging: { ...paging, total } satisfies Paging,
      } satisfies ApiResponse<Item[]>);
    } catch (err) {
      next(err);
    }
  };

export const updateItem =
  (store: ItemStore): RequestHandler<{ id: string }> =>
  async (req, res, next) => {
    try {
      requireJsonBody(req);
      const patch = parseOrBadRequest(ItemUpdateSchema, req.body);
      const id = parseItemId(req.params.id);
      await findOrNotFound(store, id);

      const updated = await write(() => store.update(id, patch));
      if (!updated) throw new NotFoundError();

      res.json({ message: "Item updated successfully" });
    } catch (err) {
      next(err);
    }
  };

// Soft delete: the row stays, its status becomes "deleted".
export const deleteItem =
  (store: ItemStore): RequestHandler<{ id: string }> =>
  async (req, res, next) => {
    try {
      const id = parseItemId(req.params.id);
      await findOrNotFound(store, id);

      const deleted = await write(() => store.softDelete(id));
      if (!deleted) throw new NotFoundError();

      res.json({ message: "Item deleted successfully" });
    } catch (err) {
      next(err);
    }
  };

// ─── Routers ──────────────────────────────────────────────
export function createItemRouter(store: ItemStore): Router {
  const router = Router();

  router.get("/", listItems(store));
  router.post("/", createItem(store));
  router.get("/:id", getItem(store));
  router.put("/:id", updateItem(store));
  router.delete("/:id", deleteItem(store));

  return router;
}

export function createHealthRouter(store: ItemStore, logger: Logger): Router {
  const router = Router();

  router.get("/health", async (_req, res) => {
    try {
      await store.ping();
      res.json({ ok: true, db: "ok" });
    } catch (err) {
      logger.warn({ err }, "Database health check failed");
      res.status(503).json({ ok: false, db: "down" });
    }
  });

  return router;
}
