import { z } from "zod";
import { fromZodError } from "./errors";

// null and absent both mean "not supplied"
const optionalText = z
  .string()
  .nullish()
  .transform((value) => value ?? undefined);

export const ItemCreateSchema = z.object({
  title: z.string().min(1, "title must not be empty"),
  description: optionalText,
  status: optionalText,
});

export const ItemUpdateSchema = z.object({
  title: z
    .string()
    .min(1, "title must not be empty")
    .nullish()
    .transform((value) => value ?? undefined),
  description: optionalText,
  status: optionalText,
});

export const MAX_PAGING_VALUE = 2_147_483_647;

// Missing and empty values both land on 0, which paging normalizes.
const pagingNumber = z.coerce.number().int().nonnegative().max(MAX_PAGING_VALUE).default(0);

export const ListQuerySchema = z.object({
  page: pagingNumber,
  limit: pagingNumber,
});

export const ItemIdSchema = z.coerce.number().int().positive();

/** Parses `input` or throws a 400 carrying the zod issues. */
export function parseOrBadRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) throw fromZodError(result.error);
  return result.data;
}
