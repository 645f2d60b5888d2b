import type { ZodError } from "zod";

export class AppError extends Error {
  statusCode: number;
  constructor(message: string, statusCode = 400, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "AppError";
    this.statusCode = statusCode;
  }
}

export class BadRequestError extends AppError {
  constructor(message = "Bad request", options?: { cause?: unknown }) {
    super(message, 400, options);
    this.name = "BadRequestError";
  }
}

export class NotFoundError extends AppError {
  constructor(message = "Item not found", options?: { cause?: unknown }) {
    super(message, 404, options);
    this.name = "NotFoundError";
  }
}

/** Collapses zod issues into one line, e.g. `title: Required; status: Expected string`. */
export function fromZodError(err: ZodError): BadRequestError {
  const message = err.issues
    .map((issue) =>
      issue.path.length ? `${issue.path.join(".")}: ${issue.message}` : issue.message,
    )
    .join("; ");
  return new BadRequestError(message);
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

// body-parser attaches `type` and `status` to the errors it raises
interface BodyParserError extends Error {
  type: string;
  status: number;
}

export function isBodyParserError(err: unknown): err is BodyParserError {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string" &&
    "status" in err &&
    typeof err.status === "number"
  );
}
