// backend/services/shared/http/errors.ts
/**
 * Error carrying an HTTP status and a stable machine code.
 * Thrown from handlers/services; formatted by errorProblemJson().
 */
export class HttpError extends Error {
  readonly status: number;
  readonly code: string;
  readonly errors?: unknown[];

  constructor(status: number, message: string, code = "BAD_REQUEST", errors?: unknown[]) {
    super(message);
    this.name = "HttpError";
    this.status = status;
    this.code = code;
    this.errors = errors;
  }
}

export const notFoundError = (what = "Resource") =>
  new HttpError(404, `${what} not found`, "NOT_FOUND");
