// backend/services/shared/contracts/common.ts
import { z, type ZodError } from "zod";
import type { Response } from "express";
import { HttpError } from "../http/errors";

/** Mongo ObjectId (24 hex chars) */
export const zObjectId = z
  .string()
  .regex(/^[a-f0-9]{24}$/i, "Expected 24-hex Mongo ObjectId");

/**
 * Boolean that also accepts HTML form / multipart spellings.
 * ("true" | "false" | "on" | "off" | "1" | "0" | "yes" | "no")
 */
export const zFormBoolean = z.union([
  z.boolean(),
  z
    .string()
    .trim()
    .toLowerCase()
    .pipe(z.enum(["true", "false", "on", "off", "1", "0", "yes", "no"]))
    .transform((v) => v === "true" || v === "on" || v === "1" || v === "yes"),
]);

/** RFC 7807 Problem+JSON */
export const zProblem = z.object({
  type: z.string().default("about:blank"),
  title: z.string(),
  status: z.number().int(),
  detail: z.string().optional(),
  instance: z.string().optional(),
  code: z.string().optional(),
  errors: z.array(z.unknown()).optional(),
});
export type Problem = z.infer<typeof zProblem>;

export type ProblemIssue = { path: string; code: string; message: string };

export function zodIssues(error: ZodError): ProblemIssue[] {
  return error.issues.map((i) => ({
    path: i.path.join("."),
    code: i.code,
    message: i.message,
  }));
}

/** Problem+JSON helper for Zod validation errors */
export function zodBadRequest(res: Response, error: ZodError) {
  return res
    .status(400)
    .type("application/problem+json")
    .json({
      type: "about:blank",
      title: "Bad Request",
      status: 400,
      code: "VALIDATION_ERROR",
      detail: "Validation failed",
      errors: zodIssues(error),
    });
}

/**
 * Parse client input. A failure is the caller's fault: 400 with per-field
 * issues. Bare ZodErrors reaching the error handler are treated as 500s.
 */
export function parseRequest<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const parsed = schema.safeParse(input);
  if (!parsed.success) {
    throw new HttpError(400, "Validation failed", "VALIDATION_ERROR", zodIssues(parsed.error));
  }
  return parsed.data;
}

/** Strip undefined (stable wire format) */
export function clean(obj: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(Object.entries(obj).filter(([, v]) => v !== undefined));
}
