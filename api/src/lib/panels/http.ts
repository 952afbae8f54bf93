// api/src/lib/panels/http.ts
import type { Response } from "express";
import { z } from "zod";
import { errorBody } from "./errors";

export const idSchema = z.coerce.number().int().positive();

/** Positive integer route param, or null when malformed. */
export function parseId(raw: string | undefined): number | null {
  const parsed = idSchema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function badId(res: Response, name: string) {
  return res.status(400).json({ error: "invalid_id", param: name });
}

export function invalidBody(res: Response, error: z.ZodError) {
  return res.status(400).json({ error: "invalid_body", details: error.flatten() });
}

/**
 * Structured errors keep their own status and body. Anything unexpected is
 * logged with the route label and reported as internal_error.
 */
export function sendError(res: Response, label: string, err: unknown) {
  const { status, body } = errorBody(err);
  if (status >= 500) console.error(`${label} error:`, err);
  return res.status(status).json(body);
}
