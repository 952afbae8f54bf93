// web/src/lib/api.ts

/**
 * Single source of truth for the browser app to know the API base.
 * Empty falls back to "/api", which next.config.ts rewrites to the API in dev.
 */
export const API_BASE = (process.env.NEXT_PUBLIC_API_BASE ?? "").replace(/\/+$/g, "");

/** A non-2xx answer from the API, with whatever body it sent. */
export class ApiError extends Error {
  readonly status: number;
  readonly details: unknown;

  constructor(message: string, status: number, details: unknown) {
    super(message);
    this.name = "ApiError";
    this.status = status;
    this.details = details;
  }

  /** The server's human-readable reason, falling back to its error code. */
  get reason(): string | null {
    if (!isRecord(this.details)) return typeof this.details === "string" ? this.details : null;
    const { reason, error } = this.details;
    if (typeof reason === "string" && reason) return reason;
    if (typeof error === "string" && error) return error;
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/* ------------------------------------------------------------------ */
/* JSON fetch helper                                                   */
/* ------------------------------------------------------------------ */

export async function apiFetch<T = unknown>(
  path: string,
  init: RequestInit & { json?: unknown } = {}
): Promise<T> {
  const cleanPath = (path || "").trim();
  const isAbsolute = /^https?:/i.test(cleanPath);
  const base = API_BASE || "/api";
  const url = isAbsolute ? cleanPath : `${base}${cleanPath.startsWith("/") ? "" : "/"}${cleanPath}`;

  const { json, ...rest } = init;
  const headers = new Headers(rest.headers);
  if (!headers.has("Accept")) headers.set("Accept", "application/json");

  let body = rest.body;
  if (json !== undefined) {
    body = JSON.stringify(json);
    if (!headers.has("Content-Type")) headers.set("Content-Type", "application/json");
  }

  const res = await fetch(url, { ...rest, headers, body });

  const text = await res.text();
  const parsed = text ? safeJson(text) : null;

  if (!res.ok) {
    const details = parsed ?? (text || null);
    throw new ApiError(`Request failed ${res.status} for ${url}`, res.status, details);
  }

  return parsed as T;
}

function safeJson(t: string): unknown {
  try {
    return JSON.parse(t);
  } catch {
    return null;
  }
}
