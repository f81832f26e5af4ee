import { InvalidInputError } from "./errors";

/**
 * Strict positive integer id from a path segment or body field.
 * Rejects "12abc", "1.5", "-3" and empty values.
 */
export function parseId(value: unknown, name: string): number {
  const raw = typeof value === "number" ? String(value) : value;
  if (typeof raw !== "string" || !/^\d+$/.test(raw.trim())) {
    throw new InvalidInputError(`${name} must be a positive integer`);
  }
  const id = Number(raw.trim());
  if (!Number.isSafeInteger(id) || id <= 0) {
    throw new InvalidInputError(`${name} must be a positive integer`);
  }
  return id;
}

/** Narrow a parsed JSON body to a plain object. */
export function asBody(body: unknown): Record<string, unknown> {
  if (!body || typeof body !== "object" || Array.isArray(body)) {
    throw new InvalidInputError("Request body must be a JSON object");
  }
  return { ...body };
}
