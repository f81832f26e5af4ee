import dotenv from "dotenv";
import type { Request } from "express";

dotenv.config();

export const isProd = process.env.NODE_ENV === "production";

export const AUTH_COOKIE_NAME = isProd ? "_HOST-token" : "token";

function bearerToken(header: string | undefined): string | null {
  if (!header) return null;
  const match = /^Bearer\s+(.+)$/i.exec(header.trim());
  return match ? match[1].trim() : null;
}

/**
 * Token from, in order: the auth cookie, the Authorization header,
 * or a `?token=` query parameter for clients that cannot set headers.
 */
export function extractToken(req: Request): string | null {
  const fromCookie: unknown = req.cookies?.[AUTH_COOKIE_NAME];
  if (typeof fromCookie === "string" && fromCookie) return fromCookie;

  const fromHeader = bearerToken(req.headers.authorization);
  if (fromHeader) return fromHeader;

  const fromQuery = req.query?.token;
  return typeof fromQuery === "string" && fromQuery ? fromQuery : null;
}
