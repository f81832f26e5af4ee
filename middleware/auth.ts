import jwt, { type JwtPayload } from "jsonwebtoken";
import { extractToken } from "../utils/authCookies";
import { ForbiddenError } from "../utils/errors";
import type { Request, Response, NextFunction } from "express";
import type { Requester, Role } from "../types/quiz";

/** Claims issued by the identity provider. */
export interface TokenPayload {
  userId: number;
  role: Role;
  email?: string;
  username?: string;
}

export interface AuthRequest extends Request {
  user?: TokenPayload;
}

const isRole = (value: unknown): value is Role =>
  value === "student" || value === "teacher";

/** Narrow a verified JWT body to the claims this service relies on. */
export function toTokenPayload(
  decoded: string | JwtPayload
): TokenPayload | null {
  if (typeof decoded === "string") return null;

  const userId = Number(decoded.userId);
  const role: unknown = decoded.role;
  if (!Number.isInteger(userId) || userId <= 0 || !isRole(role)) return null;

  return {
    userId,
    role,
    email: typeof decoded.email === "string" ? decoded.email : undefined,
    username:
      typeof decoded.username === "string" ? decoded.username : undefined,
  };
}

export const verifyToken = (
  req: Request,
  res: Response,
  next: NextFunction
): Response | void => {
  const token = extractToken(req);

  if (!token) {
    console.warn(
      `[AUTH] verifyToken FAIL: No token ${new Date().toISOString()} ${
        req.method
      } ${req.originalUrl}`
    );
    return res
      .status(401)
      .json({ success: false, message: "No token provided" });
  }

  const secret = process.env.JWT_SECRET;
  if (!secret) {
    console.error("[AUTH] verifyToken FAIL: JWT_SECRET not configured");
    return res
      .status(500)
      .json({ success: false, message: "Server misconfigured" });
  }

  try {
    const payload = toTokenPayload(jwt.verify(token, secret));
    if (!payload) {
      console.warn(
        `[AUTH] verifyToken FAIL: malformed claims ${req.method} ${req.originalUrl}`
      );
      return res
        .status(401)
        .json({ success: false, message: "Invalid or expired token" });
    }

    (req as AuthRequest).user = payload;
    console.info(
      `[AUTH] verifyToken OK: userId=${payload.userId} role=${payload.role} ${req.method} ${req.originalUrl}`
    );

    next();
  } catch (err) {
    const msg = err instanceof Error ? err.message : "Invalid token";
    console.warn(
      `[AUTH] verifyToken FAIL: ${msg} ${req.method} ${req.originalUrl}`
    );

    return res.status(401).json({
      success: false,
      message: "Invalid or expired token",
      error: msg,
    });
  }
};

/** The verified caller, as passed into every attempt operation. */
export function requesterOf(req: AuthRequest): Requester {
  if (!req.user) throw new ForbiddenError("Not authenticated");
  return { id: req.user.userId, role: req.user.role };
}
