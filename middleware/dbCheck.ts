import type { Request, Response, NextFunction } from "express";
import db from "../config/db";

export interface DbRequest extends Request {
  dbAvailable?: boolean;
}

/** Expose pool availability to handlers and in the X-DB-Status header. */
export const checkDbAvailability = (
  req: Request,
  res: Response,
  next: NextFunction,
): void => {
  const available = db.isDbAvailable();
  res.setHeader("X-DB-Status", available ? "available" : "unavailable");
  (req as DbRequest).dbAvailable = available;
  next();
};

export const requireDb = (
  req: Request,
  res: Response,
  next: NextFunction,
): void | Response => {
  if (!(req as DbRequest).dbAvailable) {
    return res.status(503).json({
      success: false,
      error: { kind: "Unavailable", message: "Database not available" },
    });
  }
  next();
};
