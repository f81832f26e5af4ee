import type { Request, Response, NextFunction } from "express";
import { DatabaseUnavailableError, QuizError } from "../utils/errors";

/**
 * Last middleware in the chain.
 *
 * - QuizError: its status code and `{ kind, message }`
 * - Database unavailable: 503
 * - Body parser rejects (malformed JSON): 400 InvalidInput
 * - Anything else: logged, 500
 */
export function errorHandler(
  err: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    next(err);
    return;
  }

  if (err instanceof QuizError) {
    res.status(err.statusCode).json({ success: false, error: err.toJSON() });
    return;
  }

  if (err instanceof DatabaseUnavailableError) {
    res.status(503).json({
      success: false,
      error: { kind: "Unavailable", message: err.message },
    });
    return;
  }

  if (
    err instanceof SyntaxError &&
    "type" in err &&
    err.type === "entity.parse.failed"
  ) {
    res.status(400).json({
      success: false,
      error: { kind: "InvalidInput", message: "Malformed JSON body" },
    });
    return;
  }

  console.error(
    `[UNHANDLED ERROR] ${new Date().toISOString()} ${req.method} ${
      req.originalUrl
    } err=${err instanceof Error ? err.stack ?? err.message : String(err)}`
  );
  res.status(500).json({
    success: false,
    error: { kind: "Internal", message: "Internal Server Error" },
  });
}

/** 404 for anything no router claimed. */
export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    success: false,
    error: { kind: "NotFound", message: `No route for ${req.method} ${req.path}` },
  });
}
