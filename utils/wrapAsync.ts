import type { Request, Response, NextFunction, RequestHandler } from "express";
import { QuizError } from "./errors";

type AsyncRequestHandler =
  | ((req: Request, res: Response, next: NextFunction) => void)
  | ((req: Request, res: Response, next: NextFunction) => Response)
  | ((
      req: Request,
      res: Response,
      next: NextFunction
    ) => Promise<void | Response>);

/** Forward a rejected handler promise to the error middleware. */
export default function wrapAsync(fn: AsyncRequestHandler): RequestHandler {
  return function (req: Request, res: Response, next: NextFunction): void {
    Promise.resolve(fn(req, res, next)).catch((err: unknown) => {
      if (err instanceof QuizError) {
        console.warn(
          `[ROUTE] ${req.method} ${req.originalUrl} rejected kind=${err.kind} msg=${err.message}`
        );
      } else {
        console.error(
          `[ROUTE ERROR] ${new Date().toISOString()} ${req.ip} ${req.method} ${
            req.originalUrl
          } err=${err instanceof Error ? err.stack ?? err.message : String(err)}`
        );
      }
      next(err);
    });
  };
}
