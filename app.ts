import express from "express";
import cors from "cors";
import helmet from "helmet";
import { Server } from "http";
import cookieParser from "cookie-parser";
import type { Express, Request, Response, NextFunction } from "express";

import settings from "./config/settings";
import db from "./config/db";
import { MySqlQuizRepository } from "./config/helpers/quizRepository";
import { MySqlMembershipDirectory } from "./config/helpers/membership";
import { AttemptService } from "./services/attemptService";

import health from "./routes/health";
import { createAttemptsRouter } from "./routes/attempts";
import { createAssignmentsRouter } from "./routes/assignments";
import { checkDbAvailability } from "./middleware/dbCheck";
import { errorHandler, notFoundHandler } from "./middleware/errorHandler";

export function createApp(service: AttemptService): Express {
  const app: Express = express();
  app.set("trust proxy", settings.trustProxy);

  const allowedList = settings.allowedOrigins;
  const allowedHosts: string[] = allowedList.map((entry) => {
    try {
      return new URL(entry).hostname;
    } catch {
      return entry; // keep non-URL entries as-is
    }
  });

  app.use((req: Request, res: Response, next: NextFunction): void => {
    const start: number = Date.now();
    const origin: string = req.headers.origin || "<none>";
    console.info(
      `[REQ START] ${new Date().toISOString()} ${req.ip} ${req.method} ${
        req.originalUrl
      } origin=${origin}`
    );

    res.on("finish", () => {
      const dur = Date.now() - start;
      console.info(
        `[REQ END]   ${new Date().toISOString()} ${req.ip} ${req.method} ${
          req.originalUrl
        } status=${res.statusCode} dur=${dur}ms`
      );
    });

    next();
  });

  app.use(
    cors({
      origin: (
        origin: string | undefined,
        callback: (err: Error | null, allow?: boolean) => void
      ) => {
        // non-browser clients send no origin
        if (!origin) return callback(null, true);
        if (allowedList.includes(origin)) return callback(null, true);

        try {
          if (allowedHosts.includes(new URL(origin).hostname))
            return callback(null, true);
        } catch (err) {
          console.warn(
            `[CORS] unparseable origin=${origin} err=${
              err instanceof Error ? err.message : String(err)
            }`
          );
        }

        return callback(new Error("CORS: origin not allowed"), false);
      },
      credentials: true,
      methods: ["GET", "POST", "OPTIONS"],
      allowedHeaders: ["Content-Type", "Authorization"],
    })
  );

  app.use(express.json());
  app.use(cookieParser());

  app.use(
    helmet({
      contentSecurityPolicy: {
        useDefaults: true,
        directives: {
          defaultSrc: ["'self'"],
          connectSrc: ["'self'", settings.clientOrigin],
          frameAncestors: ["'none'"],
          formAction: ["'self'"],
        },
      },
      referrerPolicy: { policy: "no-referrer" },
      crossOriginEmbedderPolicy: false,
    })
  );

  app.use(checkDbAvailability);

  app.use("/health", health);
  app.use("/attempts", createAttemptsRouter(service));
  app.use("/assignments", createAssignmentsRouter(service));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}

let activeServer: Server | null = null;

function tryListen(app: Express, port: number, attemptsLeft: number): void {
  const server: Server = app.listen(port);
  server.on("listening", () => {
    activeServer = server;
    console.log(`Server listening in port ${port}`);
  });

  server.on("error", (err: NodeJS.ErrnoException) => {
    if (err.code === "EADDRINUSE") {
      console.warn(`PORT ${port} in use.`);
      server.close();

      if (attemptsLeft > 0) {
        const next = port + 1;
        console.log(`Trying port ${next} (${attemptsLeft - 1} attempts left)`);
        tryListen(app, next, attemptsLeft - 1);
      } else {
        console.error(
          `No available ports after ${settings.maxPortAttempts} attempts. Exiting`
        );
        process.exit(1);
      }
    } else {
      console.error("Server error:", err);
      process.exit(1);
    }
  });
}

export function main(): void {
  process.on("unhandledRejection", (reason: unknown) => {
    console.error("unhandledRejection:", reason);
  });
  process.on("uncaughtException", (err: Error) => {
    console.error("uncaughtException:", err);
  });

  db.startDb();

  const service = new AttemptService({
    repository: new MySqlQuizRepository(),
    membership: new MySqlMembershipDirectory(),
  });

  tryListen(createApp(service), settings.port, settings.maxPortAttempts);

  process.once("SIGTERM", () => {
    console.info("SIGTERM received, closing server and DB pool");
    activeServer?.close();
    db.closeDb()
      .catch((err: unknown) => {
        console.error("DB pool close failed:", err);
      })
      .finally(() => process.exit(0));
  });
}
