import express, { type Request, type Response } from "express";
import db from "../config/db";

const router = express.Router();

// Liveness stays 200 while the pool reconnects; X-DB-Status and `db` carry
// the database state.
router.get("/", (req: Request, res: Response) => {
  res.json({
    success: true,
    status: "ok",
    db: db.isDbAvailable() ? "available" : "unavailable",
    uptime_seconds: Math.floor(process.uptime()),
    timestamp: new Date().toISOString(),
  });
});

export default router;
