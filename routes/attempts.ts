import express from "express";
import { verifyToken } from "../middleware/auth";
import { requireDb } from "../middleware/dbCheck";
import { createAttemptControllers } from "../controllers/attempts";
import type { AttemptService } from "../services/attemptService";
import wrapAsync from "../utils/wrapAsync";

export function createAttemptsRouter(service: AttemptService) {
  const router = express.Router();
  const controllers = createAttemptControllers(service);

  // app.ts mounts checkDbAvailability ahead of every router
  router.use(verifyToken, requireDb);

  // ============================================================================
  // ROUTE: GET /attempts/mine - Attempt history for the signed-in student
  // ============================================================================
  // Registered ahead of /:attemptId so "mine" is never parsed as an id.
  router.get("/mine", wrapAsync(controllers.listMyAttempts));

  // ============================================================================
  // ROUTE: POST /attempts/start/:assignmentId - Start or resume
  // ============================================================================
  router.post("/start/:assignmentId", wrapAsync(controllers.startAttempt));

  // ============================================================================
  // ROUTE: POST /attempts/:attemptId/answer - Record (or overwrite) an answer
  // ============================================================================
  router.post("/:attemptId/answer", wrapAsync(controllers.recordAnswer));

  // ============================================================================
  // ROUTE: POST /attempts/:attemptId/submit - Finalize and grade
  // ============================================================================
  router.post("/:attemptId/submit", wrapAsync(controllers.submitAttempt));

  // ============================================================================
  // ROUTE: GET /attempts/:attemptId/result - Role-aware attempt view
  // ============================================================================
  router.get("/:attemptId/result", wrapAsync(controllers.getAttemptResult));

  return router;
}
