import express from "express";
import { verifyToken } from "../middleware/auth";
import { requireDb } from "../middleware/dbCheck";
import { createAssignmentControllers } from "../controllers/assignments";
import type { AttemptService } from "../services/attemptService";
import wrapAsync from "../utils/wrapAsync";

export function createAssignmentsRouter(service: AttemptService) {
  const router = express.Router();
  const controllers = createAssignmentControllers(service);

  // app.ts mounts checkDbAvailability ahead of every router
  router.use(verifyToken, requireDb);

  // GET /assignments/:assignmentId/questions - answer key and point totals
  router.get("/:assignmentId/questions", wrapAsync(controllers.getQuestionBank));

  // GET /assignments/:assignmentId/statistics - aggregate and per-question stats
  router.get("/:assignmentId/statistics", wrapAsync(controllers.getStatistics));

  // GET /assignments/:assignmentId/results - every finished attempt
  router.get("/:assignmentId/results", wrapAsync(controllers.getResults));

  return router;
}
