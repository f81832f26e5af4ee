import type { Response } from "express";
import { requesterOf, type AuthRequest } from "../middleware/auth";
import type { AttemptService } from "../services/attemptService";
import { asBody, parseId } from "../utils/parse";

// ============================================================================
// Student-facing attempt handlers. Errors propagate to errorHandler through
// wrapAsync; nothing here catches a QuizError.
// ============================================================================

export function createAttemptControllers(service: AttemptService) {
  /**
   * Start or resume an attempt.
   * Response carries the questions without answer keys, in this attempt's order.
   */
  const startAttempt = async (req: AuthRequest, res: Response) => {
    const assignmentId = parseId(req.params.assignmentId, "assignmentId");
    const result = await service.startAttempt(assignmentId, requesterOf(req));

    res.status(result.resumed ? 200 : 201).json({ success: true, ...result });
  };

  /**
   * Body: { question_id, chosen_option: "A" | "B" | "C" | "D", time_taken_seconds }
   * The final answer of the set submits the attempt in the same call.
   */
  const recordAnswer = async (req: AuthRequest, res: Response) => {
    const attemptId = parseId(req.params.attemptId, "attemptId");
    const body = asBody(req.body);

    const result = await service.recordAnswer(attemptId, requesterOf(req), {
      question_id: parseId(body.question_id, "question_id"),
      chosen_option: body.chosen_option,
      time_taken_seconds: body.time_taken_seconds,
    });

    res.json({ success: true, ...result });
  };

  const submitAttempt = async (req: AuthRequest, res: Response) => {
    const attemptId = parseId(req.params.attemptId, "attemptId");
    const result = await service.submit(attemptId, requesterOf(req));

    res.json({
      success: true,
      message: result.already_submitted
        ? `Attempt already ${result.status.toLowerCase()}`
        : "Attempt submitted and graded",
      ...result,
    });
  };

  const getAttemptResult = async (req: AuthRequest, res: Response) => {
    const attemptId = parseId(req.params.attemptId, "attemptId");
    const result = await service.getAttemptResult(attemptId, requesterOf(req));

    res.json({ success: true, result });
  };

  const listMyAttempts = async (req: AuthRequest, res: Response) => {
    const attempts = await service.listMyAttempts(requesterOf(req));
    res.json({ success: true, attempts });
  };

  return {
    startAttempt,
    recordAnswer,
    submitAttempt,
    getAttemptResult,
    listMyAttempts,
  };
}
