import type { Response } from "express";
import { requesterOf, type AuthRequest } from "../middleware/auth";
import type { AttemptService } from "../services/attemptService";
import { parseId } from "../utils/parse";

// Teacher-facing reads over one assignment. All of them require the
// requester to be the teacher of the assignment's classroom.
export function createAssignmentControllers(service: AttemptService) {
  const getQuestionBank = async (req: AuthRequest, res: Response) => {
    const assignmentId = parseId(req.params.assignmentId, "assignmentId");
    const bank = await service.getQuestionBank(assignmentId, requesterOf(req));

    res.json({ success: true, ...bank });
  };

  const getStatistics = async (req: AuthRequest, res: Response) => {
    const assignmentId = parseId(req.params.assignmentId, "assignmentId");
    const statistics = await service.getAssignmentStatistics(
      assignmentId,
      requesterOf(req)
    );

    res.json({ success: true, statistics });
  };

  const getResults = async (req: AuthRequest, res: Response) => {
    const assignmentId = parseId(req.params.assignmentId, "assignmentId");
    const attempts = await service.getAssignmentResults(
      assignmentId,
      requesterOf(req)
    );

    res.json({ success: true, assignment_id: assignmentId, attempts });
  };

  return { getQuestionBank, getStatistics, getResults };
}
