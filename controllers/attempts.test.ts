import { beforeEach, describe, expect, it, vi } from "vitest";
import type { Response } from "express";
import type { AuthRequest, TokenPayload } from "../middleware/auth";
import { AttemptService } from "../services/attemptService";
import {
  ASSIGNMENT_ID,
  FakeClock,
  InMemoryMembershipDirectory,
  InMemoryQuizRepository,
  STUDENT_ID,
  TEACHER_ID,
  seedQuiz,
} from "../test/fakes";
import { InvalidInputError } from "../utils/errors";
import { createAttemptControllers } from "./attempts";
import { createAssignmentControllers } from "./assignments";

function mockResponse() {
  const res = { status: vi.fn(), json: vi.fn() };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

const asUser = (user: TokenPayload, parts: Partial<AuthRequest>) =>
  ({
    params: {},
    body: {},
    user,
    ...parts,
  }) as AuthRequest;

const asStudent = (parts: Partial<AuthRequest>) =>
  asUser({ userId: STUDENT_ID, role: "student" }, parts);

const asTeacher = (parts: Partial<AuthRequest>) =>
  asUser({ userId: TEACHER_ID, role: "teacher" }, parts);

describe("attempt controllers", () => {
  let service: AttemptService;

  beforeEach(() => {
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    const repository = new InMemoryQuizRepository();
    const membership = new InMemoryMembershipDirectory();
    seedQuiz(repository, membership);
    service = new AttemptService({
      repository,
      membership,
      now: new FakeClock().now,
    });
  });

  it("answers 201 on a new attempt and 200 on resume", async () => {
    const { startAttempt } = createAttemptControllers(service);
    const req = asStudent({ params: { assignmentId: String(ASSIGNMENT_ID) } });

    const first = mockResponse();
    await startAttempt(req, first as unknown as Response);
    expect(first.status).toHaveBeenCalledWith(201);
    expect(first.json).toHaveBeenCalledWith(
      expect.objectContaining({ success: true, attempt_id: 1, resumed: false })
    );

    const second = mockResponse();
    await startAttempt(req, second as unknown as Response);
    expect(second.status).toHaveBeenCalledWith(200);
  });

  it("records an answer from the request body", async () => {
    const { recordAnswer } = createAttemptControllers(service);
    await service.startAttempt(ASSIGNMENT_ID, { id: STUDENT_ID, role: "student" });

    const res = mockResponse();
    await recordAnswer(
      asStudent({
        params: { attemptId: "1" },
        body: { question_id: "11", chosen_option: "b", time_taken_seconds: 9 },
      }),
      res as unknown as Response
    );

    expect(res.json).toHaveBeenCalledWith({
      success: true,
      recorded: true,
      answered_count: 1,
      total_questions: 2,
      auto_submitted: false,
      submission: null,
    });
  });

  it("rejects a malformed path id before touching the service", async () => {
    const { submitAttempt } = createAttemptControllers(service);
    const submit = vi.spyOn(service, "submit");

    await expect(
      submitAttempt(
        asStudent({ params: { attemptId: "abc" } }),
        mockResponse() as unknown as Response
      )
    ).rejects.toBeInstanceOf(InvalidInputError);
    expect(submit).not.toHaveBeenCalled();
  });

  it("explains a repeated submit", async () => {
    const { submitAttempt } = createAttemptControllers(service);
    await service.startAttempt(ASSIGNMENT_ID, { id: STUDENT_ID, role: "student" });
    const req = asStudent({ params: { attemptId: "1" } });

    await submitAttempt(req, mockResponse() as unknown as Response);
    const res = mockResponse();
    await submitAttempt(req, res as unknown as Response);

    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({
        message: "Attempt already submitted",
        already_submitted: true,
      })
    );
  });

  it("serves the question bank to the classroom teacher", async () => {
    const { getQuestionBank } = createAssignmentControllers(service);
    const res = mockResponse();

    await getQuestionBank(
      asTeacher({ params: { assignmentId: String(ASSIGNMENT_ID) } }),
      res as unknown as Response
    );

    expect(res.json).toHaveBeenCalledWith(
      expect.objectContaining({
        success: true,
        assignment_id: ASSIGNMENT_ID,
        total_points: 3,
        has_attempts: false,
      })
    );
  });
});
