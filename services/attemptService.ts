import type {
  Assignment,
  Attempt,
  AttemptStatus,
  Requester,
  TerminalStatus,
} from "../types/quiz";
import { isOptionLetter, isTerminal } from "../types/quiz";
import type { MembershipDirectory, QuizRepository } from "../types/store";
import {
  assignmentStatistics,
  durationSeconds,
  questionStatistics,
  scoreAttempt,
  scorePercentage,
  sumPoints,
  type AssignmentSummaryStatistics,
  type QuestionStatistics,
} from "./grading";
import {
  byOrderIndex,
  orderForAttempt,
  projectAttemptResult,
  toResultQuestion,
  toStudentQuestion,
  toTeacherQuestion,
  type AttemptResultView,
  type ResultQuestion,
  type StudentQuestion,
  type TeacherQuestion,
} from "./projector";
import {
  AlreadyCompletedError,
  AssignmentClosedError,
  ForbiddenError,
  InvalidAttemptStateError,
  InvalidInputError,
  InvalidOptionError,
  NotFoundError,
  QuestionMismatchError,
} from "../utils/errors";

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export interface StartAttemptResult {
  attempt_id: number;
  status: "IN_PROGRESS";
  started_at: Date;
  resumed: boolean;
  total_time_seconds: number;
  questions: StudentQuestion[];
}

export interface AnswerInput {
  question_id: number;
  chosen_option: unknown;
  time_taken_seconds: unknown;
}

export interface SubmitResult {
  attempt_id: number;
  status: TerminalStatus;
  total_score: number;
  max_possible_score: number;
  percentage: number | null;
  submitted_at: Date;
  already_submitted: boolean;
}

export interface RecordAnswerResult {
  recorded: true;
  answered_count: number;
  total_questions: number;
  auto_submitted: boolean;
  submission: SubmitResult | null;
}

export interface AssignmentStatisticsResult extends AssignmentSummaryStatistics {
  assignment_id: number;
  assignment_title: string;
  per_question_stats: QuestionStatistics[];
}

export interface AttemptDetail {
  attempt_id: number;
  student_id: number;
  student_name: string;
  status: AttemptStatus;
  started_at: Date;
  submitted_at: Date | null;
  total_score: number;
  max_possible_score: number;
  percentage: number | null;
  duration_seconds: number | null;
  responses: ResultQuestion[];
}

export interface AttemptSummary {
  attempt_id: number;
  assignment_id: number;
  assignment_title: string;
  status: AttemptStatus;
  started_at: Date;
  submitted_at: Date | null;
  total_score: number;
  max_possible_score: number;
  percentage: number | null;
}

export interface QuestionBankView {
  assignment_id: number;
  assignment_title: string;
  has_attempts: boolean;
  total_points: number;
  questions: TeacherQuestion[];
}

export interface AttemptServiceDeps {
  repository: QuizRepository;
  membership: MembershipDirectory;
  /** Injected for tests; defaults to the wall clock. */
  now?: () => Date;
}

const TERMINAL_STATUSES: readonly AttemptStatus[] = ["SUBMITTED", "LATE"];

// ============================================================================
// HELPERS
// ============================================================================

/** Open window is [opens_at, due_at] with null ends unbounded. */
export function isAssignmentOpen(assignment: Assignment, at: Date): boolean {
  if (assignment.opens_at && at < assignment.opens_at) return false;
  if (assignment.due_at && at > assignment.due_at) return false;
  return true;
}

/** LATE when a due date exists and the submission is after it. */
export function resolveTerminalStatus(
  assignment: Assignment,
  submittedAt: Date
): TerminalStatus {
  return assignment.due_at && submittedAt > assignment.due_at
    ? "LATE"
    : "SUBMITTED";
}

// upper bound of the INT UNSIGNED column
const MAX_TIME_TAKEN_SECONDS = 4_294_967_295;

const asTimeTaken = (value: unknown): number => {
  const n =
    typeof value === "string" && /^\d+$/.test(value.trim())
      ? Number(value.trim())
      : value;
  if (
    typeof n !== "number" ||
    !Number.isSafeInteger(n) ||
    n < 0 ||
    n > MAX_TIME_TAKEN_SECONDS
  ) {
    throw new InvalidInputError(
      `time_taken_seconds must be an integer from 0 to ${MAX_TIME_TAKEN_SECONDS}`
    );
  }
  return n;
};

const asOption = (value: unknown) => {
  const letter = typeof value === "string" ? value.trim().toUpperCase() : "";
  if (!isOptionLetter(letter)) throw new InvalidOptionError(value);
  return letter;
};

const submitSummary = (
  attempt: Attempt,
  status: TerminalStatus,
  submittedAt: Date,
  alreadySubmitted: boolean
): SubmitResult => ({
  attempt_id: attempt.id,
  status,
  total_score: attempt.total_score,
  max_possible_score: attempt.max_possible_score,
  percentage: scorePercentage(attempt.total_score, attempt.max_possible_score),
  submitted_at: submittedAt,
  already_submitted: alreadySubmitted,
});

// ============================================================================
// SERVICE
// ============================================================================

/**
 * Attempt lifecycle and grading.
 *
 * Every mutating operation runs inside a single repository transaction and
 * takes the attempt row lock before reading state, so a transition either
 * commits whole or not at all.
 */
export class AttemptService {
  private readonly repository: QuizRepository;
  private readonly membership: MembershipDirectory;
  private readonly now: () => Date;

  constructor({ repository, membership, now }: AttemptServiceDeps) {
    this.repository = repository;
    this.membership = membership;
    this.now = now ?? (() => new Date());
  }

  // ==== StartAttempt ====
  /**
   * Begin or resume the requester's attempt at an assignment.
   *
   * Checks, in order: student role, assignment exists, classroom membership,
   * no finished attempt, assignment open. An unfinished attempt is returned
   * as-is; otherwise a new one is created with the current point total as its
   * grading basis.
   */
  async startAttempt(
    assignmentId: number,
    requester: Requester
  ): Promise<StartAttemptResult> {
    if (requester.role !== "student") {
      throw new ForbiddenError("Only students can start attempts");
    }

    return this.repository.transaction(async (tx) => {
      const assignment = await tx.findAssignment(assignmentId);
      if (!assignment) throw new NotFoundError("Assignment", assignmentId);

      const member = await this.membership.isMember(
        assignment.classroom_id,
        requester.id
      );
      if (!member) {
        throw new ForbiddenError("Not a member of this classroom");
      }

      const existing = await tx.findAttemptFor(assignmentId, requester.id);
      if (existing && isTerminal(existing.status)) {
        throw new AlreadyCompletedError();
      }

      const now = this.now();
      if (!isAssignmentOpen(assignment, now)) {
        throw new AssignmentClosedError();
      }

      const questions = await tx.listQuestions(assignmentId);

      let attempt = existing;
      if (!attempt) {
        attempt = await tx.insertAttempt({
          assignment_id: assignmentId,
          student_id: requester.id,
          started_at: now,
          max_possible_score: sumPoints(questions),
        });
        // lost a race with a concurrent start that already finished
        if (isTerminal(attempt.status)) throw new AlreadyCompletedError();
        console.info(
          `[ATTEMPT] started id=${attempt.id} assignment=${assignmentId} student=${requester.id} max=${attempt.max_possible_score}`
        );
      } else {
        console.info(
          `[ATTEMPT] resumed id=${attempt.id} assignment=${assignmentId} student=${requester.id}`
        );
      }

      const ordered = orderForAttempt(
        questions,
        attempt.id,
        assignment.shuffle_questions
      );

      return {
        attempt_id: attempt.id,
        status: "IN_PROGRESS",
        started_at: attempt.started_at,
        resumed: existing !== null,
        total_time_seconds: questions.reduce(
          (acc, q) => acc + q.per_question_seconds,
          0
        ),
        questions: ordered.map(toStudentQuestion),
      };
    });
  }

  // ==== RecordAnswer ====
  /**
   * Record (or overwrite) the answer to one question.
   *
   * The last write wins; no history is kept. When this answer completes the
   * set, the attempt is submitted in the same transaction.
   */
  async recordAnswer(
    attemptId: number,
    requester: Requester,
    input: AnswerInput
  ): Promise<RecordAnswerResult> {
    return this.repository.transaction(async (tx) => {
      const attempt = await this.loadOwnedAttempt(tx, attemptId, requester);
      if (isTerminal(attempt.status)) {
        throw new InvalidAttemptStateError(
          `Attempt is ${attempt.status}; answers can no longer change`
        );
      }

      const questions = await tx.listQuestions(attempt.assignment_id);
      const question = questions.find((q) => q.id === input.question_id);
      if (!question) throw new QuestionMismatchError(input.question_id);

      const chosen = asOption(input.chosen_option);
      const timeTaken = asTimeTaken(input.time_taken_seconds);

      await tx.upsertResponse({
        attempt_id: attempt.id,
        question_id: question.id,
        chosen_option: chosen,
        is_correct: chosen === question.correct_option,
        time_taken_seconds: timeTaken,
        answered_at: this.now(),
      });

      const answered = await tx.countResponses(attempt.id);
      const complete = questions.length > 0 && answered >= questions.length;

      let submission: SubmitResult | null = null;
      if (complete) {
        submission = await this.finalize(tx, attempt);
        console.info(
          `[ATTEMPT] auto-submitted id=${attempt.id} after ${answered}/${questions.length} answers`
        );
      }

      return {
        recorded: true,
        answered_count: answered,
        total_questions: questions.length,
        auto_submitted: submission !== null,
        submission,
      };
    });
  }

  // ==== Submit ====
  /**
   * Grade and close the attempt.
   * A finished attempt is reported back unchanged with `already_submitted`.
   */
  async submit(attemptId: number, requester: Requester): Promise<SubmitResult> {
    return this.repository.transaction(async (tx) => {
      const attempt = await this.loadOwnedAttempt(tx, attemptId, requester);

      if (isTerminal(attempt.status)) {
        return submitSummary(
          attempt,
          attempt.status,
          attempt.submitted_at ?? attempt.started_at,
          true
        );
      }

      return this.finalize(tx, attempt);
    });
  }

  // ==== GetAttemptResult ====
  async getAttemptResult(
    attemptId: number,
    requester: Requester
  ): Promise<AttemptResultView> {
    const attempt = await this.repository.findAttempt(attemptId);
    if (!attempt) throw new NotFoundError("Attempt", attemptId);

    const assignment = await this.repository.findAssignment(
      attempt.assignment_id
    );
    if (!assignment) throw new NotFoundError("Assignment", attempt.assignment_id);

    const [teacherId, questions, responses] = await Promise.all([
      this.membership.findTeacherId(assignment.classroom_id),
      this.repository.listQuestions(assignment.id),
      this.repository.listResponses(attempt.id),
    ]);

    return projectAttemptResult(requester, {
      assignment,
      teacherId,
      attempt,
      questions,
      responses,
    });
  }

  // ==== GetAssignmentStatistics ====
  async getAssignmentStatistics(
    assignmentId: number,
    requester: Requester
  ): Promise<AssignmentStatisticsResult> {
    const assignment = await this.loadTeacherAssignment(assignmentId, requester);

    const [attempts, totalStudents, questions, responses] = await Promise.all([
      this.repository.listAttemptsForAssignment(assignmentId, TERMINAL_STATUSES),
      this.membership.countMembers(assignment.classroom_id),
      this.repository.listQuestions(assignmentId),
      this.repository.listResponsesForAssignment(assignmentId),
    ]);

    return {
      assignment_id: assignment.id,
      assignment_title: assignment.title,
      ...assignmentStatistics(attempts, totalStudents),
      per_question_stats: byOrderIndex(questions).map((q) =>
        questionStatistics(q, responses)
      ),
    };
  }

  // ==== GetAssignmentResults ====
  /** Finished attempts with per-question detail, newest submission first. */
  async getAssignmentResults(
    assignmentId: number,
    requester: Requester
  ): Promise<AttemptDetail[]> {
    await this.loadTeacherAssignment(assignmentId, requester);

    const [attempts, questions, responses] = await Promise.all([
      this.repository.listAttemptsForAssignment(assignmentId, TERMINAL_STATUSES),
      this.repository.listQuestions(assignmentId),
      this.repository.listResponsesForAssignment(assignmentId),
    ]);
    const ordered = byOrderIndex(questions);

    return [...attempts]
      .sort(
        (a, b) =>
          (b.submitted_at?.getTime() ?? 0) - (a.submitted_at?.getTime() ?? 0)
      )
      .map((a) => {
        const own = new Map(
          responses
            .filter((r) => r.attempt_id === a.id)
            .map((r) => [r.question_id, r])
        );
        return {
          attempt_id: a.id,
          student_id: a.student_id,
          student_name: a.student_name,
          status: a.status,
          started_at: a.started_at,
          submitted_at: a.submitted_at,
          total_score: a.total_score,
          max_possible_score: a.max_possible_score,
          percentage: scorePercentage(a.total_score, a.max_possible_score),
          duration_seconds: durationSeconds(a),
          responses: ordered.map((q) => toResultQuestion(q, own.get(q.id))),
        };
      });
  }

  // ==== GetQuestionBank ====
  /** Teacher view of the questions, answer key included. */
  async getQuestionBank(
    assignmentId: number,
    requester: Requester
  ): Promise<QuestionBankView> {
    const assignment = await this.loadTeacherAssignment(assignmentId, requester);

    const [questions, attemptCount] = await Promise.all([
      this.repository.listQuestions(assignmentId),
      this.repository.countAttemptsForAssignment(assignmentId),
    ]);

    return {
      assignment_id: assignment.id,
      assignment_title: assignment.title,
      has_attempts: attemptCount > 0,
      total_points: sumPoints(questions),
      questions: byOrderIndex(questions).map(toTeacherQuestion),
    };
  }

  // ==== ListMyAttempts ====
  async listMyAttempts(requester: Requester): Promise<AttemptSummary[]> {
    if (requester.role !== "student") {
      throw new ForbiddenError("Only students have attempts");
    }

    const attempts = await this.repository.listAttemptsForStudent(requester.id);
    return attempts.map((a) => ({
      attempt_id: a.id,
      assignment_id: a.assignment_id,
      assignment_title: a.assignment_title,
      status: a.status,
      started_at: a.started_at,
      submitted_at: a.submitted_at,
      total_score: a.total_score,
      max_possible_score: a.max_possible_score,
      percentage: scorePercentage(a.total_score, a.max_possible_score),
    }));
  }

  // ==========================================================================
  // INTERNALS
  // ==========================================================================

  private async loadOwnedAttempt(
    tx: QuizRepository,
    attemptId: number,
    requester: Requester
  ): Promise<Attempt> {
    const attempt = await tx.findAttempt(attemptId, true);
    if (!attempt) throw new NotFoundError("Attempt", attemptId);
    if (requester.role !== "student" || attempt.student_id !== requester.id) {
      throw new ForbiddenError("Attempt belongs to another student");
    }
    return attempt;
  }

  private async loadTeacherAssignment(
    assignmentId: number,
    requester: Requester
  ): Promise<Assignment> {
    if (requester.role !== "teacher") {
      throw new ForbiddenError("Teacher access required");
    }
    const assignment = await this.repository.findAssignment(assignmentId);
    if (!assignment) throw new NotFoundError("Assignment", assignmentId);

    const teacherId = await this.membership.findTeacherId(
      assignment.classroom_id
    );
    if (teacherId !== requester.id) {
      throw new ForbiddenError("Not the teacher of this classroom");
    }
    return assignment;
  }

  /**
   * Grade every recorded answer and move the attempt to its terminal state.
   * Must run inside the caller's transaction with the attempt row locked.
   */
  private async finalize(
    tx: QuizRepository,
    attempt: Attempt
  ): Promise<SubmitResult> {
    const assignment = await tx.findAssignment(attempt.assignment_id);
    if (!assignment) throw new NotFoundError("Assignment", attempt.assignment_id);

    const [questions, responses] = await Promise.all([
      tx.listQuestions(attempt.assignment_id),
      tx.listResponses(attempt.id),
    ]);

    const score = scoreAttempt(responses, questions, attempt.max_possible_score);
    const submittedAt = this.now();
    const status = resolveTerminalStatus(assignment, submittedAt);

    await tx.finalizeAttempt(attempt.id, {
      total_score: score.total_score,
      status,
      submitted_at: submittedAt,
    });

    console.info(
      `[ATTEMPT] submitted id=${attempt.id} status=${status} score=${score.total_score}/${score.max_possible_score}`
    );

    return submitSummary(
      { ...attempt, total_score: score.total_score },
      status,
      submittedAt,
      false
    );
  }
}
