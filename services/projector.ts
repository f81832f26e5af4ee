import type {
  AnswerRecord,
  Assignment,
  Attempt,
  AttemptStatus,
  OptionLetter,
  Question,
  Requester,
} from "../types/quiz";
import { isTerminal } from "../types/quiz";
import { scorePercentage, sumPoints } from "./grading";
import { attemptSeed, seededPermutation } from "./shuffle";
import { ForbiddenError } from "../utils/errors";

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

/** What a student may see before submitting. */
export interface StudentQuestion {
  id: number;
  prompt_text: string | null;
  image_key: string | null;
  option_a: string;
  option_b: string;
  option_c: string;
  option_d: string;
  per_question_seconds: number;
  points: number;
  order_index: number;
}

/** Full question including the answer key. Teachers only. */
export interface TeacherQuestion extends StudentQuestion {
  correct_option: OptionLetter;
}

export interface ResultQuestion extends TeacherQuestion {
  chosen_option: OptionLetter | null;
  is_correct: boolean;
  points_earned: number;
  time_taken_seconds: number | null;
}

export interface InProgressView {
  view: "in_progress";
  attempt_id: number;
  status: "IN_PROGRESS";
  started_at: Date;
  answered_count: number;
  questions: StudentQuestion[];
}

export interface ResultView {
  view: "result";
  attempt_id: number;
  status: AttemptStatus;
  started_at: Date;
  submitted_at: Date | null;
  total_score: number;
  max_possible_score: number;
  percentage: number | null;
  /** Current sum of question points. Informational; grading uses the snapshot. */
  live_max_score: number;
  questions: ResultQuestion[];
}

export type AttemptResultView = InProgressView | ResultView;

/** Context needed to decide what a viewer is allowed to see. */
export interface ProjectionContext {
  assignment: Assignment;
  /** Teacher that owns the assignment's classroom. */
  teacherId: number | null;
  attempt: Attempt;
  questions: readonly Question[];
  responses: readonly AnswerRecord[];
}

// ============================================================================
// QUESTION VIEWS
// ============================================================================

/** Strip the answer key. */
export const toStudentQuestion = (q: Question): StudentQuestion => ({
  id: q.id,
  prompt_text: q.prompt_text,
  image_key: q.image_key,
  option_a: q.option_a,
  option_b: q.option_b,
  option_c: q.option_c,
  option_d: q.option_d,
  per_question_seconds: q.per_question_seconds,
  points: q.points,
  order_index: q.order_index,
});

export const toTeacherQuestion = (q: Question): TeacherQuestion => ({
  ...toStudentQuestion(q),
  correct_option: q.correct_option,
});

export const toResultQuestion = (
  q: Question,
  response?: AnswerRecord
): ResultQuestion => {
  const isCorrect = response?.is_correct ?? false;
  return {
    ...toTeacherQuestion(q),
    chosen_option: response?.chosen_option ?? null,
    is_correct: isCorrect,
    points_earned: isCorrect ? q.points : 0,
    time_taken_seconds: response?.time_taken_seconds ?? null,
  };
};

/** Canonical order used by every teacher-facing and non-shuffled view. */
export const byOrderIndex = (questions: readonly Question[]): Question[] =>
  [...questions].sort((a, b) => a.order_index - b.order_index);

/**
 * Presentation order for one attempt.
 * Shuffled assignments get a permutation seeded by the attempt id, so a
 * resumed attempt always sees the order it started with.
 */
export function orderForAttempt(
  questions: readonly Question[],
  attemptId: number,
  shuffle: boolean
): Question[] {
  const canonical = byOrderIndex(questions);
  return shuffle
    ? seededPermutation(canonical, attemptSeed(attemptId))
    : canonical;
}

// ============================================================================
// ATTEMPT VIEWS
// ============================================================================

/**
 * Pick the view of an attempt the requester is entitled to.
 *
 * - Owning student, attempt in progress: questions without answer key or answers
 * - Owning student, attempt finished: full result
 * - Teacher owning the classroom: full result at any time
 * - Anyone else: Forbidden
 */
export function projectAttemptResult(
  requester: Requester,
  ctx: ProjectionContext
): AttemptResultView {
  const { attempt, assignment, questions, responses } = ctx;

  const isOwner =
    requester.role === "student" && attempt.student_id === requester.id;
  const isTeacher =
    requester.role === "teacher" && ctx.teacherId === requester.id;

  if (!isOwner && !isTeacher) {
    throw new ForbiddenError("Not allowed to view this attempt");
  }

  if (isOwner && !isTerminal(attempt.status)) {
    return {
      view: "in_progress",
      attempt_id: attempt.id,
      status: "IN_PROGRESS",
      started_at: attempt.started_at,
      answered_count: responses.length,
      questions: orderForAttempt(
        questions,
        attempt.id,
        assignment.shuffle_questions
      ).map(toStudentQuestion),
    };
  }

  const byQuestion = new Map(responses.map((r) => [r.question_id, r]));
  return {
    view: "result",
    attempt_id: attempt.id,
    status: attempt.status,
    started_at: attempt.started_at,
    submitted_at: attempt.submitted_at,
    total_score: attempt.total_score,
    max_possible_score: attempt.max_possible_score,
    percentage: scorePercentage(
      attempt.total_score,
      attempt.max_possible_score
    ),
    live_max_score: sumPoints(questions),
    questions: byOrderIndex(questions).map((q) =>
      toResultQuestion(q, byQuestion.get(q.id))
    ),
  };
}
