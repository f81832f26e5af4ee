import type {
  AnswerRecord,
  Attempt,
  OptionLetter,
  Question,
} from "../types/quiz";

// ============================================================================
// TYPE DEFINITIONS
// ============================================================================

export interface AttemptScore {
  total_score: number;
  max_possible_score: number;
  percentage: number | null;
}

export type OptionDistribution = Record<OptionLetter, number>;

export interface QuestionStatistics {
  question_id: number;
  question_text: string | null;
  order_index: number;
  points: number;
  total_responses: number;
  correct_responses: number;
  accuracy_rate: number;
  average_time_seconds: number;
  option_distribution: OptionDistribution;
}

export interface AssignmentSummaryStatistics {
  total_attempts: number;
  total_students: number;
  average_score: number;
  highest_score: number;
  lowest_score: number;
  completion_rate: number;
  average_time_minutes: number;
}

// ============================================================================
// SCORING
// ============================================================================

/** Sum of points across a question set. */
export const sumPoints = (questions: readonly Question[]): number =>
  questions.reduce((acc, q) => acc + q.points, 0);

/**
 * Score as a percentage of the maximum.
 * Null when there is nothing to score against.
 */
export function scorePercentage(total: number, max: number): number | null {
  if (max <= 0) return null;
  return (total / max) * 100;
}

/**
 * Grade an attempt's recorded answers.
 *
 * Scoring rules:
 * - A question earns its points when its recorded response is correct
 * - Unanswered questions earn nothing
 * - Responses pointing at questions outside the set are ignored
 *
 * The maximum is the snapshot taken at attempt start when one is given, so
 * question edits made after the attempt began never move the grading basis.
 *
 * @param responses - Final answers of one attempt
 * @param questions - The assignment's current questions
 * @param snapshotMax - `attempt.max_possible_score`
 */
export function scoreAttempt(
  responses: readonly AnswerRecord[],
  questions: readonly Question[],
  snapshotMax?: number | null
): AttemptScore {
  const byId = new Map(questions.map((q) => [q.id, q]));

  let total = 0;
  for (const r of responses) {
    const question = byId.get(r.question_id);
    if (question && r.is_correct) total += question.points;
  }

  const max = snapshotMax ?? sumPoints(questions);
  return {
    total_score: total,
    max_possible_score: max,
    percentage: scorePercentage(total, max),
  };
}

// ============================================================================
// ANALYTICS
// ============================================================================

export const emptyDistribution = (): OptionDistribution => ({
  A: 0,
  B: 0,
  C: 0,
  D: 0,
});

/**
 * Aggregate every recorded response to one question.
 * Zero responses yields zero rates rather than NaN.
 */
export function questionStatistics(
  question: Question,
  responses: readonly AnswerRecord[]
): QuestionStatistics {
  const own = responses.filter((r) => r.question_id === question.id);
  const distribution = emptyDistribution();
  let correct = 0;
  let totalTime = 0;

  for (const r of own) {
    if (r.is_correct) correct += 1;
    totalTime += r.time_taken_seconds;
    distribution[r.chosen_option] += 1;
  }

  const count = own.length;
  return {
    question_id: question.id,
    question_text: question.prompt_text,
    order_index: question.order_index,
    points: question.points,
    total_responses: count,
    correct_responses: correct,
    accuracy_rate: count ? (correct / count) * 100 : 0,
    average_time_seconds: count ? totalTime / count : 0,
    option_distribution: distribution,
  };
}

export function durationSeconds(attempt: Attempt): number | null {
  if (!attempt.submitted_at) return null;
  return Math.floor(
    (attempt.submitted_at.getTime() - attempt.started_at.getTime()) / 1000
  );
}

/**
 * Summary over finished attempts.
 * Attempts with a zero maximum have no percentage and are left out of the
 * score figures, but still count towards attempts and completion.
 *
 * @param attempts - SUBMITTED and LATE attempts only
 * @param totalStudents - accepted members of the classroom
 */
export function assignmentStatistics(
  attempts: readonly Attempt[],
  totalStudents: number
): AssignmentSummaryStatistics {
  const scores = attempts
    .map((a) => scorePercentage(a.total_score, a.max_possible_score))
    .filter((s): s is number => s !== null);
  const durations = attempts
    .map(durationSeconds)
    .filter((d): d is number => d !== null);

  const mean = (xs: number[]) =>
    xs.length ? xs.reduce((acc, x) => acc + x, 0) / xs.length : 0;

  return {
    total_attempts: attempts.length,
    total_students: totalStudents,
    average_score: mean(scores),
    highest_score: scores.length ? Math.max(...scores) : 0,
    lowest_score: scores.length ? Math.min(...scores) : 0,
    completion_rate:
      totalStudents > 0 ? (attempts.length / totalStudents) * 100 : 0,
    average_time_minutes: mean(durations) / 60,
  };
}
