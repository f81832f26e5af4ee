import type {
  AnswerRecord,
  AnswerUpsert,
  Assignment,
  Attempt,
  AttemptFinalization,
  AttemptStatus,
  AttemptWithAssignment,
  AttemptWithStudent,
  NewAttempt,
  OptionLetter,
  Question,
} from "../../types/quiz";
import { isOptionLetter } from "../../types/quiz";
import type {
  AssignmentRow,
  AttemptRow,
  AttemptWithAssignmentRow,
  AttemptWithStudentRow,
  CountRow,
  QuestionRow,
  ResponseRow,
} from "../../types/db";
import type { QuizRepository } from "../../types/store";
import db from "../db";
import {
  connectionRunner,
  insertRecord,
  placeholders,
  poolRunner,
  updateRecord,
  type SqlRunner,
} from "./dbHelper";

// ============================================================================
// ROW MAPPING
// ============================================================================

function toStatus(raw: string, attemptId: number): AttemptStatus {
  switch (raw) {
    case "IN_PROGRESS":
    case "SUBMITTED":
    case "LATE":
      return raw;
    default:
      throw new Error(`Attempt ${attemptId} has unknown status ${raw}`);
  }
}

function toOption(raw: string, context: string): OptionLetter {
  if (!isOptionLetter(raw)) {
    throw new Error(`${context} has invalid option ${raw}`);
  }
  return raw;
}

const toAssignment = (r: AssignmentRow): Assignment => ({
  id: r.id,
  classroom_id: r.classroom_id,
  title: r.title,
  opens_at: r.opens_at,
  due_at: r.due_at,
  shuffle_questions: Boolean(r.shuffle_questions),
  created_by: r.created_by,
});

const toQuestion = (r: QuestionRow): Question => ({
  id: r.id,
  assignment_id: r.assignment_id,
  prompt_text: r.prompt_text,
  image_key: r.image_key,
  option_a: r.option_a,
  option_b: r.option_b,
  option_c: r.option_c,
  option_d: r.option_d,
  correct_option: toOption(r.correct_option, `Question ${r.id}`),
  per_question_seconds: r.per_question_seconds,
  points: r.points,
  order_index: r.order_index,
});

const toAttempt = (r: AttemptRow): Attempt => ({
  id: r.id,
  assignment_id: r.assignment_id,
  student_id: r.student_id,
  started_at: r.started_at,
  submitted_at: r.submitted_at,
  total_score: r.total_score,
  max_possible_score: r.max_possible_score,
  status: toStatus(r.status, r.id),
});

const toAnswer = (r: ResponseRow): AnswerRecord => ({
  id: r.id,
  attempt_id: r.attempt_id,
  question_id: r.question_id,
  chosen_option: toOption(r.chosen_option, `Response ${r.id}`),
  is_correct: Boolean(r.is_correct),
  time_taken_seconds: r.time_taken_seconds,
  answered_at: r.answered_at,
});

const ATTEMPT_COLUMNS = `a.id, a.assignment_id, a.student_id, a.started_at, a.submitted_at,
  a.total_score, a.max_possible_score, a.status`;

const RESPONSE_COLUMNS = `r.id, r.attempt_id, r.question_id, r.chosen_option, r.is_correct,
  r.time_taken_seconds, r.answered_at`;

// ============================================================================
// REPOSITORY
// ============================================================================

/**
 * MySQL-backed store for assignments, attempts and responses.
 *
 * Instances created by `transaction` are bound to one connection; the
 * root instance uses the shared pool.
 */
export class MySqlQuizRepository implements QuizRepository {
  constructor(
    private readonly run: SqlRunner = poolRunner,
    private readonly inTransaction: boolean = false
  ) {}

  async transaction<T>(work: (tx: QuizRepository) => Promise<T>): Promise<T> {
    // nested calls join the open transaction
    if (this.inTransaction) return work(this);
    return db.withTransaction((conn) =>
      work(new MySqlQuizRepository(connectionRunner(conn), true))
    );
  }

  async findAssignment(assignmentId: number): Promise<Assignment | null> {
    const rows = await this.run<AssignmentRow[]>(
      `SELECT id, classroom_id, title, opens_at, due_at, shuffle_questions, created_by,
              created_at, updated_at
       FROM assignments WHERE id = ? LIMIT 1`,
      [assignmentId]
    );
    return rows[0] ? toAssignment(rows[0]) : null;
  }

  async listQuestions(assignmentId: number): Promise<Question[]> {
    const rows = await this.run<QuestionRow[]>(
      `SELECT id, assignment_id, prompt_text, image_key, option_a, option_b, option_c, option_d,
              correct_option, per_question_seconds, points, order_index
       FROM questions WHERE assignment_id = ? ORDER BY order_index ASC`,
      [assignmentId]
    );
    return rows.map(toQuestion);
  }

  async countAttemptsForAssignment(assignmentId: number): Promise<number> {
    const rows = await this.run<CountRow[]>(
      "SELECT COUNT(*) AS cnt FROM attempts WHERE assignment_id = ?",
      [assignmentId]
    );
    return Number(rows[0]?.cnt ?? 0);
  }

  async findAttempt(attemptId: number, lock = false): Promise<Attempt | null> {
    const rows = await this.run<AttemptRow[]>(
      `SELECT ${ATTEMPT_COLUMNS} FROM attempts a WHERE a.id = ? LIMIT 1${
        lock && this.inTransaction ? " FOR UPDATE" : ""
      }`,
      [attemptId]
    );
    return rows[0] ? toAttempt(rows[0]) : null;
  }

  async findAttemptFor(
    assignmentId: number,
    studentId: number,
    lock = false
  ): Promise<Attempt | null> {
    const rows = await this.run<AttemptRow[]>(
      `SELECT ${ATTEMPT_COLUMNS} FROM attempts a
       WHERE a.assignment_id = ? AND a.student_id = ? LIMIT 1${
         lock && this.inTransaction ? " FOR UPDATE" : ""
       }`,
      [assignmentId, studentId]
    );
    return rows[0] ? toAttempt(rows[0]) : null;
  }

  async insertAttempt(attempt: NewAttempt): Promise<Attempt> {
    // the unique (assignment_id, student_id) key settles concurrent starts
    await insertRecord(
      this.run,
      "attempts",
      {
        assignment_id: attempt.assignment_id,
        student_id: attempt.student_id,
        started_at: attempt.started_at,
        submitted_at: null,
        total_score: 0,
        max_possible_score: attempt.max_possible_score,
        status: "IN_PROGRESS",
      },
      { ignoreDuplicates: true }
    );

    // locking read so a row committed by a concurrent start is visible
    const stored = await this.findAttemptFor(
      attempt.assignment_id,
      attempt.student_id,
      true
    );
    if (!stored) {
      throw new Error(
        `Attempt for assignment ${attempt.assignment_id} / student ${attempt.student_id} missing after insert`
      );
    }
    return stored;
  }

  async finalizeAttempt(
    attemptId: number,
    result: AttemptFinalization
  ): Promise<void> {
    const affected = await updateRecord(
      this.run,
      "attempts",
      {
        total_score: result.total_score,
        status: result.status,
        submitted_at: result.submitted_at,
      },
      { id: attemptId, status: "IN_PROGRESS" }
    );
    if (affected !== 1) {
      throw new Error(`Attempt ${attemptId} was not in progress when finalizing`);
    }
  }

  async listAttemptsForAssignment(
    assignmentId: number,
    statuses: readonly AttemptStatus[]
  ): Promise<AttemptWithStudent[]> {
    if (!statuses.length) return [];

    const rows = await this.run<AttemptWithStudentRow[]>(
      `SELECT ${ATTEMPT_COLUMNS}, u.username AS student_name
       FROM attempts a
       LEFT JOIN users u ON u.id = a.student_id
       WHERE a.assignment_id = ? AND a.status IN (${placeholders(statuses.length)})
       ORDER BY a.submitted_at DESC, a.id DESC`,
      [assignmentId, ...statuses]
    );
    return rows.map((r) => ({
      ...toAttempt(r),
      student_name: r.student_name ?? "",
    }));
  }

  async listAttemptsForStudent(
    studentId: number
  ): Promise<AttemptWithAssignment[]> {
    const rows = await this.run<AttemptWithAssignmentRow[]>(
      `SELECT ${ATTEMPT_COLUMNS}, s.title AS assignment_title
       FROM attempts a
       JOIN assignments s ON s.id = a.assignment_id
       WHERE a.student_id = ?
       ORDER BY a.started_at DESC, a.id DESC`,
      [studentId]
    );
    return rows.map((r) => ({
      ...toAttempt(r),
      assignment_title: r.assignment_title,
    }));
  }

  async upsertResponse(answer: AnswerUpsert): Promise<void> {
    // last write wins at the unique (attempt_id, question_id) key
    await this.run(
      `INSERT INTO responses
         (attempt_id, question_id, chosen_option, is_correct, time_taken_seconds, answered_at)
       VALUES (?, ?, ?, ?, ?, ?)
       ON DUPLICATE KEY UPDATE
         chosen_option = VALUES(chosen_option),
         is_correct = VALUES(is_correct),
         time_taken_seconds = VALUES(time_taken_seconds),
         answered_at = VALUES(answered_at)`,
      [
        answer.attempt_id,
        answer.question_id,
        answer.chosen_option,
        answer.is_correct ? 1 : 0,
        answer.time_taken_seconds,
        answer.answered_at,
      ]
    );
  }

  async listResponses(attemptId: number): Promise<AnswerRecord[]> {
    const rows = await this.run<ResponseRow[]>(
      `SELECT ${RESPONSE_COLUMNS} FROM responses r WHERE r.attempt_id = ?`,
      [attemptId]
    );
    return rows.map(toAnswer);
  }

  async listResponsesForAssignment(
    assignmentId: number
  ): Promise<AnswerRecord[]> {
    const rows = await this.run<ResponseRow[]>(
      `SELECT ${RESPONSE_COLUMNS}
       FROM responses r
       JOIN attempts a ON a.id = r.attempt_id
       WHERE a.assignment_id = ?`,
      [assignmentId]
    );
    return rows.map(toAnswer);
  }

  async countResponses(attemptId: number): Promise<number> {
    const rows = await this.run<CountRow[]>(
      "SELECT COUNT(DISTINCT question_id) AS cnt FROM responses WHERE attempt_id = ?",
      [attemptId]
    );
    return Number(rows[0]?.cnt ?? 0);
  }
}
