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
  Question,
} from "./quiz";

/**
 * Storage contract for the attempt engine.
 *
 * Implementations must honour the unique keys on
 * (assignment_id, student_id) for attempts and (attempt_id, question_id)
 * for responses, and must run `transaction` callbacks atomically.
 */
export interface QuizRepository {
  /** Runs `work` against a repository bound to one transaction. */
  transaction<T>(work: (tx: QuizRepository) => Promise<T>): Promise<T>;

  findAssignment(assignmentId: number): Promise<Assignment | null>;
  /** Questions of an assignment ordered by order_index. */
  listQuestions(assignmentId: number): Promise<Question[]>;
  countAttemptsForAssignment(assignmentId: number): Promise<number>;

  /** `lock` takes a row lock for the rest of the transaction. */
  findAttempt(attemptId: number, lock?: boolean): Promise<Attempt | null>;
  findAttemptFor(assignmentId: number, studentId: number): Promise<Attempt | null>;
  /**
   * Creates the attempt unless one already exists for the pair; either way
   * the stored row is returned.
   */
  insertAttempt(attempt: NewAttempt): Promise<Attempt>;
  finalizeAttempt(attemptId: number, result: AttemptFinalization): Promise<void>;
  listAttemptsForAssignment(
    assignmentId: number,
    statuses: readonly AttemptStatus[]
  ): Promise<AttemptWithStudent[]>;
  listAttemptsForStudent(studentId: number): Promise<AttemptWithAssignment[]>;

  /** Insert or overwrite the answer for (attempt, question). */
  upsertResponse(answer: AnswerUpsert): Promise<void>;
  listResponses(attemptId: number): Promise<AnswerRecord[]>;
  listResponsesForAssignment(assignmentId: number): Promise<AnswerRecord[]>;
  countResponses(attemptId: number): Promise<number>;
}

/** Classroom membership, owned by the classroom subsystem. */
export interface MembershipDirectory {
  isMember(classroomId: number, studentId: number): Promise<boolean>;
  /** Teacher that owns the classroom, or null if it does not exist. */
  findTeacherId(classroomId: number): Promise<number | null>;
  countMembers(classroomId: number): Promise<number>;
}
