// Domain shapes shared by the attempt engine, the projector and the stores.
// Field names follow the column names so rows map one-to-one.

export const OPTION_LETTERS = ["A", "B", "C", "D"] as const;
export type OptionLetter = (typeof OPTION_LETTERS)[number];

export type AttemptStatus = "IN_PROGRESS" | "SUBMITTED" | "LATE";
export type TerminalStatus = Exclude<AttemptStatus, "IN_PROGRESS">;

export type Role = "student" | "teacher";

/** Who is calling. Supplied by the identity layer on every operation. */
export interface Requester {
  id: number;
  role: Role;
}

export interface Assignment {
  id: number;
  classroom_id: number;
  title: string;
  opens_at: Date | null;
  due_at: Date | null;
  shuffle_questions: boolean;
  created_by: number;
}

export interface Question {
  id: number;
  assignment_id: number;
  prompt_text: string | null;
  image_key: string | null;
  option_a: string;
  option_b: string;
  option_c: string;
  option_d: string;
  correct_option: OptionLetter;
  per_question_seconds: number;
  points: number;
  order_index: number;
}

export interface Attempt {
  id: number;
  assignment_id: number;
  student_id: number;
  started_at: Date;
  submitted_at: Date | null;
  total_score: number;
  /** Sum of question points captured when the attempt was created. */
  max_possible_score: number;
  status: AttemptStatus;
}

export interface AnswerRecord {
  id: number;
  attempt_id: number;
  question_id: number;
  chosen_option: OptionLetter;
  is_correct: boolean;
  time_taken_seconds: number;
  answered_at: Date;
}

export interface NewAttempt {
  assignment_id: number;
  student_id: number;
  started_at: Date;
  max_possible_score: number;
}

export interface AnswerUpsert {
  attempt_id: number;
  question_id: number;
  chosen_option: OptionLetter;
  is_correct: boolean;
  time_taken_seconds: number;
  answered_at: Date;
}

export interface AttemptFinalization {
  total_score: number;
  status: TerminalStatus;
  submitted_at: Date;
}

/** Attempt joined with the student's display name, for teacher listings. */
export interface AttemptWithStudent extends Attempt {
  student_name: string;
}

/** Attempt joined with its assignment title, for a student's history. */
export interface AttemptWithAssignment extends Attempt {
  assignment_title: string;
}

export function isOptionLetter(value: string): value is OptionLetter {
  return (OPTION_LETTERS as readonly string[]).includes(value);
}

export function isTerminal(status: AttemptStatus): status is TerminalStatus {
  switch (status) {
    case "IN_PROGRESS":
      return false;
    case "SUBMITTED":
    case "LATE":
      return true;
    default: {
      const unreachable: never = status;
      throw new Error(`Unknown attempt status: ${String(unreachable)}`);
    }
  }
}
