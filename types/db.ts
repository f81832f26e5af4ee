import type { RowDataPacket } from "mysql2/promise";

// Common param type for queries
export type DBParam = string | number | boolean | null | Date | Buffer;
export type DBParams = (DBParam | DBParam[])[];

// Tables
export interface ClassroomRow extends RowDataPacket {
  id: number;
  name: string;
  code: string;
  teacher_id: number;
}

export interface AssignmentRow extends RowDataPacket {
  id: number;
  classroom_id: number;
  title: string;
  opens_at: Date | null;
  due_at: Date | null;
  shuffle_questions: 0 | 1;
  created_by: number;
  created_at: Date;
  updated_at: Date;
}

export interface QuestionRow extends RowDataPacket {
  id: number;
  assignment_id: number;
  prompt_text: string | null;
  image_key: string | null;
  option_a: string;
  option_b: string;
  option_c: string;
  option_d: string;
  correct_option: string;
  per_question_seconds: number;
  points: number;
  order_index: number;
}

export interface AttemptRow extends RowDataPacket {
  id: number;
  assignment_id: number;
  student_id: number;
  started_at: Date;
  submitted_at: Date | null;
  total_score: number;
  max_possible_score: number;
  status: string;
}

export interface AttemptWithStudentRow extends AttemptRow {
  student_name: string | null;
}

export interface AttemptWithAssignmentRow extends AttemptRow {
  assignment_title: string;
}

export interface ResponseRow extends RowDataPacket {
  id: number;
  attempt_id: number;
  question_id: number;
  chosen_option: string;
  is_correct: 0 | 1;
  time_taken_seconds: number;
  answered_at: Date;
}

export interface CountRow extends RowDataPacket {
  cnt: number;
}
