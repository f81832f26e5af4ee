/**
 * Error kinds surfaced by the attempt engine.
 *
 * Every kind is client-correctable: repeating the call with the same input
 * reproduces the same error, so nothing here is ever retried.
 */
export type QuizErrorKind =
  | "NotFound"
  | "Forbidden"
  | "InvalidAttemptState"
  | "AlreadyCompleted"
  | "QuestionMismatch"
  | "InvalidOption"
  | "AssignmentClosed"
  | "InvalidInput";

export abstract class QuizError extends Error {
  abstract readonly kind: QuizErrorKind;
  abstract readonly statusCode: number;

  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): { kind: QuizErrorKind; message: string } {
    return { kind: this.kind, message: this.message };
  }
}

export class NotFoundError extends QuizError {
  readonly kind = "NotFound";
  readonly statusCode = 404;

  constructor(entity: string, id?: number) {
    super(id == null ? `${entity} not found` : `${entity} ${id} not found`);
  }
}

export class ForbiddenError extends QuizError {
  readonly kind = "Forbidden";
  readonly statusCode = 403;

  constructor(message = "Forbidden") {
    super(message);
  }
}

export class InvalidAttemptStateError extends QuizError {
  readonly kind = "InvalidAttemptState";
  readonly statusCode = 409;
}

export class AlreadyCompletedError extends QuizError {
  readonly kind = "AlreadyCompleted";
  readonly statusCode = 409;

  constructor() {
    super("Assignment already completed");
  }
}

export class QuestionMismatchError extends QuizError {
  readonly kind = "QuestionMismatch";
  readonly statusCode = 422;

  constructor(questionId: number) {
    super(`Question ${questionId} does not belong to this assignment`);
  }
}

export class InvalidOptionError extends QuizError {
  readonly kind = "InvalidOption";
  readonly statusCode = 422;

  constructor(option: unknown) {
    super(`chosen_option must be one of A, B, C, D (got ${JSON.stringify(option)})`);
  }
}

export class AssignmentClosedError extends QuizError {
  readonly kind = "AssignmentClosed";
  readonly statusCode = 403;

  constructor() {
    super("Assignment is not open");
  }
}

export class InvalidInputError extends QuizError {
  readonly kind = "InvalidInput";
  readonly statusCode = 400;
}

/** Raised by the pool wrapper when no connection could be made. */
export class DatabaseUnavailableError extends Error {
  readonly code = "DB_NOT_AVAILABLE";

  constructor() {
    super("Database not available");
    this.name = "DatabaseUnavailableError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
