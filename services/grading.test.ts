import { describe, expect, it } from "vitest";
import type { AnswerRecord, Attempt, OptionLetter } from "../types/quiz";
import { T0, makeQuestion } from "../test/fakes";
import {
  assignmentStatistics,
  durationSeconds,
  questionStatistics,
  scoreAttempt,
  scorePercentage,
  sumPoints,
} from "./grading";

const questions = [
  makeQuestion({ id: 1, assignment_id: 5, points: 1, correct_option: "B" }),
  makeQuestion({ id: 2, assignment_id: 5, points: 2, correct_option: "A" }),
  makeQuestion({ id: 3, assignment_id: 5, points: 3, correct_option: "D" }),
];

let nextId = 1;
const response = (
  question_id: number,
  chosen_option: OptionLetter,
  is_correct: boolean,
  time_taken_seconds = 10,
  attempt_id = 1
): AnswerRecord => ({
  id: nextId++,
  attempt_id,
  question_id,
  chosen_option,
  is_correct,
  time_taken_seconds,
  answered_at: T0,
});

const finished = (
  total_score: number,
  max_possible_score: number,
  seconds: number
): Attempt => ({
  id: nextId++,
  assignment_id: 5,
  student_id: nextId,
  started_at: T0,
  submitted_at: new Date(T0.getTime() + seconds * 1000),
  total_score,
  max_possible_score,
  status: "SUBMITTED",
});

describe("scoring", () => {
  it("sums question points", () => {
    expect(sumPoints(questions)).toBe(6);
    expect(sumPoints([])).toBe(0);
  });

  it("has no percentage without a maximum", () => {
    expect(scorePercentage(0, 0)).toBeNull();
    expect(scorePercentage(3, 6)).toBe(50);
  });

  it("awards points for correct answers only", () => {
    const score = scoreAttempt(
      [response(1, "B", true), response(2, "C", false), response(3, "D", true)],
      questions
    );

    expect(score).toEqual({
      total_score: 4,
      max_possible_score: 6,
      percentage: (4 / 6) * 100,
    });
  });

  it("ignores answers to questions outside the set", () => {
    const score = scoreAttempt([response(99, "A", true)], questions);
    expect(score.total_score).toBe(0);
  });

  it("prefers the snapshot maximum over the live total", () => {
    const score = scoreAttempt([response(2, "A", true)], questions, 4);
    expect(score).toEqual({
      total_score: 2,
      max_possible_score: 4,
      percentage: 50,
    });
  });
});

describe("questionStatistics", () => {
  it("counts answers per option and averages time", () => {
    const stats = questionStatistics(questions[0], [
      response(1, "B", true, 10),
      response(1, "B", true, 20),
      response(1, "C", false, 45),
      response(2, "A", true, 99),
    ]);

    expect(stats).toEqual({
      question_id: 1,
      question_text: "Question 1",
      order_index: 1,
      points: 1,
      total_responses: 3,
      correct_responses: 2,
      accuracy_rate: (2 / 3) * 100,
      average_time_seconds: 25,
      option_distribution: { A: 0, B: 2, C: 1, D: 0 },
    });
  });

  it("reports zeros for an unanswered question", () => {
    const stats = questionStatistics(questions[2], []);
    expect(stats.accuracy_rate).toBe(0);
    expect(stats.average_time_seconds).toBe(0);
    expect(stats.option_distribution).toEqual({ A: 0, B: 0, C: 0, D: 0 });
  });
});

describe("assignmentStatistics", () => {
  it("aggregates percentages, completion and time", () => {
    const stats = assignmentStatistics(
      [finished(3, 6, 60), finished(6, 6, 180), finished(0, 6, 120)],
      4
    );

    expect(stats).toEqual({
      total_attempts: 3,
      total_students: 4,
      average_score: 50,
      highest_score: 100,
      lowest_score: 0,
      completion_rate: 75,
      average_time_minutes: 2,
    });
  });

  it("leaves zero-maximum attempts out of score figures", () => {
    const stats = assignmentStatistics([finished(0, 0, 30), finished(2, 4, 90)], 2);

    expect(stats.total_attempts).toBe(2);
    expect(stats.average_score).toBe(50);
    expect(stats.highest_score).toBe(50);
    expect(stats.lowest_score).toBe(50);
    expect(stats.average_time_minutes).toBe(1);
  });

  it("is all zeros with no attempts or students", () => {
    expect(assignmentStatistics([], 0)).toEqual({
      total_attempts: 0,
      total_students: 0,
      average_score: 0,
      highest_score: 0,
      lowest_score: 0,
      completion_rate: 0,
      average_time_minutes: 0,
    });
  });

  it("rounds durations down to whole seconds", () => {
    const attempt = finished(1, 1, 0);
    attempt.submitted_at = new Date(T0.getTime() + 1999);
    expect(durationSeconds(attempt)).toBe(1);
    expect(durationSeconds({ ...attempt, submitted_at: null })).toBeNull();
  });
});
