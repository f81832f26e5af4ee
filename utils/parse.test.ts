import { describe, expect, it } from "vitest";
import { InvalidInputError } from "./errors";
import { asBody, parseId } from "./parse";

describe("parseId", () => {
  it("accepts positive integers as strings or numbers", () => {
    expect(parseId("12", "attemptId")).toBe(12);
    expect(parseId(" 7 ", "attemptId")).toBe(7);
    expect(parseId(3, "question_id")).toBe(3);
  });

  it.each(["0", "-3", "1.5", "12abc", "", undefined, null, 2.5])(
    "rejects %s",
    (value) => {
      expect(() => parseId(value, "attemptId")).toThrow(InvalidInputError);
    }
  );

  it("names the field in the message", () => {
    expect(() => parseId("x", "assignmentId")).toThrow(
      "assignmentId must be a positive integer"
    );
  });
});

describe("asBody", () => {
  it("copies a plain object", () => {
    const body = { question_id: 1 };
    const parsed = asBody(body);
    expect(parsed).toEqual(body);
    expect(parsed).not.toBe(body);
  });

  it.each([undefined, null, "text", 4])("rejects %s", (value) => {
    expect(() => asBody(value)).toThrow(InvalidInputError);
  });

  it("rejects an array body", () => {
    expect(() => asBody([1, 2])).toThrow("Request body must be a JSON object");
  });
});
