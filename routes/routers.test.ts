import { describe, expect, it } from "vitest";
import type { Router } from "express";
import { AttemptService } from "../services/attemptService";
import {
  InMemoryMembershipDirectory,
  InMemoryQuizRepository,
} from "../test/fakes";
import { createAssignmentsRouter } from "./assignments";
import { createAttemptsRouter } from "./attempts";

const service = new AttemptService({
  repository: new InMemoryQuizRepository(),
  membership: new InMemoryMembershipDirectory(),
});

// express names route layers "bound dispatch"; the rest are middleware
const middlewareNames = (router: Router): string[] =>
  router.stack
    .map((layer: { name: string }) => layer.name)
    .filter((name) => name !== "bound dispatch");

describe("routers", () => {
  it("guard attempt routes with the token check and the DB gate only", () => {
    expect(middlewareNames(createAttemptsRouter(service))).toEqual([
      "verifyToken",
      "requireDb",
    ]);
  });

  it("guard assignment routes the same way", () => {
    expect(middlewareNames(createAssignmentsRouter(service))).toEqual([
      "verifyToken",
      "requireDb",
    ]);
  });

  it("register /mine ahead of the attempt id routes", () => {
    const paths = createAttemptsRouter(service)
      .stack.map((layer: { route?: { path: string } }) => layer.route?.path)
      .filter((path): path is string => path !== undefined);

    expect(paths).toEqual([
      "/mine",
      "/start/:assignmentId",
      "/:attemptId/answer",
      "/:attemptId/submit",
      "/:attemptId/result",
    ]);
  });
});
