import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import jwt from "jsonwebtoken";
import type { NextFunction, Request, Response } from "express";
import {
  requesterOf,
  toTokenPayload,
  verifyToken,
  type AuthRequest,
} from "./auth";
import { extractToken } from "../utils/authCookies";
import { ForbiddenError } from "../utils/errors";

const SECRET = "test-secret";

function mockRequest(parts: Partial<Request> = {}): Request {
  return {
    method: "GET",
    originalUrl: "/attempts/mine",
    headers: {},
    cookies: {},
    query: {},
    ...parts,
  } as Request;
}

function mockResponse() {
  const res = { status: vi.fn(), json: vi.fn() };
  res.status.mockReturnValue(res);
  res.json.mockReturnValue(res);
  return res;
}

describe("extractToken", () => {
  it("prefers the cookie", () => {
    const req = mockRequest({
      cookies: { token: "from-cookie" },
      headers: { authorization: "Bearer from-header" },
    });
    expect(extractToken(req)).toBe("from-cookie");
  });

  it("falls back to the bearer header, then the query", () => {
    expect(
      extractToken(mockRequest({ headers: { authorization: "bearer abc" } }))
    ).toBe("abc");
    expect(extractToken(mockRequest({ query: { token: "q1" } }))).toBe("q1");
  });

  it("returns null when nothing is sent", () => {
    expect(extractToken(mockRequest())).toBeNull();
    expect(
      extractToken(mockRequest({ headers: { authorization: "Basic xyz" } }))
    ).toBeNull();
  });
});

describe("toTokenPayload", () => {
  it("keeps the claims the service needs", () => {
    expect(
      toTokenPayload({ userId: 7, role: "student", email: "s@example.test" })
    ).toEqual({
      userId: 7,
      role: "student",
      email: "s@example.test",
      username: undefined,
    });
  });

  it("accepts a numeric string id", () => {
    expect(toTokenPayload({ userId: "12", role: "teacher" })?.userId).toBe(12);
  });

  it("rejects unknown roles and bad ids", () => {
    expect(toTokenPayload({ userId: 7, role: "admin" })).toBeNull();
    expect(toTokenPayload({ userId: 0, role: "student" })).toBeNull();
    expect(toTokenPayload({ role: "student" })).toBeNull();
    expect(toTokenPayload("plain")).toBeNull();
  });
});

describe("verifyToken", () => {
  beforeEach(() => {
    vi.stubEnv("JWT_SECRET", SECRET);
    vi.spyOn(console, "info").mockImplementation(() => undefined);
    vi.spyOn(console, "warn").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  const call = (req: Request) => {
    const res = mockResponse();
    const next = vi.fn();
    verifyToken(req, res as unknown as Response, next as NextFunction);
    return { res, next };
  };

  it("attaches the verified user", () => {
    const token = jwt.sign({ userId: 3, role: "student" }, SECRET);
    const req = mockRequest({ headers: { authorization: `Bearer ${token}` } });

    const { next } = call(req);

    expect(next).toHaveBeenCalledOnce();
    expect(requesterOf(req)).toEqual({ id: 3, role: "student" });
  });

  it("answers 401 without a token", () => {
    const { res, next } = call(mockRequest());

    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(401);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      message: "No token provided",
    });
  });

  it("answers 401 for a token signed with another key", () => {
    const token = jwt.sign({ userId: 3, role: "student" }, "other-secret");
    const { res, next } = call(
      mockRequest({ headers: { authorization: `Bearer ${token}` } })
    );

    expect(next).not.toHaveBeenCalled();
    expect(res.status).toHaveBeenCalledWith(401);
  });

  it("answers 401 when the claims carry no usable role", () => {
    const token = jwt.sign({ userId: 3, role: "guest" }, SECRET);
    const { res } = call(
      mockRequest({ headers: { authorization: `Bearer ${token}` } })
    );

    expect(res.status).toHaveBeenCalledWith(401);
    expect(res.json).toHaveBeenCalledWith({
      success: false,
      message: "Invalid or expired token",
    });
  });

  it("answers 500 when no secret is configured", () => {
    vi.stubEnv("JWT_SECRET", "");
    const { res } = call(
      mockRequest({ headers: { authorization: "Bearer anything" } })
    );

    expect(res.status).toHaveBeenCalledWith(500);
  });
});

describe("requesterOf", () => {
  it("fails when no user was attached", () => {
    const req: AuthRequest = mockRequest();
    expect(() => requesterOf(req)).toThrow(ForbiddenError);
  });
});
