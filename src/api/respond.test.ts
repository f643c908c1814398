import { Response } from "express";
import { sendError, statusFor } from "./respond";
import {
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from "../domain/errors";

function fakeResponse() {
  const res = {
    statusCode: 200,
    body: undefined as unknown,
    status(code: number) {
      res.statusCode = code;
      return res;
    },
    json(body: unknown) {
      res.body = body;
      return res;
    },
  };
  return res;
}

type FakeResponse = ReturnType<typeof fakeResponse>;

function send(res: FakeResponse, error: unknown, fallback?: string): void {
  // Only status() and json() are used by sendError
  sendError(res as unknown as Response, error, fallback);
}

describe("respond", () => {
  it.each([
    [new ValidationError("bad"), 400],
    [new AuthenticationError("who"), 401],
    [new AuthorizationError("no"), 403],
    [new NotFoundError("Class", "c1"), 404],
    [new ConflictError("dup"), 409],
  ])("maps %p to its status", (error, status) => {
    expect(statusFor(error.code)).toBe(status);

    const res = fakeResponse();
    send(res, error);

    expect(res.statusCode).toBe(status);
    expect(res.body).toEqual({ error: error.message, code: error.code });
  });

  it("hides unexpected errors behind the fallback message", () => {
    const consoleSpy = jest.spyOn(console, "error").mockImplementation(() => {});
    const res = fakeResponse();

    send(res, new Error("ENOSPC: disk full"), "Failed to submit");

    expect(res.statusCode).toBe(500);
    expect(res.body).toEqual({ error: "Failed to submit" });
    expect(consoleSpy).toHaveBeenCalledWith("Failed to submit:", expect.any(Error));
    consoleSpy.mockRestore();
  });
});
