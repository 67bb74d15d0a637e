import { describe, it, expect } from "vitest";
import {
  AuthenticationFailure,
  TimeoutFailure,
  UpstreamServiceFailure,
} from "../../../src/errors";
import {
  isTimeoutError,
  isTransientFailure,
  toServiceError,
} from "../../../src/services/http-errors";
import { axiosHttpError, axiosTimeoutError } from "../../helpers/fakes";

describe("toServiceError", () => {
  it("maps an aborted request to TimeoutFailure", () => {
    const error = toServiceError("Kroger", axiosTimeoutError(), 1000);

    expect(error).toBeInstanceOf(TimeoutFailure);
    expect(error.message).toBe("Kroger did not answer within 1000ms");
    expect(error.status).toBe(504);
  });

  it("keeps the upstream status and body", () => {
    const error = toServiceError("Spoonacular", axiosHttpError(500, "oops"));

    expect(error).toBeInstanceOf(UpstreamServiceFailure);
    expect(error.message).toBe("Spoonacular: HTTP 500: oops");
    expect(error instanceof UpstreamServiceFailure && error.upstreamStatus).toBe(500);
  });

  it("passes chatbot errors through", () => {
    const auth = new AuthenticationFailure("bad credentials");
    expect(toServiceError("Kroger", auth)).toBe(auth);
  });

  it("wraps anything else", () => {
    const error = toServiceError("Kroger", new Error("socket hang up"));
    expect(error.message).toBe("Kroger: socket hang up");
  });
});

describe("isTimeoutError", () => {
  it("recognises axios timeout codes only", () => {
    expect(isTimeoutError(axiosTimeoutError())).toBe(true);
    expect(isTimeoutError(axiosHttpError(504))).toBe(false);
    expect(isTimeoutError(new Error("ECONNABORTED"))).toBe(false);
  });
});

describe("isTransientFailure", () => {
  it.each([
    ["a timeout", new TimeoutFailure("Spoonacular"), true],
    ["a dropped connection", new UpstreamServiceFailure("Spoonacular", "reset"), true],
    ["rate limiting", new UpstreamServiceFailure("Spoonacular", "HTTP 429", 429), true],
    ["a server error", new UpstreamServiceFailure("Spoonacular", "HTTP 502", 502), true],
    ["a client error", new UpstreamServiceFailure("Spoonacular", "HTTP 401", 401), false],
    ["an auth failure", new AuthenticationFailure("nope"), false],
    ["a plain error", new Error("boom"), false],
  ])("%s -> %s", (_label, error, expected) => {
    expect(isTransientFailure(error)).toBe(expected);
  });
});
