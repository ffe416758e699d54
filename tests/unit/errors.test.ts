import { describe, it, expect } from "vitest";
import {
  InvalidArgumentError,
  InvalidConfigurationError,
  InvalidStateError,
  MalformedUriError,
  sanitizeErrorForLogs,
} from "../../src/errors";

describe("error classes", () => {
  it.each([
    [new MalformedUriError("m"), "MalformedUriError", "ERR_MALFORMED_URI", SyntaxError],
    [new InvalidArgumentError("m"), "InvalidArgumentError", "ERR_INVALID_ARGUMENT", RangeError],
    [new InvalidStateError("m"), "InvalidStateError", "ERR_INVALID_STATE", Error],
    [
      new InvalidConfigurationError("m"),
      "InvalidConfigurationError",
      "ERR_INVALID_CONFIGURATION",
      Error,
    ],
  ])("%s carries its name and code", (error, name, code, base) => {
    expect(error.name).toBe(name);
    expect(error.code).toBe(code);
    expect(error.message).toBe("[uri-kit] m");
    expect(error).toBeInstanceOf(base);
  });

  it("keeps the cause of a malformed URI", () => {
    const cause = new InvalidArgumentError("inner");
    expect(new MalformedUriError("outer", { cause }).cause).toBe(cause);
  });
});

describe("sanitizeErrorForLogs", () => {
  it("keeps name, message and code", () => {
    expect(sanitizeErrorForLogs(new InvalidStateError("s"))).toEqual({
      name: "InvalidStateError",
      message: "[uri-kit] s",
      code: "ERR_INVALID_STATE",
    });
  });

  it("omits a missing code and truncates long messages", () => {
    const result = sanitizeErrorForLogs(new Error("x".repeat(300)));
    expect(result).toEqual({ name: "Error", message: "x".repeat(256) });
  });

  it("stringifies values that are not errors", () => {
    expect(sanitizeErrorForLogs(42)).toEqual({ message: "42" });
    expect(sanitizeErrorForLogs(undefined)).toEqual({ message: "undefined" });
  });
});
