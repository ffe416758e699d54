import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import {
  __test_resetDeprecationRateLimit,
  configureDeprecationRateLimit,
  emitDeprecation,
} from "../../src/deprecation";
import { setDeprecationHandler, type DeprecationNotice } from "../../src/config";
import { __test_resetConfigStateForUnitTests } from "../../src/state";
import { environment } from "../../src/environment";
import { __test_resetDevelopmentLogState } from "../../src/utils";
import { InvalidArgumentError } from "../../src/errors";

beforeEach(() => {
  environment.setExplicitEnv("development");
  __test_resetConfigStateForUnitTests();
  __test_resetDeprecationRateLimit();
  __test_resetDevelopmentLogState();
});

afterEach(() => {
  setDeprecationHandler(null);
  environment.clearCache();
  vi.restoreAllMocks();
});

describe("emitDeprecation", () => {
  it("delivers a redacted, frozen notice to the handler", () => {
    const notices: DeprecationNotice[] = [];
    setDeprecationHandler((notice) => notices.push(notice));

    const delivered = emitDeprecation("id.x", "msg", {
      path: "p",
      password: "test-secret",
    });

    expect(delivered).toBe(true);
    expect(notices).toEqual([
      {
        id: "id.x",
        message: "msg",
        context: { path: "p", password: "[REDACTED]" },
      },
    ]);
    expect(Object.isFrozen(notices[0])).toBe(true);
  });

  it("falls back to the dev log without a handler", () => {
    const warn = vi.spyOn(console, "warn").mockImplementation(() => {});

    emitDeprecation("id.x", "msg", { a: 1 });

    expect(warn).toHaveBeenCalledWith(
      '[WARN] (deprecation) id.x: msg | context={"a":1}',
    );
  });

  it("logs and swallows a failing handler", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    setDeprecationHandler(() => {
      throw new Error("handler failed");
    });

    expect(emitDeprecation("id.x", "msg")).toBe(true);
    expect(error).toHaveBeenCalledTimes(1);
    expect(error).toHaveBeenCalledWith(
      '[ERROR] (deprecation) Deprecation handler threw | context={"id":"id.x","error":{"name":"Error","message":"handler failed"}}',
    );
  });

  it("stops delivering when the burst is used up", () => {
    const handler = vi.fn();
    setDeprecationHandler(handler);
    configureDeprecationRateLimit({ burst: 2, refillRatePerSec: 0 });

    expect(emitDeprecation("a", "m")).toBe(true);
    expect(emitDeprecation("b", "m")).toBe(true);
    expect(emitDeprecation("c", "m")).toBe(false);
    expect(handler).toHaveBeenCalledTimes(2);
  });

  it("refills over time", () => {
    vi.useFakeTimers();
    try {
      vi.setSystemTime(1_000_000);
      const handler = vi.fn();
      setDeprecationHandler(handler);
      configureDeprecationRateLimit({ burst: 1, refillRatePerSec: 1 });

      expect(emitDeprecation("a", "m")).toBe(true);
      expect(emitDeprecation("a", "m")).toBe(false);
      vi.setSystemTime(1_001_000);
      expect(emitDeprecation("a", "m")).toBe(true);
    } finally {
      vi.useRealTimers();
    }
  });

  it("validates the rate limit", () => {
    expect(() =>
      configureDeprecationRateLimit({ burst: 0, refillRatePerSec: 1 }),
    ).toThrow(InvalidArgumentError);
    expect(() =>
      configureDeprecationRateLimit({ burst: 1, refillRatePerSec: -1 }),
    ).toThrow("[uri-kit] refillRatePerSec must be an integer between 0 and 1000.");
  });
});
