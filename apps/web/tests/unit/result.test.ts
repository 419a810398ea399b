import { describe, expect, it } from "vitest";
import { err, fold, getOrElse, mapResult, ok } from "@/core/functional/result";
import { isBusy } from "@/core/functional/state-status";

describe("result helpers", () => {
  it("folds both branches", () => {
    expect(fold(ok(2), () => "error", (value) => `value ${value}`)).toBe("value 2");
    expect(fold(err<number>("boom"), (error) => `error ${error}`, () => "value")).toBe("error boom");
  });

  it("maps only successful values", () => {
    expect(mapResult(ok(3), (n) => n * 2)).toEqual({ ok: true, value: 6 });
    expect(mapResult(err<number>("nope"), (n) => n * 2)).toEqual({ ok: false, error: "nope" });
  });

  it("falls back on error", () => {
    expect(getOrElse(ok("x"), "fallback")).toBe("x");
    expect(getOrElse(err<string>("bad"), "fallback")).toBe("fallback");
  });
});

describe("state status", () => {
  it("treats in-flight statuses as busy", () => {
    expect(isBusy("loading")).toBe(true);
    expect(isBusy("refreshing")).toBe(true);
    expect(isBusy("submitting")).toBe(true);
    expect(isBusy("paginating")).toBe(true);
  });

  it("treats settled statuses as idle", () => {
    expect(isBusy("idle")).toBe(false);
    expect(isBusy("success")).toBe(false);
    expect(isBusy("error")).toBe(false);
    expect(isBusy("unauthorized")).toBe(false);
  });
});
