import { describe, expect, it } from "vitest";
import { type Result, err, map, ok, unwrapOr } from "../../src/core/types/result.js";

describe("Result monad", () => {
  it("ok wraps a value", () => {
    expect(ok(42)).toEqual({ ok: true, value: 42 });
  });

  it("err wraps an error", () => {
    expect(err("fail")).toEqual({ ok: false, error: "fail" });
  });

  it("map transforms ok value", () => {
    expect(map(ok(2), (n: number) => n * 3)).toEqual({ ok: true, value: 6 });
  });

  it("map passes through err", () => {
    const failed: Result<number, string> = err("x");
    expect(map(failed, (n: number) => n * 3)).toEqual({ ok: false, error: "x" });
  });

  it("unwrapOr returns fallback on err", () => {
    const failed: Result<number, string> = err("x");
    expect(unwrapOr(failed, 0)).toBe(0);
    expect(unwrapOr(ok(99), 0)).toBe(99);
  });
});
