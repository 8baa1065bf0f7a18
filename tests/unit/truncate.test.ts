import { describe, expect, it } from "vitest";
import { truncateUtf8 } from "../../src/shared/utils/truncate.js";

describe("truncateUtf8", () => {
  it("returns short input unchanged", () => {
    expect(truncateUtf8("hello", 5)).toBe("hello");
  });

  it("cuts ASCII at the byte limit", () => {
    expect(truncateUtf8("hello world", 5)).toBe("hello");
  });

  it("never splits a multi-byte character", () => {
    // "é" is two bytes; the limit lands between them
    expect(truncateUtf8("aé", 2)).toBe("a");
    // "€" is three bytes
    expect(truncateUtf8("€€", 4)).toBe("€");
    expect(truncateUtf8("€€", 6)).toBe("€€");
  });

  it("handles a zero limit", () => {
    expect(truncateUtf8("abc", 0)).toBe("");
  });
});
