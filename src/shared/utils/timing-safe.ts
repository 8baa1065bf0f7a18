import { timingSafeEqual as nodeTimingSafeEqual } from "node:crypto";

/**
 * Constant-time comparison of two hex digests.
 * Inputs of different length still run one full comparison before failing.
 */
export const timingSafeEqualHex = (expectedHex: string, providedHex: string): boolean => {
  const expected = Buffer.from(expectedHex, "hex");
  // Buffer.from drops a trailing odd nibble, so the text length must match exactly
  const provided =
    providedHex.length === expectedHex.length && /^[0-9a-f]*$/i.test(providedHex)
      ? Buffer.from(providedHex, "hex")
      : Buffer.alloc(0);

  if (provided.length !== expected.length || expected.length === 0) {
    nodeTimingSafeEqual(expected, Buffer.alloc(expected.length));
    return false;
  }
  return nodeTimingSafeEqual(expected, provided);
};
