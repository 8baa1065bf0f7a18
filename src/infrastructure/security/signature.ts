/**
 * Webhook signatures: HMAC-SHA256 over `<timestamp>.<payload>`.
 *
 * Header format: `t=<unix seconds>,v1=<hex>`. Several `v1` entries may be
 * present while a secret is being rotated; any one matching is enough.
 */

import { createHmac } from "node:crypto";
import {
  type IncomingSource,
  SignatureScheme,
} from "../../core/entities/incoming-source.entity.js";
import {
  type AppError,
  SignatureFailure,
  signatureInvalid,
} from "../../core/errors/app-error.js";
import type { SignatureVerifier } from "../../core/ports/signature-verifier.js";
import { type Result, err, ok } from "../../core/types/result.js";
import { timingSafeEqualHex } from "../../shared/utils/timing-safe.js";

export const SIGNATURE_HEADER = "X-Webhook-Signature";
export const SIGNATURE_VERSION = "v1";
export const DEFAULT_TOLERANCE_SECONDS = 300;

export interface ParsedSignature {
  readonly timestamp: number;
  readonly signatures: readonly string[];
}

export interface VerifyOptions {
  /** Max |now − t| in seconds */
  readonly toleranceSeconds?: number | undefined;
  /** Epoch ms; defaults to Date.now() */
  readonly now?: number | undefined;
}

const hmacHex = (secret: string, data: string): string =>
  createHmac("sha256", secret).update(data, "utf8").digest("hex");

export const computeSignature = (payload: string, secret: string, timestamp: number): string =>
  hmacHex(secret, `${timestamp}.${payload}`);

/** Build the signature header value for `payload` signed at `timestamp` (unix seconds). */
export const signPayload = (payload: string, secret: string, timestamp: number): string =>
  `t=${timestamp},${SIGNATURE_VERSION}=${computeSignature(payload, secret, timestamp)}`;

export const parseSignatureHeader = (header: string): ParsedSignature | null => {
  let timestamp: number | null = null;
  const signatures: string[] = [];

  for (const part of header.split(",")) {
    const eq = part.indexOf("=");
    if (eq === -1) continue;
    const name = part.substring(0, eq).trim();
    const value = part.substring(eq + 1).trim();
    if (name === "t") {
      if (!/^\d{1,12}$/.test(value)) return null;
      timestamp = Number(value);
    } else if (name === SIGNATURE_VERSION && value.length > 0) {
      signatures.push(value);
    }
  }

  if (timestamp === null || signatures.length === 0) return null;
  return { timestamp, signatures };
};

/**
 * Verify a timestamped signature header. A correct HMAC outside the
 * tolerance window still fails with `expired`.
 */
export const verifySignature = (
  header: string | null | undefined,
  payload: string,
  secret: string,
  options: VerifyOptions = {},
): Result<void, AppError> => {
  if (!header) return err(signatureInvalid(SignatureFailure.MISSING));

  const parsed = parseSignatureHeader(header);
  if (!parsed) return err(signatureInvalid(SignatureFailure.MALFORMED));

  const expected = computeSignature(payload, secret, parsed.timestamp);
  const matched = parsed.signatures.some((candidate) => timingSafeEqualHex(expected, candidate));
  if (!matched) return err(signatureInvalid(SignatureFailure.MISMATCH));

  const toleranceSeconds = options.toleranceSeconds ?? DEFAULT_TOLERANCE_SECONDS;
  const nowSeconds = Math.floor((options.now ?? Date.now()) / 1000);
  if (Math.abs(nowSeconds - parsed.timestamp) > toleranceSeconds) {
    return err(signatureInvalid(SignatureFailure.EXPIRED));
  }

  return ok(undefined);
};

// ── Untimestamped scheme: plain HMAC of the raw body ──

/** Hex HMAC of the raw body, as sent by providers without a timestamped scheme. */
export const signRawPayload = (payload: string, secret: string): string =>
  hmacHex(secret, payload);

/** Accepts `<hex>` or `sha256=<hex>`. */
export const verifyRawSignature = (
  header: string | null | undefined,
  payload: string,
  secret: string,
): Result<void, AppError> => {
  if (!header) return err(signatureInvalid(SignatureFailure.MISSING));

  const provided = header.startsWith("sha256=") ? header.substring("sha256=".length) : header;
  if (!/^[0-9a-f]+$/i.test(provided)) return err(signatureInvalid(SignatureFailure.MALFORMED));

  return timingSafeEqualHex(signRawPayload(payload, secret), provided.toLowerCase())
    ? ok(undefined)
    : err(signatureInvalid(SignatureFailure.MISMATCH));
};

interface SignatureVerifierOptions {
  readonly toleranceSeconds?: number | undefined;
  readonly now?: (() => number) | undefined;
}

/** Verifier for inbound sources: `timestamped` → verifySignature, `hmac` → verifyRawSignature */
export const createSignatureVerifier = (options: SignatureVerifierOptions = {}): SignatureVerifier => {
  const now = options.now ?? Date.now;
  return {
    verify(source: IncomingSource, rawBody: string, signatureHeader: string | undefined) {
      return source.scheme === SignatureScheme.TIMESTAMPED
        ? verifySignature(signatureHeader, rawBody, source.secret, {
            toleranceSeconds: options.toleranceSeconds,
            now: now(),
          })
        : verifyRawSignature(signatureHeader, rawBody, source.secret);
    },
  };
};
