/**
 * Verifies inbound webhook signatures according to the source's scheme.
 * Failures are `signature_invalid` errors whose details carry the reason.
 */

import type { IncomingSource } from "../entities/incoming-source.entity.js";
import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export interface SignatureVerifier {
  verify(
    source: IncomingSource,
    rawBody: string,
    signatureHeader: string | undefined,
  ): Result<void, AppError>;
}
