import { type AppError, badRequest } from "../../core/errors/app-error.js";
import { type OwnerId, brand } from "../../core/types/brand.js";
import { type Result, err, ok } from "../../core/types/result.js";

export const ACCOUNT_HEADER = "x-account-id";
export const ANONYMOUS_ACCOUNT = "anonymous";

const ACCOUNT_PATTERN = /^[A-Za-z0-9._:@-]{1,128}$/;

/**
 * Resolve the caller from `X-Account-Id`, set by the auth layer in front of
 * this service. Absent → `anonymous`.
 */
export const resolveAccount = (req: Request): Result<OwnerId, AppError> => {
  const raw = req.headers.get(ACCOUNT_HEADER)?.trim();
  if (raw === undefined || raw.length === 0) {
    return ok(brand<string, "OwnerId">(ANONYMOUS_ACCOUNT));
  }
  if (!ACCOUNT_PATTERN.test(raw)) {
    return err(badRequest("X-Account-Id must be 1-128 characters of [A-Za-z0-9._:@-]"));
  }
  return ok(brand<string, "OwnerId">(raw));
};
