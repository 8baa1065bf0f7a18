import type { ZodType, ZodTypeDef } from "zod";
import { type AppError, badRequest, validation } from "../../core/errors/app-error.js";
import { type Result, err, ok } from "../../core/types/result.js";

/**
 * Validate an unknown value against a Zod schema.
 * Returns a typed Result.
 */
export const validateBody = <T>(
  schema: ZodType<T, ZodTypeDef, unknown>,
  body: unknown,
): Result<T, AppError> => {
  const result = schema.safeParse(body);
  if (!result.success) {
    const { formErrors, fieldErrors } = result.error.flatten();
    return err(validation({ formErrors, fieldErrors }));
  }
  return ok(result.data);
};

/** Parse a raw body as JSON; an empty body reads as `{}` */
export const parseJson = (raw: string): Result<unknown, AppError> => {
  if (raw.trim().length === 0) return ok({});
  try {
    return ok(JSON.parse(raw));
  } catch {
    return err(badRequest("Request body must be valid JSON"));
  }
};

/** Query string as a flat record; repeated keys keep the last value */
export const queryParams = (req: Request): Record<string, string> =>
  Object.fromEntries(new URL(req.url).searchParams);
