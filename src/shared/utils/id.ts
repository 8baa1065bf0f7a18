import { randomBytes, randomUUID } from "node:crypto";

/** Random UUIDv4 for rows, requests and lock tokens. */
export const generateId = (): string => randomUUID();

/** Prefixed random token, e.g. `whsec_<64 hex>` for endpoint secrets. */
export const generateToken = (prefix: string, bytes = 32): string =>
  `${prefix}${randomBytes(bytes).toString("hex")}`;
