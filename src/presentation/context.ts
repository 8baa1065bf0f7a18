import type { Logger } from "../core/ports/logger.js";
import type { OwnerId, RequestId } from "../core/types/brand.js";

/**
 * Typed request context threaded through the handlers.
 * Built once per request by the server.
 */
export interface RequestContext {
  readonly requestId: RequestId;
  readonly startTime: number;
  readonly ip: string;
  readonly method: string;
  readonly path: string;
  /** Route parameters captured by the router (`:id`, `:source`, …) */
  readonly params: Readonly<Record<string, string>>;
  /** Request-scoped logger with requestId pre-bound */
  readonly logger: Logger;
}

/** Caller identity resolved from the upstream auth layer */
export interface AccountContext {
  readonly accountId: OwnerId;
}
