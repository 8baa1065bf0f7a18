/**
 * Outbound HTTP transport for webhook attempts.
 * Timeouts and network failures come back as `delivery_failed` errors;
 * any HTTP response, whatever its status, is a success of the transport.
 */

import type { AppError } from "../errors/app-error.js";
import type { Result } from "../types/result.js";

export interface TransportRequest {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: string;
  readonly timeoutMs: number;
  /** Bytes of response body to read; the rest of the stream is discarded */
  readonly maxResponseBytes: number;
}

export interface TransportResponse {
  readonly status: number;
  /** At most `maxResponseBytes` of UTF-8 */
  readonly body: string;
}

export interface WebhookTransport {
  post(request: TransportRequest): Promise<Result<TransportResponse, AppError>>;
}
