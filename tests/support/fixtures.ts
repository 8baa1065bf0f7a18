import { type AppError, deliveryFailed } from "../../src/core/errors/app-error.js";
import type { AlertPayload, AlertSink } from "../../src/core/ports/alert-sink.js";
import type {
  TransportRequest,
  TransportResponse,
  WebhookTransport,
} from "../../src/core/ports/webhook-transport.js";
import { type Result, err, ok } from "../../src/core/types/result.js";
import { type Storage, openStorage } from "../../src/infrastructure/database/storage.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";

/** 2026-01-01T00:00:00.000Z */
export const T0 = 1_767_225_600_000;

export interface TestClock {
  now(): number;
  advance(ms: number): void;
  set(at: number): void;
}

export const createClock = (start = T0): TestClock => {
  let current = start;
  return {
    now: () => current,
    advance: (ms) => {
      current += ms;
    },
    set: (at) => {
      current = at;
    },
  };
};

/** Value of a successful result; throws the error message otherwise */
export const unwrap = <T>(result: Result<T, AppError>): T => {
  if (!result.ok) throw new Error(result.error.message);
  return result.value;
};

/** Migrated in-memory SQLite behind the same handle the server uses */
export const openTestStorage = (): Promise<Storage> =>
  openStorage({ path: ":memory:" }, createSilentLogger());

export type StubReply = TransportResponse | "timeout";

export interface StubTransport extends WebhookTransport {
  readonly requests: TransportRequest[];
}

/**
 * Replies in order; the last reply repeats once the list runs out.
 * `"timeout"` yields the transport's timeout error.
 */
export const createStubTransport = (replies: readonly StubReply[]): StubTransport => {
  const requests: TransportRequest[] = [];
  return {
    requests,
    async post(request) {
      requests.push(request);
      const reply = replies[Math.min(requests.length, replies.length) - 1] ?? "timeout";
      if (reply === "timeout") {
        return err(
          deliveryFailed(`Request timed out after ${request.timeoutMs}ms`, {
            status: null,
            attempt: 0,
          }),
        );
      }
      return ok(reply);
    },
  };
};

export interface RecordingAlertSink extends AlertSink {
  readonly alerts: AlertPayload[];
}

export const createRecordingAlertSink = (): RecordingAlertSink => {
  const alerts: AlertPayload[] = [];
  return {
    alerts,
    enabled: true,
    async send(payload) {
      alerts.push(payload);
    },
  };
};
