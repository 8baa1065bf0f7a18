/**
 * Webhook alert sink: posts operator alerts (exhausted deliveries, inbound
 * events that failed processing, crashes) to ALERT_WEBHOOK_URL.
 *
 * `send` never rejects: after the last retry the failure is only logged.
 */

import { errorMessage } from "../../core/errors/app-error.js";
import type { AlertPayload, AlertSink } from "../../core/ports/alert-sink.js";
import type { Logger } from "../../core/ports/logger.js";

interface WebhookAlertSinkOptions {
  readonly url: string;
  /** Request timeout in ms (default: 5000) */
  readonly timeoutMs?: number | undefined;
  /** Retries after the first attempt (default: 2) */
  readonly maxRetries?: number | undefined;
  /** Base delay of the exponential backoff between retries (default: 500) */
  readonly retryDelayMs?: number | undefined;
  readonly logger: Logger;
}

export const createWebhookAlertSink = (options: WebhookAlertSinkOptions): AlertSink => {
  const { url } = options;
  const timeoutMs = options.timeoutMs ?? 5_000;
  const maxRetries = options.maxRetries ?? 2;
  const retryDelayMs = options.retryDelayMs ?? 500;
  const logger = options.logger.child({ service: "alerts" });

  const post = async (body: string): Promise<number> => {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), timeoutMs);
    try {
      const response = await fetch(url, {
        method: "POST",
        headers: { "Content-Type": "application/json", "User-Agent": "relay-alerts/1.0" },
        body,
        signal: controller.signal,
      });
      return response.status;
    } finally {
      clearTimeout(timer);
    }
  };

  return {
    get enabled(): boolean {
      return url.length > 0;
    },

    async send(payload: AlertPayload): Promise<void> {
      const body = JSON.stringify(payload);
      let lastError = "unknown";

      for (let attempt = 0; attempt <= maxRetries; attempt++) {
        try {
          const status = await post(body);
          if (status >= 200 && status < 300) {
            logger.debug("Alert sent", { level: payload.level, title: payload.title, attempt: attempt + 1 });
            return;
          }
          lastError = `Webhook returned ${status}`;
          logger.warn("Alert webhook returned non-OK status", { status, attempt: attempt + 1 });
        } catch (e: unknown) {
          lastError = errorMessage(e);
        }

        if (attempt < maxRetries) {
          await new Promise((r) => setTimeout(r, retryDelayMs * 2 ** attempt));
        }
      }

      logger.error("Failed to send alert after retries", {
        level: payload.level,
        title: payload.title,
        error: lastError,
        maxRetries,
      });
    },
  };
};

/**
 * No-op alert sink for when no webhook URL is configured.
 * Alerts still reach the log through the callers.
 */
export const createNoopAlertSink = (): AlertSink => ({
  get enabled(): boolean {
    return false;
  },
  async send(_payload: AlertPayload): Promise<void> {},
});
