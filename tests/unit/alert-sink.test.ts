import { afterEach, describe, expect, it, vi } from "vitest";
import { AlertLevel, type AlertPayload } from "../../src/core/ports/alert-sink.js";
import { createNoopAlertSink, createWebhookAlertSink } from "../../src/infrastructure/alerting/webhook.js";
import { createSilentLogger } from "../../src/infrastructure/logging/logger.js";

const alert: AlertPayload = {
  level: AlertLevel.WARNING,
  title: "Webhook delivery exhausted",
  message: "Delivery failed after 5 attempts",
  timestamp: "2026-01-01T00:00:00.000Z",
  source: "delivery-worker",
};

const sink = () =>
  createWebhookAlertSink({
    url: "https://alerts.test/hook",
    retryDelayMs: 0,
    logger: createSilentLogger(),
  });

describe("Alert Sink", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  describe("WebhookAlertSink", () => {
    it("posts the alert as JSON", async () => {
      const fetchMock = vi.fn(async () => new Response(null, { status: 204 }));
      vi.stubGlobal("fetch", fetchMock);

      await sink().send(alert);

      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(fetchMock).toHaveBeenCalledWith(
        "https://alerts.test/hook",
        expect.objectContaining({ method: "POST", body: JSON.stringify(alert) }),
      );
    });

    it("retries a non-2xx status and stops at the first success", async () => {
      const fetchMock = vi
        .fn<() => Promise<Response>>()
        .mockResolvedValueOnce(new Response(null, { status: 502 }))
        .mockResolvedValueOnce(new Response(null, { status: 200 }));
      vi.stubGlobal("fetch", fetchMock);

      await sink().send(alert);
      expect(fetchMock).toHaveBeenCalledTimes(2);
    });

    it("gives up after the retries without rejecting", async () => {
      const fetchMock = vi.fn(async () => {
        throw new Error("connection refused");
      });
      vi.stubGlobal("fetch", fetchMock);

      await expect(sink().send(alert)).resolves.toBeUndefined();
      expect(fetchMock).toHaveBeenCalledTimes(3);
    });

    it("reports as enabled", () => {
      expect(sink().enabled).toBe(true);
    });
  });

  describe("NoopAlertSink", () => {
    it("reports as not enabled and swallows alerts", async () => {
      const noop = createNoopAlertSink();
      expect(noop.enabled).toBe(false);
      await expect(noop.send(alert)).resolves.toBeUndefined();
    });
  });

  it("AlertLevel has the expected values", () => {
    expect(AlertLevel.WARNING).toBe("warning");
    expect(AlertLevel.CRITICAL).toBe("critical");
  });
});
