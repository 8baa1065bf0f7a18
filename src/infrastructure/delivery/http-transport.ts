import { deliveryFailed, errorMessage } from "../../core/errors/app-error.js";
import type {
  TransportRequest,
  TransportResponse,
  WebhookTransport,
} from "../../core/ports/webhook-transport.js";
import { err, ok } from "../../core/types/result.js";
import { truncateUtf8Bytes } from "../../shared/utils/truncate.js";

/**
 * Read at most `maxBytes` (plus one byte, to find a character boundary)
 * of the body, then cancel the stream.
 */
const readBounded = async (res: Response, maxBytes: number): Promise<string> => {
  if (!res.body) return "";

  const reader = res.body.getReader();
  const chunks: Buffer[] = [];
  let total = 0;
  for (;;) {
    const { done, value } = await reader.read();
    if (done) return truncateUtf8Bytes(Buffer.concat(chunks), maxBytes);
    const chunk = Buffer.from(value);
    chunks.push(chunk);
    total += chunk.length;
    if (total > maxBytes) {
      await reader.cancel();
      return truncateUtf8Bytes(Buffer.concat(chunks), maxBytes);
    }
  }
};

/**
 * Webhook transport over the global fetch. The abort timer covers reading
 * the response body as well as the headers.
 */
export const createHttpTransport = (): WebhookTransport => ({
  async post(request: TransportRequest) {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);

    try {
      const res = await fetch(request.url, {
        method: "POST",
        headers: request.headers,
        body: request.body,
        redirect: "manual",
        signal: controller.signal,
      });
      const body = await readBounded(res, request.maxResponseBytes);
      const response: TransportResponse = { status: res.status, body };
      return ok(response);
    } catch (e: unknown) {
      const message = controller.signal.aborted
        ? `Request timed out after ${request.timeoutMs}ms`
        : `Request failed: ${errorMessage(e)}`;
      return err(deliveryFailed(message, { status: null, attempt: 0 }, e));
    } finally {
      clearTimeout(timeout);
    }
  },
});
