import { type ServerType, serve } from "@hono/node-server";
import type { Logger } from "../core/ports/logger.js";
import type { MetricsCollector } from "../core/ports/metrics.js";
import { brand } from "../core/types/brand.js";
import type { AppConfig } from "../infrastructure/config/config.js";
import { formatAccessLog } from "../shared/log-format.js";
import { generateId } from "../shared/utils/id.js";
import type { RequestContext } from "./context.js";
import type { Router } from "./routes/router.js";

interface ServerDeps {
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly router: Router;
  readonly metrics: MetricsCollector;
}

/**
 * Extract pathname from a full URL string without allocating a URL object.
 *   "http://host:port/path?query" → "/path"
 */
const extractPath = (url: string): string => {
  const start = url.indexOf("/", url.indexOf("//") + 2);
  if (start === -1) return "/";
  const qIdx = url.indexOf("?", start);
  return qIdx === -1 ? url.substring(start) : url.substring(start, qIdx);
};

const REQUEST_ID_PATTERN = /^[A-Za-z0-9._-]{1,128}$/;

export const createServer = (deps: ServerDeps) => {
  const { config, logger, router, metrics } = deps;

  const internalErrorBody = (requestId: string) =>
    JSON.stringify({
      error: { code: "internal", message: "Internal server error" },
      requestId,
    });

  // ── Access log: immediate in development, batched in production ──
  let logBuffer: string[] = [];
  let logFlushScheduled = false;
  const isDev = config.env !== "production";
  const LOG_FLUSH_INTERVAL_MS = 100;

  const flushLogs = (): void => {
    logFlushScheduled = false;
    if (logBuffer.length === 0) return;
    const batch = logBuffer;
    logBuffer = [];
    process.stdout.write(batch.join(""));
  };

  const writeLog = (line: string): void => {
    if (isDev) {
      process.stdout.write(line);
      return;
    }
    logBuffer.push(line);
    if (!logFlushScheduled) {
      logFlushScheduled = true;
      setTimeout(flushLogs, LOG_FLUSH_INTERVAL_MS).unref();
    }
  };

  const shouldLog = config.log.level !== "fatal"; // "fatal" = effectively no access log

  const handle = async (req: Request, ip = "0"): Promise<Response> => {
    const startTime = performance.now();
    const method = req.method;
    const path = extractPath(req.url);

    const incomingId = req.headers.get("x-request-id");
    const requestId =
      incomingId !== null && REQUEST_ID_PATTERN.test(incomingId) ? incomingId : generateId();

    const matched = router.match(method, path);
    const route = matched?.route ?? "unmatched";

    let response: Response;
    if (matched) {
      const ctx: RequestContext = {
        requestId: brand<string, "RequestId">(requestId),
        startTime,
        ip,
        method,
        path,
        params: matched.params,
        logger: logger.child({ requestId }),
      };
      try {
        response = await matched.handler(req, ctx);
      } catch (e: unknown) {
        logger.error("Unhandled error", {
          requestId,
          method,
          path,
          error: e instanceof Error ? e.message : String(e),
          stack: e instanceof Error ? e.stack : undefined,
        });
        response = new Response(internalErrorBody(requestId), {
          status: 500,
          headers: { "Content-Type": "application/json" },
        });
      }
    } else {
      response = router.notFoundResponse(method, path, requestId);
    }

    response.headers.set("X-Request-Id", requestId);

    const durationMs = Math.round((performance.now() - startTime) * 100) / 100;
    metrics.httpRequestsTotal.inc({ method, status: String(response.status), route });
    metrics.httpRequestDurationMs.observe(durationMs, { method, route });

    if (shouldLog) {
      writeLog(formatAccessLog(method, path, response.status, durationMs, ip, requestId));
    }

    return response;
  };

  return {
    /** Fetch-style entry point; also what tests drive directly */
    handle,

    start(): ServerType {
      return serve({
        hostname: config.host,
        port: config.port,
        fetch: (req, env) => handle(req, env.incoming.socket.remoteAddress ?? "0"),
      });
    },

    /** Force-flush any buffered access logs (call before exit) */
    flush: flushLogs,
  };
};

export type AppServer = ReturnType<typeof createServer>;
