import { createHealthService } from "./application/services/health.service.js";
import { createIdempotencyGate } from "./application/services/idempotency.service.js";
import { createIncomingWebhookService } from "./application/services/incoming-webhook.service.js";
import { createWebhookService } from "./application/services/webhook.service.js";
import { errorMessage } from "./core/errors/app-error.js";
import { AlertLevel } from "./core/ports/alert-sink.js";
import { createNoopAlertSink, createWebhookAlertSink } from "./infrastructure/alerting/webhook.js";
import { loadConfig } from "./infrastructure/config/config.js";
import { openStorage } from "./infrastructure/database/storage.js";
import { createDeliveryWorkerPool } from "./infrastructure/delivery/delivery-worker-pool.js";
import { createHttpTransport } from "./infrastructure/delivery/http-transport.js";
import { createWebhookDispatcher } from "./infrastructure/delivery/webhook-dispatcher.js";
import { createLogger } from "./infrastructure/logging/logger.js";
import { createMetricsCollector } from "./infrastructure/metrics/prometheus.js";
import { createSignatureVerifier } from "./infrastructure/security/signature.js";
import { createRouter } from "./presentation/routes/router.js";
import { createServer } from "./presentation/server.js";
import { printShutdown, printStartupBanner } from "./shared/cli.js";

const VERSION = "1.0.0";

/**
 * Bootstrap: compose the dependency graph, then start the server and the
 * delivery workers. Single entry point, fail-fast on misconfiguration.
 */
const bootstrap = async (): Promise<void> => {
  const bootStart = performance.now();

  // 1. Config (validated, fails fast)
  const config = loadConfig();

  // 2. Observability
  const logger = createLogger({ level: config.log.level, format: config.log.format });
  const metrics = createMetricsCollector();
  const alertSink = config.alerting.webhookUrl
    ? createWebhookAlertSink({
        url: config.alerting.webhookUrl,
        timeoutMs: config.alerting.timeoutMs,
        logger,
      })
    : createNoopAlertSink();

  // 3. Storage: Postgres when DATABASE_URL is set, SQLite otherwise; migrated on open
  const storage = await openStorage(config.database, logger);

  // 4. Application services
  const queueNames = Object.keys(config.delivery.queues);
  const gate = createIdempotencyGate({
    store: storage.idempotency,
    logger,
    ttlMs: config.idempotency.ttlMs,
    staleLockMs: config.idempotency.staleLockMs,
  });
  const webhookService = createWebhookService({
    registry: storage.registry,
    deliveries: storage.deliveries,
    logger,
    queues: queueNames,
  });
  const incomingService = createIncomingWebhookService({
    store: storage.incoming,
    sources: config.incoming.sources,
    verifier: createSignatureVerifier({ toleranceSeconds: config.signature.toleranceSeconds }),
    alertSink,
    metrics,
    logger,
    staleMs: config.incoming.staleMs,
  });

  // 5. Delivery workers
  const dispatcher = createWebhookDispatcher({
    registry: storage.registry,
    deliveries: storage.deliveries,
    transport: createHttpTransport(),
    alertSink,
    metrics,
    logger,
    timeoutMs: config.delivery.timeoutMs,
    responseMaxBytes: config.delivery.responseMaxBytes,
  });
  const workerPool = createDeliveryWorkerPool({
    deliveries: storage.deliveries,
    dispatcher,
    logger,
    queues: config.delivery.queues,
    pollIntervalMs: config.delivery.pollIntervalMs,
    leaseMs: config.delivery.leaseMs,
  });

  const healthService = createHealthService({
    logger: logger.child({ service: "health" }),
    version: VERSION,
    probes: [
      {
        name: "database",
        critical: true,
        async check() {
          await storage.ping();
          return { status: "ok", details: storage.kind };
        },
      },
      {
        name: "workers",
        critical: false,
        async check() {
          if (!config.delivery.enabled) return { status: "ok", details: "disabled" };
          return workerPool.running
            ? { status: "ok" }
            : { status: "degraded", details: "worker pool is not running" };
        },
      },
    ],
  });

  // 6. Presentation
  const router = createRouter({
    webhookService,
    incomingService,
    healthService,
    gate,
    metrics,
    logger,
  });
  const srv = createServer({ config, logger, router, metrics });

  // 7. Start
  const instance = srv.start();
  if (config.delivery.enabled) workerPool.start();

  printStartupBanner({ config, bootTimeMs: performance.now() - bootStart, storage: storage.kind });

  // 8. Periodic sweep of expired idempotency keys
  const sweepInterval = setInterval(() => {
    gate.sweep().then(
      (result) => {
        if (!result.ok) logger.error("Idempotency sweep failed", { error: result.error.message });
      },
      (e: unknown) => logger.error("Idempotency sweep threw", { error: errorMessage(e) }),
    );
  }, config.idempotency.sweepIntervalMs);
  sweepInterval.unref();

  // Inbound events accepted before a crash but never finished
  const recoverIncoming = (): void => {
    incomingService.recoverStale().then(
      (result) => {
        if (!result.ok) logger.error("Incoming event recovery failed", { error: result.error.message });
      },
      (e: unknown) => logger.error("Incoming event recovery threw", { error: errorMessage(e) }),
    );
  };
  recoverIncoming();
  const recoveryInterval = setInterval(recoverIncoming, config.incoming.recoveryIntervalMs);
  recoveryInterval.unref();

  // 9. Graceful shutdown: stop intake and let in-flight attempts finish before closing
  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    printShutdown(signal);
    clearInterval(sweepInterval);
    clearInterval(recoveryInterval);
    await new Promise<void>((resolve) => instance.close(() => resolve()));
    await workerPool.stop();
    await incomingService.drain();
    srv.flush();
    await storage.close();
    process.exit(0);
  };

  const onSignal = (signal: string) => () => {
    shutdown(signal).catch((e: unknown) => {
      logger.fatal("Shutdown failed", { error: errorMessage(e) });
      process.exit(1);
    });
  };
  process.on("SIGINT", onSignal("SIGINT"));
  process.on("SIGTERM", onSignal("SIGTERM"));

  // 10. Unhandled rejection safety net
  process.on("unhandledRejection", (reason) => {
    logger.fatal("Unhandled promise rejection", {
      error: errorMessage(reason),
      stack: reason instanceof Error ? reason.stack : undefined,
    });
    void alertSink.send({
      level: AlertLevel.CRITICAL,
      title: "Unhandled promise rejection",
      message: errorMessage(reason),
      timestamp: new Date().toISOString(),
      source: "relay",
      metadata: { stack: reason instanceof Error ? reason.stack : undefined },
    });
  });
};

bootstrap().catch((e: unknown) => {
  process.stderr.write(`Fatal: failed to start: ${errorMessage(e)}\n`);
  process.exit(1);
});
