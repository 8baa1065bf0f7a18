/**
 * Delivery worker pool: drains the durable delivery queue.
 *
 * Every configured queue runs `concurrency` independent workers. A worker
 * loops claim → attempt, and sleeps for the poll interval whenever its queue
 * has nothing due. All coordination happens through the store's guarded
 * updates, so pools in several processes can share one database.
 */

import type { AppError } from "../../core/errors/app-error.js";
import { errorMessage } from "../../core/errors/app-error.js";
import type { DeliveryStore } from "../../core/ports/delivery-store.js";
import type { Logger } from "../../core/ports/logger.js";
import { type Result, ok } from "../../core/types/result.js";
import { generateId } from "../../shared/utils/id.js";
import type { AttemptOutcome, WebhookDispatcher } from "./webhook-dispatcher.js";

export interface QueueStats {
  readonly workers: number;
  readonly busy: number;
  readonly attempts: number;
  readonly errors: number;
}

export interface WorkerPoolStats {
  readonly running: boolean;
  readonly queues: Readonly<Record<string, QueueStats>>;
}

export interface DeliveryWorkerPool {
  start(): void;
  /** Stop claiming and wait for attempts already started */
  stop(): Promise<void>;
  /** Claim and attempt at most one due delivery; null when nothing was due */
  runOnce(queue: string, workerId?: string): Promise<Result<AttemptOutcome | null, AppError>>;
  /** Return orphaned `in_flight` rows to the queue */
  reap(): Promise<Result<number, AppError>>;
  stats(): WorkerPoolStats;
  readonly running: boolean;
}

interface DeliveryWorkerPoolDeps {
  readonly deliveries: DeliveryStore;
  readonly dispatcher: WebhookDispatcher;
  readonly logger: Logger;
  /** `{ queueName: concurrency }`, fixed for the life of the pool */
  readonly queues: Readonly<Record<string, number>>;
  readonly pollIntervalMs?: number | undefined;
  /** An `in_flight` row untouched this long belongs to a dead worker */
  readonly leaseMs?: number | undefined;
  readonly now?: (() => number) | undefined;
}

interface WorkerState {
  readonly id: string;
  readonly queue: string;
  busy: boolean;
  attempts: number;
  errors: number;
}

export const createDeliveryWorkerPool = (deps: DeliveryWorkerPoolDeps): DeliveryWorkerPool => {
  const { deliveries, dispatcher } = deps;
  const queues = Object.freeze({ ...deps.queues });
  const pollIntervalMs = deps.pollIntervalMs ?? 1_000;
  const leaseMs = deps.leaseMs ?? 120_000;
  const now = deps.now ?? Date.now;
  const logger = deps.logger.child({ service: "delivery-pool" });

  const workers: WorkerState[] = [];
  const loops: Promise<void>[] = [];
  const sleepers = new Set<() => void>();
  let reaperTimer: ReturnType<typeof setInterval> | null = null;
  let running = false;

  const sleep = (ms: number): Promise<void> =>
    new Promise((resolve) => {
      const wake = (): void => {
        clearTimeout(timer);
        sleepers.delete(wake);
        resolve();
      };
      const timer = setTimeout(wake, ms);
      sleepers.add(wake);
    });

  const runOnce = async (
    queue: string,
    workerId = `manual-${generateId()}`,
  ): Promise<Result<AttemptOutcome | null, AppError>> => {
    const claimed = await deliveries.claimNext({ queue, workerId, now: now() });
    if (!claimed.ok) return claimed;
    if (!claimed.value) return ok(null);
    return dispatcher.attempt(claimed.value);
  };

  const reap = async (): Promise<Result<number, AppError>> => {
    const at = now();
    const result = await deliveries.reclaimStale(at - leaseMs, at);
    if (result.ok && result.value > 0) {
      logger.warn("Reclaimed orphaned in-flight deliveries", { count: result.value, leaseMs });
    }
    return result;
  };

  const workerLoop = async (worker: WorkerState): Promise<void> => {
    const log = logger.child({ queue: worker.queue, worker: worker.id });
    log.debug("Worker started");

    while (running) {
      worker.busy = true;
      let idle = true;
      try {
        const result = await runOnce(worker.queue, worker.id);
        if (!result.ok) {
          worker.errors++;
          log.error("Delivery attempt failed", { error: result.error.message });
        } else if (result.value !== null) {
          worker.attempts++;
          idle = false;
        }
      } catch (e: unknown) {
        worker.errors++;
        log.error("Worker iteration threw", { error: errorMessage(e) });
      } finally {
        worker.busy = false;
      }

      if (idle && running) await sleep(pollIntervalMs);
    }

    log.debug("Worker stopped");
  };

  const reapTick = (): void => {
    reap().then(
      (result) => {
        if (!result.ok) logger.error("Reaper failed", { error: result.error.message });
      },
      (e: unknown) => logger.error("Reaper threw", { error: errorMessage(e) }),
    );
  };

  return {
    start(): void {
      if (running) return;
      running = true;
      workers.length = 0;
      loops.length = 0;

      for (const [queue, concurrency] of Object.entries(queues)) {
        for (let i = 0; i < concurrency; i++) {
          const worker: WorkerState = {
            id: `${queue}-${i + 1}-${generateId().slice(0, 8)}`,
            queue,
            busy: false,
            attempts: 0,
            errors: 0,
          };
          workers.push(worker);
          loops.push(workerLoop(worker));
        }
      }

      reaperTimer = setInterval(reapTick, Math.max(pollIntervalMs, Math.floor(leaseMs / 2)));
      reaperTimer.unref();
      reapTick();

      logger.info("Delivery workers started", { queues, pollIntervalMs, leaseMs });
    },

    async stop(): Promise<void> {
      if (!running) return;
      running = false;
      if (reaperTimer) {
        clearInterval(reaperTimer);
        reaperTimer = null;
      }
      for (const wake of [...sleepers]) wake();
      await Promise.all(loops);
      logger.info("Delivery workers stopped");
    },

    runOnce,
    reap,

    stats(): WorkerPoolStats {
      const byQueue: Record<string, QueueStats> = {};
      for (const queue of Object.keys(queues)) {
        const own = workers.filter((w) => w.queue === queue);
        byQueue[queue] = {
          workers: running ? own.length : 0,
          busy: own.filter((w) => w.busy).length,
          attempts: own.reduce((n, w) => n + w.attempts, 0),
          errors: own.reduce((n, w) => n + w.errors, 0),
        };
      }
      return { running, queues: byQueue };
    },

    get running() {
      return running;
    },
  };
};
