/**
 * Delivery store port: the durable outbound queue.
 *
 * Rows move between statuses only through version-guarded updates, so any
 * number of workers in any number of processes can share one store.
 */

import type { AppError } from "../errors/app-error.js";
import type { DeliveryStatus, WebhookDelivery } from "../entities/webhook-delivery.entity.js";
import type { WebhookEventType } from "../entities/webhook-endpoint.entity.js";
import type { DeliveryId, EndpointId } from "../types/brand.js";
import type { CursorParams, PaginatedResult } from "../types/pagination.js";
import type { Result } from "../types/result.js";

export interface NewDelivery {
  readonly endpointId: EndpointId;
  readonly eventId: string;
  readonly eventType: WebhookEventType;
  readonly payload: string;
  readonly queue: string;
}

export interface ClaimRequest {
  readonly queue: string;
  readonly workerId: string;
  readonly now: number;
}

/** Terminal or retry state written after an attempt */
export interface AttemptRecord {
  readonly status:
    | typeof DeliveryStatus.DELIVERED
    | typeof DeliveryStatus.PENDING_RETRY
    | typeof DeliveryStatus.FAILED_EXHAUSTED;
  readonly attempts: number;
  readonly nextAttemptAt: number | null;
  readonly responseStatus: number | null;
  readonly responseBody: string | null;
  readonly error: string | null;
  readonly now: number;
}

export interface DeliveryListOptions extends CursorParams {
  readonly status?: DeliveryStatus | undefined;
}

export type DeliveryCounts = Readonly<Record<DeliveryStatus, number>>;

export interface DeliveryStore {
  /**
   * Insert `pending` rows due at `now`. A row whose (endpointId, eventId)
   * already exists is skipped; only newly inserted rows are returned.
   */
  enqueue(
    deliveries: readonly NewDelivery[],
    now: number,
  ): Promise<Result<readonly WebhookDelivery[], AppError>>;

  /**
   * Move one due row of `queue` to `in_flight`. Rows of disabled or deleted
   * endpoints and rows whose endpoint is at its concurrency cap are skipped.
   */
  claimNext(request: ClaimRequest): Promise<Result<WebhookDelivery | null, AppError>>;

  /** Write the outcome of an attempt on a row still `in_flight` at `expectedVersion` */
  finishAttempt(
    id: DeliveryId,
    expectedVersion: number,
    record: AttemptRecord,
  ): Promise<Result<WebhookDelivery | null, AppError>>;

  /** `in_flight` → `pending_retry` without touching attempts or schedule */
  releaseClaim(
    id: DeliveryId,
    expectedVersion: number,
    now: number,
  ): Promise<Result<boolean, AppError>>;

  /** `in_flight` → `cancelled`, for a claimed row whose endpoint was deleted */
  cancelClaim(
    id: DeliveryId,
    expectedVersion: number,
    now: number,
  ): Promise<Result<boolean, AppError>>;

  /** `pending` / `pending_retry` → `cancelled`; null when the row was in another state */
  cancel(id: DeliveryId, now: number): Promise<Result<WebhookDelivery | null, AppError>>;

  /** Cancel every non-terminal, unclaimed row of an endpoint */
  cancelForEndpoint(endpointId: EndpointId, now: number): Promise<Result<number, AppError>>;

  /**
   * Return `in_flight` rows untouched since `staleBefore` to `pending_retry`.
   * Stale rows whose endpoint no longer exists are cancelled instead.
   */
  reclaimStale(staleBefore: number, now: number): Promise<Result<number, AppError>>;

  get(id: DeliveryId): Promise<Result<WebhookDelivery | null, AppError>>;

  listByEndpoint(
    endpointId: EndpointId,
    options: DeliveryListOptions,
  ): Promise<Result<PaginatedResult<WebhookDelivery>, AppError>>;

  countByStatus(): Promise<Result<DeliveryCounts, AppError>>;
}
