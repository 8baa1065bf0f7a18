export const IdempotencyStatus = {
  LOCKED: "locked",
  COMPLETED: "completed",
} as const;

export type IdempotencyStatus = (typeof IdempotencyStatus)[keyof typeof IdempotencyStatus];

/** Response captured for replay. Only a small header allow-list is kept. */
export interface CachedResponse {
  readonly status: number;
  readonly body: string;
  readonly headers: Readonly<Record<string, string>>;
}

/**
 * One record per (scope, key). `requestHash` is fixed at insert time;
 * `lockToken` identifies the executor currently holding the key.
 */
export interface IdempotencyRecord {
  readonly scope: string;
  readonly key: string;
  readonly requestHash: string;
  readonly status: IdempotencyStatus;
  readonly lockToken: string;
  readonly response: CachedResponse | null;
  readonly lockedAt: number;
  readonly completedAt: number | null;
  readonly createdAt: number;
  readonly expiresAt: number;
}
