import type { SqliteDb } from "./db";

export type OutcomeStatus = "pending" | "sent" | "failed_permanent" | "failed_retryable";

export const TERMINAL_OUTCOME_STATUSES: readonly OutcomeStatus[] = ["sent", "failed_permanent"] as const;

export type DeliveryOutcome = {
  entry_id: number;
  recipient_id: number;
  status: OutcomeStatus;
  attempt_count: number;
  last_attempt_at: number | null;
  last_error: string | null;
  next_attempt_at: number | null;
  lease_owner: string | null;
  lease_expires_at: number | null;
  created_at: number;
  updated_at: number;
};

/** Exclusive right to dispatch one outcome row until `expiresAt`. */
export type OutcomeLease = {
  owner: string;
  now: number;
  expiresAt: number;
};

export function isTerminalOutcome(status: OutcomeStatus): boolean {
  return TERMINAL_OUTCOME_STATUSES.includes(status);
}

/**
 * Fan-out: one `pending` row per recipient, leased to the worker that claimed the entry.
 * Rows that already exist are left alone. Returns the number of rows created.
 */
export function createPendingOutcomes(
  db: SqliteDb,
  entryId: number,
  recipientIds: readonly number[],
  lease: OutcomeLease
): number {
  const insert = db.prepare(
    [
      "INSERT INTO delivery_outcomes",
      "(entry_id, recipient_id, status, attempt_count, lease_owner, lease_expires_at, created_at, updated_at)",
      "VALUES (?, ?, 'pending', 0, ?, ?, ?, ?)",
      "ON CONFLICT(entry_id, recipient_id) DO NOTHING"
    ].join(" ")
  );

  const txn = db.transaction(() => {
    let created = 0;
    for (const recipientId of recipientIds) {
      const result = insert.run(entryId, recipientId, lease.owner, lease.expiresAt, lease.now, lease.now);
      created += result.changes;
    }
    return created;
  });

  return txn();
}

/**
 * Compare-and-set lease acquisition for a non-terminal row whose previous lease (if any) has lapsed.
 * Returns false when another worker holds the row or it has reached a terminal status.
 */
export function claimOutcome(db: SqliteDb, entryId: number, recipientId: number, lease: OutcomeLease): boolean {
  const result = db
    .prepare(
      [
        "UPDATE delivery_outcomes SET lease_owner = ?, lease_expires_at = ?, updated_at = ?",
        "WHERE entry_id = ? AND recipient_id = ?",
        "AND status IN ('pending', 'failed_retryable')",
        "AND (lease_expires_at IS NULL OR lease_expires_at <= ?)"
      ].join(" ")
    )
    .run(lease.owner, lease.expiresAt, lease.now, entryId, recipientId, lease.now);
  return result.changes === 1;
}

/**
 * Takes or renews the dispatch lease right before a send: succeeds when the row is free, its lease lapsed,
 * or `lease.owner` already holds it. Creates the pending row when fan-out never did.
 */
export function acquireOutcomeLease(db: SqliteDb, entryId: number, recipientId: number, lease: OutcomeLease): boolean {
  const result = db
    .prepare(
      [
        "INSERT INTO delivery_outcomes",
        "(entry_id, recipient_id, status, attempt_count, lease_owner, lease_expires_at, created_at, updated_at)",
        "VALUES (@entryId, @recipientId, 'pending', 0, @owner, @expiresAt, @now, @now)",
        "ON CONFLICT(entry_id, recipient_id) DO UPDATE SET",
        "  lease_owner = excluded.lease_owner,",
        "  lease_expires_at = excluded.lease_expires_at,",
        "  updated_at = excluded.updated_at",
        "WHERE delivery_outcomes.status IN ('pending', 'failed_retryable')",
        "AND (delivery_outcomes.lease_owner IS NULL OR delivery_outcomes.lease_owner = @owner",
        "  OR delivery_outcomes.lease_expires_at IS NULL OR delivery_outcomes.lease_expires_at <= @now)"
      ].join(" ")
    )
    .run({ entryId, recipientId, owner: lease.owner, expiresAt: lease.expiresAt, now: lease.now });
  return result.changes === 1;
}

export type RecordOutcomeInput = {
  entryId: number;
  recipientId: number;
  status: OutcomeStatus;
  error?: string | null;
  now?: number;
  nextAttemptAt?: number | null;
  // When set, the write only lands while this worker (or nobody) holds the lease.
  leaseOwner?: string | null;
};

/**
 * Upserts a delivery outcome. Any status other than `pending` counts as an attempt.
 * Rows that are already terminal are never overwritten, nor rows leased to another worker than `leaseOwner`.
 * Releases the dispatch lease. Returns the stored row, which is unchanged when the write was refused.
 */
export function recordOutcome(db: SqliteDb, input: RecordOutcomeInput): DeliveryOutcome {
  const now = input.now ?? Date.now();
  const attempted = input.status !== "pending";

  db.prepare(
    [
      "INSERT INTO delivery_outcomes",
      "(entry_id, recipient_id, status, attempt_count, last_attempt_at, last_error, next_attempt_at,",
      " lease_owner, lease_expires_at, created_at, updated_at)",
      "VALUES (@entryId, @recipientId, @status, @attemptDelta, @lastAttemptAt, @lastError, @nextAttemptAt, NULL, NULL, @now, @now)",
      "ON CONFLICT(entry_id, recipient_id) DO UPDATE SET",
      "  status = excluded.status,",
      "  attempt_count = delivery_outcomes.attempt_count + excluded.attempt_count,",
      "  last_attempt_at = COALESCE(excluded.last_attempt_at, delivery_outcomes.last_attempt_at),",
      "  last_error = excluded.last_error,",
      "  next_attempt_at = excluded.next_attempt_at,",
      "  lease_owner = NULL,",
      "  lease_expires_at = NULL,",
      "  updated_at = excluded.updated_at",
      "WHERE delivery_outcomes.status NOT IN ('sent', 'failed_permanent')",
      "AND (@leaseOwner IS NULL OR delivery_outcomes.lease_owner IS NULL OR delivery_outcomes.lease_owner = @leaseOwner)"
    ].join(" ")
  ).run({
    entryId: input.entryId,
    recipientId: input.recipientId,
    status: input.status,
    attemptDelta: attempted ? 1 : 0,
    lastAttemptAt: attempted ? now : null,
    lastError: input.error ?? null,
    nextAttemptAt: input.status === "failed_retryable" ? (input.nextAttemptAt ?? null) : null,
    leaseOwner: input.leaseOwner ?? null,
    now
  });

  const row = getOutcome(db, input.entryId, input.recipientId);
  if (!row) {
    throw new Error(`Delivery outcome missing after upsert: entry=${input.entryId} recipient=${input.recipientId}`);
  }
  return row;
}

export function getOutcome(db: SqliteDb, entryId: number, recipientId: number): DeliveryOutcome | null {
  const row = db
    .prepare<[number, number], DeliveryOutcome>("SELECT * FROM delivery_outcomes WHERE entry_id = ? AND recipient_id = ?")
    .get(entryId, recipientId);
  return row ?? null;
}

export function listOutcomes(db: SqliteDb, entryId: number): DeliveryOutcome[] {
  return db
    .prepare<[number], DeliveryOutcome>("SELECT * FROM delivery_outcomes WHERE entry_id = ? ORDER BY recipient_id ASC")
    .all(entryId);
}

export function countUnresolvedOutcomes(db: SqliteDb, entryId: number): number {
  const row = db
    .prepare<[number], { count: number }>(
      "SELECT COUNT(*) AS count FROM delivery_outcomes WHERE entry_id = ? AND status IN ('pending', 'failed_retryable')"
    )
    .get(entryId);
  return Number(row?.count ?? 0);
}

/**
 * Outcomes of in-progress entries that a tick should offer to the dispatcher again:
 * retryable rows whose backoff has elapsed at `asOf`, and pending rows whose dispatch lease lapsed at `leaseNow`
 * (worker died mid-send).
 */
export function listReofferableOutcomes(db: SqliteDb, asOf: number, limit = 500, leaseNow = asOf): DeliveryOutcome[] {
  return db
    .prepare<{ asOf: number; leaseNow: number; limit: number }, DeliveryOutcome>(
      [
        "SELECT o.* FROM delivery_outcomes o",
        "JOIN content_plan c ON c.entry_id = o.entry_id",
        "WHERE c.status = 'in_progress'",
        "AND o.status IN ('pending', 'failed_retryable')",
        "AND (o.lease_expires_at IS NULL OR o.lease_expires_at <= @leaseNow)",
        "AND (o.status = 'pending' OR o.next_attempt_at IS NULL OR o.next_attempt_at <= @asOf)",
        "ORDER BY o.entry_id ASC, o.recipient_id ASC",
        "LIMIT @limit"
      ].join(" ")
    )
    .all({ asOf, leaseNow, limit });
}
