import type { ContentPlanEntry, EntryStatus } from "../db/contentPlanRepo";
import { finalizeEntry } from "../db/contentPlanRepo";
import type { SqliteDb } from "../db/db";
import {
  acquireOutcomeLease,
  countUnresolvedOutcomes,
  getOutcome,
  isTerminalOutcome,
  recordOutcome,
  type OutcomeStatus
} from "../db/outcomesRepo";
import { getUser, type UserRow } from "../db/usersRepo";
import { TransportError, UserNotFoundError, describeError } from "../errors";
import { logger } from "../logger";
import { classifyTransportError } from "../transport/classify";
import type { MessageTransport } from "../transport/types";
import type { Personalizer, RenderedMessage } from "./personalize";

export type RetryPolicy = {
  maxAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
};

export type DispatcherOptions = RetryPolicy & {
  db: SqliteDb;
  transport: MessageTransport;
  personalizer: Personalizer;
  sendTimeoutMs: number;
  workerId: string;
  // How long a send may hold its outcome row before other workers may take it over.
  leaseMs: number;
  // Wall clock for leases. Attempt and retry times use the `now` passed to send.
  clock?: () => number;
};

export type DispatchResult = {
  entryId: number;
  recipientId: number;
  status: OutcomeStatus;
  attemptCount: number;
  error: string | null;
  entryStatus: EntryStatus;
  // False when nothing was sent: the outcome was already terminal or another worker holds its lease.
  attempted: boolean;
};

export type Dispatcher = {
  send: (entry: ContentPlanEntry, recipient: UserRow, now?: number) => Promise<DispatchResult>;
  sendTo: (entry: ContentPlanEntry, recipientId: number, now?: number) => Promise<DispatchResult>;
};

export function backoffDelayMs(attempt: number, base: number, max: number): number {
  return Math.min(max, base * Math.max(1, 2 ** (attempt - 1)));
}

function withTimeout<T>(work: Promise<T>, timeoutMs: number): Promise<T> {
  let timeoutId: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TransportError("retryable", `send timed out after ${timeoutMs}ms`));
    }, timeoutMs);
    timeoutId.unref?.();
  });
  return Promise.race([work, timeout]).finally(() => clearTimeout(timeoutId));
}

/**
 * Decides the stored status for a failed attempt. `attempt` is the 1-based number of the attempt that just failed.
 */
export function outcomeForFailure(
  error: TransportError,
  attempt: number,
  policy: RetryPolicy,
  now: number
): { status: OutcomeStatus; nextAttemptAt: number | null } {
  if (error.kind === "permanent" || attempt >= policy.maxAttempts) {
    return { status: "failed_permanent", nextAttemptAt: null };
  }
  const backoff = backoffDelayMs(attempt, policy.retryBaseDelayMs, policy.retryMaxDelayMs);
  const retryAfter = error.details?.retryAfterMs;
  const waitMs = typeof retryAfter === "number" ? Math.max(backoff, retryAfter) : backoff;
  return { status: "failed_retryable", nextAttemptAt: now + waitMs };
}

export function createDispatcher(options: DispatcherOptions): Dispatcher {
  const { db, transport, personalizer, sendTimeoutMs, workerId, leaseMs } = options;
  const clock = options.clock ?? Date.now;
  const policy: RetryPolicy = {
    maxAttempts: options.maxAttempts,
    retryBaseDelayMs: options.retryBaseDelayMs,
    retryMaxDelayMs: options.retryMaxDelayMs
  };

  function finishAttempt(entry: ContentPlanEntry, now: number): EntryStatus {
    if (countUnresolvedOutcomes(db, entry.entry_id) > 0) return "in_progress";
    return finalizeEntry(db, entry.entry_id, now);
  }

  function renderSafely(entry: ContentPlanEntry, recipient: UserRow): RenderedMessage {
    try {
      return personalizer.render(entry, recipient);
    } catch (err) {
      logger.warn(
        { entryId: entry.entry_id, recipientId: recipient.user_id, err },
        "Personalization failed; sending template text as-is"
      );
      return { text: entry.message_text, mediaRefs: [...entry.media_refs] };
    }
  }

  async function send(entry: ContentPlanEntry, recipient: UserRow, now = Date.now()): Promise<DispatchResult> {
    const entryId = entry.entry_id;
    const recipientId = recipient.user_id;
    const previous = getOutcome(db, entryId, recipientId);

    const leaseNow = clock();
    const leased =
      !(previous && isTerminalOutcome(previous.status)) &&
      acquireOutcomeLease(db, entryId, recipientId, { owner: workerId, now: leaseNow, expiresAt: leaseNow + leaseMs });

    if (!leased) {
      const current = getOutcome(db, entryId, recipientId);
      if (current && !isTerminalOutcome(current.status)) {
        logger.debug({ entryId, recipientId, workerId, leaseOwner: current.lease_owner }, "Outcome leased elsewhere; skipping");
      }
      return {
        entryId,
        recipientId,
        status: current?.status ?? "pending",
        attemptCount: current?.attempt_count ?? 0,
        error: current?.last_error ?? null,
        entryStatus: finishAttempt(entry, now),
        attempted: false
      };
    }

    const attempt = (previous?.attempt_count ?? 0) + 1;
    const message = renderSafely(entry, recipient);

    let status: OutcomeStatus = "sent";
    let nextAttemptAt: number | null = null;
    let error: string | null = null;

    try {
      await withTimeout(transport.send(recipient.telegram_id, message.text, message.mediaRefs), sendTimeoutMs);
    } catch (err) {
      const classified = classifyTransportError(err);
      const decision = outcomeForFailure(classified, attempt, policy, now);
      status = decision.status;
      nextAttemptAt = decision.nextAttemptAt;
      error = classified.reason;
    }

    const outcome = recordOutcome(db, { entryId, recipientId, status, error, now, nextAttemptAt, leaseOwner: workerId });
    if (outcome.attempt_count < attempt) {
      logger.warn({ entryId, recipientId, workerId, status }, "Outcome lease lost during send; result not recorded");
    }
    const entryStatus = finishAttempt(entry, now);

    const logFields = {
      entryId,
      recipientId,
      status: outcome.status,
      attempt: outcome.attempt_count,
      maxAttempts: policy.maxAttempts,
      nextAttemptAt: outcome.next_attempt_at,
      error: outcome.last_error,
      entryStatus
    };
    if (outcome.status === "sent") {
      logger.debug(logFields, "Delivery sent");
    } else if (outcome.status === "failed_retryable") {
      logger.info(logFields, "Delivery failed; will retry");
    } else {
      logger.warn(logFields, "Delivery failed permanently");
    }

    return {
      entryId,
      recipientId,
      status: outcome.status,
      attemptCount: outcome.attempt_count,
      error: outcome.last_error,
      entryStatus,
      attempted: true
    };
  }

  async function sendTo(entry: ContentPlanEntry, recipientId: number, now = Date.now()): Promise<DispatchResult> {
    let recipient: UserRow;
    try {
      recipient = getUser(db, recipientId);
    } catch (err) {
      if (!(err instanceof UserNotFoundError)) throw err;
      const outcome = recordOutcome(db, {
        entryId: entry.entry_id,
        recipientId,
        status: "failed_permanent",
        error: describeError(err).message,
        now,
        leaseOwner: workerId
      });
      logger.warn({ entryId: entry.entry_id, recipientId }, "Recipient no longer exists; delivery failed permanently");
      return {
        entryId: entry.entry_id,
        recipientId,
        status: outcome.status,
        attemptCount: outcome.attempt_count,
        error: outcome.last_error,
        entryStatus: finishAttempt(entry, now),
        attempted: true
      };
    }
    return send(entry, recipient, now);
  }

  return { send, sendTo };
}
