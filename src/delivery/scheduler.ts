import {
  finalizeEntry,
  getEntry,
  listDueEntries,
  listStrandedEntries,
  markEntryFailed,
  markInProgress,
  reclaimStrandedEntry,
  type ContentPlanEntry
} from "../db/contentPlanRepo";
import type { SqliteDb } from "../db/db";
import { claimOutcome, createPendingOutcomes, listReofferableOutcomes, type OutcomeLease } from "../db/outcomesRepo";
import { getDirectReferrals, type UserRow } from "../db/usersRepo";
import { InvalidTransitionError, describeError } from "../errors";
import { logger } from "../logger";
import type { DispatchResult, Dispatcher } from "./dispatcher";
import { runParallel } from "./pool";

export type SchedulerOptions = {
  db: SqliteDb;
  dispatcher: Dispatcher;
  workerId: string;
  concurrency: number;
  leaseMs: number;
  reofferBatchSize?: number;
  // Wall clock for outcome leases; defaults to Date.now.
  clock?: () => number;
};

export type FailedEntry = {
  entryId: number;
  code: string;
  message: string;
};

export type TickReport = {
  workerId: string;
  asOf: number;
  claimedEntries: number[];
  reclaimedEntries: number[];
  skippedEntries: number[];
  completedEntries: number[];
  failedEntries: FailedEntry[];
  // Entries whose claim or fan-out hit a store error; rolled back and retried next tick.
  deferredEntries: FailedEntry[];
  reoffered: number;
  attempts: number;
  sent: number;
  failedRetryable: number;
  failedPermanent: number;
  dispatchErrors: number;
  durationMs: number;
};

export type DeliveryScheduler = {
  runTick: (asOf?: Date) => Promise<TickReport>;
};

type DispatchTask = () => Promise<DispatchResult | null>;

type FanOut =
  | { kind: "dispatch"; entry: ContentPlanEntry; recipients: UserRow[] }
  | { kind: "completed"; entry: ContentPlanEntry }
  | { kind: "failed"; entry: ContentPlanEntry; failure: { code: string; message: string }; err: unknown };

function emptyReport(workerId: string, asOf: number): TickReport {
  return {
    workerId,
    asOf,
    claimedEntries: [],
    reclaimedEntries: [],
    skippedEntries: [],
    completedEntries: [],
    failedEntries: [],
    deferredEntries: [],
    reoffered: 0,
    attempts: 0,
    sent: 0,
    failedRetryable: 0,
    failedPermanent: 0,
    dispatchErrors: 0,
    durationMs: 0
  };
}

export function createDeliveryScheduler(options: SchedulerOptions): DeliveryScheduler {
  const { db, dispatcher, workerId, concurrency, leaseMs } = options;
  const reofferBatchSize = options.reofferBatchSize ?? 500;
  const clock = options.clock ?? Date.now;

  function leaseAt(now: number): OutcomeLease {
    return { owner: workerId, now, expiresAt: now + leaseMs };
  }

  // Runs inside the claim transaction: the entry leaves it either with its outcome rows, completed or failed.
  function fanOut(entry: ContentPlanEntry, asOfMs: number): FanOut {
    let recipients: UserRow[];
    try {
      recipients = getDirectReferrals(db, entry.owner_id);
    } catch (err) {
      const failure = describeError(err);
      markEntryFailed(db, entry.entry_id, workerId, `${failure.code}: ${failure.message}`, asOfMs);
      return { kind: "failed", entry, failure, err };
    }

    if (recipients.length === 0) {
      finalizeEntry(db, entry.entry_id, asOfMs);
      return { kind: "completed", entry };
    }

    createPendingOutcomes(
      db,
      entry.entry_id,
      recipients.map((r) => r.user_id),
      leaseAt(clock())
    );
    return { kind: "dispatch", entry, recipients };
  }

  const claimDue = db.transaction((entryId: number, asOfMs: number): FanOut =>
    fanOut(markInProgress(db, entryId, workerId, asOfMs), asOfMs)
  );

  const claimStranded = db.transaction((entryId: number, staleBefore: number, asOfMs: number): FanOut | null => {
    const entry = reclaimStrandedEntry(db, entryId, workerId, staleBefore, asOfMs);
    return entry ? fanOut(entry, asOfMs) : null;
  });

  async function dispatchAll(tasks: DispatchTask[], report: TickReport, completed: Set<number>) {
    const results = await runParallel(tasks, concurrency);
    for (const result of results) {
      if (!result) {
        report.dispatchErrors += 1;
        continue;
      }
      if (result.attempted) report.attempts += 1;
      if (result.entryStatus === "completed") completed.add(result.entryId);
      if (!result.attempted) continue;
      if (result.status === "sent") report.sent += 1;
      else if (result.status === "failed_retryable") report.failedRetryable += 1;
      else if (result.status === "failed_permanent") report.failedPermanent += 1;
    }
  }

  function guarded(entryId: number, recipientId: number, run: () => Promise<DispatchResult>): DispatchTask {
    return async () => {
      try {
        return await run();
      } catch (err) {
        // Outcome keeps its lease; it is re-offered once the lease lapses.
        logger.error({ err, entryId, recipientId, workerId }, "Dispatch failed before an outcome was recorded");
        return null;
      }
    };
  }

  function reofferTasks(asOfMs: number, report: TickReport): DispatchTask[] {
    const tasks: DispatchTask[] = [];
    const entries = new Map<number, ContentPlanEntry>();

    for (const outcome of listReofferableOutcomes(db, asOfMs, reofferBatchSize, clock())) {
      if (!claimOutcome(db, outcome.entry_id, outcome.recipient_id, leaseAt(clock()))) continue;

      let entry = entries.get(outcome.entry_id);
      if (!entry) {
        entry = getEntry(db, outcome.entry_id);
        entries.set(entry.entry_id, entry);
      }

      report.reoffered += 1;
      const claimedEntry = entry;
      tasks.push(
        guarded(outcome.entry_id, outcome.recipient_id, () =>
          dispatcher.sendTo(claimedEntry, outcome.recipient_id, asOfMs)
        )
      );
    }

    return tasks;
  }

  function defer(entryId: number, err: unknown, report: TickReport) {
    const failure = describeError(err);
    report.deferredEntries.push({ entryId, ...failure });
    logger.error({ entryId, workerId, code: failure.code, err }, "Entry claim rolled back; retrying next tick");
  }

  async function settle(result: FanOut, report: TickReport, completed: Set<number>, asOfMs: number) {
    const { entry } = result;

    if (result.kind === "failed") {
      report.failedEntries.push({ entryId: entry.entry_id, ...result.failure });
      logger.error(
        { entryId: entry.entry_id, ownerId: entry.owner_id, workerId, code: result.failure.code, err: result.err },
        "Recipient resolution failed; entry marked failed"
      );
      return;
    }

    if (result.kind === "completed") {
      completed.add(entry.entry_id);
      logger.info({ entryId: entry.entry_id, ownerId: entry.owner_id }, "Entry has no recipients; completed");
      return;
    }

    logger.info(
      { entryId: entry.entry_id, ownerId: entry.owner_id, recipients: result.recipients.length, workerId },
      "Entry claimed; dispatching"
    );
    const tasks = result.recipients.map((recipient) =>
      guarded(entry.entry_id, recipient.user_id, () => dispatcher.send(entry, recipient, asOfMs))
    );
    await dispatchAll(tasks, report, completed);
  }

  async function runTick(asOf: Date = new Date()): Promise<TickReport> {
    const startedAt = Date.now();
    const asOfMs = asOf.getTime();
    const report = emptyReport(workerId, asOfMs);
    const completed = new Set<number>();

    await dispatchAll(reofferTasks(asOfMs, report), report, completed);

    const staleBefore = asOfMs - leaseMs;
    for (const stranded of listStrandedEntries(db, staleBefore)) {
      let result: FanOut | null;
      try {
        result = claimStranded.immediate(stranded.entry_id, staleBefore, asOfMs);
      } catch (err) {
        defer(stranded.entry_id, err, report);
        continue;
      }
      if (!result) continue;
      report.reclaimedEntries.push(stranded.entry_id);
      logger.warn({ entryId: stranded.entry_id, previousWorker: stranded.claimed_by, workerId }, "Reclaimed stranded entry");
      await settle(result, report, completed, asOfMs);
    }

    for (const due of listDueEntries(db, asOfMs)) {
      let result: FanOut;
      try {
        result = claimDue.immediate(due.entry_id, asOfMs);
      } catch (err) {
        if (err instanceof InvalidTransitionError) {
          logger.debug({ entryId: due.entry_id, workerId, reason: err.message }, "Entry claimed elsewhere; skipping");
          report.skippedEntries.push(due.entry_id);
        } else {
          defer(due.entry_id, err, report);
        }
        continue;
      }
      report.claimedEntries.push(due.entry_id);
      await settle(result, report, completed, asOfMs);
    }

    report.completedEntries = [...completed].sort((a, b) => a - b);
    report.durationMs = Date.now() - startedAt;

    logger.info(
      {
        workerId,
        asOf: new Date(asOfMs).toISOString(),
        claimed: report.claimedEntries.length,
        reclaimed: report.reclaimedEntries.length,
        skipped: report.skippedEntries.length,
        completed: report.completedEntries.length,
        failed: report.failedEntries.length,
        deferred: report.deferredEntries.length,
        reoffered: report.reoffered,
        sent: report.sent,
        failedRetryable: report.failedRetryable,
        failedPermanent: report.failedPermanent,
        dispatchErrors: report.dispatchErrors,
        durationMs: report.durationMs
      },
      "Delivery tick complete"
    );

    return report;
  }

  return { runTick };
}

export type SchedulerHandle = {
  stop: () => Promise<void>;
  lastReport: () => TickReport | null;
};

/** Drives runTick on a fixed interval. A tick that is still running when the next one is due is not overlapped. */
export function startScheduler(params: {
  scheduler: DeliveryScheduler;
  intervalMs: number;
  runImmediately?: boolean;
}): SchedulerHandle {
  const { scheduler, intervalMs } = params;
  let inFlight: Promise<void> | null = null;
  let last: TickReport | null = null;

  const tick = () => {
    if (inFlight) {
      logger.warn({ intervalMs }, "Previous delivery tick still running; skipping this interval");
      return;
    }
    inFlight = scheduler
      .runTick(new Date())
      .then((report) => {
        last = report;
      })
      .catch((err) => {
        logger.error({ err }, "Delivery tick failed");
      })
      .finally(() => {
        inFlight = null;
      });
  };

  const intervalId = setInterval(tick, intervalMs);
  if (params.runImmediately ?? true) tick();

  return {
    async stop() {
      clearInterval(intervalId);
      if (inFlight) await inFlight;
    },
    lastReport: () => last
  };
}
