import { z } from "zod";
import { EntryNotFoundError, InvalidScheduleError, InvalidTransitionError } from "../errors";
import type { SqliteDb } from "./db";
import { countUnresolvedOutcomes } from "./outcomesRepo";
import { getUser } from "./usersRepo";

export type EntryStatus = "pending" | "in_progress" | "completed" | "failed";

const MediaRefsSchema = z.array(z.string());

type ContentPlanRecord = {
  entry_id: number;
  owner_id: number;
  scheduled_at: number;
  message_text: string;
  media_refs: string;
  status: EntryStatus;
  claimed_by: string | null;
  claimed_at: number | null;
  failure_reason: string | null;
  completed_at: number | null;
  created_at: number;
  updated_at: number;
};

export type ContentPlanEntry = Omit<ContentPlanRecord, "media_refs"> & {
  media_refs: string[];
};

export type CreateEntryInput = {
  ownerId: number;
  scheduledAt: Date | number;
  text: string;
  mediaRefs?: readonly string[];
  now?: number;
};

const DUE_PAGE_SIZE = 100;

function parseMediaRefs(raw: string): string[] {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return [];
  }
  const parsed = MediaRefsSchema.safeParse(json);
  return parsed.success ? parsed.data : [];
}

function toEntry(record: ContentPlanRecord): ContentPlanEntry {
  return { ...record, media_refs: parseMediaRefs(record.media_refs) };
}

function toEpochMs(value: Date | number): number {
  return value instanceof Date ? value.getTime() : value;
}

function selectRecord(db: SqliteDb, entryId: number): ContentPlanRecord | undefined {
  return db.prepare<[number], ContentPlanRecord>("SELECT * FROM content_plan WHERE entry_id = ?").get(entryId);
}

export function createEntry(db: SqliteDb, input: CreateEntryInput): number {
  const now = input.now ?? Date.now();
  const scheduledAt = toEpochMs(input.scheduledAt);
  if (!Number.isFinite(scheduledAt) || scheduledAt <= now) {
    throw new InvalidScheduleError(scheduledAt, now);
  }

  getUser(db, input.ownerId);

  const result = db
    .prepare(
      [
        "INSERT INTO content_plan (owner_id, scheduled_at, message_text, media_refs, status, created_at, updated_at)",
        "VALUES (?, ?, ?, ?, 'pending', ?, ?)"
      ].join(" ")
    )
    .run(input.ownerId, scheduledAt, input.text, JSON.stringify(input.mediaRefs ?? []), now, now);

  return Number(result.lastInsertRowid);
}

export function getEntry(db: SqliteDb, entryId: number): ContentPlanEntry {
  const record = selectRecord(db, entryId);
  if (!record) throw new EntryNotFoundError(entryId);
  return toEntry(record);
}

export function listEntriesForOwner(db: SqliteDb, ownerId: number): ContentPlanEntry[] {
  return db
    .prepare<[number], ContentPlanRecord>(
      "SELECT * FROM content_plan WHERE owner_id = ? ORDER BY scheduled_at ASC, entry_id ASC"
    )
    .all(ownerId)
    .map(toEntry);
}

/** Owner withdraws an entry. Only possible while nobody has claimed it. */
export function cancelEntry(db: SqliteDb, entryId: number, ownerId: number) {
  const txn = db.transaction(() => {
    const record = selectRecord(db, entryId);
    if (!record || record.owner_id !== ownerId) throw new EntryNotFoundError(entryId);

    const result = db.prepare("DELETE FROM content_plan WHERE entry_id = ? AND status = 'pending'").run(entryId);
    if (result.changes === 0) {
      throw new InvalidTransitionError(entryId, record.status, "cancelled", "only pending entries can be withdrawn");
    }
  });
  txn();
}

/**
 * Pending entries due at `asOf`, oldest first (scheduled_at, then entry_id).
 * Pages through the table with a keyset cursor so callers may write to the db between items.
 * The generator is single-use; entries claimed elsewhere mid-iteration are not yielded.
 */
export function* listDueEntries(db: SqliteDb, asOf: Date | number): Generator<ContentPlanEntry, void, undefined> {
  const asOfMs = toEpochMs(asOf);
  const page = db.prepare<{ asOf: number; afterAt: number; afterId: number; limit: number }, ContentPlanRecord>(
    [
      "SELECT * FROM content_plan",
      "WHERE status = 'pending' AND scheduled_at <= @asOf",
      "AND (scheduled_at > @afterAt OR (scheduled_at = @afterAt AND entry_id > @afterId))",
      "ORDER BY scheduled_at ASC, entry_id ASC",
      "LIMIT @limit"
    ].join(" ")
  );

  let afterAt = Number.MIN_SAFE_INTEGER;
  let afterId = 0;

  while (true) {
    const rows = page.all({ asOf: asOfMs, afterAt, afterId, limit: DUE_PAGE_SIZE });
    for (const row of rows) {
      afterAt = row.scheduled_at;
      afterId = row.entry_id;
      const current = selectRecord(db, row.entry_id);
      if (current && current.status === "pending") {
        yield toEntry(current);
      }
    }
    if (rows.length < DUE_PAGE_SIZE) return;
  }
}

/**
 * Claims an entry for `workerId` (pending -> in_progress) as a compare-and-set on the stored status.
 * Re-claiming by the current holder is a no-op. Anything else raises InvalidTransitionError.
 */
export function markInProgress(db: SqliteDb, entryId: number, workerId: string, now = Date.now()): ContentPlanEntry {
  const result = db
    .prepare(
      [
        "UPDATE content_plan SET status = 'in_progress', claimed_by = ?, claimed_at = ?, updated_at = ?",
        "WHERE entry_id = ? AND status = 'pending'"
      ].join(" ")
    )
    .run(workerId, now, now, entryId);

  const current = getEntry(db, entryId);
  if (result.changes === 1) return current;

  if (current.status === "in_progress" && current.claimed_by === workerId) {
    return current;
  }

  throw new InvalidTransitionError(
    entryId,
    current.status,
    "in_progress",
    current.claimed_by ? `claimed by ${current.claimed_by}` : undefined
  );
}

/**
 * In-progress entries claimed at or before `staleBefore` that never got outcome rows: their worker died
 * between claiming and fanning out. Oldest claim first.
 */
export function listStrandedEntries(db: SqliteDb, staleBefore: number, limit = 100): ContentPlanEntry[] {
  return db
    .prepare<{ staleBefore: number; limit: number }, ContentPlanRecord>(
      [
        "SELECT c.* FROM content_plan c",
        "WHERE c.status = 'in_progress' AND c.claimed_at <= @staleBefore",
        "AND NOT EXISTS (SELECT 1 FROM delivery_outcomes o WHERE o.entry_id = c.entry_id)",
        "ORDER BY c.claimed_at ASC, c.entry_id ASC",
        "LIMIT @limit"
      ].join(" ")
    )
    .all({ staleBefore, limit })
    .map(toEntry);
}

/** Takes over a stranded entry (see listStrandedEntries) as a compare-and-set. Returns null if it is no longer stranded. */
export function reclaimStrandedEntry(
  db: SqliteDb,
  entryId: number,
  workerId: string,
  staleBefore: number,
  now = Date.now()
): ContentPlanEntry | null {
  const result = db
    .prepare(
      [
        "UPDATE content_plan SET claimed_by = @workerId, claimed_at = @now, updated_at = @now",
        "WHERE entry_id = @entryId AND status = 'in_progress' AND claimed_at <= @staleBefore",
        "AND NOT EXISTS (SELECT 1 FROM delivery_outcomes o WHERE o.entry_id = @entryId)"
      ].join(" ")
    )
    .run({ entryId, workerId, staleBefore, now });
  return result.changes === 1 ? getEntry(db, entryId) : null;
}

/** Structural failure (recipients could not be resolved). Only the claim holder may fail an entry. */
export function markEntryFailed(db: SqliteDb, entryId: number, workerId: string, reason: string, now = Date.now()) {
  const result = db
    .prepare(
      [
        "UPDATE content_plan SET status = 'failed', failure_reason = ?, completed_at = ?, updated_at = ?",
        "WHERE entry_id = ? AND status = 'in_progress' AND claimed_by = ?"
      ].join(" ")
    )
    .run(reason, now, now, entryId, workerId);

  if (result.changes === 0) {
    const current = getEntry(db, entryId);
    throw new InvalidTransitionError(entryId, current.status, "failed", `not held by ${workerId}`);
  }
}

/**
 * Recomputes the entry status from its outcome rows: completed once every outcome is sent or
 * failed_permanent (vacuously true with no outcomes). Safe to call any number of times.
 */
export function finalizeEntry(db: SqliteDb, entryId: number, now = Date.now()): EntryStatus {
  const txn = db.transaction((): EntryStatus => {
    const entry = getEntry(db, entryId);
    if (entry.status !== "in_progress") return entry.status;
    if (countUnresolvedOutcomes(db, entryId) > 0) return "in_progress";

    db.prepare(
      "UPDATE content_plan SET status = 'completed', completed_at = ?, updated_at = ? WHERE entry_id = ? AND status = 'in_progress'"
    ).run(now, now, entryId);
    return "completed";
  });

  return txn.immediate();
}

/**
 * Drops finished entries (and, by cascade, their outcomes) that finished before `cutoffMs`.
 * Returns the media refs of the dropped entries that no remaining entry still uses, each once.
 */
export function purgeFinishedEntries(db: SqliteDb, cutoffMs: number): { deletedEntries: number; mediaRefs: string[] } {
  const txn = db.transaction(() => {
    const rows = db
      .prepare<[number], Pick<ContentPlanRecord, "media_refs">>(
        "SELECT media_refs FROM content_plan WHERE status IN ('completed', 'failed') AND completed_at < ?"
      )
      .all(cutoffMs);

    const result = db
      .prepare("DELETE FROM content_plan WHERE status IN ('completed', 'failed') AND completed_at < ?")
      .run(cutoffMs);

    const stillUsed = new Set(
      db
        .prepare<[], Pick<ContentPlanRecord, "media_refs">>("SELECT media_refs FROM content_plan")
        .all()
        .flatMap((row) => parseMediaRefs(row.media_refs))
    );
    const released = new Set(rows.flatMap((row) => parseMediaRefs(row.media_refs)).filter((ref) => !stillUsed.has(ref)));

    return { deletedEntries: result.changes, mediaRefs: [...released] };
  });

  return txn();
}
