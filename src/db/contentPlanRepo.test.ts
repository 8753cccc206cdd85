import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { EntryNotFoundError, InvalidScheduleError, InvalidTransitionError, UserNotFoundError } from "../errors";
import { T0, createTestDb } from "../testUtils";
import {
  cancelEntry,
  createEntry,
  finalizeEntry,
  getEntry,
  listDueEntries,
  listEntriesForOwner,
  markEntryFailed,
  listStrandedEntries,
  markInProgress,
  purgeFinishedEntries,
  reclaimStrandedEntry
} from "./contentPlanRepo";
import type { SqliteDb } from "./db";
import { createPendingOutcomes, listOutcomes, recordOutcome } from "./outcomesRepo";
import { addUser } from "./usersRepo";

const LEASE = { owner: "worker-a", now: T0, expiresAt: T0 + 120_000 };

describe("contentPlanRepo", () => {
  let db: SqliteDb;
  let ownerId: number;

  beforeEach(() => {
    db = createTestDb();
    ownerId = addUser(db, { telegramId: "1001", name: "Alice" }).user_id;
  });

  afterEach(() => {
    db.close();
  });

  function schedule(offsetMs: number, text = "hello", mediaRefs: string[] = []): number {
    return createEntry(db, { ownerId, scheduledAt: T0 + offsetMs, text, mediaRefs, now: T0 });
  }

  describe("createEntry", () => {
    it("stores a pending entry with media refs in order", () => {
      const entryId = schedule(60_000, "promo", ["b.png", "a.mp4"]);
      const entry = getEntry(db, entryId);
      expect(entry.status).toBe("pending");
      expect(entry.scheduled_at).toBe(T0 + 60_000);
      expect(entry.message_text).toBe("promo");
      expect(entry.media_refs).toEqual(["b.png", "a.mp4"]);
      expect(entry.claimed_by).toBeNull();
    });

    it("accepts a Date", () => {
      const entryId = createEntry(db, { ownerId, scheduledAt: new Date(T0 + 1), text: "x", now: T0 });
      expect(getEntry(db, entryId).scheduled_at).toBe(T0 + 1);
    });

    it("rejects a schedule that is not strictly in the future", () => {
      expect(() => schedule(-1)).toThrow(InvalidScheduleError);
      expect(() => schedule(0)).toThrow(InvalidScheduleError);
      expect(listEntriesForOwner(db, ownerId)).toEqual([]);
    });

    it("rejects an unknown owner", () => {
      expect(() => createEntry(db, { ownerId: 99, scheduledAt: T0 + 1, text: "x", now: T0 })).toThrow(
        UserNotFoundError
      );
    });
  });

  describe("listDueEntries", () => {
    it("yields due pending entries by scheduled_at then entry_id", () => {
      const late = schedule(2_000);
      const tieA = schedule(1_000);
      const tieB = schedule(1_000);
      schedule(5_000);

      const due = [...listDueEntries(db, T0 + 3_000)].map((e) => e.entry_id);
      expect(due).toEqual([tieA, tieB, late]);
    });

    it("includes entries scheduled exactly at the as-of time", () => {
      const entryId = schedule(1_000);
      expect([...listDueEntries(db, T0 + 1_000)].map((e) => e.entry_id)).toEqual([entryId]);
      expect([...listDueEntries(db, T0 + 999)]).toEqual([]);
    });

    it("is single-use", () => {
      schedule(1_000);
      const due = listDueEntries(db, T0 + 1_000);
      expect([...due]).toHaveLength(1);
      expect([...due]).toEqual([]);
    });

    it("pages past the page size", () => {
      for (let i = 0; i < 150; i += 1) schedule(1_000 + (i % 3));
      const due = [...listDueEntries(db, T0 + 10_000)];
      expect(due).toHaveLength(150);
      const keys = due.map((e) => [e.scheduled_at, e.entry_id] as const);
      const sorted = [...keys].sort((a, b) => a[0] - b[0] || a[1] - b[1]);
      expect(keys).toEqual(sorted);
    });

    it("skips entries claimed by someone else mid-iteration", () => {
      const first = schedule(1_000);
      const second = schedule(1_000);
      const third = schedule(1_000);

      const due = listDueEntries(db, T0 + 1_000);
      const step = due.next();
      expect(step.done).toBe(false);
      if (!step.done) expect(step.value.entry_id).toBe(first);
      markInProgress(db, second, "worker-b", T0 + 1_000);
      expect([...due].map((e) => e.entry_id)).toEqual([third]);
    });

    it("ignores entries that are not pending", () => {
      const claimed = schedule(1_000);
      markInProgress(db, claimed, "worker-a", T0 + 1_000);
      expect([...listDueEntries(db, T0 + 1_000)]).toEqual([]);
    });
  });

  describe("markInProgress", () => {
    it("claims a pending entry for one worker", () => {
      const entryId = schedule(1_000);
      const claimed = markInProgress(db, entryId, "worker-a", T0 + 1_000);
      expect(claimed.status).toBe("in_progress");
      expect(claimed.claimed_by).toBe("worker-a");
      expect(claimed.claimed_at).toBe(T0 + 1_000);
    });

    it("is idempotent for the holder and rejects everyone else", () => {
      const entryId = schedule(1_000);
      markInProgress(db, entryId, "worker-a", T0 + 1_000);
      expect(markInProgress(db, entryId, "worker-a", T0 + 2_000).claimed_at).toBe(T0 + 1_000);
      expect(() => markInProgress(db, entryId, "worker-b", T0 + 2_000)).toThrow(InvalidTransitionError);
    });

    it("rejects completed entries even for the former holder", () => {
      const entryId = schedule(1_000);
      markInProgress(db, entryId, "worker-a", T0 + 1_000);
      finalizeEntry(db, entryId, T0 + 1_000);
      expect(() => markInProgress(db, entryId, "worker-a", T0 + 2_000)).toThrow(InvalidTransitionError);
    });

    it("fails on an unknown entry", () => {
      expect(() => markInProgress(db, 404, "worker-a")).toThrow(EntryNotFoundError);
    });
  });

  describe("claim race across connections", () => {
    let dir: string;
    const connections: SqliteDb[] = [];

    beforeEach(() => {
      dir = fs.mkdtempSync(path.join(os.tmpdir(), "content-plan-"));
    });

    afterEach(() => {
      for (const conn of connections.splice(0)) conn.close();
      fs.rmSync(dir, { recursive: true, force: true });
    });

    it("lets exactly one of N workers win", async () => {
      const dbPath = path.join(dir, "race.sqlite");
      const seed = createTestDb(dbPath);
      connections.push(seed);
      const owner = addUser(seed, { telegramId: "1001" });
      const entryId = createEntry(seed, { ownerId: owner.user_id, scheduledAt: T0 + 1, text: "x", now: T0 });

      const workers = Array.from({ length: 5 }, (_, i) => {
        const conn = createTestDb(dbPath);
        connections.push(conn);
        return { conn, workerId: `worker-${i}` };
      });

      const results = await Promise.allSettled(
        workers.map(async ({ conn, workerId }) => markInProgress(conn, entryId, workerId, T0 + 1))
      );

      const won = results.filter((r) => r.status === "fulfilled");
      const lost = results.filter((r): r is PromiseRejectedResult => r.status === "rejected");
      expect(won).toHaveLength(1);
      expect(lost).toHaveLength(4);
      for (const rejection of lost) expect(rejection.reason).toBeInstanceOf(InvalidTransitionError);
      expect(getEntry(seed, entryId).claimed_by).toBe("worker-0");
    });
  });

  describe("cancelEntry", () => {
    it("withdraws a pending entry", () => {
      const entryId = schedule(1_000);
      cancelEntry(db, entryId, ownerId);
      expect(() => getEntry(db, entryId)).toThrow(EntryNotFoundError);
    });

    it("refuses once the entry is claimed", () => {
      const entryId = schedule(1_000);
      markInProgress(db, entryId, "worker-a", T0 + 1_000);
      expect(() => cancelEntry(db, entryId, ownerId)).toThrow(InvalidTransitionError);
      expect(getEntry(db, entryId).status).toBe("in_progress");
    });

    it("treats another owner's entry as missing", () => {
      const entryId = schedule(1_000);
      const other = addUser(db, { telegramId: "2001" });
      expect(() => cancelEntry(db, entryId, other.user_id)).toThrow(EntryNotFoundError);
      expect(getEntry(db, entryId).status).toBe("pending");
    });
  });

  describe("markEntryFailed", () => {
    it("only lets the claim holder fail the entry", () => {
      const entryId = schedule(1_000);
      markInProgress(db, entryId, "worker-a", T0 + 1_000);
      expect(() => markEntryFailed(db, entryId, "worker-b", "boom")).toThrow(InvalidTransitionError);

      markEntryFailed(db, entryId, "worker-a", "user_not_found: User not found: 1", T0 + 2_000);
      const entry = getEntry(db, entryId);
      expect(entry.status).toBe("failed");
      expect(entry.failure_reason).toBe("user_not_found: User not found: 1");
      expect(entry.completed_at).toBe(T0 + 2_000);
    });
  });

  describe("finalizeEntry", () => {
    it("leaves pending entries alone", () => {
      const entryId = schedule(1_000);
      expect(finalizeEntry(db, entryId)).toBe("pending");
      expect(getEntry(db, entryId).status).toBe("pending");
    });

    it("completes an in-progress entry with no outcomes", () => {
      const entryId = schedule(1_000);
      markInProgress(db, entryId, "worker-a", T0 + 1_000);
      expect(finalizeEntry(db, entryId, T0 + 1_500)).toBe("completed");
      expect(getEntry(db, entryId).completed_at).toBe(T0 + 1_500);
    });

    it("waits until every outcome is sent or failed_permanent", () => {
      const entryId = schedule(1_000);
      markInProgress(db, entryId, "worker-a", T0 + 1_000);
      createPendingOutcomes(db, entryId, [2, 3], LEASE);

      recordOutcome(db, { entryId, recipientId: 2, status: "sent", now: T0 + 1_000 });
      recordOutcome(db, { entryId, recipientId: 3, status: "failed_retryable", now: T0 + 1_000, nextAttemptAt: T0 + 31_000 });
      expect(finalizeEntry(db, entryId, T0 + 1_000)).toBe("in_progress");

      recordOutcome(db, { entryId, recipientId: 3, status: "failed_permanent", now: T0 + 40_000 });
      expect(finalizeEntry(db, entryId, T0 + 40_000)).toBe("completed");
    });

    it("is a no-op on an already completed entry", () => {
      const entryId = schedule(1_000);
      markInProgress(db, entryId, "worker-a", T0 + 1_000);
      createPendingOutcomes(db, entryId, [2], LEASE);
      recordOutcome(db, { entryId, recipientId: 2, status: "sent", now: T0 + 1_000 });
      expect(finalizeEntry(db, entryId, T0 + 1_000)).toBe("completed");

      const entryBefore = getEntry(db, entryId);
      const outcomesBefore = listOutcomes(db, entryId);
      expect(finalizeEntry(db, entryId, T0 + 9_000)).toBe("completed");
      expect(finalizeEntry(db, entryId, T0 + 9_500)).toBe("completed");
      expect(getEntry(db, entryId)).toEqual(entryBefore);
      expect(listOutcomes(db, entryId)).toEqual(outcomesBefore);
    });
  });

  describe("purgeFinishedEntries", () => {
    it("drops finished entries before the cutoff with their outcomes and returns their media", () => {
      const done = schedule(1_000, "done", ["media/old.png"]);
      const open = schedule(2_000, "open", ["media/new.png"]);
      markInProgress(db, done, "worker-a", T0 + 1_000);
      createPendingOutcomes(db, done, [2], LEASE);
      recordOutcome(db, { entryId: done, recipientId: 2, status: "sent", now: T0 + 1_000 });
      finalizeEntry(db, done, T0 + 1_000);

      const result = purgeFinishedEntries(db, T0 + 1_001);
      expect(result).toEqual({ deletedEntries: 1, mediaRefs: ["media/old.png"] });
      expect(listOutcomes(db, done)).toEqual([]);
      expect(getEntry(db, open).status).toBe("pending");
    });

    it("keeps media that a remaining entry still uses and reports each ref once", () => {
      const first = schedule(1_000, "first", ["media/shared.png", "media/a.png"]);
      const second = schedule(1_000, "second", ["media/a.png"]);
      schedule(5_000, "open", ["media/shared.png"]);
      for (const entryId of [first, second]) {
        markInProgress(db, entryId, "worker-a", T0 + 1_000);
        finalizeEntry(db, entryId, T0 + 1_000);
      }

      expect(purgeFinishedEntries(db, T0 + 2_000)).toEqual({ deletedEntries: 2, mediaRefs: ["media/a.png"] });
    });
  });

  describe("stranded entries", () => {
    const STALE_BEFORE = T0 + 1_000 - 120_000;

    it("lists in-progress entries with no outcomes whose claim is older than the cutoff", () => {
      const stranded = schedule(1_000);
      const fannedOut = schedule(1_000);
      const fresh = schedule(1_000);
      markInProgress(db, stranded, "worker-crashed", T0 + 1_000 - 120_000);
      markInProgress(db, fannedOut, "worker-a", T0 + 1_000 - 120_000);
      createPendingOutcomes(db, fannedOut, [2], LEASE);
      markInProgress(db, fresh, "worker-a", T0 + 1_000);

      expect(listStrandedEntries(db, STALE_BEFORE).map((e) => e.entry_id)).toEqual([stranded]);
    });

    it("hands a stranded entry to one worker", () => {
      const entryId = schedule(1_000);
      markInProgress(db, entryId, "worker-crashed", T0 + 1_000 - 120_000);

      const reclaimed = reclaimStrandedEntry(db, entryId, "worker-b", STALE_BEFORE, T0 + 1_000);
      expect(reclaimed).toMatchObject({ entry_id: entryId, status: "in_progress", claimed_by: "worker-b", claimed_at: T0 + 1_000 });
      expect(reclaimStrandedEntry(db, entryId, "worker-c", STALE_BEFORE, T0 + 1_000)).toBeNull();
      expect(getEntry(db, entryId).claimed_by).toBe("worker-b");
    });
  });
});
