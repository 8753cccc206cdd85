import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { T0, createTestDb } from "../testUtils";
import { createEntry, finalizeEntry, getEntry, markInProgress } from "./contentPlanRepo";
import type { SqliteDb } from "./db";
import { releaseMediaFiles, runDbMaintenance } from "./maintenance";
import { addUser } from "./usersRepo";

const DAY = 24 * 60 * 60 * 1000;

describe("runDbMaintenance", () => {
  let db: SqliteDb;

  beforeEach(() => {
    db = createTestDb();
  });

  afterEach(() => {
    db.close();
  });

  it("purges entries finished before the retention window", () => {
    const owner = addUser(db, { telegramId: "1001" });
    const finish = (at: number, media: string[]) => {
      const entryId = createEntry(db, { ownerId: owner.user_id, scheduledAt: at, text: "x", mediaRefs: media, now: at - 1 });
      markInProgress(db, entryId, "worker-a", at);
      finalizeEntry(db, entryId, at);
      return entryId;
    };
    const old = finish(T0, ["media/old.png"]);
    const recent = finish(T0 + 29 * DAY, ["media/recent.png"]);

    const result = runDbMaintenance({ db, retentionDays: 30, nowMs: T0 + 31 * DAY });

    expect(result).toEqual({
      nowMs: T0 + 31 * DAY,
      contentCutoffMs: T0 + DAY,
      deletedEntries: 1,
      releasedMediaRefs: ["media/old.png"]
    });
    expect(() => getEntry(db, old)).toThrow();
    expect(getEntry(db, recent).status).toBe("completed");
  });
});

describe("releaseMediaFiles", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "media-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("deletes local media files and tolerates ones already gone", async () => {
    const kept = path.join(dir, "kept.png");
    const released = path.join(dir, "released.png");
    const gone = path.join(dir, "gone.mp4");
    fs.writeFileSync(kept, "k");
    fs.writeFileSync(released, "r");

    const result = await releaseMediaFiles([released, gone, "https://example.com/promo.png", "AgACAgIAAxkBAAIB"]);

    expect(result).toEqual({ removed: [released], missing: [gone], failed: [] });
    expect(fs.existsSync(released)).toBe(false);
    expect(fs.existsSync(kept)).toBe(true);
  });

  it("reports a path it cannot delete", async () => {
    const subdir = path.join(dir, "album");
    fs.mkdirSync(subdir);

    expect(await releaseMediaFiles([subdir])).toEqual({ removed: [], missing: [], failed: [subdir] });
    expect(fs.existsSync(subdir)).toBe(true);
  });
});
