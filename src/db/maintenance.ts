import fs from "node:fs";
import { logger } from "../logger";
import { isLocalMediaRef } from "../transport/telegramTransport";
import { purgeFinishedEntries } from "./contentPlanRepo";
import type { SqliteDb } from "./db";

export type DbMaintenanceResult = {
  nowMs: number;
  contentCutoffMs: number;
  deletedEntries: number;
  releasedMediaRefs: string[];
};

export function runDbMaintenance(params: { db: SqliteDb; retentionDays: number; nowMs?: number }): DbMaintenanceResult {
  const { db, retentionDays } = params;
  const nowMs = params.nowMs ?? Date.now();
  const days = Math.max(1, Math.floor(retentionDays));
  const contentCutoffMs = nowMs - days * 24 * 60 * 60 * 1000;

  const { deletedEntries, mediaRefs } = purgeFinishedEntries(db, contentCutoffMs);

  return {
    nowMs,
    contentCutoffMs,
    deletedEntries,
    releasedMediaRefs: mediaRefs
  };
}

export type MediaReleaseResult = {
  removed: string[];
  missing: string[];
  failed: string[];
};

function errorCode(err: unknown): string | null {
  if (!err || typeof err !== "object" || !("code" in err)) return null;
  return typeof err.code === "string" ? err.code : null;
}

/**
 * Deletes the local files behind released media refs. URL and file_id refs have nothing on disk.
 * A file that is already gone is not an error.
 */
export async function releaseMediaFiles(refs: readonly string[]): Promise<MediaReleaseResult> {
  const result: MediaReleaseResult = { removed: [], missing: [], failed: [] };

  for (const ref of refs) {
    if (!isLocalMediaRef(ref)) continue;
    try {
      await fs.promises.rm(ref);
      result.removed.push(ref);
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        logger.debug({ ref }, "Media file already gone");
        result.missing.push(ref);
      } else {
        logger.warn({ ref, err }, "Failed to delete media file");
        result.failed.push(ref);
      }
    }
  }

  return result;
}
