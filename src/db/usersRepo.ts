import { z } from "zod";
import { CyclicReferralError, UserNotFoundError } from "../errors";
import type { SqliteDb } from "./db";

const CustomFieldsSchema = z.record(z.string());

export type CustomFields = z.infer<typeof CustomFieldsSchema>;

type UserRecord = {
  user_id: number;
  telegram_id: string;
  username: string | null;
  name: string | null;
  user_url: string | null;
  referral_url: string | null;
  referrer_id: number | null;
  custom_fields: string;
  created_at: number;
  updated_at: number;
};

export type UserRow = Omit<UserRecord, "custom_fields"> & {
  custom_fields: CustomFields;
};

export type ReferralInfo = {
  user_id: number;
  real_name: string;
  link: string;
  updated_at: number;
};

export type AddUserInput = {
  telegramId: string;
  username?: string | null;
  name?: string | null;
  userUrl?: string | null;
  referralUrl?: string | null;
  referrerId?: number | null;
  customFields?: CustomFields;
  // Registration time; defaults to Date.now().
  now?: number;
};

function parseCustomFields(raw: string): CustomFields {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return {};
  }
  const parsed = CustomFieldsSchema.safeParse(json);
  return parsed.success ? parsed.data : {};
}

function toUserRow(record: UserRecord): UserRow {
  return { ...record, custom_fields: parseCustomFields(record.custom_fields) };
}

function selectUserRecord(db: SqliteDb, userId: number): UserRecord | undefined {
  return db.prepare<[number], UserRecord>("SELECT * FROM users WHERE user_id = ?").get(userId);
}

/**
 * Walks the referrer chain upwards from `startId` to its root.
 * Throws if the walk reaches `forbiddenId` or revisits a node (a cycle already stored).
 */
function assertAcyclicChain(db: SqliteDb, startId: number, forbiddenId: number | null) {
  const parentOf = db.prepare<[number], { referrer_id: number | null }>(
    "SELECT referrer_id FROM users WHERE user_id = ?"
  );
  const visited = new Set<number>();
  let current: number | null = startId;

  while (current !== null) {
    if (current === forbiddenId || visited.has(current)) {
      throw new CyclicReferralError(forbiddenId, startId);
    }
    visited.add(current);
    const row = parentOf.get(current);
    current = row?.referrer_id ?? null;
  }
}

export function getUser(db: SqliteDb, userId: number): UserRow {
  const record = selectUserRecord(db, userId);
  if (!record) throw new UserNotFoundError(userId);
  return toUserRow(record);
}

export function findUserByTelegramId(db: SqliteDb, telegramId: string): UserRow | null {
  const record = db.prepare<[string], UserRecord>("SELECT * FROM users WHERE telegram_id = ?").get(telegramId);
  return record ? toUserRow(record) : null;
}

/**
 * Inserts a user, optionally attached to a referrer.
 * A telegram id that is already registered returns the stored row untouched; the first referrer wins.
 */
export function addUser(db: SqliteDb, input: AddUserInput): UserRow {
  const now = input.now ?? Date.now();
  const referrerId = input.referrerId ?? null;

  const txn = db.transaction((): UserRow => {
    if (referrerId !== null) {
      const referrer = selectUserRecord(db, referrerId);
      if (!referrer) throw new UserNotFoundError(referrerId);
      if (referrer.telegram_id === input.telegramId) {
        throw new CyclicReferralError(referrer.user_id, referrerId);
      }
    }

    const existing = findUserByTelegramId(db, input.telegramId);
    if (existing) return existing;

    if (referrerId !== null) {
      assertAcyclicChain(db, referrerId, null);
    }

    const result = db
      .prepare(
        [
          "INSERT INTO users (telegram_id, username, name, user_url, referral_url, referrer_id, custom_fields, created_at, updated_at)",
          "VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)"
        ].join(" ")
      )
      .run(
        input.telegramId,
        input.username ?? null,
        input.name ?? null,
        input.userUrl ?? null,
        input.referralUrl ?? null,
        referrerId,
        JSON.stringify(input.customFields ?? {}),
        now,
        now
      );

    return getUser(db, Number(result.lastInsertRowid));
  });

  return txn();
}

export function setReferrer(db: SqliteDb, userId: number, referrerId: number | null) {
  const txn = db.transaction(() => {
    getUser(db, userId);
    if (referrerId !== null) {
      if (referrerId === userId) throw new CyclicReferralError(userId, referrerId);
      getUser(db, referrerId);
      assertAcyclicChain(db, referrerId, userId);
    }
    db.prepare("UPDATE users SET referrer_id = ?, updated_at = ? WHERE user_id = ?").run(referrerId, Date.now(), userId);
  });
  txn();
}

export function updateCustomFields(db: SqliteDb, userId: number, fields: CustomFields): UserRow {
  const user = getUser(db, userId);
  const merged = { ...user.custom_fields, ...fields };
  db.prepare("UPDATE users SET custom_fields = ?, updated_at = ? WHERE user_id = ?").run(
    JSON.stringify(merged),
    Date.now(),
    userId
  );
  return getUser(db, userId);
}

export function getReferrer(db: SqliteDb, userId: number): UserRow | null {
  const user = getUser(db, userId);
  if (user.referrer_id === null) return null;
  const record = selectUserRecord(db, user.referrer_id);
  return record ? toUserRow(record) : null;
}

export function getDirectReferrals(db: SqliteDb, userId: number): UserRow[] {
  getUser(db, userId);
  return db
    .prepare<[number], UserRecord>("SELECT * FROM users WHERE referrer_id = ? ORDER BY user_id ASC")
    .all(userId)
    .map(toUserRow);
}

export function countDirectReferrals(db: SqliteDb, userId: number): number {
  getUser(db, userId);
  const row = db
    .prepare<[number], { count: number }>("SELECT COUNT(*) AS count FROM users WHERE referrer_id = ?")
    .get(userId);
  return Number(row?.count ?? 0);
}

/** All descendants of a user, depth-first. Not used for delivery, which is direct-only. */
export function getReferralTree(db: SqliteDb, userId: number): UserRow[] {
  getUser(db, userId);
  const childrenOf = db.prepare<[number], UserRecord>(
    "SELECT * FROM users WHERE referrer_id = ? ORDER BY user_id ASC"
  );

  const result: UserRow[] = [];
  const visited = new Set<number>([userId]);
  const stack = [userId];

  while (stack.length > 0) {
    const parentId = stack.pop();
    if (parentId === undefined) break;
    for (const child of childrenOf.all(parentId)) {
      if (visited.has(child.user_id)) continue;
      visited.add(child.user_id);
      result.push(toUserRow(child));
      stack.push(child.user_id);
    }
  }

  return result;
}

/** Removes a user. Their referrals become roots (FK is ON DELETE SET NULL); content plan entries are left for the scheduler. */
export function deleteUser(db: SqliteDb, userId: number) {
  const result = db.prepare("DELETE FROM users WHERE user_id = ?").run(userId);
  if (result.changes === 0) throw new UserNotFoundError(userId);
}

export function setReferralInfo(
  db: SqliteDb,
  userId: number,
  info: { realName: string; link: string },
  now = Date.now()
) {
  getUser(db, userId);
  db.prepare(
    [
      "INSERT INTO referral_info (user_id, real_name, link, updated_at)",
      "VALUES (?, ?, ?, ?)",
      "ON CONFLICT(user_id) DO UPDATE SET real_name = excluded.real_name, link = excluded.link, updated_at = excluded.updated_at"
    ].join(" ")
  ).run(userId, info.realName, info.link, now);
}

export function getReferralInfo(db: SqliteDb, userId: number): ReferralInfo | null {
  getUser(db, userId);
  const row = db.prepare<[number], ReferralInfo>("SELECT * FROM referral_info WHERE user_id = ?").get(userId);
  return row ?? null;
}

export function listAllTelegramIds(db: SqliteDb): string[] {
  return db
    .prepare<[], { telegram_id: string }>("SELECT telegram_id FROM users ORDER BY user_id ASC")
    .all()
    .map((row) => row.telegram_id);
}

const DAY_MS = 24 * 60 * 60 * 1000;

function startOfUtcDay(ms: number): number {
  return Math.floor(ms / DAY_MS) * DAY_MS;
}

/**
 * Drip-mailing audience: users who registered on one of the `days + 1` whole UTC days before today,
 * keyed by how many days ago that was. Both bounds are exclusive: registrations exactly at the start of the
 * oldest day and anything from today are left out. Days without registrations have no key.
 */
export function getTelegramIdsForMailing(db: SqliteDb, days: number, now = Date.now()): Map<number, string[]> {
  const todayStart = startOfUtcDay(now);
  const oldestStart = todayStart - (days + 1) * DAY_MS;

  const rows = db
    .prepare<[number, number], { telegram_id: string; created_at: number }>(
      "SELECT telegram_id, created_at FROM users WHERE created_at > ? AND created_at < ? ORDER BY user_id ASC"
    )
    .all(oldestStart, todayStart);

  const byDays = new Map<number, string[]>();
  for (const row of rows) {
    const daysAgo = Math.round((todayStart - startOfUtcDay(row.created_at)) / DAY_MS);
    const ids = byDays.get(daysAgo) ?? [];
    ids.push(row.telegram_id);
    byDays.set(daysAgo, ids);
  }
  return byDays;
}
