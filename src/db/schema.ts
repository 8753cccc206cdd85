// Kept in TS so production builds don't depend on copying .sql files into dist/.
export const SCHEMA_SQL = `
-- Users and their referrer (parent) link. A null referrer_id marks a root of the referral forest.
CREATE TABLE IF NOT EXISTS users (
  user_id INTEGER PRIMARY KEY AUTOINCREMENT,
  telegram_id TEXT NOT NULL UNIQUE,
  username TEXT,
  name TEXT,
  user_url TEXT,
  referral_url TEXT,
  referrer_id INTEGER,
  custom_fields TEXT NOT NULL DEFAULT '{}',
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  CONSTRAINT fk_users_referrer FOREIGN KEY (referrer_id) REFERENCES users (user_id) ON DELETE SET NULL,
  CONSTRAINT ck_users_not_self_referred CHECK (referrer_id IS NULL OR referrer_id <> user_id)
);

-- How a user is presented to their own referrals (real name + link).
CREATE TABLE IF NOT EXISTS referral_info (
  user_id INTEGER PRIMARY KEY,
  real_name TEXT NOT NULL,
  link TEXT NOT NULL,
  updated_at INTEGER NOT NULL,
  CONSTRAINT fk_referral_info_user FOREIGN KEY (user_id) REFERENCES users (user_id) ON DELETE CASCADE
);

-- Scheduled messages a user sends to their referrals. owner_id is not a foreign key: an entry
-- outlives a deleted owner and the scheduler marks it failed.
CREATE TABLE IF NOT EXISTS content_plan (
  entry_id INTEGER PRIMARY KEY AUTOINCREMENT,
  owner_id INTEGER NOT NULL,
  scheduled_at INTEGER NOT NULL,
  message_text TEXT NOT NULL,
  media_refs TEXT NOT NULL DEFAULT '[]',
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN ('pending', 'in_progress', 'completed', 'failed')),
  claimed_by TEXT,
  claimed_at INTEGER,
  failure_reason TEXT,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL
);

-- One row per (entry, recipient), created at fan-out.
CREATE TABLE IF NOT EXISTS delivery_outcomes (
  entry_id INTEGER NOT NULL,
  recipient_id INTEGER NOT NULL,
  status TEXT NOT NULL DEFAULT 'pending'
    CHECK (status IN ('pending', 'sent', 'failed_permanent', 'failed_retryable')),
  attempt_count INTEGER NOT NULL DEFAULT 0,
  last_attempt_at INTEGER,
  last_error TEXT,
  next_attempt_at INTEGER,
  lease_owner TEXT,
  lease_expires_at INTEGER,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  PRIMARY KEY (entry_id, recipient_id),
  CONSTRAINT fk_delivery_outcomes_entry FOREIGN KEY (entry_id) REFERENCES content_plan (entry_id) ON DELETE CASCADE
);
`;
