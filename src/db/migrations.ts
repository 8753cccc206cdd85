import type { SqliteDb } from "./db";

type Migration = {
  id: string;
  run: (db: SqliteDb) => void;
};

type MigrationRow = { id: string };

function ensureMigrationsTable(db: SqliteDb) {
  db.exec(`
    CREATE TABLE IF NOT EXISTS schema_migrations (
      id TEXT PRIMARY KEY,
      applied_at INTEGER NOT NULL
    );
  `);
}

function hasColumn(db: SqliteDb, tableName: string, columnName: string): boolean {
  const cols = db.prepare<[], { name: string }>(`PRAGMA table_info(${tableName})`).all();
  return cols.some((col) => col.name === columnName);
}

export const MIGRATIONS: Migration[] = [
  {
    id: "20261001_001_indexes",
    run: (db) => {
      db.exec(`
        CREATE INDEX IF NOT EXISTS idx_users_referrer_id ON users (referrer_id);
        CREATE INDEX IF NOT EXISTS idx_content_plan_due ON content_plan (status, scheduled_at, entry_id);
        CREATE INDEX IF NOT EXISTS idx_content_plan_owner ON content_plan (owner_id, scheduled_at);
        CREATE INDEX IF NOT EXISTS idx_delivery_outcomes_reoffer ON delivery_outcomes (status, next_attempt_at);
      `);
    }
  },
  {
    id: "20261012_002_content_plan_completed_at",
    run: (db) => {
      if (!hasColumn(db, "content_plan", "completed_at")) {
        db.prepare("ALTER TABLE content_plan ADD COLUMN completed_at INTEGER").run();
      }
      db.exec("CREATE INDEX IF NOT EXISTS idx_content_plan_completed_at ON content_plan (completed_at)");
    }
  }
];

function assertUniqueMigrationIds(migrations: Migration[]) {
  const seen = new Set<string>();
  for (const migration of migrations) {
    if (seen.has(migration.id)) {
      throw new Error(`Duplicate migration id: ${migration.id}`);
    }
    seen.add(migration.id);
  }
}

export function applyDbMigrations(db: SqliteDb): { applied: string[]; total: number } {
  assertUniqueMigrationIds(MIGRATIONS);
  ensureMigrationsTable(db);

  const appliedRows = db.prepare<[], MigrationRow>("SELECT id FROM schema_migrations").all();
  const appliedIds = new Set(appliedRows.map((row) => row.id));
  const insertApplied = db.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)");

  const newlyApplied: string[] = [];
  const txn = db.transaction(() => {
    for (const migration of MIGRATIONS) {
      if (appliedIds.has(migration.id)) continue;
      migration.run(db);
      insertApplied.run(migration.id, Date.now());
      newlyApplied.push(migration.id);
      appliedIds.add(migration.id);
    }
  });

  txn();
  return { applied: newlyApplied, total: MIGRATIONS.length };
}
