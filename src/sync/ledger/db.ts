import Database from "better-sqlite3";
import path from "path";

// Mirror tables share one column layout. parent_key is a real foreign key,
// so a child row can never exist without the parent row it points at.
function mirrorTable(table: string, parent: string | null, extraColumns = ""): string {
  const parentColumn = parent
    ? `parent_key TEXT NOT NULL REFERENCES ${parent}(key),`
    : "parent_key TEXT,";
  return `
CREATE TABLE IF NOT EXISTS ${table} (
  key TEXT PRIMARY KEY,
  ${parentColumn}
  document_id TEXT NOT NULL,
  workspace_id TEXT,
  element_id TEXT,
  remote_id TEXT NOT NULL,
  name TEXT NOT NULL,${extraColumns}
  revision TEXT NOT NULL,
  attributes_json TEXT NOT NULL,
  last_synced_at TEXT NOT NULL,
  created_at TEXT NOT NULL,
  updated_at TEXT NOT NULL
);
${parent ? `CREATE INDEX IF NOT EXISTS idx_${table}_parent ON ${table}(parent_key);` : ""}
`;
}

const SCHEMA = `
${mirrorTable("documents", null)}
${mirrorTable("workspaces", "documents")}
${mirrorTable("elements", "workspaces", "\n  element_type TEXT,")}
${mirrorTable("parts", "elements")}
${mirrorTable("features", "elements")}

CREATE TABLE IF NOT EXISTS sync_runs (
  run_id TEXT PRIMARY KEY,
  scope_json TEXT NOT NULL,
  force_refresh INTEGER NOT NULL DEFAULT 0,
  status TEXT NOT NULL,
  started_at TEXT NOT NULL,
  completed_at TEXT,
  cancel_requested INTEGER NOT NULL DEFAULT 0,
  message TEXT
);

CREATE INDEX IF NOT EXISTS idx_runs_status ON sync_runs(status);

CREATE TABLE IF NOT EXISTS sync_log_entries (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  run_id TEXT NOT NULL REFERENCES sync_runs(run_id),
  resource_type TEXT NOT NULL,
  entity_key TEXT NOT NULL,
  action TEXT NOT NULL,
  error_kind TEXT,
  detail TEXT,
  cursor_json TEXT,
  created_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_log_run ON sync_log_entries(run_id);
CREATE INDEX IF NOT EXISTS idx_log_action ON sync_log_entries(action);

CREATE TRIGGER IF NOT EXISTS sync_log_entries_append_only
BEFORE UPDATE ON sync_log_entries
BEGIN
  SELECT RAISE(ABORT, 'sync log entries are append-only');
END;

CREATE TRIGGER IF NOT EXISTS sync_log_entries_open_runs_only
BEFORE INSERT ON sync_log_entries
WHEN (SELECT status FROM sync_runs WHERE run_id = NEW.run_id) IN ('succeeded', 'partiallyFailed', 'failed')
BEGIN
  SELECT RAISE(ABORT, 'finished sync runs are immutable');
END;

CREATE TRIGGER IF NOT EXISTS sync_runs_terminal_immutable
BEFORE UPDATE ON sync_runs
WHEN OLD.status IN ('succeeded', 'partiallyFailed', 'failed')
BEGIN
  SELECT RAISE(ABORT, 'finished sync runs are immutable');
END;
`;

let _db: Database.Database | null = null;

function resolveLedgerPath(): string {
  const configured = process.env.SYNC_LEDGER_PATH;
  if (configured === ":memory:") return configured;
  return configured
    ? path.resolve(configured)
    : path.resolve(process.cwd(), "cad_mirror.db");
}

export function getDatabase(): Database.Database {
  if (!_db) {
    const dbPath = resolveLedgerPath();
    _db = new Database(dbPath);
    if (dbPath !== ":memory:") {
      _db.pragma("journal_mode = WAL");
    }
    _db.pragma("foreign_keys = ON");
    _db.exec(SCHEMA);
  }
  return _db;
}

export function closeDatabase(): void {
  if (_db) {
    _db.close();
    _db = null;
  }
}
