export const SCHEMA_VERSION = '1';

export const PRAGMA_SQL = `
PRAGMA journal_mode = WAL;
PRAGMA busy_timeout = 5000;
PRAGMA synchronous = NORMAL;
PRAGMA foreign_keys = ON;
PRAGMA cache_size = -64000;
PRAGMA temp_store = MEMORY;
`;

export const SCHEMA_SQL = `
CREATE TABLE IF NOT EXISTS schema_meta (
  key TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS sessions (
  id TEXT PRIMARY KEY,
  name TEXT NOT NULL,
  project_path TEXT NOT NULL,
  model TEXT NOT NULL,
  provider TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  updated_at INTEGER NOT NULL,
  metadata_json TEXT
);

CREATE TABLE IF NOT EXISTS messages (
  id INTEGER PRIMARY KEY AUTOINCREMENT,
  session_id TEXT NOT NULL,
  role TEXT NOT NULL CHECK(role IN ('user','assistant','system')),
  content TEXT NOT NULL,
  created_at INTEGER NOT NULL,
  archived INTEGER NOT NULL DEFAULT 0 CHECK(archived IN (0,1)),
  FOREIGN KEY(session_id) REFERENCES sessions(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS summaries (
  id TEXT PRIMARY KEY,
  session_id TEXT NOT NULL,
  original_message_ids_json TEXT NOT NULL,
  message_range TEXT NOT NULL,
  summary_content TEXT NOT NULL,
  token_count INTEGER NOT NULL DEFAULT 0,
  created_at INTEGER NOT NULL,
  FOREIGN KEY(session_id) REFERENCES sessions(id) ON DELETE CASCADE
);

CREATE TABLE IF NOT EXISTS session_context (
  context_id INTEGER PRIMARY KEY,
  session_id TEXT NOT NULL,
  context_type TEXT NOT NULL,
  context_key TEXT NOT NULL,
  context_value TEXT NOT NULL DEFAULT '',
  FOREIGN KEY(session_id) REFERENCES sessions(id) ON DELETE CASCADE
);

CREATE UNIQUE INDEX IF NOT EXISTS idx_sessions_scope_name ON sessions(project_path, name);
CREATE INDEX IF NOT EXISTS idx_sessions_updated_at ON sessions(updated_at);
CREATE INDEX IF NOT EXISTS idx_messages_session ON messages(session_id, created_at, id);
CREATE INDEX IF NOT EXISTS idx_messages_active ON messages(session_id, archived);
CREATE INDEX IF NOT EXISTS idx_summaries_session ON summaries(session_id, created_at);
CREATE INDEX IF NOT EXISTS idx_context_session ON session_context(session_id, context_type);
`;

/**
 * 舊版資料庫的 sessions 表沒有 agent 欄位
 * SQLite 的 ALTER TABLE 不支援 IF NOT EXISTS，需先查 pragma_table_info
 */
export const AGENT_COLUMN_CHECK_SQL =
  "SELECT COUNT(*) AS count FROM pragma_table_info('sessions') WHERE name = 'agent'";

export const AGENT_COLUMN_MIGRATION_SQL =
  "ALTER TABLE sessions ADD COLUMN agent TEXT NOT NULL DEFAULT ''";
