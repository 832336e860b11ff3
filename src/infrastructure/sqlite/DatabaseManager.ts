import fs from 'node:fs';
import path from 'node:path';
import Database from 'better-sqlite3';
import {
  AGENT_COLUMN_CHECK_SQL,
  AGENT_COLUMN_MIGRATION_SQL,
  PRAGMA_SQL,
  SCHEMA_SQL,
  SCHEMA_VERSION,
} from './schema.js';
import { Logger } from '../../shared/Logger.js';

/** 記憶體資料庫（測試用） */
export const IN_MEMORY_DB = ':memory:';

/**
 * SQLite 資料庫管理器
 *
 * 負責：建立資料庫目錄、設定 PRAGMA、執行 schema 與舊版 migration。
 * 單一連線；better-sqlite3 為同步 API，寫入自然被序列化。
 */
export class DatabaseManager {
  private db: Database.Database;
  private logger: Logger;

  constructor(dbPath: string) {
    this.logger = new Logger('DatabaseManager');

    if (dbPath !== IN_MEMORY_DB) {
      fs.mkdirSync(path.dirname(dbPath), { recursive: true });
    }

    this.db = new Database(dbPath);

    // 設定 PRAGMA（逐行執行，因為 PRAGMA 不支援批次）
    for (const line of PRAGMA_SQL.trim().split('\n')) {
      const trimmed = line.trim();
      if (trimmed && !trimmed.startsWith('--')) {
        this.db.pragma(trimmed.replace('PRAGMA ', '').replace(';', ''));
      }
    }

    this.db.exec(SCHEMA_SQL);
    this.migrateAgentColumn();

    this.db.prepare(
      "INSERT OR REPLACE INTO schema_meta(key, value) VALUES('version', ?)"
    ).run(SCHEMA_VERSION);

    this.logger.info('Database initialized', { dbPath });
  }

  getDb(): Database.Database {
    return this.db;
  }

  close(): void {
    if (this.db.open) {
      this.db.close();
    }
  }

  private migrateAgentColumn(): void {
    const row = this.db.prepare(AGENT_COLUMN_CHECK_SQL).get() as { count: number } | undefined;
    if (!row || row.count === 0) {
      this.db.exec(AGENT_COLUMN_MIGRATION_SQL);
      this.logger.info('Added agent column to sessions table');
    }
  }
}
