import type Database from 'better-sqlite3';
import type { Session, SessionMetadata } from '../../domain/entities/Session.js';
import type { Message, MessageRole, NewMessage } from '../../domain/entities/Message.js';
import type { Summary } from '../../domain/entities/Summary.js';
import type { ContextItem } from '../../domain/entities/ContextItem.js';
import type { SessionStorePort } from '../../domain/ports/SessionStorePort.js';
import {
  ChatLedgerError,
  SessionNotFoundError,
  StorageConstraintError,
  StorageError,
} from '../../domain/errors/DomainErrors.js';
import { errorMessage } from '../../shared/Logger.js';
import { isRecord } from '../../shared/TypeGuards.js';

interface SessionRow {
  id: string;
  name: string;
  project_path: string;
  model: string;
  provider: string;
  agent: string;
  created_at: number;
  updated_at: number;
  metadata_json: string | null;
  message_count: number;
}

interface MessageRow {
  id: number;
  session_id: string;
  role: MessageRole;
  content: string;
  created_at: number;
  archived: number;
}

interface SummaryRow {
  id: string;
  session_id: string;
  original_message_ids_json: string;
  message_range: string;
  summary_content: string;
  token_count: number;
  created_at: number;
}

interface ContextRow {
  session_id: string;
  context_type: string;
  context_key: string;
  context_value: string;
}

const SESSION_COLUMNS = `
  s.id, s.name, s.project_path, s.model, s.provider, s.agent,
  s.created_at, s.updated_at, s.metadata_json,
  (SELECT COUNT(*) FROM messages m WHERE m.session_id = s.id) AS message_count
`;

const MESSAGE_COLUMNS = 'id, session_id, role, content, created_at, archived';

function sqliteErrorCode(err: unknown): string | undefined {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return undefined;
}

/**
 * Session store：SQLite 持久化
 *
 * 刪除 session 時依賴 FOREIGN KEY ... ON DELETE CASCADE
 * 一併清除 messages、summaries、session_context。
 */
export class SqliteSessionStore implements SessionStorePort {
  constructor(private readonly db: Database.Database) {}

  createSession(session: Session): void {
    this.execute('insert session', () => {
      this.db.prepare(`
        INSERT INTO sessions(
          id, name, project_path, model, provider, agent,
          created_at, updated_at, metadata_json
        ) VALUES(?, ?, ?, ?, ?, ?, ?, ?, ?)
      `).run(
        session.id, session.name, session.projectPath,
        session.model, session.provider, session.agent,
        session.createdAt, session.updatedAt,
        session.metadata ? JSON.stringify(session.metadata) : null,
      );
    });
  }

  getSession(id: string): Session | undefined {
    return this.execute('query session', () => {
      const row = this.db.prepare(
        `SELECT ${SESSION_COLUMNS} FROM sessions s WHERE s.id = ?`
      ).get(id) as SessionRow | undefined;
      return row ? this.rowToSession(row) : undefined;
    });
  }

  getSessionByName(projectPath: string, name: string): Session | undefined {
    return this.execute('query session by name', () => {
      const row = this.db.prepare(
        `SELECT ${SESSION_COLUMNS} FROM sessions s
         WHERE s.project_path = ? AND s.name = ?
         ORDER BY s.updated_at DESC LIMIT 1`
      ).get(projectPath, name) as SessionRow | undefined;
      return row ? this.rowToSession(row) : undefined;
    });
  }

  listSessions(projectPath: string, limit?: number): Session[] {
    return this.execute('query sessions', () => {
      const params: unknown[] = [projectPath];
      const limitSql = limit && limit > 0 ? 'LIMIT ?' : '';
      if (limitSql) params.push(limit);

      const rows = this.db.prepare(
        `SELECT ${SESSION_COLUMNS} FROM sessions s
         WHERE s.project_path = ?
         ORDER BY s.updated_at DESC, s.created_at DESC ${limitSql}`
      ).all(...params) as SessionRow[];
      return rows.map((r) => this.rowToSession(r));
    });
  }

  updateSession(session: Session): void {
    const changes = this.execute('update session', () => this.db.prepare(`
      UPDATE sessions
      SET name = ?, model = ?, provider = ?, agent = ?, updated_at = ?, metadata_json = ?
      WHERE id = ?
    `).run(
      session.name, session.model, session.provider, session.agent,
      session.updatedAt,
      session.metadata ? JSON.stringify(session.metadata) : null,
      session.id,
    ).changes);

    if (changes === 0) {
      throw new SessionNotFoundError(session.id);
    }
  }

  deleteSession(id: string): void {
    const changes = this.execute('delete session', () =>
      this.db.prepare('DELETE FROM sessions WHERE id = ?').run(id).changes,
    );
    if (changes === 0) {
      throw new SessionNotFoundError(id);
    }
  }

  deleteSessionsOlderThan(cutoff: Date): number {
    return this.execute('delete old sessions', () =>
      this.db.prepare('DELETE FROM sessions WHERE updated_at < ?').run(cutoff.getTime()).changes,
    );
  }

  appendMessage(message: NewMessage): number {
    return this.execute('insert message', () => {
      const info = this.db.prepare(`
        INSERT INTO messages(session_id, role, content, created_at, archived)
        VALUES(?, ?, ?, ?, ?)
      `).run(
        message.sessionId, message.role, message.content,
        message.createdAt, message.archived ? 1 : 0,
      );
      return Number(info.lastInsertRowid);
    });
  }

  getMessages(sessionId: string, limit?: number): Message[] {
    return this.queryMessages('query messages', '', sessionId, limit);
  }

  getActiveMessages(sessionId: string, limit?: number): Message[] {
    return this.queryMessages('query active messages', 'AND archived = 0', sessionId, limit);
  }

  countMessages(sessionId: string): number {
    return this.execute('count messages', () => {
      const row = this.db.prepare(
        'SELECT COUNT(*) AS count FROM messages WHERE session_id = ?'
      ).get(sessionId) as { count: number } | undefined;
      return row?.count ?? 0;
    });
  }

  archiveMessages(messageIds: readonly number[]): void {
    if (messageIds.length === 0) return;
    this.execute('archive messages', () => {
      const stmt = this.db.prepare('UPDATE messages SET archived = 1 WHERE id = ?');
      this.db.transaction((ids: readonly number[]) => {
        for (const id of ids) stmt.run(id);
      })(messageIds);
    });
  }

  storeSummary(summary: Summary): void {
    this.execute('insert summary', () => {
      this.db.prepare(`
        INSERT INTO summaries(
          id, session_id, original_message_ids_json, message_range,
          summary_content, token_count, created_at
        ) VALUES(?, ?, ?, ?, ?, ?, ?)
      `).run(
        summary.id, summary.sessionId,
        JSON.stringify(summary.originalMessageIds), summary.messageRange,
        summary.summaryContent, summary.tokenCount, summary.createdAt,
      );
    });
  }

  getSummaries(sessionId: string): Summary[] {
    return this.execute('query summaries', () => {
      const rows = this.db.prepare(
        'SELECT * FROM summaries WHERE session_id = ? ORDER BY created_at ASC, rowid ASC'
      ).all(sessionId) as SummaryRow[];
      return rows.map((r) => this.rowToSummary(r));
    });
  }

  addContextItem(item: ContextItem): void {
    this.execute('insert context', () => {
      this.db.prepare(`
        INSERT INTO session_context(session_id, context_type, context_key, context_value)
        VALUES(?, ?, ?, ?)
      `).run(item.sessionId, item.contextType, item.contextKey, item.contextValue);
    });
  }

  getContextItems(sessionId: string): ContextItem[] {
    return this.execute('query context', () => {
      const rows = this.db.prepare(
        'SELECT session_id, context_type, context_key, context_value FROM session_context WHERE session_id = ? ORDER BY context_id'
      ).all(sessionId) as ContextRow[];
      return rows.map((r) => ({
        sessionId: r.session_id,
        contextType: r.context_type,
        contextKey: r.context_key,
        contextValue: r.context_value,
      }));
    });
  }

  deleteContextItems(sessionId: string): void {
    this.execute('delete context', () => {
      this.db.prepare('DELETE FROM session_context WHERE session_id = ?').run(sessionId);
    });
  }

  transaction<T>(fn: () => T): T {
    return this.db.transaction(fn)();
  }

  close(): void {
    if (this.db.open) this.db.close();
  }

  private queryMessages(operation: string, filter: string, sessionId: string, limit?: number): Message[] {
    return this.execute(operation, () => {
      const params: unknown[] = [sessionId];
      const limitSql = limit && limit > 0 ? 'LIMIT ?' : '';
      if (limitSql) params.push(limit);

      const rows = this.db.prepare(
        `SELECT ${MESSAGE_COLUMNS} FROM messages
         WHERE session_id = ? ${filter}
         ORDER BY created_at ASC, id ASC ${limitSql}`
      ).all(...params) as MessageRow[];
      return rows.map((r) => this.rowToMessage(r));
    });
  }

  /** 將 driver 錯誤包上操作名稱；domain 錯誤原樣拋出 */
  private execute<T>(operation: string, fn: () => T): T {
    try {
      return fn();
    } catch (err) {
      if (err instanceof ChatLedgerError) throw err;
      const message = `failed to ${operation}: ${errorMessage(err)}`;
      if (sqliteErrorCode(err)?.startsWith('SQLITE_CONSTRAINT')) {
        throw new StorageConstraintError(message, { cause: err });
      }
      throw new StorageError(message, { cause: err });
    }
  }

  private rowToSession(row: SessionRow): Session {
    return {
      id: row.id,
      name: row.name,
      projectPath: row.project_path,
      model: row.model,
      provider: row.provider,
      agent: row.agent,
      createdAt: row.created_at,
      updatedAt: row.updated_at,
      metadata: this.parseMetadata(row.metadata_json),
      messageCount: row.message_count,
    };
  }

  private rowToMessage(row: MessageRow): Message {
    return {
      id: row.id,
      sessionId: row.session_id,
      role: row.role,
      content: row.content,
      createdAt: row.created_at,
      archived: row.archived === 1,
    };
  }

  private rowToSummary(row: SummaryRow): Summary {
    const ids: unknown = JSON.parse(row.original_message_ids_json);
    return {
      id: row.id,
      sessionId: row.session_id,
      originalMessageIds: Array.isArray(ids)
        ? ids.filter((id): id is number => typeof id === 'number')
        : [],
      messageRange: row.message_range,
      summaryContent: row.summary_content,
      tokenCount: row.token_count,
      createdAt: row.created_at,
    };
  }

  private parseMetadata(json: string | null): SessionMetadata | undefined {
    if (!json) return undefined;
    const parsed: unknown = JSON.parse(json);
    return isRecord(parsed) ? parsed : undefined;
  }
}
