import type { Session } from '../entities/Session.js';
import type { Message, NewMessage } from '../entities/Message.js';
import type { Summary } from '../entities/Summary.js';
import type { ContextItem } from '../entities/ContextItem.js';

/**
 * Session 持久化的抽象介面
 *
 * 設計意圖：Manager / Compactor / Checkpoint 只依賴此 Port，
 * 具體引擎（SQLite、in-memory）可替換而不影響上層邏輯。
 *
 * 錯誤約定：
 * - get/find 類查不到時回傳 undefined
 * - update/delete 找不到目標時拋出 SessionNotFoundError
 * - 約束違反包成 StorageConstraintError，其他 driver 錯誤包成 StorageError
 * - 刪除 session 時其 messages、summaries、context items 一併刪除
 */
export interface SessionStorePort {
  // ── Sessions ──
  createSession(session: Session): void;
  getSession(id: string): Session | undefined;
  getSessionByName(projectPath: string, name: string): Session | undefined;
  /** 依 updatedAt 由新到舊 */
  listSessions(projectPath: string, limit?: number): Session[];
  updateSession(session: Session): void;
  deleteSession(id: string): void;
  /** 刪除 updatedAt 早於 cutoff 的 session，回傳刪除數 */
  deleteSessionsOlderThan(cutoff: Date): number;

  // ── Messages ──
  /** 回傳新指派的 message ID */
  appendMessage(message: NewMessage): number;
  /** 由舊到新；limit 為正數時只取最舊的 limit 則 */
  getMessages(sessionId: string, limit?: number): Message[];
  getActiveMessages(sessionId: string, limit?: number): Message[];
  countMessages(sessionId: string): number;
  archiveMessages(messageIds: readonly number[]): void;

  // ── Summaries ──
  storeSummary(summary: Summary): void;
  /** 依建立時間由舊到新 */
  getSummaries(sessionId: string): Summary[];

  // ── Context items ──
  addContextItem(item: ContextItem): void;
  getContextItems(sessionId: string): ContextItem[];
  deleteContextItems(sessionId: string): void;

  /** 在單一交易中執行；fn 拋錯時全部回滾 */
  transaction<T>(fn: () => T): T;
  close(): void;
}
