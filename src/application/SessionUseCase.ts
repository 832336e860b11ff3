import { randomUUID } from 'node:crypto';
import type { NewSession, Session } from '../domain/entities/Session.js';
import type { Message, MessageRole } from '../domain/entities/Message.js';
import type { Summary } from '../domain/entities/Summary.js';
import type { ContextItem, ContextType } from '../domain/entities/ContextItem.js';
import type { SessionStorePort } from '../domain/ports/SessionStorePort.js';
import type { CompactionObserver, CompactResult } from '../domain/value-objects/CompactPlan.js';
import type { CompactConfig } from '../config/types.js';
import type { CompactionUseCase } from './CompactionUseCase.js';
import {
  OperationCancelledError,
  SessionAlreadyExistsError,
  SessionNotFoundError,
  StaleCompactPlanError,
} from '../domain/errors/DomainErrors.js';
import { validateCompactConfig } from '../config/ConfigLoader.js';
import { throwIfCancelled, type CancellableOptions } from '../shared/Cancellation.js';
import { Logger, errorMessage } from '../shared/Logger.js';

const MS_PER_DAY = 24 * 60 * 60 * 1000;

function byCreatedAtSummariesFirst(a: Message, b: Message): number {
  if (a.createdAt !== b.createdAt) return a.createdAt - b.createdAt;
  return (b.isSummary ? 1 : 0) - (a.isSummary ? 1 : 0);
}

export interface SessionUseCaseOptions {
  /** 歷史訊息上限，0 表示不限制 */
  maxHistoryMessages: number;
  /** cleanOldSessions 未指定天數時使用 */
  retentionDays: number;
  compaction: CompactConfig;
}

export interface CompactionAwareReadOptions extends CancellableOptions {
  /** 收到 starting → completed / failed 通知 */
  onCompaction?: CompactionObserver;
}

/**
 * Session 用例：session 生命週期、訊息、context 與 retention 的 façade
 *
 * 所有寫入都經過 SessionStorePort；compaction-aware 讀取會在需要時
 * 呼叫 CompactionUseCase，失敗時記錄 log 並回傳未壓縮的內容。
 */
export class SessionUseCase {
  private readonly logger = new Logger('SessionUseCase');

  constructor(
    private readonly store: SessionStorePort,
    private readonly compactor: CompactionUseCase,
    private readonly options: SessionUseCaseOptions,
  ) {
    validateCompactConfig(options.compaction);
  }

  // ── Sessions ──

  /**
   * 建立 session
   * @throws SessionAlreadyExistsError 同一 projectPath 內名稱重複
   */
  createSession(input: NewSession, options: CancellableOptions = {}): Session {
    if (this.store.getSessionByName(input.projectPath, input.name)) {
      throw new SessionAlreadyExistsError(input.name, input.projectPath);
    }

    const now = Date.now();
    const session: Session = {
      id: randomUUID(),
      name: input.name,
      projectPath: input.projectPath,
      model: input.model,
      provider: input.provider,
      agent: input.agent ?? '',
      createdAt: now,
      updatedAt: now,
      metadata: input.metadata,
      messageCount: 0,
    };

    throwIfCancelled(options.signal, 'create session');
    this.store.createSession(session);
    return session;
  }

  getSession(id: string): Session {
    const session = this.store.getSession(id);
    if (!session) throw new SessionNotFoundError(id);
    return session;
  }

  getSessionByName(projectPath: string, name: string): Session {
    const session = this.store.getSessionByName(projectPath, name);
    if (!session) throw new SessionNotFoundError(name);
    return session;
  }

  /** 與 getSessionByName 相同，但查不到時回傳 undefined */
  findSessionByName(projectPath: string, name: string): Session | undefined {
    return this.store.getSessionByName(projectPath, name);
  }

  listSessions(projectPath: string, limit?: number): Session[] {
    return this.store.listSessions(projectPath, limit);
  }

  /** 更新名稱、標籤與 metadata，並刷新 updatedAt */
  updateSession(session: Session, options: CancellableOptions = {}): Session {
    const updated: Session = { ...session, updatedAt: Date.now() };
    throwIfCancelled(options.signal, 'update session');
    this.store.updateSession(updated);
    return updated;
  }

  deleteSession(id: string, options: CancellableOptions = {}): void {
    throwIfCancelled(options.signal, 'delete session');
    this.store.deleteSession(id);
  }

  /** 刪除 updatedAt 早於 cutoff 的 session，回傳刪除數 */
  deleteSessionsOlderThan(cutoff: Date, options: CancellableOptions = {}): number {
    throwIfCancelled(options.signal, 'delete old sessions');
    const removed = this.store.deleteSessionsOlderThan(cutoff);
    this.logger.info('Retention sweep finished', { cutoff: cutoff.toISOString(), removed });
    return removed;
  }

  /** 刪除超過 days 天未更新的 session */
  cleanOldSessions(days: number = this.options.retentionDays, options: CancellableOptions = {}): number {
    return this.deleteSessionsOlderThan(new Date(Date.now() - days * MS_PER_DAY), options);
  }

  /**
   * 依名稱取得 session；compactOnResume 開啟時先跑一次 compaction
   * compaction 失敗只記錄 log，不影響 resume
   */
  async resumeSession(
    projectPath: string,
    name: string,
    options: CompactionAwareReadOptions = {},
  ): Promise<Session> {
    const session = this.getSessionByName(projectPath, name);
    if (this.options.compaction.compactOnResume) {
      await this.runCompactionPass(session.id, this.store.getActiveMessages(session.id), options);
      return this.getSession(session.id);
    }
    return session;
  }

  // ── Messages ──

  /**
   * 新增訊息並刷新 session 的 updatedAt
   * @throws SessionNotFoundError session 不存在
   */
  addMessage(
    sessionId: string,
    role: MessageRole,
    content: string,
    options: CancellableOptions = {},
  ): Message {
    const session = this.getSession(sessionId);
    const now = Date.now();

    throwIfCancelled(options.signal, 'append message');
    const id = this.store.transaction(() => {
      const messageId = this.store.appendMessage({ sessionId, role, content, createdAt: now });
      this.store.updateSession({ ...session, updatedAt: now });
      return messageId;
    });

    return { id, sessionId, role, content, createdAt: now, archived: false };
  }

  /** 所有訊息（含 archived），由舊到新 */
  getMessages(sessionId: string, limit?: number): Message[] {
    return this.store.getMessages(sessionId, limit);
  }

  getActiveMessages(sessionId: string, limit?: number): Message[] {
    return this.store.getActiveMessages(sessionId, limit);
  }

  getSummaries(sessionId: string): Summary[] {
    return this.store.getSummaries(sessionId);
  }

  /**
   * Compaction-aware 讀取
   *
   * 需要時先壓縮，再把摘要（合成的 assistant 訊息）與 active 訊息
   * 依 createdAt 排成一個序列，時間相同時摘要在前；
   * limit 為正數時只保留最新的 limit 則。
   */
  async getMessagesWithCompaction(
    sessionId: string,
    limit?: number,
    options: CompactionAwareReadOptions = {},
  ): Promise<Message[]> {
    await this.runCompactionPass(sessionId, this.store.getActiveMessages(sessionId), options);

    // 重新讀取：本次或同時進行的另一次 compaction 都可能已封存部分訊息
    const messages = this.store.getMessages(sessionId);
    const createdAtById = new Map(messages.map((m): [number, number] => [m.id, m.createdAt]));
    const combined = [
      ...this.store.getSummaries(sessionId).map((s, i) => this.summaryToMessage(s, i, createdAtById)),
      ...messages.filter((m) => !m.archived),
    ].sort(byCreatedAtSummariesFirst);

    return limit && limit > 0 && combined.length > limit
      ? combined.slice(combined.length - limit)
      : combined;
  }

  // ── Context ──

  addContext(
    sessionId: string,
    contextType: ContextType,
    contextKey: string,
    contextValue: string,
    options: CancellableOptions = {},
  ): ContextItem {
    this.getSession(sessionId);
    const item: ContextItem = { sessionId, contextType, contextKey, contextValue };
    throwIfCancelled(options.signal, 'add context');
    this.store.addContextItem(item);
    return item;
  }

  getContext(sessionId: string): ContextItem[] {
    return this.store.getContextItems(sessionId);
  }

  clearContext(sessionId: string, options: CancellableOptions = {}): void {
    throwIfCancelled(options.signal, 'clear context');
    this.store.deleteContextItems(sessionId);
  }

  // ── 私有方法 ──

  /** 取消以外的錯誤只記錄 log 並通知 observer */
  private async runCompactionPass(
    sessionId: string,
    active: readonly Message[],
    options: CompactionAwareReadOptions,
  ): Promise<void> {
    const { compaction, maxHistoryMessages } = this.options;
    const { plan } = this.compactor.shouldCompact(active, maxHistoryMessages, compaction);
    if (!plan) return;

    const notify = options.onCompaction;
    const messageCount = plan.messagesToCompact.length;
    notify?.({ stage: 'starting', sessionId, messageCount });

    let result: CompactResult;
    try {
      result = await this.compactor.compact(plan, compaction, { signal: options.signal });
    } catch (err) {
      if (err instanceof OperationCancelledError) throw err;
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.warn('Compaction failed, serving uncompacted history', { sessionId, error: error.message });
      notify?.({ stage: 'failed', sessionId, messageCount, error });
      return;
    }

    if (!result.success) {
      if (result.error instanceof StaleCompactPlanError) {
        this.logger.info('Compaction already done by a concurrent read', { sessionId });
        notify?.({ stage: 'failed', sessionId, messageCount, result, error: result.error });
        return;
      }
      this.logger.warn('Compaction failed, serving uncompacted history', {
        sessionId,
        error: errorMessage(result.error),
      });
      notify?.({ stage: 'failed', sessionId, messageCount, result, error: result.error });
      return;
    }

    notify?.({ stage: 'completed', sessionId, messageCount, result });
  }

  /**
   * 摘要以合成的 assistant 訊息呈現；id 為負數，不與實際訊息衝突
   * createdAt 取被摘要訊息中最早的時間，讓摘要排在它取代的位置
   */
  private summaryToMessage(
    summary: Summary,
    index: number,
    createdAtById: ReadonlyMap<number, number>,
  ): Message {
    const earliest = summary.originalMessageIds.reduce<number | undefined>((min, id) => {
      const t = createdAtById.get(id);
      return t !== undefined && (min === undefined || t < min) ? t : min;
    }, undefined);

    const content = this.options.compaction.showSummaryMarkers
      ? `--- Compacted history (${summary.messageRange}) ---\n${summary.summaryContent}\n--- End of compacted history ---`
      : summary.summaryContent;

    return {
      id: -(index + 1),
      sessionId: summary.sessionId,
      role: 'assistant',
      content,
      createdAt: earliest ?? summary.createdAt,
      archived: false,
      isSummary: true,
    };
  }
}
