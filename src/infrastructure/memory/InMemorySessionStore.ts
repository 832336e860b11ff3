import type { Session } from '../../domain/entities/Session.js';
import type { Message, NewMessage } from '../../domain/entities/Message.js';
import type { Summary } from '../../domain/entities/Summary.js';
import type { ContextItem } from '../../domain/entities/ContextItem.js';
import type { SessionStorePort } from '../../domain/ports/SessionStorePort.js';
import { SessionNotFoundError, StorageConstraintError } from '../../domain/errors/DomainErrors.js';

type StoredSession = Omit<Session, 'messageCount'>;

/**
 * In-memory session store
 *
 * 與 SqliteSessionStore 相同語意的非持久化實作，
 * 用於測試與不需要落地的嵌入情境。transaction 以快照回滾。
 */
export class InMemorySessionStore implements SessionStorePort {
  private sessions = new Map<string, StoredSession>();
  private messages: Message[] = [];
  private summaries: Summary[] = [];
  private contextItems: ContextItem[] = [];
  private nextMessageId = 1;

  createSession(session: Session): void {
    if (this.sessions.has(session.id)) {
      throw new StorageConstraintError(`failed to insert session: duplicate id ${session.id}`);
    }
    if (this.findByName(session.projectPath, session.name)) {
      throw new StorageConstraintError(
        `failed to insert session: name "${session.name}" already used in ${session.projectPath}`,
      );
    }
    const { messageCount: _count, ...stored } = session;
    this.sessions.set(session.id, { ...stored });
  }

  getSession(id: string): Session | undefined {
    const stored = this.sessions.get(id);
    return stored ? this.withCount(stored) : undefined;
  }

  getSessionByName(projectPath: string, name: string): Session | undefined {
    const stored = this.findByName(projectPath, name);
    return stored ? this.withCount(stored) : undefined;
  }

  listSessions(projectPath: string, limit?: number): Session[] {
    const sorted = [...this.sessions.values()]
      .filter((s) => s.projectPath === projectPath)
      .sort((a, b) => b.updatedAt - a.updatedAt || b.createdAt - a.createdAt)
      .map((s) => this.withCount(s));
    return limit && limit > 0 ? sorted.slice(0, limit) : sorted;
  }

  updateSession(session: Session): void {
    const existing = this.sessions.get(session.id);
    if (!existing) throw new SessionNotFoundError(session.id);
    this.sessions.set(session.id, {
      ...existing,
      name: session.name,
      model: session.model,
      provider: session.provider,
      agent: session.agent,
      updatedAt: session.updatedAt,
      metadata: session.metadata,
    });
  }

  deleteSession(id: string): void {
    if (!this.sessions.delete(id)) throw new SessionNotFoundError(id);
    this.cascade(new Set([id]));
  }

  deleteSessionsOlderThan(cutoff: Date): number {
    const removed = new Set<string>();
    for (const [id, session] of this.sessions) {
      if (session.updatedAt < cutoff.getTime()) removed.add(id);
    }
    for (const id of removed) this.sessions.delete(id);
    this.cascade(removed);
    return removed.size;
  }

  appendMessage(message: NewMessage): number {
    if (!this.sessions.has(message.sessionId)) {
      throw new StorageConstraintError(
        `failed to insert message: session ${message.sessionId} does not exist`,
      );
    }
    const id = this.nextMessageId++;
    this.messages.push({
      id,
      sessionId: message.sessionId,
      role: message.role,
      content: message.content,
      createdAt: message.createdAt,
      archived: message.archived ?? false,
    });
    return id;
  }

  getMessages(sessionId: string, limit?: number): Message[] {
    return this.select((m) => m.sessionId === sessionId, limit);
  }

  getActiveMessages(sessionId: string, limit?: number): Message[] {
    return this.select((m) => m.sessionId === sessionId && !m.archived, limit);
  }

  countMessages(sessionId: string): number {
    return this.messages.filter((m) => m.sessionId === sessionId).length;
  }

  archiveMessages(messageIds: readonly number[]): void {
    const ids = new Set(messageIds);
    this.messages = this.messages.map((m) => (ids.has(m.id) ? { ...m, archived: true } : m));
  }

  storeSummary(summary: Summary): void {
    if (!this.sessions.has(summary.sessionId)) {
      throw new StorageConstraintError(
        `failed to insert summary: session ${summary.sessionId} does not exist`,
      );
    }
    this.summaries.push({ ...summary, originalMessageIds: [...summary.originalMessageIds] });
  }

  getSummaries(sessionId: string): Summary[] {
    return this.summaries
      .filter((s) => s.sessionId === sessionId)
      .map((s) => ({ ...s, originalMessageIds: [...s.originalMessageIds] }));
  }

  addContextItem(item: ContextItem): void {
    if (!this.sessions.has(item.sessionId)) {
      throw new StorageConstraintError(
        `failed to insert context: session ${item.sessionId} does not exist`,
      );
    }
    this.contextItems.push({ ...item });
  }

  getContextItems(sessionId: string): ContextItem[] {
    return this.contextItems.filter((c) => c.sessionId === sessionId).map((c) => ({ ...c }));
  }

  deleteContextItems(sessionId: string): void {
    this.contextItems = this.contextItems.filter((c) => c.sessionId !== sessionId);
  }

  transaction<T>(fn: () => T): T {
    const snapshot = {
      sessions: new Map(this.sessions),
      messages: [...this.messages],
      summaries: [...this.summaries],
      contextItems: [...this.contextItems],
      nextMessageId: this.nextMessageId,
    };
    try {
      return fn();
    } catch (err) {
      this.sessions = snapshot.sessions;
      this.messages = snapshot.messages;
      this.summaries = snapshot.summaries;
      this.contextItems = snapshot.contextItems;
      this.nextMessageId = snapshot.nextMessageId;
      throw err;
    }
  }

  close(): void {
    // 無外部資源
  }

  private findByName(projectPath: string, name: string): StoredSession | undefined {
    for (const session of this.sessions.values()) {
      if (session.projectPath === projectPath && session.name === name) return session;
    }
    return undefined;
  }

  private withCount(stored: StoredSession): Session {
    return { ...stored, messageCount: this.countMessages(stored.id) };
  }

  private select(predicate: (m: Message) => boolean, limit?: number): Message[] {
    const selected = this.messages
      .filter(predicate)
      .sort((a, b) => a.createdAt - b.createdAt || a.id - b.id)
      .map((m) => ({ ...m }));
    return limit && limit > 0 ? selected.slice(0, limit) : selected;
  }

  private cascade(sessionIds: Set<string>): void {
    this.messages = this.messages.filter((m) => !sessionIds.has(m.sessionId));
    this.summaries = this.summaries.filter((s) => !sessionIds.has(s.sessionId));
    this.contextItems = this.contextItems.filter((c) => !sessionIds.has(c.sessionId));
  }
}
