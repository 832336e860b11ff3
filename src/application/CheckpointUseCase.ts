import { randomUUID } from 'node:crypto';
import fs from 'node:fs';
import path from 'node:path';
import type { Session } from '../domain/entities/Session.js';
import type { Message } from '../domain/entities/Message.js';
import type {
  Checkpoint,
  CheckpointContext,
  CheckpointFormat,
  CheckpointMessage,
  CheckpointStatistics,
} from '../domain/entities/Checkpoint.js';
import type { SessionStorePort } from '../domain/ports/SessionStorePort.js';
import type { WorkspaceContextPort } from '../domain/ports/WorkspaceContextPort.js';
import type { SessionUseCase } from './SessionUseCase.js';
import { CHECKPOINT_VERSION } from '../domain/entities/Checkpoint.js';
import { isMessageRole } from '../domain/entities/Message.js';
import { CHARS_PER_TOKEN, estimateTokens } from '../domain/value-objects/TokenEstimate.js';
import { buildFallbackSummary, formatMessageRange } from '../domain/value-objects/FallbackSummary.js';
import {
  CheckpointValidationError,
  SessionAlreadyExistsError,
  UnsupportedCheckpointFormatError,
} from '../domain/errors/DomainErrors.js';
import {
  parseCheckpoint,
  serializeCheckpoint,
  type RawCheckpoint,
} from '../infrastructure/checkpoint/CheckpointSerializer.js';
import { renderMarkdownReport } from '../infrastructure/checkpoint/MarkdownReportRenderer.js';
import { throwIfCancelled, type CancellableOptions } from '../shared/Cancellation.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export interface ExportOptions extends CancellableOptions {
  /** 明確指定格式；未指定時依副檔名推斷 */
  format?: string;
  /** 附上 context block（工作目錄、專案記憶、存取過的檔案），預設 false */
  includeContext?: boolean;
  /** 附上 session metadata，預設 true */
  includeMetadata?: boolean;
  exportedBy?: string;
}

export interface ExportResult {
  outputPath: string;
  format: CheckpointFormat;
  checkpoint: Checkpoint;
}

export interface ImportOptions extends CancellableOptions {
  /** 覆寫 checkpoint 內的 session 名稱 */
  name?: string;
  /** 目標 project scope，預設為建構時的 projectPath */
  projectPath?: string;
  /** 同名 session 已存在時先刪除，預設 false */
  overwrite?: boolean;
  /** 還原 context block，預設 true */
  includeContext?: boolean;
}

export interface ImportResult {
  session: Session;
  messagesImported: number;
  summariesRestored: number;
  contextItemsRestored: number;
}

const FILE_CONTEXT_TYPE = 'file';
const TOOL_CALL_CONTEXT_TYPE = 'tool_call';
const WORKING_DIRECTORY_KEY = 'working_directory';

/** 依副檔名推斷格式；未知或沒有副檔名時為 json */
export function detectFormatFromPath(filePath: string): CheckpointFormat {
  switch (path.extname(filePath).toLowerCase()) {
    case '.yaml':
    case '.yml':
      return 'yaml';
    case '.md':
    case '.markdown':
      return 'markdown';
    default:
      return 'json';
  }
}

/**
 * 解析明確指定的格式名稱
 * @throws UnsupportedCheckpointFormatError 未知格式
 */
export function resolveFormat(explicit: string | undefined, filePath: string): CheckpointFormat {
  if (!explicit) return detectFormatFromPath(filePath);
  switch (explicit.toLowerCase()) {
    case 'json':
      return 'json';
    case 'yaml':
    case 'yml':
      return 'yaml';
    case 'markdown':
    case 'md':
      return 'markdown';
    default:
      throw new UnsupportedCheckpointFormatError(`unsupported export format: ${explicit}`);
  }
}

function parseTimestamp(value: string | undefined, rule: string): number | undefined {
  if (value === undefined) return undefined;
  const ms = Date.parse(value);
  if (Number.isNaN(ms)) {
    throw new CheckpointValidationError(rule, `invalid timestamp "${value}"`);
  }
  return ms;
}

/**
 * 補上缺少的訊息時間：開頭缺少的取 session 建立時間與第一個已知時間中較早者，
 * 其餘沿用前一則訊息的時間，讓匯入後的順序與檔案中的順序一致
 */
function fillMessageTimes(times: readonly (number | undefined)[], sessionCreatedAt: number): number[] {
  const firstKnown = times.find((t): t is number => t !== undefined);
  let previous = firstKnown === undefined ? sessionCreatedAt : Math.min(sessionCreatedAt, firstKnown);
  return times.map((t) => {
    previous = t ?? previous;
    return previous;
  });
}

/**
 * 逐條驗證 checkpoint，回傳型別確定的 Checkpoint
 * 缺少的訊息時間依相鄰訊息補上，缺少的 session 時間取自訊息，都沒有時才用驗證當下的時間。
 * @throws CheckpointValidationError rule 指出違反的規則
 */
export function validateCheckpoint(raw: RawCheckpoint): Checkpoint {
  if (!raw.version) {
    throw new CheckpointValidationError('version', 'version is required');
  }
  if (raw.version !== CHECKPOINT_VERSION) {
    throw new CheckpointValidationError(
      'version',
      `unsupported version "${raw.version}" (expected "${CHECKPOINT_VERSION}")`,
    );
  }
  if (!raw.session.name.trim()) {
    throw new CheckpointValidationError('session.name', 'session name is required');
  }
  if (!raw.session.provider.trim()) {
    throw new CheckpointValidationError('session.provider', 'session provider is required');
  }
  if (!raw.session.model.trim()) {
    throw new CheckpointValidationError('session.model', 'session model is required');
  }
  if (raw.messages.length === 0) {
    throw new CheckpointValidationError('messages', 'checkpoint has no messages');
  }

  const validated = raw.messages.map((msg, i) => {
    if (!isMessageRole(msg.role)) {
      throw new CheckpointValidationError(
        'messages.role',
        `message ${i + 1} has invalid role "${msg.role}" (expected user, assistant or system)`,
      );
    }
    return { role: msg.role, content: msg.content, archived: msg.archived, time: parseTimestamp(msg.created_at, 'messages.created_at') };
  });

  const now = Date.now();
  const messageTimes = validated.map((msg) => msg.time);
  const sessionCreatedAt = parseTimestamp(raw.session.created_at, 'session.created_at')
    ?? messageTimes.find((t): t is number => t !== undefined)
    ?? now;
  const filledTimes = fillMessageTimes(messageTimes, sessionCreatedAt);
  const sessionUpdatedAt = parseTimestamp(raw.session.updated_at, 'session.updated_at')
    ?? filledTimes.reduce((latest, t) => Math.max(latest, t), sessionCreatedAt);

  const messages: CheckpointMessage[] = validated.map((msg, i) => ({
    role: msg.role,
    content: msg.content,
    created_at: new Date(filledTimes[i] ?? sessionCreatedAt).toISOString(),
    ...(msg.archived ? { archived: true } : {}),
  }));

  if (raw.statistics.message_count !== messages.length) {
    throw new CheckpointValidationError(
      'statistics.message_count',
      `message_count ${raw.statistics.message_count} does not match ${messages.length} messages`,
    );
  }

  return {
    version: raw.version,
    exported_at: new Date(parseTimestamp(raw.exported_at, 'exported_at') ?? now).toISOString(),
    exported_by: raw.exported_by,
    session: {
      name: raw.session.name,
      provider: raw.session.provider,
      model: raw.session.model,
      agent: raw.session.agent,
      project_path: raw.session.project_path,
      created_at: new Date(sessionCreatedAt).toISOString(),
      updated_at: new Date(sessionUpdatedAt).toISOString(),
      metadata: raw.session.metadata,
    },
    messages,
    context: raw.context,
    statistics: raw.statistics,
  };
}

/**
 * Checkpoint 用例：session 與可攜式 checkpoint 檔案之間的轉換
 *
 * - 匯出：JSON / YAML / Markdown 報告
 * - 匯入：先完整驗證再寫入；建立 session 後任何失敗都會刪除該 session
 */
export class CheckpointUseCase {
  private readonly logger = new Logger('CheckpointUseCase');

  constructor(
    private readonly sessions: SessionUseCase,
    private readonly store: SessionStorePort,
    /** 呼叫端目前的 project scope */
    private readonly projectPath: string,
    private readonly workspace?: WorkspaceContextPort,
  ) {}

  /** 由 session 與其全部訊息（含 archived）建立 checkpoint */
  buildCheckpoint(sessionId: string, options: ExportOptions = {}): Checkpoint {
    const session = this.sessions.getSession(sessionId);
    const messages = this.store.getMessages(sessionId);
    const contextItems = this.store.getContextItems(sessionId);
    const includeMetadata = options.includeMetadata ?? true;

    const toolCalls = contextItems.filter((c) => c.contextType === TOOL_CALL_CONTEXT_TYPE).length;

    return {
      version: CHECKPOINT_VERSION,
      exported_at: new Date().toISOString(),
      ...(options.exportedBy ? { exported_by: options.exportedBy } : {}),
      session: {
        name: session.name,
        provider: session.provider,
        model: session.model,
        ...(session.agent ? { agent: session.agent } : {}),
        project_path: session.projectPath,
        created_at: new Date(session.createdAt).toISOString(),
        updated_at: new Date(session.updatedAt).toISOString(),
        ...(includeMetadata && session.metadata ? { metadata: session.metadata } : {}),
      },
      messages: messages.map((m) => ({
        role: m.role,
        content: m.content,
        created_at: new Date(m.createdAt).toISOString(),
        ...(m.archived ? { archived: true } : {}),
      })),
      ...(options.includeContext
        ? { context: this.buildContext(contextItems.filter((c) => c.contextType === FILE_CONTEXT_TYPE).map((c) => c.contextKey)) }
        : {}),
      statistics: this.buildStatistics(messages, toolCalls),
    };
  }

  /** 將 checkpoint 編碼為指定格式的文字 */
  encodeCheckpoint(checkpoint: Checkpoint, format: CheckpointFormat): string {
    return format === 'markdown'
      ? renderMarkdownReport(checkpoint)
      : serializeCheckpoint(checkpoint, format);
  }

  /**
   * 匯出 session 到檔案
   * @throws SessionNotFoundError session 不存在
   * @throws UnsupportedCheckpointFormatError 未知格式
   */
  exportSession(sessionId: string, outputPath: string, options: ExportOptions = {}): ExportResult {
    const format = resolveFormat(options.format, outputPath);
    const checkpoint = this.buildCheckpoint(sessionId, options);
    const content = this.encodeCheckpoint(checkpoint, format);

    throwIfCancelled(options.signal, 'write checkpoint');
    fs.mkdirSync(path.dirname(path.resolve(outputPath)), { recursive: true });
    fs.writeFileSync(outputPath, content, 'utf-8');

    this.logger.info('Exported session', { sessionId, outputPath, format, messages: checkpoint.messages.length });
    return { outputPath, format, checkpoint };
  }

  /** 依名稱在目前 project scope 內匯出 */
  exportSessionByName(name: string, outputPath: string, options: ExportOptions = {}): ExportResult {
    const session = this.sessions.getSessionByName(this.projectPath, name);
    return this.exportSession(session.id, outputPath, options);
  }

  /**
   * 讀取、解析並驗證 checkpoint 檔案，不寫入任何資料
   * @throws UnsupportedCheckpointFormatError Markdown 只能匯出
   * @throws CheckpointValidationError 驗證失敗
   */
  validateCheckpointFile(inputPath: string): Checkpoint {
    const format = detectFormatFromPath(inputPath);
    if (format === 'markdown') {
      throw new UnsupportedCheckpointFormatError(
        'markdown checkpoints are export-only and cannot be imported',
      );
    }

    let text: string;
    try {
      text = fs.readFileSync(inputPath, 'utf-8');
    } catch (err) {
      throw new CheckpointValidationError('file', `cannot read ${inputPath}: ${errorMessage(err)}`, { cause: err });
    }
    return validateCheckpoint(parseCheckpoint(text, format));
  }

  /** 從檔案匯入 */
  importSession(inputPath: string, options: ImportOptions = {}): ImportResult {
    const checkpoint = this.validateCheckpointFile(inputPath);
    return this.importCheckpoint(checkpoint, options);
  }

  /**
   * 匯入已驗證的 checkpoint
   *
   * 產生新的 session ID 與時間；訊息保留原本的 archived 旗標與時間。
   * archived 訊息以一筆 deterministic 摘要覆蓋。
   * @throws SessionAlreadyExistsError 同名 session 存在且未指定 overwrite
   */
  importCheckpoint(checkpoint: Checkpoint, options: ImportOptions = {}): ImportResult {
    const { signal } = options;
    const name = options.name || checkpoint.session.name;
    const projectPath = options.projectPath ?? this.projectPath;

    const existing = this.sessions.findSessionByName(projectPath, name);
    if (existing) {
      if (!options.overwrite) {
        throw new SessionAlreadyExistsError(name, projectPath);
      }
      this.sessions.deleteSession(existing.id, { signal });
      this.logger.info('Deleted existing session before import', { name, sessionId: existing.id });
    }

    const session = this.sessions.createSession({
      name,
      projectPath,
      model: checkpoint.session.model,
      provider: checkpoint.session.provider,
      agent: checkpoint.session.agent,
      metadata: checkpoint.session.metadata,
    }, { signal });

    try {
      const archivedMessages: Message[] = [];
      for (const msg of checkpoint.messages) {
        throwIfCancelled(signal, 'append message');
        const createdAt = Date.parse(msg.created_at);
        const archived = msg.archived ?? false;
        const id = this.store.appendMessage({
          sessionId: session.id,
          role: msg.role,
          content: msg.content,
          createdAt,
          archived,
        });
        if (archived) {
          archivedMessages.push({ id, sessionId: session.id, role: msg.role, content: msg.content, createdAt, archived });
        }
      }

      const summariesRestored = this.restoreSummary(session.id, archivedMessages, signal);
      const contextItemsRestored = (options.includeContext ?? true)
        ? this.restoreContext(session.id, checkpoint.context, signal)
        : 0;

      this.logger.info('Imported session', {
        sessionId: session.id,
        name,
        messages: checkpoint.messages.length,
      });

      return {
        session: this.sessions.getSession(session.id),
        messagesImported: checkpoint.messages.length,
        summariesRestored,
        contextItemsRestored,
      };
    } catch (err) {
      this.rollback(session.id, err);
      throw err;
    }
  }

  // ── 私有方法 ──

  private buildStatistics(messages: readonly Message[], toolCalls: number): CheckpointStatistics {
    const chars = messages.reduce((sum, m) => sum + m.content.length, 0);
    const totalTokens = Math.floor(chars / CHARS_PER_TOKEN);
    return {
      message_count: messages.length,
      user_messages: messages.filter((m) => m.role === 'user').length,
      assistant_messages: messages.filter((m) => m.role === 'assistant').length,
      ...(totalTokens > 0 ? { total_tokens: totalTokens } : {}),
      ...(toolCalls > 0 ? { tool_calls: toolCalls } : {}),
    };
  }

  private buildContext(filesAccessed: string[]): CheckpointContext {
    const context: CheckpointContext = {};
    if (this.workspace) {
      context.working_directory = this.workspace.workingDirectory();
      const memory = this.workspace.projectMemory();
      if (memory) context.project_memory = memory;
    }
    if (filesAccessed.length > 0) context.files_accessed = filesAccessed;
    return context;
  }

  private restoreSummary(sessionId: string, archived: readonly Message[], signal?: AbortSignal): number {
    if (archived.length === 0) return 0;

    const ids = archived.map((m) => m.id);
    const content = buildFallbackSummary(archived);
    throwIfCancelled(signal, 'store summary');
    this.store.storeSummary({
      id: randomUUID(),
      sessionId,
      originalMessageIds: ids,
      messageRange: formatMessageRange(ids),
      summaryContent: content,
      tokenCount: estimateTokens(content),
      createdAt: Date.now(),
    });
    return 1;
  }

  private restoreContext(sessionId: string, context: CheckpointContext | undefined, signal?: AbortSignal): number {
    if (!context) return 0;

    const items: Array<{ type: string; key: string; value: string }> = [];
    if (context.working_directory) {
      items.push({ type: 'setting', key: WORKING_DIRECTORY_KEY, value: context.working_directory });
    }
    for (const file of context.files_accessed ?? []) {
      items.push({ type: FILE_CONTEXT_TYPE, key: file, value: file });
    }

    for (const item of items) {
      throwIfCancelled(signal, 'add context');
      this.store.addContextItem({
        sessionId,
        contextType: item.type,
        contextKey: item.key,
        contextValue: item.value,
      });
    }
    return items.length;
  }

  /** 匯入失敗時刪除部分建立的 session */
  private rollback(sessionId: string, cause: unknown): void {
    this.logger.warn('Import failed, removing partially imported session', {
      sessionId,
      error: errorMessage(cause),
    });
    try {
      this.store.deleteSession(sessionId);
    } catch (err) {
      this.logger.error('Failed to remove partially imported session', {
        sessionId,
        error: errorMessage(err),
      });
    }
  }
}
