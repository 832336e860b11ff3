import { randomUUID } from 'node:crypto';
import type { Message } from '../domain/entities/Message.js';
import type { Summary } from '../domain/entities/Summary.js';
import type { SessionStorePort } from '../domain/ports/SessionStorePort.js';
import type { SummarizerPort } from '../domain/ports/SummarizerPort.js';
import type { CompactPlan, CompactResult } from '../domain/value-objects/CompactPlan.js';
import type { CompactConfig } from '../config/types.js';
import { CHARS_PER_TOKEN, estimateTokens } from '../domain/value-objects/TokenEstimate.js';
import { buildFallbackSummary, formatMessageRange } from '../domain/value-objects/FallbackSummary.js';
import {
  InvalidCompactPlanError,
  OperationCancelledError,
  StaleCompactPlanError,
} from '../domain/errors/DomainErrors.js';
import { validateCompactConfig } from '../config/ConfigLoader.js';
import { shouldUseAISummary } from '../config/defaults.js';
import { throwIfCancelled, type CancellableOptions } from '../shared/Cancellation.js';
import { Logger, errorMessage } from '../shared/Logger.js';

export interface ShouldCompactResult {
  shouldCompact: boolean;
  plan?: CompactPlan;
}

/** 建立 AI 摘要用的 prompt */
export function buildSummarizationPrompt(messages: readonly Pick<Message, 'role' | 'content'>[]): string {
  const conversation = messages
    .map((msg, i) => {
      const role = msg.role.charAt(0).toUpperCase() + msg.role.slice(1);
      return `[Message ${i + 1}] ${role}:\n${msg.content}`;
    })
    .join('\n\n');

  return [
    'Summarize the following conversation history so the conversation can continue without it.',
    '',
    'PRESERVE:',
    '- Decisions that were made and the reasoning behind them',
    '- Configuration values, file names, commands and identifiers that were mentioned',
    '- Open questions, unresolved problems and agreed next steps',
    '',
    'DO NOT include:',
    '- Greetings, acknowledgements or other conversational filler',
    '- Repeated explanations or content that was later superseded',
    '- Speculation about what was not discussed',
    '',
    'Write 150-400 words in concise prose or bullet points.',
    '',
    'CONVERSATION TO SUMMARIZE:',
    '',
    conversation,
  ].join('\n');
}

/**
 * Compaction 用例：決定何時壓縮、產生摘要、提交 archival
 *
 * - shouldCompact：純計算，依 threshold / ratio / preserveRecent 產生計畫
 * - compact：AI 摘要（失敗或逾時降級為 deterministic 摘要），
 *   再於單一交易中寫入 Summary 並將訊息標記 archived；
 *   計畫中的訊息若已被封存則不寫入，回傳 StaleCompactPlanError
 */
export class CompactionUseCase {
  private readonly logger = new Logger('CompactionUseCase');

  constructor(
    private readonly store: SessionStorePort,
    /** 未提供時只使用 deterministic 摘要 */
    private readonly summarizer?: SummarizerPort,
  ) {}

  shouldCompact(
    messages: readonly Message[],
    maxMessages: number,
    config: CompactConfig,
  ): ShouldCompactResult {
    if (!config.enabled || maxMessages === 0 || messages.length === 0) {
      return { shouldCompact: false };
    }
    validateCompactConfig(config);

    const total = messages.length;
    const threshold = maxMessages * config.triggerThreshold;
    if (total < threshold) {
      return { shouldCompact: false };
    }

    let toCompact = Math.floor(total * config.compactRatio);
    if (total - toCompact < config.preserveRecent) {
      toCompact = total - config.preserveRecent;
    }
    if (toCompact <= 0) {
      return { shouldCompact: false };
    }

    const messagesToCompact = messages.slice(0, toCompact);
    const messagesToKeep = messages.slice(toCompact);
    const chars = messagesToCompact.reduce((sum, m) => sum + m.content.length, 0);

    return {
      shouldCompact: true,
      plan: {
        sessionId: messagesToCompact[0]?.sessionId ?? '',
        totalMessages: total,
        messagesToCompact,
        messagesToKeep,
        reason: `${total} messages reached threshold ${threshold} (max ${maxMessages}); compacting oldest ${toCompact}, keeping ${messagesToKeep.length}`,
        estimatedSavings: Math.floor(chars / CHARS_PER_TOKEN),
      },
    };
  }

  /**
   * 執行壓縮計畫
   * @throws InvalidCompactPlanError 計畫不存在或沒有可壓縮的訊息
   * @throws OperationCancelledError signal 已中止
   */
  async compact(
    plan: CompactPlan | undefined,
    config: CompactConfig,
    options: CancellableOptions = {},
  ): Promise<CompactResult> {
    if (!plan) {
      throw new InvalidCompactPlanError('compaction plan is missing');
    }
    if (plan.messagesToCompact.length === 0) {
      throw new InvalidCompactPlanError('compaction plan has no messages to compact');
    }

    const { signal } = options;
    const originalMessageIds = plan.messagesToCompact.map((m) => m.id);

    let summaryContent: string | undefined;
    if (this.summarizer && shouldUseAISummary(config)) {
      throwIfCancelled(signal, 'summarization');
      summaryContent = await this.summarizeWithAI(plan, config, signal);
    }
    const usedAI = summaryContent !== undefined;
    summaryContent ??= buildFallbackSummary(plan.messagesToCompact);

    const summary: Summary = {
      id: randomUUID(),
      sessionId: plan.sessionId,
      originalMessageIds,
      messageRange: formatMessageRange(originalMessageIds),
      summaryContent,
      tokenCount: estimateTokens(summaryContent),
      createdAt: Date.now(),
    };

    throwIfCancelled(signal, 'store summary');
    let alreadyArchived: number[];
    try {
      // 摘要期間可能有另一次 compaction 先提交，提交前重新確認計畫中的訊息仍為 active
      alreadyArchived = this.store.transaction(() => {
        const active = new Set(this.store.getActiveMessages(plan.sessionId).map((m) => m.id));
        const archived = originalMessageIds.filter((id) => !active.has(id));
        if (archived.length === 0) {
          this.store.storeSummary(summary);
          this.store.archiveMessages(originalMessageIds);
        }
        return archived;
      });
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error('Failed to commit compaction', { sessionId: plan.sessionId, error: error.message });
      return { success: false, originalMessageIds, tokenCount: 0, usedAI, error };
    }

    if (alreadyArchived.length > 0) {
      this.logger.info('Skipped stale compaction plan', {
        sessionId: plan.sessionId,
        alreadyArchived: alreadyArchived.length,
      });
      return {
        success: false,
        originalMessageIds,
        tokenCount: 0,
        usedAI,
        error: new StaleCompactPlanError(plan.sessionId, alreadyArchived),
      };
    }

    this.logger.info('Compacted messages', {
      sessionId: plan.sessionId,
      range: summary.messageRange,
      usedAI,
      tokenCount: summary.tokenCount,
    });

    return {
      success: true,
      summaryId: summary.id,
      summaryContent,
      originalMessageIds,
      tokenCount: summary.tokenCount,
      usedAI,
    };
  }

  /** 回傳 AI 摘要；任何失敗回傳 undefined 交由 fallback，取消則往外拋 */
  private async summarizeWithAI(
    plan: CompactPlan,
    config: CompactConfig,
    signal: AbortSignal | undefined,
  ): Promise<string | undefined> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(new Error('summary timed out')), config.summaryTimeoutMs);
    const onAbort = () => controller.abort(signal?.reason);
    signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const text = await this.summarizer?.summarize(buildSummarizationPrompt(plan.messagesToCompact), {
        model: config.model,
        maxTokens: config.summaryMaxTokens,
        signal: controller.signal,
      });
      const trimmed = text?.trim();
      if (trimmed) return trimmed;
      this.logger.warn('AI summary was empty, using fallback summary', { sessionId: plan.sessionId });
      return undefined;
    } catch (err) {
      if (signal?.aborted) {
        throw new OperationCancelledError('Operation cancelled during summarization', { cause: err });
      }
      this.logger.warn('AI summary failed, using fallback summary', {
        sessionId: plan.sessionId,
        error: errorMessage(err),
      });
      return undefined;
    } finally {
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
    }
  }
}
