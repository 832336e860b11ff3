import type { Message } from '../entities/Message.js';

/** Policy 評估產生的壓縮計畫，不持久化 */
export interface CompactPlan {
  sessionId: string;
  totalMessages: number;
  /** 最舊的一段連續訊息 */
  messagesToCompact: Message[];
  messagesToKeep: Message[];
  reason: string;
  /** 依 CHARS_PER_TOKEN 估算可省下的 token 數 */
  estimatedSavings: number;
}

export interface CompactResult {
  success: boolean;
  summaryId?: string;
  summaryContent?: string;
  originalMessageIds: number[];
  tokenCount: number;
  /** true = 摘要來自 AI；false = deterministic fallback */
  usedAI: boolean;
  error?: Error;
}

export type CompactionStage = 'starting' | 'completed' | 'failed';

export interface CompactionEvent {
  stage: CompactionStage;
  sessionId: string;
  messageCount: number;
  result?: CompactResult;
  error?: Error;
}

/** 同步的 compaction 進度 observer */
export type CompactionObserver = (event: CompactionEvent) => void;
