import type { ChatLedgerConfig, CompactConfig } from './types.js';

export const DEFAULT_COMPACT_CONFIG: CompactConfig = {
  enabled: false,
  triggerThreshold: 0.75,
  compactRatio: 0.4,
  preserveRecent: 10,
  summaryMaxTokens: 2048,
  showSummaryMarkers: false,
  compactOnResume: false,
  summaryTimeoutMs: 30000,
};

export const DEFAULT_CONFIG: ChatLedgerConfig = {
  version: 1,
  storage: {
    dbPath: '.chatledger/sessions.db',
  },
  session: {
    maxHistoryMessages: 50,
    retentionDays: 30,
  },
  compaction: DEFAULT_COMPACT_CONFIG,
  llm: {
    provider: 'none',
    baseUrl: 'https://api.openai.com/v1',
    model: 'gpt-4o-mini',
    maxRetries: 2,
  },
  memory: {
    filePath: 'MEMORY.md',
  },
};

/** useAISummary 未設定時視為 true */
export function shouldUseAISummary(config: Pick<CompactConfig, 'useAISummary'>): boolean {
  return config.useAISummary ?? true;
}
