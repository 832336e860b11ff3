/** 儲存設定 */
export interface StorageConfig {
  /** SQLite 檔案路徑（相對於 repo root） */
  dbPath: string;
}

/** Session 設定 */
export interface SessionConfig {
  /** 歷史訊息上限，0 表示不限制（永不壓縮） */
  maxHistoryMessages: number;
  /** retention sweep 的預設保留天數 */
  retentionDays: number;
}

/** Compaction policy 參數 */
export interface CompactConfig {
  enabled: boolean;
  /** 訊息數達 maxHistoryMessages × triggerThreshold 時觸發 */
  triggerThreshold: number;
  /** 每次折疊的歷史比例 */
  compactRatio: number;
  /** 最近 N 則永不壓縮 */
  preserveRecent: number;
  /**
   * 是否使用 AI 摘要。undefined 表示未設定（預設使用 AI），
   * 明確的 false 才會停用。
   */
  useAISummary?: boolean;
  /** 覆寫 llm.provider */
  provider?: LLMConfig['provider'];
  /** 覆寫 llm.model */
  model?: string;
  summaryMaxTokens: number;
  /** 在合成的摘要訊息前後加上可見標記 */
  showSummaryMarkers: boolean;
  /** resume session 時先跑一次 compaction */
  compactOnResume: boolean;
  /** AI 摘要逾時（毫秒），逾時即降級 */
  summaryTimeoutMs: number;
}

/** LLM 設定 */
export interface LLMConfig {
  /** LLM 提供者：'openai-compatible' 或 'none'（停用） */
  provider: 'openai-compatible' | 'none';
  /** API base URL（OpenAI-compatible endpoint） */
  baseUrl: string;
  /** API key（可選，某些本地服務不需要） */
  apiKey?: string;
  model: string;
  /** rate limit 時的重試次數 */
  maxRetries: number;
}

/** 專案記憶檔設定 */
export interface MemoryConfig {
  filePath: string;
}

/** 完整設定 */
export interface ChatLedgerConfig {
  version: number;
  storage: StorageConfig;
  session: SessionConfig;
  compaction: CompactConfig;
  llm: LLMConfig;
  memory: MemoryConfig;
}

/** 部分設定（用於 merge） */
export type PartialConfig = {
  [K in keyof ChatLedgerConfig]?: ChatLedgerConfig[K] extends object
    ? Partial<ChatLedgerConfig[K]>
    : ChatLedgerConfig[K];
};
