/**
 * 文字摘要的抽象介面
 *
 * 設計意圖：AI 摘要視為可能失敗的外部協作者，Compactor 失敗時降級為
 * deterministic 摘要。未啟用 AI 時不提供任何 adapter。
 */

export interface SummarizeOptions {
  /** 覆寫預設模型 */
  model?: string;
  maxTokens: number;
  /** 逾時或取消 */
  signal?: AbortSignal;
}

export interface SummarizerPort {
  readonly providerId: string;

  /**
   * 將 prompt 交給文字補全服務，回傳摘要文字
   * @throws SummarizerUnavailableError 服務不可用或回應為空
   */
  summarize(prompt: string, options: SummarizeOptions): Promise<string>;
}
