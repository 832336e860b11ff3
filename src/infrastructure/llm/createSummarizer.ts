import type { SummarizerPort } from '../../domain/ports/SummarizerPort.js';
import type { CompactConfig, LLMConfig } from '../../config/types.js';
import { OpenAISummarizerAdapter } from './OpenAISummarizerAdapter.js';

/**
 * 依設定建立摘要 adapter；compaction.provider / model 優先於 llm 區段
 * provider 為 'none' 時回傳 undefined，Compactor 直接使用 deterministic 摘要
 */
export function createSummarizer(llm: LLMConfig, compaction: CompactConfig): SummarizerPort | undefined {
  const provider = compaction.provider ?? llm.provider;
  if (provider === 'none') {
    return undefined;
  }

  return new OpenAISummarizerAdapter({
    baseUrl: llm.baseUrl,
    apiKey: llm.apiKey,
    model: compaction.model ?? llm.model,
    maxRetries: llm.maxRetries,
    timeoutMs: compaction.summaryTimeoutMs,
  });
}
