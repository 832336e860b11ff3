import OpenAI, { APIError } from 'openai';
import type { SummarizerPort, SummarizeOptions } from '../../domain/ports/SummarizerPort.js';
import {
  SummarizerRateLimitError,
  SummarizerUnavailableError,
} from '../../domain/errors/DomainErrors.js';
import { Logger, errorMessage } from '../../shared/Logger.js';
import { withRetry } from '../../shared/RetryPolicy.js';

/**
 * OpenAI-compatible 摘要 Adapter
 *
 * 設計意圖：透過 chat completions 產生對話摘要。
 * 支援任何 OpenAI-compatible endpoint（OpenAI、Ollama、vLLM、LiteLLM 等）。
 * 429 以 withRetry 重試；其他錯誤一律轉為 SummarizerUnavailableError，
 * 讓 Compactor 降級為 deterministic 摘要。
 */

export interface OpenAISummarizerConfig {
  baseUrl: string;
  apiKey?: string;
  model: string;
  /** 429 重試次數 */
  maxRetries?: number;
  /** 單次請求逾時（毫秒） */
  timeoutMs?: number;
}

const RATE_LIMIT_BASE_DELAY_MS = 1000;

const SYSTEM_PROMPT =
  'You condense earlier parts of a conversation so it can continue with a smaller context. ' +
  'Follow the instructions in the user message exactly and return only the summary text.';

export class OpenAISummarizerAdapter implements SummarizerPort {
  readonly providerId = 'openai-compatible';
  private readonly client: OpenAI;
  private readonly model: string;
  private readonly maxRetries: number;
  private readonly logger = new Logger('OpenAISummarizerAdapter');

  constructor(config: OpenAISummarizerConfig) {
    this.model = config.model;
    this.maxRetries = config.maxRetries ?? 2;

    // 重試由 withRetry 控制，SDK 本身不重試
    this.client = new OpenAI({
      apiKey: config.apiKey || 'not-needed',
      baseURL: config.baseUrl,
      maxRetries: 0,
      timeout: config.timeoutMs ?? 30000,
    });
  }

  async summarize(prompt: string, options: SummarizeOptions): Promise<string> {
    const model = options.model ?? this.model;

    return withRetry(() => this.complete(prompt, model, options), {
      maxRetries: this.maxRetries,
      baseDelayMs: RATE_LIMIT_BASE_DELAY_MS,
      signal: options.signal,
      onRetry: (attempt, err) => {
        this.logger.warn('Summarization rate limited, retrying', { attempt, error: errorMessage(err) });
      },
    });
  }

  private async complete(prompt: string, model: string, options: SummarizeOptions): Promise<string> {
    let content: string | undefined;
    try {
      const response = await this.client.chat.completions.create(
        {
          model,
          messages: [
            { role: 'system', content: SYSTEM_PROMPT },
            { role: 'user', content: prompt },
          ],
          temperature: 0.2,
          max_tokens: options.maxTokens,
        },
        { signal: options.signal },
      );
      content = response.choices[0]?.message?.content?.trim();
    } catch (err) {
      if (err instanceof APIError && err.status === 429) {
        throw new SummarizerRateLimitError(`Summarizer rate limited: ${err.message}`, { cause: err });
      }
      throw new SummarizerUnavailableError(`Summarizer request failed: ${errorMessage(err)}`, { cause: err });
    }

    if (!content) {
      throw new SummarizerUnavailableError('Summarizer returned an empty response');
    }
    return content;
  }
}
