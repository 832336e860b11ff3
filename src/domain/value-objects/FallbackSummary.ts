import type { Message } from '../entities/Message.js';

const PREVIEW_CHARS = 200;

/**
 * Deterministic 摘要：每則訊息取前 200 字元，加上折疊數量的 footer。
 * AI 摘要失敗或停用時使用，匯入含 archived 訊息的 checkpoint 時也用來重建摘要。
 */
export function buildFallbackSummary(messages: readonly Pick<Message, 'role' | 'content'>[]): string {
  const lines = ['=== SUMMARY OF EARLIER CONVERSATION ===', ''];

  for (const msg of messages) {
    // 以 code point 計算，避免切開 surrogate pair
    const chars = Array.from(msg.content);
    const preview = chars.length > PREVIEW_CHARS
      ? `${chars.slice(0, PREVIEW_CHARS).join('')}...`
      : msg.content;
    lines.push(`[${msg.role}]: ${preview}`);
  }

  lines.push('', `(Summarized ${messages.length} messages)`);
  return lines.join('\n');
}

/** 依第一與最後一個訊息 ID 產生範圍標籤 */
export function formatMessageRange(messageIds: readonly number[]): string {
  if (messageIds.length === 0) return 'Messages (none)';
  return `Messages ${messageIds[0]}-${messageIds[messageIds.length - 1]}`;
}
