export const MESSAGE_ROLES = ['user', 'assistant', 'system'] as const;

export type MessageRole = (typeof MESSAGE_ROLES)[number];

export function isMessageRole(value: string): value is MessageRole {
  return MESSAGE_ROLES.some((role) => role === value);
}

/**
 * 單則訊息。持久化後只有 archived 旗標可變。
 * isSummary 只出現在 compaction-aware 讀取時合成的摘要訊息上，不會寫入 DB。
 */
export interface Message {
  id: number;
  sessionId: string;
  role: MessageRole;
  content: string;
  createdAt: number;
  archived: boolean;
  isSummary?: boolean;
}

export interface NewMessage {
  sessionId: string;
  role: MessageRole;
  content: string;
  createdAt: number;
  archived?: boolean;
}
