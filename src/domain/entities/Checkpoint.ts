import type { MessageRole } from './Message.js';
import type { SessionMetadata } from './Session.js';

/**
 * Checkpoint：可攜式、具版本的 session 快照
 *
 * 欄位名稱即 JSON / YAML 檔案上的 key（snake_case），時間皆為 ISO 8601 字串。
 * 不變式：statistics.message_count === messages.length。
 */

export const CHECKPOINT_VERSION = '1.0';

export interface CheckpointSession {
  name: string;
  provider: string;
  model: string;
  agent?: string;
  project_path: string;
  created_at: string;
  updated_at: string;
  metadata?: SessionMetadata;
}

export interface CheckpointMessage {
  role: MessageRole;
  content: string;
  created_at: string;
  archived?: boolean;
}

export interface CheckpointContext {
  project_memory?: string;
  files_accessed?: string[];
  working_directory?: string;
}

export interface CheckpointStatistics {
  message_count: number;
  user_messages: number;
  assistant_messages: number;
  total_tokens?: number;
  tool_calls?: number;
}

export interface Checkpoint {
  version: string;
  exported_at: string;
  exported_by?: string;
  session: CheckpointSession;
  messages: CheckpointMessage[];
  context?: CheckpointContext;
  statistics: CheckpointStatistics;
}

export type CheckpointFormat = 'json' | 'yaml' | 'markdown';
