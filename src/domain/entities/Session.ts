/** Session metadata 的自由欄位（JSON 可序列化） */
export type SessionMetadata = Record<string, unknown>;

export interface Session {
  /** 不透明的唯一 ID（UUID） */
  id: string;
  /** 人類可讀名稱，在同一 projectPath 內唯一 */
  name: string;
  projectPath: string;
  model: string;
  provider: string;
  /** 使用中的 agent 標籤，未設定時為空字串 */
  agent: string;
  createdAt: number;
  /** 每次 append message 時更新 */
  updatedAt: number;
  metadata?: SessionMetadata;
  /** 由 store 推導的訊息數（含 archived） */
  messageCount: number;
}

/** 建立 session 所需的欄位 */
export interface NewSession {
  name: string;
  projectPath: string;
  model: string;
  provider: string;
  agent?: string;
  metadata?: SessionMetadata;
}
