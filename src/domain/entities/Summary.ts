/**
 * 一段被折疊的最舊訊息的摘要。
 * 同一 session 所有 summary 的 originalMessageIds 互不重疊，
 * 且聯集恰為 archived = true 的訊息集合。
 */
export interface Summary {
  id: string;
  sessionId: string;
  /** 依原始順序排列的被取代訊息 ID */
  originalMessageIds: number[];
  /** 例："Messages 1-20" */
  messageRange: string;
  summaryContent: string;
  tokenCount: number;
  createdAt: number;
}
