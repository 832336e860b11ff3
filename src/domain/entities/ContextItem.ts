/** 常見的 context 類型；其他字串也允許 */
export type ContextType = 'file' | 'setting' | 'tool_call' | (string & {});

/** 附加在 session 上的 typed key/value，無順序語意 */
export interface ContextItem {
  sessionId: string;
  contextType: ContextType;
  contextKey: string;
  contextValue: string;
}
