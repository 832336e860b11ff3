/** 匯出 checkpoint 時的 context 來源（工作目錄、專案記憶） */
export interface WorkspaceContextPort {
  workingDirectory(): string;
  /** 專案記憶文字；不存在時回傳 undefined */
  projectMemory(): string | undefined;
}
