import fs from 'node:fs';
import path from 'node:path';
import matter from 'gray-matter';
import type { WorkspaceContextPort } from '../../domain/ports/WorkspaceContextPort.js';

/**
 * 檔案系統上的 workspace context
 *
 * 專案記憶檔為 Markdown，frontmatter 只是檔案管理用的 metadata，匯出時去除。
 */
export class WorkspaceContextAdapter implements WorkspaceContextPort {
  constructor(
    private readonly rootDir: string,
    /** 相對於 rootDir 的專案記憶檔路徑 */
    private readonly memoryFile: string,
  ) {}

  workingDirectory(): string {
    return path.resolve(this.rootDir);
  }

  projectMemory(): string | undefined {
    const memoryPath = path.resolve(this.rootDir, this.memoryFile);
    if (!fs.existsSync(memoryPath)) return undefined;

    const { content } = matter(fs.readFileSync(memoryPath, 'utf-8'));
    const trimmed = content.trim();
    return trimmed || undefined;
  }
}
