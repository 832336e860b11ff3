import path from 'node:path';
import { loadConfig, type ChatLedgerConfig } from '../config/ConfigLoader.js';
import { DatabaseManager } from '../infrastructure/sqlite/DatabaseManager.js';
import { SqliteSessionStore } from '../infrastructure/sqlite/SqliteSessionStore.js';
import { WorkspaceContextAdapter } from '../infrastructure/context/WorkspaceContextAdapter.js';
import { createSummarizer } from '../infrastructure/llm/createSummarizer.js';
import { CompactionUseCase } from '../application/CompactionUseCase.js';
import { SessionUseCase } from '../application/SessionUseCase.js';
import { CheckpointUseCase } from '../application/CheckpointUseCase.js';

export interface Workspace {
  repoRoot: string;
  config: ChatLedgerConfig;
  sessions: SessionUseCase;
  checkpoints: CheckpointUseCase;
  close(): void;
}

/** 依 repo root 的設定組裝 store 與各用例；用完必須呼叫 close() */
export function openWorkspace(repoRootOption: string): Workspace {
  const repoRoot = path.resolve(repoRootOption);
  const config = loadConfig(repoRoot);

  const dbMgr = new DatabaseManager(path.resolve(repoRoot, config.storage.dbPath));
  const store = new SqliteSessionStore(dbMgr.getDb());
  const compactor = new CompactionUseCase(store, createSummarizer(config.llm, config.compaction));
  const sessions = new SessionUseCase(store, compactor, {
    maxHistoryMessages: config.session.maxHistoryMessages,
    retentionDays: config.session.retentionDays,
    compaction: config.compaction,
  });
  const workspace = new WorkspaceContextAdapter(repoRoot, config.memory.filePath);
  const checkpoints = new CheckpointUseCase(sessions, store, repoRoot, workspace);

  return {
    repoRoot,
    config,
    sessions,
    checkpoints,
    close: () => dbMgr.close(),
  };
}
