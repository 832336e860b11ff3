export type { Session, NewSession, SessionMetadata } from './domain/entities/Session.js';
export type { Message, NewMessage, MessageRole } from './domain/entities/Message.js';
export { MESSAGE_ROLES, isMessageRole } from './domain/entities/Message.js';
export type { Summary } from './domain/entities/Summary.js';
export type { ContextItem, ContextType } from './domain/entities/ContextItem.js';
export type {
  Checkpoint,
  CheckpointContext,
  CheckpointFormat,
  CheckpointMessage,
  CheckpointSession,
  CheckpointStatistics,
} from './domain/entities/Checkpoint.js';
export { CHECKPOINT_VERSION } from './domain/entities/Checkpoint.js';
export type {
  CompactPlan,
  CompactResult,
  CompactionEvent,
  CompactionObserver,
  CompactionStage,
} from './domain/value-objects/CompactPlan.js';
export * from './domain/errors/DomainErrors.js';
export type { SessionStorePort } from './domain/ports/SessionStorePort.js';
export type { SummarizerPort, SummarizeOptions } from './domain/ports/SummarizerPort.js';
export type { WorkspaceContextPort } from './domain/ports/WorkspaceContextPort.js';

export { CompactionUseCase, buildSummarizationPrompt } from './application/CompactionUseCase.js';
export type { ShouldCompactResult } from './application/CompactionUseCase.js';
export { SessionUseCase } from './application/SessionUseCase.js';
export type { SessionUseCaseOptions, CompactionAwareReadOptions } from './application/SessionUseCase.js';
export {
  CheckpointUseCase,
  detectFormatFromPath,
  resolveFormat,
  validateCheckpoint,
} from './application/CheckpointUseCase.js';
export type { ExportOptions, ExportResult, ImportOptions, ImportResult } from './application/CheckpointUseCase.js';

export { DatabaseManager, IN_MEMORY_DB } from './infrastructure/sqlite/DatabaseManager.js';
export { SqliteSessionStore } from './infrastructure/sqlite/SqliteSessionStore.js';
export { InMemorySessionStore } from './infrastructure/memory/InMemorySessionStore.js';
export { OpenAISummarizerAdapter } from './infrastructure/llm/OpenAISummarizerAdapter.js';
export { createSummarizer } from './infrastructure/llm/createSummarizer.js';
export { WorkspaceContextAdapter } from './infrastructure/context/WorkspaceContextAdapter.js';

export { loadConfig, validateCompactConfig, CONFIG_FILE_NAME } from './config/ConfigLoader.js';
export type { ChatLedgerConfig, CompactConfig, PartialConfig } from './config/types.js';
export { DEFAULT_CONFIG, DEFAULT_COMPACT_CONFIG, shouldUseAISummary } from './config/defaults.js';
export { parseRetentionDays } from './shared/Duration.js';
