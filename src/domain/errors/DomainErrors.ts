export type ErrorClassification = 'retryable' | 'degradable' | 'manual';

/** 所有 chat-ledger domain 錯誤的基底類別 */
export abstract class ChatLedgerError extends Error {
  abstract readonly classification: ErrorClassification;
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
  }
}

// --- Retryable ---

export class SummarizerRateLimitError extends ChatLedgerError {
  readonly classification = 'retryable' as const;
  readonly code = 'SUMMARIZER_RATE_LIMIT';
}

// --- Degradable ---

/**
 * 計畫中的訊息在提交前已被另一次 compaction 封存
 * Compactor 以 success: false 回報，不會寫入任何資料
 */
export class StaleCompactPlanError extends ChatLedgerError {
  readonly classification = 'degradable' as const;
  readonly code = 'STALE_COMPACT_PLAN';

  constructor(
    public readonly sessionId: string,
    public readonly archivedIds: readonly number[],
    options?: ErrorOptions,
  ) {
    super(
      `Compaction plan for session "${sessionId}" is stale: ${archivedIds.length} planned message(s) already archived`,
      options,
    );
  }
}

/** AI 摘要不可用：Compactor 會降級為 deterministic 摘要，不會往外拋 */
export class SummarizerUnavailableError extends ChatLedgerError {
  readonly classification = 'degradable' as const;
  readonly code = 'SUMMARIZER_UNAVAILABLE';
}

// --- Manual ---

export class SessionNotFoundError extends ChatLedgerError {
  readonly classification = 'manual' as const;
  readonly code = 'SESSION_NOT_FOUND';

  constructor(
    public readonly reference: string,
    options?: ErrorOptions,
  ) {
    super(`Session "${reference}" not found`, options);
  }
}

export class SessionAlreadyExistsError extends ChatLedgerError {
  readonly classification = 'manual' as const;
  readonly code = 'SESSION_EXISTS';

  constructor(
    public readonly sessionName: string,
    public readonly projectPath: string,
    options?: ErrorOptions,
  ) {
    super(
      `Session "${sessionName}" already exists in ${projectPath}. Use --overwrite to replace it.`,
      options,
    );
  }
}

export class InvalidConfigurationError extends ChatLedgerError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_CONFIG';
}

/** Checkpoint 驗證失敗；rule 指出違反的具體規則 */
export class CheckpointValidationError extends ChatLedgerError {
  readonly classification = 'manual' as const;
  readonly code = 'CHECKPOINT_INVALID';

  constructor(
    public readonly rule: string,
    message: string,
    options?: ErrorOptions,
  ) {
    super(`Invalid checkpoint (${rule}): ${message}`, options);
  }
}

export class UnsupportedCheckpointFormatError extends ChatLedgerError {
  readonly classification = 'manual' as const;
  readonly code = 'CHECKPOINT_FORMAT';
}

export class StorageError extends ChatLedgerError {
  readonly classification = 'manual' as const;
  readonly code: string = 'STORAGE_FAILURE';
}

export class StorageConstraintError extends StorageError {
  override readonly code = 'STORAGE_CONSTRAINT';
}

export class InvalidCompactPlanError extends ChatLedgerError {
  readonly classification = 'manual' as const;
  readonly code = 'INVALID_COMPACT_PLAN';
}

export class OperationCancelledError extends ChatLedgerError {
  readonly classification = 'manual' as const;
  readonly code = 'CANCELLED';
}

export class InvalidDurationError extends ChatLedgerError {
  readonly classification = 'manual' as const;

  constructor(
    public readonly code: 'INVALID_DURATION' | 'UNSUPPORTED_DURATION_UNIT',
    public readonly input: string,
    options?: ErrorOptions,
  ) {
    super(
      code === 'INVALID_DURATION'
        ? `Invalid duration format "${input}" (expected e.g. 30d, 2w, 1m, 24h)`
        : `Unsupported duration unit in "${input}" (use h, d, w or m)`,
      options,
    );
  }
}
