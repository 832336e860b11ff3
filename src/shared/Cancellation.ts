import { OperationCancelledError } from '../domain/errors/DomainErrors.js';

/** 各操作共用的取消選項 */
export interface CancellableOptions {
  signal?: AbortSignal;
}

/**
 * 合作式取消檢查點：signal 已中止時拋出 OperationCancelledError
 * @param operation - 用於錯誤訊息，例如 "append message"
 */
export function throwIfCancelled(signal: AbortSignal | undefined, operation: string): void {
  if (signal?.aborted) {
    throw new OperationCancelledError(`Operation cancelled before ${operation}`, {
      cause: signal.reason,
    });
  }
}
