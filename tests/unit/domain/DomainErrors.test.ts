import { describe, it, expect } from 'vitest';
import {
  ChatLedgerError,
  CheckpointValidationError,
  InvalidDurationError,
  SessionAlreadyExistsError,
  SessionNotFoundError,
  StorageConstraintError,
  StaleCompactPlanError,
  StorageError,
  SummarizerRateLimitError,
  SummarizerUnavailableError,
} from '../../../src/domain/errors/DomainErrors.js';

describe('DomainErrors', () => {
  it('SummarizerRateLimitError is retryable', () => {
    const err = new SummarizerRateLimitError('rate limit');
    expect(err.classification).toBe('retryable');
    expect(err.code).toBe('SUMMARIZER_RATE_LIMIT');
    expect(err).toBeInstanceOf(ChatLedgerError);
    expect(err).toBeInstanceOf(Error);
    expect(Object.keys(err)).not.toContain('baseDelayMs');
  });

  it('StaleCompactPlanError is degradable and counts archived ids', () => {
    const err = new StaleCompactPlanError('session-1', [1, 2]);
    expect(err.classification).toBe('degradable');
    expect(err.code).toBe('STALE_COMPACT_PLAN');
    expect(err.archivedIds).toEqual([1, 2]);
    expect(err.message).toBe('Compaction plan for session "session-1" is stale: 2 planned message(s) already archived');
  });

  it('SummarizerUnavailableError is degradable', () => {
    const err = new SummarizerUnavailableError('offline');
    expect(err.classification).toBe('degradable');
    expect(err.code).toBe('SUMMARIZER_UNAVAILABLE');
    expect(err.name).toBe('SummarizerUnavailableError');
  });

  it('SessionNotFoundError names the reference', () => {
    const err = new SessionNotFoundError('my-session');
    expect(err.classification).toBe('manual');
    expect(err.code).toBe('SESSION_NOT_FOUND');
    expect(err.reference).toBe('my-session');
    expect(err.message).toBe('Session "my-session" not found');
  });

  it('SessionAlreadyExistsError carries name and scope', () => {
    const err = new SessionAlreadyExistsError('dup', '/repo');
    expect(err.code).toBe('SESSION_EXISTS');
    expect(err.sessionName).toBe('dup');
    expect(err.projectPath).toBe('/repo');
    expect(err.message).toContain('already exists');
  });

  it('CheckpointValidationError names the violated rule', () => {
    const err = new CheckpointValidationError('messages.role', 'bad role');
    expect(err.rule).toBe('messages.role');
    expect(err.message).toBe('Invalid checkpoint (messages.role): bad role');
  });

  it('StorageConstraintError is a StorageError with its own code', () => {
    const cause = new Error('UNIQUE constraint failed');
    const err = new StorageConstraintError('failed to insert session', { cause });
    expect(err).toBeInstanceOf(StorageError);
    expect(err.code).toBe('STORAGE_CONSTRAINT');
    expect(err.cause).toBe(cause);
    expect(new StorageError('disk').code).toBe('STORAGE_FAILURE');
  });

  it('InvalidDurationError message depends on the code', () => {
    expect(new InvalidDurationError('INVALID_DURATION', 'abc').message).toContain('Invalid duration format "abc"');
    const unit = new InvalidDurationError('UNSUPPORTED_DURATION_UNIT', '1y');
    expect(unit.code).toBe('UNSUPPORTED_DURATION_UNIT');
    expect(unit.input).toBe('1y');
    expect(unit.message).toContain('Unsupported duration unit in "1y"');
  });
});
