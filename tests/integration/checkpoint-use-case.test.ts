import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import yaml from 'js-yaml';
import { SessionUseCase } from '../../src/application/SessionUseCase.js';
import { CompactionUseCase } from '../../src/application/CompactionUseCase.js';
import { CheckpointUseCase } from '../../src/application/CheckpointUseCase.js';
import { DatabaseManager } from '../../src/infrastructure/sqlite/DatabaseManager.js';
import { SqliteSessionStore } from '../../src/infrastructure/sqlite/SqliteSessionStore.js';
import { DEFAULT_COMPACT_CONFIG } from '../../src/config/defaults.js';
import type { WorkspaceContextPort } from '../../src/domain/ports/WorkspaceContextPort.js';
import type { Checkpoint } from '../../src/domain/entities/Checkpoint.js';
import {
  CheckpointValidationError,
  OperationCancelledError,
  SessionAlreadyExistsError,
  SessionNotFoundError,
  StorageError,
  UnsupportedCheckpointFormatError,
} from '../../src/domain/errors/DomainErrors.js';

/**
 * Feature: Checkpoint 匯出與匯入
 *
 * 作為使用者，我需要把 session 匯出成可攜的檔案，在另一台機器上匯入，
 * 匯入失敗時不能留下半套資料。
 */

const workspace: WorkspaceContextPort = {
  workingDirectory: () => '/work/dir',
  projectMemory: () => 'Use the staging account for tests.',
};

function readJson(filePath: string): unknown {
  return JSON.parse(fs.readFileSync(filePath, 'utf-8'));
}

describe('CheckpointUseCase', () => {
  const tmpDir = path.join(os.tmpdir(), 'chatledger-checkpoint-' + Date.now());
  let dbMgr: DatabaseManager;
  let store: SqliteSessionStore;
  let sessions: SessionUseCase;
  let checkpoints: CheckpointUseCase;
  let sessionId: string;

  beforeEach(() => {
    dbMgr = new DatabaseManager(path.join(tmpDir, 'sessions.db'));
    store = new SqliteSessionStore(dbMgr.getDb());
    sessions = new SessionUseCase(store, new CompactionUseCase(store), {
      maxHistoryMessages: 50,
      retentionDays: 30,
      compaction: { ...DEFAULT_COMPACT_CONFIG, enabled: true, useAISummary: false },
    });
    checkpoints = new CheckpointUseCase(sessions, store, '/repo', workspace);

    const session = sessions.createSession({
      name: 'export-test',
      projectPath: '/repo',
      model: 'gpt-4',
      provider: 'openai',
      agent: 'reviewer',
      metadata: { ticket: 'OPS-1' },
    });
    sessionId = session.id;
    sessions.addMessage(sessionId, 'user', 'Hello, how are you?');
    sessions.addMessage(sessionId, 'assistant', "I'm doing well, thank you!");
    sessions.addContext(sessionId, 'file', 'main.tf', 'main.tf');
    sessions.addContext(sessionId, 'tool_call', 'read_file', 'main.tf');
  });

  afterEach(() => {
    dbMgr.close();
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('export', () => {
    it('should build statistics from every message', () => {
      const checkpoint = checkpoints.buildCheckpoint(sessionId);

      expect(checkpoint.version).toBe('1.0');
      expect(checkpoint.session).toMatchObject({
        name: 'export-test',
        provider: 'openai',
        model: 'gpt-4',
        agent: 'reviewer',
        project_path: '/repo',
        metadata: { ticket: 'OPS-1' },
      });
      expect(checkpoint.messages.map((m) => m.role)).toEqual(['user', 'assistant']);
      expect(checkpoint.statistics).toEqual({
        message_count: 2,
        user_messages: 1,
        assistant_messages: 1,
        total_tokens: Math.floor(('Hello, how are you?'.length + "I'm doing well, thank you!".length) / 4),
        tool_calls: 1,
      });
      expect(checkpoint.context).toBeUndefined();
    });

    it('should include context only when requested', () => {
      const checkpoint = checkpoints.buildCheckpoint(sessionId, { includeContext: true });
      expect(checkpoint.context).toEqual({
        working_directory: '/work/dir',
        project_memory: 'Use the staging account for tests.',
        files_accessed: ['main.tf'],
      });
    });

    it('should omit metadata when disabled', () => {
      const checkpoint = checkpoints.buildCheckpoint(sessionId, { includeMetadata: false });
      expect(checkpoint.session.metadata).toBeUndefined();
    });

    it('should include archived messages with their flag', async () => {
      for (let i = 0; i < 48; i++) sessions.addMessage(sessionId, 'user', `filler ${i}`);
      await sessions.getMessagesWithCompaction(sessionId);

      const checkpoint = checkpoints.buildCheckpoint(sessionId);
      expect(checkpoint.messages).toHaveLength(50);
      expect(checkpoint.messages.filter((m) => m.archived)).toHaveLength(20);
      expect(checkpoint.statistics.message_count).toBe(50);
    });

    it('should write JSON inferred from the extension', () => {
      const output = path.join(tmpDir, 'out', 'session.json');
      const result = checkpoints.exportSession(sessionId, output, { exportedBy: 'tester' });

      expect(result.format).toBe('json');
      expect(readJson(output)).toMatchObject({
        version: '1.0',
        exported_by: 'tester',
        session: { name: 'export-test' },
        statistics: { message_count: 2 },
      });
    });

    it('should write YAML for .yml files', () => {
      const output = path.join(tmpDir, 'session.yml');
      checkpoints.exportSession(sessionId, output);

      const loaded = yaml.load(fs.readFileSync(output, 'utf-8'));
      expect(loaded).toMatchObject({ version: '1.0', session: { name: 'export-test' } });
    });

    it('should write a Markdown report for .md files', () => {
      const output = path.join(tmpDir, 'session.md');
      checkpoints.exportSession(sessionId, output);

      const content = fs.readFileSync(output, 'utf-8');
      expect(content).toContain('# Chat Session: export-test');
      expect(content).toContain('**Provider:** openai');
      expect(content).toContain('**Model:** gpt-4');
      expect(content).toContain('## Statistics');
      expect(content).toContain('## Conversation');
      expect(content).toContain('Hello, how are you?');
      expect(content).toContain("I'm doing well, thank you!");
    });

    it('should let an explicit format override the extension', () => {
      const output = path.join(tmpDir, 'session.txt');
      const result = checkpoints.exportSession(sessionId, output, { format: 'yaml' });
      expect(result.format).toBe('yaml');
      expect(fs.readFileSync(output, 'utf-8').startsWith("version: '1.0'")).toBe(true);
    });

    it('should reject an unknown explicit format', () => {
      expect(() => checkpoints.exportSession(sessionId, path.join(tmpDir, 'x.json'), { format: 'xml' }))
        .toThrow('unsupported export format');
    });

    it('should export by name within the current project', () => {
      const output = path.join(tmpDir, 'by-name.json');
      checkpoints.exportSessionByName('export-test', output);
      expect(fs.existsSync(output)).toBe(true);
      expect(() => checkpoints.exportSessionByName('missing', output)).toThrow(SessionNotFoundError);
    });
  });

  describe('import', () => {
    it('should round-trip a session under a new name', () => {
      const file = path.join(tmpDir, 'round-trip.json');
      checkpoints.exportSession(sessionId, file);

      const result = checkpoints.importSession(file, { name: 'copy' });

      expect(result.session.name).toBe('copy');
      expect(result.session.id).not.toBe(sessionId);
      expect(result.session.agent).toBe('reviewer');
      expect(result.messagesImported).toBe(2);
      const original = sessions.getMessages(sessionId);
      const imported = sessions.getMessages(result.session.id);
      expect(imported.map((m) => [m.role, m.content])).toEqual(original.map((m) => [m.role, m.content]));
      expect(imported.map((m) => m.createdAt)).toEqual(original.map((m) => m.createdAt));
    });

    it('should round-trip through YAML', () => {
      const file = path.join(tmpDir, 'round-trip.yaml');
      checkpoints.exportSession(sessionId, file);

      const result = checkpoints.importSession(file, { name: 'from-yaml' });
      expect(sessions.getMessages(result.session.id).map((m) => m.content)).toEqual([
        'Hello, how are you?',
        "I'm doing well, thank you!",
      ]);
    });

    it('should fail on a name collision without overwrite', () => {
      const file = path.join(tmpDir, 'dup.json');
      checkpoints.exportSession(sessionId, file);

      expect(() => checkpoints.importSession(file)).toThrow(SessionAlreadyExistsError);
      expect(sessions.listSessions('/repo')).toHaveLength(1);
    });

    it('should replace the existing session with overwrite', () => {
      const file = path.join(tmpDir, 'overwrite.json');
      checkpoints.exportSession(sessionId, file);

      const result = checkpoints.importSession(file, { overwrite: true });

      expect(result.session.id).not.toBe(sessionId);
      expect(sessions.listSessions('/repo').map((s) => s.id)).toEqual([result.session.id]);
      expect(store.getMessages(sessionId)).toHaveLength(0);
      expect(store.getContextItems(sessionId)).toHaveLength(0);
    });

    it('should import into another project scope', () => {
      const file = path.join(tmpDir, 'scope.json');
      checkpoints.exportSession(sessionId, file);

      const result = checkpoints.importSession(file, { projectPath: '/elsewhere' });
      expect(result.session.projectPath).toBe('/elsewhere');
      expect(result.session.name).toBe('export-test');
    });

    it('should restore archived flags and one covering summary', async () => {
      for (let i = 0; i < 48; i++) sessions.addMessage(sessionId, 'user', `filler ${i}`);
      await sessions.getMessagesWithCompaction(sessionId);
      const file = path.join(tmpDir, 'archived.json');
      checkpoints.exportSession(sessionId, file);

      const result = checkpoints.importSession(file, { name: 'archived-copy' });

      expect(result.summariesRestored).toBe(1);
      const archived = store.getMessages(result.session.id).filter((m) => m.archived).map((m) => m.id);
      expect(archived).toHaveLength(20);
      const [summary] = store.getSummaries(result.session.id);
      expect(summary?.originalMessageIds).toEqual(archived);
      expect(summary?.summaryContent).toContain('(Summarized 20 messages)');
    });

    it('should restore the context block unless disabled', () => {
      const file = path.join(tmpDir, 'context.json');
      checkpoints.exportSession(sessionId, file, { includeContext: true });

      const withContext = checkpoints.importSession(file, { name: 'with-context' });
      expect(withContext.contextItemsRestored).toBe(2);
      expect(store.getContextItems(withContext.session.id).map((c) => [c.contextType, c.contextKey])).toEqual([
        ['setting', 'working_directory'],
        ['file', 'main.tf'],
      ]);

      const without = checkpoints.importSession(file, { name: 'without-context', includeContext: false });
      expect(without.contextItemsRestored).toBe(0);
      expect(store.getContextItems(without.session.id)).toHaveLength(0);
    });

    it('should roll back the partial session when an append fails', () => {
      const file = path.join(tmpDir, 'rollback.json');
      checkpoints.exportSession(sessionId, file);
      const append = store.appendMessage.bind(store);
      let calls = 0;
      vi.spyOn(store, 'appendMessage').mockImplementation((message) => {
        calls += 1;
        if (calls === 2) throw new StorageError('disk full');
        return append(message);
      });

      expect(() => checkpoints.importSession(file, { name: 'broken' })).toThrow('disk full');
      expect(sessions.findSessionByName('/repo', 'broken')).toBeUndefined();
      expect(sessions.listSessions('/repo')).toHaveLength(1);
    });

    it('should roll back when cancelled mid-import', () => {
      const file = path.join(tmpDir, 'cancel.json');
      checkpoints.exportSession(sessionId, file);
      const controller = new AbortController();
      const append = store.appendMessage.bind(store);
      vi.spyOn(store, 'appendMessage').mockImplementation((message) => {
        const id = append(message);
        controller.abort();
        return id;
      });

      expect(() => checkpoints.importSession(file, { name: 'cancelled', signal: controller.signal }))
        .toThrow(OperationCancelledError);
      expect(sessions.findSessionByName('/repo', 'cancelled')).toBeUndefined();
    });

    it('should keep file order for messages without timestamps', () => {
      const file = path.join(tmpDir, 'partial-times.json');
      fs.mkdirSync(tmpDir, { recursive: true });
      fs.writeFileSync(file, JSON.stringify({
        version: '1.0',
        session: { name: 'partial-times', provider: 'openai', model: 'gpt-4', project_path: '/repo' },
        messages: [
          { role: 'user', content: 'first' },
          { role: 'assistant', content: 'second', created_at: '2020-01-01' },
          { role: 'user', content: 'third' },
        ],
        statistics: { message_count: 3, user_messages: 2, assistant_messages: 1 },
      }));

      const result = checkpoints.importSession(file);

      const imported = sessions.getMessages(result.session.id);
      expect(imported.map((m) => m.content)).toEqual(['first', 'second', 'third']);
      expect(imported.map((m) => m.createdAt)).toEqual([
        Date.parse('2020-01-01'),
        Date.parse('2020-01-01'),
        Date.parse('2020-01-01'),
      ]);
    });

    it('should reject Markdown input', () => {
      const file = path.join(tmpDir, 'report.md');
      checkpoints.exportSession(sessionId, file);
      expect(() => checkpoints.importSession(file)).toThrow(UnsupportedCheckpointFormatError);
    });
  });

  describe('validation before import', () => {
    function writeCheckpoint(name: string, mutate: (c: Checkpoint) => void): string {
      const checkpoint = checkpoints.buildCheckpoint(sessionId);
      mutate(checkpoint);
      const file = path.join(tmpDir, name);
      fs.mkdirSync(tmpDir, { recursive: true });
      fs.writeFileSync(file, JSON.stringify(checkpoint));
      return file;
    }

    it('should reject a message count mismatch without touching storage', () => {
      const file = writeCheckpoint('mismatch.json', (c) => {
        c.statistics.message_count = 5;
        c.session.name = 'never-created';
      });

      expect(() => checkpoints.importSession(file)).toThrow(CheckpointValidationError);
      expect(sessions.findSessionByName('/repo', 'never-created')).toBeUndefined();
    });

    it('should reject an invalid role', () => {
      const file = path.join(tmpDir, 'role.json');
      fs.mkdirSync(tmpDir, { recursive: true });
      fs.writeFileSync(file, JSON.stringify({
        version: '1.0',
        exported_at: '2026-01-01T00:00:00.000Z',
        session: { name: 'bad-role', provider: 'openai', model: 'gpt-4', project_path: '/repo' },
        messages: [{ role: 'invalid', content: 'x', created_at: '2026-01-01T00:00:00.000Z' }],
        statistics: { message_count: 1, user_messages: 0, assistant_messages: 0 },
      }));

      expect(() => checkpoints.importSession(file)).toThrow('messages.role');
      expect(sessions.findSessionByName('/repo', 'bad-role')).toBeUndefined();
    });

    it('should validate a file without importing it', () => {
      const file = path.join(tmpDir, 'valid.json');
      checkpoints.exportSession(sessionId, file);

      const checkpoint = checkpoints.validateCheckpointFile(file);
      expect(checkpoint.session.name).toBe('export-test');
      expect(sessions.listSessions('/repo')).toHaveLength(1);
    });

    it('should report an unreadable file', () => {
      expect(() => checkpoints.validateCheckpointFile(path.join(tmpDir, 'missing.json')))
        .toThrow('Invalid checkpoint (file)');
    });
  });
});
