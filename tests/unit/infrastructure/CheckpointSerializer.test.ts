import { describe, it, expect } from 'vitest';
import yaml from 'js-yaml';
import { parseCheckpoint, serializeCheckpoint } from '../../../src/infrastructure/checkpoint/CheckpointSerializer.js';
import { CheckpointValidationError } from '../../../src/domain/errors/DomainErrors.js';
import type { Checkpoint } from '../../../src/domain/entities/Checkpoint.js';

const checkpoint: Checkpoint = {
  version: '1.0',
  exported_at: '2026-03-01T10:00:00.000Z',
  session: {
    name: 'infra-review',
    provider: 'openai',
    model: 'gpt-4',
    project_path: '/repo',
    created_at: '2026-03-01T09:00:00.000Z',
    updated_at: '2026-03-01T09:30:00.000Z',
  },
  messages: [
    { role: 'user', content: 'Plan the migration', created_at: '2026-03-01T09:00:00.000Z' },
    { role: 'assistant', content: 'Step 1:\n- back up the state', created_at: '2026-03-01T09:01:00.000Z', archived: true },
  ],
  statistics: { message_count: 2, user_messages: 1, assistant_messages: 1, total_tokens: 11 },
};

describe('serializeCheckpoint', () => {
  it('should write indented JSON with a trailing newline', () => {
    const text = serializeCheckpoint(checkpoint, 'json');
    expect(text.endsWith('}\n')).toBe(true);
    expect(text).toContain('\n  "version": "1.0",\n');
    expect(JSON.parse(text)).toEqual(checkpoint);
  });

  it('should write YAML that loads back to the same object', () => {
    const text = serializeCheckpoint(checkpoint, 'yaml');
    expect(text.split('\n')[0]).toBe("version: '1.0'");
    expect(yaml.load(text)).toEqual(checkpoint);
  });

  it('should omit undefined optional fields in YAML', () => {
    const text = serializeCheckpoint({ ...checkpoint, exported_by: undefined }, 'yaml');
    expect(text).not.toContain('exported_by');
  });
});

describe('parseCheckpoint', () => {
  it('should read back both structured formats', () => {
    expect(parseCheckpoint(serializeCheckpoint(checkpoint, 'json'), 'json').messages[1]?.archived).toBe(true);
    expect(parseCheckpoint(serializeCheckpoint(checkpoint, 'yaml'), 'yaml').session.name).toBe('infra-review');
  });

  it('should normalize unquoted YAML timestamps and numeric versions', () => {
    const raw = parseCheckpoint([
      'version: 1.0',
      'exported_at: 2026-03-01T10:00:00Z',
      'session:',
      '  name: s',
      'messages: []',
      'statistics:',
      '  message_count: 0',
    ].join('\n'), 'yaml');

    expect(raw.version).toBe('1');
    expect(raw.exported_at).toBe('2026-03-01T10:00:00.000Z');
    expect(raw.session.provider).toBe('');
    expect(raw.statistics.user_messages).toBe(0);
  });

  it('should report syntax errors', () => {
    try {
      parseCheckpoint('{ "version": ', 'json');
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(CheckpointValidationError);
      expect(err).toMatchObject({ rule: 'syntax' });
    }
  });

  it('should report the path of a structural mismatch', () => {
    const text = JSON.stringify({ ...checkpoint, messages: [{ role: 'user', content: 42 }] });
    expect(() => parseCheckpoint(text, 'json')).toThrow('Invalid checkpoint (structure): messages.0.content');
  });

  it('should require statistics', () => {
    const { statistics: _omitted, ...rest } = checkpoint;
    expect(() => parseCheckpoint(JSON.stringify(rest), 'json')).toThrow('statistics');
  });
});
