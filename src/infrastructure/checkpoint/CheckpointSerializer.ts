import yaml from 'js-yaml';
import { z } from 'zod';
import type { Checkpoint } from '../../domain/entities/Checkpoint.js';
import { CheckpointValidationError } from '../../domain/errors/DomainErrors.js';
import { errorMessage } from '../../shared/Logger.js';

export type StructuredFormat = 'json' | 'yaml';

/** YAML 可能把未加引號的時間讀成 Date，統一轉回 ISO 字串 */
const TimestampSchema = z
  .union([z.string(), z.date()])
  .transform((value) => (typeof value === 'string' ? value : value.toISOString()));

/**
 * Checkpoint 檔案的結構
 *
 * 只檢查型別；版本、必填欄位、role、數量一致性等規則
 * 由 CheckpointUseCase.validateCheckpoint 逐條檢查，才能指出違反哪一條。
 */
export const RawCheckpointSchema = z.object({
  version: z.union([z.string(), z.number()]).transform(String).optional(),
  exported_at: TimestampSchema.optional(),
  exported_by: z.string().optional(),
  session: z.object({
    name: z.string().default(''),
    provider: z.string().default(''),
    model: z.string().default(''),
    agent: z.string().optional(),
    project_path: z.string().default(''),
    created_at: TimestampSchema.optional(),
    updated_at: TimestampSchema.optional(),
    metadata: z.record(z.unknown()).optional(),
  }),
  messages: z.array(z.object({
    role: z.string(),
    content: z.string(),
    created_at: TimestampSchema.optional(),
    archived: z.boolean().optional(),
  })).default([]),
  context: z.object({
    project_memory: z.string().optional(),
    files_accessed: z.array(z.string()).optional(),
    working_directory: z.string().optional(),
  }).optional(),
  statistics: z.object({
    message_count: z.number().int(),
    user_messages: z.number().int().default(0),
    assistant_messages: z.number().int().default(0),
    total_tokens: z.number().int().optional(),
    tool_calls: z.number().int().optional(),
  }),
});

export type RawCheckpoint = z.infer<typeof RawCheckpointSchema>;

export function serializeCheckpoint(checkpoint: Checkpoint, format: StructuredFormat): string {
  if (format === 'yaml') {
    // skipInvalid：略過值為 undefined 的可選欄位
    return yaml.dump(checkpoint, { noRefs: true, lineWidth: -1, skipInvalid: true });
  }
  return JSON.stringify(checkpoint, null, 2) + '\n';
}

/**
 * 解析 checkpoint 文字
 * @throws CheckpointValidationError 語法錯誤（rule = syntax）或結構不符（rule = structure）
 */
export function parseCheckpoint(text: string, format: StructuredFormat): RawCheckpoint {
  let raw: unknown;
  try {
    raw = format === 'yaml' ? yaml.load(text) : JSON.parse(text);
  } catch (err) {
    throw new CheckpointValidationError('syntax', `cannot parse ${format}: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = RawCheckpointSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new CheckpointValidationError(
      'structure',
      issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'unexpected checkpoint structure',
    );
  }
  return parsed.data;
}
