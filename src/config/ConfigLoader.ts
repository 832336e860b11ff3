import fs from 'node:fs';
import path from 'node:path';
import { z } from 'zod';
import { DEFAULT_CONFIG } from './defaults.js';
import { InvalidConfigurationError } from '../domain/errors/DomainErrors.js';
import type { ChatLedgerConfig, CompactConfig, PartialConfig } from './types.js';

export type { ChatLedgerConfig } from './types.js';

export const CONFIG_FILE_NAME = '.chatledger.json';

/** .chatledger.json 的結構；每個欄位皆可省略 */
const PartialConfigSchema = z.object({
  version: z.number().int().optional(),
  storage: z.object({
    dbPath: z.string().min(1),
  }).partial().optional(),
  session: z.object({
    maxHistoryMessages: z.number(),
    retentionDays: z.number(),
  }).partial().optional(),
  compaction: z.object({
    enabled: z.boolean(),
    triggerThreshold: z.number(),
    compactRatio: z.number(),
    preserveRecent: z.number(),
    useAISummary: z.boolean(),
    provider: z.enum(['openai-compatible', 'none']),
    model: z.string(),
    summaryMaxTokens: z.number(),
    showSummaryMarkers: z.boolean(),
    compactOnResume: z.boolean(),
    summaryTimeoutMs: z.number(),
  }).partial().optional(),
  llm: z.object({
    provider: z.enum(['openai-compatible', 'none']),
    baseUrl: z.string(),
    apiKey: z.string(),
    model: z.string(),
    maxRetries: z.number(),
  }).partial().optional(),
  memory: z.object({
    filePath: z.string(),
  }).partial().optional(),
}).strict();

/** 淺層合併單一區段：partial 中非 undefined 的值覆蓋 base */
function mergeSection<T extends object>(base: T, partial: Partial<T> | undefined): T {
  const result = { ...base };
  if (!partial) return result;
  for (const key of Object.keys(partial) as (keyof T)[]) {
    const value = partial[key];
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}

function mergeConfig(base: ChatLedgerConfig, partial: PartialConfig): ChatLedgerConfig {
  return {
    version: partial.version ?? base.version,
    storage: mergeSection(base.storage, partial.storage),
    session: mergeSection(base.session, partial.session),
    compaction: mergeSection(base.compaction, partial.compaction),
    llm: mergeSection(base.llm, partial.llm),
    memory: mergeSection(base.memory, partial.memory),
  };
}

/** 環境變數覆蓋 config：OPENAI_BASE_URL → llm.baseUrl，OPENAI_API_KEY → llm.apiKey（未設定時） */
function applyEnvOverrides(config: ChatLedgerConfig): void {
  const baseUrl = process.env.OPENAI_BASE_URL;
  if (baseUrl) {
    config.llm.baseUrl = baseUrl;
  }
  const apiKey = process.env.OPENAI_API_KEY;
  if (apiKey && !config.llm.apiKey) {
    config.llm.apiKey = apiKey;
  }
}

function isNonNegativeInteger(value: number): boolean {
  return Number.isInteger(value) && value >= 0;
}

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

/** 驗證 compaction policy 參數的合法性 */
export function validateCompactConfig(config: CompactConfig): void {
  if (!(config.triggerThreshold > 0 && config.triggerThreshold <= 1)) {
    throw new InvalidConfigurationError(
      `compaction.triggerThreshold must be in (0, 1], got ${config.triggerThreshold}`,
    );
  }
  if (!(config.compactRatio > 0 && config.compactRatio <= 1)) {
    throw new InvalidConfigurationError(
      `compaction.compactRatio must be in (0, 1], got ${config.compactRatio}`,
    );
  }
  if (!isNonNegativeInteger(config.preserveRecent)) {
    throw new InvalidConfigurationError(
      `compaction.preserveRecent must be a non-negative integer, got ${config.preserveRecent}`,
    );
  }
  if (!isPositiveInteger(config.summaryMaxTokens)) {
    throw new InvalidConfigurationError(
      `compaction.summaryMaxTokens must be a positive integer, got ${config.summaryMaxTokens}`,
    );
  }
  if (!isPositiveInteger(config.summaryTimeoutMs)) {
    throw new InvalidConfigurationError(
      `compaction.summaryTimeoutMs must be a positive integer, got ${config.summaryTimeoutMs}`,
    );
  }
}

/** 驗證設定值的合法性 */
function validate(config: ChatLedgerConfig): void {
  if (!isNonNegativeInteger(config.session.maxHistoryMessages)) {
    throw new InvalidConfigurationError('session.maxHistoryMessages must be a non-negative integer');
  }
  if (!isPositiveInteger(config.session.retentionDays)) {
    throw new InvalidConfigurationError('session.retentionDays must be a positive integer');
  }
  if (!isNonNegativeInteger(config.llm.maxRetries)) {
    throw new InvalidConfigurationError('llm.maxRetries must be a non-negative integer');
  }
  validateCompactConfig(config.compaction);
}

function readConfigFile(configPath: string): PartialConfig {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new InvalidConfigurationError(`Cannot read ${configPath}`, { cause: err });
  }

  const parsed = PartialConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new InvalidConfigurationError(
      `${configPath}: ${issue ? `${issue.path.join('.') || '(root)'}: ${issue.message}` : 'invalid config'}`,
    );
  }
  return parsed.data;
}

/**
 * 載入設定：讀取 .chatledger.json（若存在）並合併到預設值上
 * @param repoRoot - repo 根目錄
 * @param overrides - 程式碼層級的覆蓋值（優先於檔案）
 */
export function loadConfig(
  repoRoot: string,
  overrides?: PartialConfig,
): ChatLedgerConfig {
  let fileConfig: PartialConfig = {};

  const configPath = path.join(repoRoot, CONFIG_FILE_NAME);
  if (fs.existsSync(configPath)) {
    fileConfig = readConfigFile(configPath);
  }

  // 合併順序：defaults < file config < overrides
  let merged = mergeConfig(DEFAULT_CONFIG, fileConfig);
  if (overrides) {
    merged = mergeConfig(merged, overrides);
  }

  // 環境變數優先於檔案設定
  applyEnvOverrides(merged);

  validate(merged);
  return merged;
}
