export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVELS: Record<LogLevel, number> = {
  debug: 0, info: 1, warn: 2, error: 3, silent: 4,
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && Object.hasOwn(LEVELS, value);
}

/** 由 CHATLEDGER_LOG_LEVEL 決定預設等級，未設定時為 info */
export function defaultLogLevel(): LogLevel {
  const fromEnv = process.env.CHATLEDGER_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : 'info';
}

/** 結構化 JSON logger，一律寫到 stderr（stdout 保留給指令輸出） */
export class Logger {
  constructor(
    private readonly context: string,
    private readonly minLevel: LogLevel = defaultLogLevel(),
  ) {}

  private shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVELS[level] >= LEVELS[this.minLevel];
  }

  private log(level: Exclude<LogLevel, 'silent'>, message: string, data?: Record<string, unknown>): void {
    if (!this.shouldLog(level)) return;
    const entry = {
      timestamp: new Date().toISOString(),
      level,
      context: this.context,
      message,
      ...data,
    };
    process.stderr.write(JSON.stringify(entry) + '\n');
  }

  debug(msg: string, data?: Record<string, unknown>) { this.log('debug', msg, data); }
  info(msg: string, data?: Record<string, unknown>) { this.log('info', msg, data); }
  warn(msg: string, data?: Record<string, unknown>) { this.log('warn', msg, data); }
  error(msg: string, data?: Record<string, unknown>) { this.log('error', msg, data); }
}

/** 取出 unknown 錯誤的訊息字串 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
