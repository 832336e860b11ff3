import type { Session } from '../../domain/entities/Session.js';
import type { Message } from '../../domain/entities/Message.js';

export type OutputFormat = 'json' | 'text';

export function isOutputFormat(value: string): value is OutputFormat {
  return value === 'json' || value === 'text';
}

/**
 * CLI 輸出格式化器：json 給程式讀取，text 給人看
 */
export class OutputFormatter {
  constructor(private readonly format: OutputFormat) {}

  formatObject(data: unknown): string {
    if (this.format === 'json') {
      return JSON.stringify(data, null, 2);
    }
    return this.flattenToText(data);
  }

  formatSessions(sessions: readonly Session[]): string {
    if (this.format === 'json') {
      return JSON.stringify({ sessions, count: sessions.length }, null, 2);
    }
    if (sessions.length === 0) return 'No sessions found.';

    return sessions
      .map((s) => {
        const agent = s.agent ? ` [${s.agent}]` : '';
        return `${s.name}${agent}  ${s.provider}/${s.model}  ${s.messageCount} messages  updated ${new Date(s.updatedAt).toISOString()}`;
      })
      .join('\n');
  }

  formatMessages(messages: readonly Message[]): string {
    if (this.format === 'json') {
      return JSON.stringify(messages, null, 2);
    }
    if (messages.length === 0) return 'No messages.';

    return messages
      .map((m) => {
        const label = m.isSummary ? `${m.role} (summary)` : m.role;
        return `[${label}] ${m.content}`;
      })
      .join('\n\n');
  }

  /** 將任意物件平展為人類可讀文字 */
  private flattenToText(data: unknown, indent: number = 0): string {
    if (data === null || data === undefined) return '';
    if (typeof data !== 'object') return String(data);

    const prefix = '  '.repeat(indent);
    if (Array.isArray(data)) {
      return data.map((item, i) => `${prefix}[${i}] ${this.flattenToText(item, indent + 1)}`).join('\n');
    }

    return Object.entries(data)
      .map(([key, val]) => {
        if (typeof val === 'object' && val !== null) {
          return `${prefix}${key}:\n${this.flattenToText(val, indent + 1)}`;
        }
        return `${prefix}${key}: ${String(val)}`;
      })
      .join('\n');
  }
}
