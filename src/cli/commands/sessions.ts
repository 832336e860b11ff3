import type { Command } from 'commander';
import os from 'node:os';
import { openWorkspace, type Workspace } from '../bootstrap.js';
import { OutputFormatter, isOutputFormat } from '../formatters/OutputFormatter.js';
import { isMessageRole } from '../../domain/entities/Message.js';
import type { CompactionEvent } from '../../domain/value-objects/CompactPlan.js';
import { InvalidConfigurationError } from '../../domain/errors/DomainErrors.js';
import { parseRetentionDays } from '../../shared/Duration.js';

interface CommonOptions {
  repoRoot: string;
  format: string;
}

interface ListOptions extends CommonOptions {
  limit?: string;
}

interface CreateOptions extends CommonOptions {
  model?: string;
  provider?: string;
  agent?: string;
}

interface ShowOptions extends CommonOptions {
  limit?: string;
}

interface CleanOptions extends CommonOptions {
  olderThan: string;
}

interface ExportCommandOptions {
  repoRoot: string;
  output: string;
  format?: string;
  context: boolean;
  metadata: boolean;
}

interface ImportCommandOptions extends CommonOptions {
  name?: string;
  overwrite: boolean;
  context: boolean;
}

function addCommonOptions(cmd: Command): Command {
  return cmd
    .option('--repo-root <path>', 'Repository root directory', '.')
    .option('--format <format>', 'Output format: json or text', 'text');
}

function createFormatter(format: string): OutputFormatter {
  if (!isOutputFormat(format)) {
    throw new InvalidConfigurationError(`Unknown output format "${format}" (expected json or text)`);
  }
  return new OutputFormatter(format);
}

function parseLimit(value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const limit = parseInt(value, 10);
  if (!Number.isInteger(limit) || limit < 0) {
    throw new InvalidConfigurationError(`--limit must be a non-negative integer, got "${value}"`);
  }
  return limit;
}

/** SIGINT 時中止進行中的操作 */
function interruptSignal(): AbortSignal {
  const controller = new AbortController();
  process.once('SIGINT', () => controller.abort(new Error('interrupted')));
  return controller.signal;
}

function withWorkspace<T>(repoRoot: string, fn: (ws: Workspace) => T): T {
  const ws = openWorkspace(repoRoot);
  try {
    return fn(ws);
  } finally {
    ws.close();
  }
}

async function withWorkspaceAsync<T>(repoRoot: string, fn: (ws: Workspace) => Promise<T>): Promise<T> {
  const ws = openWorkspace(repoRoot);
  try {
    return await fn(ws);
  } finally {
    ws.close();
  }
}

function write(text: string): void {
  process.stdout.write(text + '\n');
}

function describeCompaction(event: CompactionEvent): string {
  switch (event.stage) {
    case 'starting':
      return `Compacting ${event.messageCount} messages...`;
    case 'completed':
      return `Compacted ${event.messageCount} messages${event.result?.usedAI ? ' (AI summary)' : ''}`;
    case 'failed':
      return `Compaction failed: ${event.error?.message ?? 'unknown error'}`;
  }
}

/**
 * 註冊 sessions 指令群組
 *
 * 用法：
 *   chatledger sessions list
 *   chatledger sessions create <name>
 *   chatledger sessions append <name> <role> <content>
 *   chatledger sessions show <name>
 *   chatledger sessions delete <name>
 *   chatledger sessions clean --older-than 30d
 *   chatledger sessions export <name> -o <path>
 *   chatledger sessions import <file>
 *   chatledger sessions validate <file>
 */
export function registerSessionsCommand(program: Command): void {
  const sessionsCmd = program
    .command('sessions')
    .description('Manage chat sessions');

  addCommonOptions(
    sessionsCmd
      .command('list')
      .description('List sessions in this project, most recently updated first')
      .option('--limit <n>', 'Maximum number of sessions'),
  ).action((opts: ListOptions) => {
    const formatter = createFormatter(opts.format);
    withWorkspace(opts.repoRoot, (ws) => {
      const sessions = ws.sessions.listSessions(ws.repoRoot, parseLimit(opts.limit));
      write(formatter.formatSessions(sessions));
    });
  });

  addCommonOptions(
    sessionsCmd
      .command('create <name>')
      .description('Create an empty session')
      .option('--model <model>', 'Model label (defaults to llm.model)')
      .option('--provider <provider>', 'Provider label (defaults to llm.provider)')
      .option('--agent <agent>', 'Agent label'),
  ).action((name: string, opts: CreateOptions) => {
    const formatter = createFormatter(opts.format);
    withWorkspace(opts.repoRoot, (ws) => {
      const session = ws.sessions.createSession({
        name,
        projectPath: ws.repoRoot,
        model: opts.model ?? ws.config.llm.model,
        provider: opts.provider ?? ws.config.llm.provider,
        agent: opts.agent,
      });
      write(formatter.formatObject(session));
    });
  });

  addCommonOptions(
    sessionsCmd
      .command('append <name> <role> <content>')
      .description('Append a message (role: user, assistant or system)'),
  ).action((name: string, role: string, content: string, opts: CommonOptions) => {
    const formatter = createFormatter(opts.format);
    if (!isMessageRole(role)) {
      throw new InvalidConfigurationError(`Unknown role "${role}" (expected user, assistant or system)`);
    }
    withWorkspace(opts.repoRoot, (ws) => {
      const session = ws.sessions.getSessionByName(ws.repoRoot, name);
      const message = ws.sessions.addMessage(session.id, role, content);
      write(formatter.formatObject({ sessionId: session.id, messageId: message.id }));
    });
  });

  addCommonOptions(
    sessionsCmd
      .command('show <name>')
      .description('Show the conversation, compacting old history when needed')
      .option('--limit <n>', 'Show only the most recent n entries'),
  ).action(async (name: string, opts: ShowOptions) => {
    const formatter = createFormatter(opts.format);
    const signal = interruptSignal();
    await withWorkspaceAsync(opts.repoRoot, async (ws) => {
      const session = await ws.sessions.resumeSession(ws.repoRoot, name, {
        signal,
        onCompaction: (event) => process.stderr.write(describeCompaction(event) + '\n'),
      });
      const messages = await ws.sessions.getMessagesWithCompaction(session.id, parseLimit(opts.limit), {
        signal,
        onCompaction: (event) => process.stderr.write(describeCompaction(event) + '\n'),
      });
      write(formatter.formatMessages(messages));
    });
  });

  addCommonOptions(
    sessionsCmd
      .command('delete <name>')
      .description('Delete a session with its messages, summaries and context'),
  ).action((name: string, opts: CommonOptions) => {
    const formatter = createFormatter(opts.format);
    withWorkspace(opts.repoRoot, (ws) => {
      const session = ws.sessions.getSessionByName(ws.repoRoot, name);
      ws.sessions.deleteSession(session.id);
      write(formatter.formatObject({ action: 'deleted', name, sessionId: session.id }));
    });
  });

  addCommonOptions(
    sessionsCmd
      .command('clean')
      .description('Delete sessions not updated within the retention period')
      .option('--older-than <duration>', 'Retention period, e.g. 30d, 2w, 1m, 24h', '30d'),
  ).action((opts: CleanOptions) => {
    const formatter = createFormatter(opts.format);
    const days = parseRetentionDays(opts.olderThan);
    if (days <= 0) {
      throw new InvalidConfigurationError(`--older-than must be positive, got "${opts.olderThan}"`);
    }
    withWorkspace(opts.repoRoot, (ws) => {
      const removed = ws.sessions.cleanOldSessions(days);
      write(formatter.formatObject({ action: 'cleaned', olderThanDays: days, removed }));
    });
  });

  // -f 在這裡是 checkpoint 格式，結果固定以文字輸出
  sessionsCmd
    .command('export <name>')
    .description('Export a session to a checkpoint file')
    .option('--repo-root <path>', 'Repository root directory', '.')
    .requiredOption('-o, --output <path>', 'Output file (.json, .yaml, .yml, .md)')
    .option('-f, --format <format>', 'json, yaml or markdown (default: from extension)')
    .option('--context', 'Include working directory, project memory and accessed files', false)
    .option('--no-metadata', 'Omit session metadata')
    .action((name: string, opts: ExportCommandOptions) => {
      withWorkspace(opts.repoRoot, (ws) => {
        const result = ws.checkpoints.exportSessionByName(name, opts.output, {
          format: opts.format,
          includeContext: opts.context,
          includeMetadata: opts.metadata,
          exportedBy: process.env.USER ?? os.userInfo().username,
        });
        write(`Exported session "${name}" (${result.checkpoint.statistics.message_count} messages) to ${result.outputPath} as ${result.format}`);
      });
    });

  addCommonOptions(
    sessionsCmd
      .command('import <file>')
      .description('Import a session from a JSON or YAML checkpoint')
      .option('-n, --name <name>', 'Session name (defaults to the name in the checkpoint)')
      .option('--overwrite', 'Replace an existing session with the same name', false)
      .option('--no-context', 'Do not restore the context block'),
  ).action((file: string, opts: ImportCommandOptions) => {
    const formatter = createFormatter(opts.format);
    const signal = interruptSignal();
    withWorkspace(opts.repoRoot, (ws) => {
      const result = ws.checkpoints.importSession(file, {
        name: opts.name,
        overwrite: opts.overwrite,
        includeContext: opts.context,
        signal,
      });
      write(formatter.formatObject({
        action: 'imported',
        name: result.session.name,
        sessionId: result.session.id,
        messages: result.messagesImported,
        summaries: result.summariesRestored,
        contextItems: result.contextItemsRestored,
      }));
    });
  });

  addCommonOptions(
    sessionsCmd
      .command('validate <file>')
      .description('Validate a checkpoint file without importing it'),
  ).action((file: string, opts: CommonOptions) => {
    const formatter = createFormatter(opts.format);
    withWorkspace(opts.repoRoot, (ws) => {
      const checkpoint = ws.checkpoints.validateCheckpointFile(file);
      write(formatter.formatObject({
        valid: true,
        version: checkpoint.version,
        name: checkpoint.session.name,
        messages: checkpoint.statistics.message_count,
      }));
    });
  });
}
