import type { Checkpoint, CheckpointMessage } from '../../domain/entities/Checkpoint.js';

/**
 * 將 checkpoint 輸出為人類可讀的 Markdown 報告（只供匯出，不可匯入）
 */
export function renderMarkdownReport(checkpoint: Checkpoint): string {
  const { session, statistics, context } = checkpoint;
  const lines: string[] = [];

  lines.push(`# Chat Session: ${session.name}`, '');
  lines.push(`**Exported:** ${checkpoint.exported_at}`);
  if (checkpoint.exported_by) lines.push(`**Exported By:** ${checkpoint.exported_by}`);
  lines.push(`**Provider:** ${session.provider}`);
  lines.push(`**Model:** ${session.model}`);
  if (session.agent) lines.push(`**Agent:** ${session.agent}`);
  if (session.project_path) lines.push(`**Project:** \`${session.project_path}\``);
  lines.push(`**Created:** ${session.created_at}`);
  lines.push(`**Updated:** ${session.updated_at}`);
  lines.push('');

  lines.push('## Statistics', '');
  lines.push(`- Total Messages: ${statistics.message_count}`);
  lines.push(`- User Messages: ${statistics.user_messages}`);
  lines.push(`- Assistant Messages: ${statistics.assistant_messages}`);
  if (statistics.total_tokens) lines.push(`- Total Tokens: ${statistics.total_tokens}`);
  if (statistics.tool_calls) lines.push(`- Tool Calls: ${statistics.tool_calls}`);
  lines.push('');

  if (context) {
    lines.push('## Context', '');
    if (context.working_directory) {
      lines.push(`**Working Directory:** \`${context.working_directory}\``, '');
    }
    if (context.project_memory) {
      lines.push('### Project Memory', '', context.project_memory.trim(), '');
    }
    if (context.files_accessed && context.files_accessed.length > 0) {
      lines.push('### Files Accessed', '');
      for (const file of context.files_accessed) lines.push(`- \`${file}\``);
      lines.push('');
    }
  }

  lines.push('## Conversation', '');
  checkpoint.messages.forEach((msg, i) => {
    lines.push(...renderMessage(msg, i + 1));
  });

  return lines.join('\n');
}

function renderMessage(msg: CheckpointMessage, position: number): string[] {
  const label = msg.archived ? `${msg.role.toUpperCase()} (COMPACTED)` : msg.role.toUpperCase();
  return [
    `### ${position}. ${label}`,
    '',
    `*${msg.created_at}*`,
    '',
    msg.content,
    '',
    '---',
    '',
  ];
}
