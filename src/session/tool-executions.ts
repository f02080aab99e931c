import type { Message, ToolResultBlock } from '../transcript/types.js';
import { getToolResults, getToolUses, messageTime } from '../transcript/message.js';

export type ToolExecutionStatus = 'success' | 'error' | 'pending';

export interface ToolExecution {
  toolUseId: string;
  toolName: string;
  input: Record<string, unknown>;
  /** Null while no matching tool_result exists. */
  output: string | null;
  isError: boolean | null;
  status: ToolExecutionStatus;
  durationMs: number | null;
  startedAt: string;
  completedAt: string | null;
  messageUuid: string;
  resultMessageUuid: string | null;
}

interface ResultLocation {
  index: number;
  message: Message;
  block: ToolResultBlock;
}

/**
 * Pair every tool_use in an assistant message with the nearest later
 * tool_result carrying the same id. Unmatched uses are reported as pending.
 */
export function extractToolExecutions(messages: readonly Message[]): ToolExecution[] {
  // tool_use_id → result locations in file order
  const results = new Map<string, ResultLocation[]>();
  messages.forEach((message, index) => {
    for (const block of getToolResults(message)) {
      const list = results.get(block.toolUseId);
      const location = { index, message, block };
      if (list) {
        list.push(location);
      } else {
        results.set(block.toolUseId, [location]);
      }
    }
  });

  const executions: ToolExecution[] = [];

  messages.forEach((message, index) => {
    if (message.role !== 'assistant') return;

    for (const use of getToolUses(message)) {
      const match = results.get(use.id)?.find((loc) => loc.index > index) ?? null;

      if (!match) {
        executions.push({
          toolUseId: use.id,
          toolName: use.name,
          input: use.input,
          output: null,
          isError: null,
          status: 'pending',
          durationMs: null,
          startedAt: message.timestamp,
          completedAt: null,
          messageUuid: message.uuid,
          resultMessageUuid: null,
        });
        continue;
      }

      const elapsed = messageTime(match.message) - messageTime(message);
      executions.push({
        toolUseId: use.id,
        toolName: use.name,
        input: use.input,
        output: match.block.content,
        isError: match.block.isError,
        status: match.block.isError ? 'error' : 'success',
        durationMs: Number.isNaN(elapsed) ? null : Math.max(0, elapsed),
        startedAt: message.timestamp,
        completedAt: match.message.timestamp,
        messageUuid: message.uuid,
        resultMessageUuid: match.message.uuid,
      });
    }
  });

  return executions;
}

/**
 * Count executions per tool name.
 */
export function summarizeToolExecutions(
  executions: readonly ToolExecution[],
): Record<string, { calls: number; errors: number; pending: number }> {
  const summary: Record<string, { calls: number; errors: number; pending: number }> = {};
  for (const exec of executions) {
    const entry = summary[exec.toolName] ?? { calls: 0, errors: 0, pending: 0 };
    entry.calls++;
    if (exec.status === 'error') entry.errors++;
    if (exec.status === 'pending') entry.pending++;
    summary[exec.toolName] = entry;
  }
  return summary;
}
