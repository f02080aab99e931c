import type { Message, ParseDiagnostic, Role, TokenUsage } from '../transcript/types.js';
import { getText, getToolNames, getToolUses, messageTime } from '../transcript/message.js';
import { resolveIndex, sliceRange } from '../utils/sequence.js';
import { buildConversationTree, type ConversationTree } from './conversation-tree.js';
import { extractToolExecutions, type ToolExecution } from './tool-executions.js';

export interface SessionInit {
  sessionId: string;
  messages: readonly Message[];
  filePath?: string | null;
  summary?: string | null;
  diagnostics?: readonly ParseDiagnostic[];
}

export interface SessionMetrics {
  totalMessages: number;
  userMessages: number;
  assistantMessages: number;
  totalCost: number;
  averageMessageCost: number;
  uniqueToolsUsed: number;
  totalToolCalls: number;
  totalInputTokens: number;
  totalOutputTokens: number;
  totalTokens: number;
  conversationDepth: number;
  conversationBranches: number;
  sidechainMessages: number;
  durationMs: number;
  totalTurnDurationMs: number;
  messagesPerMinute: number;
}

const ROLE_LABELS: Record<Role, string> = {
  user: 'User',
  assistant: 'Assistant',
};

function lastSegment(path: string): string {
  const parts = path.split(/[\\/]+/).filter(Boolean);
  return parts[parts.length - 1] ?? '';
}

/**
 * One parsed transcript. Messages are kept in file order, which is also the
 * order used for history and for start/end time, even where the dialogue
 * branches. Every aggregate is computed on demand.
 */
export class Session implements Iterable<Message> {
  readonly sessionId: string;
  readonly filePath: string | null;
  readonly messages: readonly Message[];
  readonly summary: string | null;
  readonly diagnostics: readonly ParseDiagnostic[];

  constructor(init: SessionInit) {
    this.sessionId = init.sessionId;
    this.filePath = init.filePath ?? null;
    this.messages = Object.freeze([...init.messages]);
    this.summary = init.summary ?? null;
    this.diagnostics = Object.freeze([...(init.diagnostics ?? [])]);
    Object.freeze(this);
  }

  // === Sequence access ===

  get length(): number {
    return this.messages.length;
  }

  /** Message at `index`; negative indices count from the end. */
  at(index: number): Message | undefined {
    const resolved = resolveIndex(index, this.messages.length);
    return resolved === null ? undefined : this.messages[resolved];
  }

  slice(start?: number, end?: number): Message[] {
    return sliceRange(this.messages, start, end);
  }

  [Symbol.iterator](): Iterator<Message> {
    return this.messages[Symbol.iterator]();
  }

  // === Aggregates ===

  get totalMessages(): number {
    return this.messages.length;
  }

  get userMessages(): number {
    return this.messages.filter((m) => m.role === 'user').length;
  }

  get assistantMessages(): number {
    return this.messages.filter((m) => m.role === 'assistant').length;
  }

  /** Sum of per-message costUsd. Messages without a cost count as zero. */
  get totalCost(): number {
    return this.messages.reduce((sum, m) => sum + (m.costUsd ?? 0), 0);
  }

  /** Sum of per-turn durationMs. Independent of `duration`. */
  get totalTurnDurationMs(): number {
    return this.messages.reduce((sum, m) => sum + (m.durationMs ?? 0), 0);
  }

  get startTime(): Date | null {
    const first = this.messages[0];
    return first ? new Date(first.timestamp) : null;
  }

  get endTime(): Date | null {
    const last = this.messages[this.messages.length - 1];
    return last ? new Date(last.timestamp) : null;
  }

  /** Wall-clock span in ms between the first and last message in file order. */
  get duration(): number {
    const first = this.messages[0];
    const last = this.messages[this.messages.length - 1];
    if (!first || !last) return 0;
    const span = messageTime(last) - messageTime(first);
    return Number.isNaN(span) ? 0 : span;
  }

  /** Tool name → number of tool_use blocks. */
  get toolUsageSummary(): Record<string, number> {
    const summary: Record<string, number> = {};
    for (const msg of this.messages) {
      for (const name of getToolNames(msg)) {
        summary[name] = (summary[name] ?? 0) + 1;
      }
    }
    return summary;
  }

  get toolsUsed(): string[] {
    return Object.keys(this.toolUsageSummary).sort();
  }

  get totalToolCalls(): number {
    return this.messages.reduce((sum, m) => sum + getToolUses(m).length, 0);
  }

  get conversationTree(): ConversationTree {
    return buildConversationTree(this.messages);
  }

  get toolExecutions(): ToolExecution[] {
    return extractToolExecutions(this.messages);
  }

  get costByTurn(): number[] {
    return this.messages.map((m) => m.costUsd ?? 0);
  }

  get tokenUsage(): TokenUsage {
    const totals: TokenUsage = {
      inputTokens: 0,
      outputTokens: 0,
      cacheCreationInputTokens: 0,
      cacheReadInputTokens: 0,
    };
    for (const msg of this.messages) {
      if (!msg.usage) continue;
      totals.inputTokens += msg.usage.inputTokens;
      totals.outputTokens += msg.usage.outputTokens;
      totals.cacheCreationInputTokens += msg.usage.cacheCreationInputTokens;
      totals.cacheReadInputTokens += msg.usage.cacheReadInputTokens;
    }
    return totals;
  }

  /** Working directory of the first message, or null for an empty session. */
  get projectPath(): string | null {
    const first = this.messages[0];
    return first && first.cwd ? first.cwd : null;
  }

  get projectName(): string | null {
    const path = this.projectPath;
    return path ? lastSegment(path) || null : null;
  }

  get rootMessages(): Message[] {
    return this.messages.filter((m) => m.parentUuid === null);
  }

  // === Queries ===

  /** Unknown roles yield an empty list. */
  getMessagesByRole(role: string): Message[] {
    return this.messages.filter((m) => m.role === role);
  }

  filterMessages(predicate: (message: Message, index: number) => boolean): Message[] {
    return this.messages.filter((m, i) => predicate(m, i));
  }

  getMessagesByTool(toolName: string): Message[] {
    return this.messages.filter((m) => getToolNames(m).includes(toolName));
  }

  getMessageByUuid(uuid: string): Message | undefined {
    return this.messages.find((m) => m.uuid === uuid);
  }

  /** Messages outside sidechains. */
  getMainChain(): Message[] {
    return this.messages.filter((m) => !m.isSidechain);
  }

  /**
   * Messages from the root down to `uuid`, following parentUuid links.
   */
  getThread(uuid: string): Message[] {
    const byUuid = new Map(this.messages.map((m) => [m.uuid, m]));
    const path: Message[] = [];
    const seen = new Set<string>();
    let current = byUuid.get(uuid);

    while (current && !seen.has(current.uuid)) {
      seen.add(current.uuid);
      path.push(current);
      current = current.parentUuid === null ? undefined : byUuid.get(current.parentUuid);
    }

    return path.reverse();
  }

  /** One thread per leaf message, in file order of the leaves. */
  getAllThreads(): Message[][] {
    const parents = new Set(
      this.messages
        .map((m) => m.parentUuid)
        .filter((p): p is string => p !== null),
    );
    return this.messages
      .filter((m) => !parents.has(m.uuid))
      .map((leaf) => this.getThread(leaf.uuid));
  }

  /**
   * Readable transcript: one `Role: text` line per message with text content.
   */
  getConversationHistory(): string {
    return this.messages
      .map((m) => ({ role: m.role, text: getText(m) }))
      .filter((entry) => entry.text.length > 0)
      .map((entry) => `${ROLE_LABELS[entry.role]}: ${entry.text}`)
      .join('\n');
  }

  calculateMetrics(): SessionMetrics {
    const tree = this.conversationTree;
    const usage = this.tokenUsage;
    const total = this.messages.length;
    const durationMs = this.duration;
    const totalCost = this.totalCost;

    return {
      totalMessages: total,
      userMessages: this.userMessages,
      assistantMessages: this.assistantMessages,
      totalCost,
      averageMessageCost: total === 0 ? 0 : totalCost / total,
      uniqueToolsUsed: this.toolsUsed.length,
      totalToolCalls: this.totalToolCalls,
      totalInputTokens: usage.inputTokens,
      totalOutputTokens: usage.outputTokens,
      totalTokens: usage.inputTokens + usage.outputTokens,
      conversationDepth: tree.stats.maxDepth,
      conversationBranches: tree.stats.numBranches,
      sidechainMessages: this.messages.filter((m) => m.isSidechain).length,
      durationMs,
      totalTurnDurationMs: this.totalTurnDurationMs,
      messagesPerMinute: durationMs > 0 ? (total * 60_000) / durationMs : 0,
    };
  }

  toJSON(): Record<string, unknown> {
    return {
      sessionId: this.sessionId,
      filePath: this.filePath,
      summary: this.summary,
      totalMessages: this.totalMessages,
      userMessages: this.userMessages,
      assistantMessages: this.assistantMessages,
      totalCost: this.totalCost,
      durationMs: this.duration,
      startTime: this.startTime?.toISOString() ?? null,
      endTime: this.endTime?.toISOString() ?? null,
      toolUsageSummary: this.toolUsageSummary,
    };
  }
}
