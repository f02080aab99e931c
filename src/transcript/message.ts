import type { RawMessageRecord, RawUsage } from './schema.js';
import type {
  Message,
  RecordType,
  UserType,
  TextBlock,
  ThinkingBlock,
  TokenUsage,
  ToolResultBlock,
  ToolUseBlock,
} from './types.js';
import {
  contentBlockToRaw,
  isTextBlock,
  isThinkingBlock,
  isToolResultBlock,
  isToolUseBlock,
  parseContent,
} from './content-blocks.js';

function normalizeRecordType(type: string): RecordType {
  if (type === 'user' || type === 'assistant') return type;
  return 'other';
}

function normalizeUserType(userType: string | undefined): UserType | null {
  if (userType === 'external' || userType === 'internal') return userType;
  return null;
}

/** Negative amounts are not meaningful and read as absent. */
function nonNegative(value: number | undefined): number | null {
  return value !== undefined && value >= 0 ? value : null;
}

function normalizeUsage(usage: RawUsage | null | undefined): TokenUsage | null {
  if (!usage) return null;
  return {
    inputTokens: usage.input_tokens ?? 0,
    outputTokens: usage.output_tokens ?? 0,
    cacheCreationInputTokens: usage.cache_creation_input_tokens ?? 0,
    cacheReadInputTokens: usage.cache_read_input_tokens ?? 0,
  };
}

/**
 * Build a Message from a validated transcript record.
 */
export function messageFromRecord(raw: RawMessageRecord, lineNumber: number): Message {
  return {
    uuid: raw.uuid,
    parentUuid: raw.parentUuid ?? null,
    timestamp: raw.timestamp,
    role: raw.message.role,
    recordType: normalizeRecordType(raw.type),
    sessionId: raw.sessionId,
    cwd: raw.cwd ?? '',
    isSidechain: raw.isSidechain ?? false,
    isMeta: raw.isMeta ?? false,
    userType: normalizeUserType(raw.userType),
    content: parseContent(raw.message.content),
    usage: normalizeUsage(raw.message.usage),
    model: raw.message.model ?? null,
    stopReason: raw.message.stop_reason ?? null,
    costUsd: nonNegative(raw.costUSD),
    durationMs: nonNegative(raw.durationMs),
    requestId: raw.requestId ?? null,
    version: raw.version ?? null,
    lineNumber,
  };
}

/**
 * Serialize a Message back to a transcript record. Fields the model does not
 * keep are not restored.
 */
export function messageToRecord(message: Message): Record<string, unknown> {
  const record: Record<string, unknown> = {
    uuid: message.uuid,
    parentUuid: message.parentUuid,
    timestamp: message.timestamp,
    type: message.recordType === 'other' ? message.role : message.recordType,
    sessionId: message.sessionId,
    cwd: message.cwd,
    isSidechain: message.isSidechain,
    isMeta: message.isMeta,
    message: {
      role: message.role,
      content: message.content.map(contentBlockToRaw),
      ...(message.model !== null ? { model: message.model } : {}),
      ...(message.stopReason !== null ? { stop_reason: message.stopReason } : {}),
      ...(message.usage !== null ? {
        usage: {
          input_tokens: message.usage.inputTokens,
          output_tokens: message.usage.outputTokens,
          cache_creation_input_tokens: message.usage.cacheCreationInputTokens,
          cache_read_input_tokens: message.usage.cacheReadInputTokens,
        },
      } : {}),
    },
  };

  if (message.userType !== null) record.userType = message.userType;
  if (message.costUsd !== null) record.costUSD = message.costUsd;
  if (message.durationMs !== null) record.durationMs = message.durationMs;
  if (message.requestId !== null) record.requestId = message.requestId;
  if (message.version !== null) record.version = message.version;

  return record;
}

// === Queries ===

export function getTextBlocks(message: Message): TextBlock[] {
  return message.content.filter(isTextBlock);
}

/**
 * Text content of a message. Thinking, tool and unknown blocks are skipped.
 */
export function getText(message: Message): string {
  return getTextBlocks(message)
    .map((block) => block.text)
    .join('\n');
}

export function getToolUses(message: Message): ToolUseBlock[] {
  return message.content.filter(isToolUseBlock);
}

export function getToolResults(message: Message): ToolResultBlock[] {
  return message.content.filter(isToolResultBlock);
}

export function getThinking(message: Message): ThinkingBlock[] {
  return message.content.filter(isThinkingBlock);
}

export function getToolNames(message: Message): string[] {
  return getToolUses(message).map((block) => block.name);
}

export function hasToolUse(message: Message): boolean {
  return message.content.some(isToolUseBlock);
}

export function isUserMessage(message: Message): boolean {
  return message.role === 'user';
}

export function isAssistantMessage(message: Message): boolean {
  return message.role === 'assistant';
}

export function messageTime(message: Message): number {
  return Date.parse(message.timestamp);
}
