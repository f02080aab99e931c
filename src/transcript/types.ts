// === Content blocks ===

export interface TextBlock {
  type: 'text';
  text: string;
}

export interface ThinkingBlock {
  type: 'thinking';
  thinking: string;
  signature: string | null;
}

export interface ToolUseBlock {
  type: 'tool_use';
  id: string;
  name: string;
  input: Record<string, unknown>;
}

export interface ToolResultBlock {
  type: 'tool_result';
  toolUseId: string;
  /** Result text, flattened from block arrays. */
  content: string | null;
  isError: boolean;
}

/** Any block kind this package does not model, kept verbatim. */
export interface UnknownBlock {
  type: 'unknown';
  rawType: string | null;
  raw: Record<string, unknown>;
}

export type ContentBlock =
  | TextBlock
  | ThinkingBlock
  | ToolUseBlock
  | ToolResultBlock
  | UnknownBlock;

// === Messages ===

export type Role = 'user' | 'assistant';

export type RecordType = 'user' | 'assistant' | 'other';

export type UserType = 'external' | 'internal';

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
  cacheCreationInputTokens: number;
  cacheReadInputTokens: number;
}

export interface Message {
  uuid: string;
  parentUuid: string | null;
  timestamp: string;
  role: Role;
  recordType: RecordType;
  sessionId: string;
  cwd: string;
  isSidechain: boolean;
  isMeta: boolean;
  userType: UserType | null;
  content: ContentBlock[];
  usage: TokenUsage | null;
  model: string | null;
  stopReason: string | null;
  /** Present only on turns that executed. */
  costUsd: number | null;
  durationMs: number | null;
  requestId: string | null;
  version: string | null;
  lineNumber: number;
}

// === Parse options & diagnostics ===

export type MixedSessionIdPolicy = 'accept' | 'warn' | 'reject';

export interface ParseOptions {
  /** How to treat records whose sessionId differs from the first record's. */
  mixedSessionIds?: MixedSessionIdPolicy;
}

export interface ParseDiagnostic {
  code: 'mixed_session_ids';
  lineNumber: number;
  message: string;
}
