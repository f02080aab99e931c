export {
  TurnlogError,
  ParseError,
  ValidationError,
  SessionError,
  ExecutionError,
  WorkspaceError,
} from './errors.js';
export type {
  ParseErrorCode,
  ValidationErrorCode,
  SessionErrorCode,
  ExecutionErrorCode,
  WorkspaceErrorCode,
} from './errors.js';

export type {
  ContentBlock,
  TextBlock,
  ThinkingBlock,
  ToolUseBlock,
  ToolResultBlock,
  UnknownBlock,
  Message,
  Role,
  RecordType,
  UserType,
  TokenUsage,
  MixedSessionIdPolicy,
  ParseOptions,
  ParseDiagnostic,
} from './transcript/types.js';
export {
  isTextBlock,
  isThinkingBlock,
  isToolUseBlock,
  isToolResultBlock,
} from './transcript/content-blocks.js';
export {
  getText,
  getTextBlocks,
  getThinking,
  getToolNames,
  getToolResults,
  getToolUses,
  hasToolUse,
  isAssistantMessage,
  isUserMessage,
} from './transcript/message.js';
export {
  DEFAULT_MIXED_SESSION_POLICY,
  load,
  parseTranscript,
  sessionFromRecords,
} from './transcript/parser.js';

export { Session } from './session/session.js';
export type { SessionMetrics } from './session/session.js';
export type { ConversationNode, ConversationStats, ConversationTree } from './session/conversation-tree.js';
export type { ToolExecution, ToolExecutionStatus } from './session/tool-executions.js';
export { extractToolExecutions, summarizeToolExecutions } from './session/tool-executions.js';

export { Project } from './project/project.js';
export type { SkippedTranscript } from './project/project.js';
export { loadProject, loadProjects, resolveProjectDir } from './project/loader.js';
export type { LoadProjectOptions } from './project/loader.js';

export { findProjects, findProjectTranscripts, findSessions } from './discovery/discovery.js';
export {
  decodeProjectPath,
  encodeProjectPath,
  getAgentConfigDir,
  getProjectsDir,
  resolveProjectsDir,
  sessionFilePath,
} from './utils/paths.js';

export {
  DEFAULT_IGNORED_DIRS,
  DEFAULT_TRACKED_PATTERNS,
  NO_SESSION_FILE,
  PRE_CONVERSATION_SESSION_ID,
  captureFiles,
  diffSnapshots,
} from './workspace/snapshot.js';
export type { EnvironmentSnapshot, SnapshotDiff } from './workspace/snapshot.js';
export { Workspace } from './workspace/workspace.js';
export type { WorkspaceOptions } from './workspace/workspace.js';

export type { AgentClient, AgentRequest, AgentResult, InvokeOptions } from './execution/types.js';
export {
  ClaudeCliClient,
  DEFAULT_ALLOWED_TOOLS,
  DEFAULT_TIMEOUT_MS,
  parseAgentOutput,
} from './execution/agent-client.js';
export type { ClaudeCliOptions } from './execution/agent-client.js';
export { Transition } from './execution/transition.js';
export type { SerializedTransition } from './execution/transition.js';
export { TransitionRecorder, listTransitionLogs } from './execution/recorder.js';
export { Conversation } from './execution/conversation.js';
export type { ConversationOptions, SavedConversation, SendOptions } from './execution/conversation.js';
export { DEFAULT_CONCURRENCY } from './pipeline/concurrency.js';
