import { z } from 'zod';
import { getToolNames, getToolResults, messageToRecord } from '../transcript/message.js';
import { sessionFromRecords } from '../transcript/parser.js';
import type { Message } from '../transcript/types.js';
import type { Session } from '../session/session.js';
import { extractToolExecutions, type ToolExecution } from '../session/tool-executions.js';
import { diffSnapshots, type EnvironmentSnapshot, type SnapshotDiff } from '../workspace/snapshot.js';
import type { AgentRequest, ExecutionRecord } from './types.js';

export interface TransitionMetadata {
  conversationId: string | null;
}

export interface TransitionInit {
  id: string;
  before: EnvironmentSnapshot;
  after: EnvironmentSnapshot;
  prompt: AgentRequest;
  execution: ExecutionRecord;
  recordedAt: string;
  metadata: TransitionMetadata;
}

// === Serialized form ===

const SerializedSessionSchema = z.object({
  sessionId: z.string(),
  filePath: z.string().nullable(),
  summary: z.string().nullable(),
  records: z.array(z.unknown()),
});

const SerializedSnapshotSchema = z.object({
  files: z.record(z.string()),
  sessionFile: z.string().nullable(),
  sessionId: z.string().nullable(),
  timestamp: z.string(),
  session: SerializedSessionSchema.nullable(),
});

export const SerializedTransitionSchema = z.object({
  id: z.string().min(1),
  before: SerializedSnapshotSchema,
  after: SerializedSnapshotSchema,
  prompt: z.object({
    text: z.string(),
    resumeSessionId: z.string().nullable(),
    model: z.string().nullable(),
  }),
  execution: z.object({
    response: z.string(),
    sessionId: z.string(),
    cost: z.number(),
    durationMs: z.number(),
    model: z.string(),
    timestamp: z.string(),
  }),
  recordedAt: z.string(),
  metadata: z.object({ conversationId: z.string().nullable() }),
});

export type SerializedSnapshot = z.infer<typeof SerializedSnapshotSchema>;
export type SerializedTransition = z.infer<typeof SerializedTransitionSchema>;

export function serializeSnapshot(snapshot: EnvironmentSnapshot): SerializedSnapshot {
  const { session } = snapshot;
  return {
    files: { ...snapshot.files },
    sessionFile: snapshot.sessionFile,
    sessionId: snapshot.sessionId,
    timestamp: snapshot.timestamp,
    session: session
      ? {
          sessionId: session.sessionId,
          filePath: session.filePath,
          summary: session.summary,
          records: session.messages.map(messageToRecord),
        }
      : null,
  };
}

/**
 * Rebuild a snapshot. The session is restored from the saved records, not
 * from its transcript, which later turns may have extended.
 */
export function deserializeSnapshot(data: SerializedSnapshot): EnvironmentSnapshot {
  const saved = data.session;
  const session = saved
    ? sessionFromRecords(saved.records, {
        sessionId: saved.sessionId,
        filePath: saved.filePath,
        summary: saved.summary,
      })
    : null;
  return {
    files: { ...data.files },
    sessionFile: data.sessionFile,
    sessionId: data.sessionId,
    timestamp: data.timestamp,
    session,
  };
}

/**
 * One prompt/response turn: the environment before, what was asked, what
 * the agent answered and the environment after. Immutable once built.
 */
export class Transition {
  readonly id: string;
  readonly before: EnvironmentSnapshot;
  readonly after: EnvironmentSnapshot;
  readonly prompt: AgentRequest;
  readonly execution: ExecutionRecord;
  readonly recordedAt: string;
  readonly metadata: TransitionMetadata;

  constructor(init: TransitionInit) {
    this.id = init.id;
    this.before = Object.freeze({ ...init.before, files: Object.freeze({ ...init.before.files }) });
    this.after = Object.freeze({ ...init.after, files: Object.freeze({ ...init.after.files }) });
    this.prompt = Object.freeze({ ...init.prompt });
    this.execution = Object.freeze({ ...init.execution });
    this.recordedAt = init.recordedAt;
    this.metadata = Object.freeze({ ...init.metadata });
    Object.freeze(this);
  }

  get sessionAfter(): Session | null {
    return this.after.session;
  }

  /** Messages of the after-session whose uuid the before-session did not have. */
  newMessages(): Message[] {
    const after = this.after.session;
    if (!after) return [];
    const seen = new Set(this.before.session?.messages.map((m) => m.uuid) ?? []);
    return after.messages.filter((m) => !seen.has(m.uuid));
  }

  /** Sorted, unique tool names used in this turn. */
  toolsUsed(): string[] {
    const names = new Set(this.newMessages().flatMap(getToolNames));
    return [...names].sort();
  }

  hasToolErrors(): boolean {
    return this.newMessages().some((m) => getToolResults(m).some((r) => r.isError));
  }

  toolExecutions(): ToolExecution[] {
    return extractToolExecutions(this.newMessages());
  }

  fileChanges(): SnapshotDiff {
    return diffSnapshots(this.before, this.after);
  }

  filesCreated(): string[] {
    return this.fileChanges().created;
  }

  filesDeleted(): string[] {
    return this.fileChanges().deleted;
  }

  filesModified(): string[] {
    return this.fileChanges().modified;
  }

  filesChanged(): string[] {
    return this.fileChanges().all;
  }

  serialize(): SerializedTransition {
    return {
      id: this.id,
      before: serializeSnapshot(this.before),
      after: serializeSnapshot(this.after),
      prompt: { ...this.prompt },
      execution: { ...this.execution },
      recordedAt: this.recordedAt,
      metadata: { ...this.metadata },
    };
  }

  /**
   * Validate and rebuild a serialized transition. Throws a ZodError when the
   * value does not have the serialized shape, or a ParseError when a saved
   * session record breaks the transcript schema.
   */
  static deserialize(value: unknown): Transition {
    const data = SerializedTransitionSchema.parse(value);
    return new Transition({
      id: data.id,
      before: deserializeSnapshot(data.before),
      after: deserializeSnapshot(data.after),
      prompt: data.prompt,
      execution: data.execution,
      recordedAt: data.recordedAt,
      metadata: data.metadata,
    });
  }

  toJSON(): SerializedTransition {
    return this.serialize();
  }
}
