import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { SessionError, toError } from '../errors.js';
import { initStoreDir, readJson, writeJson } from '../store/persistence.js';
import {
  NO_SESSION_FILE,
  PRE_CONVERSATION_SESSION_ID,
  type EnvironmentSnapshot,
} from '../workspace/snapshot.js';
import type { Workspace } from '../workspace/workspace.js';
import { ClaudeCliClient, DEFAULT_TIMEOUT_MS, type ClaudeCliOptions } from './agent-client.js';
import { TransitionRecorder } from './recorder.js';
import { SerializedTransitionSchema, Transition } from './transition.js';
import type { AgentClient, AgentRequest } from './types.js';

export const SAVED_CONVERSATION_VERSION = 1;

export interface ConversationOptions {
  /** Defaults to a ClaudeCliClient running in the workspace. */
  agent?: AgentClient;
  /** Used to build the default agent client. */
  cli?: Omit<ClaudeCliOptions, 'cwd'>;
  model?: string | null;
  timeoutMs?: number;
  /** Append every transition to `.turnlog/transitions/<id>.jsonl`. */
  recording?: boolean;
  /** Receives recorder failures, which never undo a finished turn. */
  onWarning?: (message: string) => void;
}

export interface SendOptions {
  /** Overrides the conversation's model for this turn only. */
  model?: string | null;
  /** Continue this session instead of the conversation's last one. */
  resumeSessionId?: string;
}

const SavedConversationSchema = z.object({
  version: z.literal(SAVED_CONVERSATION_VERSION),
  id: z.string().min(1),
  workspacePath: z.string(),
  createdAt: z.string(),
  sessionIds: z.array(z.string()),
  totalCost: z.number(),
  recordingEnabled: z.boolean(),
  transitions: z.array(SerializedTransitionSchema),
});

export type SavedConversation = z.infer<typeof SavedConversationSchema>;

/**
 * A multi-turn dialogue with the agent in one workspace. Each `send` runs a
 * single turn and appends its Transition; turns never overlap.
 */
export class Conversation {
  readonly workspace: Workspace;
  private readonly agent: AgentClient;
  private readonly model: string | null;
  private readonly timeoutMs: number;
  private readonly onWarning: ((message: string) => void) | undefined;

  private _id: string;
  private _createdAt: string;
  private _transitions: Transition[] = [];
  private _sessionIds: string[] = [];
  private _totalCost = 0;
  private _recordingEnabled: boolean;
  private _recorder: TransitionRecorder | null = null;
  private busy = false;

  constructor(workspace: Workspace, options: ConversationOptions = {}) {
    this.workspace = workspace;
    this.agent = options.agent ?? new ClaudeCliClient({ ...options.cli, cwd: workspace.path });
    this.model = options.model ?? null;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.onWarning = options.onWarning;
    this._id = uuidv4();
    this._createdAt = new Date().toISOString();
    this._recordingEnabled = options.recording ?? false;
  }

  get id(): string {
    return this._id;
  }

  get createdAt(): string {
    return this._createdAt;
  }

  /** Turns in order. */
  get history(): readonly Transition[] {
    return this._transitions;
  }

  get sessionIds(): readonly string[] {
    return this._sessionIds;
  }

  get totalCost(): number {
    return this._totalCost;
  }

  get lastTransition(): Transition | null {
    return this._transitions[this._transitions.length - 1] ?? null;
  }

  get isBusy(): boolean {
    return this.busy;
  }

  get recordingEnabled(): boolean {
    return this._recordingEnabled;
  }

  get recorder(): TransitionRecorder | null {
    if (!this._recordingEnabled) return null;
    this._recorder ??= TransitionRecorder.forConversation(this.workspace.path, this._id);
    return this._recorder;
  }

  /** Sorted unique tool names across every turn. */
  toolsUsed(): string[] {
    return [...new Set(this._transitions.flatMap((t) => t.toolsUsed()))].sort();
  }

  /**
   * Run one turn. Rejects with SessionError `busy` while another turn is in
   * flight, and with ExecutionError when the agent fails; in both cases
   * nothing is appended.
   */
  async send(prompt: string, options: SendOptions = {}): Promise<Transition> {
    if (this.busy) {
      throw new SessionError('busy', 'A turn is already running in this conversation');
    }
    if (!prompt.trim()) {
      throw new SessionError('invalid_argument', 'Prompt must not be empty');
    }

    this.busy = true;
    try {
      return await this.runTurn(prompt, options);
    } finally {
      this.busy = false;
    }
  }

  private async runTurn(text: string, options: SendOptions): Promise<Transition> {
    const previousSessionId =
      options.resumeSessionId ?? this._sessionIds[this._sessionIds.length - 1] ?? null;
    const before = await this.snapshotBefore(previousSessionId);

    const request: AgentRequest = {
      text,
      resumeSessionId: previousSessionId,
      model: options.model !== undefined ? options.model : this.model,
    };
    const result = await this.agent.invoke(request, { timeoutMs: this.timeoutMs });
    const execution = { ...result, timestamp: new Date().toISOString() };

    const after = await this.workspace.snapshotWithSession(result.sessionId);

    const transition = new Transition({
      id: uuidv4(),
      before,
      after,
      prompt: request,
      execution,
      recordedAt: new Date().toISOString(),
      metadata: { conversationId: this._id },
    });

    this._transitions.push(transition);
    this._sessionIds.push(result.sessionId);
    this._totalCost += result.cost;

    await this.recordTransition(transition);
    return transition;
  }

  private async snapshotBefore(sessionId: string | null): Promise<EnvironmentSnapshot> {
    if (sessionId) return this.workspace.snapshotWithSession(sessionId);
    return {
      files: await this.workspace.snapshotFiles(),
      sessionFile: NO_SESSION_FILE,
      sessionId: PRE_CONVERSATION_SESSION_ID,
      timestamp: new Date().toISOString(),
      session: null,
    };
  }

  private async recordTransition(transition: Transition): Promise<void> {
    const recorder = this.recorder;
    if (!recorder) return;
    try {
      await initStoreDir(this.workspace.path);
      await recorder.record(transition);
    } catch (err) {
      this.onWarning?.(`Failed to record transition ${transition.id}: ${toError(err).message}`);
    }
  }

  enableRecording(): void {
    this._recordingEnabled = true;
  }

  disableRecording(): void {
    this._recordingEnabled = false;
  }

  /**
   * Forget every turn and start over under a new id. The workspace, agent
   * and recording setting are kept; the next `send` starts a fresh session.
   */
  startNew(): void {
    if (this.busy) {
      throw new SessionError('busy', 'Cannot reset while a turn is running');
    }
    this._id = uuidv4();
    this._createdAt = new Date().toISOString();
    this._transitions = [];
    this._sessionIds = [];
    this._totalCost = 0;
    this._recorder = null;
  }

  toSaved(): SavedConversation {
    return {
      version: SAVED_CONVERSATION_VERSION,
      id: this._id,
      workspacePath: this.workspace.path,
      createdAt: this._createdAt,
      sessionIds: [...this._sessionIds],
      totalCost: this._totalCost,
      recordingEnabled: this._recordingEnabled,
      transitions: this._transitions.map((t) => t.serialize()),
    };
  }

  async save(filePath: string): Promise<void> {
    await writeJson(filePath, this.toSaved());
  }

  /**
   * Read and validate a saved conversation file. Throws SessionError
   * `invalid_argument` when the file is missing or not a saved conversation.
   */
  static async readSaved(filePath: string): Promise<SavedConversation> {
    let data: unknown;
    try {
      data = await readJson(filePath);
    } catch (err) {
      if (err instanceof SyntaxError) {
        throw new SessionError('invalid_argument', `Saved conversation is not valid JSON: ${filePath}`);
      }
      throw err;
    }
    if (data === null) {
      throw new SessionError('invalid_argument', `Saved conversation not found: ${filePath}`);
    }
    const parsed = SavedConversationSchema.safeParse(data);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      throw new SessionError(
        'invalid_argument',
        `Not a saved conversation (${issue.path.join('.') || 'root'}: ${issue.message}): ${filePath}`,
      );
    }
    return parsed.data;
  }

  /** Restore a saved conversation into `workspace`. */
  static async load(
    filePath: string,
    workspace: Workspace,
    options: ConversationOptions = {},
  ): Promise<Conversation> {
    return Conversation.fromSaved(await Conversation.readSaved(filePath), workspace, options);
  }

  static fromSaved(
    saved: SavedConversation,
    workspace: Workspace,
    options: ConversationOptions = {},
  ): Conversation {
    const conversation = new Conversation(workspace, {
      ...options,
      recording: options.recording ?? saved.recordingEnabled,
    });
    conversation._id = saved.id;
    conversation._createdAt = saved.createdAt;
    conversation._transitions = saved.transitions.map((t) => Transition.deserialize(t));
    conversation._sessionIds = [...saved.sessionIds];
    conversation._totalCost = saved.totalCost;
    return conversation;
  }
}
