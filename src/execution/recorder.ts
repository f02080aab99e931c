import { appendFile, mkdir, readFile, readdir } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { isNodeError } from '../errors.js';
import { STORE_DIR_NAME } from '../store/persistence.js';
import { Transition } from './transition.js';

export const TRANSITIONS_DIR_NAME = 'transitions';

/** Directory a workspace's transition logs live in. */
export function transitionsDir(workspacePath: string): string {
  return join(workspacePath, STORE_DIR_NAME, TRANSITIONS_DIR_NAME);
}

async function readLines(filePath: string): Promise<string[]> {
  try {
    const raw = await readFile(filePath, 'utf-8');
    return raw.split('\n').filter((line) => line.trim().length > 0);
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return [];
    throw err;
  }
}

/**
 * Append-only JSONL log of one conversation's transitions, one serialized
 * transition per line. The file is never rewritten.
 */
export class TransitionRecorder {
  readonly filePath: string;

  constructor(filePath: string) {
    this.filePath = filePath;
  }

  /** Recorder for `<workspace>/.turnlog/transitions/<conversationId>.jsonl`. */
  static forConversation(workspacePath: string, conversationId: string): TransitionRecorder {
    return new TransitionRecorder(join(transitionsDir(workspacePath), `${conversationId}.jsonl`));
  }

  async record(transition: Transition): Promise<void> {
    await mkdir(dirname(this.filePath), { recursive: true });
    await appendFile(this.filePath, JSON.stringify(transition.serialize()) + '\n', 'utf-8');
  }

  /** Every recorded transition, oldest first. */
  async loadAll(): Promise<Transition[]> {
    const lines = await readLines(this.filePath);
    return lines.map((line) => Transition.deserialize(JSON.parse(line)));
  }

  /** The last `limit` transitions, oldest first. */
  async recent(limit: number): Promise<Transition[]> {
    if (limit <= 0) return [];
    const all = await this.loadAll();
    return all.slice(-Math.floor(limit));
  }

  async load(transitionId: string): Promise<Transition | null> {
    const all = await this.loadAll();
    return all.find((t) => t.id === transitionId) ?? null;
  }
}

/** Transition log files under a workspace, sorted by name. */
export async function listTransitionLogs(workspacePath: string): Promise<string[]> {
  const dir = transitionsDir(workspacePath);
  try {
    const entries = await readdir(dir);
    return entries.filter((name) => name.endsWith('.jsonl')).sort().map((name) => join(dir, name));
  } catch (err) {
    if (isNodeError(err) && err.code === 'ENOENT') return [];
    throw err;
  }
}
