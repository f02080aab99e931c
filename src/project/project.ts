import type { Message } from '../transcript/types.js';
import type { Session } from '../session/session.js';
import { resolveIndex, sliceRange } from '../utils/sequence.js';
import { extractProjectName } from '../utils/paths.js';

export interface SkippedTranscript {
  filePath: string;
  error: Error;
}

export interface ProjectInit {
  path: string;
  sessions: readonly Session[];
  name?: string;
  skipped?: readonly SkippedTranscript[];
}

/**
 * Ascending by start time. Sessions without messages sort last; ties keep a
 * stable order by session id.
 */
export function compareByStartTime(a: Session, b: Session): number {
  const aTime = a.startTime?.getTime() ?? Number.POSITIVE_INFINITY;
  const bTime = b.startTime?.getTime() ?? Number.POSITIVE_INFINITY;
  if (aTime !== bTime) return aTime < bTime ? -1 : 1;
  return a.sessionId.localeCompare(b.sessionId);
}

/** UTC calendar date, `YYYY-MM-DD`. */
function calendarDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/**
 * All sessions found under one directory, in chronological order.
 * Cross-session totals are plain sums of the per-session values.
 */
export class Project implements Iterable<Session> {
  readonly path: string;
  readonly name: string;
  readonly sessions: readonly Session[];
  readonly skipped: readonly SkippedTranscript[];

  constructor(init: ProjectInit) {
    this.path = init.path;
    this.name = init.name ?? extractProjectName(init.path);
    this.sessions = Object.freeze([...init.sessions].sort(compareByStartTime));
    this.skipped = Object.freeze([...(init.skipped ?? [])]);
    Object.freeze(this);
  }

  // === Sequence access ===

  get length(): number {
    return this.sessions.length;
  }

  at(index: number): Session | undefined {
    const resolved = resolveIndex(index, this.sessions.length);
    return resolved === null ? undefined : this.sessions[resolved];
  }

  slice(start?: number, end?: number): Session[] {
    return sliceRange(this.sessions, start, end);
  }

  [Symbol.iterator](): Iterator<Session> {
    return this.sessions[Symbol.iterator]();
  }

  // === Aggregates ===

  get totalSessions(): number {
    return this.sessions.length;
  }

  get totalMessages(): number {
    return this.sessions.reduce((sum, s) => sum + s.totalMessages, 0);
  }

  get totalCost(): number {
    return this.sessions.reduce((sum, s) => sum + s.totalCost, 0);
  }

  /** Sum of each session's wall-clock duration, in ms. */
  get totalDuration(): number {
    return this.sessions.reduce((sum, s) => sum + s.duration, 0);
  }

  get toolUsageSummary(): Record<string, number> {
    const merged: Record<string, number> = {};
    for (const session of this.sessions) {
      for (const [tool, count] of Object.entries(session.toolUsageSummary)) {
        merged[tool] = (merged[tool] ?? 0) + count;
      }
    }
    return merged;
  }

  // === Queries ===

  filterSessions(predicate: (session: Session, index: number) => boolean): Session[] {
    return this.sessions.filter((s, i) => predicate(s, i));
  }

  /** Sessions whose start time lies in [start, end]. */
  getSessionsByDateRange(start: Date, end: Date): Session[] {
    const from = start.getTime();
    const to = end.getTime();
    return this.sessions.filter((s) => {
      const t = s.startTime?.getTime();
      return t !== undefined && t >= from && t <= to;
    });
  }

  /** At most `n` sessions, most expensive first. */
  getMostExpensiveSessions(n: number): Session[] {
    if (n <= 0) return [];
    return [...this.sessions]
      .sort((a, b) => b.totalCost - a.totalCost)
      .slice(0, Math.floor(n));
  }

  getSession(sessionId: string): Session | undefined {
    return this.sessions.find((s) => s.sessionId === sessionId);
  }

  getAllMessages(): Message[] {
    return this.sessions.flatMap((s) => [...s.messages]);
  }

  /** Total cost per start date (UTC), keys in ascending date order. */
  calculateDailyCosts(): Record<string, number> {
    const daily = new Map<string, number>();
    for (const session of this.sessions) {
      const start = session.startTime;
      if (!start) continue;
      const day = calendarDate(start);
      daily.set(day, (daily.get(day) ?? 0) + session.totalCost);
    }
    return Object.fromEntries([...daily.entries()].sort(([a], [b]) => a.localeCompare(b)));
  }

  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      path: this.path,
      totalSessions: this.totalSessions,
      totalMessages: this.totalMessages,
      totalCost: this.totalCost,
      totalDurationMs: this.totalDuration,
      toolUsageSummary: this.toolUsageSummary,
      sessions: this.sessions.map((s) => s.toJSON()),
      skipped: this.skipped.map((s) => ({ filePath: s.filePath, error: s.error.message })),
    };
  }
}
