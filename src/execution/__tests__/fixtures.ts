import { sessionFromRecords } from '../../transcript/parser.js';
import { Transition } from '../transition.js';
import type { EnvironmentSnapshot } from '../../workspace/snapshot.js';
import { sampleRecords } from '../../__tests__/helpers.js';

export function snapshotOf(
  files: Record<string, string>,
  sessionId: string | null,
  recordCount: number,
): EnvironmentSnapshot {
  const session =
    sessionId !== null && recordCount > 0
      ? sessionFromRecords(sampleRecords(sessionId).slice(0, recordCount), {
          sessionId,
          filePath: `/projects/-home-dev-shop/${sessionId}.jsonl`,
        })
      : null;
  return {
    files,
    sessionFile: sessionId === null ? null : `/projects/-home-dev-shop/${sessionId}.jsonl`,
    sessionId,
    timestamp: '2025-03-01T10:00:00.000Z',
    session,
  };
}

/**
 * A turn that continued a session holding one message and left it with
 * four, creating `b.ts`, deleting `c.ts` and changing `a.ts`.
 */
export function sampleTransition(id = 't-1', conversationId: string | null = 'conv-1'): Transition {
  return new Transition({
    id,
    before: snapshotOf({ 'a.ts': 'one', 'c.ts': 'gone soon' }, 'sess-1', 1),
    after: snapshotOf({ 'a.ts': 'two', 'b.ts': 'new' }, 'sess-1', 4),
    prompt: { text: 'Add a checkout page', resumeSessionId: 'sess-1', model: null },
    execution: {
      response: 'Done.',
      sessionId: 'sess-1',
      cost: 0.04,
      durationMs: 15000,
      model: 'test-model',
      timestamp: '2025-03-01T10:00:16.000Z',
    },
    recordedAt: '2025-03-01T10:00:17.000Z',
    metadata: { conversationId },
  });
}
