import { describe, it, expect } from 'vitest';
import { sessionFromRecords } from '../../transcript/parser.js';
import { Session } from '../../session/session.js';
import { Project } from '../project.js';
import { assistantRecord, userRecord } from '../../__tests__/helpers.js';

/** A two-message session starting at `start`, costing `cost`, lasting `seconds`. */
function makeSession(sessionId: string, start: string, cost: number, seconds: number): Session {
  const startMs = Date.parse(start);
  return sessionFromRecords(
    [
      userRecord({ uuid: `${sessionId}-u`, sessionId, timestamp: new Date(startMs).toISOString(), content: 'go' }),
      assistantRecord({
        uuid: `${sessionId}-a`,
        parentUuid: `${sessionId}-u`,
        sessionId,
        timestamp: new Date(startMs + seconds * 1000).toISOString(),
        costUSD: cost,
        content: [{ type: 'tool_use', id: `${sessionId}-t`, name: 'Edit', input: {} }],
      }),
    ],
    { sessionId },
  );
}

const late = makeSession('late', '2025-03-03T09:00:00Z', 0.5, 60);
const early = makeSession('early', '2025-03-01T09:00:00Z', 0.1, 30);
const middle = makeSession('middle', '2025-03-01T23:30:00Z', 0.3, 10);
const empty = new Session({ sessionId: 'empty', messages: [] });

const project = new Project({ path: '/data/projects/-home-dev-shop', sessions: [late, empty, early, middle] });

describe('Project', () => {
  it('orders sessions by start time with empty sessions last', () => {
    expect(project.sessions.map((s) => s.sessionId)).toEqual(['early', 'middle', 'late', 'empty']);
  });

  it('takes its name from the final path segment', () => {
    expect(project.name).toBe('-home-dev-shop');
    expect(new Project({ path: '/x/y/', sessions: [] }).name).toBe('y');
  });

  it('sums session totals', () => {
    const sessions = [late, early, middle, empty];
    expect(project.totalSessions).toBe(4);
    expect(project.totalMessages).toBe(6);
    expect(project.totalCost).toBeCloseTo(sessions.reduce((sum, s) => sum + s.totalCost, 0), 10);
    expect(project.totalDuration).toBe(sessions.reduce((sum, s) => sum + s.duration, 0));
    expect(project.totalDuration).toBe(100_000);
    expect(project.toolUsageSummary).toEqual({ Edit: 3 });
  });

  it('returns the most expensive sessions first, capped at the session count', () => {
    expect(project.getMostExpensiveSessions(2).map((s) => s.sessionId)).toEqual(['late', 'middle']);
    expect(project.getMostExpensiveSessions(10)).toHaveLength(4);
    expect(project.getMostExpensiveSessions(0)).toEqual([]);
  });

  it('selects sessions by an inclusive start-time range', () => {
    const range = project.getSessionsByDateRange(
      new Date('2025-03-01T09:00:00Z'),
      new Date('2025-03-01T23:30:00Z'),
    );
    expect(range.map((s) => s.sessionId)).toEqual(['early', 'middle']);
  });

  it('groups cost by UTC start date', () => {
    const daily = project.calculateDailyCosts();
    expect(Object.keys(daily)).toEqual(['2025-03-01', '2025-03-03']);
    expect(daily['2025-03-01']).toBeCloseTo(0.4, 10);
    expect(daily['2025-03-03']).toBeCloseTo(0.5, 10);
  });

  it('supports lookup, filtering and sequence access', () => {
    expect(project.getSession('middle')).toBe(middle);
    expect(project.getSession('nope')).toBeUndefined();
    expect(project.filterSessions((s) => s.totalCost > 0.2).map((s) => s.sessionId)).toEqual(['middle', 'late']);
    expect(project.at(-1)?.sessionId).toBe('empty');
    expect(project.slice(1, 3).map((s) => s.sessionId)).toEqual(['middle', 'late']);
    expect([...project]).toHaveLength(project.length);
  });

  it('concatenates all messages in session order', () => {
    expect(project.getAllMessages().map((m) => m.uuid)).toEqual([
      'early-u',
      'early-a',
      'middle-u',
      'middle-a',
      'late-u',
      'late-a',
    ]);
  });
});
