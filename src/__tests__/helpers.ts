import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

// ---------------------------------------------------------------------------
// Temp directories
// ---------------------------------------------------------------------------

const tempDirs: string[] = [];

export async function makeTempDir(prefix = 'turnlog-test-'): Promise<string> {
  const dir = await mkdtemp(join(tmpdir(), prefix));
  tempDirs.push(dir);
  return dir;
}

export async function cleanupTempDirs(): Promise<void> {
  const dirs = tempDirs.splice(0);
  await Promise.all(dirs.map((dir) => rm(dir, { recursive: true, force: true })));
}

export async function writeText(filePath: string, content: string): Promise<string> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf-8');
  return filePath;
}

// ---------------------------------------------------------------------------
// Transcript records
// ---------------------------------------------------------------------------

export const SESSION_ID = 'sess-0001';
export const CWD = '/home/dev/shop';

export interface RecordFields {
  uuid: string;
  parentUuid?: string | null;
  timestamp: string;
  sessionId?: string;
  content: unknown;
  isSidechain?: boolean;
  costUSD?: number;
  durationMs?: number;
  model?: string;
  extra?: Record<string, unknown>;
}

export function userRecord(fields: RecordFields): Record<string, unknown> {
  return {
    type: 'user',
    uuid: fields.uuid,
    parentUuid: fields.parentUuid ?? null,
    timestamp: fields.timestamp,
    sessionId: fields.sessionId ?? SESSION_ID,
    cwd: CWD,
    isSidechain: fields.isSidechain ?? false,
    userType: 'external',
    message: { role: 'user', content: fields.content },
    ...(fields.costUSD !== undefined ? { costUSD: fields.costUSD } : {}),
    ...(fields.durationMs !== undefined ? { durationMs: fields.durationMs } : {}),
    ...fields.extra,
  };
}

export function assistantRecord(fields: RecordFields): Record<string, unknown> {
  return {
    type: 'assistant',
    uuid: fields.uuid,
    parentUuid: fields.parentUuid ?? null,
    timestamp: fields.timestamp,
    sessionId: fields.sessionId ?? SESSION_ID,
    cwd: CWD,
    isSidechain: fields.isSidechain ?? false,
    userType: 'external',
    message: {
      role: 'assistant',
      content: fields.content,
      model: fields.model ?? 'test-model',
      usage: { input_tokens: 10, output_tokens: 5 },
    },
    ...(fields.costUSD !== undefined ? { costUSD: fields.costUSD } : {}),
    ...(fields.durationMs !== undefined ? { durationMs: fields.durationMs } : {}),
    ...fields.extra,
  };
}

export function toJsonl(records: readonly unknown[]): string {
  return records.map((r) => JSON.stringify(r)).join('\n') + '\n';
}

/**
 * Four messages, 15 seconds from first to last, two priced assistant turns
 * and one Read tool call with its result.
 */
export function sampleRecords(sessionId = SESSION_ID): Record<string, unknown>[] {
  return [
    userRecord({
      uuid: 'u1',
      timestamp: '2025-03-01T10:00:00.000Z',
      sessionId,
      content: 'Add a checkout page',
    }),
    assistantRecord({
      uuid: 'a1',
      parentUuid: 'u1',
      timestamp: '2025-03-01T10:00:05.000Z',
      sessionId,
      costUSD: 0.025,
      durationMs: 5000,
      content: [
        { type: 'text', text: 'Reading the router first.' },
        { type: 'tool_use', id: 'toolu_1', name: 'Read', input: { file_path: 'src/router.ts' } },
      ],
    }),
    userRecord({
      uuid: 'u2',
      parentUuid: 'a1',
      timestamp: '2025-03-01T10:00:08.000Z',
      sessionId,
      content: [{ type: 'tool_result', tool_use_id: 'toolu_1', content: 'export const routes = [];' }],
    }),
    assistantRecord({
      uuid: 'a2',
      parentUuid: 'u2',
      timestamp: '2025-03-01T10:00:15.000Z',
      sessionId,
      costUSD: 0.015,
      durationMs: 3000,
      content: [{ type: 'text', text: 'Done.' }],
    }),
  ];
}
