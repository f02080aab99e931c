import { createReadStream } from 'node:fs';
import { stat } from 'node:fs/promises';
import { basename } from 'node:path';
import { createInterface } from 'node:readline';
import type { ZodIssue } from 'zod';
import { ParseError, ValidationError, isNodeError } from '../errors.js';
import { Session } from '../session/session.js';
import { extractSessionId } from '../utils/paths.js';
import {
  RawLineSchema,
  RawMessageRecordSchema,
  SummaryLineSchema,
  type RawLine,
} from './schema.js';
import { messageFromRecord } from './message.js';
import type { Message, MixedSessionIdPolicy, ParseDiagnostic, ParseOptions } from './types.js';

export const DEFAULT_MIXED_SESSION_POLICY: MixedSessionIdPolicy = 'warn';

const MESSAGE_RECORD_TYPES = new Set(['user', 'assistant']);

export type ParsedLine =
  | { kind: 'message'; message: Message }
  | { kind: 'summary'; summary: string }
  | { kind: 'other'; type: string };

function describeIssue(issue: ZodIssue): { missing: boolean; field: string } {
  const field = issue.path.length > 0 ? issue.path.join('.') : '(record)';
  const missing = issue.code === 'invalid_type' && issue.received === 'undefined';
  return { missing, field };
}

/**
 * Parse one non-blank JSONL line.
 * Throws ParseError for malformed JSON or a message record that breaks the schema.
 */
export function parseLine(line: string, lineNumber: number, filePath?: string): ParsedLine {
  let parsed: unknown;
  try {
    parsed = JSON.parse(line);
  } catch (err) {
    throw new ParseError(
      'invalid_json',
      `Invalid JSON on line ${lineNumber}${filePath ? ` of ${filePath}` : ''}`,
      { filePath, lineNumber, cause: err },
    );
  }

  return parseRecord(parsed, lineNumber, filePath);
}

/**
 * Classify and validate one decoded record. Shared by the line parser and by
 * sessions restored from saved records.
 */
export function parseRecord(parsed: unknown, lineNumber: number, filePath?: string): ParsedLine {
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ParseError(
      'invalid_json',
      `Invalid JSON record on line ${lineNumber}: expected an object`,
      { filePath, lineNumber },
    );
  }

  const head = RawLineSchema.safeParse(parsed);
  if (!head.success) {
    const { missing } = describeIssue(head.error.issues[0]);
    throw new ParseError(
      missing ? 'missing_field' : 'invalid_field',
      `${missing ? 'Missing required field' : 'Invalid field'} "type" on line ${lineNumber}`,
      { filePath, lineNumber },
    );
  }

  const raw: RawLine = head.data;
  const hasMessage = typeof raw.message === 'object' && raw.message !== null;

  if (!hasMessage) {
    if (MESSAGE_RECORD_TYPES.has(raw.type)) {
      throw new ParseError(
        'missing_field',
        `Missing required field "message" on line ${lineNumber}`,
        { filePath, lineNumber },
      );
    }
    const summary = SummaryLineSchema.safeParse(raw);
    if (summary.success) return { kind: 'summary', summary: summary.data.summary };
    return { kind: 'other', type: raw.type };
  }

  const record = RawMessageRecordSchema.safeParse(raw);
  if (!record.success) {
    const { missing, field } = describeIssue(record.error.issues[0]);
    throw new ParseError(
      missing ? 'missing_field' : 'invalid_field',
      `${missing ? 'Missing required field' : 'Invalid field'} "${field}" on line ${lineNumber}`,
      { filePath, lineNumber },
    );
  }

  return { kind: 'message', message: messageFromRecord(record.data, lineNumber) };
}

async function assertReadableFile(filePath: string): Promise<void> {
  try {
    const fileStat = await stat(filePath);
    if (!fileStat.isFile()) {
      throw new ParseError('file_not_found', `Transcript file not found: ${filePath}`, { filePath });
    }
  } catch (err) {
    if (err instanceof ParseError) throw err;
    if (isNodeError(err) && (err.code === 'ENOENT' || err.code === 'ENOTDIR')) {
      throw new ParseError('file_not_found', `Transcript file not found: ${filePath}`, {
        filePath,
        cause: err,
      });
    }
    throw new ParseError('io_error', `Cannot read transcript ${filePath}`, { filePath, cause: err });
  }
}

/**
 * Parse a JSONL transcript into a Session by streaming it line by line.
 * Never loads the entire file into memory.
 */
export async function parseTranscript(
  filePath: string,
  options: ParseOptions = {},
): Promise<Session> {
  const policy = options.mixedSessionIds ?? DEFAULT_MIXED_SESSION_POLICY;
  await assertReadableFile(filePath);

  const messages: Message[] = [];
  const diagnostics: ParseDiagnostic[] = [];
  let summary: string | null = null;
  let sessionId: string | null = null;
  let lineNumber = 0;
  let contentLines = 0;

  const stream = createReadStream(filePath, { encoding: 'utf-8' });
  const rl = createInterface({ input: stream, crlfDelay: Infinity });

  try {
    for await (const line of rl) {
      lineNumber++;
      const trimmed = line.trim();
      if (!trimmed) continue;
      contentLines++;

      const parsed = parseLine(trimmed, lineNumber, filePath);
      if (parsed.kind === 'summary') {
        summary = parsed.summary;
        continue;
      }
      if (parsed.kind === 'other') continue;

      const message = parsed.message;
      if (sessionId === null) {
        sessionId = message.sessionId;
      } else if (message.sessionId !== sessionId) {
        const text = `Line ${lineNumber} belongs to session ${message.sessionId}, expected ${sessionId}`;
        if (policy === 'reject') {
          throw new ValidationError('mixed_session_ids', text, { filePath, lineNumber });
        }
        if (policy === 'warn') {
          diagnostics.push({ code: 'mixed_session_ids', lineNumber, message: text });
        }
      }
      messages.push(message);
    }
  } finally {
    rl.close();
    stream.destroy();
  }

  if (contentLines === 0) {
    throw new ParseError('empty_file', `Transcript is an empty file: ${filePath}`, { filePath });
  }

  return new Session({
    sessionId: sessionId ?? extractSessionId(basename(filePath)),
    filePath,
    messages,
    summary,
    diagnostics,
  });
}

/**
 * Rebuild a Session from records already decoded from JSON, such as the
 * ones kept in a saved conversation. Line numbers are the record positions.
 */
export function sessionFromRecords(
  records: readonly unknown[],
  init: { sessionId: string; filePath?: string | null; summary?: string | null },
): Session {
  const messages: Message[] = [];
  let summary = init.summary ?? null;
  records.forEach((record, index) => {
    const parsed = parseRecord(record, index + 1, init.filePath ?? undefined);
    if (parsed.kind === 'message') messages.push(parsed.message);
    else if (parsed.kind === 'summary') summary = parsed.summary;
  });
  return new Session({ sessionId: init.sessionId, filePath: init.filePath, messages, summary });
}

/** Shorthand for `parseTranscript` with default options. */
export function load(filePath: string): Promise<Session> {
  return parseTranscript(filePath);
}
