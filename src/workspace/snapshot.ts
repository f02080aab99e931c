import { createHash } from 'node:crypto';
import type { Dirent } from 'node:fs';
import { readFile, readdir } from 'node:fs/promises';
import { join, relative, sep } from 'node:path';
import { minimatch } from 'minimatch';
import type { Session } from '../session/session.js';

export const DEFAULT_TRACKED_PATTERNS: readonly string[] = [
  '**/*.{py,rs,js,ts,jsx,tsx,json,toml,yaml,yml,md}',
  '**/Dockerfile',
  '**/.gitignore',
];

export const DEFAULT_IGNORED_DIRS: readonly string[] = [
  '.git',
  'node_modules',
  '.turnlog',
  'dist',
  'build',
  'coverage',
  '.venv',
  '__pycache__',
  'target',
];

/** Session id recorded in the before-snapshot of a conversation's first turn. */
export const PRE_CONVERSATION_SESSION_ID = 'PRE_CONVERSATION';
/** Session file marker for a snapshot taken before any session existed. */
export const NO_SESSION_FILE = 'NO_SESSION_FILE';

/**
 * The tracked files of a workspace at one instant, plus the agent session
 * that produced that state when one is known.
 */
export interface EnvironmentSnapshot {
  /** Workspace-relative path (always `/`-separated) → UTF-8 content or `sha256:<hex>`. */
  files: Record<string, string>;
  sessionFile: string | null;
  sessionId: string | null;
  timestamp: string;
  session: Session | null;
}

export interface SnapshotDiff {
  created: string[];
  deleted: string[];
  modified: string[];
  /** De-duplicated union of the three lists. */
  all: string[];
}

export interface CaptureOptions {
  patterns?: readonly string[];
  ignoredDirs?: readonly string[];
}

const utf8 = new TextDecoder('utf-8', { fatal: true });

/** File content as text, or a content hash when it is not valid UTF-8. */
export function encodeFileContent(bytes: Uint8Array): string {
  try {
    return utf8.decode(bytes);
  } catch {
    return `sha256:${createHash('sha256').update(bytes).digest('hex')}`;
  }
}

function toPosix(path: string): string {
  return sep === '/' ? path : path.split(sep).join('/');
}

export function matchesTrackedPattern(relativePath: string, patterns: readonly string[]): boolean {
  return patterns.some((pattern) => minimatch(relativePath, pattern, { dot: true }));
}

async function walk(
  root: string,
  dir: string,
  patterns: readonly string[],
  ignored: ReadonlySet<string>,
  out: Record<string, string>,
): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch {
    return;
  }

  for (const entry of entries) {
    const entryPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      if (ignored.has(entry.name)) continue;
      await walk(root, entryPath, patterns, ignored, out);
      continue;
    }
    if (!entry.isFile()) continue;

    const rel = toPosix(relative(root, entryPath));
    if (!matchesTrackedPattern(rel, patterns)) continue;
    try {
      out[rel] = encodeFileContent(await readFile(entryPath));
    } catch {
      // Vanished or unreadable between listing and reading: not part of the state.
      continue;
    }
  }
}

/**
 * Read every tracked file under `root`. Keys come back in sorted order.
 */
export async function captureFiles(
  root: string,
  options: CaptureOptions = {},
): Promise<Record<string, string>> {
  const patterns = options.patterns ?? DEFAULT_TRACKED_PATTERNS;
  const ignored = new Set(options.ignoredDirs ?? DEFAULT_IGNORED_DIRS);
  const found: Record<string, string> = {};
  await walk(root, root, patterns, ignored, found);

  const sorted: Record<string, string> = {};
  for (const key of Object.keys(found).sort()) sorted[key] = found[key];
  return sorted;
}

/**
 * Compare the tracked files of two snapshots. A path present in both with
 * different content is modified; identical content is not reported.
 */
export function diffSnapshots(
  before: Pick<EnvironmentSnapshot, 'files'>,
  after: Pick<EnvironmentSnapshot, 'files'>,
): SnapshotDiff {
  const created: string[] = [];
  const deleted: string[] = [];
  const modified: string[] = [];

  for (const [path, content] of Object.entries(after.files)) {
    if (!Object.hasOwn(before.files, path)) created.push(path);
    else if (before.files[path] !== content) modified.push(path);
  }
  for (const path of Object.keys(before.files)) {
    if (!Object.hasOwn(after.files, path)) deleted.push(path);
  }

  created.sort();
  deleted.sort();
  modified.sort();
  const all = [...new Set([...created, ...deleted, ...modified])].sort();
  return { created, deleted, modified, all };
}
