import type { Dirent } from 'node:fs';
import { readdir, stat } from 'node:fs/promises';
import { dirname, join } from 'node:path';
import { ParseError, isNodeError } from '../errors.js';

const SESSION_EXTENSION = '.jsonl';

async function assertDirectory(root: string): Promise<void> {
  try {
    const rootStat = await stat(root);
    if (rootStat.isDirectory()) return;
  } catch (err) {
    if (!isNodeError(err) || (err.code !== 'ENOENT' && err.code !== 'ENOTDIR')) {
      throw new ParseError('io_error', `Cannot read directory ${root}`, { filePath: root, cause: err });
    }
  }
  throw new ParseError('not_found', `Directory not found: ${root}`, { filePath: root });
}

/**
 * Collect every `.jsonl` file below `dir`. Unreadable subdirectories are skipped.
 */
async function walkTranscripts(dir: string, depth: number, out: string[]): Promise<void> {
  let entries: Dirent[];
  try {
    entries = await readdir(dir, { withFileTypes: true });
  } catch {
    return;
  }

  for (const entry of entries) {
    const entryPath = join(dir, entry.name);
    if (entry.isDirectory()) {
      await walkTranscripts(entryPath, depth + 1, out);
      continue;
    }
    // Files directly in the scan root never count as sessions.
    if (depth === 0) continue;
    if (entry.isFile() && entry.name.endsWith(SESSION_EXTENSION)) {
      out.push(entryPath);
    }
  }
}

/**
 * Find transcript files anywhere below `root`, excluding files that sit
 * directly in `root`. Sorted lexicographically by path.
 * Throws ParseError (`not_found`) when `root` does not exist.
 */
export async function findSessions(root: string): Promise<string[]> {
  await assertDirectory(root);
  const files: string[] = [];
  await walkTranscripts(root, 0, files);
  return files.sort();
}

/**
 * Directories that directly contain at least one session found by
 * `findSessions(root)`. Sorted lexicographically.
 */
export async function findProjects(root: string): Promise<string[]> {
  const sessions = await findSessions(root);
  return [...new Set(sessions.map((file) => dirname(file)))].sort();
}

/**
 * Transcript files anywhere under a project directory, including ones at its
 * top level. Sorted lexicographically.
 */
export async function findProjectTranscripts(projectDir: string): Promise<string[]> {
  await assertDirectory(projectDir);
  const files: string[] = [];
  // Start at depth 1 so the project's own top-level files qualify.
  await walkTranscripts(projectDir, 1, files);
  return files.sort();
}
