import { realpath } from 'node:fs/promises';
import { homedir } from 'node:os';
import { basename, join } from 'node:path';

/**
 * Encode a filesystem path into the agent's project directory name.
 * `/Users/jo/app` → `-Users-jo-app`, and a hidden segment `/Users/jo/.cfg`
 * → `-Users-jo--cfg`.
 */
export function encodeProjectPath(fsPath: string): string {
  return fsPath.replace(/\/\./g, '--').replace(/\//g, '-');
}

/**
 * Best-effort inverse of `encodeProjectPath`. Dashes that were part of a
 * directory name cannot be told apart from separators.
 */
export function decodeProjectPath(encoded: string): string {
  return encoded.replace(/--/g, '/.').replace(/-/g, '/');
}

/** Final path segment, or `unknown` for a bare root. */
export function extractProjectName(fsPath: string): string {
  const trimmed = fsPath.replace(/[\\/]+$/, '');
  return basename(trimmed) || 'unknown';
}

/** Agent config root; `CLAUDE_CONFIG_DIR` overrides `~/.claude`. */
export function getAgentConfigDir(): string {
  return process.env.CLAUDE_CONFIG_DIR || join(homedir(), '.claude');
}

export function getProjectsDir(): string {
  return join(getAgentConfigDir(), 'projects');
}

/**
 * Resolve the projects directory, following symlinks.
 * Returns null if the directory doesn't exist or isn't accessible.
 */
export async function resolveProjectsDir(baseDir?: string): Promise<string | null> {
  const dir = baseDir ?? getProjectsDir();
  try {
    return await realpath(dir);
  } catch {
    return null;
  }
}

/**
 * Transcript path the agent writes for a session started in `workspacePath`.
 */
export function sessionFilePath(
  workspacePath: string,
  sessionId: string,
  projectsDir: string = getProjectsDir(),
): string {
  return join(projectsDir, encodeProjectPath(workspacePath), `${sessionId}.jsonl`);
}

export function formatFileSize(bytes: number): string {
  if (bytes < 1024) return `${bytes}B`;
  if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(0)}KB`;
  return `${(bytes / (1024 * 1024)).toFixed(1)}MB`;
}

/**
 * Extract the session UUID from a JSONL filename.
 * e.g. "abc123-def456.jsonl" → "abc123-def456"
 */
export function extractSessionId(filename: string): string {
  return filename.replace(/\.jsonl$/, '');
}
