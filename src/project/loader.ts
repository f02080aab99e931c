import { readdir, stat } from 'node:fs/promises';
import { isAbsolute, join, resolve, sep } from 'node:path';
import { ParseError } from '../errors.js';
import { findProjectTranscripts } from '../discovery/discovery.js';
import { DEFAULT_CONCURRENCY, mapWithConcurrency } from '../pipeline/concurrency.js';
import { parseTranscript } from '../transcript/parser.js';
import type { ParseOptions } from '../transcript/types.js';
import type { Session } from '../session/session.js';
import { encodeProjectPath, resolveProjectsDir } from '../utils/paths.js';
import { Project, type SkippedTranscript } from './project.js';

export interface LoadProjectOptions extends ParseOptions {
  /** Parallel parse limit. */
  concurrency?: number;
  /** Where bare project names are looked up. Defaults to the agent's projects dir. */
  projectsDir?: string;
  /** Called once per transcript that failed to parse and was skipped. */
  onSkipped?: (skipped: SkippedTranscript) => void;
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

function looksLikePath(value: string): boolean {
  return isAbsolute(value) || value.includes('/') || value.includes(sep) || value.startsWith('.');
}

/**
 * Resolve a project directory from a path or a bare project name.
 * A name matches an entry of the projects dir that equals it or ends with
 * `-<encoded name>`.
 */
export async function resolveProjectDir(
  nameOrPath: string,
  projectsDir?: string,
): Promise<{ dir: string; name: string | undefined }> {
  const asPath = resolve(nameOrPath);
  if (await isDirectory(asPath)) return { dir: asPath, name: undefined };

  if (!looksLikePath(nameOrPath)) {
    const base = await resolveProjectsDir(projectsDir);
    if (base) {
      const suffix = `-${encodeProjectPath(nameOrPath)}`;
      let entries: string[] = [];
      try {
        entries = (await readdir(base)).sort();
      } catch {
        entries = [];
      }
      const match = entries.find((entry) => entry === nameOrPath || entry.endsWith(suffix));
      if (match && (await isDirectory(join(base, match)))) {
        return { dir: join(base, match), name: nameOrPath };
      }
    }
  }

  throw new ParseError('not_found', `Project not found: ${nameOrPath}`, { filePath: nameOrPath });
}

/**
 * Parse every transcript of a project in parallel. A transcript that fails
 * to parse is skipped and reported in `project.skipped`; only a missing
 * project directory is fatal.
 */
export async function loadProject(
  nameOrPath: string,
  options: LoadProjectOptions = {},
): Promise<Project> {
  const { dir, name } = await resolveProjectDir(nameOrPath, options.projectsDir);
  const files = await findProjectTranscripts(dir);

  const results = await mapWithConcurrency(
    files,
    (file) => parseTranscript(file, { mixedSessionIds: options.mixedSessionIds }),
    options.concurrency ?? DEFAULT_CONCURRENCY,
  );

  const sessions: Session[] = [];
  const skipped: SkippedTranscript[] = [];
  results.forEach((result, index) => {
    if (result.ok) {
      sessions.push(result.value);
      return;
    }
    const entry = { filePath: files[index], error: result.error };
    skipped.push(entry);
    options.onSkipped?.(entry);
  });

  return new Project({ path: dir, name, sessions, skipped });
}

/**
 * Load every project found under a root, one Project per directory that
 * directly holds transcripts.
 */
export async function loadProjects(
  projectDirs: readonly string[],
  options: LoadProjectOptions = {},
): Promise<Project[]> {
  const projects: Project[] = [];
  for (const dir of projectDirs) {
    projects.push(await loadProject(dir, options));
  }
  return projects;
}
