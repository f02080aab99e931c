import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { ParseError, WorkspaceError, isNodeError } from '../errors.js';
import { parseTranscript } from '../transcript/parser.js';
import type { ParseOptions } from '../transcript/types.js';
import type { Session } from '../session/session.js';
import { getProjectsDir, sessionFilePath } from '../utils/paths.js';
import {
  DEFAULT_IGNORED_DIRS,
  DEFAULT_TRACKED_PATTERNS,
  captureFiles,
  type EnvironmentSnapshot,
} from './snapshot.js';

export interface WorkspaceOptions {
  patterns?: readonly string[];
  ignoredDirs?: readonly string[];
  /** Where the agent writes transcripts. Defaults to `<config dir>/projects`. */
  projectsDir?: string;
  parse?: ParseOptions;
}

/**
 * A directory the agent works in. Knows which files to track and where the
 * agent keeps the transcripts of sessions started here.
 */
export class Workspace {
  readonly path: string;
  readonly patterns: readonly string[];
  readonly ignoredDirs: readonly string[];
  readonly projectsDir: string;
  private readonly parseOptions: ParseOptions;

  constructor(path: string, options: WorkspaceOptions = {}) {
    this.path = resolve(path);
    this.patterns = options.patterns ?? DEFAULT_TRACKED_PATTERNS;
    this.ignoredDirs = options.ignoredDirs ?? DEFAULT_IGNORED_DIRS;
    this.projectsDir = options.projectsDir ?? getProjectsDir();
    this.parseOptions = options.parse ?? {};
  }

  /**
   * Open an existing directory as a workspace.
   * Throws WorkspaceError when the path is missing or not a directory.
   */
  static async open(path: string, options: WorkspaceOptions = {}): Promise<Workspace> {
    const absolute = resolve(path);
    try {
      const info = await stat(absolute);
      if (!info.isDirectory()) {
        throw new WorkspaceError('not_a_directory', `Workspace is not a directory: ${absolute}`);
      }
    } catch (err) {
      if (err instanceof WorkspaceError) throw err;
      if (isNodeError(err) && err.code === 'ENOENT') {
        throw new WorkspaceError('not_found', `Workspace not found: ${absolute}`);
      }
      throw err;
    }
    return new Workspace(absolute, options);
  }

  sessionFile(sessionId: string): string {
    return sessionFilePath(this.path, sessionId, this.projectsDir);
  }

  /** Tracked files only, no session. */
  async snapshotFiles(): Promise<Record<string, string>> {
    return captureFiles(this.path, { patterns: this.patterns, ignoredDirs: this.ignoredDirs });
  }

  async snapshot(): Promise<EnvironmentSnapshot> {
    return {
      files: await this.snapshotFiles(),
      sessionFile: null,
      sessionId: null,
      timestamp: new Date().toISOString(),
      session: null,
    };
  }

  /**
   * Snapshot the files and resolve the transcript of `sessionId`. A transcript
   * that is missing or still empty leaves `session` null; any other parse
   * failure propagates.
   */
  async snapshotWithSession(sessionId: string): Promise<EnvironmentSnapshot> {
    const file = this.sessionFile(sessionId);
    const files = await this.snapshotFiles();
    const session = await this.loadSession(file);
    return {
      files,
      sessionFile: file,
      sessionId,
      timestamp: new Date().toISOString(),
      session,
    };
  }

  private async loadSession(file: string): Promise<Session | null> {
    try {
      return await parseTranscript(file, this.parseOptions);
    } catch (err) {
      if (err instanceof ParseError && (err.code === 'file_not_found' || err.code === 'empty_file')) {
        return null;
      }
      throw err;
    }
  }
}
