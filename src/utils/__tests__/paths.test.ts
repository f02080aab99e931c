import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, rm, realpath, symlink, mkdir } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  decodeProjectPath,
  encodeProjectPath,
  extractProjectName,
  extractSessionId,
  formatFileSize,
  getAgentConfigDir,
  getProjectsDir,
  resolveProjectsDir,
  sessionFilePath,
} from '../paths.js';

// ---------------------------------------------------------------------------
// Setup / Teardown
// ---------------------------------------------------------------------------

let tempDir: string;

beforeEach(async () => {
  tempDir = await mkdtemp(join(tmpdir(), 'paths-test-'));
});

afterEach(async () => {
  vi.unstubAllEnvs();
  await rm(tempDir, { recursive: true, force: true });
});

// ---------------------------------------------------------------------------
// Project path encoding
// ---------------------------------------------------------------------------

describe('encodeProjectPath', () => {
  it('replaces separators with dashes', () => {
    expect(encodeProjectPath('/home/dev/shop')).toBe('-home-dev-shop');
  });

  it('encodes hidden directories with a double dash', () => {
    expect(encodeProjectPath('/home/dev/.config/tool')).toBe('-home-dev--config-tool');
  });
});

describe('decodeProjectPath', () => {
  it('reverses the encoding of paths without dashes in names', () => {
    expect(decodeProjectPath('-home-dev--config-tool')).toBe('/home/dev/.config/tool');
  });
});

describe('extractProjectName', () => {
  it('returns the last path segment', () => {
    expect(extractProjectName('/home/dev/shop')).toBe('shop');
    expect(extractProjectName('/home/dev/shop/')).toBe('shop');
  });

  it('falls back to unknown for the filesystem root', () => {
    expect(extractProjectName('/')).toBe('unknown');
  });
});

// ---------------------------------------------------------------------------
// Agent directories
// ---------------------------------------------------------------------------

describe('getAgentConfigDir', () => {
  it('honours CLAUDE_CONFIG_DIR', () => {
    vi.stubEnv('CLAUDE_CONFIG_DIR', '/opt/agent-config');
    expect(getAgentConfigDir()).toBe('/opt/agent-config');
    expect(getProjectsDir()).toBe('/opt/agent-config/projects');
  });

  it('defaults to ~/.claude', () => {
    vi.stubEnv('CLAUDE_CONFIG_DIR', '');
    expect(getAgentConfigDir()).toBe(join(homedir(), '.claude'));
  });
});

describe('resolveProjectsDir', () => {
  it('follows symlinks', async () => {
    const real = join(tempDir, 'real-projects');
    const link = join(tempDir, 'linked-projects');
    await mkdir(real);
    await symlink(real, link);

    expect(await resolveProjectsDir(link)).toBe(await realpath(real));
  });

  it('returns null for a missing directory', async () => {
    expect(await resolveProjectsDir(join(tempDir, 'missing'))).toBeNull();
  });
});

describe('sessionFilePath', () => {
  it('places the transcript under the encoded workspace path', () => {
    expect(sessionFilePath('/home/dev/shop', 'abc-123', '/cfg/projects')).toBe(
      '/cfg/projects/-home-dev-shop/abc-123.jsonl',
    );
  });
});

// ---------------------------------------------------------------------------
// Formatting helpers
// ---------------------------------------------------------------------------

describe('formatFileSize', () => {
  it('formats bytes, kilobytes and megabytes', () => {
    expect(formatFileSize(512)).toBe('512B');
    expect(formatFileSize(2048)).toBe('2KB');
    expect(formatFileSize(3 * 1024 * 1024)).toBe('3.0MB');
  });
});

describe('extractSessionId', () => {
  it('strips the transcript extension', () => {
    expect(extractSessionId('abc123-def456.jsonl')).toBe('abc123-def456');
  });
});
