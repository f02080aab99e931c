import { describe, it, expect, afterEach } from 'vitest';
import { chmod } from 'node:fs/promises';
import { join } from 'node:path';
import { ExecutionError } from '../../errors.js';
import { cleanupTempDirs, makeTempDir, writeText } from '../../__tests__/helpers.js';
import {
  ClaudeCliClient,
  DEFAULT_ALLOWED_TOOLS,
  buildAgentArgs,
  parseAgentOutput,
} from '../agent-client.js';
import type { AgentRequest } from '../types.js';

const request: AgentRequest = { text: 'Add a test', resumeSessionId: null, model: null };

afterEach(async () => {
  await cleanupTempDirs();
});

/** Writes an executable shell script that stands in for the agent binary. */
async function fakeAgentBinary(body: string): Promise<{ binary: string; cwd: string }> {
  const cwd = await makeTempDir('agent-client-test-');
  const binary = await writeText(join(cwd, 'fake-agent.sh'), `#!/bin/sh\n${body}\n`);
  await chmod(binary, 0o755);
  return { binary, cwd };
}

async function invokeError(client: ClaudeCliClient, timeoutMs: number): Promise<unknown> {
  return client.invoke(request, { timeoutMs }).then(
    () => null,
    (e: unknown) => e,
  );
}

function expectExecutionError(fn: () => unknown, code: string, message?: string): void {
  let caught: unknown = null;
  try {
    fn();
  } catch (err) {
    caught = err;
  }
  expect(caught).toBeInstanceOf(ExecutionError);
  if (caught instanceof ExecutionError) {
    expect(caught.code).toBe(code);
    if (message !== undefined) expect(caught.message).toBe(message);
  }
}

// ---------------------------------------------------------------------------
// buildAgentArgs
// ---------------------------------------------------------------------------

describe('buildAgentArgs', () => {
  it('uses the default tool list for a fresh session', () => {
    expect(buildAgentArgs(request)).toEqual([
      '--output-format',
      'json',
      '--allowedTools',
      DEFAULT_ALLOWED_TOOLS,
      '-p',
    ]);
  });

  it('adds model and resume before the tool flags', () => {
    expect(buildAgentArgs({ ...request, model: 'opus', resumeSessionId: 'sess-1' })).toEqual([
      '--output-format',
      'json',
      '--model',
      'opus',
      '--resume',
      'sess-1',
      '--allowedTools',
      DEFAULT_ALLOWED_TOOLS,
      '-p',
    ]);
  });

  it('skipPermissions overrides the tool lists', () => {
    const args = buildAgentArgs(request, { skipPermissions: true, allowedTools: 'Read' });
    expect(args).toEqual(['--output-format', 'json', '--dangerously-skip-permissions', '-p']);
  });

  it('passes explicit allowed and disallowed lists', () => {
    expect(buildAgentArgs(request, { allowedTools: 'Read,Grep', disallowedTools: 'Bash' })).toEqual([
      '--output-format',
      'json',
      '--allowedTools',
      'Read,Grep',
      '--disallowedTools',
      'Bash',
      '-p',
    ]);
  });

  it('passes a disallowed list alone without the default allowed list', () => {
    expect(buildAgentArgs(request, { disallowedTools: 'WebFetch' })).toEqual([
      '--output-format',
      'json',
      '--disallowedTools',
      'WebFetch',
      '-p',
    ]);
  });
});

// ---------------------------------------------------------------------------
// parseAgentOutput
// ---------------------------------------------------------------------------

describe('parseAgentOutput', () => {
  it('maps the agent JSON onto an AgentResult', () => {
    const stdout = JSON.stringify({
      type: 'result',
      result: 'Added tests.',
      session_id: 'sess-9',
      total_cost_usd: 0.042,
      duration_ms: 1200,
      model: 'opus',
    });
    expect(parseAgentOutput(stdout, 999)).toEqual({
      response: 'Added tests.',
      sessionId: 'sess-9',
      cost: 0.042,
      durationMs: 1200,
      model: 'opus',
    });
  });

  it('falls back to cost_usd, elapsed time and an unknown model', () => {
    const stdout = `${JSON.stringify({ result: 'ok', session_id: 's', cost_usd: 0.01 })}\n`;
    expect(parseAgentOutput(stdout, 250)).toEqual({
      response: 'ok',
      sessionId: 's',
      cost: 0.01,
      durationMs: 250,
      model: 'unknown',
    });
  });

  it('defaults the cost to zero', () => {
    expect(parseAgentOutput(JSON.stringify({ result: '', session_id: 's' }), 1).cost).toBe(0);
  });

  it('rejects output that is not JSON', () => {
    expectExecutionError(() => parseAgentOutput('Error: not logged in', 1), 'invalid_response', 'Agent output is not valid JSON');
  });

  it('names the missing field', () => {
    expectExecutionError(
      () => parseAgentOutput(JSON.stringify({ result: 'ok' }), 1),
      'invalid_response',
      'Agent output has no valid "session_id"',
    );
  });

  it('rejects a JSON value that is not an object', () => {
    expectExecutionError(() => parseAgentOutput('[]', 1), 'invalid_response', 'Agent output has no valid "(output)"');
  });

  it('turns is_error into agent_failed', () => {
    const stdout = JSON.stringify({ result: 'quota exceeded', session_id: 's', is_error: true });
    expectExecutionError(() => parseAgentOutput(stdout, 1), 'agent_failed', 'Agent reported an error: quota exceeded');
  });
});

// ---------------------------------------------------------------------------
// ClaudeCliClient
// ---------------------------------------------------------------------------

describe('ClaudeCliClient', () => {
  it('reports agent_not_found for a missing binary', async () => {
    const client = new ClaudeCliClient({ cwd: process.cwd(), binary: 'turnlog-test-no-such-binary' });
    const err = await client.invoke(request, { timeoutMs: 5000 }).then(
      () => null,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(ExecutionError);
    if (err instanceof ExecutionError) {
      expect(err.code).toBe('agent_not_found');
      expect(err.message).toBe('Agent binary not found: turnlog-test-no-such-binary');
    }
  });

  it('returns the parsed result of a successful run', async () => {
    const out = JSON.stringify({ result: 'hi', session_id: 's-1', total_cost_usd: 0.5, duration_ms: 10, model: 'm' });
    const { binary, cwd } = await fakeAgentBinary(`cat > /dev/null\necho '${out}'`);
    const client = new ClaudeCliClient({ cwd, binary });

    expect(await client.invoke(request, { timeoutMs: 5000 })).toEqual({
      response: 'hi',
      sessionId: 's-1',
      cost: 0.5,
      durationMs: 10,
      model: 'm',
    });
  });

  it('reports agent_failed with stderr on a non-zero exit', async () => {
    const { binary, cwd } = await fakeAgentBinary('cat > /dev/null\necho oops >&2\nexit 3');
    const err = await invokeError(new ClaudeCliClient({ cwd, binary }), 5000);

    expect(err).toBeInstanceOf(ExecutionError);
    if (err instanceof ExecutionError) {
      expect(err.code).toBe('agent_failed');
      expect(err.message).toBe('Agent exited with code 3: oops');
      expect(err.stderr).toBe('oops\n');
    }
  });

  it('kills the agent and reports timeout when it runs too long', async () => {
    const { binary, cwd } = await fakeAgentBinary('exec sleep 5');
    const started = Date.now();
    const err = await invokeError(new ClaudeCliClient({ cwd, binary }), 300);

    expect(err).toBeInstanceOf(ExecutionError);
    if (err instanceof ExecutionError) {
      expect(err.code).toBe('timeout');
      expect(err.message).toBe('Agent timed out after 0.3s');
    }
    expect(Date.now() - started).toBeLessThan(4000);
  });
});
