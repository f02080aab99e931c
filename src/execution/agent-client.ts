import { spawn } from 'node:child_process';
import { z } from 'zod';
import { ExecutionError } from '../errors.js';
import type { AgentClient, AgentRequest, AgentResult, InvokeOptions } from './types.js';

export const DEFAULT_AGENT_BINARY = 'claude';
export const DEFAULT_TIMEOUT_MS = 600_000;
export const DEFAULT_ALLOWED_TOOLS =
  'Task,Bash,Glob,Grep,LS,Read,Edit,MultiEdit,Write,NotebookRead,NotebookEdit,WebFetch,TodoRead,TodoWrite,WebSearch';

export interface ClaudeCliOptions {
  /** Directory the agent runs in; it files the session under this path. */
  cwd: string;
  binary?: string;
  allowedTools?: string | null;
  disallowedTools?: string | null;
  /** Overrides both tool lists. */
  skipPermissions?: boolean;
}

const AgentOutputSchema = z
  .object({
    result: z.string(),
    session_id: z.string().min(1),
    total_cost_usd: z.number().optional(),
    cost_usd: z.number().optional(),
    duration_ms: z.number().optional(),
    model: z.string().optional(),
    is_error: z.boolean().optional(),
  })
  .passthrough();

/**
 * Command-line arguments for one request. The prompt itself goes to stdin.
 */
export function buildAgentArgs(
  request: AgentRequest,
  options: Omit<ClaudeCliOptions, 'cwd' | 'binary'> = {},
): string[] {
  const args = ['--output-format', 'json'];
  if (request.model) args.push('--model', request.model);
  if (request.resumeSessionId) args.push('--resume', request.resumeSessionId);

  if (options.skipPermissions) {
    args.push('--dangerously-skip-permissions');
  } else if (options.allowedTools || options.disallowedTools) {
    if (options.allowedTools) args.push('--allowedTools', options.allowedTools);
    if (options.disallowedTools) args.push('--disallowedTools', options.disallowedTools);
  } else {
    args.push('--allowedTools', DEFAULT_ALLOWED_TOOLS);
  }

  args.push('-p');
  return args;
}

/**
 * Parse the agent's `--output-format json` stdout.
 * `elapsedMs` is used when the agent does not report its own duration.
 */
export function parseAgentOutput(stdout: string, elapsedMs: number): AgentResult {
  let json: unknown;
  try {
    json = JSON.parse(stdout.trim());
  } catch (err) {
    throw new ExecutionError('invalid_response', 'Agent output is not valid JSON', { cause: err });
  }

  const parsed = AgentOutputSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue.path.join('.') || '(output)';
    throw new ExecutionError('invalid_response', `Agent output has no valid "${field}"`);
  }

  const out = parsed.data;
  if (out.is_error) {
    throw new ExecutionError('agent_failed', `Agent reported an error: ${out.result}`);
  }

  return {
    response: out.result,
    sessionId: out.session_id,
    cost: out.total_cost_usd ?? out.cost_usd ?? 0,
    durationMs: out.duration_ms ?? elapsedMs,
    model: out.model ?? 'unknown',
  };
}

/**
 * Runs the agent CLI once per request in the workspace directory.
 */
export class ClaudeCliClient implements AgentClient {
  private readonly options: ClaudeCliOptions;

  constructor(options: ClaudeCliOptions) {
    this.options = options;
  }

  async invoke(request: AgentRequest, { timeoutMs }: InvokeOptions): Promise<AgentResult> {
    const startTime = Date.now();
    const binary = this.options.binary ?? DEFAULT_AGENT_BINARY;
    const args = buildAgentArgs(request, this.options);

    const stdout = await new Promise<string>((resolve, reject) => {
      const proc = spawn(binary, args, {
        stdio: ['pipe', 'pipe', 'pipe'],
        cwd: this.options.cwd,
      });

      let out = '';
      let stderr = '';
      let settled = false;

      const finish = (fn: () => void): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        fn();
      };

      proc.stdout.on('data', (chunk: Buffer) => {
        out += chunk.toString();
      });

      proc.stderr.on('data', (chunk: Buffer) => {
        stderr += chunk.toString();
      });

      proc.on('error', (err: NodeJS.ErrnoException) => {
        finish(() => {
          if (err.code === 'ENOENT') {
            reject(new ExecutionError('agent_not_found', `Agent binary not found: ${binary}`, { cause: err }));
          } else {
            reject(new ExecutionError('spawn_failed', `Failed to spawn ${binary}: ${err.message}`, { cause: err }));
          }
        });
      });

      proc.on('close', (code) => {
        finish(() => {
          if (code !== 0) {
            reject(
              new ExecutionError('agent_failed', `Agent exited with code ${code}${stderr ? `: ${stderr.trim()}` : ''}`, {
                stderr,
              }),
            );
            return;
          }
          resolve(out);
        });
      });

      const timer = setTimeout(() => {
        finish(() => {
          proc.kill('SIGTERM');
          reject(new ExecutionError('timeout', `Agent timed out after ${timeoutMs / 1000}s`, { stderr }));
        });
      }, timeoutMs);

      // Prompt goes through stdin.
      proc.stdin.on('error', () => {
        // EPIPE when the child exits early; its exit code reports the failure.
      });
      proc.stdin.write(request.text);
      proc.stdin.end();
    });

    return parseAgentOutput(stdout, Date.now() - startTime);
  }
}
