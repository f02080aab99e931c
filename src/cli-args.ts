import { parseArgs } from 'node:util';
import { TurnlogError } from './errors.js';
import type { MixedSessionIdPolicy } from './transcript/types.js';
import type { ConversationOptions } from './execution/conversation.js';
import { DEFAULT_TIMEOUT_MS } from './execution/agent-client.js';
import { printWarning } from './utils/logger.js';

export const COMMANDS = ['sessions', 'projects', 'show', 'project', 'send', 'history'] as const;
export type Command = (typeof COMMANDS)[number];

const MIXED_POLICIES: readonly MixedSessionIdPolicy[] = ['accept', 'warn', 'reject'];

export interface CLIOptions {
  dir: string | undefined;
  workspace: string | undefined;
  limit: number | undefined;
  json: boolean;
  verbose: boolean;
  model: string | undefined;
  resume: string | undefined;
  record: boolean;
  timeoutMs: number;
  save: string | undefined;
  load: string | undefined;
  skipPermissions: boolean;
  allowedTools: string | undefined;
  disallowedTools: string | undefined;
  mixedSessionIds: MixedSessionIdPolicy | undefined;
}

export interface ParsedCLI {
  command: Command;
  args: string[];
  options: CLIOptions;
}

function isCommand(value: string): value is Command {
  return COMMANDS.some((c) => c === value);
}

function isMixedPolicy(value: string): value is MixedSessionIdPolicy {
  return MIXED_POLICIES.some((p) => p === value);
}

function parsePositiveInt(flag: string, value: string | undefined): number | undefined {
  if (value === undefined) return undefined;
  const n = Number.parseInt(value, 10);
  if (!Number.isInteger(n) || n <= 0) {
    throw new TurnlogError('invalid_argument', `${flag} must be a positive integer, got "${value}"`);
  }
  return n;
}

export function parseCLIArgs(argv: string[]): ParsedCLI | null {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      dir: { type: 'string' },
      workspace: { type: 'string' },
      limit: { type: 'string' },
      json: { type: 'boolean', default: false },
      verbose: { type: 'boolean', default: false },
      model: { type: 'string' },
      resume: { type: 'string' },
      record: { type: 'boolean', default: false },
      timeout: { type: 'string' },
      save: { type: 'string' },
      load: { type: 'string' },
      'skip-permissions': { type: 'boolean', default: false },
      'allowed-tools': { type: 'string' },
      'disallowed-tools': { type: 'string' },
      'mixed-session-ids': { type: 'string' },
      help: { type: 'boolean', short: 'h', default: false },
    },
    strict: true,
    allowPositionals: true,
  });

  const [cmd, ...args] = positionals;
  if (values.help || cmd === undefined) return null;
  if (!isCommand(cmd)) {
    throw new TurnlogError('invalid_argument', `Unknown command: ${cmd}`);
  }

  const policy = values['mixed-session-ids'];
  if (policy !== undefined && !isMixedPolicy(policy)) {
    throw new TurnlogError('invalid_argument', `--mixed-session-ids must be one of ${MIXED_POLICIES.join(', ')}`);
  }

  return {
    command: cmd,
    args,
    options: {
      dir: values.dir,
      workspace: values.workspace,
      limit: parsePositiveInt('--limit', values.limit),
      json: values.json ?? false,
      verbose: values.verbose ?? false,
      model: values.model,
      resume: values.resume,
      record: values.record ?? false,
      timeoutMs: (parsePositiveInt('--timeout', values.timeout) ?? DEFAULT_TIMEOUT_MS / 1000) * 1000,
      save: values.save,
      load: values.load,
      skipPermissions: values['skip-permissions'] ?? false,
      allowedTools: values['allowed-tools'],
      disallowedTools: values['disallowed-tools'],
      mixedSessionIds: policy,
    },
  };
}

export function conversationOptions(options: CLIOptions): ConversationOptions {
  return {
    model: options.model ?? null,
    timeoutMs: options.timeoutMs,
    // Without --record a loaded conversation keeps its saved setting.
    recording: options.record || undefined,
    cli: {
      skipPermissions: options.skipPermissions,
      allowedTools: options.allowedTools ?? null,
      disallowedTools: options.disallowedTools ?? null,
    },
    onWarning: printWarning,
  };
}
