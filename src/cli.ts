#!/usr/bin/env node
import { stat } from 'node:fs/promises';
import { resolve } from 'node:path';
import { TurnlogError, toError } from './errors.js';
import { findProjects, findSessions } from './discovery/discovery.js';
import { loadProject } from './project/loader.js';
import { parseTranscript } from './transcript/parser.js';
import { Workspace } from './workspace/workspace.js';
import { Conversation } from './execution/conversation.js';
import { DEFAULT_TIMEOUT_MS } from './execution/agent-client.js';
import { getProjectsDir } from './utils/paths.js';
import { conversationOptions, parseCLIArgs, type CLIOptions, type Command } from './cli-args.js';
import {
  printConversationSummary,
  printDailyCosts,
  printError,
  printHeader,
  printProjectList,
  printProjectSummary,
  printSessionDetail,
  printSessionsTable,
  printSuccess,
  printTranscriptList,
  printTransition,
  printVerbose,
} from './utils/logger.js';
import { brand, color } from './ui/theme.js';

function printHelp(): void {
  console.log(`
${brand.indigo('turnlog')} <command> [options]

${color.bold('Commands:')}
  sessions [dir]          List transcript files (default: agent projects dir)
  projects [dir]          List project directories
  show <file>             Parse and display one transcript
  project <name|path>     Load a project and summarize its sessions
  send <prompt>           Run one agent turn in a workspace
  history <saved.json>    Show the turns of a saved conversation

${color.bold('Options:')}
  --dir <path>            Projects directory for name lookup
  --workspace <path>      Workspace for send (default: CWD)
  --limit N               Show only the last N items
  --json                  Print JSON instead of formatted output
  --mixed-session-ids P   accept | warn (default) | reject
  --verbose               Show detailed output

${color.bold('Send options:')}
  --model <model>         Model passed to the agent
  --resume <id>           Continue an existing agent session
  --load <file>           Continue a saved conversation
  --save <file>           Save the conversation after the turn
  --record                Append the turn to .turnlog/transitions/
  --timeout N             Agent timeout in seconds (default: ${DEFAULT_TIMEOUT_MS / 1000})
  --skip-permissions      Let the agent use every tool without asking
  --allowed-tools <list>  Comma-separated tools the agent may use
  --disallowed-tools <l>  Comma-separated tools the agent may not use
`.trimEnd());
}

function requireArg(args: string[], name: string, command: Command): string {
  const value = args[0];
  if (value === undefined) {
    throw new TurnlogError('invalid_argument', `Missing <${name}> for "${command}"`);
  }
  return value;
}

function printJson(value: unknown): void {
  console.log(JSON.stringify(value, null, 2));
}

function lastN<T>(items: readonly T[], limit: number | undefined): T[] {
  return limit === undefined ? [...items] : items.slice(-limit);
}

// === Commands ===

async function runSessions(args: string[], options: CLIOptions): Promise<void> {
  const root = resolve(args[0] ?? options.dir ?? getProjectsDir());
  const files = lastN(await findSessions(root), options.limit);
  const sized = await Promise.all(
    files.map(async (path) => ({ path, size: (await stat(path)).size })),
  );

  if (options.json) {
    printJson(sized);
    return;
  }
  printHeader('Sessions', root, { Transcripts: String(files.length) });
  printTranscriptList(sized);
}

async function runProjects(args: string[], options: CLIOptions): Promise<void> {
  const root = resolve(args[0] ?? options.dir ?? getProjectsDir());
  const projects = lastN(await findProjects(root), options.limit);

  if (options.json) {
    printJson(projects);
    return;
  }
  printHeader('Projects', root, { Projects: String(projects.length) });
  printProjectList(projects);
}

async function runShow(args: string[], options: CLIOptions): Promise<void> {
  const file = resolve(requireArg(args, 'file', 'show'));
  const session = await parseTranscript(file, { mixedSessionIds: options.mixedSessionIds });

  if (options.json) {
    printJson(session.toJSON());
    return;
  }
  printHeader('Session', file);
  printSessionDetail(session, { limit: options.limit });
  if (options.verbose) {
    printVerbose(JSON.stringify(session.calculateMetrics()));
  }
}

async function runProject(args: string[], options: CLIOptions): Promise<void> {
  const target = requireArg(args, 'name|path', 'project');
  const project = await loadProject(target, {
    projectsDir: options.dir,
    mixedSessionIds: options.mixedSessionIds,
    onSkipped: options.verbose
      ? (skipped) => printVerbose(`skipped ${skipped.filePath}: ${skipped.error.message}`)
      : undefined,
  });

  if (options.json) {
    printJson(project.toJSON());
    return;
  }
  printHeader('Project', project.path, { Sessions: String(project.totalSessions) });
  printProjectSummary(project);
  printSessionsTable(lastN(project.sessions, options.limit));
  printDailyCosts(project.calculateDailyCosts());
}

async function runSend(args: string[], options: CLIOptions): Promise<void> {
  const prompt = args.join(' ');
  if (!prompt.trim()) {
    throw new TurnlogError('invalid_argument', 'Missing <prompt> for "send"');
  }

  const workspace = await Workspace.open(options.workspace ?? process.cwd());
  const conversation = options.load
    ? await Conversation.load(options.load, workspace, conversationOptions(options))
    : new Conversation(workspace, conversationOptions(options));

  if (!options.json) {
    printHeader('Send', workspace.path, options.model ? { Model: options.model } : undefined);
  }

  const transition = await conversation.send(prompt, { resumeSessionId: options.resume });

  const savePath = options.save ?? options.load;
  if (savePath) {
    await conversation.save(savePath);
  }

  if (options.json) {
    printJson(transition.serialize());
    return;
  }
  printTransition(transition, conversation.history.length - 1);
  if (savePath) printSuccess(`Saved conversation to ${savePath}`);
  console.log();
}

async function runHistory(args: string[], options: CLIOptions): Promise<void> {
  const file = resolve(requireArg(args, 'saved.json', 'history'));
  const saved = await Conversation.readSaved(file);
  const conversation = Conversation.fromSaved(saved, new Workspace(saved.workspacePath));

  if (options.json) {
    printJson(conversation.toSaved());
    return;
  }
  printHeader('History', saved.workspacePath, { Turns: String(conversation.history.length) });
  const first = options.limit === undefined ? 0 : Math.max(0, conversation.history.length - options.limit);
  conversation.history.forEach((transition, index) => {
    if (index >= first) printTransition(transition, index);
  });
  printConversationSummary({
    id: conversation.id,
    turns: conversation.history.length,
    totalCost: conversation.totalCost,
    toolsUsed: conversation.toolsUsed(),
  });
}

const HANDLERS: Record<Command, (args: string[], options: CLIOptions) => Promise<void>> = {
  sessions: runSessions,
  projects: runProjects,
  show: runShow,
  project: runProject,
  send: runSend,
  history: runHistory,
};

async function main(): Promise<void> {
  const cli = parseCLIArgs(process.argv.slice(2));
  if (!cli) {
    printHelp();
    return;
  }
  await HANDLERS[cli.command](cli.args, cli.options);
}

main().catch((err: unknown) => {
  const error = toError(err);
  printError(error instanceof TurnlogError ? error.message : `Unexpected error: ${error.message}`);
  process.exit(1);
});
