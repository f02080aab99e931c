import type { Message } from '../transcript/types.js';
import { getText, getToolResults, getToolUses } from '../transcript/message.js';
import type { Session } from '../session/session.js';
import type { Project } from '../project/project.js';
import type { Transition } from '../execution/transition.js';
import { formatFileSize } from './paths.js';
import { color, icon } from '../ui/theme.js';
import {
  step,
  substep,
  lastSub,
  success,
  error,
  warn,
  filePath,
  secondary,
  tertiary,
  treeCont,
  fileChange,
  formatCost,
  formatDuration,
  plural,
  shortPath,
  truncate,
} from '../ui/format.js';
import { buildBanner } from '../ui/banner.js';

const PREVIEW_LINES = 6;

export function printHeader(command: string, scope?: string, extra?: Record<string, string>): void {
  for (const line of buildBanner(command, scope, extra)) {
    console.log(line);
  }
  console.log();
}

export function printWarning(message: string): void {
  console.log(warn(message));
}

export function printError(message: string): void {
  console.log(error(message));
}

export function printVerbose(message: string): void {
  console.log(treeCont(tertiary(message)));
}

export function printSuccess(message: string): void {
  console.log(success(message));
}

// === Discovery ===

export function printTranscriptList(files: ReadonlyArray<{ path: string; size: number }>): void {
  if (files.length === 0) {
    console.log(secondary('   No sessions found.'));
    console.log();
    return;
  }
  files.forEach((file, i) => {
    const num = String(i + 1).padStart(3);
    console.log(`   ${color.bold(num)}  ${filePath(shortPath(file.path))}  ${tertiary(formatFileSize(file.size))}`);
  });
  console.log();
}

export function printProjectList(projectDirs: readonly string[]): void {
  if (projectDirs.length === 0) {
    console.log(secondary('   No projects found.'));
    console.log();
    return;
  }
  projectDirs.forEach((dir, i) => {
    console.log(`   ${color.bold(String(i + 1).padStart(3))}  ${filePath(shortPath(dir))}`);
  });
  console.log();
}

// === Sessions ===

function formatDate(date: Date | null): string {
  return date ? date.toISOString().slice(0, 10) : '??????????';
}

function formatClock(timestamp: string): string {
  const time = Date.parse(timestamp);
  if (Number.isNaN(time)) return '??:??';
  return new Date(time).toLocaleTimeString('en-US', {
    hour: '2-digit',
    minute: '2-digit',
    hour12: false,
  });
}

export function printSessionsTable(sessions: readonly Session[]): void {
  if (sessions.length === 0) {
    console.log(secondary('   No sessions found.'));
    console.log();
    return;
  }

  const header = `   ${'#'.padStart(3)}   ${'Date'.padEnd(10)}   ${'Duration'.padEnd(8)}   ${'Messages'.padEnd(8)}   ${'Tools'.padEnd(5)}   Cost`;
  const separator = `   ${'─'.repeat(3)}──${'─'.repeat(10)}──${'─'.repeat(8)}──${'─'.repeat(8)}──${'─'.repeat(5)}──${'─'.repeat(8)}`;

  console.log(tertiary(header));
  console.log(tertiary(separator));

  sessions.forEach((s, i) => {
    const num = String(i + 1).padStart(3);
    const duration = formatDuration(s.duration).padEnd(8);
    const msgs = `${s.userMessages}/${s.assistantMessages}`.padEnd(8);
    const tools = String(s.totalToolCalls).padEnd(5);
    console.log(
      `   ${color.bold(num)}  ${formatDate(s.startTime)}  ${duration}  ${msgs}  ${tools}  ${color.cost(formatCost(s.totalCost))}`,
    );
  });

  console.log();
}

export function printSessionDetail(session: Session, options: { limit?: number } = {}): void {
  console.log(step(`Session: ${session.sessionId}`));
  if (session.projectPath) {
    console.log(substep(`Project: ${shortPath(session.projectPath)}`));
  }
  console.log(substep(`Date: ${formatDate(session.startTime)} (${formatDuration(session.duration)})`));
  console.log(
    substep(`Messages: ${session.userMessages} user, ${session.assistantMessages} assistant, ${plural(session.totalToolCalls, 'tool call')}`),
  );
  if (session.summary) {
    console.log(substep(secondary(`Summary: ${session.summary}`)));
  }
  for (const diagnostic of session.diagnostics) {
    console.log(substep(color.warning(`${icon.warning} ${diagnostic.message}`)));
  }
  console.log(lastSub(`Cost: ${color.cost(formatCost(session.totalCost))}`));
  console.log();

  const messages = options.limit !== undefined ? session.slice(-options.limit) : session.messages;
  for (const msg of messages) {
    printMessage(msg);
  }
}

function printMessage(msg: Message): void {
  const roleColor = msg.role === 'user' ? color.user : color.assistant;
  const sidechain = msg.isSidechain ? tertiary(' (sidechain)') : '';
  console.log(`${tertiary(`[${formatClock(msg.timestamp)}]`)} ${roleColor(msg.role.toUpperCase() + ':')}${sidechain}`);

  const text = getText(msg);
  if (text) {
    const lines = text.split('\n');
    for (const line of lines.slice(0, PREVIEW_LINES)) {
      console.log(`  ${line}`);
    }
    if (lines.length > PREVIEW_LINES) {
      console.log(secondary(`  ... (${lines.length - PREVIEW_LINES} more lines)`));
    }
  }

  for (const tool of getToolUses(msg)) {
    const inputPreview = formatToolInput(tool.name, tool.input);
    console.log(color.tool(`  ${tool.name}${inputPreview ? ': ' + inputPreview : ''}`));
  }

  for (const result of getToolResults(msg)) {
    if (result.content) {
      const preview = truncate(result.content.replace(/\n/g, ' '), 80);
      const line = `  ${icon.back} ${preview}`;
      console.log(result.isError ? color.error(line) : tertiary(line));
    }
  }

  console.log();
}

function formatToolInput(name: string, input: Record<string, unknown>): string {
  const { command, file_path, pattern, description } = input;
  if (name === 'Bash' && typeof command === 'string') {
    return truncate(command, 80);
  }
  if ((name === 'Read' || name === 'Write' || name === 'Edit' || name === 'MultiEdit') && typeof file_path === 'string') {
    return file_path;
  }
  if (name === 'Grep' && typeof pattern === 'string') {
    return `/${pattern}/`;
  }
  if (name === 'Glob' && typeof pattern === 'string') {
    return pattern;
  }
  if (name === 'Task' && typeof description === 'string') {
    return description;
  }
  return '';
}

// === Projects ===

export function printProjectSummary(project: Project): void {
  console.log(step(`Project: ${project.name}`));
  console.log(substep(`Path: ${filePath(shortPath(project.path))}`));
  console.log(substep(`Sessions: ${project.totalSessions}, messages: ${project.totalMessages}`));
  console.log(substep(`Duration: ${formatDuration(project.totalDuration)}`));

  const tools = Object.entries(project.toolUsageSummary).sort(([, a], [, b]) => b - a);
  if (tools.length > 0) {
    const top = tools.slice(0, 5).map(([name, count]) => `${name} ${count}`).join(', ');
    console.log(substep(`Tools: ${top}`));
  }
  if (project.skipped.length > 0) {
    console.log(substep(color.warning(`${icon.warning} ${plural(project.skipped.length, 'transcript')} skipped`)));
  }
  console.log(lastSub(`Cost: ${color.cost(formatCost(project.totalCost))}`));
  console.log();
}

export function printDailyCosts(daily: Record<string, number>): void {
  const days = Object.entries(daily);
  if (days.length === 0) return;
  console.log(step('Daily cost'));
  days.forEach(([day, cost], i) => {
    const line = `${day}  ${color.cost(formatCost(cost))}`;
    console.log(i === days.length - 1 ? lastSub(line) : substep(line));
  });
  console.log();
}

// === Conversations ===

export function printTransition(transition: Transition, index: number): void {
  const { execution } = transition;
  console.log(step(`Turn ${index + 1} ${tertiary(icon.dot)} ${secondary(execution.sessionId)}`));
  console.log(substep(`Prompt: ${truncate(transition.prompt.text.replace(/\n/g, ' '), 100)}`));

  const tools = transition.toolsUsed();
  if (tools.length > 0) {
    const errors = transition.hasToolErrors() ? color.error(` (${icon.error} tool errors)`) : '';
    console.log(substep(`Tools: ${tools.join(', ')}${errors}`));
  }

  const changes = transition.fileChanges();
  if (changes.all.length > 0) {
    console.log(substep(`Files: ${changes.all.length} changed`));
    for (const path of changes.created) console.log(treeCont(fileChange('created', path)));
    for (const path of changes.deleted) console.log(treeCont(fileChange('deleted', path)));
    for (const path of changes.modified) console.log(treeCont(fileChange('modified', path)));
  }

  console.log(
    lastSub(`${color.cost(formatCost(execution.cost))} ${tertiary(icon.dot)} ${formatDuration(execution.durationMs)} ${tertiary(icon.dot)} ${execution.model}`),
  );

  const response = execution.response.trim();
  if (response) {
    console.log();
    const lines = response.split('\n');
    for (const line of lines.slice(0, PREVIEW_LINES)) {
      console.log(`  ${line}`);
    }
    if (lines.length > PREVIEW_LINES) {
      console.log(secondary(`  ... (${lines.length - PREVIEW_LINES} more lines)`));
    }
  }
  console.log();
}

export function printConversationSummary(summary: {
  id: string;
  turns: number;
  totalCost: number;
  toolsUsed: readonly string[];
}): void {
  console.log(step(`Conversation: ${summary.id}`));
  console.log(substep(`Turns: ${summary.turns}`));
  if (summary.toolsUsed.length > 0) {
    console.log(substep(`Tools: ${summary.toolsUsed.join(', ')}`));
  }
  console.log(lastSub(`Total cost: ${color.cost(formatCost(summary.totalCost))}`));
  console.log();
}
