import { brand, color, icon, tree } from './theme.js';

/**
 * Top-level step marker: "● Text" in brand indigo + bold.
 */
export function step(text: string): string {
  return `${brand.indigo(icon.step)} ${color.bold(text)}`;
}

/**
 * Middle sub-step: "  ├─ text" with tertiary connector.
 */
export function substep(text: string): string {
  return `  ${color.tertiary(tree.mid)} ${text}`;
}

/**
 * Last sub-step: "  └─ text" with tertiary connector.
 */
export function lastSub(text: string): string {
  return `  ${color.tertiary(tree.last)} ${text}`;
}

/**
 * Success line with checkmark: "  └─ ✓ text" (or ├─ if not last).
 */
export function success(text: string, isLast = true): string {
  const connector = isLast ? tree.last : tree.mid;
  return `  ${color.tertiary(connector)} ${color.success(`${icon.success} ${text}`)}`;
}

export function error(text: string): string {
  return color.error(`${icon.error} ${text}`);
}

export function warn(text: string): string {
  return color.warning(`${icon.warning} ${text}`);
}

export function filePath(path: string): string {
  return color.file(path);
}

export function secondary(text: string): string {
  return color.secondary(text);
}

export function tertiary(text: string): string {
  return color.tertiary(text);
}

/**
 * Tree continuation pipe: "  │  text" for multi-line content under a substep.
 */
export function treeCont(text: string): string {
  return `  ${color.tertiary(tree.pipe)}  ${text}`;
}

/** "+ path" / "- path" / "~ path" for a workspace file change. */
export function fileChange(kind: 'created' | 'deleted' | 'modified', path: string): string {
  switch (kind) {
    case 'created':
      return color.created(`+ ${path}`);
    case 'deleted':
      return color.deleted(`- ${path}`);
    case 'modified':
      return color.modified(`~ ${path}`);
  }
}

/** US dollars with four decimals: `$0.0123`. */
export function formatCost(usd: number): string {
  return `$${usd.toFixed(4)}`;
}

/** Human duration from milliseconds: `850ms`, `12.4s`, `3m 05s`, `1h 02m`. */
export function formatDuration(ms: number): string {
  if (ms < 1000) return `${Math.round(ms)}ms`;
  const seconds = ms / 1000;
  if (seconds < 60) return `${seconds.toFixed(1)}s`;
  const totalSeconds = Math.floor(seconds);
  const minutes = Math.floor(totalSeconds / 60);
  if (minutes < 60) return `${minutes}m ${String(totalSeconds % 60).padStart(2, '0')}s`;
  return `${Math.floor(minutes / 60)}h ${String(minutes % 60).padStart(2, '0')}m`;
}

export function truncate(str: string, max: number): string {
  if (str.length <= max) return str;
  return str.slice(0, max) + '...';
}

export function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? '' : 's'}`;
}

/**
 * Shorten paths by replacing $HOME with ~.
 */
export function shortPath(fullPath: string): string {
  const home = process.env.HOME ?? process.env.USERPROFILE ?? '';
  if (home && fullPath.startsWith(home)) {
    return '~' + fullPath.slice(home.length);
  }
  return fullPath;
}
