import { createRequire } from 'node:module';
import { brand, color, box, icon } from './theme.js';
import { shortPath } from './format.js';

const require = createRequire(import.meta.url);
const pkg: unknown = require('../../package.json');

export const VERSION =
  typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0';

const MIN_INNER_WIDTH = 56;

/** Text as the terminal shows it, without ANSI styling. */
export function visibleText(s: string): string {
  return s.replace(/\x1b\[[0-9;]*m/g, '');
}

function visibleWidth(s: string): number {
  return visibleText(s).length;
}

/**
 * Header box printed above every command:
 *
 *   ╭─ turnlog 0.1.0 · project ──────────────────────────────╮
 *   │ scope     ~/.claude/projects/-home-dev-shop            │
 *   │ sessions  12                                           │
 *   ╰────────────────────────────────────────────────────────╯
 *
 * Labels are padded to a common width so values line up.
 */
export function buildBanner(
  command: string,
  scopePath?: string,
  extra: Record<string, string> = {},
): string[] {
  const rows: Array<[string, string]> = [];
  if (scopePath) rows.push(['scope', color.file(shortPath(scopePath))]);
  for (const [label, value] of Object.entries(extra)) rows.push([label.toLowerCase(), value]);

  const labelWidth = Math.max(0, ...rows.map(([label]) => label.length));
  const body = rows.map(([label, value]) => `${color.secondary(label.padEnd(labelWidth))}  ${value}`);

  const title = `${brand.indigo(`turnlog ${VERSION}`)} ${color.tertiary(icon.dot)} ${color.bold(command)}`;
  const innerWidth = Math.max(
    MIN_INNER_WIDTH,
    visibleWidth(title) + 4,
    ...body.map((line) => visibleWidth(line) + 2),
  );

  const edge = (s: string): string => color.tertiary(s);
  const top = `${edge(box.tl + box.h)} ${title} ${edge(box.h.repeat(innerWidth - visibleWidth(title) - 3) + box.tr)}`;
  const middle = body.map(
    (line) => `${edge(box.v)} ${line}${' '.repeat(innerWidth - visibleWidth(line) - 1)}${edge(box.v)}`,
  );
  const bottom = edge(box.bl + box.h.repeat(innerWidth) + box.br);

  return [top, ...middle, bottom];
}
