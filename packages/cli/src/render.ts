import type { CLIErrorView } from '@pubgen/core';

const RED = '\u001B[31m';
const DIM = '\u001B[2m';
const RESET = '\u001B[0m';

const INDENT = '   ';

// Context settings a user sets on the command line
const FLAG_FOR_SETTING: Readonly<Record<string, string>> = {
  size: '--size',
  output: '--output',
  schema: '--schema',
  validator: '--validator',
  seed: '--seed',
};

function paint(text: string, color: string, enabled: boolean): string {
  return enabled ? `${color}${text}${RESET}` : text;
}

/**
 * Greedy word wrap. A word longer than `width` gets a line of its own.
 */
export function wrapWords(text: string, width: number): string[] {
  const lines: string[] = [];
  let current = '';
  for (const word of text.split(/\s+/)) {
    if (!word) continue;
    const candidate = current ? `${current} ${word}` : word;
    if (current && candidate.length > width) {
      lines.push(current);
      current = word;
    } else {
      current = candidate;
    }
  }
  if (current) lines.push(current);
  return lines;
}

function indented(text: string, width: number): string[] {
  return wrapWords(text, width - INDENT.length).map((line) => INDENT + line);
}

function describeSetting({
  name,
  value,
}: NonNullable<CLIErrorView['setting']>): string {
  const flag = FLAG_FOR_SETTING[name];
  return flag ? `${flag} ${value}` : `${name} = ${value}`;
}

/**
 * Render an error view as terminal lines:
 *
 *   ❌ E300 Unsupported size: 2mb. Supported sizes: 1mb, 5mb, 10mb, 15mb
 *      --size "2mb"
 *      💡 Use one of: 1mb, 5mb, 10mb, 15mb
 */
export function renderCLIView(view: CLIErrorView): string {
  const width = view.terminalWidth || 80;
  const lines = [paint(`❌ ${view.code} ${view.message}`, RED, view.colors)];

  if (view.setting) {
    lines.push(INDENT + describeSetting(view.setting));
  }
  if (view.file) {
    // Paths are not wrapped so they stay copy/pasteable
    lines.push(`${INDENT}file: ${view.file}`);
  }
  if (view.hint) {
    lines.push(...indented(`💡 ${view.hint}`, width));
  }
  if (view.cause) {
    lines.push(
      ...indented(`caused by: ${view.cause}`, width).map((line) =>
        paint(line, DIM, view.colors)
      )
    );
  }

  return lines.join('\n');
}
