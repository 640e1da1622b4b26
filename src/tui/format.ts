/**
 * checkdesk TUI — Terminal formatting utilities.
 * Color tokens, severity labels, tables, progress bars and file links.
 */

import chalk from 'chalk';
import type { FindingSeverity } from '../types/index.js';
import { fileUri } from '../core/args.js';

// ─── Color tokens ────────────────────────────────────────────────────

export const C = {
  // UI
  dim:      chalk.dim,
  bold:     chalk.bold,
  green:    chalk.green,
  red:      chalk.red,
  cyan:     chalk.hex('#4fb3d9'),
  gray:     chalk.gray,
  yellow:   chalk.yellow,
  blue:     chalk.blue,
  magenta:  chalk.magenta,

  // Accent
  frame:    chalk.hex('#4fb3d9'),
  success:  chalk.green,
  warn:     chalk.yellow,
  error:    chalk.red,
};

// ─── String cleaning ─────────────────────────────────────────────────

/** Strip ANSI escape codes from a string */
export function stripAnsi(str: string): string {
  // eslint-disable-next-line no-control-regex
  return str.replace(/[\u001b\u009b][[()#;?]*(?:[0-9]{1,4}(?:;[0-9]{0,4})*)?[0-9A-ORZcf-nqry=><]/g, '');
}

// ─── Severity labels ─────────────────────────────────────────────────

/** cppcheck severity, colored */
export function severityText(sev: FindingSeverity): string {
  if (sev === 'error')       return C.red.bold(sev);
  if (sev === 'warning')     return C.yellow.bold(sev);
  if (sev === 'performance') return C.magenta(sev);
  if (sev === 'portability') return C.blue(sev);
  if (sev === 'style')       return C.cyan(sev);
  return C.gray(sev);
}

/** On/off marker for a toggle */
export function checkbox(on: boolean): string {
  return on ? C.green('[x]') : C.dim('[ ]');
}

/** Availability marker */
export function found(ok: boolean): string {
  return ok ? C.success('✓') : C.error('✗');
}

// ─── Table formatter ─────────────────────────────────────────────────

export interface Column {
  header: string;
  width: number;
}

export function formatTable(columns: Column[], rows: string[][]): string[] {
  const lines: string[] = [];

  const headerLine = columns.map(c => c.header.padEnd(c.width)).join('  ');
  lines.push(C.dim(headerLine));

  const sep = columns.map(c => '─'.repeat(c.width)).join('  ');
  lines.push(C.dim(sep));

  for (const row of rows) {
    const cells = columns.map((c, i) => {
      const val = (row[i] || '').slice(0, c.width);
      return val.padEnd(c.width);
    });
    lines.push(cells.join('  '));
  }

  return lines;
}

// ─── Misc ────────────────────────────────────────────────────────────

/** Truncate string to max width with ellipsis */
export function trunc(s: string, max: number): string {
  if (s.length <= max) return s;
  return s.slice(0, max - 1) + '…';
}

/** Horizontal bar for a 0..1 fraction */
export function bar(fraction: number, width = 20, ch = '█'): string {
  const filled = Math.round(Math.min(1, Math.max(0, fraction)) * width);
  return ch.repeat(filled) + C.dim('░'.repeat(width - filled));
}

/** `[████░░░░] 50%` */
export function progressLine(fraction: number, width = 20): string {
  const pct = Math.round(Math.min(1, Math.max(0, fraction)) * 100);
  return `${C.dim('[')}${bar(fraction, width)}${C.dim(']')} ${String(pct).padStart(3)}%`;
}

// ─── OSC 8 Hyperlinks ────────────────────────────────────────────────

/**
 * Detect whether the terminal supports OSC 8 hyperlinks.
 * Supports: iTerm2, Kitty, WezTerm, Windows Terminal, foot, VS Code
 */
function supportsHyperlinks(): boolean {
  const env = process.env;
  if (env.FORCE_HYPERLINK === '1') return true;
  if (env.FORCE_HYPERLINK === '0') return false;
  if (!process.stdout.isTTY) return false;
  if (env.TERM_PROGRAM === 'iTerm.app') return true;
  if (env.TERM === 'xterm-kitty') return true;
  if (env.TERM_PROGRAM === 'WezTerm') return true;
  if (env.WT_SESSION) return true;
  if (env.TERM === 'foot' || env.TERM === 'foot-extra') return true;
  if (env.TERM_PROGRAM === 'vscode') return true;
  if (env.COLORTERM === 'truecolor' || env.COLORTERM === '24bit') return true;
  return false;
}

const _hyperlinks = supportsHyperlinks();

/**
 * Clickable link to an absolute path. Falls back to plain text if the
 * terminal doesn't support hyperlinks.
 */
export function fileLink(absPath: string, display?: string): string {
  const text = display || absPath;
  if (!_hyperlinks) return text;
  return `\x1b]8;;${fileUri(absPath)}\x07${text}\x1b]8;;\x07`;
}
