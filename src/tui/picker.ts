/**
 * checkdesk TUI — Interactive directory chooser for /select.
 *
 *   /home/me/src
 *     1. libfoo
 *     2. tools
 *   Directory [number · .. up · . choose · Enter cancel]:
 *
 * Confirming returns the absolute path; cancelling returns null and the
 * caller keeps the previous selection.
 */

import { statSync } from 'node:fs';
import { dirname, join, resolve } from 'node:path';
import fg from 'fast-glob';
import { C } from './format.js';

export type PickerStep =
  | { type: 'cancel' }
  | { type: 'choose'; path: string }
  | { type: 'enter'; path: string }
  | { type: 'invalid'; reason: string };

const MAX_LISTED = 40;

/** Visible subdirectories of `dir`, sorted by name. */
export function listSubdirectories(dir: string): string[] {
  try {
    return fg.sync('*', { cwd: dir, onlyDirectories: true, deep: 1, dot: false, suppressErrors: true })
      .sort((a, b) => a.localeCompare(b));
  } catch {
    return [];
  }
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

/** Interpret one answer at the picker prompt. */
export function resolvePickerAnswer(current: string, entries: string[], answer: string): PickerStep {
  const a = answer.trim();
  if (!a) return { type: 'cancel' };
  if (a === '.') return { type: 'choose', path: current };
  if (a === '..') return { type: 'enter', path: dirname(current) };

  if (/^\d+$/.test(a)) {
    const idx = parseInt(a, 10) - 1;
    const entry = entries[idx];
    if (entry === undefined) return { type: 'invalid', reason: `No entry ${a}` };
    return { type: 'enter', path: join(current, entry) };
  }

  const target = resolve(current, a);
  if (!isDirectory(target)) return { type: 'invalid', reason: `Not a directory: ${target}` };
  return { type: 'enter', path: target };
}

export async function pickDirectory(start: string, ask: (prompt: string) => Promise<string>): Promise<string | null> {
  let current = resolve(start);

  for (;;) {
    const entries = listSubdirectories(current);
    console.log('');
    console.log(`  ${C.bold(current)}`);
    if (!entries.length) console.log(C.dim('    (no subdirectories)'));
    entries.slice(0, MAX_LISTED).forEach((name, i) => {
      console.log(`    ${C.dim(String(i + 1).padStart(2) + '.')} ${name}`);
    });
    if (entries.length > MAX_LISTED) {
      console.log(C.dim(`    … ${entries.length - MAX_LISTED} more (type a name to enter it)`));
    }
    console.log('');

    const step = resolvePickerAnswer(current, entries, await ask('  Directory [number · .. up · . choose · Enter cancel]: '));
    switch (step.type) {
      case 'cancel': return null;
      case 'choose': return step.path;
      case 'enter': current = step.path; break;
      case 'invalid': console.log(C.warn(`  ${step.reason}`)); break;
    }
  }
}
