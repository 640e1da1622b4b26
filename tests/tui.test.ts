import { describe, it, expect, afterEach } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { decodeKey, type Key } from '../src/tui/keys.js';
import { applyKey, emptyEditor, type CommandEntry, type EditorOptions, type EditorState } from '../src/tui/editor.js';
import { listSubdirectories, resolvePickerAnswer } from '../src/tui/picker.js';
import { countSources, parseSeverities } from '../src/tui/commands.js';
import { checkbox, progressLine, stripAnsi, trunc } from '../src/tui/format.js';

// ─── Key decoding ────────────────────────────────────────────────────

describe('decodeKey', () => {
  it('decodes control bytes', () => {
    expect(decodeKey(Buffer.from([3]))).toEqual({ name: 'ctrl-c' });
    expect(decodeKey(Buffer.from([13]))).toEqual({ name: 'enter' });
    expect(decodeKey(Buffer.from([127]))).toEqual({ name: 'backspace' });
    expect(decodeKey(Buffer.from([9]))).toEqual({ name: 'tab' });
  });

  it('decodes escape sequences', () => {
    expect(decodeKey(Buffer.from('\x1b'))).toEqual({ name: 'escape' });
    expect(decodeKey(Buffer.from('\x1b[A'))).toEqual({ name: 'up' });
    expect(decodeKey(Buffer.from('\x1b[B'))).toEqual({ name: 'down' });
    expect(decodeKey(Buffer.from('\x1b[3~'))).toEqual({ name: 'delete' });
    expect(decodeKey(Buffer.from('\x1b[1~'))).toEqual({ name: 'home' });
    expect(decodeKey(Buffer.from('\x1b[Z'))).toEqual({ name: 'unknown' });
  });

  it('turns pasted newlines into spaces', () => {
    expect(decodeKey(Buffer.from('a\r\nb'))).toEqual({ name: 'text', text: 'a b' });
  });
});

// ─── Line editor ─────────────────────────────────────────────────────

const COMMANDS: CommandEntry[] = [
  { command: '/run', label: 'Run cppcheck' },
  { command: '/html', label: 'Generate HTML report' },
  { command: '/help', label: 'Show all commands' },
  { command: '/quit', label: 'Exit', aliases: ['/exit', '/q'] },
];
const OPTS: EditorOptions = { commands: COMMANDS, maxPalette: 8 };

function press(state: EditorState, ...keys: Key[]): EditorState {
  return keys.reduce((s, key) => applyKey(s, key, OPTS).state, state);
}

function type(state: EditorState, text: string): EditorState {
  return press(state, { name: 'text', text });
}

describe('applyKey', () => {
  it('filters the palette while typing a command', () => {
    const state = type(emptyEditor(), '/ht');
    expect(state.palette.visible).toBe(true);
    expect(state.palette.items.map(i => i.command)).toEqual(['/html']);
  });

  it('matches aliases', () => {
    const state = type(emptyEditor(), '/q');
    expect(state.palette.items.map(i => i.command)).toEqual(['/quit']);
  });

  it('hides the palette once arguments start', () => {
    expect(type(emptyEditor(), '/select src').palette.visible).toBe(false);
  });

  it('completes the selected command with tab', () => {
    const state = press(type(emptyEditor(), '/q'), { name: 'tab' });
    expect(state.buffer).toBe('/quit ');
    expect(state.cursor).toBe(6);
  });

  it('moves the palette selection with the arrows', () => {
    const state = press(type(emptyEditor(), '/'), { name: 'down' });
    const { outcome } = applyKey(state, { name: 'enter' }, OPTS);
    expect(outcome).toEqual({ type: 'submit', line: '/html ' });
  });

  it('submits plain text as typed', () => {
    const { state, outcome } = applyKey(type(emptyEditor(), 'run now'), { name: 'enter' }, OPTS);
    expect(outcome).toEqual({ type: 'submit', line: 'run now' });
    expect(state.buffer).toBe('');
    expect(state.history).toEqual(['run now']);
  });

  it('browses history with up and down', () => {
    let state = emptyEditor();
    state = press(type(state, 'a'), { name: 'enter' });
    state = press(type(state, 'b'), { name: 'enter' });
    state = press(type(state, 'b'), { name: 'enter' });
    expect(state.history).toEqual(['a', 'b']);

    state = press(state, { name: 'up' });
    expect(state.buffer).toBe('b');
    state = press(state, { name: 'up' });
    expect(state.buffer).toBe('a');
    state = press(state, { name: 'down' });
    expect(state.buffer).toBe('b');
    state = press(state, { name: 'down' });
    expect(state.buffer).toBe('');
    expect(state.historyIndex).toBeNull();
  });

  it('edits at the cursor', () => {
    const state = press(type(emptyEditor(), 'abc'), { name: 'left' }, { name: 'backspace' });
    expect(state.buffer).toBe('ac');
    expect(state.cursor).toBe(1);
  });

  it('deletes the previous word with ctrl-w', () => {
    const state = press(type(emptyEditor(), '/select some/dir'), { name: 'ctrl-w' });
    expect(state.buffer).toBe('/select ');
    expect(state.cursor).toBe(8);
  });

  it('closes on ctrl-d only when empty', () => {
    expect(applyKey(emptyEditor(), { name: 'ctrl-d' }, OPTS).outcome).toEqual({ type: 'close' });
    expect(applyKey(type(emptyEditor(), 'x'), { name: 'ctrl-d' }, OPTS).outcome).toEqual({ type: 'none' });
  });
});

// ─── Directory picker ────────────────────────────────────────────────

describe('resolvePickerAnswer', () => {
  const entries = ['libfoo', 'tools'];

  it('interprets navigation answers', () => {
    expect(resolvePickerAnswer('/tmp/proj', entries, '')).toEqual({ type: 'cancel' });
    expect(resolvePickerAnswer('/tmp/proj', entries, '.')).toEqual({ type: 'choose', path: '/tmp/proj' });
    expect(resolvePickerAnswer('/tmp/proj', entries, '..')).toEqual({ type: 'enter', path: '/tmp' });
    expect(resolvePickerAnswer('/tmp/proj', entries, '2')).toEqual({ type: 'enter', path: '/tmp/proj/tools' });
    expect(resolvePickerAnswer('/tmp/proj', entries, '3')).toEqual({ type: 'invalid', reason: 'No entry 3' });
  });
});

describe('directory helpers', () => {
  let root = '';

  afterEach(() => {
    if (root) rmSync(root, { recursive: true, force: true });
  });

  function makeTree(): string {
    root = mkdtempSync(join(tmpdir(), 'checkdesk-tree-'));
    mkdirSync(join(root, 'src'));
    mkdirSync(join(root, 'include'));
    mkdirSync(join(root, '.git'));
    writeFileSync(join(root, 'src', 'main.c'), 'int main(void) { return 0; }\n');
    writeFileSync(join(root, 'src', 'util.cpp'), '');
    writeFileSync(join(root, 'include', 'util.h'), '');
    writeFileSync(join(root, 'README.md'), '');
    return root;
  }

  it('lists visible subdirectories by name', () => {
    expect(listSubdirectories(makeTree())).toEqual(['include', 'src']);
  });

  it('enters a typed directory name', () => {
    const dir = makeTree();
    expect(resolvePickerAnswer(dir, [], 'src')).toEqual({ type: 'enter', path: join(dir, 'src') });
    expect(resolvePickerAnswer(dir, [], 'README.md')).toEqual({
      type: 'invalid',
      reason: `Not a directory: ${join(dir, 'README.md')}`,
    });
  });

  it('counts C and C++ sources', () => {
    expect(countSources(makeTree())).toBe(3);
  });
});

// ─── Command helpers ─────────────────────────────────────────────────

describe('parseSeverities', () => {
  it('matches names and prefixes', () => {
    expect(parseSeverities('warn, style bogus')).toEqual({ valid: ['warning', 'style'], invalid: ['bogus'] });
    expect(parseSeverities('PERF e')).toEqual({ valid: ['performance', 'error'], invalid: [] });
  });
});

// ─── Formatting ──────────────────────────────────────────────────────

describe('format', () => {
  it('draws a progress bar', () => {
    expect(stripAnsi(progressLine(0))).toBe('[' + '░'.repeat(20) + ']   0%');
    expect(stripAnsi(progressLine(1))).toBe('[' + '█'.repeat(20) + '] 100%');
  });

  it('marks toggles', () => {
    expect(stripAnsi(checkbox(true))).toBe('[x]');
    expect(stripAnsi(checkbox(false))).toBe('[ ]');
  });

  it('truncates with an ellipsis', () => {
    expect(trunc('src/very/long/path.c', 10)).toBe('src/very/…');
    expect(trunc('main.c', 10)).toBe('main.c');
  });
});
