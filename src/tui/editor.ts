/**
 * checkdesk TUI — Line editor model behind the input box.
 *
 * Pure: given the current editor state and a decoded key, returns the next
 * state and what the input box should do (nothing, submit, or close).
 * Rendering and raw-mode handling live in input.ts.
 */

import type { Key } from './keys.js';

export interface CommandEntry {
  command: string;   // e.g. "/run"
  label: string;     // e.g. "Run cppcheck"
  aliases?: string[];
}

export interface PaletteState {
  visible: boolean;
  items: CommandEntry[];
  selected: number;
}

export interface EditorState {
  buffer: string;
  cursor: number;
  palette: PaletteState;
  /** Submitted lines, oldest first */
  history: string[];
  /** Position while browsing history, null when editing a fresh line */
  historyIndex: number | null;
}

export type EditorOutcome =
  | { type: 'none' }
  | { type: 'submit'; line: string }
  | { type: 'close' };

export interface EditorOptions {
  commands: CommandEntry[];
  maxPalette: number;
}

const NONE: EditorOutcome = { type: 'none' };

export function emptyEditor(history: string[] = []): EditorState {
  return {
    buffer: '',
    cursor: 0,
    palette: { visible: false, items: [], selected: 0 },
    history,
    historyIndex: null,
  };
}

// ─── Command palette ─────────────────────────────────────────────────

export function filterPalette(buffer: string, opts: EditorOptions, selected = 0): PaletteState {
  const trimmed = buffer.trimStart();

  // Only while typing the command word
  if (!trimmed.startsWith('/') || trimmed.includes(' ')) {
    return { visible: false, items: [], selected: 0 };
  }

  const filter = trimmed.toLowerCase();
  const items = opts.commands.filter(c => {
    if (c.command.toLowerCase().startsWith(filter)) return true;
    if (c.aliases?.some(a => a.toLowerCase().startsWith(filter))) return true;
    if (filter.length > 1 && c.label.toLowerCase().includes(filter.slice(1))) return true;
    return false;
  }).slice(0, opts.maxPalette);

  return {
    visible: items.length > 0,
    items,
    selected: Math.min(selected, Math.max(0, items.length - 1)),
  };
}

function edit(state: EditorState, buffer: string, cursor: number, opts: EditorOptions): EditorState {
  return {
    ...state,
    buffer,
    cursor,
    palette: filterPalette(buffer, opts, state.palette.selected),
    historyIndex: null,
  };
}

function acceptSelection(state: EditorState, opts: EditorOptions): EditorState {
  const selected = state.palette.visible ? state.palette.items[state.palette.selected] : undefined;
  if (!selected) return state;
  const buffer = selected.command + ' ';
  return edit(state, buffer, buffer.length, opts);
}

function recall(state: EditorState, index: number | null): EditorState {
  const buffer = index === null ? '' : (state.history[index] ?? '');
  return { ...state, buffer, cursor: buffer.length, historyIndex: index };
}

// ─── Key handling ────────────────────────────────────────────────────

export function applyKey(state: EditorState, key: Key, opts: EditorOptions): { state: EditorState; outcome: EditorOutcome } {
  const { buffer, cursor } = state;

  switch (key.name) {
    case 'enter': {
      const next = acceptSelection(state, opts);
      const line = next.buffer;
      const history = line.trim() && state.history[state.history.length - 1] !== line.trim()
        ? [...state.history, line.trim()]
        : state.history;
      return { state: emptyEditor(history), outcome: { type: 'submit', line } };
    }

    case 'ctrl-d':
      return buffer.length === 0 ? { state, outcome: { type: 'close' } } : { state, outcome: NONE };

    case 'tab':
      return { state: acceptSelection(state, opts), outcome: NONE };

    case 'escape':
      return { state: { ...state, palette: { ...state.palette, visible: false } }, outcome: NONE };

    case 'up': {
      if (state.palette.visible) {
        const selected = Math.max(0, state.palette.selected - 1);
        return { state: { ...state, palette: { ...state.palette, selected } }, outcome: NONE };
      }
      if (!state.history.length) return { state, outcome: NONE };
      const index = state.historyIndex === null
        ? state.history.length - 1
        : Math.max(0, state.historyIndex - 1);
      return { state: recall(state, index), outcome: NONE };
    }

    case 'down': {
      if (state.palette.visible) {
        const selected = Math.min(state.palette.items.length - 1, state.palette.selected + 1);
        return { state: { ...state, palette: { ...state.palette, selected } }, outcome: NONE };
      }
      if (state.historyIndex === null) return { state, outcome: NONE };
      const index = state.historyIndex + 1 < state.history.length ? state.historyIndex + 1 : null;
      return { state: recall(state, index), outcome: NONE };
    }

    case 'left':
      return { state: { ...state, cursor: Math.max(0, cursor - 1) }, outcome: NONE };
    case 'right':
      return { state: { ...state, cursor: Math.min(buffer.length, cursor + 1) }, outcome: NONE };
    case 'home':
    case 'ctrl-a':
      return { state: { ...state, cursor: 0 }, outcome: NONE };
    case 'end':
    case 'ctrl-e':
      return { state: { ...state, cursor: buffer.length }, outcome: NONE };

    case 'delete':
      if (cursor >= buffer.length) return { state, outcome: NONE };
      return { state: edit(state, buffer.slice(0, cursor) + buffer.slice(cursor + 1), cursor, opts), outcome: NONE };

    case 'backspace':
      if (cursor === 0) return { state, outcome: NONE };
      return { state: edit(state, buffer.slice(0, cursor - 1) + buffer.slice(cursor), cursor - 1, opts), outcome: NONE };

    case 'ctrl-k':
      return { state: edit(state, buffer.slice(0, cursor), cursor, opts), outcome: NONE };

    case 'ctrl-u':
      return { state: edit(state, buffer.slice(cursor), 0, opts), outcome: NONE };

    case 'ctrl-w': {
      const before = buffer.slice(0, cursor).replace(/\S+\s*$/, '');
      return { state: edit(state, before + buffer.slice(cursor), before.length, opts), outcome: NONE };
    }

    case 'text':
      return {
        state: edit(state, buffer.slice(0, cursor) + key.text + buffer.slice(cursor), cursor + key.text.length, opts),
        outcome: NONE,
      };

    // ctrl-c is handled by the input box (double-tap to exit)
    case 'ctrl-c':
    case 'unknown':
      return { state, outcome: NONE };
  }
}
