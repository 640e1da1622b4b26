/**
 * checkdesk TUI — Input box with placeholder, history and a slash
 * command palette:
 *
 *   ──────────────────────────────────────────
 *   › type a command...
 *   ──────────────────────────────────────────
 *    /run          Run cppcheck
 *     /html        Generate HTML report
 *
 * Uses raw stdin mode for full keystroke control. Editing itself is the
 * pure model in editor.ts; this class owns the terminal.
 */

import chalk from 'chalk';
import { decodeKey } from './keys.js';
import { applyKey, emptyEditor, type CommandEntry, type EditorState } from './editor.js';

const ACCENT = '#4fb3d9';
const accent = chalk.hex(ACCENT);

export interface InputBoxOptions {
  /** Placeholder shown when input is empty */
  placeholder?: string;
  /** Prompt character (default: ›) */
  prompt?: string;
  /** Available slash commands for palette */
  commands?: CommandEntry[];
  /** Max palette items to show */
  maxPaletteItems?: number;
}

// ─── ANSI helpers ────────────────────────────────────────────────────

const ESC = '\x1b[';
const CLEAR_LINE = `${ESC}2K`;
const CURSOR_UP = (n: number) => `${ESC}${n}A`;
const CURSOR_DOWN = (n: number) => `${ESC}${n}B`;
const CURSOR_COL = (n: number) => `${ESC}${n}G`;
const CURSOR_HIDE = `${ESC}?25l`;
const CURSOR_SHOW = `${ESC}?25h`;

/** Blank lines kept below the box so a ^C echo does not land on the input */
const BOTTOM_PADDING = 3;

// ─── InputBox ────────────────────────────────────────────────────────

export class InputBox {
  private editor: EditorState = emptyEditor();
  private placeholder: string;
  private prompt: string;
  private commands: CommandEntry[];
  private maxPalette: number;
  private renderedHeight = 0;
  private cursorFromBottom = 0;
  private active = false;
  private paused = false;
  private onSubmit: ((line: string) => void) | null = null;
  private onClose: (() => void) | null = null;
  private rawHandler: ((data: Buffer) => void) | null = null;
  private exitTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(opts: InputBoxOptions = {}) {
    this.placeholder = opts.placeholder ?? 'Type a command...';
    this.prompt = opts.prompt ?? '›';
    this.commands = opts.commands ?? [];
    this.maxPalette = opts.maxPaletteItems ?? 8;
  }

  start(onSubmit: (line: string) => void, onClose: () => void): void {
    this.onSubmit = onSubmit;
    this.onClose = onClose;
    this.active = true;
    this.rawHandler = (data: Buffer) => this.handleData(data);
    this.attach();
  }

  /** Pause input while a command executes */
  pause(): void {
    this.paused = true;
    this.detach();
    this.clearRender();
  }

  /** Resume input after the command completes */
  resume(): void {
    this.paused = false;
    this.editor = emptyEditor(this.editor.history);
    this.renderedHeight = 0;
    this.cursorFromBottom = 0;
    this.attach();
  }

  stop(): void {
    this.active = false;
    this.cancelExitHint();
    this.clearRender();
    this.detach();
  }

  private attach(): void {
    if (process.stdin.isTTY) process.stdin.setRawMode(true);
    process.stdin.resume();
    if (this.rawHandler) process.stdin.on('data', this.rawHandler);
    this.render();
  }

  private detach(): void {
    if (this.rawHandler) process.stdin.removeListener('data', this.rawHandler);
    if (process.stdin.isTTY) process.stdin.setRawMode(false);
  }

  // ─── Key handling ─────────────────────────────────────────────────

  private handleData(data: Buffer): void {
    if (!this.active || this.paused) return;
    const key = decodeKey(data);

    // Ctrl+C: first press clears the line and arms exit, second exits
    if (key.name === 'ctrl-c') {
      if (this.exitTimer) {
        this.cancelExitHint();
        this.onClose?.();
        return;
      }
      this.editor = emptyEditor(this.editor.history);
      this.exitTimer = setTimeout(() => {
        this.exitTimer = null;
        this.render();
      }, 2000);
      this.render();
      return;
    }
    this.cancelExitHint();

    const { state, outcome } = applyKey(this.editor, key, {
      commands: this.commands,
      maxPalette: this.maxPalette,
    });
    this.editor = state;

    if (outcome.type === 'submit') {
      this.clearRender();
      process.stdout.write('\n');
      this.onSubmit?.(outcome.line);
      return;
    }
    if (outcome.type === 'close') {
      this.clearRender();
      this.onClose?.();
      return;
    }
    this.render();
  }

  private cancelExitHint(): void {
    if (this.exitTimer) {
      clearTimeout(this.exitTimer);
      this.exitTimer = null;
    }
  }

  // ─── Rendering ────────────────────────────────────────────────────

  private clearRender(): void {
    if (this.renderedHeight <= 0) return;

    const linesToTop = this.renderedHeight - 1 - this.cursorFromBottom;
    if (linesToTop > 0) process.stdout.write(CURSOR_UP(linesToTop));

    let out = '';
    for (let i = 0; i < this.renderedHeight; i++) {
      out += CLEAR_LINE;
      if (i < this.renderedHeight - 1) out += CURSOR_DOWN(1);
    }
    process.stdout.write(out);

    if (this.renderedHeight > 1) process.stdout.write(CURSOR_UP(this.renderedHeight - 1));
    process.stdout.write('\r');

    this.renderedHeight = 0;
    this.cursorFromBottom = 0;
  }

  private render(): void {
    if (!this.active || this.paused) return;

    const width = Math.max(30, (process.stdout.columns || 80) - 4);
    const promptWidth = this.prompt.length + 1;
    const textWidth = Math.max(1, width - promptWidth);
    const { buffer, cursor, palette } = this.editor;

    process.stdout.write(CURSOR_HIDE);
    this.clearRender();

    const lines: string[] = [];
    if (this.exitTimer) lines.push('  ' + chalk.dim('Press Ctrl+C again to exit.'));
    lines.push('  ' + chalk.dim('─'.repeat(width)));

    const promptStr = accent(this.prompt) + ' ';
    if (!buffer.length) {
      lines.push('  ' + promptStr + chalk.dim.italic(this.placeholder.slice(0, textWidth)));
    } else {
      for (let i = 0; i < buffer.length; i += textWidth) {
        const lead = i === 0 ? promptStr : ' '.repeat(promptWidth);
        lines.push('  ' + lead + buffer.slice(i, i + textWidth));
      }
    }

    lines.push('  ' + chalk.dim('─'.repeat(width)));

    const paletteLines = palette.visible ? palette.items.length : 0;
    palette.items.slice(0, paletteLines).forEach((item, i) => {
      const cmd = item.command.padEnd(14);
      if (i === palette.selected) {
        lines.push('  ' + chalk.bgHex(ACCENT).black.bold(' ' + cmd) + chalk.bgHex(ACCENT).black(' ' + item.label + ' '));
      } else {
        lines.push('    ' + accent(cmd) + chalk.dim(item.label));
      }
    });

    for (let i = 0; i < BOTTOM_PADDING; i++) lines.push('');

    process.stdout.write('\r' + lines.join('\n'));
    this.renderedHeight = lines.length;

    // Park the cursor inside the input line
    const inputLines = Math.max(1, Math.ceil(buffer.length / textWidth));
    const cursorLine = Math.min(inputLines - 1, Math.floor(cursor / textWidth));
    const cursorCol = cursor - cursorLine * textWidth;
    const fromBottom = BOTTOM_PADDING + paletteLines + 1 + (inputLines - 1 - cursorLine);

    process.stdout.write(CURSOR_UP(fromBottom));
    process.stdout.write(CURSOR_COL(2 + promptWidth + cursorCol + 1));
    process.stdout.write(CURSOR_SHOW);
    this.cursorFromBottom = fromBottom;
  }
}
