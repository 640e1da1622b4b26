/**
 * checkdesk TUI — Interactive terminal interface.
 *
 * Inline REPL: stays in your terminal, slash commands with a palette,
 * Ctrl+C twice to exit. Input is paused while a command runs, so only one
 * action is ever in flight.
 */

import { createInterface } from 'node:readline';
import { resolve } from 'node:path';
import gradient from 'gradient-string';
import { Controller } from '../app/controller.js';
import { loadConfig } from '../config/index.js';
import { C, found } from './format.js';
import { InputBox } from './input.js';
import type { CommandEntry } from './editor.js';
import {
  type TuiContext,
  cmdHelp,
  cmdStatus,
  cmdSelect,
  cmdToggle,
  cmdRun,
  cmdHtml,
  cmdPdf,
  cmdInstall,
  cmdSummary,
  cmdLog,
} from './commands.js';

// ─── Command registry ────────────────────────────────────────────────

const COMMANDS = [
  '/help', '/select', '/toggle', '/run', '/html', '/pdf',
  '/summary', '/install', '/status', '/log', '/quit',
];

export const ASCII_LOGO = `
  ┌─┐┬ ┬┌─┐┌─┐┬┌─┌┬┐┌─┐┌─┐┬┌─
  │  ├─┤├┤ │  ├┴┐ ││├┤ └─┐├┴┐
  └─┘┴ ┴└─┘└─┘┴ ┴─┴┘└─┘└─┘┴ ┴
`;

/** Command palette entries for InputBox */
const PALETTE_COMMANDS: CommandEntry[] = [
  { command: '/select',  label: 'Choose project directory' },
  { command: '/toggle',  label: 'Toggle a severity filter' },
  { command: '/run',     label: 'Run cppcheck' },
  { command: '/html',    label: 'Generate HTML report' },
  { command: '/pdf',     label: 'Export report to PDF' },
  { command: '/summary', label: 'Findings by severity' },
  { command: '/install', label: 'Install missing tools' },
  { command: '/status',  label: 'Project, filters, tools' },
  { command: '/log',     label: 'Show full log' },
  { command: '/help',    label: 'Show all commands' },
  { command: '/quit',    label: 'Exit',  aliases: ['/exit', '/q'] },
];

// ─── Welcome banner ──────────────────────────────────────────────────

function printBanner(ctx: TuiContext): void {
  console.log(gradient(['#4fb3d9', '#8be9c2'])(ASCII_LOGO));
  const state = ctx.controller.snapshot;
  const W = 60;
  const pad = (s: string, vis: number) => s + ' '.repeat(Math.max(0, W - 4 - vis));
  const row = (text: string, vis: number) => C.frame('│') + ' ' + pad(text, vis) + ' ' + C.frame('│');

  const title = ' cppcheck front-end ';
  const lines: { text: string; vis: number }[] = [];

  const project = state.project ?? 'No project selected';
  lines.push({ text: state.project ? C.bold(project) : C.dim(project), vis: project.length });
  lines.push({ text: '', vis: 0 });

  const { tools, pdf_tool, missing } = state.availability;
  for (const name of Object.keys(tools)) {
    lines.push({ text: `${found(tools[name] ?? false)} ${name}`, vis: name.length + 2 });
  }
  if (pdf_tool) {
    const t = `PDF via ${pdf_tool}`;
    lines.push({ text: C.dim(t), vis: t.length });
  }
  if (missing.length) {
    lines.push({ text: '', vis: 0 });
    const t = `Missing tools: /install`;
    lines.push({ text: C.warn(t), vis: t.length });
  }

  console.log(C.frame('┌─') + C.bold(title) + C.frame('─'.repeat(Math.max(0, W - 3 - title.length)) + '┐'));
  for (const l of lines) console.log(row(l.text, l.vis));
  console.log(C.frame('└' + '─'.repeat(W - 2) + '┘'));
  console.log('');
  console.log(C.dim('  /select to choose a project · /run · /html · /pdf · /help · Ctrl+C to exit.'));
  console.log('');
}

// ─── Command dispatch ────────────────────────────────────────────────

async function dispatch(input: string, ctx: TuiContext): Promise<boolean> {
  const trimmed = input.trim();
  if (!trimmed) return true;

  if (trimmed === '/quit' || trimmed === '/exit' || trimmed === '/q') {
    return false;
  }

  if (!trimmed.startsWith('/')) {
    console.log(C.warn('  Commands start with /. Type /help.'));
    return true;
  }

  const spaceIdx = trimmed.indexOf(' ');
  const cmd = spaceIdx === -1 ? trimmed.toLowerCase() : trimmed.slice(0, spaceIdx).toLowerCase();
  const args = spaceIdx === -1 ? '' : trimmed.slice(spaceIdx + 1);

  try {
    switch (cmd) {
      case '/help':    cmdHelp(); break;
      case '/status':  cmdStatus(ctx); break;
      case '/select':  await cmdSelect(args, ctx); break;
      case '/toggle':  await cmdToggle(args, ctx); break;
      case '/run':     await cmdRun(ctx); break;
      case '/html':    await cmdHtml(ctx); break;
      case '/pdf':     await cmdPdf(ctx); break;
      case '/install': await cmdInstall(ctx); break;
      case '/summary': cmdSummary(ctx); break;
      case '/log':     cmdLog(ctx); break;
      default: {
        const matches = COMMANDS.filter(c => c.startsWith(cmd));
        if (matches.length === 1 && matches[0]) {
          return dispatch(matches[0] + ' ' + args, ctx);
        } else if (matches.length > 1) {
          console.log(C.warn(`  Ambiguous: ${matches.join(', ')}`));
        } else {
          console.log(C.warn(`  Unknown command: ${cmd}. Type /help.`));
        }
      }
    }
  } catch (err: unknown) {
    console.log(C.error(`  Error: ${err instanceof Error ? err.message : String(err)}`));
  }
  return true;
}

// ─── Main entry point ────────────────────────────────────────────────

export async function startTui(dir?: string): Promise<void> {
  const cwd = process.cwd();
  const project = dir ? resolve(cwd, dir) : null;
  const { config, warnings } = loadConfig(project ?? cwd);
  for (const w of warnings) console.log(C.warn(`  ${w}`));

  const controller = new Controller({
    project,
    severities: config.severities,
    commands: { cppcheck: config.cppcheck, html_report: config.htmlReport },
    openReports: config.openReports,
    required: config.required,
    browsers: config.browsers,
  });
  controller.onLog(chunk => process.stdout.write(chunk));
  await controller.probe();

  // Sub-prompts (the directory picker) read through readline while the
  // input box is paused
  const rl = createInterface({
    input: process.stdin,
    output: process.stdout,
    terminal: process.stdin.isTTY ?? false,
  });
  rl.pause();

  const ctx: TuiContext = { controller, config, cwd, rl };
  printBanner(ctx);

  const inputBox = new InputBox({
    placeholder: 'Type a command...',
    prompt: '›',
    commands: PALETTE_COMMANDS,
    maxPaletteItems: PALETTE_COMMANDS.length,
  });

  let exiting = false;
  function goodbye(): void {
    if (exiting) return;
    exiting = true;
    inputBox.stop();
    rl.close();
    process.exit(0);
  }

  inputBox.start(
    (line: string) => {
      inputBox.pause();
      dispatch(line, ctx).then(
        shouldContinue => shouldContinue ? inputBox.resume() : goodbye(),
        (err: unknown) => {
          console.log(C.error(`  Error: ${err instanceof Error ? err.message : String(err)}`));
          inputBox.resume();
        },
      );
    },
    () => goodbye(),
  );
}
