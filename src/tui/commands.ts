/**
 * checkdesk TUI — Command implementations.
 *
 * Each command takes (args, ctx), drives the controller and prints
 * directly. Log chunks produced by an action are echoed by the log
 * subscriber installed in index.ts, not here.
 */

import { resolve } from 'node:path';
import type { Interface } from 'node:readline';
import fg from 'fast-glob';
import type { Controller } from '../app/controller.js';
import type { ResolvedConfig } from '../config/index.js';
import { describeConfigSource } from '../config/index.js';
import { enableList, reportPaths } from '../core/args.js';
import { FINDING_SEVERITIES, loadSummary } from '../report/index.js';
import { SEVERITY_FILTERS, type SeverityFilter } from '../types/index.js';
import { C, checkbox, fileLink, formatTable, found, progressLine, severityText, trunc } from './format.js';
import { pickDirectory } from './picker.js';

// ─── Shared context ──────────────────────────────────────────────────

export interface TuiContext {
  controller: Controller;
  config: ResolvedConfig;
  /** Directory relative /select arguments resolve against */
  cwd: string;
  /** readline interface for sub-prompts */
  rl: Interface;
}

/** Prompt the user for a single line (used while the input box is paused). */
function ask(ctx: TuiContext, prompt: string): Promise<string> {
  return new Promise(res => {
    process.stdout.write(prompt);
    ctx.rl.resume();
    ctx.rl.once('line', (answer: string) => {
      ctx.rl.pause();
      res(answer.trim());
    });
  });
}

const SOURCE_GLOB = '**/*.{c,cc,cpp,cxx,c++,h,hh,hpp,hxx}';

/** Number of C/C++ sources under `dir` (informational only). */
export function countSources(dir: string): number {
  try {
    return fg.sync(SOURCE_GLOB, {
      cwd: dir,
      ignore: ['**/node_modules/**', '**/.git/**', '**/html_report/**'],
      suppressErrors: true,
    }).length;
  } catch {
    return 0;
  }
}

/** Parse severity names from /toggle arguments. */
export function parseSeverities(args: string): { valid: SeverityFilter[]; invalid: string[] } {
  const valid: SeverityFilter[] = [];
  const invalid: string[] = [];
  for (const word of args.split(/[\s,]+/).filter(Boolean)) {
    const name = word.toLowerCase();
    const match = SEVERITY_FILTERS.find(s => s === name || s.startsWith(name));
    if (match) valid.push(match);
    else invalid.push(word);
  }
  return { valid, invalid };
}

function filtersLine(ctx: TuiContext): string {
  const sev = ctx.controller.snapshot.severities;
  return SEVERITY_FILTERS.map(s => `${checkbox(sev[s])} ${s}`).join('  ');
}

function requireProject(ctx: TuiContext): string | null {
  const project = ctx.controller.snapshot.project;
  if (!project) console.log(C.warn('  No project selected. Use /select first.'));
  return project;
}

// ─── /help ───────────────────────────────────────────────────────────

export function cmdHelp(): void {
  console.log('');
  console.log(C.bold('  Commands'));
  console.log('');

  const cmds: [string, string][] = [
    ['/select [dir]',        'Choose the project directory (no argument: browse)'],
    ['/toggle <severity>',   'Toggle error | warning | style | performance'],
    ['', ''],
    ['/run',                 'Run cppcheck on the project'],
    ['/html',                'Generate the HTML report and open it'],
    ['/pdf',                 'Print the HTML report to PDF and open it'],
    ['/summary',             'Findings by severity from cppcheck.xml'],
    ['', ''],
    ['/install',             'Install missing tools with the package manager'],
    ['/status',              'Project, filters, tools and actions'],
    ['/log',                 'Show the full log'],
    ['/help',                'This help'],
    ['/quit',                'Exit'],
  ];

  for (const [cmd, desc] of cmds) {
    if (!cmd) { console.log(''); continue; }
    console.log(`  ${C.bold(cmd.padEnd(22))} ${C.dim(desc)}`);
  }

  console.log('');
  console.log(C.dim('  Tab to autocomplete · ↑↓ history · Ctrl+C twice to exit'));
  console.log('');
}

// ─── /status ─────────────────────────────────────────────────────────

export function cmdStatus(ctx: TuiContext): void {
  const state = ctx.controller.snapshot;
  const { availability, actions } = state;

  console.log('');
  console.log(`  ${C.bold('Project')}    ${state.project ? fileLink(state.project) : C.dim('none selected')}`);
  console.log(`  ${C.bold('Filters')}    ${filtersLine(ctx)}`);
  const levels = enableList(state.severities);
  console.log(`  ${C.bold('Arguments')}  ${C.dim(levels ? `--enable=${levels}` : '(none)')}`);
  console.log(`  ${C.bold('Progress')}   ${progressLine(state.progress)}`);
  console.log('');

  const names = Object.keys(availability.tools);
  if (names.length) {
    const rows = names.map(name => [name, availability.tools[name] ? 'found' : 'missing']);
    for (const l of formatTable([{ header: 'Tool', width: 22 }, { header: 'Status', width: 8 }], rows)) {
      console.log('  ' + l);
    }
    console.log('');
  }
  console.log(`  ${C.bold('PDF via')}    ${availability.pdf_tool ?? C.dim('no headless browser')}`);
  console.log(`  ${C.bold('Actions')}    html ${found(actions.html)}  pdf ${found(actions.pdf)}  install ${found(actions.install)}`);
  console.log(`  ${C.bold('Config')}     ${C.dim(describeConfigSource(ctx.config))}`);
  console.log('');
}

// ─── /select ─────────────────────────────────────────────────────────

export async function cmdSelect(args: string, ctx: TuiContext): Promise<void> {
  let chosen: string | null;
  if (args.trim()) {
    chosen = resolve(ctx.cwd, args.trim());
  } else {
    const start = ctx.controller.snapshot.project ?? ctx.cwd;
    chosen = await pickDirectory(start, prompt => ask(ctx, prompt));
  }

  if (!chosen) {
    await ctx.controller.dispatch({ type: 'cancel-selection' });
    console.log(C.dim('  Selection cancelled.'));
    return;
  }

  await ctx.controller.selectProject(chosen);
  const sources = countSources(chosen);
  console.log(`  ${C.success('✓')} Project: ${C.bold(chosen)}`);
  console.log(C.dim(`    ${sources} C/C++ source file${sources === 1 ? '' : 's'} found`));
  console.log('');
}

// ─── /toggle ─────────────────────────────────────────────────────────

export async function cmdToggle(args: string, ctx: TuiContext): Promise<void> {
  const { valid, invalid } = parseSeverities(args);
  if (!valid.length && !invalid.length) {
    console.log(C.warn('  Usage: /toggle <error|warning|style|performance>'));
    return;
  }
  for (const word of invalid) {
    console.log(C.warn(`  Unknown severity: ${word}`));
  }
  for (const severity of valid) {
    await ctx.controller.toggleSeverity(severity);
  }
  console.log(`  ${filtersLine(ctx)}`);
  if (valid.includes('error')) {
    console.log(C.dim('  (error diagnostics are always reported by cppcheck)'));
  }
  console.log('');
}

// ─── /run ────────────────────────────────────────────────────────────

export async function cmdRun(ctx: TuiContext): Promise<void> {
  if (!requireProject(ctx)) return;

  console.log(`  ${progressLine(0)}`);
  const state = await ctx.controller.dispatch({ type: 'run-analysis' });
  console.log(`  ${progressLine(state.progress)}`);

  if (state.actions.html) {
    console.log(C.dim('  /html to build the report'));
  } else {
    console.log(C.error(`  Could not start ${state.commands.cppcheck}. Try /install.`));
  }
  console.log('');
}

// ─── /html ───────────────────────────────────────────────────────────

export async function cmdHtml(ctx: TuiContext): Promise<void> {
  if (!requireProject(ctx)) return;
  if (!ctx.controller.snapshot.actions.html) {
    console.log(C.warn('  Run /run first.'));
    return;
  }
  await ctx.controller.dispatch({ type: 'generate-html' });
  console.log('');
}

// ─── /pdf ────────────────────────────────────────────────────────────

export async function cmdPdf(ctx: TuiContext): Promise<void> {
  if (!requireProject(ctx)) return;
  if (!ctx.controller.snapshot.actions.pdf) {
    console.log(C.warn('  Run /run first.'));
    return;
  }
  await ctx.controller.dispatch({ type: 'generate-pdf' });
  console.log('');
}

// ─── /install ────────────────────────────────────────────────────────

export async function cmdInstall(ctx: TuiContext): Promise<void> {
  const state = ctx.controller.snapshot;
  if (!state.actions.install) {
    console.log(state.availability.missing.length
      ? C.warn('  Installation already attempted. Restart to probe again.')
      : C.dim('  All required tools are installed.'));
    return;
  }
  console.log(C.dim(`  Missing: ${state.availability.missing.join(', ')}`));
  await ctx.controller.dispatch({ type: 'install-dependencies' });
  console.log('');
}

// ─── /summary ────────────────────────────────────────────────────────

export function cmdSummary(ctx: TuiContext): void {
  const project = requireProject(ctx);
  if (!project) return;

  const summary = loadSummary(project);
  if (!summary) {
    console.log(C.warn(`  No ${reportPaths(project).xml} yet. Run /html first.`));
    return;
  }

  console.log('');
  console.log(`  ${C.bold(String(summary.total))} finding${summary.total === 1 ? '' : 's'}`);
  console.log('');
  for (const sev of FINDING_SEVERITIES) {
    const n = summary.by_severity[sev];
    if (n > 0) console.log(`  ${String(n).padStart(5)}  ${severityText(sev)}`);
  }

  const top = summary.findings.slice(0, 10);
  if (top.length) {
    console.log('');
    const rows = top.map(f => [
      f.severity,
      f.file ? `${trunc(f.file, 28)}${f.line !== null ? ':' + f.line : ''}` : '',
      f.message,
    ]);
    for (const l of formatTable([
      { header: 'Severity', width: 11 },
      { header: 'Location', width: 34 },
      { header: 'Message', width: 60 },
    ], rows)) {
      console.log('  ' + l);
    }
    if (summary.findings.length > top.length) {
      console.log(C.dim(`  … ${summary.findings.length - top.length} more in the HTML report`));
    }
  }
  console.log('');
}

// ─── /log ────────────────────────────────────────────────────────────

export function cmdLog(ctx: TuiContext): void {
  const log = ctx.controller.snapshot.log;
  if (!log.length) {
    console.log(C.dim('  Log is empty.'));
    return;
  }
  console.log('');
  process.stdout.write(log.join(''));
  console.log('');
}
