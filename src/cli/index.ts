#!/usr/bin/env node

/**
 * checkdesk CLI
 *
 * Usage:
 *   checkdesk [dir]                 Interactive terminal UI (optionally preselect dir)
 *   checkdesk probe                 Show which external tools are available
 *   checkdesk run <dir>             Run cppcheck with the configured filters
 *   checkdesk html <dir>            Build the HTML report (cppcheck.xml + html_report/)
 *   checkdesk pdf <dir>             Print html_report/index.html to report.pdf
 *   checkdesk summary <dir>         Findings by severity from cppcheck.xml
 *   checkdesk install               Install missing tools with the package manager
 */

import { Command } from 'commander';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import gradient from 'gradient-string';
import { Controller } from '../app/controller.js';
import { loadConfig } from '../config/index.js';
import { reportPaths } from '../core/args.js';
import { line, MSG } from '../core/update.js';
import { loadSummary, FINDING_SEVERITIES } from '../report/index.js';
import { startTui, ASCII_LOGO } from '../tui/index.js';
import { C, found, severityText } from '../tui/format.js';
import { parseEnableOption } from './options.js';

const program = new Command();

/** Version from package.json (source checkout or dist/ build). */
function getVersion(): string {
  for (const rel of ['../../package.json', '../../../package.json']) {
    const pkgUrl = new URL(rel, import.meta.url);
    if (!existsSync(pkgUrl)) continue;
    const pkg: unknown = JSON.parse(readFileSync(pkgUrl, 'utf-8'));
    if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
      return pkg.version;
    }
  }
  return '0.0.0';
}

interface ControllerFlags {
  enable?: string;
  open?: boolean;
  /** Open the report gates without a preceding run */
  reports?: boolean;
}

function createController(dir: string | null, flags: ControllerFlags = {}): Controller {
  const project = dir ? resolve(dir) : null;
  const { config, warnings } = loadConfig(project ?? process.cwd());
  for (const w of warnings) console.error(C.warn(w));

  const severities = flags.enable !== undefined
    ? { ...config.severities, ...parseEnableOption(flags.enable) }
    : config.severities;

  const controller = new Controller({
    project,
    severities,
    commands: { cppcheck: config.cppcheck, html_report: config.htmlReport },
    openReports: flags.open ?? config.openReports,
    required: config.required,
    browsers: config.browsers,
    actions: flags.reports ? { html: true, pdf: true } : undefined,
  });
  controller.onLog(chunk => process.stdout.write(chunk));
  return controller;
}

function fail(err: unknown): never {
  console.error(C.error(`Error: ${err instanceof Error ? err.message : String(err)}`));
  process.exit(1);
}

program
  .name('checkdesk')
  .description('Terminal front-end for cppcheck: run analysis, build HTML and PDF reports.')
  .version(getVersion())
  .addHelpText('before', gradient(['#4fb3d9', '#8be9c2'])(ASCII_LOGO))
  .argument('[dir]', 'Project directory to preselect')
  .action(async (dir?: string) => {
    await startTui(dir);
  });

// ─── probe ───────────────────────────────────────────────────────────

program
  .command('probe')
  .description('Check which external tools are reachable on PATH')
  .action(async () => {
    const controller = createController(null);
    const { availability } = await controller.probe();
    for (const [name, ok] of Object.entries(availability.tools)) {
      console.log(`  ${found(ok)} ${name}`);
    }
    console.log('');
    console.log(`  PDF via: ${availability.pdf_tool ?? C.dim('none')}`);
    if (availability.missing.length) {
      console.log(C.warn(`  Missing: ${availability.missing.join(', ')}  (checkdesk install)`));
    }
  });

// ─── run ─────────────────────────────────────────────────────────────

program
  .command('run')
  .description('Run cppcheck on a directory and print its output')
  .argument('<dir>', 'Project directory')
  .option('-e, --enable <list>', 'Comma list of warning,style,performance (or "none")')
  .action(async (dir: string, opts: { enable?: string }) => {
    let controller: Controller;
    try {
      controller = createController(dir, { enable: opts.enable });
    } catch (err: unknown) {
      fail(err);
    }
    const state = await controller.dispatch({ type: 'run-analysis' });
    if (!state.actions.html) {
      console.error(C.error(`Could not start ${state.commands.cppcheck}`));
      process.exit(1);
    }
  });

// ─── html ────────────────────────────────────────────────────────────

program
  .command('html')
  .description('Write cppcheck.xml and render html_report/ with cppcheck-htmlreport')
  .argument('<dir>', 'Project directory')
  .option('--no-open', 'Do not open the report when done')
  .action(async (dir: string, opts: { open: boolean }) => {
    const controller = createController(dir, { open: opts.open, reports: true });
    const state = await controller.dispatch({ type: 'generate-html' });
    const project = state.project ?? resolve(dir);
    const saved = line(MSG.htmlSaved(reportPaths(project).reportDir));
    process.exit(state.log.includes(saved) ? 0 : 1);
  });

// ─── pdf ─────────────────────────────────────────────────────────────

program
  .command('pdf')
  .description('Print the HTML report to report.pdf with a headless browser')
  .argument('<dir>', 'Project directory')
  .option('--no-open', 'Do not open the PDF when done')
  .action(async (dir: string, opts: { open: boolean }) => {
    const controller = createController(dir, { open: opts.open, reports: true });
    await controller.probe();
    const state = await controller.dispatch({ type: 'generate-pdf' });
    const project = state.project ?? resolve(dir);
    const saved = line(MSG.pdfSaved(reportPaths(project).pdf));
    process.exit(state.log.includes(saved) ? 0 : 1);
  });

// ─── summary ─────────────────────────────────────────────────────────

program
  .command('summary')
  .description('Count findings by severity in <dir>/cppcheck.xml')
  .argument('<dir>', 'Project directory')
  .option('--json', 'Output as JSON')
  .action((dir: string, opts: { json?: boolean }) => {
    const project = resolve(dir);
    const summary = loadSummary(project);
    if (!summary) {
      fail(new Error(`${reportPaths(project).xml} not found. Run: checkdesk html ${dir}`));
    }
    if (opts.json) {
      console.log(JSON.stringify(summary, null, 2));
      return;
    }
    console.log(`${summary.total} finding(s)`);
    for (const sev of FINDING_SEVERITIES) {
      const n = summary.by_severity[sev];
      if (n > 0) console.log(`  ${String(n).padStart(5)}  ${severityText(sev)}`);
    }
  });

// ─── install ─────────────────────────────────────────────────────────

program
  .command('install')
  .description('Install missing tools with the platform package manager (elevated)')
  .action(async () => {
    const controller = createController(null);
    const { availability } = await controller.probe();
    if (!availability.missing.length) {
      console.log('All required tools are installed.');
      return;
    }
    console.log(C.dim(`Missing: ${availability.missing.join(', ')}`));
    await controller.dispatch({ type: 'install-dependencies' });
  });

program.parseAsync().catch(fail);
