/**
 * checkdesk core — Command-line argument builders for the external tools.
 *
 *   cppcheck [--enable=<list>] <path>
 *   cppcheck --xml --xml-version=2 <path>
 *   cppcheck-htmlreport --file <xml> --report-dir <dir> --source-dir <path> --title <t>
 *   <browser> --headless --disable-gpu --print-to-pdf=<pdf> <index uri>
 */

import { basename, join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { ENABLE_ORDER, type SeverityFilters, type ToolInvocation } from '../types/index.js';

// ─── Artifact layout ─────────────────────────────────────────────────

export const XML_FILE = 'cppcheck.xml';
export const REPORT_DIR = 'html_report';
export const PDF_FILE = 'report.pdf';

export interface ReportPaths {
  xml: string;
  reportDir: string;
  index: string;
  pdf: string;
}

export function reportPaths(project: string): ReportPaths {
  const reportDir = join(project, REPORT_DIR);
  return {
    xml: join(project, XML_FILE),
    reportDir,
    index: join(reportDir, 'index.html'),
    pdf: join(project, PDF_FILE),
  };
}

/** file:// URI for an absolute path */
export function fileUri(absPath: string): string {
  return pathToFileURL(absPath).href;
}

// ─── Analysis ────────────────────────────────────────────────────────

/**
 * Comma list for `--enable=`, or null when nothing is selected.
 * `error` is always on in cppcheck and is never listed.
 */
export function enableList(severities: SeverityFilters): string | null {
  const levels = ENABLE_ORDER.filter(s => severities[s]);
  return levels.length ? levels.join(',') : null;
}

export function analysisInvocation(cppcheck: string, project: string, severities: SeverityFilters): ToolInvocation {
  const args: string[] = [];
  const levels = enableList(severities);
  if (levels) args.push(`--enable=${levels}`);
  args.push(project);
  return { command: cppcheck, args };
}

/** Structured output goes to stderr by cppcheck's convention. */
export function xmlInvocation(cppcheck: string, project: string): ToolInvocation {
  return { command: cppcheck, args: ['--xml', '--xml-version=2', project] };
}

// ─── Reports ─────────────────────────────────────────────────────────

export function reportTitle(project: string): string {
  return `Report - ${basename(project) || 'project'}`;
}

export function htmlReportInvocation(htmlReport: string, project: string): ToolInvocation {
  const paths = reportPaths(project);
  return {
    command: htmlReport,
    args: [
      '--file', paths.xml,
      '--report-dir', paths.reportDir,
      '--source-dir', project,
      '--title', reportTitle(project),
    ],
  };
}

export function pdfInvocation(browser: string, project: string): ToolInvocation {
  const paths = reportPaths(project);
  return {
    command: browser,
    args: [
      '--headless',
      '--disable-gpu',
      `--print-to-pdf=${paths.pdf}`,
      fileUri(paths.index),
    ],
  };
}
