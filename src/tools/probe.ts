/**
 * checkdesk tools — Tool availability probe.
 *
 * A plain existence check: `which <name>` (or `where` on Windows) must exit
 * 0 and print a path. Any lookup failure counts as "not found"; permission
 * problems are not distinguished from absence.
 */

import type { ToolAvailability } from '../types/index.js';
import { whichCommand, type Platform } from './platform.js';
import type { ToolRunner } from './runner.js';

/** Executables offered to the dependency installer when missing. */
export const REQUIRED_TOOLS: readonly string[] = ['cppcheck', 'cppcheck-htmlreport', 'google-chrome'];

/** Headless-capable browsers, most preferred first. */
export const PDF_BROWSERS: readonly string[] = ['google-chrome', 'chromium-browser', 'chromium'];

export interface ProbeOptions {
  run: ToolRunner;
  required?: readonly string[];
  browsers?: readonly string[];
  platform?: Platform;
}

export async function isToolAvailable(name: string, run: ToolRunner, platform?: Platform): Promise<boolean> {
  const result = await run({ command: whichCommand(platform), args: [name] });
  return result.ok && result.status === 0 && result.stdout.trim().length > 0;
}

/**
 * Look up every required tool and browser once.
 * Each name is checked a single time even if it appears in both lists.
 */
export async function probeTools(opts: ProbeOptions): Promise<ToolAvailability> {
  const required = opts.required ?? REQUIRED_TOOLS;
  const browsers = opts.browsers ?? PDF_BROWSERS;
  const names = [...new Set([...required, ...browsers])];

  const tools: Record<string, boolean> = {};
  for (const name of names) {
    tools[name] = await isToolAvailable(name, opts.run, opts.platform);
  }

  return {
    tools,
    missing: required.filter(name => !tools[name]),
    pdf_tool: browsers.find(name => tools[name]) ?? null,
  };
}
