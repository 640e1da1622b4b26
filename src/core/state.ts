/**
 * checkdesk core — Initial application state.
 */

import type { ActionGates, AppState, SeverityFilters, ToolAvailability, ToolCommands } from '../types/index.js';

export const DEFAULT_SEVERITIES: SeverityFilters = {
  error: true,
  warning: true,
  style: false,
  performance: false,
};

export const DEFAULT_COMMANDS: ToolCommands = {
  cppcheck: 'cppcheck',
  html_report: 'cppcheck-htmlreport',
};

/** Availability before the probe has run: nothing known, nothing offered. */
export const UNPROBED: ToolAvailability = { tools: {}, missing: [], pdf_tool: null };

export interface InitialStateOptions {
  project?: string | null;
  severities?: Partial<SeverityFilters>;
  commands?: Partial<ToolCommands>;
  availability?: ToolAvailability;
  /** Pre-open action gates (headless CLI commands) */
  actions?: Partial<ActionGates>;
  openReports?: boolean;
  platform?: NodeJS.Platform;
}

export function initialState(opts: InitialStateOptions = {}): AppState {
  const availability = opts.availability ?? UNPROBED;
  return {
    project: opts.project ?? null,
    severities: { ...DEFAULT_SEVERITIES, ...opts.severities },
    availability,
    actions: {
      html: false,
      pdf: false,
      install: availability.missing.length > 0,
      ...opts.actions,
    },
    progress: 0,
    log: [],
    commands: { ...DEFAULT_COMMANDS, ...opts.commands },
    open_reports: opts.openReports ?? true,
    platform: opts.platform ?? process.platform,
  };
}
