/**
 * checkdesk — Library entry point.
 *
 * Usage:
 *   import { Controller, update, initialState } from 'checkdesk';
 *   import { probeTools, runTool, loadConfig, loadSummary } from 'checkdesk';
 *   import type { AppState, AppEvent, Effect } from 'checkdesk';
 */

export * from './types/index.js';
export { update, line, MSG } from './core/update.js';
export { initialState, DEFAULT_SEVERITIES, DEFAULT_COMMANDS, UNPROBED } from './core/state.js';
export type { InitialStateOptions } from './core/state.js';
export {
  reportPaths,
  fileUri,
  enableList,
  analysisInvocation,
  xmlInvocation,
  reportTitle,
  htmlReportInvocation,
  pdfInvocation,
  XML_FILE,
  REPORT_DIR,
  PDF_FILE,
} from './core/args.js';
export type { ReportPaths } from './core/args.js';
export { Controller } from './app/controller.js';
export type { ControllerOptions, LogListener } from './app/controller.js';
export { EffectRunner, nodeFileSystem } from './app/effects.js';
export type { FileSystem, EffectRunnerDeps } from './app/effects.js';
export { runTool, createToolRunner, describeLaunchError } from './tools/runner.js';
export type { ToolRunner, RunToolOptions } from './tools/runner.js';
export { probeTools, isToolAvailable, REQUIRED_TOOLS, PDF_BROWSERS } from './tools/probe.js';
export { openUri } from './tools/opener.js';
export { whichCommand, openInvocation, installInvocation, toolEnv } from './tools/platform.js';
export { loadConfig, projectConfigPath, globalConfigPath, ConfigSchema } from './config/index.js';
export type { SavedConfig, ResolvedConfig, LoadedConfig } from './config/index.js';
export { parseFindings, summarizeFindings, loadSummary, emptySummary, FINDING_SEVERITIES } from './report/index.js';
export { startTui } from './tui/index.js';
