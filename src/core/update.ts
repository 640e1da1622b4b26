/**
 * checkdesk core — State transitions.
 *
 * `update` is pure: it never spawns, writes or opens anything itself.
 * It returns the next state plus the effects to perform; the EffectRunner
 * executes them and feeds the outcome back in as result events.
 *
 * Pipelines:
 *   run-analysis  → run-tool(analysis) → tool-finished
 *   generate-html → run-tool(xml) → write-file → run-tool(html) → open-uri
 *   generate-pdf  → run-tool(pdf) → check-file → open-uri
 *   install-dependencies → run-tool(install)
 */

import {
  analysisInvocation,
  fileUri,
  htmlReportInvocation,
  pdfInvocation,
  reportPaths,
  xmlInvocation,
} from './args.js';
import { installInvocation } from '../tools/platform.js';
import type { AppEvent, AppState, Effect, ResultEvent, ToolCompleted, Transition, UserEvent } from '../types/index.js';

// ─── Log messages ────────────────────────────────────────────────────

export const MSG = {
  installing: 'Installing missing utilities...',
  running: (path: string) => `Running cppcheck on ${path}`,
  generatingHtml: (path: string) => `Generating HTML report for ${path}`,
  xmlLaunchFailed: 'Error running cppcheck --xml',
  xmlWriteFailed: 'Failed to write XML report',
  htmlLaunchFailed: 'Error generating HTML report',
  htmlSaved: (dir: string) => `HTML report saved to ${dir}`,
  htmlOpenFailed: (reason: string) => `Failed to open HTML report: ${reason}`,
  generatingPdf: (path: string) => `Generating PDF report for ${path}`,
  noPdfTool: 'No PDF utility available',
  pdfLaunchFailed: 'Error generating PDF report',
  pdfMissing: 'PDF report was not generated',
  pdfSaved: (file: string) => `PDF report saved to ${file}`,
  pdfOpenFailed: (reason: string) => `Failed to open PDF report: ${reason}`,
} as const;

// ─── Helpers ─────────────────────────────────────────────────────────

/** A log line as it is stored in the buffer. */
export function line(text: string): string {
  return text + '\n';
}

function append(state: AppState, ...chunks: string[]): AppState {
  const added = chunks.filter(c => c.length > 0);
  if (!added.length) return state;
  return { ...state, log: [...state.log, ...added] };
}

/** Captured output, stdout first then stderr. */
function output(result: ToolCompleted): string[] {
  return [result.stdout, result.stderr];
}

function none(state: AppState): Transition {
  return { state, effects: [] };
}

// ─── Update ──────────────────────────────────────────────────────────

export function update(state: AppState, event: AppEvent): Transition {
  switch (event.type) {
    case 'select-project':
    case 'cancel-selection':
    case 'set-severity':
    case 'toggle-severity':
    case 'run-analysis':
    case 'generate-html':
    case 'generate-pdf':
    case 'install-dependencies':
      return onUserEvent(state, event);
    default:
      return onResultEvent(state, event);
  }
}

function onUserEvent(state: AppState, event: UserEvent): Transition {
  switch (event.type) {
    case 'select-project':
      return none({ ...state, project: event.path });

    case 'cancel-selection':
      return none(state);

    case 'set-severity':
      return none({ ...state, severities: { ...state.severities, [event.severity]: event.enabled } });

    case 'toggle-severity':
      return none({
        ...state,
        severities: { ...state.severities, [event.severity]: !state.severities[event.severity] },
      });

    case 'run-analysis': {
      const project = state.project;
      if (!project) return none(state);
      const next = { ...append(state, line(MSG.running(project))), progress: 0 };
      return {
        state: next,
        effects: [{
          kind: 'run-tool',
          step: 'analysis',
          project,
          invocation: analysisInvocation(state.commands.cppcheck, project, state.severities),
        }],
      };
    }

    case 'generate-html': {
      const project = state.project;
      if (!project || !state.actions.html) return none(state);
      return {
        state: append(state, line(MSG.generatingHtml(project))),
        effects: [{
          kind: 'run-tool',
          step: 'xml',
          project,
          invocation: xmlInvocation(state.commands.cppcheck, project),
        }],
      };
    }

    case 'generate-pdf': {
      const project = state.project;
      if (!project || !state.actions.pdf) return none(state);
      const browser = state.availability.pdf_tool;
      if (!browser) return none(append(state, line(MSG.noPdfTool)));
      return {
        state: append(state, line(MSG.generatingPdf(project))),
        effects: [{
          kind: 'run-tool',
          step: 'pdf',
          project,
          invocation: pdfInvocation(browser, project),
        }],
      };
    }

    case 'install-dependencies': {
      const missing = state.availability.missing;
      if (!state.actions.install || !missing.length) return none(state);
      const next = append({ ...state, actions: { ...state.actions, install: false } }, line(MSG.installing));
      return {
        state: next,
        effects: [{
          kind: 'run-tool',
          step: 'install',
          project: null,
          invocation: installInvocation(missing, state.platform),
        }],
      };
    }
  }
}

function onResultEvent(state: AppState, event: ResultEvent): Transition {
  switch (event.type) {
    case 'probe-completed':
      return none({
        ...state,
        availability: event.availability,
        actions: { ...state.actions, install: event.availability.missing.length > 0 },
      });

    case 'tool-finished':
      return onToolFinished(state, event);

    case 'file-written': {
      if (event.error !== null) return none(append(state, line(MSG.xmlWriteFailed)));
      return {
        state,
        effects: [{
          kind: 'run-tool',
          step: 'html',
          project: event.project,
          invocation: htmlReportInvocation(state.commands.html_report, event.project),
        }],
      };
    }

    case 'file-checked': {
      if (!event.exists) return none(append(state, line(MSG.pdfMissing)));
      const next = append(state, line(MSG.pdfSaved(event.path)));
      return {
        state: next,
        effects: state.open_reports ? [{ kind: 'open-uri', report: 'pdf', uri: fileUri(event.path) }] : [],
      };
    }

    case 'uri-opened': {
      if (event.error === null) return none(state);
      const msg = event.report === 'html' ? MSG.htmlOpenFailed(event.error) : MSG.pdfOpenFailed(event.error);
      return none(append(state, line(msg)));
    }
  }
}

function onToolFinished(
  state: AppState,
  event: Extract<ResultEvent, { type: 'tool-finished' }>,
): Transition {
  const { result, project } = event;

  switch (event.step) {
    case 'analysis': {
      if (!result.ok) return none({ ...state, progress: 1 });
      const next = append(state, ...output(result));
      return none({ ...next, progress: 1, actions: { ...next.actions, html: true, pdf: true } });
    }

    case 'install':
      return none(result.ok ? append(state, ...output(result)) : state);

    case 'xml': {
      if (!result.ok || !project) return none(append(state, line(MSG.xmlLaunchFailed)));
      const effect: Effect = {
        kind: 'write-file',
        project,
        path: reportPaths(project).xml,
        contents: result.stderr_bytes ?? result.stderr,
      };
      return { state, effects: [effect] };
    }

    case 'html': {
      if (!result.ok || !project) return none(append(state, line(MSG.htmlLaunchFailed)));
      const paths = reportPaths(project);
      const next = append(state, line(MSG.htmlSaved(paths.reportDir)));
      return {
        state: next,
        effects: state.open_reports ? [{ kind: 'open-uri', report: 'html', uri: fileUri(paths.index) }] : [],
      };
    }

    case 'pdf': {
      if (!result.ok || !project) return none(append(state, line(MSG.pdfLaunchFailed)));
      return { state, effects: [{ kind: 'check-file', project, path: reportPaths(project).pdf }] };
    }
  }
}
