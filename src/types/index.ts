/**
 * checkdesk — Core type definitions.
 *
 * The application is modelled as explicit state plus events and effects:
 * `update(state, event)` is pure and returns the next state together with
 * the effects (subprocesses, file writes, URI opens) an EffectRunner must
 * perform. Effect results come back as events.
 */

// ─── Severity filters ────────────────────────────────────────────────

export type SeverityFilter = 'error' | 'warning' | 'style' | 'performance';

export const SEVERITY_FILTERS: readonly SeverityFilter[] = ['error', 'warning', 'style', 'performance'];

/** Filters that are forwarded through `--enable=`, in argument order. */
export const ENABLE_ORDER: readonly SeverityFilter[] = ['warning', 'style', 'performance'];

export type SeverityFilters = Record<SeverityFilter, boolean>;

// ─── Tool results ────────────────────────────────────────────────────

/** The tool process started and exited (any exit status). */
export interface ToolCompleted {
  ok: true;
  status: number | null;
  stdout: string;
  stderr: string;
  /** stderr exactly as the process wrote it, when the runner captured bytes */
  stderr_bytes?: Uint8Array;
}

/** The tool process could not be started at all. */
export interface ToolLaunchError {
  ok: false;
  error: string;
}

export type ToolResult = ToolCompleted | ToolLaunchError;

export interface ToolInvocation {
  command: string;
  args: string[];
  cwd?: string;
}

// ─── Tool availability ───────────────────────────────────────────────

export interface ToolAvailability {
  /** executable name → reachable on PATH */
  tools: Record<string, boolean>;
  /** Required executables that were not found */
  missing: string[];
  /** First reachable headless browser, if any */
  pdf_tool: string | null;
}

// ─── Application state ───────────────────────────────────────────────

export interface ActionGates {
  html: boolean;
  pdf: boolean;
  install: boolean;
}

export interface AppState {
  project: string | null;
  severities: SeverityFilters;
  availability: ToolAvailability;
  actions: ActionGates;
  /** 0 before an analysis run, 1 once it has returned */
  progress: number;
  /** Append-only log chunks */
  log: readonly string[];
  commands: ToolCommands;
  /** Open produced reports with the default handler */
  open_reports: boolean;
  platform: NodeJS.Platform;
}

/** Executable names used for each role. */
export interface ToolCommands {
  cppcheck: string;
  html_report: string;
}

// ─── Effects ─────────────────────────────────────────────────────────

/** Which pipeline step a tool invocation belongs to. */
export type ToolStep = 'analysis' | 'xml' | 'html' | 'pdf' | 'install';

export type ReportKind = 'html' | 'pdf';

export type Effect =
  | { kind: 'run-tool'; step: ToolStep; project: string | null; invocation: ToolInvocation }
  | { kind: 'write-file'; project: string; path: string; contents: string | Uint8Array }
  | { kind: 'check-file'; project: string; path: string }
  | { kind: 'open-uri'; report: ReportKind; uri: string };

// ─── Events ──────────────────────────────────────────────────────────

/** Events triggered by the user. */
export type UserEvent =
  | { type: 'select-project'; path: string }
  | { type: 'cancel-selection' }
  | { type: 'set-severity'; severity: SeverityFilter; enabled: boolean }
  | { type: 'toggle-severity'; severity: SeverityFilter }
  | { type: 'run-analysis' }
  | { type: 'generate-html' }
  | { type: 'generate-pdf' }
  | { type: 'install-dependencies' };

/** Events produced by executing effects. */
export type ResultEvent =
  | { type: 'probe-completed'; availability: ToolAvailability }
  | { type: 'tool-finished'; step: ToolStep; project: string | null; result: ToolResult }
  | { type: 'file-written'; project: string; path: string; error: string | null }
  | { type: 'file-checked'; project: string; path: string; exists: boolean }
  | { type: 'uri-opened'; report: ReportKind; error: string | null };

export type AppEvent = UserEvent | ResultEvent;

export interface Transition {
  state: AppState;
  effects: Effect[];
}

// ─── Findings summary ────────────────────────────────────────────────

export type FindingSeverity =
  | 'error' | 'warning' | 'style' | 'performance' | 'portability' | 'information';

export interface Finding {
  id: string;
  severity: FindingSeverity;
  message: string;
  file: string | null;
  line: number | null;
}

export interface FindingsSummary {
  total: number;
  by_severity: Record<FindingSeverity, number>;
  findings: Finding[];
}
