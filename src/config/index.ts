/**
 * checkdesk — Configuration resolution.
 *
 * Resolution order (highest to lowest priority):
 *   1. Project config: <dir>/.checkdesk/config.json
 *   2. Global config:  ~/.config/checkdesk/config.json
 *   3. Built-in defaults
 *
 * Files are validated against a zod schema. A file that cannot be read or
 * does not validate is skipped with a warning; it never stops the app.
 */

import { existsSync, readFileSync } from 'node:fs';
import { join } from 'node:path';
import { homedir } from 'node:os';
import { z } from 'zod';
import type { SeverityFilters } from '../types/index.js';
import { DEFAULT_COMMANDS, DEFAULT_SEVERITIES } from '../core/state.js';
import { PDF_BROWSERS, REQUIRED_TOOLS } from '../tools/probe.js';

// ─── Schema ──────────────────────────────────────────────────────────

const command = z.string().trim().min(1);

export const ConfigSchema = z.object({
  cppcheck: command.optional(),
  htmlReport: command.optional(),
  browsers: z.array(command).optional(),
  required: z.array(command).optional(),
  severities: z.object({
    error: z.boolean().optional(),
    warning: z.boolean().optional(),
    style: z.boolean().optional(),
    performance: z.boolean().optional(),
  }).strict().optional(),
  openReports: z.boolean().optional(),
}).strict();

export type SavedConfig = z.infer<typeof ConfigSchema>;

export interface ResolvedConfig {
  cppcheck: string;
  htmlReport: string;
  browsers: string[];
  required: string[];
  severities: SeverityFilters;
  openReports: boolean;
  /** Files that contributed, highest priority first */
  sources: string[];
}

export interface LoadedConfig {
  config: ResolvedConfig;
  warnings: string[];
}

const CONFIG_DIR = '.checkdesk';
const CONFIG_FILE = 'config.json';

// ─── Config file paths ───────────────────────────────────────────────

/** Project-level config: <root>/.checkdesk/config.json */
export function projectConfigPath(root: string): string {
  return join(root, CONFIG_DIR, CONFIG_FILE);
}

/** Global config: ~/.config/checkdesk/config.json */
export function globalConfigPath(home: string = homedir()): string {
  return join(home, '.config', 'checkdesk', CONFIG_FILE);
}

// ─── Read helpers ────────────────────────────────────────────────────

type ReadResult =
  | { status: 'absent' }
  | { status: 'ok'; config: SavedConfig }
  | { status: 'invalid'; reason: string };

function readConfigFile(path: string): ReadResult {
  if (!existsSync(path)) return { status: 'absent' };

  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err: unknown) {
    return { status: 'invalid', reason: err instanceof Error ? err.message : String(err) };
  }

  const parsed = ConfigSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length ? `${issue.path.join('.')}: ` : '';
    return { status: 'invalid', reason: `${where}${issue?.message ?? 'invalid config'}` };
  }
  return { status: 'ok', config: parsed.data };
}

// ─── Resolution ──────────────────────────────────────────────────────

export function loadConfig(root: string | null, opts: { home?: string } = {}): LoadedConfig {
  const paths = [
    ...(root ? [projectConfigPath(root)] : []),
    globalConfigPath(opts.home),
  ];

  const layers: SavedConfig[] = [];
  const sources: string[] = [];
  const warnings: string[] = [];

  for (const path of paths) {
    const result = readConfigFile(path);
    if (result.status === 'ok') {
      layers.push(result.config);
      sources.push(path);
    } else if (result.status === 'invalid') {
      warnings.push(`Ignoring ${path}: ${result.reason}`);
    }
  }

  // Lowest priority first so later layers win
  const merged = layers.reverse().reduce<SavedConfig>((acc, layer) => ({
    ...acc,
    ...layer,
    severities: { ...acc.severities, ...layer.severities },
  }), {});

  return {
    config: {
      cppcheck: merged.cppcheck ?? DEFAULT_COMMANDS.cppcheck,
      htmlReport: merged.htmlReport ?? DEFAULT_COMMANDS.html_report,
      browsers: merged.browsers ?? [...PDF_BROWSERS],
      required: merged.required ?? [...REQUIRED_TOOLS],
      severities: { ...DEFAULT_SEVERITIES, ...merged.severities },
      openReports: merged.openReports ?? true,
      sources,
    },
    warnings,
  };
}

/** Describe where the active configuration came from */
export function describeConfigSource(config: ResolvedConfig): string {
  return config.sources.length ? config.sources.join(', ') : 'defaults';
}
