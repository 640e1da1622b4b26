/**
 * checkdesk Report — Findings summary from cppcheck's XML (version 2) output.
 *
 *   <results version="2">
 *     <errors>
 *       <error id="unusedVariable" severity="style" msg="Unused variable: x">
 *         <location file="main.c" line="3" column="9"/>
 *       </error>
 *     </errors>
 *   </results>
 *
 * Only the attributes needed for counting and listing are read; the first
 * <location> of each error is its primary location.
 */

import { existsSync, readFileSync } from 'node:fs';
import type { Finding, FindingSeverity, FindingsSummary } from '../types/index.js';
import { reportPaths } from '../core/args.js';

export const FINDING_SEVERITIES: readonly FindingSeverity[] = [
  'error', 'warning', 'style', 'performance', 'portability', 'information',
];

const ENTITIES: Record<string, string> = {
  '&quot;': '"', '&apos;': "'", '&lt;': '<', '&gt;': '>', '&amp;': '&',
};

function decodeEntities(value: string): string {
  return value.replace(/&(?:quot|apos|lt|gt|amp);/g, m => ENTITIES[m] ?? m);
}

function parseAttributes(raw: string): Map<string, string> {
  const attrs = new Map<string, string>();
  const re = /([\w:-]+)="([^"]*)"/g;
  let m: RegExpExecArray | null;
  while ((m = re.exec(raw)) !== null) {
    attrs.set(m[1], decodeEntities(m[2]));
  }
  return attrs;
}

function toSeverity(value: string | undefined): FindingSeverity {
  const s = (value || '').toLowerCase();
  return FINDING_SEVERITIES.find(f => f === s) ?? 'information';
}

export function emptySummary(): FindingsSummary {
  return {
    total: 0,
    by_severity: { error: 0, warning: 0, style: 0, performance: 0, portability: 0, information: 0 },
    findings: [],
  };
}

export function parseFindings(xml: string): Finding[] {
  const findings: Finding[] = [];
  const errorRe = /<error\b([^>]*?)(\/?)>/g;
  let m: RegExpExecArray | null;

  while ((m = errorRe.exec(xml)) !== null) {
    const attrs = parseAttributes(m[1]);
    let file: string | null = null;
    let line: number | null = null;

    // Locations live between the opening tag and </error>
    if (m[2] !== '/') {
      const end = xml.indexOf('</error>', errorRe.lastIndex);
      const body = xml.slice(errorRe.lastIndex, end === -1 ? undefined : end);
      const loc = body.match(/<location\b([^>]*?)\/?>/);
      if (loc) {
        const locAttrs = parseAttributes(loc[1]);
        file = locAttrs.get('file') ?? null;
        const n = parseInt(locAttrs.get('line') ?? '', 10);
        line = Number.isNaN(n) ? null : n;
      }
    }

    findings.push({
      id: attrs.get('id') ?? 'unknown',
      severity: toSeverity(attrs.get('severity')),
      message: attrs.get('msg') ?? '',
      file,
      line,
    });
  }

  return findings;
}

export function summarizeFindings(xml: string): FindingsSummary {
  const summary = emptySummary();
  for (const f of parseFindings(xml)) {
    summary.findings.push(f);
    summary.by_severity[f.severity]++;
    summary.total++;
  }
  return summary;
}

/** Summary of `<project>/cppcheck.xml`, or null if it has not been written yet. */
export function loadSummary(project: string): FindingsSummary | null {
  const xmlPath = reportPaths(project).xml;
  if (!existsSync(xmlPath)) return null;
  return summarizeFindings(readFileSync(xmlPath, 'utf-8'));
}
