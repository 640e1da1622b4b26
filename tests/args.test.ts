import { describe, it, expect } from 'vitest';
import {
  analysisInvocation,
  enableList,
  fileUri,
  htmlReportInvocation,
  pdfInvocation,
  reportPaths,
  reportTitle,
  xmlInvocation,
} from '../src/core/args.js';
import { parseEnableOption } from '../src/cli/options.js';
import { ENABLE_ORDER, SEVERITY_FILTERS, type SeverityFilters } from '../src/types/index.js';

const PROJECT = '/tmp/proj';

function filters(on: string[]): SeverityFilters {
  return {
    error: on.includes('error'),
    warning: on.includes('warning'),
    style: on.includes('style'),
    performance: on.includes('performance'),
  };
}

// ─── Report layout ───────────────────────────────────────────────────

describe('reportPaths', () => {
  it('places every artifact inside the project', () => {
    expect(reportPaths(PROJECT)).toEqual({
      xml: '/tmp/proj/cppcheck.xml',
      reportDir: '/tmp/proj/html_report',
      index: '/tmp/proj/html_report/index.html',
      pdf: '/tmp/proj/report.pdf',
    });
  });
});

describe('fileUri', () => {
  it('percent-encodes spaces', () => {
    expect(fileUri('/tmp/my proj/index.html')).toBe('file:///tmp/my%20proj/index.html');
  });

  it('escapes characters that would start a fragment or query', () => {
    const uri = fileUri('/home/u/proj#1/html_report/index.html');
    expect(uri).toBe('file:///home/u/proj%231/html_report/index.html');
    expect(new URL(uri).pathname).toBe('/home/u/proj%231/html_report/index.html');
    expect(fileUri('/tmp/what?/report.pdf')).toBe('file:///tmp/what%3F/report.pdf');
  });

  it('points the PDF print at the escaped index', () => {
    expect(pdfInvocation('chromium', '/home/u/proj#1').args[3]).toBe('file:///home/u/proj%231/html_report/index.html');
  });
});

// ─── Analysis arguments ──────────────────────────────────────────────

describe('enableList', () => {
  it('forwards exactly the selected non-error levels, in order', () => {
    // every combination of the four filters
    for (let mask = 0; mask < 16; mask++) {
      const on = SEVERITY_FILTERS.filter((_, i) => mask & (1 << i));
      const list = enableList(filters(on));
      const expected = ENABLE_ORDER.filter(s => on.includes(s));
      expect(list).toBe(expected.length ? expected.join(',') : null);
    }
  });

  it('never lists error', () => {
    expect(enableList(filters(['error']))).toBeNull();
    expect(enableList(filters(['error', 'style']))).toBe('style');
  });
});

describe('analysisInvocation', () => {
  it('uses the default filters', () => {
    expect(analysisInvocation('cppcheck', PROJECT, filters(['error', 'warning']))).toEqual({
      command: 'cppcheck',
      args: ['--enable=warning', '/tmp/proj'],
    });
  });

  it('joins several levels with commas', () => {
    expect(analysisInvocation('cppcheck', PROJECT, filters(['warning', 'style', 'performance'])).args)
      .toEqual(['--enable=warning,style,performance', '/tmp/proj']);
  });

  it('omits --enable when nothing is selected', () => {
    expect(analysisInvocation('cppcheck', PROJECT, filters([])).args).toEqual(['/tmp/proj']);
  });
});

describe('xmlInvocation', () => {
  it('requests version 2 XML', () => {
    expect(xmlInvocation('cppcheck', PROJECT)).toEqual({
      command: 'cppcheck',
      args: ['--xml', '--xml-version=2', '/tmp/proj'],
    });
  });
});

// ─── Report arguments ────────────────────────────────────────────────

describe('htmlReportInvocation', () => {
  it('passes the XML, report dir, sources and title', () => {
    expect(htmlReportInvocation('cppcheck-htmlreport', PROJECT)).toEqual({
      command: 'cppcheck-htmlreport',
      args: [
        '--file', '/tmp/proj/cppcheck.xml',
        '--report-dir', '/tmp/proj/html_report',
        '--source-dir', '/tmp/proj',
        '--title', 'Report - proj',
      ],
    });
  });
});

describe('reportTitle', () => {
  it('falls back when the path has no basename', () => {
    expect(reportTitle('/')).toBe('Report - project');
  });
});

describe('pdfInvocation', () => {
  it('prints the HTML index headlessly', () => {
    expect(pdfInvocation('chromium', PROJECT)).toEqual({
      command: 'chromium',
      args: [
        '--headless',
        '--disable-gpu',
        '--print-to-pdf=/tmp/proj/report.pdf',
        'file:///tmp/proj/html_report/index.html',
      ],
    });
  });
});

// ─── --enable option ─────────────────────────────────────────────────

describe('parseEnableOption', () => {
  it('sets every forwardable level explicitly', () => {
    expect(parseEnableOption('style, Performance')).toEqual({
      warning: false,
      style: true,
      performance: true,
    });
  });

  it('clears all levels for none', () => {
    expect(parseEnableOption('none')).toEqual({ warning: false, style: false, performance: false });
  });

  it('rejects unknown names', () => {
    expect(() => parseEnableOption('warning,portability')).toThrow(
      'Unknown severity "portability" (expected warning, style, performance or none)',
    );
  });
});
