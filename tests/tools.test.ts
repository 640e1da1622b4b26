import { describe, it, expect } from 'vitest';
import { installInvocation, openInvocation, toolEnv, whichCommand } from '../src/tools/platform.js';
import { isToolAvailable, probeTools, PDF_BROWSERS, REQUIRED_TOOLS } from '../src/tools/probe.js';
import { describeLaunchError, runTool, type ToolRunner } from '../src/tools/runner.js';
import { openUri } from '../src/tools/opener.js';
import type { ToolInvocation, ToolResult } from '../src/types/index.js';

function fixedRunner(result: ToolResult, calls: ToolInvocation[] = []): ToolRunner {
  return async (invocation) => {
    calls.push(invocation);
    return result;
  };
}

function pathRunner(installed: string[]): ToolRunner {
  return async ({ args }) => {
    const name = args[0] ?? '';
    return installed.includes(name)
      ? { ok: true, status: 0, stdout: `/usr/bin/${name}\n`, stderr: '' }
      : { ok: true, status: 1, stdout: '', stderr: `which: no ${name} in PATH\n` };
  };
}

// ─── Platform commands ───────────────────────────────────────────────

describe('platform commands', () => {
  it('looks tools up with which, or where on Windows', () => {
    expect(whichCommand('linux')).toBe('which');
    expect(whichCommand('darwin')).toBe('which');
    expect(whichCommand('win32')).toBe('where');
  });

  it('opens URIs with the desktop handler', () => {
    const uri = 'file:///tmp/proj/report.pdf';
    expect(openInvocation(uri, 'linux')).toEqual({ command: 'xdg-open', args: [uri] });
    expect(openInvocation(uri, 'darwin')).toEqual({ command: 'open', args: [uri] });
    expect(openInvocation(uri, 'win32')).toEqual({ command: 'cmd', args: ['/c', 'start', '', uri] });
  });

  it('installs through the platform package manager', () => {
    const pkgs = ['cppcheck', 'google-chrome'];
    expect(installInvocation(pkgs, 'linux')).toEqual({
      command: 'sudo',
      args: ['apt-get', 'install', '-y', 'cppcheck', 'google-chrome'],
    });
    expect(installInvocation(pkgs, 'darwin')).toEqual({ command: 'brew', args: ['install', 'cppcheck', 'google-chrome'] });
    expect(installInvocation(pkgs, 'win32')).toEqual({ command: 'choco', args: ['install', '-y', 'cppcheck', 'google-chrome'] });
  });

  it('disables GIO proxies for spawned tools', () => {
    expect(toolEnv({ PATH: '/usr/bin' })).toEqual({ PATH: '/usr/bin', GIO_USE_PROXY: 'none' });
  });
});

// ─── Probe ───────────────────────────────────────────────────────────

describe('isToolAvailable', () => {
  it('requires exit 0 and a printed path', async () => {
    expect(await isToolAvailable('cppcheck', pathRunner(['cppcheck']), 'linux')).toBe(true);
    expect(await isToolAvailable('cppcheck', pathRunner([]), 'linux')).toBe(false);
    expect(await isToolAvailable('cppcheck', fixedRunner({ ok: true, status: 0, stdout: '  \n', stderr: '' }))).toBe(false);
  });

  it('counts a lookup that cannot start as not found', async () => {
    expect(await isToolAvailable('cppcheck', fixedRunner({ ok: false, error: 'which not found' }))).toBe(false);
  });

  it('uses where on Windows', async () => {
    const calls: ToolInvocation[] = [];
    await isToolAvailable('cppcheck', fixedRunner({ ok: true, status: 1, stdout: '', stderr: '' }, calls), 'win32');
    expect(calls).toEqual([{ command: 'where', args: ['cppcheck'] }]);
  });
});

describe('probeTools', () => {
  it('lists missing required tools and picks the first browser found', async () => {
    const availability = await probeTools({ run: pathRunner(['cppcheck', 'chromium-browser', 'chromium']), platform: 'linux' });
    expect(availability.missing).toEqual(['cppcheck-htmlreport', 'google-chrome']);
    expect(availability.pdf_tool).toBe('chromium-browser');
    expect(Object.keys(availability.tools)).toEqual([
      'cppcheck', 'cppcheck-htmlreport', 'google-chrome', 'chromium-browser', 'chromium',
    ]);
  });

  it('prefers google-chrome when present', async () => {
    const availability = await probeTools({ run: pathRunner(['google-chrome', 'chromium']), platform: 'linux' });
    expect(availability.pdf_tool).toBe('google-chrome');
  });

  it('has no PDF tool without a browser', async () => {
    const availability = await probeTools({ run: pathRunner(['cppcheck', 'cppcheck-htmlreport']), platform: 'linux' });
    expect(availability.pdf_tool).toBeNull();
    expect(availability.missing).toEqual(['google-chrome']);
  });

  it('honours custom tool lists', async () => {
    const availability = await probeTools({
      run: pathRunner(['cppcheck']),
      required: ['cppcheck'],
      browsers: ['brave-browser'],
      platform: 'linux',
    });
    expect(availability).toEqual({
      tools: { cppcheck: true, 'brave-browser': false },
      missing: [],
      pdf_tool: null,
    });
  });

  it('exports the default tool lists', () => {
    expect(REQUIRED_TOOLS).toEqual(['cppcheck', 'cppcheck-htmlreport', 'google-chrome']);
    expect(PDF_BROWSERS).toEqual(['google-chrome', 'chromium-browser', 'chromium']);
  });
});

// ─── Runner ──────────────────────────────────────────────────────────

describe('describeLaunchError', () => {
  it('names a missing binary', () => {
    const err = Object.assign(new Error('spawn cppcheck ENOENT'), { code: 'ENOENT' });
    expect(describeLaunchError('cppcheck', err)).toBe('cppcheck not found');
  });

  it('names a binary without execute permission', () => {
    const err = Object.assign(new Error('spawn ./tool EACCES'), { code: 'EACCES' });
    expect(describeLaunchError('./tool', err)).toBe('./tool is not executable');
  });

  it('falls back to the error message', () => {
    expect(describeLaunchError('cppcheck', new Error('boom'))).toBe('boom');
  });
});

describe('runTool', () => {
  it('captures both streams and the exit status', async () => {
    const result = await runTool({
      command: process.execPath,
      args: ['-e', "process.stdout.write('out'); process.stderr.write('err'); process.exit(3)"],
    });
    expect(result).toMatchObject({ ok: true, status: 3, stdout: 'out', stderr: 'err' });
  });

  it('keeps multibyte text intact across pipe chunks', async () => {
    const text = 'x' + 'я'.repeat(100000);
    const result = await runTool({
      command: process.execPath,
      args: ['-e', `const t = 'x' + 'я'.repeat(100000); process.stdout.write(t); process.stderr.write(t)`],
    });
    if (!result.ok) throw new Error(result.error);
    expect(result.stdout).toBe(text);
    expect(result.stderr).toBe(text);
    expect(Buffer.from(result.stderr_bytes ?? []).equals(Buffer.from(text, 'utf-8'))).toBe(true);
  });

  it('keeps the exact stderr bytes when they are not UTF-8', async () => {
    const result = await runTool({
      command: process.execPath,
      args: ['-e', 'process.stderr.write(Buffer.from([0x3c, 0xe9, 0x3e]))'],
    });
    if (!result.ok) throw new Error(result.error);
    expect([...(result.stderr_bytes ?? [])]).toEqual([0x3c, 0xe9, 0x3e]);
    expect(result.stderr).toBe('<\uFFFD>');
  });

  it('passes GIO_USE_PROXY=none to the child', async () => {
    const result = await runTool({
      command: process.execPath,
      args: ['-e', 'process.stdout.write(String(process.env.GIO_USE_PROXY))'],
    });
    expect(result).toMatchObject({ ok: true, status: 0, stdout: 'none', stderr: '' });
  });

  it('reports a binary that cannot be started', async () => {
    const result = await runTool({ command: 'checkdesk-test-no-such-tool', args: [] });
    expect(result).toEqual({ ok: false, error: 'checkdesk-test-no-such-tool not found' });
  });
});

// ─── Opener ──────────────────────────────────────────────────────────

describe('openUri', () => {
  it('returns null when the handler succeeds', async () => {
    const calls: ToolInvocation[] = [];
    const error = await openUri('file:///tmp/a.pdf', fixedRunner({ ok: true, status: 0, stdout: '', stderr: '' }, calls), 'darwin');
    expect(error).toBeNull();
    expect(calls).toEqual([{ command: 'open', args: ['file:///tmp/a.pdf'] }]);
  });

  it('describes a nonzero exit', async () => {
    const error = await openUri('file:///tmp/a.pdf', fixedRunner({ ok: true, status: 4, stdout: '', stderr: 'no handler\n' }), 'linux');
    expect(error).toBe('exited with code 4: no handler');
  });

  it('passes on a launch error', async () => {
    const error = await openUri('file:///tmp/a.pdf', fixedRunner({ ok: false, error: 'xdg-open not found' }), 'linux');
    expect(error).toBe('xdg-open not found');
  });
});
