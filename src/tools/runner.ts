/**
 * checkdesk tools — Run an external tool and capture its output.
 *
 * Every subprocess (cppcheck, the HTML renderer, the browser, the package
 * manager, the default-handler opener) goes through `runTool`, so all call
 * sites share one result type:
 *
 *   { ok: true, status, stdout, stderr }   the process ran (any exit status)
 *   { ok: false, error }                   the process could not be started
 *
 * Output is decoded as UTF-8 for the log (invalid bytes become U+FFFD);
 * the raw stderr bytes are kept alongside for cppcheck's XML.
 *
 * Arguments are passed as an array; no shell is involved.
 */

import { spawn, type ChildProcessByStdio } from 'node:child_process';
import type { Readable } from 'node:stream';
import type { ToolInvocation, ToolResult } from '../types/index.js';
import { toolEnv } from './platform.js';

export type ToolRunner = (invocation: ToolInvocation) => Promise<ToolResult>;

export interface RunToolOptions {
  env?: NodeJS.ProcessEnv;
}

/** Describe a spawn error, distinguishing a missing binary. */
export function describeLaunchError(command: string, err: Error): string {
  const code = 'code' in err ? err.code : undefined;
  if (code === 'ENOENT') return `${command} not found`;
  if (code === 'EACCES') return `${command} is not executable`;
  return err.message;
}

export function runTool(invocation: ToolInvocation, opts: RunToolOptions = {}): Promise<ToolResult> {
  const { command, args, cwd } = invocation;

  return new Promise<ToolResult>((resolve) => {
    let settled = false;
    const finish = (result: ToolResult) => {
      if (settled) return;
      settled = true;
      resolve(result);
    };

    let child: ChildProcessByStdio<null, Readable, Readable>;
    try {
      child = spawn(command, args, {
        cwd,
        stdio: ['ignore', 'pipe', 'pipe'],
        env: opts.env ?? toolEnv(),
      });
    } catch (err: unknown) {
      const error = err instanceof Error ? describeLaunchError(command, err) : String(err);
      finish({ ok: false, error });
      return;
    }

    // Decoded once on close so multibyte characters split across chunks survive
    const stdout: Buffer[] = [];
    const stderr: Buffer[] = [];

    child.stdout.on('data', (data: Buffer) => {
      stdout.push(data);
    });

    child.stderr.on('data', (data: Buffer) => {
      stderr.push(data);
    });

    child.on('error', (err: Error) => {
      finish({ ok: false, error: describeLaunchError(command, err) });
    });

    child.on('close', (code: number | null) => {
      const stderrBytes = Buffer.concat(stderr);
      finish({
        ok: true,
        status: code,
        stdout: Buffer.concat(stdout).toString('utf-8'),
        stderr: stderrBytes.toString('utf-8'),
        stderr_bytes: stderrBytes,
      });
    });
  });
}

/** A ToolRunner bound to fixed options. */
export function createToolRunner(opts: RunToolOptions = {}): ToolRunner {
  return (invocation) => runTool(invocation, opts);
}
