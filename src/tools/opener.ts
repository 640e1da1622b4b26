/**
 * checkdesk tools — Open a file URI with the desktop's default handler.
 */

import { openInvocation, type Platform } from './platform.js';
import type { ToolRunner } from './runner.js';

/** Returns null on success, otherwise the reason the handler failed. */
export async function openUri(uri: string, run: ToolRunner, platform?: Platform): Promise<string | null> {
  const result = await run(openInvocation(uri, platform));
  if (!result.ok) return result.error;
  if (result.status !== 0) {
    const detail = result.stderr.trim();
    return `exited with code ${result.status}${detail ? ': ' + detail.slice(0, 200) : ''}`;
  }
  return null;
}
