/**
 * checkdesk tools — Platform-specific commands.
 *
 * Lookup, default-handler and package-manager invocations differ per OS.
 * Every function takes the platform explicitly (defaulting to the current
 * one) so the choices can be exercised from tests.
 */

import type { ToolInvocation } from '../types/index.js';

export type Platform = NodeJS.Platform;

/** Command to check if a binary exists ('which', 'where' on Windows) */
export function whichCommand(platform: Platform = process.platform): string {
  return platform === 'win32' ? 'where' : 'which';
}

/** Open a URI with the desktop's default handler. */
export function openInvocation(uri: string, platform: Platform = process.platform): ToolInvocation {
  if (platform === 'darwin') return { command: 'open', args: [uri] };
  if (platform === 'win32') return { command: 'cmd', args: ['/c', 'start', '', uri] };
  return { command: 'xdg-open', args: [uri] };
}

/** Elevated package-manager install of exactly `packages`. */
export function installInvocation(packages: string[], platform: Platform = process.platform): ToolInvocation {
  if (platform === 'darwin') return { command: 'brew', args: ['install', ...packages] };
  if (platform === 'win32') return { command: 'choco', args: ['install', '-y', ...packages] };
  return { command: 'sudo', args: ['apt-get', 'install', '-y', ...packages] };
}

/**
 * Environment for every spawned tool. GIO proxy modules are disabled so
 * xdg-open and friends do not fail inside sandboxed desktops.
 */
export function toolEnv(base: NodeJS.ProcessEnv = process.env): NodeJS.ProcessEnv {
  return { ...base, GIO_USE_PROXY: 'none' };
}
