/**
 * checkdesk app — Effect runner.
 *
 * Executes the effects returned by `update` and turns each outcome into a
 * result event. Nothing here throws for an expected failure: a tool that
 * cannot start, a file that cannot be written, or a handler that refuses
 * the URI all come back as data.
 */

import { existsSync } from 'node:fs';
import { writeFile } from 'node:fs/promises';
import type { Effect, ResultEvent } from '../types/index.js';
import { openUri } from '../tools/opener.js';
import type { Platform } from '../tools/platform.js';
import type { ToolRunner } from '../tools/runner.js';

export interface FileSystem {
  writeFile(path: string, contents: string | Uint8Array): Promise<void>;
  exists(path: string): Promise<boolean>;
}

export const nodeFileSystem: FileSystem = {
  writeFile: (path, contents) => writeFile(path, contents),
  exists: async (path) => existsSync(path),
};

export interface EffectRunnerDeps {
  run: ToolRunner;
  fs?: FileSystem;
  platform?: Platform;
}

export class EffectRunner {
  private run: ToolRunner;
  private fs: FileSystem;
  private platform: Platform | undefined;

  constructor(deps: EffectRunnerDeps) {
    this.run = deps.run;
    this.fs = deps.fs ?? nodeFileSystem;
    this.platform = deps.platform;
  }

  async execute(effect: Effect): Promise<ResultEvent> {
    switch (effect.kind) {
      case 'run-tool': {
        const result = await this.run(effect.invocation);
        return { type: 'tool-finished', step: effect.step, project: effect.project, result };
      }

      case 'write-file': {
        let error: string | null = null;
        try {
          await this.fs.writeFile(effect.path, effect.contents);
        } catch (err: unknown) {
          error = err instanceof Error ? err.message : String(err);
        }
        return { type: 'file-written', project: effect.project, path: effect.path, error };
      }

      case 'check-file': {
        const exists = await this.fs.exists(effect.path);
        return { type: 'file-checked', project: effect.project, path: effect.path, exists };
      }

      case 'open-uri': {
        const error = await openUri(effect.uri, this.run, this.platform);
        return { type: 'uri-opened', report: effect.report, error };
      }
    }
  }
}
