/**
 * checkdesk app — Controller.
 *
 * Owns the single AppState. User events go through `dispatch`, which runs
 * `update`, executes the returned effects in order and feeds each result
 * back in until the chain settles. One chain runs at a time.
 *
 * Newly appended log chunks are pushed to subscribers (the TUI echoes them
 * to the terminal, the CLI prints them).
 */

import { resolve } from 'node:path';
import type { AppEvent, AppState, SeverityFilter } from '../types/index.js';
import { update } from '../core/update.js';
import { initialState, type InitialStateOptions } from '../core/state.js';
import { probeTools } from '../tools/probe.js';
import { createToolRunner, type ToolRunner } from '../tools/runner.js';
import { EffectRunner, type FileSystem } from './effects.js';

export type LogListener = (chunk: string) => void;

export interface ControllerOptions extends InitialStateOptions {
  run?: ToolRunner;
  fs?: FileSystem;
  /** Tools offered to the installer when missing */
  required?: readonly string[];
  /** Headless browser preference list */
  browsers?: readonly string[];
}

export class Controller {
  private state: AppState;
  private effects: EffectRunner;
  private run: ToolRunner;
  private listeners = new Set<LogListener>();
  private busy = false;
  private required: readonly string[] | undefined;
  private browsers: readonly string[] | undefined;

  constructor(opts: ControllerOptions = {}) {
    this.state = initialState(opts);
    this.run = opts.run ?? createToolRunner();
    this.effects = new EffectRunner({ run: this.run, fs: opts.fs, platform: this.state.platform });
    this.required = opts.required;
    this.browsers = opts.browsers;
  }

  get snapshot(): AppState {
    return this.state;
  }

  /** Subscribe to appended log chunks. Returns an unsubscribe function. */
  onLog(listener: LogListener): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  async dispatch(event: AppEvent): Promise<AppState> {
    if (this.busy) {
      throw new Error('Another action is still running');
    }
    this.busy = true;
    try {
      const queue: AppEvent[] = [event];
      let next = queue.shift();
      while (next) {
        const before = this.state.log.length;
        const transition = update(this.state, next);
        this.state = transition.state;
        this.emit(this.state.log.slice(before));
        for (const effect of transition.effects) {
          queue.push(await this.effects.execute(effect));
        }
        next = queue.shift();
      }
      return this.state;
    } finally {
      this.busy = false;
    }
  }

  // ─── Convenience actions ──────────────────────────────────────────

  /** Check tool availability and record it. */
  async probe(): Promise<AppState> {
    const availability = await probeTools({
      run: this.run,
      required: this.required,
      browsers: this.browsers,
      platform: this.state.platform,
    });
    return this.dispatch({ type: 'probe-completed', availability });
  }

  /** Store `dir` (resolved to an absolute path) as the selected project. */
  selectProject(dir: string): Promise<AppState> {
    return this.dispatch({ type: 'select-project', path: resolve(dir) });
  }

  toggleSeverity(severity: SeverityFilter): Promise<AppState> {
    return this.dispatch({ type: 'toggle-severity', severity });
  }

  private emit(chunks: readonly string[]): void {
    for (const chunk of chunks) {
      for (const listener of this.listeners) listener(chunk);
    }
  }
}
