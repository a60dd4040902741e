import type { ProgressSnapshot } from './types.js';

/**
 * Run-wide discovered/completed counters.
 *
 * Mutated only from the event loop, so each increment is indivisible and
 * needs no lock. completed never exceeds discovered because a key is
 * counted before it is queued.
 */
export class ProgressTracker {
  private _discovered = 0;
  private _completed = 0;

  get discovered(): number {
    return this._discovered;
  }

  get completed(): number {
    return this._completed;
  }

  /** Count one listed key. Returns the new discovered count. */
  recordDiscovered(): number {
    this._discovered += 1;
    return this._discovered;
  }

  /** Count one finished key; returns the new count with the current discovered count. */
  recordCompleted(): ProgressSnapshot {
    this._completed += 1;
    return { completed: this._completed, discovered: this._discovered };
  }

  snapshot(): ProgressSnapshot {
    return { discovered: this._discovered, completed: this._completed };
  }
}
