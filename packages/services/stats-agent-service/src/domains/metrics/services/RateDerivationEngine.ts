/**
 * RateDerivationEngine
 *
 * Turns cumulative counters into per-second rates by remembering the last
 * observation of every MetricKey. The counter-state table belongs to the
 * engine instance; nothing else writes to it.
 */

import type { MetricKey } from '../value-objects/MetricKey';

export interface CounterState {
  lastValue: number;
  /** Epoch seconds */
  lastObservedAt: number;
}

export class RateDerivationEngine {
  private readonly states = new Map<string, CounterState>();

  /**
   * Returns the per-second rate since the previous observation of `key`.
   *
   * - first observation: stores the baseline and returns 0
   * - counter decreased (entity restart): stores a new baseline, returns 0
   * - no time elapsed: returns 0 and keeps the existing baseline
   */
  process(key: MetricKey, rawValue: number, now: number): number {
    const id = key.toString();
    const previous = this.states.get(id);

    if (!previous) {
      this.states.set(id, { lastValue: rawValue, lastObservedAt: now });
      return 0;
    }

    const delta = rawValue - previous.lastValue;
    const elapsed = now - previous.lastObservedAt;

    if (delta < 0) {
      this.states.set(id, { lastValue: rawValue, lastObservedAt: now });
      return 0;
    }

    if (elapsed <= 0) {
      return 0;
    }

    this.states.set(id, { lastValue: rawValue, lastObservedAt: now });
    return delta / elapsed;
  }

  getState(key: MetricKey): Readonly<CounterState> | undefined {
    const state = this.states.get(key.toString());
    return state ? { ...state } : undefined;
  }

  size(): number {
    return this.states.size;
  }

  reset(): void {
    this.states.clear();
  }
}
