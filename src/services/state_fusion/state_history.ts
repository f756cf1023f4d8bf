/**
 * @file State History - bounded record of fused states with windowed queries
 *
 * Sits one layer above the fusion engine. The engine keeps no history; the
 * coordinator records every emitted state here and gets the change against
 * the previous one back.
 */

import type { EmotionType } from '../../models/emotion';
import type { IntegratedState, StateChange } from '../../models/integrated_state';
import { mean } from '../../utils/math';
import { diffStates } from './state_change';

export const DEFAULT_HISTORY_SIZE = 1000;

export interface DominantEmotion {
  emotion: EmotionType;
  /** Share of states in the window showing this emotion */
  prevalence: number;
}

export class StateHistory {
  private states: IntegratedState[] = [];

  constructor(private readonly capacity: number = DEFAULT_HISTORY_SIZE) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`History capacity must be a positive integer, got ${capacity}`);
    }
  }

  /**
   * Append a state, evicting the oldest beyond capacity.
   * Returns the change against the previous state, or null for the first.
   */
  record(state: IntegratedState): StateChange | null {
    const previous = this.latest();
    this.states.push(state);
    if (this.states.length > this.capacity) {
      this.states.splice(0, this.states.length - this.capacity);
    }
    return previous ? diffStates(previous, state) : null;
  }

  latest(): IntegratedState | null {
    return this.states.length > 0 ? this.states[this.states.length - 1] : null;
  }

  get size(): number {
    return this.states.length;
  }

  /** Most recent `limit` states, oldest first. */
  getRecentStates(limit = 10): IntegratedState[] {
    if (limit <= 0) return [];
    return this.states.slice(-limit);
  }

  /** States with timestamps within the last `seconds` before `now`. */
  window(seconds: number, now: number): IntegratedState[] {
    const cutoff = now - seconds * 1000;
    return this.states.filter(s => s.timestamp >= cutoff);
  }

  getDominantEmotion(overSeconds: number, now: number): DominantEmotion | null {
    const states = this.window(overSeconds, now);
    if (states.length === 0) return null;

    const counts = new Map<EmotionType, number>();
    for (const state of states) {
      counts.set(state.dominantEmotion, (counts.get(state.dominantEmotion) ?? 0) + 1);
    }

    let best: EmotionType = states[0].dominantEmotion;
    let bestCount = 0;
    for (const [emotion, count] of counts) {
      if (count > bestCount) {
        best = emotion;
        bestCount = count;
      }
    }

    return { emotion: best, prevalence: bestCount / states.length };
  }

  getAverageCoherence(overSeconds: number, now: number): number | null {
    const states = this.window(overSeconds, now);
    if (states.length === 0) return null;
    return mean(states.map(s => s.coherenceIndex));
  }

  /**
   * Share of consecutive pairs whose dominant emotion differs.
   * Needs at least three states.
   */
  getEmotionalVolatility(overSeconds: number, now: number): number | null {
    const states = this.window(overSeconds, now);
    if (states.length < 3) return null;

    let changes = 0;
    for (let i = 1; i < states.length; i++) {
      if (states[i].dominantEmotion !== states[i - 1].dominantEmotion) changes++;
    }
    return changes / (states.length - 1);
  }

  clear(): void {
    this.states = [];
  }
}
