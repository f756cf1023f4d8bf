/**
 * @file State Fusion Engine - fixed-rate fusion of facial and physiological samples
 *
 * Sensor collaborators push samples at their own cadence into single-slot
 * latest-value cells. Every tick (5 Hz by default) the engine fuses the
 * current pair into one IntegratedState and emits it synchronously to all
 * subscribers.
 *
 * Missing input is not an error: until both cells hold a sample the tick
 * emits nothing. With holdStaleSamples off, a tick that sees no new sample
 * since the last emission is skipped as well.
 */

import { EventEmitter } from 'events';
import type { FacialSample } from '../../models/emotion';
import type { PhysiologicalSample } from '../../models/physiology';
import type { IntegratedState } from '../../models/integrated_state';
import { createLogger } from '../../utils/logger';
import { TimerScheduler } from '../timer_scheduler';
import { fuseSamples } from './fusion';

const log = createLogger('StateFusionEngine');

const TIMER_GROUP = 'fusion';

// ============================================================================
// Types
// ============================================================================

export interface FusionEngineOptions {
  /** Tick interval, default 200 ms */
  intervalMs?: number;
  /** Re-fuse the last pair when nothing new arrived, default true */
  holdStaleSamples?: boolean;
  now?: () => number;
}

interface SampleCell<T> {
  sample: T;
  version: number;
}

export type StateListener = (state: IntegratedState) => void;

// ============================================================================
// Engine
// ============================================================================

export class StateFusionEngine extends EventEmitter {
  readonly intervalMs: number;
  readonly holdStaleSamples: boolean;

  private facial: SampleCell<FacialSample> | null = null;
  private physiological: SampleCell<PhysiologicalSample> | null = null;
  private lastFused: { facial: number; physiological: number } | null = null;
  private versionCounter = 0;
  private timerId: string | null = null;
  private readonly now: () => number;

  constructor(
    private readonly scheduler: TimerScheduler,
    options: FusionEngineOptions = {}
  ) {
    super();
    this.intervalMs = options.intervalMs ?? 200;
    this.holdStaleSamples = options.holdStaleSamples ?? true;
    this.now = options.now ?? Date.now;
  }

  get running(): boolean {
    return this.timerId !== null;
  }

  start(): void {
    if (this.running) {
      log.warn('Already running');
      return;
    }
    this.timerId = this.scheduler.every(TIMER_GROUP, this.intervalMs, () => {
      this.fuseNow();
    });
    log.info({ intervalMs: this.intervalMs, holdStaleSamples: this.holdStaleSamples }, 'Fusion started');
  }

  /**
   * Stop ticking and forget both cells. Samples arriving while stopped are dropped.
   */
  stop(): void {
    if (this.timerId !== null) {
      this.scheduler.cancel(this.timerId);
      this.timerId = null;
      log.info('Fusion stopped');
    }
    this.facial = null;
    this.physiological = null;
    this.lastFused = null;
  }

  submitFacialSample(sample: FacialSample): void {
    if (!this.running) return;
    this.facial = { sample: structuredClone(sample), version: ++this.versionCounter };
  }

  submitPhysiologicalSample(sample: PhysiologicalSample): void {
    if (!this.running) return;
    this.physiological = { sample: structuredClone(sample), version: ++this.versionCounter };
  }

  /**
   * Fuse the current pair and publish it. Returns null when the tick is skipped.
   */
  fuseNow(): IntegratedState | null {
    const { facial, physiological } = this;
    if (!facial || !physiological) return null;

    if (
      !this.holdStaleSamples &&
      this.lastFused !== null &&
      this.lastFused.facial === facial.version &&
      this.lastFused.physiological === physiological.version
    ) {
      return null;
    }

    const state = fuseSamples(facial.sample, physiological.sample, this.now());
    this.lastFused = { facial: facial.version, physiological: physiological.version };
    this.emit('state', state);
    return state;
  }

  /**
   * Subscribe to fused states. Returns the unsubscribe function.
   */
  onState(listener: StateListener): () => void {
    this.on('state', listener);
    return () => {
      this.off('state', listener);
    };
  }
}

export { fuseSamples } from './fusion';
export { StateHistory } from './state_history';
export { diffStates } from './state_change';
