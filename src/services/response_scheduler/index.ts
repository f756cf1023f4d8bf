/**
 * @file Response Scheduler - throttled, non-overlapping character responses
 *
 * Fused states come in at 5 Hz; the character must not react to each one.
 * The scheduler
 * - filters state changes for significance and gates them (partly at random,
 *   through an injectable RandomSource)
 * - lets safety and grounding responses jump the queue
 * - delivers at most one response at a time, each kept active for its
 *   declared duration, with at least `responseDelay` between deliveries
 *
 * A 0.5 s tick drives delivery.
 */

import { EventEmitter } from 'events';
import type { IntegratedState, StateChange } from '../../models/integrated_state';
import type { DissociationStatus } from '../../models/dissociation';
import type { SessionPhase } from '../../models/session';
import type { TherapeuticResponse } from '../../models/therapeutic_response';
import { createLogger } from '../../utils/logger';
import { clamp01 } from '../../utils/math';
import { mathRandom, type RandomSource } from '../../utils/random';
import { TimerScheduler } from '../timer_scheduler';
import { ResponseGenerator } from './response_generator';

const log = createLogger('ResponseScheduler');

const TIMER_GROUP = 'responses';

/** Arousal swing that can trigger a response on its own */
const LARGE_AROUSAL_SWING = 0.3;
const COHERENCE_GATE_FACTOR = 0.7;

// ============================================================================
// Types
// ============================================================================

export type ResponsePriority = 'safety' | 'grounding' | 'phase';

interface QueuedResponse {
  response: TherapeuticResponse;
  priority: ResponsePriority;
}

export interface SchedulerInput {
  state: IntegratedState;
  change: StateChange | null;
  dissociation: DissociationStatus;
  safetyInterventionPending: boolean;
  phase: SessionPhase;
}

export interface ResponseSchedulerOptions {
  /** 0..1, default 0.5 */
  sensitivity?: number;
  tickMs?: number;
  queueSize?: number;
  random?: RandomSource;
  now?: () => number;
}

/** Seconds between deliveries: 3.0 at sensitivity 0, 0.5 at sensitivity 1. */
export function responseDelayFor(sensitivity: number): number {
  return 3.0 - clamp01(sensitivity) * 2.5;
}

// ============================================================================
// Scheduler
// ============================================================================

export class ResponseScheduler extends EventEmitter {
  readonly tickMs: number;
  readonly queueSize: number;

  private sensitivity: number;
  private queue: QueuedResponse[] = [];
  private active: QueuedResponse | null = null;
  private lastResponseTime: number | null = null;
  private timerId: string | null = null;
  private scheduling = false;

  private readonly random: RandomSource;
  private readonly now: () => number;

  constructor(
    private readonly scheduler: TimerScheduler,
    private readonly generator: ResponseGenerator,
    options: ResponseSchedulerOptions = {}
  ) {
    super();
    this.sensitivity = clamp01(options.sensitivity ?? 0.5);
    this.tickMs = options.tickMs ?? 500;
    this.queueSize = options.queueSize ?? 10;
    this.random = options.random ?? mathRandom;
    this.now = options.now ?? Date.now;
  }

  get responseSensitivity(): number {
    return this.sensitivity;
  }

  /** Seconds */
  get responseDelay(): number {
    return responseDelayFor(this.sensitivity);
  }

  get activeResponse(): TherapeuticResponse | null {
    return this.active ? this.active.response : null;
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get isScheduling(): boolean {
    return this.scheduling;
  }

  setSensitivity(sensitivity: number): void {
    this.sensitivity = clamp01(sensitivity);
  }

  // ==========================================================================
  // Lifecycle
  // ==========================================================================

  startScheduling(sensitivity?: number): void {
    if (sensitivity !== undefined) {
      this.setSensitivity(sensitivity);
    }
    this.clearState();
    this.scheduling = true;
    this.startTicking();
    log.info({ sensitivity: this.sensitivity, delay: this.responseDelay }, 'Response scheduling started');
  }

  /** Stop ticking but keep the queue and the active response. */
  pauseScheduling(): void {
    this.stopTicking();
    this.scheduling = false;
  }

  resumeScheduling(): void {
    if (this.scheduling) return;
    this.scheduling = true;
    this.startTicking();
  }

  /** Stop and clear the queue and the active response. */
  stopScheduling(): void {
    this.stopTicking();
    this.clearState();
    this.scheduling = false;
    log.info('Response scheduling stopped');
  }

  private startTicking(): void {
    if (this.timerId !== null) return;
    this.timerId = this.scheduler.every(TIMER_GROUP, this.tickMs, () => {
      this.checkQueue();
    });
  }

  private stopTicking(): void {
    if (this.timerId !== null) {
      this.scheduler.cancel(this.timerId);
      this.timerId = null;
    }
  }

  private clearState(): void {
    this.queue = [];
    this.active = null;
    this.lastResponseTime = null;
  }

  // ==========================================================================
  // Intake
  // ==========================================================================

  /**
   * Consider one fused state. Returns the response it queued, if any.
   */
  handleState(input: SchedulerInput): TherapeuticResponse | null {
    if (!this.scheduling) return null;

    const timestamp = input.state.timestamp;

    if (input.safetyInterventionPending) {
      return this.enqueueProtective({ response: this.generator.safetyResponse(timestamp), priority: 'safety' });
    }

    const status = input.dissociation;
    if (status.status === 'active' && status.severity !== 'potential') {
      return this.enqueueProtective({
        response: this.generator.groundingResponse(status.severity, timestamp),
        priority: 'grounding',
      });
    }

    if (input.change && this.shouldRespond(input.change)) {
      const response = this.generator.phaseResponse(input.phase, input.state, timestamp);
      return this.enqueuePhase({ response, priority: 'phase' });
    }

    return null;
  }

  /**
   * Whether a state change deserves a phase response. Structural changes
   * always do; emotional ones pass a random gate scaled by sensitivity.
   */
  shouldRespond(change: StateChange): boolean {
    if (!change.isSignificant) return false;
    if (change.dissociationChanged) return true;
    if (change.regulationChanged) return true;

    if (change.emotionChanged) {
      return this.random.next() < this.sensitivity;
    }
    if (change.arousalChanged) {
      const swing = Math.abs(change.to.arousalLevel - change.from.arousalLevel);
      return swing > LARGE_AROUSAL_SWING && this.random.next() < this.sensitivity;
    }
    if (change.coherenceChanged) {
      return this.random.next() < COHERENCE_GATE_FACTOR * this.sensitivity;
    }
    return false;
  }

  /**
   * Safety and grounding go to the front and discard queued phase responses.
   * Only one protective response is pending or active at a time; a safety
   * response replaces a pending grounding one.
   */
  private enqueueProtective(entry: QueuedResponse): TherapeuticResponse | null {
    if (this.active && this.active.priority !== 'phase') {
      if (!(entry.priority === 'safety' && this.active.priority === 'grounding')) return null;
    }

    const pending = this.queue.find(q => q.priority !== 'phase');
    if (pending && !(entry.priority === 'safety' && pending.priority === 'grounding')) {
      return null;
    }

    const dropped = this.queue.length - (pending ? 1 : 0);
    this.queue = [entry];

    if (this.active && this.active.priority !== entry.priority) {
      log.debug({ interrupted: this.active.response.responseType }, 'Active response pre-empted');
      this.active = null;
    }

    log.info({ priority: entry.priority, dropped }, 'Protective response queued');
    return entry.response;
  }

  private enqueuePhase(entry: QueuedResponse): TherapeuticResponse | null {
    if (this.queue.length >= this.queueSize) {
      const oldestPhase = this.queue.findIndex(q => q.priority === 'phase');
      if (oldestPhase === -1) return null;
      this.queue.splice(oldestPhase, 1);
    }
    this.queue.push(entry);
    return entry.response;
  }

  // ==========================================================================
  // Delivery
  // ==========================================================================

  /**
   * Expire the active response and deliver the next one when spacing allows.
   * Runs on every tick.
   */
  checkQueue(): TherapeuticResponse | null {
    const now = this.now();

    if (this.active) {
      const endsAt = this.active.response.timestamp + this.active.response.duration * 1000;
      if (now < endsAt) return null;
      this.active = null;
    }

    if (this.queue.length === 0) return null;
    if (this.lastResponseTime !== null && now - this.lastResponseTime < this.responseDelay * 1000) {
      return null;
    }

    const next = this.queue.shift();
    if (!next) return null;

    const delivered: QueuedResponse = {
      priority: next.priority,
      response: { ...next.response, timestamp: now },
    };
    this.active = delivered;
    this.lastResponseTime = now;

    log.debug({ type: delivered.response.responseType, priority: delivered.priority }, 'Response delivered');
    this.emit('response', delivered.response);
    return delivered.response;
  }

  onResponse(listener: (response: TherapeuticResponse) => void): () => void {
    this.on('response', listener);
    return () => {
      this.off('response', listener);
    };
  }
}

export { ResponseGenerator, inferEmotionFromPhysiology } from './response_generator';
export { selectGroundingTechnique } from './grounding';
