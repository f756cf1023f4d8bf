/**
 * @file Safety Monitor - alert-level state machine over the fused-state stream
 *
 * Levels only climb within an escalation episode (none < low < medium < high).
 * The episode stays open while any trigger keeps firing; the first reliable
 * state with no trigger closes it and resets the level to none.
 *
 * States with invalid or poor data never change the level.
 *
 * Side effects per level:
 * - low: flag for therapist review
 * - medium: calming signal; guardian notified once the session is past the
 *   persistence window
 * - high: termination signal and immediate guardian notification
 *
 * needsIntervention() and shouldTerminateSession() read the same threshold
 * table and the same timestamp-keyed timers, so calling them repeatedly with
 * the same state is idempotent.
 */

import { EventEmitter } from 'events';
import type { IntegratedState } from '../../models/integrated_state';
import { isUnreliable } from '../../models/integrated_state';
import { isNegativeEmotion } from '../../models/emotion';
import type { AlertLevel, SafetyEvent, SafetyTrigger } from '../../models/safety';
import { alertRank, createSafetyEvent } from '../../models/safety';
import { createLogger } from '../../utils/logger';
import type { CareTeamNotifier } from '../notification_service';
import { SAFETY_THRESHOLDS, TRIGGER_LEVELS, type SafetyThresholds } from './thresholds';

const log = createLogger('SafetyMonitor');

// ============================================================================
// Types
// ============================================================================

export interface SafetyEvaluation {
  level: AlertLevel;
  /** Set when this state escalated the level */
  event: SafetyEvent | null;
  /** False when the state was skipped for data quality */
  evaluated: boolean;
}

export interface SafetyMonitorOptions {
  thresholds?: Partial<SafetyThresholds>;
  now?: () => number;
}

interface Candidate {
  trigger: SafetyTrigger;
  level: AlertLevel;
}

// ============================================================================
// Monitor
// ============================================================================

export class SafetyMonitor extends EventEmitter {
  readonly thresholds: SafetyThresholds;

  private monitoring = false;
  private level: AlertLevel = 'none';
  private monitoringStart: number | null = null;

  // Timestamp-keyed timers
  private arousalSince: number | null = null;
  private negativeSince: number | null = null;
  private dissociationSince: number | null = null;

  private guardianAlertedForSustained = false;
  private terminationAlerted = false;

  private readonly now: () => number;

  constructor(
    private readonly notifier: CareTeamNotifier,
    options: SafetyMonitorOptions = {}
  ) {
    super();
    this.thresholds = { ...SAFETY_THRESHOLDS, ...options.thresholds };
    this.now = options.now ?? Date.now;
  }

  get currentLevel(): AlertLevel {
    return this.level;
  }

  get isMonitoring(): boolean {
    return this.monitoring;
  }

  startMonitoring(startTime: number = this.now()): void {
    this.reset();
    this.monitoring = true;
    this.monitoringStart = startTime;
    log.info('Safety monitoring started');
  }

  /**
   * Stop evaluating. Alert state is kept so a paused session resumes where it was.
   */
  stopMonitoring(): void {
    if (!this.monitoring) return;
    this.monitoring = false;
    log.info({ level: this.level }, 'Safety monitoring stopped');
  }

  resumeMonitoring(): void {
    if (this.monitoringStart === null) {
      this.startMonitoring();
      return;
    }
    this.monitoring = true;
  }

  /**
   * Clear all timers and flags for reuse across sessions.
   */
  reset(): void {
    this.monitoring = false;
    this.level = 'none';
    this.monitoringStart = null;
    this.arousalSince = null;
    this.negativeSince = null;
    this.dissociationSince = null;
    this.guardianAlertedForSustained = false;
    this.terminationAlerted = false;
  }

  // ==========================================================================
  // Per-tick evaluation
  // ==========================================================================

  evaluate(state: IntegratedState): SafetyEvaluation {
    if (!this.monitoring) {
      return { level: this.level, event: null, evaluated: false };
    }

    this.observe(state);

    if (isUnreliable(state.dataQuality)) {
      log.debug({ dataQuality: state.dataQuality }, 'Skipping safety evaluation on unreliable data');
      return { level: this.level, event: null, evaluated: false };
    }

    const candidates = this.detectTriggers(state);

    if (candidates.length === 0) {
      if (this.level !== 'none') {
        log.info({ from: this.level }, 'No safety trigger, escalation closed');
        this.level = 'none';
        this.emit('level', this.level);
      }
      return { level: this.level, event: null, evaluated: true };
    }

    const top = candidates.reduce((a, b) => (alertRank(b.level) > alertRank(a.level) ? b : a));
    if (alertRank(top.level) <= alertRank(this.level)) {
      return { level: this.level, event: null, evaluated: true };
    }

    const event = createSafetyEvent(top.trigger, top.level, state.timestamp);
    this.level = top.level;
    log.warn({ trigger: event.trigger, level: event.level }, event.description);

    this.emit('level', this.level);
    this.emit('alert', event);
    this.applySideEffects(event, state);

    return { level: this.level, event, evaluated: true };
  }

  private detectTriggers(state: IntegratedState): Candidate[] {
    const t = this.thresholds;
    const triggers: SafetyTrigger[] = [];

    if (
      isNegativeEmotion(state.dominantEmotion) &&
      state.emotionalIntensity > t.distressIntensity &&
      state.physiological.arousalLevel > t.distressArousal
    ) {
      triggers.push('severeDistress');
    }

    if (state.dissociationIndex > t.severeDissociation) {
      triggers.push('severeDissociation');
    }

    if (state.arousalLevel > t.extremeArousal && state.physiological.heartRate.rate > t.extremeHeartRate) {
      triggers.push('extremeArousal');
    }

    if (this.secondsSince(this.negativeSince, state) >= t.prolongedNegativeSeconds) {
      triggers.push('prolongedNegativeState');
    }

    return triggers.map(trigger => ({ trigger, level: TRIGGER_LEVELS[trigger] }));
  }

  private applySideEffects(event: SafetyEvent, state: IntegratedState): void {
    switch (event.level) {
      case 'low':
        this.dispatch('flagForReview', this.notifier.flagForReview(event));
        break;

      case 'medium': {
        this.emit('calming_required', event);
        const elapsed = this.monitoringStart === null ? 0 : (state.timestamp - this.monitoringStart) / 1000;
        if (elapsed > this.thresholds.guardianPersistenceSeconds) {
          this.dispatch('notifyGuardian', this.notifier.notifyGuardian(event));
        }
        break;
      }

      case 'high':
        this.emit('termination_required', event);
        this.dispatch('notifyGuardian', this.notifier.notifyGuardian(event));
        break;

      case 'none':
        break;
    }
  }

  // ==========================================================================
  // Duration checks
  // ==========================================================================

  /**
   * True when sustained extreme arousal has lasted past the intervention
   * window (guardian alerted once per session) or dissociation is severe.
   * The sustained-arousal event goes out as `intervention_required`, never
   * as `alert`.
   */
  needsIntervention(state: IntegratedState): boolean {
    this.observe(state);
    const t = this.thresholds;

    if (this.secondsSince(this.arousalSince, state) > t.interventionAfterSeconds) {
      if (!this.guardianAlertedForSustained) {
        this.guardianAlertedForSustained = true;
        const event = createSafetyEvent('sustainedArousal', TRIGGER_LEVELS.sustainedArousal, state.timestamp);
        log.warn({ trigger: event.trigger, level: this.level }, 'Sustained arousal requires intervention');
        // Not an escalation: the alert level is left to evaluate()
        this.emit('intervention_required', event);
        this.dispatch('notifyGuardian', this.notifier.notifyGuardian(event));
      }
      return true;
    }

    return state.dissociationIndex > t.severeDissociation;
  }

  /**
   * True while sustained arousal has passed the termination window or severe
   * dissociation has held on reliable data. The therapist is alerted on the
   * first true result of each escalation only.
   */
  shouldTerminateSession(state: IntegratedState): boolean {
    this.observe(state);
    const t = this.thresholds;

    const sustained = this.secondsSince(this.arousalSince, state) > t.terminationAfterSeconds;
    const dissociated = this.secondsSince(this.dissociationSince, state) >= t.dissociationTerminationSeconds;
    const terminate = sustained || dissociated;

    if (!terminate) {
      this.terminationAlerted = false;
      return false;
    }

    if (!this.terminationAlerted) {
      this.terminationAlerted = true;
      const message = sustained
        ? 'Session should end: extreme arousal has not come down'
        : 'Session should end: severe dissociation persists';
      log.error({ sustained, dissociated }, message);
      this.dispatch('alertTherapist', this.notifier.alertTherapist(message, { playSound: true, requireAcknowledgment: true }));
    }
    return true;
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  /** Start or clear each condition timer from the state's own timestamp. */
  private observe(state: IntegratedState): void {
    const t = this.thresholds;
    const reliable = !isUnreliable(state.dataQuality);

    this.arousalSince = track(this.arousalSince, state.arousalLevel > t.sustainedArousal, state.timestamp);
    this.negativeSince = track(
      this.negativeSince,
      reliable && isNegativeEmotion(state.dominantEmotion) && state.emotionalIntensity > t.prolongedNegativeIntensity,
      state.timestamp
    );
    this.dissociationSince = track(
      this.dissociationSince,
      reliable && state.dissociationIndex > t.severeDissociation,
      state.timestamp
    );
  }

  private secondsSince(since: number | null, state: IntegratedState): number {
    return since === null ? -1 : (state.timestamp - since) / 1000;
  }

  private dispatch(action: string, delivery: Promise<void>): void {
    delivery.catch((error: unknown) => {
      log.error({ err: error, action }, 'Care team notification failed');
    });
  }
}

function track(since: number | null, condition: boolean, timestamp: number): number | null {
  if (!condition) return null;
  return since ?? timestamp;
}

export { SAFETY_THRESHOLDS, TRIGGER_LEVELS } from './thresholds';
export type { SafetyThresholds } from './thresholds';
