/**
 * @file Session Coordinator - runs a therapy session across the core components
 *
 * States: idle -> preparing -> active <-> paused -> completed
 *                  preparing -> error (a sensor failed to start)
 *
 * Every fused state is handled in a fixed order on the fusion tick:
 *   history -> session record -> sink -> dissociation tracker
 *   -> safety evaluation -> termination check -> response scheduler
 *
 * All session timers live in the shared TimerScheduler under this
 * coordinator's groups; endSession() and pauseSession() cancel them and
 * release every subscription before returning.
 */

import { EventEmitter } from 'events';
import type { FacialSample } from '../../models/emotion';
import type { PhysiologicalSample } from '../../models/physiology';
import type { IntegratedState } from '../../models/integrated_state';
import type { DissociationStatus } from '../../models/dissociation';
import type { SafetyEvent } from '../../models/safety';
import type { SessionPhase, TherapeuticSession } from '../../models/session';
import { calculateSessionMetrics, createSession } from '../../models/session';
import { createLogger } from '../../utils/logger';
import { errorMessage, SensorUnavailableError, SessionStateError } from '../../utils/errors';
import { TimerScheduler } from '../timer_scheduler';
import { StateFusionEngine } from '../state_fusion';
import { StateHistory } from '../state_fusion/state_history';
import { DissociationTracker } from '../dissociation_tracker';
import { SafetyMonitor } from '../safety_monitor';
import { ResponseScheduler } from '../response_scheduler';
import type { RecordSink } from '../record_sink';
import { planTransitions, type PhaseTransition } from './phase_plan';

const log = createLogger('SessionCoordinator');

const PHASE_TIMERS = 'session:phase';
const END_TIMER = 'session:end';

// ============================================================================
// Types
// ============================================================================

export type SessionState = 'idle' | 'preparing' | 'active' | 'paused' | 'completed' | 'error';

export type EndReason = 'completed' | 'duration' | 'safety' | 'cancelled';

/**
 * A sensor collaborator. start() throws when the sensor or its permission
 * is unavailable.
 */
export interface SensorSource<T> {
  readonly name: string;
  start(onSample: (sample: T) => void): void;
  stop(): void;
}

export type SessionStartResult =
  | { success: true; session: TherapeuticSession }
  | { success: false; error: Error };

export interface SessionCoordinatorDeps {
  timers: TimerScheduler;
  engine: StateFusionEngine;
  history: StateHistory;
  tracker: DissociationTracker;
  safety: SafetyMonitor;
  responses: ResponseScheduler;
  sink: RecordSink;
  facialSource?: SensorSource<FacialSample>;
  physiologicalSource?: SensorSource<PhysiologicalSample>;
}

export interface SessionCoordinatorOptions {
  /** Default session length in seconds */
  durationSeconds?: number;
  /** Response sensitivity used for sessions */
  responseSensitivity?: number;
  now?: () => number;
}

// ============================================================================
// Coordinator
// ============================================================================

export class SessionCoordinator extends EventEmitter {
  private state: SessionState = 'idle';
  private session: TherapeuticSession | null = null;
  private durationSeconds: number;
  private transitions: PhaseTransition[] = [];
  private activeElapsedMs = 0;
  private activeSince: number | null = null;
  private subscriptions: Array<() => void> = [];
  private startedSources: Array<SensorSource<FacialSample> | SensorSource<PhysiologicalSample>> = [];

  private readonly defaultDuration: number;
  private readonly responseSensitivity: number;
  private readonly now: () => number;

  constructor(
    private readonly deps: SessionCoordinatorDeps,
    options: SessionCoordinatorOptions = {}
  ) {
    super();
    this.defaultDuration = options.durationSeconds ?? 1200;
    this.durationSeconds = this.defaultDuration;
    this.responseSensitivity = options.responseSensitivity ?? 0.7;
    this.now = options.now ?? Date.now;
  }

  get sessionState(): SessionState {
    return this.state;
  }

  get currentSession(): TherapeuticSession | null {
    return this.session;
  }

  get currentPhase(): SessionPhase | null {
    return this.session ? this.session.phase : null;
  }

  // ==========================================================================
  // Inbound samples
  // ==========================================================================

  submitFacialSample(sample: FacialSample): void {
    this.deps.engine.submitFacialSample(sample);
  }

  submitPhysiologicalSample(sample: PhysiologicalSample): void {
    this.deps.engine.submitPhysiologicalSample(sample);
  }

  // ==========================================================================
  // Control surface
  // ==========================================================================

  startSession(phase: SessionPhase = 'connection', durationSeconds: number = this.defaultDuration): SessionStartResult {
    if (this.state === 'preparing' || this.state === 'active' || this.state === 'paused') {
      return { success: false, error: new SessionStateError('start a session', this.state) };
    }
    if (!Number.isFinite(durationSeconds) || durationSeconds <= 0) {
      return { success: false, error: new RangeError(`Session duration must be positive, got ${durationSeconds}`) };
    }

    this.setState('preparing');
    const startTime = this.now();
    const session = createSession(phase, startTime);

    const started = this.startSources();
    if (!started.success) {
      this.setState('error');
      log.error({ err: started.error }, 'Session failed to start');
      return started;
    }

    const { engine, history, tracker, safety, responses } = this.deps;

    this.session = session;
    this.durationSeconds = durationSeconds;
    this.activeElapsedMs = 0;
    this.activeSince = startTime;
    this.transitions = planTransitions(phase, durationSeconds);

    history.clear();
    tracker.reset();
    safety.startMonitoring(startTime);
    responses.startScheduling(this.responseSensitivity);
    this.subscribe();
    engine.start();
    this.scheduleTimers();

    this.setState('active');
    log.info({ sessionId: session.id, phase, durationSeconds }, 'Session started');
    this.emit('phase', phase);
    return { success: true, session };
  }

  /**
   * End the session. Timers and subscriptions are gone when this returns.
   * Returns the finished session, or null when nothing was running.
   */
  endSession(reason: EndReason = 'completed'): TherapeuticSession | null {
    const session = this.session;
    if (!session || (this.state !== 'active' && this.state !== 'paused')) {
      log.warn({ state: this.state }, 'endSession called with no running session');
      return null;
    }

    const { timers, engine, tracker, safety, responses, sink } = this.deps;
    const endTime = this.now();

    timers.cancelGroup(PHASE_TIMERS);
    timers.cancelGroup(END_TIMER);
    // Still subscribed: the episode listener records it on the session and sink
    tracker.closeOpenEpisode(endTime);
    this.unsubscribe();
    engine.stop();
    responses.stopScheduling();
    safety.stopMonitoring();
    this.stopSources();

    this.accumulateElapsed();
    session.endTime = endTime;
    session.metrics = calculateSessionMetrics(session, endTime);

    sink.flush().catch((error: unknown) => {
      log.error({ err: error, sessionId: session.id }, 'Failed to flush session records');
    });

    this.setState('completed');
    log.info({ sessionId: session.id, reason, states: session.states.length }, 'Session ended');
    this.emit('session_ended', session, reason);
    return session;
  }

  /**
   * Stop ingestion and timers; session, episode and alert state are kept.
   */
  pauseSession(): boolean {
    if (this.state !== 'active') {
      log.warn({ state: this.state }, 'pauseSession ignored');
      return false;
    }

    const { timers, engine, safety, responses } = this.deps;
    timers.cancelGroup(PHASE_TIMERS);
    timers.cancelGroup(END_TIMER);
    engine.stop();
    responses.pauseScheduling();
    safety.stopMonitoring();
    this.accumulateElapsed();

    this.setState('paused');
    log.info({ elapsed: this.elapsedSeconds() }, 'Session paused');
    return true;
  }

  resumeSession(): boolean {
    if (this.state !== 'paused') {
      log.warn({ state: this.state }, 'resumeSession ignored');
      return false;
    }

    const { engine, safety, responses } = this.deps;
    this.activeSince = this.now();
    safety.resumeMonitoring();
    responses.resumeScheduling();
    engine.start();
    this.scheduleTimers();

    this.setState('active');
    log.info({ remaining: this.durationSeconds - this.elapsedSeconds() }, 'Session resumed');
    return true;
  }

  /**
   * Jump to a phase; later phases are rescheduled from now.
   */
  advanceToPhase(phase: SessionPhase): boolean {
    if (!this.session || (this.state !== 'active' && this.state !== 'paused')) {
      log.warn({ state: this.state, phase }, 'advanceToPhase ignored');
      return false;
    }

    this.transitions = planTransitions(phase, this.durationSeconds, this.elapsedSeconds());
    this.deps.timers.cancelGroup(PHASE_TIMERS);
    if (this.state === 'active') {
      this.schedulePhaseTimers();
    }
    this.setPhase(phase);
    return true;
  }

  /** Active session time over the planned duration, capped at 1. */
  getCurrentSessionProgress(): number {
    if (!this.session) return 0;
    return Math.min(1, this.elapsedSeconds() / this.durationSeconds);
  }

  // ==========================================================================
  // Per-state pipeline
  // ==========================================================================

  private handleState(state: IntegratedState): void {
    const session = this.session;
    if (this.state !== 'active' || !session) return;

    const { history, sink, tracker, safety, responses } = this.deps;

    const change = history.record(state);
    session.states.push(state);
    sink.writeState(session.id, state);
    this.emit('state', state);

    const status: DissociationStatus = tracker.process(state);
    this.emit('dissociation', status);

    const evaluation = safety.evaluate(state);
    const needsIntervention = safety.needsIntervention(state);
    const terminate = safety.shouldTerminateSession(state);

    if (terminate || evaluation.event?.level === 'high') {
      log.warn({ sessionId: session.id, level: evaluation.level }, 'Ending session for safety');
      this.endSession('safety');
      return;
    }

    responses.handleState({
      state,
      change,
      dissociation: status,
      safetyInterventionPending: needsIntervention || evaluation.event?.level === 'medium',
      phase: session.phase,
    });
  }

  private subscribe(): void {
    const { engine, tracker, safety, responses, sink } = this.deps;

    const onAlert = (event: SafetyEvent) => {
      this.emit('safety', event);
    };
    const onIntervention = (event: SafetyEvent) => {
      this.emit('intervention_required', event);
    };
    safety.on('alert', onAlert);
    safety.on('intervention_required', onIntervention);

    this.subscriptions = [
      engine.onState(state => this.handleState(state)),
      tracker.onEpisode(episode => {
        if (!this.session) return;
        this.session.dissociationEpisodes.push(episode);
        sink.writeEpisode(this.session.id, episode);
      }),
      responses.onResponse(response => {
        if (!this.session) return;
        this.session.interventions.push(response);
        this.emit('response', response);
      }),
      () => {
        safety.off('alert', onAlert);
        safety.off('intervention_required', onIntervention);
      },
    ];
  }

  private unsubscribe(): void {
    for (const release of this.subscriptions) release();
    this.subscriptions = [];
  }

  // ==========================================================================
  // Sources
  // ==========================================================================

  private startSources(): { success: true } | { success: false; error: Error } {
    const { engine, facialSource, physiologicalSource } = this.deps;
    this.startedSources = [];

    try {
      if (facialSource) {
        facialSource.start(sample => engine.submitFacialSample(sample));
        this.startedSources.push(facialSource);
      }
      if (physiologicalSource) {
        physiologicalSource.start(sample => engine.submitPhysiologicalSample(sample));
        this.startedSources.push(physiologicalSource);
      }
      return { success: true };
    } catch (error) {
      const failed = this.startedSources.length === 0 && facialSource ? facialSource : physiologicalSource;
      this.stopSources();
      const reason =
        error instanceof SensorUnavailableError
          ? error
          : new SensorUnavailableError(failed ? failed.name : 'sensor', errorMessage(error));
      return { success: false, error: reason };
    }
  }

  private stopSources(): void {
    for (const source of [...this.startedSources].reverse()) {
      try {
        source.stop();
      } catch (error) {
        log.error({ err: error, source: source.name }, 'Failed to stop sensor source');
      }
    }
    this.startedSources = [];
  }

  // ==========================================================================
  // Timing
  // ==========================================================================

  private elapsedSeconds(): number {
    const running = this.state === 'active' && this.activeSince !== null ? this.now() - this.activeSince : 0;
    return (this.activeElapsedMs + running) / 1000;
  }

  private accumulateElapsed(): void {
    if (this.activeSince !== null) {
      this.activeElapsedMs += this.now() - this.activeSince;
      this.activeSince = null;
    }
  }

  private scheduleTimers(): void {
    const remaining = Math.max(0, this.durationSeconds - this.elapsedSeconds());
    this.deps.timers.once(END_TIMER, remaining * 1000, () => {
      this.endSession('duration');
    });
    this.schedulePhaseTimers();
  }

  private schedulePhaseTimers(): void {
    const elapsed = this.elapsedSeconds();
    for (const transition of this.transitions) {
      if (transition.at <= elapsed) continue;
      this.deps.timers.once(PHASE_TIMERS, (transition.at - elapsed) * 1000, () => {
        if (this.state !== 'active') return;
        this.setPhase(transition.phase);
      });
    }
  }

  private setPhase(phase: SessionPhase): void {
    if (!this.session || this.session.phase === phase) return;
    const previous = this.session.phase;
    this.session.phase = phase;
    log.info({ from: previous, to: phase }, 'Phase changed');
    this.emit('phase', phase);
  }

  private setState(state: SessionState): void {
    if (this.state === state) return;
    this.state = state;
    this.emit('session_state', state);
  }
}

export { PHASE_ALLOCATIONS, planTransitions } from './phase_plan';
