/**
 * @file Composition root
 *
 * Builds every core component explicitly and wires them together. There is
 * no global registry: callers hold the returned object and pass it on.
 *
 * Usage:
 *   const core = createTherapyCore({ facialSource, physiologicalSource });
 *   core.coordinator.on('response', r => character.perform(r));
 *   core.coordinator.startSession('connection', 1200);
 */

import { MongoClient } from 'mongodb';
import type { FacialSample } from './models/emotion';
import type { PhysiologicalSample } from './models/physiology';
import type { ResponsePreferences } from './models/therapeutic_response';
import { loadConfig, type CoreConfig } from './config';
import { createLogger } from './utils/logger';
import type { RandomSource } from './utils/random';
import { TimerScheduler } from './services/timer_scheduler';
import { StateFusionEngine } from './services/state_fusion';
import { StateHistory } from './services/state_fusion/state_history';
import { DissociationTracker } from './services/dissociation_tracker';
import { SafetyMonitor } from './services/safety_monitor';
import { ResponseGenerator, ResponseScheduler } from './services/response_scheduler';
import {
  EmergencyContactNotifier,
  LoggingCareTeamNotifier,
  type CareTeamNotifier,
  type DeliveryChannel,
  type EmergencyContact,
} from './services/notification_service';
import { MemorySink, MongoRecordSink, collectionsFromDb, type RecordSink } from './services/record_sink';
import { SessionCoordinator, type SensorSource } from './services/session_coordinator';

const log = createLogger('TherapyCore');

export interface TherapyCoreOptions {
  config?: CoreConfig;
  notifier?: CareTeamNotifier;
  /** Used when no notifier is given; guardian alerts go to this contact. */
  guardian?: { contact: EmergencyContact; channel: DeliveryChannel };
  sink?: RecordSink;
  facialSource?: SensorSource<FacialSample>;
  physiologicalSource?: SensorSource<PhysiologicalSample>;
  preferences?: Partial<ResponsePreferences>;
  random?: RandomSource;
  now?: () => number;
}

export interface TherapyCore {
  config: CoreConfig;
  timers: TimerScheduler;
  engine: StateFusionEngine;
  history: StateHistory;
  tracker: DissociationTracker;
  safety: SafetyMonitor;
  generator: ResponseGenerator;
  responses: ResponseScheduler;
  notifier: CareTeamNotifier;
  sink: RecordSink;
  coordinator: SessionCoordinator;
  /** Cancel every timer and close the sink. */
  shutdown(): Promise<void>;
}

export function createTherapyCore(options: TherapyCoreOptions = {}): TherapyCore {
  const config = options.config ?? loadConfig();
  const now = options.now ?? Date.now;

  const timers = new TimerScheduler();
  const engine = new StateFusionEngine(timers, {
    intervalMs: config.fusion.intervalMs,
    holdStaleSamples: config.fusion.holdStaleSamples,
    now,
  });
  const history = new StateHistory(config.history.size);
  const tracker = new DissociationTracker();
  const notifier = options.notifier ?? createNotifier(config, options.guardian, now);
  const safety = new SafetyMonitor(notifier, { now });
  const generator = new ResponseGenerator({
    responsivenessSensitivity: config.responses.sensitivity,
    ...options.preferences,
  });
  const responses = new ResponseScheduler(timers, generator, {
    sensitivity: config.responses.sensitivity,
    tickMs: config.responses.tickMs,
    queueSize: config.responses.queueSize,
    random: options.random,
    now,
  });
  const sink = options.sink ?? new MemorySink();

  const coordinator = new SessionCoordinator(
    {
      timers,
      engine,
      history,
      tracker,
      safety,
      responses,
      sink,
      facialSource: options.facialSource,
      physiologicalSource: options.physiologicalSource,
    },
    {
      durationSeconds: config.session.durationSeconds,
      responseSensitivity: generator.currentPreferences.responsivenessSensitivity,
      now,
    }
  );

  log.info({ fusionIntervalMs: config.fusion.intervalMs, sink: sink.name }, 'Therapy core assembled');

  return {
    config,
    timers,
    engine,
    history,
    tracker,
    safety,
    generator,
    responses,
    notifier,
    sink,
    coordinator,
    async shutdown() {
      if (coordinator.sessionState === 'active' || coordinator.sessionState === 'paused') {
        coordinator.endSession('cancelled');
      }
      timers.cancelAll();
      await sink.close();
    },
  };
}

function createNotifier(
  config: CoreConfig,
  guardian: TherapyCoreOptions['guardian'],
  now: () => number
): CareTeamNotifier {
  const therapist = new LoggingCareTeamNotifier();
  if (!guardian) return therapist;

  return new EmergencyContactNotifier(guardian.contact, guardian.channel, therapist, {
    cooldownSeconds: config.notifications.guardianCooldownSeconds,
    now,
  });
}

/**
 * Connect to MongoDB and return an indexed record sink. The caller owns the client.
 */
export async function connectMongoSink(config: CoreConfig): Promise<{ sink: MongoRecordSink; client: MongoClient }> {
  if (!config.mongo.uri) {
    throw new Error('MONGODB_URI is not configured');
  }

  const client = new MongoClient(config.mongo.uri);
  await client.connect();

  const sink = new MongoRecordSink(collectionsFromDb(client.db(config.mongo.dbName)));
  await sink.setup();
  log.info({ db: config.mongo.dbName }, 'MongoDB record sink connected');
  return { sink, client };
}

export * from './models';
export { loadConfig } from './config';
export type { CoreConfig } from './config';
export { TimerScheduler } from './services/timer_scheduler';
export { StateFusionEngine, StateHistory, fuseSamples } from './services/state_fusion';
export { DissociationTracker } from './services/dissociation_tracker';
export { SafetyMonitor, SAFETY_THRESHOLDS } from './services/safety_monitor';
export { ResponseScheduler, ResponseGenerator } from './services/response_scheduler';
export {
  LoggingCareTeamNotifier,
  EmergencyContactNotifier,
  type CareTeamNotifier,
  type DeliveryChannel,
  type EmergencyContact,
} from './services/notification_service';
export { MemorySink, MultiSink, MongoRecordSink, type RecordSink } from './services/record_sink';
export { SessionCoordinator, type SensorSource, type SessionState } from './services/session_coordinator';
export { SeededRandom, FixedRandom, type RandomSource } from './utils/random';
