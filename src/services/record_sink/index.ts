/**
 * @file Record Sinks - where fused states and dissociation episodes go for later sync
 *
 * Writes are synchronous and buffered so the fusion tick never waits on I/O;
 * flush() moves buffered records to the backing store.
 */

import type { IntegratedState } from '../../models/integrated_state';
import type { DissociationEpisode } from '../../models/dissociation';

// ============================================================================
// SINK INTERFACE
// ============================================================================

export interface RecordSink {
  readonly name: string;
  writeState(sessionId: string, state: IntegratedState): void;
  writeEpisode(sessionId: string, episode: DissociationEpisode): void;
  flush(): Promise<void>;
  close(): Promise<void>;
}

export interface StoredState {
  sessionId: string;
  state: IntegratedState;
}

export interface StoredEpisode {
  sessionId: string;
  episode: DissociationEpisode;
}

// ============================================================================
// MEMORY SINK
// ============================================================================

/**
 * Keeps every record in process. Used by tests and as the default sink.
 */
export class MemorySink implements RecordSink {
  readonly name = 'memory';
  readonly states: StoredState[] = [];
  readonly episodes: StoredEpisode[] = [];
  flushCount = 0;
  closed = false;

  writeState(sessionId: string, state: IntegratedState): void {
    this.states.push({ sessionId, state });
  }

  writeEpisode(sessionId: string, episode: DissociationEpisode): void {
    this.episodes.push({ sessionId, episode });
  }

  async flush(): Promise<void> {
    this.flushCount++;
  }

  async close(): Promise<void> {
    this.closed = true;
  }
}

// ============================================================================
// MULTI SINK - Fan out to multiple sinks
// ============================================================================

export class MultiSink implements RecordSink {
  readonly name = 'multi';
  private sinks: RecordSink[];

  constructor(sinks: RecordSink[]) {
    this.sinks = sinks;
  }

  writeState(sessionId: string, state: IntegratedState): void {
    for (const sink of this.sinks) sink.writeState(sessionId, state);
  }

  writeEpisode(sessionId: string, episode: DissociationEpisode): void {
    for (const sink of this.sinks) sink.writeEpisode(sessionId, episode);
  }

  async flush(): Promise<void> {
    await Promise.all(this.sinks.map(s => s.flush()));
  }

  async close(): Promise<void> {
    await Promise.all(this.sinks.map(s => s.close()));
  }
}

export { MongoRecordSink, collectionsFromDb } from './mongo_sink';
export type { RecordCollections, StateRecord, EpisodeRecord, MongoRecordSinkOptions } from './mongo_sink';
