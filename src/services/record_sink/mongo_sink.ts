/**
 * @file MongoDB record sink
 *
 * Batches fused states and episodes into two collections, each document
 * tagged with its session and `needsSync: true` for the sync collaborator.
 *
 * Every record gets its `_id` when it is buffered, so a retried batch can
 * only ever re-insert the same documents. Inserts are unordered; after a
 * partial failure only the documents the server rejected go back into the
 * buffer, and a duplicate-key rejection counts as already stored.
 */

import { ObjectId, type BulkWriteOptions, type Collection, type Db } from 'mongodb';
import type { IntegratedState } from '../../models/integrated_state';
import type { DissociationEpisode } from '../../models/dissociation';
import { createLogger } from '../../utils/logger';
import type { RecordSink } from './index';

const log = createLogger('MongoRecordSink');

export const STATE_COLLECTION = 'integrated_states';
export const EPISODE_COLLECTION = 'dissociation_episodes';

export interface StateRecord extends IntegratedState {
  _id: ObjectId;
  sessionId: string;
  recordedAt: Date;
  needsSync: boolean;
}

export interface EpisodeRecord extends DissociationEpisode {
  _id: ObjectId;
  sessionId: string;
  recordedAt: Date;
  needsSync: boolean;
}

/** The two collection operations the sink needs. */
export interface RecordCollections {
  states: Pick<Collection<StateRecord>, 'insertMany' | 'createIndex'>;
  episodes: Pick<Collection<EpisodeRecord>, 'insertMany' | 'createIndex'>;
}

export interface MongoRecordSinkOptions {
  /** Buffered records that trigger a background flush */
  batchSize?: number;
  /** Oldest records are dropped past this many */
  maxBuffered?: number;
  /** First wait after a failed flush; doubles per consecutive failure */
  retryBackoffMs?: number;
  maxRetryBackoffMs?: number;
  now?: () => number;
}

const DUPLICATE_KEY = 11000;
const INSERT_OPTIONS: BulkWriteOptions = { ordered: false };

export function collectionsFromDb(db: Db): RecordCollections {
  return {
    states: db.collection<StateRecord>(STATE_COLLECTION),
    episodes: db.collection<EpisodeRecord>(EPISODE_COLLECTION),
  };
}

export class MongoRecordSink implements RecordSink {
  readonly name = 'mongodb';

  private stateBuffer: StateRecord[] = [];
  private episodeBuffer: EpisodeRecord[] = [];
  private inFlight: Promise<void> | null = null;
  private failures = 0;
  private retryAt = 0;
  private dropped = 0;

  private readonly batchSize: number;
  private readonly maxBuffered: number;
  private readonly retryBackoffMs: number;
  private readonly maxRetryBackoffMs: number;
  private readonly now: () => number;

  constructor(
    private readonly collections: RecordCollections,
    options: MongoRecordSinkOptions = {}
  ) {
    this.batchSize = options.batchSize ?? 50;
    this.maxBuffered = options.maxBuffered ?? 5000;
    this.retryBackoffMs = options.retryBackoffMs ?? 1000;
    this.maxRetryBackoffMs = options.maxRetryBackoffMs ?? 60_000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Create lookup indexes. Safe to call repeatedly.
   */
  async setup(): Promise<void> {
    await this.collections.states.createIndex({ sessionId: 1, timestamp: 1 });
    await this.collections.states.createIndex({ needsSync: 1 });
    await this.collections.episodes.createIndex({ sessionId: 1, startTime: 1 });
    log.info('Record collections indexed');
  }

  get bufferedCount(): number {
    return this.stateBuffer.length + this.episodeBuffer.length;
  }

  /** Records discarded because the buffer was full. */
  get droppedCount(): number {
    return this.dropped;
  }

  writeState(sessionId: string, state: IntegratedState): void {
    this.stateBuffer.push({ ...state, _id: new ObjectId(), sessionId, recordedAt: new Date(), needsSync: true });
    this.enforceLimit();
    this.flushWhenFull();
  }

  writeEpisode(sessionId: string, episode: DissociationEpisode): void {
    this.episodeBuffer.push({ ...episode, _id: new ObjectId(), sessionId, recordedAt: new Date(), needsSync: true });
    this.enforceLimit();
    this.flushWhenFull();
  }

  /**
   * Write everything buffered. Rejected records go back to the front of the buffer.
   * An explicit flush ignores the background retry backoff.
   */
  async flush(): Promise<void> {
    if (this.inFlight) {
      // A failed batch is reported by whoever started it and is back in the buffer.
      await this.inFlight.then(
        () => undefined,
        () => undefined
      );
    }

    const states = this.stateBuffer;
    const episodes = this.episodeBuffer;
    this.stateBuffer = [];
    this.episodeBuffer = [];

    if (states.length === 0 && episodes.length === 0) return;

    const write = this.writeBatches(states, episodes);
    this.inFlight = write;
    try {
      await write;
      this.failures = 0;
      this.retryAt = 0;
    } catch (error) {
      this.failures += 1;
      const backoff = Math.min(this.retryBackoffMs * 2 ** (this.failures - 1), this.maxRetryBackoffMs);
      this.retryAt = this.now() + backoff;
      this.enforceLimit();
      throw error;
    } finally {
      if (this.inFlight === write) this.inFlight = null;
    }
  }

  async close(): Promise<void> {
    await this.flush();
  }

  private async writeBatches(states: StateRecord[], episodes: EpisodeRecord[]): Promise<void> {
    if (states.length > 0) {
      try {
        await this.collections.states.insertMany(states, INSERT_OPTIONS);
      } catch (error) {
        const retry = rejected(states, error);
        if (retry.length > 0) {
          this.stateBuffer = [...retry, ...this.stateBuffer];
          this.episodeBuffer = [...episodes, ...this.episodeBuffer];
          throw error;
        }
        log.debug({ states: states.length }, 'State batch was already stored');
      }
    }

    if (episodes.length > 0) {
      try {
        await this.collections.episodes.insertMany(episodes, INSERT_OPTIONS);
      } catch (error) {
        const retry = rejected(episodes, error);
        if (retry.length > 0) {
          this.episodeBuffer = [...retry, ...this.episodeBuffer];
          throw error;
        }
        log.debug({ episodes: episodes.length }, 'Episode batch was already stored');
      }
    }

    log.debug({ states: states.length, episodes: episodes.length }, 'Records flushed');
  }

  private flushWhenFull(): void {
    if (this.inFlight || this.bufferedCount < this.batchSize) return;
    if (this.now() < this.retryAt) return;

    this.flush().catch((error: unknown) => {
      log.error({ err: error, retryInMs: this.retryAt - this.now() }, 'Background flush failed, records kept for retry');
    });
  }

  /** Drop the oldest states first; episodes go only when no states are left. */
  private enforceLimit(): void {
    let overflow = this.bufferedCount - this.maxBuffered;
    if (overflow <= 0) return;

    const states = Math.min(overflow, this.stateBuffer.length);
    this.stateBuffer.splice(0, states);
    overflow -= states;
    this.episodeBuffer.splice(0, overflow);

    this.dropped += states + overflow;
    log.warn({ states, episodes: overflow, dropped: this.dropped }, 'Record buffer full, oldest records dropped');
  }
}

// ============================================================================
// Write errors
// ============================================================================

/**
 * The records of a failed batch that still need writing.
 *
 * A bulk write error lists the rejected documents by index; anything else
 * leaves the outcome unknown and the whole batch is kept.
 */
function rejected<T>(batch: T[], error: unknown): T[] {
  const indexes = retryableIndexes(error);
  if (!indexes) return batch;
  return batch.filter((_, i) => indexes.has(i));
}

function retryableIndexes(error: unknown): Set<number> | null {
  if (typeof error !== 'object' || error === null || !('writeErrors' in error)) return null;

  const listed: unknown = error.writeErrors;
  const writeErrors: unknown[] = Array.isArray(listed) ? listed : [listed];
  const indexes = new Set<number>();
  for (const writeError of writeErrors) {
    if (typeof writeError !== 'object' || writeError === null) return null;
    if (!('index' in writeError) || typeof writeError.index !== 'number') return null;
    if ('code' in writeError && writeError.code === DUPLICATE_KEY) continue;
    indexes.add(writeError.index);
  }
  return indexes;
}
