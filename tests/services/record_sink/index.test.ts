/**
 * @file Tests for the record sinks
 */

import type { BulkWriteOptions, Document, IndexSpecification, InsertManyResult, OptionalUnlessRequiredId } from 'mongodb';
import { MemorySink, MongoRecordSink, MultiSink } from '../../../src/services/record_sink';
import type { EpisodeRecord, StateRecord } from '../../../src/services/record_sink';
import { createEpisode } from '../../../src/models/dissociation';
import { makeState } from '../../fixtures/samples';

function fakeCollection<T extends Document>() {
  return {
    insertMany: jest.fn(
      async (docs: ReadonlyArray<OptionalUnlessRequiredId<T>>, _options?: BulkWriteOptions): Promise<InsertManyResult<T>> => ({
        acknowledged: true,
        insertedCount: docs.length,
        insertedIds: {},
      })
    ),
    createIndex: jest.fn(async (spec: IndexSpecification): Promise<string> => JSON.stringify(spec)),
  };
}

const episode = createEpisode(1000, 7000, 0.7);

/** Shaped like the driver's bulk write error: rejected documents by batch index. */
function bulkWriteError(writeErrors: Array<{ index: number; code: number }>): Error {
  return Object.assign(new Error('bulk write failed'), { writeErrors });
}

function settle(): Promise<void> {
  return new Promise(resolve => setImmediate(resolve));
}

describe('MemorySink', () => {
  it('should keep records with their session', async () => {
    const sink = new MemorySink();

    sink.writeState('session-1', makeState({ timestamp: 200 }));
    sink.writeEpisode('session-1', episode);
    await sink.flush();
    await sink.close();

    expect(sink.states).toHaveLength(1);
    expect(sink.states[0].sessionId).toBe('session-1');
    expect(sink.states[0].state.timestamp).toBe(200);
    expect(sink.episodes).toEqual([{ sessionId: 'session-1', episode }]);
    expect(sink.flushCount).toBe(1);
    expect(sink.closed).toBe(true);
  });
});

describe('MultiSink', () => {
  it('should fan out writes, flushes and closes', async () => {
    const first = new MemorySink();
    const second = new MemorySink();
    const sink = new MultiSink([first, second]);

    sink.writeState('session-1', makeState());
    sink.writeEpisode('session-1', episode);
    await sink.flush();
    await sink.close();

    for (const target of [first, second]) {
      expect(target.states).toHaveLength(1);
      expect(target.episodes).toHaveLength(1);
      expect(target.flushCount).toBe(1);
      expect(target.closed).toBe(true);
    }
  });
});

describe('MongoRecordSink', () => {
  let states: ReturnType<typeof fakeCollection<StateRecord>>;
  let episodes: ReturnType<typeof fakeCollection<EpisodeRecord>>;

  beforeEach(() => {
    states = fakeCollection<StateRecord>();
    episodes = fakeCollection<EpisodeRecord>();
  });

  it('should create the lookup indexes', async () => {
    await new MongoRecordSink({ states, episodes }).setup();

    expect(states.createIndex.mock.calls.map(call => call[0])).toEqual([
      { sessionId: 1, timestamp: 1 },
      { needsSync: 1 },
    ]);
    expect(episodes.createIndex).toHaveBeenCalledWith({ sessionId: 1, startTime: 1 });
  });

  it('should buffer until flushed', async () => {
    const sink = new MongoRecordSink({ states, episodes });

    sink.writeState('session-1', makeState({ timestamp: 200 }));
    sink.writeEpisode('session-1', episode);
    expect(sink.bufferedCount).toBe(2);
    expect(states.insertMany).not.toHaveBeenCalled();

    await sink.flush();

    expect(sink.bufferedCount).toBe(0);
    const [written] = states.insertMany.mock.calls[0][0];
    expect(written.sessionId).toBe('session-1');
    expect(written.timestamp).toBe(200);
    expect(written.needsSync).toBe(true);
    expect(written.recordedAt).toBeInstanceOf(Date);
    expect(episodes.insertMany.mock.calls[0][0][0].severity).toBe('mild');
  });

  it('should not touch the database when nothing is buffered', async () => {
    await new MongoRecordSink({ states, episodes }).flush();

    expect(states.insertMany).not.toHaveBeenCalled();
    expect(episodes.insertMany).not.toHaveBeenCalled();
  });

  it('should flush on its own once a batch is full', async () => {
    const sink = new MongoRecordSink({ states, episodes }, { batchSize: 3 });

    sink.writeState('session-1', makeState({ timestamp: 0 }));
    sink.writeState('session-1', makeState({ timestamp: 200 }));
    expect(states.insertMany).not.toHaveBeenCalled();

    sink.writeState('session-1', makeState({ timestamp: 400 }));
    expect(states.insertMany).toHaveBeenCalledTimes(1);
    expect(states.insertMany.mock.calls[0][0]).toHaveLength(3);

    await sink.close();
    expect(states.insertMany).toHaveBeenCalledTimes(1);
  });

  it('should put a failed batch back for the next flush', async () => {
    states.insertMany.mockRejectedValueOnce(new Error('write failed'));
    const sink = new MongoRecordSink({ states, episodes });

    sink.writeState('session-1', makeState());
    sink.writeEpisode('session-1', episode);

    await expect(sink.flush()).rejects.toThrow('write failed');
    expect(sink.bufferedCount).toBe(2);
    expect(episodes.insertMany).not.toHaveBeenCalled();

    await sink.flush();
    expect(states.insertMany).toHaveBeenCalledTimes(2);
    expect(episodes.insertMany).toHaveBeenCalledTimes(1);
    expect(sink.bufferedCount).toBe(0);
  });

  it('should only restore episodes when their insert fails', async () => {
    episodes.insertMany.mockRejectedValueOnce(new Error('write failed'));
    const sink = new MongoRecordSink({ states, episodes });

    sink.writeState('session-1', makeState());
    sink.writeEpisode('session-1', episode);

    await expect(sink.flush()).rejects.toThrow('write failed');
    expect(sink.bufferedCount).toBe(1);
  });

  it('should retry a failed background batch on the next flush', async () => {
    states.insertMany.mockRejectedValueOnce(new Error('write failed'));
    const sink = new MongoRecordSink({ states, episodes }, { batchSize: 2 });

    sink.writeState('session-1', makeState({ timestamp: 0 }));
    sink.writeState('session-1', makeState({ timestamp: 200 }));

    await sink.flush();

    expect(states.insertMany).toHaveBeenCalledTimes(2);
    expect(states.insertMany.mock.calls[1][0].map(doc => doc.timestamp)).toEqual([0, 200]);
    expect(sink.bufferedCount).toBe(0);
  });

  it('should insert unordered with an id fixed when the record is buffered', async () => {
    const sink = new MongoRecordSink({ states, episodes });

    sink.writeState('session-1', makeState());
    await sink.flush();

    const [docs, options] = states.insertMany.mock.calls[0];
    expect(options).toEqual({ ordered: false });
    expect(docs[0]._id.toHexString()).toHaveLength(24);
  });

  it('should put back only the documents the server rejected', async () => {
    states.insertMany.mockRejectedValueOnce(bulkWriteError([{ index: 1, code: 6 }, { index: 3, code: 11000 }]));
    const sink = new MongoRecordSink({ states, episodes });

    for (const timestamp of [0, 200, 400, 600]) {
      sink.writeState('session-1', makeState({ timestamp }));
    }

    await expect(sink.flush()).rejects.toThrow('bulk write failed');
    expect(sink.bufferedCount).toBe(1);

    await sink.flush();

    const [first, retry] = states.insertMany.mock.calls.map(call => call[0]);
    expect(retry.map(doc => doc.timestamp)).toEqual([200]);
    expect(retry[0]._id).toBe(first[1]._id);
    expect(sink.bufferedCount).toBe(0);
  });

  it('should treat a batch rejected only for duplicate keys as stored', async () => {
    episodes.insertMany.mockRejectedValueOnce(bulkWriteError([{ index: 0, code: 11000 }]));
    const sink = new MongoRecordSink({ states, episodes });

    sink.writeEpisode('session-1', episode);

    await expect(sink.flush()).resolves.toBeUndefined();
    expect(sink.bufferedCount).toBe(0);
  });

  it('should drop the oldest states once the buffer is full', async () => {
    const sink = new MongoRecordSink({ states, episodes }, { maxBuffered: 3 });

    sink.writeEpisode('session-1', episode);
    for (const timestamp of [0, 200, 400, 600]) {
      sink.writeState('session-1', makeState({ timestamp }));
    }

    expect(sink.bufferedCount).toBe(3);
    expect(sink.droppedCount).toBe(2);

    await sink.flush();
    expect(states.insertMany.mock.calls[0][0].map(doc => doc.timestamp)).toEqual([400, 600]);
    expect(episodes.insertMany.mock.calls[0][0]).toHaveLength(1);
  });

  it('should wait out the backoff before retrying in the background', async () => {
    let clock = 0;
    states.insertMany.mockRejectedValueOnce(new Error('write failed'));
    const sink = new MongoRecordSink({ states, episodes }, { batchSize: 2, retryBackoffMs: 1000, now: () => clock });

    sink.writeState('session-1', makeState({ timestamp: 0 }));
    sink.writeState('session-1', makeState({ timestamp: 200 }));
    await settle();
    expect(states.insertMany).toHaveBeenCalledTimes(1);
    expect(sink.bufferedCount).toBe(2);

    clock = 500;
    sink.writeState('session-1', makeState({ timestamp: 400 }));
    expect(states.insertMany).toHaveBeenCalledTimes(1);

    clock = 1000;
    sink.writeState('session-1', makeState({ timestamp: 600 }));
    await settle();

    expect(states.insertMany).toHaveBeenCalledTimes(2);
    expect(states.insertMany.mock.calls[1][0].map(doc => doc.timestamp)).toEqual([0, 200, 400, 600]);
    expect(sink.bufferedCount).toBe(0);
  });
});
