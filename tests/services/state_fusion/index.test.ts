/**
 * @file Tests for the State Fusion Engine
 */

import { StateFusionEngine } from '../../../src/services/state_fusion';
import { TimerScheduler } from '../../../src/services/timer_scheduler';
import type { IntegratedState } from '../../../src/models/integrated_state';
import { makeFacial, makePhysiological } from '../../fixtures/samples';

describe('StateFusionEngine', () => {
  let timers: TimerScheduler;
  let states: IntegratedState[];

  beforeEach(() => {
    jest.useFakeTimers();
    jest.setSystemTime(10_000);
    timers = new TimerScheduler();
    states = [];
  });

  afterEach(() => {
    timers.cancelAll();
    jest.useRealTimers();
  });

  function startEngine(holdStaleSamples = true): StateFusionEngine {
    const engine = new StateFusionEngine(timers, { holdStaleSamples });
    engine.onState(state => states.push(state));
    engine.start();
    return engine;
  }

  it('should emit nothing until both inputs have a sample', () => {
    const engine = startEngine();
    engine.submitFacialSample(makeFacial());

    jest.advanceTimersByTime(1000);

    expect(states).toHaveLength(0);
  });

  it('should emit one state per 200ms tick once both inputs are present', () => {
    const engine = startEngine();
    engine.submitFacialSample(makeFacial());
    engine.submitPhysiologicalSample(makePhysiological());

    jest.advanceTimersByTime(200);
    expect(states).toHaveLength(1);
    expect(states[0].timestamp).toBe(10_200);

    jest.advanceTimersByTime(1000);
    expect(states).toHaveLength(6);
  });

  it('should skip ticks without new samples when stale samples are not held', () => {
    const engine = startEngine(false);
    engine.submitFacialSample(makeFacial());
    engine.submitPhysiologicalSample(makePhysiological());

    jest.advanceTimersByTime(800);
    expect(states).toHaveLength(1);

    engine.submitFacialSample(makeFacial({ primaryEmotion: 'sadness' }));
    jest.advanceTimersByTime(200);

    expect(states).toHaveLength(2);
    expect(states[1].facial.primaryEmotion).toBe('sadness');
  });

  it('should fuse the latest sample when several arrive between ticks', () => {
    const engine = startEngine();
    engine.submitPhysiologicalSample(makePhysiological());
    engine.submitFacialSample(makeFacial({ primaryEmotion: 'anger' }));
    engine.submitFacialSample(makeFacial({ primaryEmotion: 'fear' }));

    jest.advanceTimersByTime(200);

    expect(states[0].facial.primaryEmotion).toBe('fear');
  });

  it('should drop samples submitted while stopped', () => {
    const engine = new StateFusionEngine(timers);
    engine.onState(state => states.push(state));
    engine.submitFacialSample(makeFacial());
    engine.submitPhysiologicalSample(makePhysiological());

    engine.start();
    jest.advanceTimersByTime(1000);

    expect(states).toHaveLength(0);
  });

  it('should snapshot samples on submission', () => {
    const engine = startEngine();
    const facial = makeFacial({ primaryEmotion: 'happiness' });
    engine.submitFacialSample(facial);
    engine.submitPhysiologicalSample(makePhysiological());
    facial.primaryEmotion = 'anger';

    jest.advanceTimersByTime(200);

    expect(states[0].facial.primaryEmotion).toBe('happiness');
  });

  it('should cancel its timer and forget samples on stop', () => {
    const engine = startEngine();
    engine.submitFacialSample(makeFacial());
    engine.submitPhysiologicalSample(makePhysiological());

    engine.stop();
    expect(timers.activeCount).toBe(0);

    engine.start();
    jest.advanceTimersByTime(1000);
    expect(states).toHaveLength(0);
  });

  it('should stop delivering to a released listener', () => {
    const engine = new StateFusionEngine(timers);
    const release = engine.onState(state => states.push(state));
    engine.start();
    engine.submitFacialSample(makeFacial());
    engine.submitPhysiologicalSample(makePhysiological());

    jest.advanceTimersByTime(200);
    release();
    jest.advanceTimersByTime(200);

    expect(states).toHaveLength(1);
  });
});
