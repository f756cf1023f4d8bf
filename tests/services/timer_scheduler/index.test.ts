/**
 * @file Tests for the Timer Scheduler
 */

import { TimerScheduler } from '../../../src/services/timer_scheduler';

describe('TimerScheduler', () => {
  let timers: TimerScheduler;

  beforeEach(() => {
    jest.useFakeTimers();
    timers = new TimerScheduler();
  });

  afterEach(() => {
    timers.cancelAll();
    jest.useRealTimers();
  });

  it('should run periodic callbacks until cancelled', () => {
    const callback = jest.fn();
    const id = timers.every('fusion', 200, callback);

    jest.advanceTimersByTime(1000);
    expect(callback).toHaveBeenCalledTimes(5);

    expect(timers.cancel(id)).toBe(true);
    jest.advanceTimersByTime(1000);
    expect(callback).toHaveBeenCalledTimes(5);
    expect(timers.cancel(id)).toBe(false);
  });

  it('should forget a one-shot timer once it has fired', () => {
    const callback = jest.fn();
    const id = timers.once('session:end', 500, callback);
    expect(timers.has(id)).toBe(true);

    jest.advanceTimersByTime(500);

    expect(callback).toHaveBeenCalledTimes(1);
    expect(timers.has(id)).toBe(false);
    expect(timers.activeCount).toBe(0);
  });

  it('should let a one-shot callback schedule its successor in the same group', () => {
    const fired: string[] = [];
    timers.once('session:phase', 100, () => {
      fired.push('awareness');
      timers.once('session:phase', 100, () => fired.push('integration'));
    });

    jest.advanceTimersByTime(100);
    expect(timers.list('session:phase')).toHaveLength(1);

    jest.advanceTimersByTime(100);
    expect(fired).toEqual(['awareness', 'integration']);
    expect(timers.activeCount).toBe(0);
  });

  it('should cancel a whole group and leave the others running', () => {
    const phase = jest.fn();
    const tick = jest.fn();
    timers.once('session:phase', 100, phase);
    timers.once('session:phase', 200, phase);
    timers.every('responses', 50, tick);

    expect(timers.cancelGroup('session:phase')).toBe(2);
    expect(timers.cancelGroup('session:phase')).toBe(0);

    jest.advanceTimersByTime(200);
    expect(phase).not.toHaveBeenCalled();
    expect(tick).toHaveBeenCalledTimes(4);
    expect(timers.list()).toEqual([{ id: 'responses:3', group: 'responses', kind: 'every' }]);
  });

  it('should keep ticking after a callback throws', () => {
    let calls = 0;
    timers.every('responses', 100, () => {
      calls++;
      throw new Error('tick failed');
    });

    jest.advanceTimersByTime(300);

    expect(calls).toBe(3);
  });

  it('should skip a callback cancelled by an earlier one in the same turn', () => {
    const second = jest.fn();
    let secondId = '';
    timers.once('a', 100, () => {
      timers.cancel(secondId);
    });
    secondId = timers.once('b', 100, second);

    jest.advanceTimersByTime(100);

    expect(second).not.toHaveBeenCalled();
  });

  it('should clear everything on cancelAll', () => {
    timers.every('fusion', 200, jest.fn());
    timers.once('session:end', 1000, jest.fn());

    timers.cancelAll();

    expect(timers.activeCount).toBe(0);
    expect(jest.getTimerCount()).toBe(0);
  });
});
