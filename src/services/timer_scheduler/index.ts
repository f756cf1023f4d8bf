/**
 * @file Timer Scheduler - single owner of every periodic and one-shot timer
 *
 * Components never call setTimeout/setInterval directly. Each timer belongs
 * to a group (usually the owning component) and carries a cancellation
 * token, so a whole group can be torn down synchronously and a callback that
 * was already queued by the runtime still sees it was cancelled.
 */

import { createLogger } from '../../utils/logger';

const log = createLogger('TimerScheduler');

// ============================================================================
// Types
// ============================================================================

export type TimerKind = 'once' | 'every';

interface CancellationToken {
  cancelled: boolean;
}

interface ScheduledTimer {
  id: string;
  group: string;
  kind: TimerKind;
  handle: NodeJS.Timeout;
  token: CancellationToken;
}

export interface TimerInfo {
  id: string;
  group: string;
  kind: TimerKind;
}

// ============================================================================
// Scheduler
// ============================================================================

export class TimerScheduler {
  private timers: Map<string, ScheduledTimer> = new Map();
  private sequence = 0;

  /**
   * Run `callback` every `intervalMs` until cancelled.
   */
  every(group: string, intervalMs: number, callback: () => void): string {
    const id = this.nextId(group);
    const token: CancellationToken = { cancelled: false };

    const handle = setInterval(() => {
      if (token.cancelled) return;
      this.invoke(id, callback);
    }, intervalMs);

    this.timers.set(id, { id, group, kind: 'every', handle, token });
    return id;
  }

  /**
   * Run `callback` once after `delayMs`. The timer forgets itself before the
   * callback runs, so the callback may schedule a replacement in the same group.
   */
  once(group: string, delayMs: number, callback: () => void): string {
    const id = this.nextId(group);
    const token: CancellationToken = { cancelled: false };

    const handle = setTimeout(() => {
      if (token.cancelled) return;
      this.timers.delete(id);
      this.invoke(id, callback);
    }, Math.max(0, delayMs));

    this.timers.set(id, { id, group, kind: 'once', handle, token });
    return id;
  }

  cancel(id: string): boolean {
    const timer = this.timers.get(id);
    if (!timer) return false;

    this.clear(timer);
    this.timers.delete(id);
    return true;
  }

  /**
   * Cancel every timer in a group. Returns how many were cancelled.
   */
  cancelGroup(group: string): number {
    let count = 0;
    for (const [id, timer] of this.timers) {
      if (timer.group !== group) continue;
      this.clear(timer);
      this.timers.delete(id);
      count++;
    }
    if (count > 0) {
      log.debug({ group, count }, 'Cancelled timer group');
    }
    return count;
  }

  cancelAll(): void {
    for (const timer of this.timers.values()) {
      this.clear(timer);
    }
    this.timers.clear();
  }

  has(id: string): boolean {
    return this.timers.has(id);
  }

  get activeCount(): number {
    return this.timers.size;
  }

  list(group?: string): TimerInfo[] {
    return [...this.timers.values()]
      .filter(t => group === undefined || t.group === group)
      .map(({ id, group: g, kind }) => ({ id, group: g, kind }));
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private nextId(group: string): string {
    this.sequence++;
    return `${group}:${this.sequence}`;
  }

  private clear(timer: ScheduledTimer): void {
    timer.token.cancelled = true;
    if (timer.kind === 'every') {
      clearInterval(timer.handle);
    } else {
      clearTimeout(timer.handle);
    }
  }

  private invoke(id: string, callback: () => void): void {
    try {
      callback();
    } catch (error) {
      log.error({ err: error, timerId: id }, 'Timer callback failed');
    }
  }
}
