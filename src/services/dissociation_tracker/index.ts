/**
 * @file Dissociation Tracker - episode detection over the fused-state stream
 *
 * An episode opens when the dissociation index rises above the threshold and
 * closes when it falls back to or below it. Episodes shorter than the mild
 * threshold are discarded as noise; longer ones are recorded (bounded history)
 * and reported once as `recent`.
 *
 * Durations come from state timestamps, never from the wall clock, so the
 * tracker replays deterministically.
 */

import { EventEmitter } from 'events';
import type { IntegratedState } from '../../models/integrated_state';
import { DISSOCIATION_THRESHOLD } from '../../models/integrated_state';
import type { DissociationEpisode, DissociationSeverity, DissociationStatus } from '../../models/dissociation';
import { createEpisode, NO_DISSOCIATION } from '../../models/dissociation';
import { createLogger } from '../../utils/logger';

const log = createLogger('DissociationTracker');

// ============================================================================
// Thresholds
// ============================================================================

/** Seconds an open episode must last to reach each severity. */
export const SEVERITY_DURATIONS = {
  mild: 5,
  moderate: 30,
  severe: 120,
} as const;

export const EPISODE_HISTORY_LIMIT = 20;

export function activeSeverity(durationSeconds: number): DissociationSeverity {
  if (durationSeconds >= SEVERITY_DURATIONS.severe) return 'severe';
  if (durationSeconds >= SEVERITY_DURATIONS.moderate) return 'moderate';
  if (durationSeconds >= SEVERITY_DURATIONS.mild) return 'mild';
  return 'potential';
}

interface OpenEpisode {
  startTime: number;
  maxIntensity: number;
}

// ============================================================================
// Tracker
// ============================================================================

export class DissociationTracker extends EventEmitter {
  private open: OpenEpisode | null = null;
  private episodes: DissociationEpisode[] = [];
  private lastStatus: DissociationStatus = NO_DISSOCIATION;

  constructor(
    private readonly threshold: number = DISSOCIATION_THRESHOLD,
    private readonly historyLimit: number = EPISODE_HISTORY_LIMIT
  ) {
    super();
  }

  get inEpisode(): boolean {
    return this.open !== null;
  }

  get status(): DissociationStatus {
    return this.lastStatus;
  }

  /**
   * Advance the state machine with one fused state.
   */
  process(state: IntegratedState): DissociationStatus {
    this.lastStatus = this.step(state);
    return this.lastStatus;
  }

  private step(state: IntegratedState): DissociationStatus {
    const index = state.dissociationIndex;
    const above = index > this.threshold;

    if (!this.open) {
      if (!above) return NO_DISSOCIATION;

      this.open = { startTime: state.timestamp, maxIntensity: index };
      log.debug({ intensity: index }, 'Dissociation episode opened');
      return { status: 'active', severity: 'potential', duration: 0, intensity: index };
    }

    const duration = (state.timestamp - this.open.startTime) / 1000;

    if (above) {
      this.open.maxIntensity = Math.max(this.open.maxIntensity, index);
      return { status: 'active', severity: activeSeverity(duration), duration, intensity: index };
    }

    const episode = this.closeEpisode(state.timestamp);
    if (!episode) return NO_DISSOCIATION;
    return { status: 'recent', severity: episode.severity, duration: episode.duration, intensity: episode.maxIntensity };
  }

  /**
   * Close an episode that is still open, e.g. when the session ends mid-episode.
   * Returns the recorded episode, or null when none was open or it was too brief.
   */
  closeOpenEpisode(timestamp: number): DissociationEpisode | null {
    if (!this.open) return null;

    const episode = this.closeEpisode(timestamp);
    this.lastStatus = episode
      ? { status: 'recent', severity: episode.severity, duration: episode.duration, intensity: episode.maxIntensity }
      : NO_DISSOCIATION;
    return episode;
  }

  private closeEpisode(endTime: number): DissociationEpisode | null {
    if (!this.open) return null;

    const { startTime, maxIntensity } = this.open;
    this.open = null;

    const duration = (endTime - startTime) / 1000;
    if (duration < SEVERITY_DURATIONS.mild) {
      log.debug({ duration }, 'Dissociation spike too brief, discarded');
      return null;
    }

    const episode = createEpisode(startTime, endTime, maxIntensity);
    this.episodes.push(episode);
    if (this.episodes.length > this.historyLimit) {
      this.episodes.splice(0, this.episodes.length - this.historyLimit);
    }

    log.info({ duration: episode.duration, severity: episode.severity, maxIntensity }, 'Dissociation episode recorded');
    this.emit('episode', episode);
    return episode;
  }

  /** Recorded episodes, oldest first, optionally only those starting at or after `since`. */
  getEpisodes(since?: number): DissociationEpisode[] {
    if (since === undefined) return [...this.episodes];
    return this.episodes.filter(e => e.startTime >= since);
  }

  getTotalDissociationTime(since?: number): number {
    return this.getEpisodes(since).reduce((sum, e) => sum + e.duration, 0);
  }

  onEpisode(listener: (episode: DissociationEpisode) => void): () => void {
    this.on('episode', listener);
    return () => {
      this.off('episode', listener);
    };
  }

  reset(): void {
    this.open = null;
    this.episodes = [];
    this.lastStatus = NO_DISSOCIATION;
  }
}
