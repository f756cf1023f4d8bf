/**
 * @file Dissociation episodes and the per-tick tracker status.
 */

export type EpisodeSeverity = 'mild' | 'moderate' | 'severe';
export type DissociationSeverity = 'potential' | EpisodeSeverity;

export interface DissociationEpisode {
  startTime: number;
  endTime: number;
  /** Seconds */
  duration: number;
  maxIntensity: number;
  severity: EpisodeSeverity;
}

export type DissociationStatus =
  | { status: 'none' }
  | { status: 'active'; severity: DissociationSeverity; duration: number; intensity: number }
  | { status: 'recent'; severity: EpisodeSeverity; duration: number; intensity: number };

export const NO_DISSOCIATION: DissociationStatus = { status: 'none' };

/**
 * Severity of a closed episode. Long or very intense episodes rank higher.
 */
export function episodeSeverity(duration: number, maxIntensity: number): EpisodeSeverity {
  if (duration > 120 || maxIntensity > 0.9) return 'severe';
  if (duration > 30 || maxIntensity > 0.8) return 'moderate';
  return 'mild';
}

export function createEpisode(startTime: number, endTime: number, maxIntensity: number): DissociationEpisode {
  const duration = (endTime - startTime) / 1000;
  return {
    startTime,
    endTime,
    duration,
    maxIntensity,
    severity: episodeSeverity(duration, maxIntensity),
  };
}
