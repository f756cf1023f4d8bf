/**
 * @file Diff between consecutive fused states and its significance filter.
 */

import type { IntegratedState, StateChange } from '../../models/integrated_state';

export const CHANGE_THRESHOLDS = {
  intensity: 0.25,
  arousal: 0.2,
  coherence: 0.2,
  dissociation: 0.2,
  /** A dissociation change only matters above this level */
  significantDissociation: 0.5,
  /** An arousal change only matters above this level */
  significantArousal: 0.7,
} as const;

export function diffStates(from: IntegratedState, to: IntegratedState): StateChange {
  const emotionChanged = from.dominantEmotion !== to.dominantEmotion;
  const intensityChanged = Math.abs(to.emotionalIntensity - from.emotionalIntensity) > CHANGE_THRESHOLDS.intensity;
  const arousalChanged = Math.abs(to.arousalLevel - from.arousalLevel) > CHANGE_THRESHOLDS.arousal;
  const coherenceChanged = Math.abs(to.coherenceIndex - from.coherenceIndex) > CHANGE_THRESHOLDS.coherence;
  const dissociationChanged = Math.abs(to.dissociationIndex - from.dissociationIndex) > CHANGE_THRESHOLDS.dissociation;
  const regulationChanged = from.emotionalRegulation !== to.emotionalRegulation;

  const isSignificant =
    emotionChanged ||
    intensityChanged ||
    regulationChanged ||
    (dissociationChanged && to.dissociationIndex > CHANGE_THRESHOLDS.significantDissociation) ||
    (arousalChanged && to.arousalLevel > CHANGE_THRESHOLDS.significantArousal);

  return {
    from,
    to,
    emotionChanged,
    intensityChanged,
    arousalChanged,
    coherenceChanged,
    dissociationChanged,
    regulationChanged,
    isSignificant,
  };
}
