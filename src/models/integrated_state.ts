/**
 * @file The fused state produced once per fusion tick.
 */

import type { EmotionType, FacialSample } from './emotion';
import type { PhysiologicalSample } from './physiology';

export type RegulationState =
  | 'regulated'
  | 'mildDysregulation'
  | 'moderateDysregulation'
  | 'severeDysregulation';

export type DataQuality = 'invalid' | 'poor' | 'fair' | 'good' | 'excellent';

export interface IntegratedState {
  timestamp: number;
  facial: FacialSample;
  physiological: PhysiologicalSample;
  coherenceIndex: number;
  emotionalMaskingIndex: number;
  dissociationIndex: number;
  dominantEmotion: EmotionType;
  emotionalIntensity: number;
  emotionalRegulation: RegulationState;
  arousalLevel: number;
  dataQuality: DataQuality;
}

export const MASKING_THRESHOLD = 0.6;
export const DISSOCIATION_THRESHOLD = 0.6;

export function isMasked(state: IntegratedState): boolean {
  return state.emotionalMaskingIndex > MASKING_THRESHOLD;
}

export function isRegulated(state: IntegratedState): boolean {
  return state.emotionalRegulation === 'regulated';
}

/** Safety decisions are never taken on these. */
export function isUnreliable(quality: DataQuality): boolean {
  return quality === 'invalid' || quality === 'poor';
}

/**
 * Difference between two consecutive fused states.
 */
export interface StateChange {
  from: IntegratedState;
  to: IntegratedState;
  emotionChanged: boolean;
  intensityChanged: boolean;
  arousalChanged: boolean;
  coherenceChanged: boolean;
  dissociationChanged: boolean;
  regulationChanged: boolean;
  isSignificant: boolean;
}
