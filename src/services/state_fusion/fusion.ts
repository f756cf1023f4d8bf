/**
 * @file Fusion calculators - pure functions from a sample pair to fused indices
 *
 * Each index is clamped to [0, 1] before it leaves this module.
 */

import type { DetectionQuality, EmotionType, FacialSample } from '../../models/emotion';
import type { PhysiologicalSample } from '../../models/physiology';
import { normalizedHrv } from '../../models/physiology';
import type { DataQuality, IntegratedState, RegulationState } from '../../models/integrated_state';
import { clamp01 } from '../../utils/math';

// ============================================================================
// Expected arousal bands
// ============================================================================

interface ArousalBand {
  min: number;
  max: number;
}

/**
 * Physiological arousal expected when a face shows the given emotion.
 * Emotions without a band get a neutral coherence of 0.5.
 */
export const EXPECTED_AROUSAL: Partial<Record<EmotionType, ArousalBand>> = {
  happiness: { min: 0.4, max: 0.8 },
  anger: { min: 0.6, max: 1.0 },
  surprise: { min: 0.5, max: 0.9 },
  sadness: { min: 0.2, max: 0.6 },
  disgust: { min: 0.3, max: 0.7 },
  fear: { min: 0.6, max: 1.0 },
  neutral: { min: 0.0, max: 0.3 },
};

const UNBANDED_COHERENCE = 0.5;
const FREEZE_COHERENT = 0.6;

/**
 * 1.0 at the band center falling to 0.5 at its edges; outside the band it
 * falls from 0.5 towards 0 with the distance to the nearest edge.
 */
export function bandAgreement(arousal: number, band: ArousalBand): number {
  const center = (band.min + band.max) / 2;
  const halfWidth = (band.max - band.min) / 2;

  if (arousal >= band.min && arousal <= band.max) {
    if (halfWidth === 0) return 1;
    return 1 - 0.5 * (Math.abs(arousal - center) / halfWidth);
  }

  const edgeDistance = arousal < band.min ? band.min - arousal : arousal - band.max;
  const maxDistance = Math.max(band.min, 1 - band.max);
  if (maxDistance === 0) return 0;
  return 0.5 * (1 - Math.min(1, edgeDistance / maxDistance));
}

function physiologicalBonus(emotion: EmotionType, physiological: PhysiologicalSample): number {
  const { heartRate, electrodermal } = physiological;

  switch (emotion) {
    case 'anger':
      return heartRate.rate > 100 && heartRate.variability < 30 ? 0.2 : 0;
    case 'fear':
      return electrodermal.responseCount >= 5 ? 0.1 : 0;
    case 'happiness':
      return heartRate.variability > 50 ? 0.1 : 0;
    case 'sadness':
      return heartRate.rate < 70 ? 0.1 : 0;
    default:
      return 0;
  }
}

// ============================================================================
// Indices
// ============================================================================

export function calculateCoherence(facial: FacialSample, physiological: PhysiologicalSample): number {
  const emotion = facial.primaryEmotion;
  const arousal = clamp01(physiological.arousalLevel);
  const band = EXPECTED_AROUSAL[emotion];

  let base: number;
  if (emotion === 'fear' && physiological.motion.freezeIndex > FREEZE_COHERENT) {
    base = 0.8 + Math.min(0.2, arousal * 0.2);
  } else if (band) {
    base = bandAgreement(arousal, band);
  } else {
    base = UNBANDED_COHERENCE;
  }

  const corroborated = Math.min(1, base + physiologicalBonus(emotion, physiological));
  return clamp01(corroborated * clamp01(facial.confidence) * clamp01(physiological.qualityIndex));
}

export function calculateMasking(
  facial: FacialSample,
  physiological: PhysiologicalSample,
  coherence: number
): number {
  const arousal = clamp01(physiological.arousalLevel);
  let masking = 0;

  if (facial.primaryEmotion === 'neutral' && arousal > 0.6) {
    masking = Math.min(1, arousal * 1.5);
  }

  // A smile over a stressed body
  if (facial.primaryEmotion === 'happiness' && normalizedHrv(physiological) < 0.3 && arousal > 0.7) {
    masking = Math.max(masking, 0.8);
  }

  return clamp01(Math.max(masking, 1 - coherence));
}

export function calculateDissociation(
  facial: FacialSample,
  physiological: PhysiologicalSample,
  coherence: number
): number {
  let index = 0;

  if (facial.primaryEmotion === 'neutral' && facial.primaryIntensity < 0.3) {
    index += 0.4;
  }
  if (physiological.motion.freezeIndex > 0.7) {
    index += 0.4;
  }
  if (physiological.heartRate.variability < 20 && physiological.heartRate.rate < 70) {
    index += 0.3;
  }
  if (facial.microExpressions.length === 0 && facial.confidence > 0.8) {
    index += 0.2;
  }
  if (coherence < 0.3) {
    index += 0.3 * (1 - coherence);
  }

  return clamp01(index);
}

// ============================================================================
// Classification
// ============================================================================

export function determineDominantEmotion(
  facial: FacialSample,
  physiological: PhysiologicalSample,
  dissociation: number
): EmotionType {
  if (facial.confidence > 0.7 && facial.primaryIntensity > 0.5) {
    return facial.primaryEmotion;
  }

  if (facial.confidence < 0.4 && physiological.qualityIndex > 0.7) {
    const arousal = physiological.arousalLevel;
    if (arousal > 0.8) {
      return physiological.motion.freezeIndex > 0.7 ? 'fear' : 'anger';
    }
    if (arousal < 0.3) {
      return 'sadness';
    }
  }

  if (dissociation > 0.7) {
    return 'dissociation';
  }

  return facial.primaryEmotion;
}

export function calculateIntensity(facial: FacialSample, physiological: PhysiologicalSample): number {
  const facialIntensity = clamp01(facial.primaryIntensity);
  const bodyIntensity = clamp01(physiological.arousalLevel);
  const facialWeight = clamp01(facial.confidence);
  const bodyWeight = clamp01(physiological.qualityIndex);

  const totalWeight = facialWeight + bodyWeight;
  if (totalWeight > 0) {
    return clamp01((facialIntensity * facialWeight + bodyIntensity * bodyWeight) / totalWeight);
  }
  return clamp01((facialIntensity + bodyIntensity) / 2);
}

export function determineRegulation(physiological: PhysiologicalSample, coherence: number): RegulationState {
  const hrv = normalizedHrv(physiological);
  const arousal = physiological.arousalLevel;

  if (hrv > 0.6 && coherence > 0.6) return 'regulated';
  if (arousal > 0.8 && hrv < 0.3) return 'severeDysregulation';
  if (arousal > 0.6 && hrv < 0.4) return 'moderateDysregulation';
  if (arousal > 0.5 && hrv < 0.5) return 'mildDysregulation';
  return 'regulated';
}

export function assessDataQuality(faceQuality: DetectionQuality, bioQuality: number): DataQuality {
  if (faceQuality === 'noFace' || bioQuality < 0.2) return 'invalid';

  if ((faceQuality === 'excellent' && bioQuality > 0.8) || (faceQuality === 'good' && bioQuality > 0.9)) {
    return 'excellent';
  }
  if (
    (faceQuality === 'excellent' && bioQuality > 0.6) ||
    (faceQuality === 'good' && bioQuality > 0.7) ||
    (faceQuality === 'fair' && bioQuality > 0.8)
  ) {
    return 'good';
  }
  if ((faceQuality === 'poor' && bioQuality < 0.5) || (faceQuality === 'fair' && bioQuality < 0.4)) {
    return 'poor';
  }
  return 'fair';
}

/**
 * Fuse one facial/physiological pair into an IntegratedState.
 */
export function fuseSamples(facial: FacialSample, physiological: PhysiologicalSample, timestamp: number): IntegratedState {
  const coherenceIndex = calculateCoherence(facial, physiological);
  const dissociationIndex = calculateDissociation(facial, physiological, coherenceIndex);

  return {
    timestamp,
    facial,
    physiological,
    coherenceIndex,
    emotionalMaskingIndex: calculateMasking(facial, physiological, coherenceIndex),
    dissociationIndex,
    dominantEmotion: determineDominantEmotion(facial, physiological, dissociationIndex),
    emotionalIntensity: calculateIntensity(facial, physiological),
    emotionalRegulation: determineRegulation(physiological, coherenceIndex),
    arousalLevel: clamp01(physiological.arousalLevel),
    dataQuality: assessDataQuality(facial.faceDetectionQuality, physiological.qualityIndex),
  };
}
