/**
 * @file Facial-expression samples as delivered by the facial-analysis collaborator.
 */

// =============================================================================
// EMOTION TAXONOMY
// =============================================================================

export const EMOTION_TYPES = [
  'neutral',
  'happiness',
  'sadness',
  'anger',
  'fear',
  'surprise',
  'disgust',
  'contempt',
  'dissociation',
  'hypervigilance',
  'freeze',
  'confusion',
  'interest',
  'shame',
  'pride',
] as const;

export type EmotionType = (typeof EMOTION_TYPES)[number];

/** Emotions treated as distress when intense. */
export const NEGATIVE_EMOTIONS: readonly EmotionType[] = ['sadness', 'anger', 'fear', 'disgust'];

export function isNegativeEmotion(emotion: EmotionType): boolean {
  return NEGATIVE_EMOTIONS.includes(emotion);
}

export type DetectionQuality = 'noFace' | 'poor' | 'fair' | 'good' | 'excellent';

// =============================================================================
// SAMPLE
// =============================================================================

export interface ActionUnit {
  id: number;
  name: string;
  intensity: number;
}

export interface MicroExpression {
  timestamp: number;
  /** Seconds */
  duration: number;
  emotion: EmotionType;
  intensity: number;
  actionUnits: ActionUnit[];
}

export interface FacialSample {
  /** Epoch milliseconds */
  timestamp: number;
  primaryEmotion: EmotionType;
  primaryIntensity: number;
  confidence: number;
  secondaryEmotions: Partial<Record<EmotionType, number>>;
  faceDetectionQuality: DetectionQuality;
  microExpressions: MicroExpression[];
}
