/**
 * @file Response descriptors consumed by the character-animation collaborator.
 */

import type { EmotionType } from './emotion';

export type ResponseType =
  | 'mirroring'
  | 'exploration'
  | 'validation'
  | 'regulation'
  | 'grounding'
  | 'transfer'
  | 'celebration'
  | 'integration'
  | 'titration';

export type InterventionLevel = 'minimal' | 'moderate' | 'significant' | 'intensive';

export type BodyMovement = 'gentle' | 'rhythmic' | 'stretching' | 'grounding';
export type Vocalization = 'hum' | 'sigh' | 'soothing' | 'affirming';
export type AttentionFocus = 'direct' | 'shared' | 'environment' | 'self';

export type CharacterAction =
  | { kind: 'breathing'; speed: number; depth: number }
  | { kind: 'facialExpression'; emotion: EmotionType; intensity: number }
  | { kind: 'bodyMovement'; movement: BodyMovement; intensity: number }
  | { kind: 'vocalization'; sound: Vocalization }
  | { kind: 'attention'; focus: AttentionFocus };

export interface TherapeuticResponse {
  timestamp: number;
  responseType: ResponseType;
  characterEmotion: EmotionType;
  characterIntensity: number;
  characterAction: CharacterAction;
  verbal: string;
  nonverbal: string;
  interventionLevel: InterventionLevel;
  targetEmotion?: EmotionType;
  /** Seconds the response stays active */
  duration: number;
}

export type GroundingTechnique = 'breathing' | 'sensory' | 'movement' | 'cognitive' | 'naming';

export interface ResponsePreferences {
  responsivenessSensitivity: number;
  emotionalMirroringSensitivity: number;
  preferredGroundingTechniques: GroundingTechnique[];
}

export const DEFAULT_RESPONSE_PREFERENCES: ResponsePreferences = {
  responsivenessSensitivity: 0.7,
  emotionalMirroringSensitivity: 0.8,
  preferredGroundingTechniques: ['breathing', 'sensory'],
};
