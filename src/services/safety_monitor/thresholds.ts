/**
 * @file Safety thresholds - the single table every safety rule reads from.
 */

import type { AlertLevel, SafetyTrigger } from '../../models/safety';

export interface SafetyThresholds {
  /** Intensity above which a negative emotion counts as distress */
  distressIntensity: number;
  /** Arousal that must accompany distress */
  distressArousal: number;
  severeDissociation: number;
  extremeArousal: number;
  /** Beats per minute */
  extremeHeartRate: number;
  /** Arousal level that starts the sustained-distress timer */
  sustainedArousal: number;
  /** Negative-emotion intensity that starts the prolonged-state timer */
  prolongedNegativeIntensity: number;
  prolongedNegativeSeconds: number;
  interventionAfterSeconds: number;
  terminationAfterSeconds: number;
  /** Severe dissociation must hold this long before termination */
  dissociationTerminationSeconds: number;
  /** Medium alerts reach the guardian only after this much session time */
  guardianPersistenceSeconds: number;
}

export const SAFETY_THRESHOLDS: SafetyThresholds = {
  distressIntensity: 0.8,
  distressArousal: 0.7,
  severeDissociation: 0.8,
  extremeArousal: 0.9,
  extremeHeartRate: 120,
  sustainedArousal: 0.9,
  prolongedNegativeIntensity: 0.6,
  prolongedNegativeSeconds: 60,
  interventionAfterSeconds: 120,
  terminationAfterSeconds: 240,
  dissociationTerminationSeconds: 30,
  guardianPersistenceSeconds: 300,
};

export const TRIGGER_LEVELS: Record<SafetyTrigger, AlertLevel> = {
  severeDistress: 'high',
  severeDissociation: 'medium',
  extremeArousal: 'medium',
  prolongedNegativeState: 'low',
  sustainedArousal: 'high',
};
