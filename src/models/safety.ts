/**
 * @file Alert levels and safety events raised by the safety monitor.
 */

export const ALERT_LEVELS = ['none', 'low', 'medium', 'high'] as const;

export type AlertLevel = (typeof ALERT_LEVELS)[number];

export function alertRank(level: AlertLevel): number {
  return ALERT_LEVELS.indexOf(level);
}

export type SafetyTrigger =
  | 'severeDistress'
  | 'severeDissociation'
  | 'extremeArousal'
  | 'prolongedNegativeState'
  | 'sustainedArousal';

export const TRIGGER_DESCRIPTIONS: Record<SafetyTrigger, string> = {
  severeDistress: 'Severe emotional distress detected',
  severeDissociation: 'Severe dissociative state detected',
  extremeArousal: 'Extreme physiological arousal detected',
  prolongedNegativeState: 'Prolonged negative emotional state detected',
  sustainedArousal: 'Sustained extreme arousal detected',
};

export interface SafetyEvent {
  trigger: SafetyTrigger;
  level: AlertLevel;
  timestamp: number;
  description: string;
}

export function createSafetyEvent(trigger: SafetyTrigger, level: AlertLevel, timestamp: number): SafetyEvent {
  return { trigger, level, timestamp, description: TRIGGER_DESCRIPTIONS[trigger] };
}
