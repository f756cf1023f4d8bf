/**
 * @file Physiological samples from the biometric collaborator.
 * Metric values arrive pre-computed; nothing here does signal processing.
 */

export interface Vector3 {
  x: number;
  y: number;
  z: number;
}

export interface HeartRateMetrics {
  /** Beats per minute */
  rate: number;
  /** SDNN in milliseconds */
  variability: number;
  rmssd: number;
  pnn50: number;
  quality: number;
}

export interface ElectrodermalMetrics {
  skinConductanceLevel: number;
  responseCount: number;
  peakAmplitude: number;
  quality: number;
}

export interface MotionMetrics {
  acceleration: Vector3;
  rotationRate: Vector3;
  tremor: number;
  freezeIndex: number;
  quality: number;
}

export interface RespirationMetrics {
  /** Breaths per minute */
  rate: number;
  irregularity: number;
  depth: number;
  quality: number;
}

export interface PhysiologicalSample {
  /** Epoch milliseconds */
  timestamp: number;
  heartRate: HeartRateMetrics;
  electrodermal: ElectrodermalMetrics;
  motion: MotionMetrics;
  respiration: RespirationMetrics;
  arousalLevel: number;
  qualityIndex: number;
}

/** SDNN mapped onto [0, 1], saturating at 100 ms. */
export function normalizedHrv(sample: PhysiologicalSample): number {
  return Math.max(0, Math.min(100, sample.heartRate.variability)) / 100;
}
