/**
 * @file Sample and state builders shared by the service tests.
 */

import type { FacialSample } from '../../src/models/emotion';
import type { PhysiologicalSample } from '../../src/models/physiology';
import type { IntegratedState } from '../../src/models/integrated_state';

export function makeFacial(overrides: Partial<FacialSample> = {}): FacialSample {
  return {
    timestamp: 0,
    primaryEmotion: 'happiness',
    primaryIntensity: 0.6,
    confidence: 0.9,
    secondaryEmotions: {},
    faceDetectionQuality: 'good',
    microExpressions: [
      {
        timestamp: 0,
        duration: 0.2,
        emotion: 'happiness',
        intensity: 0.4,
        actionUnits: [{ id: 12, name: 'Lip Corner Puller', intensity: 0.4 }],
      },
    ],
    ...overrides,
  };
}

export interface PhysiologyParams {
  timestamp?: number;
  arousal?: number;
  heartRate?: number;
  sdnn?: number;
  freezeIndex?: number;
  responseCount?: number;
  quality?: number;
}

export function makePhysiological(params: PhysiologyParams = {}): PhysiologicalSample {
  return {
    timestamp: params.timestamp ?? 0,
    heartRate: {
      rate: params.heartRate ?? 75,
      variability: params.sdnn ?? 60,
      rmssd: 40,
      pnn50: 20,
      quality: 0.9,
    },
    electrodermal: {
      skinConductanceLevel: 4,
      responseCount: params.responseCount ?? 2,
      peakAmplitude: 0.3,
      quality: 0.9,
    },
    motion: {
      acceleration: { x: 0, y: 0, z: 1 },
      rotationRate: { x: 0, y: 0, z: 0 },
      tremor: 0.05,
      freezeIndex: params.freezeIndex ?? 0.1,
      quality: 0.9,
    },
    respiration: {
      rate: 16,
      irregularity: 0.1,
      depth: 0.6,
      quality: 0.9,
    },
    arousalLevel: params.arousal ?? 0.5,
    qualityIndex: params.quality ?? 0.9,
  };
}

/**
 * A fused state with explicit indices. The physiological snapshot follows
 * `physiology`, with its arousal taken from the state's arousalLevel.
 */
export function makeState(overrides: Partial<IntegratedState> = {}, physiology: PhysiologyParams = {}): IntegratedState {
  const arousalLevel = overrides.arousalLevel ?? physiology.arousal ?? 0.5;
  return {
    timestamp: 0,
    facial: makeFacial(),
    physiological: makePhysiological({ ...physiology, arousal: arousalLevel }),
    coherenceIndex: 0.8,
    emotionalMaskingIndex: 0.2,
    dissociationIndex: 0.1,
    dominantEmotion: 'happiness',
    emotionalIntensity: 0.5,
    emotionalRegulation: 'regulated',
    arousalLevel,
    dataQuality: 'good',
    ...overrides,
  };
}

/** States at a fixed interval, one per value, starting at `startMs`. */
export function dissociationStream(values: number[], intervalMs = 200, startMs = 0): IntegratedState[] {
  return values.map((dissociationIndex, i) => makeState({ timestamp: startMs + i * intervalMs, dissociationIndex }));
}
