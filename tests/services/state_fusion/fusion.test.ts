/**
 * @file Tests for the fusion calculators
 */

import {
  assessDataQuality,
  bandAgreement,
  calculateCoherence,
  calculateDissociation,
  calculateIntensity,
  calculateMasking,
  determineDominantEmotion,
  determineRegulation,
  fuseSamples,
} from '../../../src/services/state_fusion/fusion';
import { makeFacial, makePhysiological } from '../../fixtures/samples';

describe('Fusion calculators', () => {
  describe('bandAgreement', () => {
    it('should be 1 at the band center', () => {
      expect(bandAgreement(0.6, { min: 0.4, max: 0.8 })).toBeCloseTo(1, 10);
    });

    it('should be 0.5 at the band edge', () => {
      expect(bandAgreement(0.8, { min: 0.4, max: 0.8 })).toBeCloseTo(0.5, 10);
    });

    it('should fall towards 0 at the farthest point outside the band', () => {
      expect(bandAgreement(0, { min: 0.4, max: 0.8 })).toBeCloseTo(0, 10);
    });
  });

  describe('calculateCoherence', () => {
    it('should be near-maximal for happiness at the center of its band', () => {
      const facial = makeFacial({ primaryEmotion: 'happiness', confidence: 1.0 });
      const physiological = makePhysiological({ arousal: 0.6, sdnn: 40, quality: 0.9 });

      expect(calculateCoherence(facial, physiological)).toBeCloseTo(0.9, 10);
    });

    it('should cap the corroboration bonus before scaling by quality', () => {
      const facial = makeFacial({ primaryEmotion: 'happiness', confidence: 1.0 });
      const physiological = makePhysiological({ arousal: 0.6, sdnn: 60, quality: 0.9 });

      expect(calculateCoherence(facial, physiological)).toBeCloseTo(0.9, 10);
    });

    it('should add the anger corroboration for fast heart rate and low variability', () => {
      const facial = makeFacial({ primaryEmotion: 'anger', confidence: 1.0 });
      const physiological = makePhysiological({ arousal: 0.7, heartRate: 110, sdnn: 25, quality: 1.0 });

      expect(calculateCoherence(facial, physiological)).toBeCloseTo(0.95, 10);
    });

    it('should score arousal outside the band by distance to the nearest edge', () => {
      const facial = makeFacial({ primaryEmotion: 'sadness', confidence: 1.0 });
      const physiological = makePhysiological({ arousal: 0.9, heartRate: 75, quality: 1.0 });

      expect(calculateCoherence(facial, physiological)).toBeCloseTo(0.125, 5);
    });

    it('should treat fear with a freeze response as coherent', () => {
      const facial = makeFacial({ primaryEmotion: 'fear', confidence: 1.0 });
      const physiological = makePhysiological({ arousal: 0.5, freezeIndex: 0.8, quality: 1.0 });

      expect(calculateCoherence(facial, physiological)).toBeCloseTo(0.9, 10);
    });

    it('should use 0.5 for emotions without an expected band', () => {
      const facial = makeFacial({ primaryEmotion: 'interest', confidence: 1.0 });
      const physiological = makePhysiological({ quality: 1.0 });

      expect(calculateCoherence(facial, physiological)).toBeCloseTo(0.5, 10);
    });

    it('should scale by facial confidence and physiological quality', () => {
      const facial = makeFacial({ primaryEmotion: 'interest', confidence: 0.5 });
      const physiological = makePhysiological({ quality: 0.5 });

      expect(calculateCoherence(facial, physiological)).toBeCloseTo(0.125, 10);
    });
  });

  describe('calculateMasking', () => {
    it('should flag a neutral face over high arousal', () => {
      const facial = makeFacial({ primaryEmotion: 'neutral' });
      const physiological = makePhysiological({ arousal: 0.8 });

      expect(calculateMasking(facial, physiological, 0.9)).toBe(1.0);
    });

    it('should flag a smile over a stressed body', () => {
      const facial = makeFacial({ primaryEmotion: 'happiness', confidence: 1.0 });
      const physiological = makePhysiological({ arousal: 0.75, sdnn: 20, quality: 1.0 });
      const coherence = calculateCoherence(facial, physiological);

      expect(coherence).toBeCloseTo(0.625, 10);
      expect(calculateMasking(facial, physiological, coherence)).toBe(0.8);
    });

    it('should fall back to the incoherence when no masking pattern fires', () => {
      const facial = makeFacial({ primaryEmotion: 'sadness' });
      const physiological = makePhysiological({ arousal: 0.4 });

      expect(calculateMasking(facial, physiological, 0.7)).toBeCloseTo(0.3, 10);
    });
  });

  describe('calculateDissociation', () => {
    it('should clamp the sum of all flags to 1', () => {
      const facial = makeFacial({ primaryEmotion: 'neutral', primaryIntensity: 0.1, confidence: 0.9, microExpressions: [] });
      const physiological = makePhysiological({ arousal: 0.2, freezeIndex: 0.8, heartRate: 60, sdnn: 15 });

      expect(calculateDissociation(facial, physiological, 0.75)).toBe(1);
    });

    it('should count a freeze response alone as 0.4', () => {
      const facial = makeFacial();
      const physiological = makePhysiological({ arousal: 0.6, freezeIndex: 0.8 });

      expect(calculateDissociation(facial, physiological, 0.81)).toBeCloseTo(0.4, 10);
    });

    it('should add weight for low coherence', () => {
      const facial = makeFacial({ primaryEmotion: 'sadness' });
      const physiological = makePhysiological({ arousal: 0.9 });

      expect(calculateDissociation(facial, physiological, 0.125)).toBeCloseTo(0.2625, 10);
    });

    it('should flag missing micro-expressions only at high confidence', () => {
      const physiological = makePhysiological();

      expect(calculateDissociation(makeFacial({ microExpressions: [], confidence: 0.9 }), physiological, 0.8)).toBeCloseTo(0.2, 10);
      expect(calculateDissociation(makeFacial({ microExpressions: [], confidence: 0.7 }), physiological, 0.8)).toBe(0);
    });
  });

  describe('determineDominantEmotion', () => {
    it('should trust a confident, intense facial emotion', () => {
      const facial = makeFacial({ primaryEmotion: 'surprise', confidence: 0.9, primaryIntensity: 0.6 });
      expect(determineDominantEmotion(facial, makePhysiological(), 0.9)).toBe('surprise');
    });

    it('should infer from physiology when the face is unreliable', () => {
      const facial = makeFacial({ primaryEmotion: 'neutral', confidence: 0.3 });

      expect(determineDominantEmotion(facial, makePhysiological({ arousal: 0.9, freezeIndex: 0.8 }), 0)).toBe('fear');
      expect(determineDominantEmotion(facial, makePhysiological({ arousal: 0.9 }), 0)).toBe('anger');
      expect(determineDominantEmotion(facial, makePhysiological({ arousal: 0.2 }), 0)).toBe('sadness');
    });

    it('should report dissociation when the index is high', () => {
      const facial = makeFacial({ primaryEmotion: 'neutral', confidence: 0.5, primaryIntensity: 0.2 });
      expect(determineDominantEmotion(facial, makePhysiological(), 0.8)).toBe('dissociation');
    });

    it('should fall back to the facial emotion', () => {
      const facial = makeFacial({ primaryEmotion: 'sadness', confidence: 0.5, primaryIntensity: 0.3 });
      expect(determineDominantEmotion(facial, makePhysiological({ arousal: 0.5 }), 0.2)).toBe('sadness');
    });
  });

  describe('calculateIntensity', () => {
    it('should weight facial intensity by confidence and arousal by quality', () => {
      const facial = makeFacial({ primaryIntensity: 1.0, confidence: 0.75 });
      const physiological = makePhysiological({ arousal: 0.2, quality: 0.25 });

      expect(calculateIntensity(facial, physiological)).toBeCloseTo(0.8, 10);
    });

    it('should average when both weights are zero', () => {
      const facial = makeFacial({ primaryIntensity: 1.0, confidence: 0 });
      const physiological = makePhysiological({ arousal: 0.2, quality: 0 });

      expect(calculateIntensity(facial, physiological)).toBeCloseTo(0.6, 10);
    });
  });

  describe('determineRegulation', () => {
    it.each([
      [0.5, 70, 0.7, 'regulated'],
      [0.85, 20, 0.2, 'severeDysregulation'],
      [0.65, 35, 0.2, 'moderateDysregulation'],
      [0.55, 45, 0.2, 'mildDysregulation'],
      [0.4, 20, 0.2, 'regulated'],
    ])('should classify arousal %p with SDNN %p and coherence %p as %s', (arousal, sdnn, coherence, expected) => {
      expect(determineRegulation(makePhysiological({ arousal, sdnn }), coherence)).toBe(expected);
    });
  });

  describe('assessDataQuality', () => {
    it.each([
      ['noFace', 0.95, 'invalid'],
      ['good', 0.1, 'invalid'],
      ['excellent', 0.85, 'excellent'],
      ['good', 0.95, 'excellent'],
      ['excellent', 0.7, 'good'],
      ['good', 0.8, 'good'],
      ['fair', 0.85, 'good'],
      ['poor', 0.4, 'poor'],
      ['fair', 0.3, 'poor'],
      ['poor', 0.6, 'fair'],
      ['fair', 0.6, 'fair'],
      ['good', 0.5, 'fair'],
    ] as const)('should map face %s with bio quality %p to %s', (face, bio, expected) => {
      expect(assessDataQuality(face, bio)).toBe(expected);
    });
  });

  describe('fuseSamples', () => {
    it('should keep every index within [0, 1] for out-of-range inputs', () => {
      const extremes = [-1, 0, 0.5, 1, 1.5, Number.NaN];

      for (const value of extremes) {
        const facial = makeFacial({ primaryEmotion: 'neutral', primaryIntensity: value, confidence: value, microExpressions: [] });
        const physiological = makePhysiological({ arousal: value, quality: value, freezeIndex: value, sdnn: 5, heartRate: 50 });
        const state = fuseSamples(facial, physiological, 1000);

        for (const index of [
          state.coherenceIndex,
          state.emotionalMaskingIndex,
          state.dissociationIndex,
          state.emotionalIntensity,
          state.arousalLevel,
        ]) {
          expect(index).toBeGreaterThanOrEqual(0);
          expect(index).toBeLessThanOrEqual(1);
        }
      }
    });

    it('should stamp the state and keep both samples', () => {
      const facial = makeFacial();
      const physiological = makePhysiological();
      const state = fuseSamples(facial, physiological, 4200);

      expect(state.timestamp).toBe(4200);
      expect(state.facial).toBe(facial);
      expect(state.physiological).toBe(physiological);
      expect(state.dataQuality).toBe('good');
    });
  });
});
