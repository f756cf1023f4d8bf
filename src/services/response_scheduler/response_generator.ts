/**
 * @file Response Generator - maps fused states to character responses
 *
 * Each session phase has its own response type and intensity scaling.
 * Safety and grounding responses are phase-independent. Wording comes from
 * verbal_templates.json.
 */

import type { EmotionType } from '../../models/emotion';
import { isNegativeEmotion } from '../../models/emotion';
import type { PhysiologicalSample } from '../../models/physiology';
import type { IntegratedState } from '../../models/integrated_state';
import { isMasked, isRegulated } from '../../models/integrated_state';
import type { DissociationSeverity } from '../../models/dissociation';
import type { SessionPhase } from '../../models/session';
import type {
  CharacterAction,
  ResponsePreferences,
  ResponseType,
  TherapeuticResponse,
} from '../../models/therapeutic_response';
import { DEFAULT_RESPONSE_PREFERENCES } from '../../models/therapeutic_response';
import { clamp01 } from '../../utils/math';
import { groundingAction, groundingInterventionLevel, selectGroundingTechnique } from './grounding';
import verbalTemplates from './verbal_templates.json';

// ============================================================================
// Templates
// ============================================================================

type EmotionTemplates = Record<string, string> & { default: string };

interface VerbalTemplates {
  safety: string;
  connection: EmotionTemplates;
  awareness: EmotionTemplates;
  integration: Record<'integration' | 'titration' | 'masking' | 'validation', string>;
  regulation: EmotionTemplates & { celebration: string };
  transfer: { regulated: EmotionTemplates; dysregulated: EmotionTemplates };
  grounding: Record<'breathing' | 'sensory' | 'movement' | 'cognitive' | 'naming', string>;
  nonverbal: Record<ResponseType, string>;
}

const TEMPLATES: VerbalTemplates = verbalTemplates;

function byEmotion(table: EmotionTemplates, emotion: EmotionType): string {
  return table[emotion] ?? table.default;
}

export function intensityWord(intensity: number): string {
  if (intensity > 0.7) return 'very ';
  if (intensity > 0.4) return '';
  return 'a little ';
}

// ============================================================================
// Helpers
// ============================================================================

/**
 * Best guess at the felt emotion from the body alone.
 */
export function inferEmotionFromPhysiology(physiological: PhysiologicalSample): EmotionType {
  if (physiological.motion.freezeIndex > 0.7) return 'fear';
  if (physiological.arousalLevel > 0.8) {
    return physiological.heartRate.rate > 100 ? 'anger' : 'fear';
  }
  if (physiological.arousalLevel > 0.6) return 'surprise';
  if (physiological.arousalLevel < 0.3) return 'sadness';
  return 'neutral';
}

/** The character never performs a shut-down state back at the child. */
function displayable(emotion: EmotionType): EmotionType {
  return emotion === 'dissociation' || emotion === 'freeze' ? 'neutral' : emotion;
}

function expression(emotion: EmotionType, intensity: number): CharacterAction {
  return { kind: 'facialExpression', emotion, intensity };
}

function regulationStrategy(emotion: EmotionType): CharacterAction {
  switch (emotion) {
    case 'anger':
      return { kind: 'breathing', speed: 0.3, depth: 0.8 };
    case 'fear':
      return { kind: 'attention', focus: 'shared' };
    case 'sadness':
      return expression('sadness', 0.4);
    default:
      return { kind: 'breathing', speed: 0.5, depth: 0.6 };
  }
}

type ResponseDraft = Omit<TherapeuticResponse, 'timestamp' | 'nonverbal'>;

function finish(draft: ResponseDraft, timestamp: number): TherapeuticResponse {
  return {
    ...draft,
    timestamp,
    characterIntensity: clamp01(draft.characterIntensity),
    nonverbal: TEMPLATES.nonverbal[draft.responseType],
  };
}

// ============================================================================
// Generator
// ============================================================================

export class ResponseGenerator {
  private preferences: ResponsePreferences;

  constructor(preferences: Partial<ResponsePreferences> = {}) {
    this.preferences = { ...DEFAULT_RESPONSE_PREFERENCES, ...preferences };
  }

  get currentPreferences(): ResponsePreferences {
    return { ...this.preferences };
  }

  updatePreferences(preferences: Partial<ResponsePreferences>): void {
    this.preferences = { ...this.preferences, ...preferences };
  }

  /** Calming response for a pending safety intervention. */
  safetyResponse(timestamp: number): TherapeuticResponse {
    return finish(
      {
        responseType: 'regulation',
        characterEmotion: 'neutral',
        characterIntensity: 0.3,
        characterAction: { kind: 'breathing', speed: 0.3, depth: 0.8 },
        verbal: TEMPLATES.safety,
        interventionLevel: 'intensive',
        targetEmotion: 'neutral',
        duration: 20,
      },
      timestamp
    );
  }

  groundingResponse(severity: DissociationSeverity, timestamp: number): TherapeuticResponse {
    const technique = selectGroundingTechnique(severity, this.preferences.preferredGroundingTechniques);
    return finish(
      {
        responseType: 'grounding',
        characterEmotion: 'neutral',
        characterIntensity: 0.3,
        characterAction: groundingAction(technique),
        verbal: TEMPLATES.grounding[technique],
        interventionLevel: groundingInterventionLevel(severity),
        targetEmotion: 'neutral',
        duration: 15,
      },
      timestamp
    );
  }

  phaseResponse(phase: SessionPhase, state: IntegratedState, timestamp: number): TherapeuticResponse {
    switch (phase) {
      case 'connection':
        return finish(this.connection(state), timestamp);
      case 'awareness':
        return finish(this.awareness(state), timestamp);
      case 'integration':
        return finish(this.integration(state), timestamp);
      case 'regulation':
        return finish(this.regulation(state), timestamp);
      case 'transfer':
        return finish(this.transfer(state), timestamp);
    }
  }

  // ==========================================================================
  // Phases
  // ==========================================================================

  private connection(state: IntegratedState): ResponseDraft {
    const emotion = displayable(state.dominantEmotion);
    let intensity = state.emotionalIntensity * 0.7;
    if (isNegativeEmotion(emotion)) {
      intensity *= 0.5;
    }

    return {
      responseType: 'mirroring',
      characterEmotion: emotion,
      characterIntensity: intensity,
      characterAction: expression(emotion, intensity),
      verbal: byEmotion(TEMPLATES.connection, emotion),
      interventionLevel: 'minimal',
      duration: 5,
    };
  }

  private awareness(state: IntegratedState): ResponseDraft {
    const emotion = displayable(state.dominantEmotion);
    const titration = 0.4 * (1 - this.preferences.emotionalMirroringSensitivity);
    const intensity = state.emotionalIntensity * (1 - titration);
    const verbal = byEmotion(TEMPLATES.awareness, emotion).replace(
      '{intensity}',
      intensityWord(state.emotionalIntensity)
    );

    return {
      responseType: 'exploration',
      characterEmotion: emotion,
      characterIntensity: intensity,
      characterAction: expression(emotion, intensity),
      verbal,
      interventionLevel: 'moderate',
      targetEmotion: state.dominantEmotion,
      duration: 10,
    };
  }

  private integration(state: IntegratedState): ResponseDraft {
    const emotion = displayable(state.dominantEmotion);

    if (state.coherenceIndex < 0.2) {
      return {
        responseType: 'integration',
        characterEmotion: emotion,
        characterIntensity: 0.5,
        characterAction: { kind: 'attention', focus: 'self' },
        verbal: TEMPLATES.integration.integration,
        interventionLevel: 'moderate',
        targetEmotion: state.dominantEmotion,
        duration: 20,
      };
    }

    if (state.coherenceIndex < 0.4) {
      return {
        responseType: 'titration',
        characterEmotion: emotion,
        characterIntensity: state.emotionalIntensity * 0.7,
        characterAction: { kind: 'bodyMovement', movement: 'gentle', intensity: 0.5 },
        verbal: TEMPLATES.integration.titration,
        interventionLevel: 'moderate',
        targetEmotion: state.dominantEmotion,
        duration: 25,
      };
    }

    if (isMasked(state)) {
      const felt = inferEmotionFromPhysiology(state.physiological);
      return {
        responseType: 'mirroring',
        characterEmotion: felt,
        characterIntensity: 0.6,
        characterAction: expression(felt, 0.6),
        verbal: TEMPLATES.integration.masking,
        interventionLevel: 'moderate',
        targetEmotion: felt,
        duration: 12,
      };
    }

    const intensity = state.emotionalIntensity * 0.8;
    return {
      responseType: 'validation',
      characterEmotion: emotion,
      characterIntensity: intensity,
      characterAction: expression(emotion, intensity),
      verbal: TEMPLATES.integration.validation,
      interventionLevel: 'minimal',
      duration: 8,
    };
  }

  private regulation(state: IntegratedState): ResponseDraft {
    const emotion = displayable(state.dominantEmotion);

    if (!isRegulated(state) && state.emotionalIntensity > 0.7) {
      return {
        responseType: 'regulation',
        characterEmotion: emotion,
        characterIntensity: Math.max(0.3, state.emotionalIntensity - 0.3),
        characterAction: regulationStrategy(emotion),
        verbal: byEmotion(TEMPLATES.regulation, emotion),
        interventionLevel: 'significant',
        targetEmotion: 'neutral',
        duration: 15,
      };
    }

    return {
      responseType: 'celebration',
      characterEmotion: 'happiness',
      characterIntensity: 0.6,
      characterAction: expression('happiness', 0.6),
      verbal: TEMPLATES.regulation.celebration,
      interventionLevel: 'minimal',
      duration: 5,
    };
  }

  private transfer(state: IntegratedState): ResponseDraft {
    const emotion = displayable(state.dominantEmotion);
    const intensity = state.emotionalIntensity * 0.7;
    const table = isRegulated(state) ? TEMPLATES.transfer.regulated : TEMPLATES.transfer.dysregulated;

    return {
      responseType: 'transfer',
      characterEmotion: emotion,
      characterIntensity: intensity,
      characterAction: { kind: 'attention', focus: 'shared' },
      verbal: byEmotion(table, emotion),
      interventionLevel: 'moderate',
      duration: 10,
    };
  }
}
