/**
 * @file Grounding technique selection for active dissociation.
 */

import type { DissociationSeverity } from '../../models/dissociation';
import type { CharacterAction, GroundingTechnique, InterventionLevel } from '../../models/therapeutic_response';

interface TechniqueRule {
  /** In order of preference */
  candidates: GroundingTechnique[];
  /** Used when no candidate and no preference is available */
  fallback: GroundingTechnique;
}

export const GROUNDING_TABLE: Record<DissociationSeverity, TechniqueRule> = {
  severe: { candidates: ['sensory', 'breathing'], fallback: 'sensory' },
  moderate: { candidates: ['movement', 'breathing'], fallback: 'breathing' },
  mild: { candidates: ['cognitive', 'naming'], fallback: 'naming' },
  potential: { candidates: ['cognitive', 'naming'], fallback: 'naming' },
};

/**
 * First table candidate the preferences allow, else the first preferred
 * technique, else the table fallback.
 */
export function selectGroundingTechnique(
  severity: DissociationSeverity,
  preferred: readonly GroundingTechnique[]
): GroundingTechnique {
  const rule = GROUNDING_TABLE[severity];
  const allowed = rule.candidates.find(c => preferred.includes(c));
  if (allowed) return allowed;
  return preferred.length > 0 ? preferred[0] : rule.fallback;
}

export function groundingAction(technique: GroundingTechnique): CharacterAction {
  switch (technique) {
    case 'breathing':
      return { kind: 'breathing', speed: 0.3, depth: 0.8 };
    case 'sensory':
    case 'naming':
      return { kind: 'attention', focus: 'direct' };
    case 'movement':
      return { kind: 'bodyMovement', movement: 'gentle', intensity: 0.6 };
    case 'cognitive':
      return { kind: 'facialExpression', emotion: 'interest', intensity: 0.7 };
  }
}

export function groundingInterventionLevel(severity: DissociationSeverity): InterventionLevel {
  switch (severity) {
    case 'potential':
    case 'mild':
      return 'minimal';
    case 'moderate':
      return 'moderate';
    case 'severe':
      return 'intensive';
  }
}
