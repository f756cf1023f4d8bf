/**
 * @file Therapeutic sessions, phases and end-of-session metrics.
 */

import { v4 as uuidv4 } from 'uuid';
import type { EmotionType } from './emotion';
import { EMOTION_TYPES } from './emotion';
import type { DissociationEpisode } from './dissociation';
import type { IntegratedState } from './integrated_state';
import type { TherapeuticResponse } from './therapeutic_response';
import { mean } from '../utils/math';

// =============================================================================
// PHASES
// =============================================================================

export const SESSION_PHASES = ['connection', 'awareness', 'integration', 'regulation', 'transfer'] as const;

export type SessionPhase = (typeof SESSION_PHASES)[number];

export const PHASE_DETAILS: Record<SessionPhase, { displayName: string; description: string }> = {
  connection: {
    displayName: 'Connection',
    description: 'Build rapport through gentle mirroring.',
  },
  awareness: {
    displayName: 'Emotional Awareness',
    description: 'Notice and name emotions as they arise.',
  },
  integration: {
    displayName: 'Emotional Integration',
    description: 'Connect what the face shows with what the body feels.',
  },
  regulation: {
    displayName: 'Emotional Regulation',
    description: 'Practice bringing strong emotions back to a manageable level.',
  },
  transfer: {
    displayName: 'Skill Transfer',
    description: 'Carry the practiced skills into everyday situations.',
  },
};

export function nextPhase(phase: SessionPhase): SessionPhase | null {
  const index = SESSION_PHASES.indexOf(phase);
  return index < SESSION_PHASES.length - 1 ? SESSION_PHASES[index + 1] : null;
}

export function previousPhase(phase: SessionPhase): SessionPhase | null {
  const index = SESSION_PHASES.indexOf(phase);
  return index > 0 ? SESSION_PHASES[index - 1] : null;
}

// =============================================================================
// SESSION
// =============================================================================

export interface SessionMetrics {
  /** Seconds */
  sessionDuration: number;
  averageCoherenceIndex: number;
  emotionsExpressed: EmotionType[];
  emotionalRangeIndex: number;
  regulationCapacity: number;
  peakArousal: number | null;
  timeOfPeakArousal: number | null;
  /** Mean seconds from high arousal back to baseline; null when never recovered */
  regulationRecoveryTime: number | null;
  dissociationEpisodeCount: number;
  totalDissociationTime: number;
  percentageTimeInDissociation: number;
  interventionsDelivered: number;
}

export interface TherapeuticSession {
  id: string;
  phase: SessionPhase;
  startTime: number;
  endTime?: number;
  states: IntegratedState[];
  dissociationEpisodes: DissociationEpisode[];
  interventions: TherapeuticResponse[];
  metrics?: SessionMetrics;
}

export function createSession(phase: SessionPhase, startTime: number): TherapeuticSession {
  return {
    id: uuidv4(),
    phase,
    startTime,
    states: [],
    dissociationEpisodes: [],
    interventions: [],
  };
}

// =============================================================================
// METRICS
// =============================================================================

const HIGH_AROUSAL = 0.7;
const RECOVERED_AROUSAL = 0.4;

/**
 * Mean seconds between each rise above high arousal and the first later
 * state back under the recovered level. Null when no rise ever recovered.
 */
export function calculateRecoveryTime(states: IntegratedState[]): number | null {
  const recoveries: number[] = [];
  let peakStart: number | null = null;

  for (const state of states) {
    if (peakStart === null && state.arousalLevel > HIGH_AROUSAL) {
      peakStart = state.timestamp;
    } else if (peakStart !== null && state.arousalLevel < RECOVERED_AROUSAL) {
      recoveries.push((state.timestamp - peakStart) / 1000);
      peakStart = null;
    }
  }

  return recoveries.length > 0 ? mean(recoveries) : null;
}

/**
 * Share of regulated states blended with how quickly arousal recovers.
 * Too few states to judge gives the midpoint.
 */
export function calculateRegulationCapacity(states: IntegratedState[]): number {
  if (states.length <= 5) return 0.5;

  const regulatedRatio = states.filter(s => s.emotionalRegulation === 'regulated').length / states.length;
  const recovery = calculateRecoveryTime(states);
  const recoverySpeed = recovery === null ? 0.5 : 1 / (1 + recovery / 60);

  return (regulatedRatio + recoverySpeed) / 2;
}

export function calculateSessionMetrics(session: TherapeuticSession, endTime: number): SessionMetrics {
  const { states, dissociationEpisodes } = session;
  const sessionDuration = Math.max(0, (endTime - session.startTime) / 1000);

  const emotionsExpressed = [...new Set(states.map(s => s.dominantEmotion))];

  let peak: IntegratedState | null = null;
  for (const state of states) {
    if (state.arousalLevel > HIGH_AROUSAL && (peak === null || state.arousalLevel > peak.arousalLevel)) {
      peak = state;
    }
  }

  const totalDissociationTime = dissociationEpisodes.reduce((sum, e) => sum + e.duration, 0);

  return {
    sessionDuration,
    averageCoherenceIndex: mean(states.map(s => s.coherenceIndex)),
    emotionsExpressed,
    emotionalRangeIndex: emotionsExpressed.length / EMOTION_TYPES.length,
    regulationCapacity: calculateRegulationCapacity(states),
    peakArousal: peak ? peak.arousalLevel : null,
    timeOfPeakArousal: peak ? peak.timestamp : null,
    regulationRecoveryTime: calculateRecoveryTime(states),
    dissociationEpisodeCount: dissociationEpisodes.length,
    totalDissociationTime,
    percentageTimeInDissociation: sessionDuration > 0 ? Math.min(100, (totalDissociationTime / sessionDuration) * 100) : 0,
    interventionsDelivered: session.interventions.length,
  };
}
