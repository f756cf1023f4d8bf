/**
 * @file Phase plan - how a session's time budget splits across phases.
 */

import type { SessionPhase } from '../../models/session';
import { SESSION_PHASES } from '../../models/session';

/** Share of the session duration spent in each phase. Sums to 1. */
export const PHASE_ALLOCATIONS: Record<SessionPhase, number> = {
  connection: 0.15,
  awareness: 0.3,
  integration: 0.3,
  regulation: 0.15,
  transfer: 0.1,
};

export interface PhaseTransition {
  phase: SessionPhase;
  /** Active session seconds at which the phase begins */
  at: number;
}

/**
 * Transitions into every phase after `from`, starting the clock at `startAt`
 * seconds and giving each phase its share of `durationSeconds`.
 */
export function planTransitions(from: SessionPhase, durationSeconds: number, startAt = 0): PhaseTransition[] {
  const transitions: PhaseTransition[] = [];
  let offset = startAt;

  for (let i = SESSION_PHASES.indexOf(from); i < SESSION_PHASES.length - 1; i++) {
    offset += PHASE_ALLOCATIONS[SESSION_PHASES[i]] * durationSeconds;
    transitions.push({ phase: SESSION_PHASES[i + 1], at: offset });
  }

  return transitions;
}
