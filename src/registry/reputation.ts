/**
 * Reputation scoring.
 *
 * Scores are saturating integers in [0, MAX_REPUTATION_SCORE]. Each trust
 * signal maps to a fixed delta; applying a delta always emits
 * ReputationUpdated, even when the score is pinned at a bound.
 */

import { MAX_REPUTATION_SCORE, type Principal } from './types.js';
import type { WorkingSet } from './workingSet.js';

export const REPUTATION_DELTAS = {
  identityVerified: 100,
  identityUnverified: -50,
  credentialAdded: 50,
  credentialRevoked: -30,
} as const;

export function applyDelta(currentScore: number, delta: number): number {
  if (delta > 0) {
    return Math.min(currentScore + delta, MAX_REPUTATION_SCORE);
  }
  return Math.max(currentScore - Math.abs(delta), 0);
}

/**
 * Apply a delta to a principal's stored score and record the event.
 * Returns the new score, or null when the principal has no identity.
 */
export async function adjustReputation(
  ws: WorkingSet,
  principal: Principal,
  delta: number,
  now: number,
): Promise<number | null> {
  const identity = await ws.getIdentity(principal);
  if (!identity) return null;

  const newScore = applyDelta(identity.reputationScore, delta);
  ws.putIdentity(principal, {
    ...identity,
    reputationScore: newScore,
    lastUpdated: Math.max(identity.lastUpdated, now),
  });
  ws.emit({ type: 'ReputationUpdated', user: principal, newScore, timestamp: now });

  return newScore;
}
